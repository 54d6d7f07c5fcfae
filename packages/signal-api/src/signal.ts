export interface Sequence {
    /** Minimum value in the sequence */
    readonly min: number;
    /** Maximum value in the sequence */
    readonly max: number;
    /** Number of values in the sequence */
    readonly length: number;
    /** Unit of measurement for the sequence values */
    readonly unit?: string;
    /** Returns the value at the specified index */
    valueAt(index: number): number;
}

export type SeriesName = 'pure' | 'noisy' | 'filtered';

export const SERIES_NAMES: readonly SeriesName[] = ['pure', 'noisy', 'filtered'];

export interface Parameters {
    amplitude: number;
    frequency: number;
    /** Radians */
    phase: number;
    noiseMean: number;
    noiseVariance: number;
    filterWindow: number;
}

export type ParameterName = keyof Parameters;

export interface SignalOutputs {
    time: Sequence;
    pure: Sequence;
    noisy: Sequence;
    filtered: Sequence;
}

export interface VisibilityChange {
    seriesName: SeriesName;
    visible: boolean;
}

export interface ParameterChangeEvent {
    type: 'parameter-change';
    name: ParameterName;
    value: number;
}

export interface ResetEvent {
    type: 'reset';
}

export interface VisibilityToggleEvent {
    type: 'visibility-toggle';
    seriesName: SeriesName;
}

export type ControllerEvent = ParameterChangeEvent | ResetEvent | VisibilityToggleEvent;

/**
 * Consumer of everything the controller produces. Implemented by whatever
 * draws the signals; the core never renders anything itself.
 */
export interface SignalDisplay {
    publish(outputs: SignalOutputs): void;
    setVisibility(change: VisibilityChange): void;
}

export function formatValue(value: number): string {
    if (Number.isNaN(value)) {
        return 'NaN';
    } else if (Math.abs(value) >= 1e6 || (Math.abs(value) < 1e-3 && value !== 0)) {
        return value.toExponential(3);
    } else {
        return value.toFixed(6);
    }
}
