import {
    SERIES_NAMES,
    formatValue,
    type Sequence,
    type SeriesName,
    type SignalDisplay,
    type SignalOutputs,
    type VisibilityChange,
} from '@sinelab/signal-api';

export function rms(sequence: Sequence): number {
    if (sequence.length === 0) {
        return 0;
    }
    let sumSq = 0;
    for (let i = 0; i < sequence.length; i++) {
        const value = sequence.valueAt(i);
        sumSq += value * value;
    }
    return Math.sqrt(sumSq / sequence.length);
}

export function describeSeries(name: SeriesName, sequence: Sequence): string {
    return `${name}: n=${sequence.length} min=${formatValue(sequence.min)} max=${formatValue(sequence.max)} rms=${formatValue(rms(sequence))}`;
}

/**
 * Text stand-in for a plot: one summary line per visible series.
 */
export class ConsoleDisplay implements SignalDisplay {
    private readonly visible = new Map<SeriesName, boolean>();

    constructor(private readonly write: (line: string) => void = line => console.log(line)) {}

    publish(outputs: SignalOutputs): void {
        for (const name of SERIES_NAMES) {
            if (this.visible.get(name) ?? true) {
                this.write(describeSeries(name, outputs[name]));
            }
        }
    }

    setVisibility(change: VisibilityChange): void {
        this.visible.set(change.seriesName, change.visible);
        this.write(`${change.seriesName}: ${change.visible ? 'shown' : 'hidden'}`);
    }
}
