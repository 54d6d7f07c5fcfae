import { left, right, type Either } from 'fp-ts/Either';
import {
    SERIES_NAMES,
    type ControllerEvent,
    type Parameters,
    type Sequence,
    type SeriesName,
    type SignalDisplay,
    type SignalOutputs,
    type VisibilityChange,
} from '@sinelab/signal-api';
import { InvalidParameterError } from './errors';
import type { ParameterStore } from './parameterStore';
import type { SignalPipeline } from './signalPipeline';

export type ControllerState = 'idle' | 'recomputing';

export interface ReactiveControllerOptions {
    store: ParameterStore;
    pipeline: SignalPipeline;
    time: Sequence;
    display: SignalDisplay;
}

/**
 * Turns events from the display into parameter updates and recomputes.
 * Events are handled one at a time: an event that arrives while another is
 * still being handled (i.e. from inside the display's publish or
 * setVisibility) is an error.
 */
export class ReactiveController {
    private readonly store: ParameterStore;
    private readonly pipeline: SignalPipeline;
    private readonly time: Sequence;
    private readonly display: SignalDisplay;
    private readonly visibility: Record<SeriesName, boolean> = { pure: true, noisy: true, filtered: true };
    private _state: ControllerState = 'idle';
    private _outputs: SignalOutputs | null = null;
    private handling = false;

    constructor(options: ReactiveControllerOptions) {
        this.store = options.store;
        this.pipeline = options.pipeline;
        this.time = options.time;
        this.display = options.display;
    }

    get state(): ControllerState {
        return this._state;
    }

    /** Last published outputs, null until the first successful recompute */
    get outputs(): SignalOutputs | null {
        return this._outputs;
    }

    isVisible(seriesName: SeriesName): boolean {
        return this.visibility[seriesName];
    }

    start(): Either<InvalidParameterError, SignalOutputs> {
        return this.handle('start', () => {
            const result = this.recompute('start', () => this.store.get());
            for (const seriesName of SERIES_NAMES) {
                this.notify(() => this.display.setVisibility({ seriesName, visible: this.visibility[seriesName] }));
            }
            return result;
        });
    }

    dispatch(event: ControllerEvent): Either<InvalidParameterError, SignalOutputs | VisibilityChange> {
        switch (event.type) {
            case 'parameter-change':
                return this.changeParameter(event.name, event.value);
            case 'reset':
                return this.reset();
            case 'visibility-toggle':
                return right(this.toggleVisibility(event.seriesName));
        }
    }

    changeParameter(name: string, value: unknown): Either<InvalidParameterError, SignalOutputs> {
        const eventName = `parameter-change ${name}`;
        return this.handle(eventName, () => this.recompute(eventName, () => this.store.set(name, value)));
    }

    reset(): Either<InvalidParameterError, SignalOutputs> {
        return this.handle('reset', () => this.recompute('reset', () => this.store.reset()));
    }

    toggleVisibility(seriesName: SeriesName): VisibilityChange {
        return this.handle('visibility-toggle', () => {
            const change: VisibilityChange = { seriesName, visible: !this.visibility[seriesName] };
            this.visibility[seriesName] = change.visible;
            this.notify(() => this.display.setVisibility(change));
            return change;
        });
    }

    private handle<T>(eventName: string, action: () => T): T {
        if (this.handling) {
            throw new Error(`Cannot handle ${eventName} while another event is being handled`);
        }
        this.handling = true;
        try {
            return action();
        } finally {
            this.handling = false;
        }
    }

    private recompute(eventName: string, update: () => Parameters): Either<InvalidParameterError, SignalOutputs> {
        this._state = 'recomputing';
        try {
            const params = update();
            const outputs = this.pipeline.recompute(params, this.time);
            this._outputs = outputs;
            this.notify(() => this.display.publish(outputs));
            return right(outputs);
        } catch (error) {
            if (error instanceof InvalidParameterError) {
                console.warn(`Rejected ${eventName}: ${error.message}`);
                return left(error);
            }
            throw error;
        } finally {
            this._state = 'idle';
        }
    }

    private notify(action: () => void): void {
        try {
            action();
        } catch (error) {
            console.error('Error in signal display:', error);
        }
    }
}
