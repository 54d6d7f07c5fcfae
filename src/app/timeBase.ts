import { SampleSequence } from '@sinelab/signal-api';
import { SAMPLE_COUNT, TIME_START, TIME_STOP } from './config';
import { InvalidParameterError } from './errors';

/**
 * Evenly spaced instants over [start, stop], both ends included. The last
 * instant is exactly `stop` rather than the accumulated step.
 */
export function generateTimeBase(start: number = TIME_START, stop: number = TIME_STOP, count: number = SAMPLE_COUNT): SampleSequence {
    if (!Number.isFinite(start)) {
        throw new InvalidParameterError('start', start, `Time base start must be finite, got ${start}`);
    }
    if (!Number.isFinite(stop)) {
        throw new InvalidParameterError('stop', stop, `Time base stop must be finite, got ${stop}`);
    }
    if (!Number.isInteger(count) || count < 0) {
        throw new InvalidParameterError('count', count, `Time base count must be a non-negative integer, got ${count}`);
    }
    if (count > 1 && stop <= start) {
        throw new InvalidParameterError('stop', stop, `Time base stop (${stop}) must be greater than start (${start})`);
    }

    const step = count > 1 ? (stop - start) / (count - 1) : 0;
    return SampleSequence.generate(count, index => index === count - 1 && count > 1 ? stop : start + index * step, 's');
}
