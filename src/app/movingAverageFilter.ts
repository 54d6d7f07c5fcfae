import { SampleSequence, type Sequence } from '@sinelab/signal-api';
import { InvalidParameterError } from './errors';

/**
 * Uniform moving average with "same" alignment: the output has as many
 * samples as the input and samples outside the input count as zero, so the
 * edges are pulled toward zero. An even window reaches one sample further
 * back than forward.
 */
export function smooth(signal: Sequence, window: number): SampleSequence {
    if (!Number.isInteger(window) || window < 1) {
        throw new InvalidParameterError('filterWindow', window, `Filter window must be a positive integer, got ${window}`);
    }

    const length = signal.length;
    const ahead = Math.floor((window - 1) / 2);
    const behind = window - 1 - ahead;

    return SampleSequence.generate(length, index => {
        const first = Math.max(0, index - behind);
        const last = Math.min(length - 1, index + ahead);
        let sum = 0;
        for (let i = first; i <= last; i++) {
            sum += signal.valueAt(i);
        }
        return sum / window;
    }, signal.unit);
}
