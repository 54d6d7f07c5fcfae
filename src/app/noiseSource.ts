import { SampleSequence } from '@sinelab/signal-api';
import { InvalidParameterError } from './errors';
import { seededRandom, type RandomSource } from './random';

export interface NoiseSourceOptions {
    /** Replaces the generator with a deterministic one */
    seed?: number;
    random?: RandomSource;
}

/**
 * Gaussian noise generator. Each instance owns its uniform source and every
 * call to {@link NoiseSource.sample} advances it.
 */
export class NoiseSource {
    private readonly random: RandomSource;

    constructor(options: NoiseSourceOptions = {}) {
        if (options.seed !== undefined && options.random !== undefined) {
            throw new Error('Pass either a seed or a random source, not both');
        }
        if (options.seed !== undefined && !Number.isFinite(options.seed)) {
            throw new InvalidParameterError('seed', options.seed, `Noise seed must be finite, got ${options.seed}`);
        }
        this.random = options.seed !== undefined ? seededRandom(options.seed) : options.random ?? Math.random;
    }

    sample(length: number, mean: number, variance: number): SampleSequence {
        if (!Number.isInteger(length) || length < 0) {
            throw new InvalidParameterError('length', length, `Noise length must be a non-negative integer, got ${length}`);
        }
        if (!Number.isFinite(mean)) {
            throw new InvalidParameterError('noiseMean', mean, `Noise mean must be finite, got ${mean}`);
        }
        if (!Number.isFinite(variance) || variance < 0) {
            throw new InvalidParameterError('noiseVariance', variance, `Noise variance must be a finite number >= 0, got ${variance}`);
        }

        const standardDeviation = Math.sqrt(variance);
        const values = new Float64Array(length);
        for (let i = 0; i < length; i += 2) {
            const [z0, z1] = this.standardNormalPair();
            values[i] = mean + standardDeviation * z0;
            if (i + 1 < length) {
                values[i + 1] = mean + standardDeviation * z1;
            }
        }
        return new SampleSequence(values);
    }

    // Box-Muller. 1 - u keeps the logarithm's argument in (0, 1].
    private standardNormalPair(): [number, number] {
        const radius = Math.sqrt(-2 * Math.log(1 - this.random()));
        const angle = 2 * Math.PI * this.random();
        return [radius * Math.cos(angle), radius * Math.sin(angle)];
    }
}
