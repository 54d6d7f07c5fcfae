import type { Parameters, Sequence, SignalOutputs } from '@sinelab/signal-api';
import { synthesize } from './harmonicSynthesizer';
import { smooth } from './movingAverageFilter';
import type { NoiseSource } from './noiseSource';

export class SignalPipeline {
    constructor(private readonly noiseSource: NoiseSource) {}

    recompute(params: Parameters, time: Sequence): SignalOutputs {
        const pure = synthesize(time, params.amplitude, params.frequency, params.phase);
        const noise = this.noiseSource.sample(time.length, params.noiseMean, params.noiseVariance);
        const noisy = pure.zipWith(noise, (signal, disturbance) => signal + disturbance);
        const filtered = smooth(noisy, params.filterWindow);
        return { time, pure, noisy, filtered };
    }
}
