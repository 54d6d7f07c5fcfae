import { SampleSequence, type Sequence } from '@sinelab/signal-api';

export function synthesize(time: Sequence, amplitude: number, frequency: number, phase: number): SampleSequence {
    return SampleSequence.generate(time.length, index => amplitude * Math.sin(2 * Math.PI * frequency * time.valueAt(index) + phase));
}
