import { createInterface } from 'node:readline';
import { parseArgs } from 'node:util';
import { TIME_START, TIME_STOP, SAMPLE_COUNT } from '../app/config';
import { ConsoleDisplay } from '../app/consoleDisplay';
import { NoiseSource } from '../app/noiseSource';
import { ParameterStore } from '../app/parameterStore';
import { ReactiveController } from '../app/reactiveController';
import { handleLine, loadOverrides, parseSeed } from '../app/shell';
import { SignalPipeline } from '../app/signalPipeline';
import { generateTimeBase } from '../app/timeBase';

async function main(): Promise<void> {
    const { values } = parseArgs({
        options: {
            config: { type: 'string', short: 'c' },
            seed: { type: 'string', short: 's' },
        },
    });

    const store = new ParameterStore(await loadOverrides(values.config));
    const seed = parseSeed(values.seed);
    const controller = new ReactiveController({
        store,
        pipeline: new SignalPipeline(new NoiseSource(seed !== undefined ? { seed } : {})),
        time: generateTimeBase(TIME_START, TIME_STOP, SAMPLE_COUNT),
        display: new ConsoleDisplay(),
    });
    controller.start();

    const lines = createInterface({ input: process.stdin, crlfDelay: Infinity });
    for await (const line of lines) {
        handleLine(controller, line);
    }
}

main().catch((error: unknown) => {
    console.error('sinelab failed:', error);
    process.exitCode = 1;
});
