import { afterEach, beforeEach, describe, it, expect, vi, type MockInstance } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { right, type Either } from 'fp-ts/Either';
import type { ControllerEvent, VisibilityChange } from '@sinelab/signal-api';
import type { InvalidParameterError } from './errors';
import { ParameterStore } from './parameterStore';
import type { ReactiveController } from './reactiveController';
import { handleLine, loadOverrides, parseSeed } from './shell';

class RecordingController implements Pick<ReactiveController, 'dispatch'> {
    readonly events: ControllerEvent[] = [];

    dispatch(event: ControllerEvent): Either<InvalidParameterError, VisibilityChange> {
        this.events.push(event);
        return right({ seriesName: 'pure', visible: true });
    }
}

describe('handleLine', () => {
    let error: MockInstance;

    beforeEach(() => {
        error = vi.spyOn(console, 'error').mockImplementation(() => {});
    });

    afterEach(() => {
        error.mockRestore();
    });

    it('should dispatch decoded events in order', () => {
        const controller = new RecordingController();

        handleLine(controller, '{"type":"parameter-change","name":"phase","value":1.5}');
        handleLine(controller, '{"type":"visibility-toggle","seriesName":"noisy"}');
        handleLine(controller, '{"type":"reset"}');

        expect(controller.events).toEqual([
            { type: 'parameter-change', name: 'phase', value: 1.5 },
            { type: 'visibility-toggle', seriesName: 'noisy' },
            { type: 'reset' },
        ]);
        expect(error).not.toHaveBeenCalled();
    });

    it('should skip blank lines silently', () => {
        const controller = new RecordingController();

        handleLine(controller, '');
        handleLine(controller, '  \t');

        expect(controller.events).toHaveLength(0);
        expect(error).not.toHaveBeenCalled();
    });

    it('should report an undecodable event and skip it', () => {
        const controller = new RecordingController();

        handleLine(controller, '{"type":"explode"}');

        expect(controller.events).toHaveLength(0);
        expect(error).toHaveBeenCalledTimes(1);
        expect(error.mock.calls[0][0]).toMatch(/^Skipping event, invalid event: .*: \{"type":"explode"\}$/);
    });

    it('should report malformed JSON and keep handling later lines', () => {
        const controller = new RecordingController();

        handleLine(controller, 'not json');
        handleLine(controller, '{"type":"reset"}');

        expect(error).toHaveBeenCalledTimes(1);
        expect(error.mock.calls[0][0]).toMatch(/^Skipping event, malformed JSON: .*: not json$/);
        expect(controller.events).toEqual([{ type: 'reset' }]);
    });
});

describe('parseSeed', () => {
    it('should leave the seed unset when none is given', () => {
        expect(parseSeed(undefined)).toBeUndefined();
    });

    it.each([
        ['42', 42],
        ['-7', -7],
        ['0', 0],
    ])('should accept %s', (value, expected) => {
        expect(parseSeed(value)).toBe(expected);
    });

    it.each(['1.5', 'abc', '', ' ', 'Infinity', 'NaN'])('should reject "%s"', value => {
        expect(() => parseSeed(value)).toThrow(`--seed must be an integer, got ${value}`);
    });
});

describe('loadOverrides', () => {
    let directory: string;

    beforeEach(async () => {
        directory = await mkdtemp(join(tmpdir(), 'sinelab-'));
    });

    afterEach(async () => {
        await rm(directory, { recursive: true, force: true });
    });

    it('should return nothing without a path', async () => {
        await expect(loadOverrides(undefined)).resolves.toBeUndefined();
    });

    it('should read the bundled example config', async () => {
        const path = fileURLToPath(new URL('../../examples/overrides.json', import.meta.url));

        await expect(loadOverrides(path)).resolves.toEqual({ amplitude: 2, noiseVariance: 0.5, filterWindow: 20 });
    });

    it('should hand loaded overrides to the parameter store', async () => {
        const path = join(directory, 'config.json');
        await writeFile(path, '{"frequency": 2.5, "phase": 1}');

        const store = new ParameterStore(await loadOverrides(path));

        expect(store.get()).toEqual({
            amplitude: 1,
            frequency: 2.5,
            phase: 1,
            noiseMean: 0,
            noiseVariance: 0.2,
            filterWindow: 10,
        });
    });

    it('should fail on malformed JSON', async () => {
        const path = join(directory, 'broken.json');
        await writeFile(path, '{"amplitude": ');

        await expect(loadOverrides(path)).rejects.toThrow(SyntaxError);
    });

    it('should fail on a missing file', async () => {
        await expect(loadOverrides(join(directory, 'missing.json'))).rejects.toThrow(/ENOENT/);
    });
});
