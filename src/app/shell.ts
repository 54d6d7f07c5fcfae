import { readFile } from 'node:fs/promises';
import { isLeft } from 'fp-ts/Either';
import { decodeEventLine } from './eventLine';
import type { ReactiveController } from './reactiveController';

/** Reads the `--config` JSON file. Validation is left to the parameter store. */
export async function loadOverrides(path: string | undefined): Promise<unknown> {
    if (path === undefined) {
        return undefined;
    }
    const overrides: unknown = JSON.parse(await readFile(path, 'utf8'));
    return overrides;
}

export function parseSeed(value: string | undefined): number | undefined {
    if (value === undefined) {
        return undefined;
    }
    const seed = Number(value);
    if (value.trim() === '' || !Number.isInteger(seed)) {
        throw new Error(`--seed must be an integer, got ${value}`);
    }
    return seed;
}

/**
 * Feeds one stdin line to the controller. Blank lines are skipped, lines that
 * don't decode are reported and skipped.
 */
export function handleLine(controller: Pick<ReactiveController, 'dispatch'>, line: string): void {
    if (line.trim() === '') {
        return;
    }
    const decoded = decodeEventLine(line);
    if (isLeft(decoded)) {
        console.error(`Skipping event, ${decoded.left}: ${line}`);
        return;
    }
    // Rejections are already reported by the controller.
    controller.dispatch(decoded.right);
}
