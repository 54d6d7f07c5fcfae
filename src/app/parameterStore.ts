import { isRight } from 'fp-ts/Either';
import { PathReporter } from 'io-ts/PathReporter';
import type { ParameterName, Parameters } from '@sinelab/signal-api';
import { parameterCodecs, ParametersCodec } from './codecs';
import { DEFAULT_PARAMETERS } from './config';
import { InvalidParameterError } from './errors';

function isParameterName(name: string): name is ParameterName {
    return Object.hasOwn(parameterCodecs, name);
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Lays `overrides` over the defaults. Unknown keys are dropped. When the
 * whole merge doesn't validate, each override is tried on its own and the
 * ones that fail fall back to the default.
 */
function mergeWithDefaults(overrides: unknown, defaults: Readonly<Parameters>): Parameters {
    if (overrides === undefined) {
        return { ...defaults };
    }
    if (!isRecord(overrides)) {
        console.warn(`Ignoring parameter overrides, expected an object but got ${JSON.stringify(overrides)}`);
        return { ...defaults };
    }

    const known: Partial<Record<ParameterName, unknown>> = {};
    for (const key in overrides) {
        if (!Object.hasOwn(overrides, key)) {
            continue;
        }
        if (isParameterName(key)) {
            known[key] = overrides[key];
        } else {
            console.warn(`Ignoring unknown parameter override: ${key}`);
        }
    }

    const fullValidation = ParametersCodec.decode({ ...defaults, ...known });
    if (isRight(fullValidation)) {
        return fullValidation.right;
    }

    const result: Parameters = { ...defaults };
    for (const key of Object.keys(known)) {
        if (!isParameterName(key)) {
            continue;
        }
        const validation = parameterCodecs[key].decode(known[key]);
        if (isRight(validation)) {
            result[key] = validation.right;
        } else {
            console.warn(`Ignoring parameter override ${key}: ${PathReporter.report(validation).join('; ')}`);
        }
    }
    return result;
}

/**
 * Current parameter values. Out-of-range input is rejected, never clamped:
 * a failed {@link ParameterStore.set} leaves every value as it was.
 * Overrides only seed the initial values; {@link ParameterStore.reset}
 * always returns to {@link DEFAULT_PARAMETERS}.
 */
export class ParameterStore {
    private current: Parameters;

    constructor(overrides?: unknown) {
        this.current = mergeWithDefaults(overrides, DEFAULT_PARAMETERS);
    }

    get(): Parameters {
        return { ...this.current };
    }

    set(name: string, value: unknown): Parameters {
        if (!isParameterName(name)) {
            throw new InvalidParameterError(name, value, `Unknown parameter: ${name}`);
        }
        const validation = parameterCodecs[name].decode(value);
        if (!isRight(validation)) {
            throw new InvalidParameterError(name, value, `Invalid value for ${name}: ${PathReporter.report(validation).join('; ')}`);
        }
        this.current = { ...this.current, [name]: validation.right };
        return this.get();
    }

    reset(): Parameters {
        this.current = { ...DEFAULT_PARAMETERS };
        return this.get();
    }
}
