import * as t from 'io-ts';
import type { ControllerEvent, ParameterName, Parameters, SeriesName } from '@sinelab/signal-api';
import { PARAMETER_RANGES } from './config';

function isFiniteNumber(u: unknown): u is number {
    return typeof u === 'number' && Number.isFinite(u);
}

function rangedNumber(name: string, [min, max]: readonly [number, number]): t.Type<number, number, unknown> {
    const is = (u: unknown): u is number => isFiniteNumber(u) && u >= min && u <= max;
    return new t.Type<number, number, unknown>(
        name,
        is,
        (u, c) => is(u) ? t.success(u) : t.failure(u, c, `${name} must be a number in [${min}, ${max}], got ${JSON.stringify(u)}`),
        t.identity,
    );
}

export const FiniteNumber = new t.Type<number, number, unknown>(
    'FiniteNumber',
    isFiniteNumber,
    (u, c) => isFiniteNumber(u) ? t.success(u) : t.failure(u, c, `expected a finite number, got ${JSON.stringify(u)}`),
    t.identity,
);

const isPositiveInteger = (u: unknown): u is number => typeof u === 'number' && Number.isInteger(u) && u >= 1;

export const PositiveInteger = new t.Type<number, number, unknown>(
    'PositiveInteger',
    isPositiveInteger,
    (u, c) => isPositiveInteger(u) ? t.success(u) : t.failure(u, c, `expected a positive integer, got ${JSON.stringify(u)}`),
    t.identity,
);

export const parameterCodecs = {
    amplitude: rangedNumber('amplitude', PARAMETER_RANGES.amplitude),
    frequency: rangedNumber('frequency', PARAMETER_RANGES.frequency),
    phase: FiniteNumber,
    noiseMean: rangedNumber('noiseMean', PARAMETER_RANGES.noiseMean),
    noiseVariance: rangedNumber('noiseVariance', PARAMETER_RANGES.noiseVariance),
    filterWindow: PositiveInteger,
};

export const ParametersCodec: t.Type<Parameters, Parameters, unknown> = t.exact(t.type(parameterCodecs), 'Parameters');

export const ParameterNameCodec: t.Type<ParameterName, ParameterName, unknown> = t.keyof({
    amplitude: null,
    frequency: null,
    phase: null,
    noiseMean: null,
    noiseVariance: null,
    filterWindow: null,
}, 'ParameterName');

export const SeriesNameCodec: t.Type<SeriesName, SeriesName, unknown> = t.keyof({
    pure: null,
    noisy: null,
    filtered: null,
}, 'SeriesName');

/**
 * Inbound event shapes. The value of a parameter change is only checked for
 * being a number here; range checks belong to the parameter store.
 */
export const ControllerEventCodec: t.Type<ControllerEvent, ControllerEvent, unknown> = t.union([
    t.type({ type: t.literal('parameter-change'), name: ParameterNameCodec, value: t.number }),
    t.type({ type: t.literal('reset') }),
    t.type({ type: t.literal('visibility-toggle'), seriesName: SeriesNameCodec }),
], 'ControllerEvent');
