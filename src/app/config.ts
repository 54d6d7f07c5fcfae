import type { Parameters } from '@sinelab/signal-api';

// --- Time base ---

export const TIME_START = 0;
export const TIME_STOP = 10;
export const SAMPLE_COUNT = 1000;

// --- Parameters ---

export const DEFAULT_PARAMETERS: Readonly<Parameters> = {
    amplitude: 1.0,
    frequency: 1.0,
    phase: 0.0,
    noiseMean: 0.0,
    noiseVariance: 0.2,
    filterWindow: 10,
};

/** Accepted closed intervals, matching the ranges offered by the sliders */
export const PARAMETER_RANGES = {
    amplitude: [0.1, 5.0],
    frequency: [0.1, 3.0],
    noiseMean: [-1.0, 1.0],
    noiseVariance: [0.0, 1.0],
} as const;
