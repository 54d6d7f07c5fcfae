/** Uniform source in [0, 1) */
export type RandomSource = () => number;

export function seededRandom(seed: number): RandomSource {
    let state = ((Math.trunc(seed) % 4294967296) + 4294967296) % 4294967296;
    return () => {
        state = (state * 1664525 + 1013904223) % 4294967296;
        return state / 4294967296;
    };
}
