import type { Sequence } from './signal';

/**
 * Fixed-length, read-only run of samples. Derived sequences are always new
 * instances; nothing writes into an existing one.
 */
export class SampleSequence implements Sequence {
    private readonly _data: Float64Array;
    private readonly _min: number;
    private readonly _max: number;

    constructor(values: ArrayLike<number>, public readonly unit?: string) {
        this._data = Float64Array.from(values);
        let min = Infinity;
        let max = -Infinity;
        for (const value of this._data) {
            if (value < min) {
                min = value;
            }
            if (value > max) {
                max = value;
            }
        }
        this._min = min;
        this._max = max;
    }

    static generate(length: number, generator: (index: number) => number, unit?: string): SampleSequence {
        return new SampleSequence(Array.from({ length }, (_, index) => generator(index)), unit);
    }

    get min(): number {
        return this._min == Infinity ? 0 : this._min;
    }

    get max(): number {
        return this._max == -Infinity ? 0 : this._max;
    }

    get length(): number {
        return this._data.length;
    }

    valueAt(index: number): number {
        return this._data[index];
    }

    map(fn: (value: number, index: number) => number): SampleSequence {
        return SampleSequence.generate(this.length, index => fn(this._data[index], index), this.unit);
    }

    zipWith(other: Sequence, fn: (a: number, b: number) => number): SampleSequence {
        if (other.length !== this.length) {
            throw new Error(`Cannot combine sequences of length ${this.length} and ${other.length}`);
        }
        return SampleSequence.generate(this.length, index => fn(this._data[index], other.valueAt(index)), this.unit);
    }

    toArray(): number[] {
        return Array.from(this._data);
    }
}
