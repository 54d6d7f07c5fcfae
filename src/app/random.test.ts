import { describe, it, expect } from 'vitest';
import { seededRandom } from './random';

describe('seededRandom', () => {
    it('should repeat the same stream for the same seed', () => {
        const a = seededRandom(42);
        const b = seededRandom(42);

        for (let i = 0; i < 100; i++) {
            expect(a()).toBe(b());
        }
    });

    it('should follow the linear congruential recurrence', () => {
        const random = seededRandom(0);

        expect(random()).toBe(1013904223 / 4294967296);
    });

    it('should diverge for different seeds', () => {
        const a = seededRandom(1);
        const b = seededRandom(2);

        expect(a()).not.toBe(b());
    });

    it('should stay within [0, 1)', () => {
        const random = seededRandom(-7);

        for (let i = 0; i < 1000; i++) {
            const value = random();
            expect(value).toBeGreaterThanOrEqual(0);
            expect(value).toBeLessThan(1);
        }
    });
});
