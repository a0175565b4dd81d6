import { describe, it, expect } from 'vitest';
import {
    FixedDelay,
    UniformDelay,
    checkSample,
    delayFromRange,
    immediateSleep,
    validateRange,
} from '../../src/dispatch/delay';
import { ConfigurationError } from '../../src/errors';

describe('delay distributions', () => {
    it('maps the random source onto [min, max]', () => {
        expect(new UniformDelay(1, 3, () => 0).sample()).toBe(1);
        expect(new UniformDelay(1, 3, () => 0.5).sample()).toBe(2);
        expect(new UniformDelay(1, 3, () => 0.25).sample()).toBe(1.5);
    });

    it('defaults to 1-3 simulated seconds', () => {
        const delay = new UniformDelay();
        expect([delay.min, delay.max]).toEqual([1, 3]);
        for (let i = 0; i < 20; i++) {
            const s = delay.sample();
            expect(s).toBeGreaterThanOrEqual(1);
            expect(s).toBeLessThanOrEqual(3);
        }
    });

    it('returns the same value every time for a fixed delay', () => {
        const delay = new FixedDelay(1);
        expect([delay.sample(), delay.sample()]).toEqual([1, 1]);
    });

    it.each([
        [3, 1],
        [-1, 2],
        [0, Number.NaN],
        [0, Number.POSITIVE_INFINITY],
    ])('rejects range (%s, %s)', (min, max) => {
        expect(() => validateRange(min, max)).toThrow(ConfigurationError);
    });

    it('accepts a zero-width range', () => {
        expect(() => validateRange(0, 0)).not.toThrow();
    });

    it('treats a negative or non-finite sample as a configuration fault', () => {
        expect(() => checkSample(-0.1, 'custom')).toThrow('custom produced an invalid delay sample: -0.1');
        expect(() => checkSample(Number.NaN, 'custom')).toThrow(ConfigurationError);
        expect(checkSample(0, 'custom')).toBe(0);
    });

    it('picks a fixed delay for equal bounds', () => {
        expect(delayFromRange([1, 1])).toBeInstanceOf(FixedDelay);
        expect(delayFromRange([1, 3])).toBeInstanceOf(UniformDelay);
    });

    it('resolves the immediate sleeper without a timer', async () => {
        await expect(immediateSleep(10_000)).resolves.toBeUndefined();
    });
});
