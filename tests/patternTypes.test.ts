import { describe, expect, it } from 'vitest';
import {
    NO_OP_PATTERN,
    deserializePattern,
    isNoOp,
    pattern,
    patternDurationMs,
    serializePattern,
    step
} from '../src/patterns/types';

describe('pattern values', () => {
    it('clamps step intensity and floors duration', () => {
        expect(step(-1, 12.7)).toEqual({ intensity: 0, duration: 12 });
        expect(step(2, Number.NaN)).toEqual({ intensity: 1, duration: 0 });
    });

    it('normalizes interval and repeat count', () => {
        const p = pattern([step(0.5, 100)], -5, 2.9);
        expect(p.interval).toBe(0);
        expect(p.repeatCount).toBe(2);
    });

    it('is immutable', () => {
        const p = pattern([step(0.5, 100)], 10, 1);
        expect(Object.isFrozen(p)).toBe(true);
        expect(Object.isFrozen(p.steps)).toBe(true);
        expect(Object.isFrozen(p.steps[0])).toBe(true);
    });

    it('treats empty steps or zero repeats as a no-op', () => {
        expect(isNoOp(NO_OP_PATTERN)).toBe(true);
        expect(isNoOp(pattern([step(1, 100)], 0, 0))).toBe(true);
        expect(isNoOp(pattern([], 0, 3))).toBe(true);
        expect(isNoOp(pattern([step(1, 100)], 0, 1))).toBe(false);
    });

    it('computes total play time without a trailing interval', () => {
        const p = pattern([step(1, 250), step(0, 250)], 50, 2);
        expect(patternDurationMs(p)).toBe(1050);
        expect(patternDurationMs(NO_OP_PATTERN)).toBe(0);
    });
});

describe('wire encoding', () => {
    const p = pattern([step(0.5, 100), step(1, 40)], 20, 3);

    it('uses snake_case and a 0-100 scale by default', () => {
        expect(serializePattern(p)).toEqual({
            steps: [
                { intensity: 50, duration: 100 },
                { intensity: 100, duration: 40 }
            ],
            interval: 20,
            repeat_count: 3
        });
    });

    it('rounds onto the 0-255 scale', () => {
        expect(serializePattern(p, 255).steps.map(s => s.intensity)).toEqual([128, 255]);
    });

    it('decodes wire intensities back to 0-1', () => {
        const decoded = deserializePattern({ steps: [{ intensity: 51, duration: 100 }], interval: 10, repeat_count: 2 }, 255);
        expect(decoded.steps[0].intensity).toBeCloseTo(0.2);
        expect(decoded.steps[0].duration).toBe(100);
        expect(decoded.interval).toBe(10);
        expect(decoded.repeatCount).toBe(2);
    });
});
