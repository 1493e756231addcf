import { describe, expect, it } from 'vitest';
import {
    VibrationLevel,
    alertPattern,
    classifyVibrationLevel,
    createCustomPattern,
    levelForEmotion,
    responsePatternForLevel
} from '../src/patterns/presets';

describe('createCustomPattern', () => {
    it('splits a pulse into on and off halves', () => {
        const p = createCustomPattern('pulse', 1.0, 500, 2);
        expect(p.steps).toEqual([
            { intensity: 1, duration: 250 },
            { intensity: 0, duration: 250 }
        ]);
        expect(p.interval).toBe(50);
        expect(p.repeatCount).toBe(2);
    });

    it('ramps a wave up in thirds', () => {
        const p = createCustomPattern('wave', 0.5, 300, 1);
        expect(p.steps.map(s => s.duration)).toEqual([100, 100, 100]);
        expect(p.steps[0].intensity).toBeCloseTo(0.15);
        expect(p.steps[1].intensity).toBeCloseTo(0.35);
        expect(p.steps[2].intensity).toBe(0.5);
    });

    it('uses fixed burst timing and triples the repeats', () => {
        const p = createCustomPattern('burst', 0.8, 999, 2);
        expect(p.steps).toEqual([
            { intensity: 0.8, duration: 100 },
            { intensity: 0, duration: 50 }
        ]);
        expect(p.interval).toBe(30);
        expect(p.repeatCount).toBe(6);
    });

    it('fades from full to a fifth', () => {
        const p = createCustomPattern('fade', 1, 400, 1);
        expect(p.steps).toEqual([
            { intensity: 1, duration: 200 },
            { intensity: 0.5, duration: 100 },
            { intensity: 0.2, duration: 100 }
        ]);
    });

    it('falls back to one flat step for unknown types', () => {
        const p = createCustomPattern('zigzag', 0.7, 300, 4);
        expect(p.steps).toEqual([{ intensity: 0.7, duration: 300 }]);
        expect(p.interval).toBe(0);
        expect(p.repeatCount).toBe(4);
    });

    it('ignores the _mixed suffix', () => {
        expect(createCustomPattern('wave_mixed', 0.5, 300, 1)).toEqual(createCustomPattern('wave', 0.5, 300, 1));
    });

    it('clamps intensity and floors durations', () => {
        const p = createCustomPattern('pulse', 1.5, 501);
        expect(p.steps).toEqual([
            { intensity: 1, duration: 250 },
            { intensity: 0, duration: 250 }
        ]);
        expect(p.repeatCount).toBe(1);
    });
});

describe('vibration levels', () => {
    it('classifies sensor values by threshold', () => {
        expect(classifyVibrationLevel(49)).toBe(VibrationLevel.NONE);
        expect(classifyVibrationLevel(50)).toBe(VibrationLevel.LOW);
        expect(classifyVibrationLevel(199)).toBe(VibrationLevel.LOW);
        expect(classifyVibrationLevel(200)).toBe(VibrationLevel.MEDIUM);
        expect(classifyVibrationLevel(500)).toBe(VibrationLevel.HIGH);
        expect(classifyVibrationLevel(800)).toBe(VibrationLevel.EXTREME);
        expect(classifyVibrationLevel(Number.NaN)).toBe(VibrationLevel.NONE);
    });

    it('maps emotion levels to response levels', () => {
        expect(levelForEmotion(0)).toBe(VibrationLevel.NONE);
        expect(levelForEmotion(1)).toBe(VibrationLevel.LOW);
        expect(levelForEmotion(2.5)).toBe(VibrationLevel.MEDIUM);
        expect(levelForEmotion(4)).toBe(VibrationLevel.HIGH);
        expect(levelForEmotion(4.5)).toBe(VibrationLevel.EXTREME);
    });

    it('has a response pattern per level', () => {
        const high = responsePatternForLevel(VibrationLevel.HIGH);
        expect(high.steps).toEqual([
            { intensity: 0.9, duration: 200 },
            { intensity: 0, duration: 50 },
            { intensity: 0.7, duration: 150 }
        ]);
        expect(high.interval).toBe(30);
        expect(high.repeatCount).toBe(4);
        expect(responsePatternForLevel(VibrationLevel.NONE).repeatCount).toBe(0);
    });
});

describe('alertPattern', () => {
    it('returns the pattern for a known alert', () => {
        const p = alertPattern('earthquake');
        expect(p.repeatCount).toBe(10);
        expect(p.interval).toBe(10);
        expect(p.steps[0]).toEqual({ intensity: 1, duration: 500 });
    });

    it('falls back to the proximity warning', () => {
        expect(alertPattern('meteor')).toEqual(alertPattern('proximity_warning'));
        expect(alertPattern('meteor').interval).toBe(100);
    });
});
