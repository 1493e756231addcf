import { describe, expect, it } from 'vitest';
import { PatternGenerator } from '../src/patterns/PatternGenerator';
import { emotionMultiplier } from '../src/patterns/emotion';

describe('PatternGenerator', () => {
    const generator = new PatternGenerator();

    it('returns a no-op pattern when every emotion is zero', () => {
        const { settings, pattern } = generator.react({ joy: 0, fun: 0, anger: 0, sad: 0 });

        expect(pattern.steps).toEqual([]);
        expect(pattern.repeatCount).toBe(0);
        expect(settings.vibration_enabled).toBe(false);
        expect(settings.pattern).toBe('none');
        expect(settings.dominant_emotion).toBeNull();
        expect(settings.vibration_pattern).toEqual({ steps: [], interval: 0, repeat_count: 0 });
    });

    it('maps full anger to repeated strong bursts', () => {
        const { settings, pattern } = generator.react({ anger: 5 });

        expect(settings.pattern).toBe('burst');
        expect(settings.dominant_emotion).toBe('anger');
        expect(settings.intensity).toBeCloseTo(0.9);
        expect(settings.frequency).toBe(5);
        expect(settings.duration).toBeCloseTo(0.2);
        expect(settings.mixed_emotions).toEqual([]);

        expect(pattern.steps).toHaveLength(2);
        expect(pattern.steps[0].intensity).toBeCloseTo(0.9);
        expect(pattern.steps[0].duration).toBe(100);
        expect(pattern.steps[1]).toEqual({ intensity: 0, duration: 50 });
        expect(pattern.interval).toBe(30);
        expect(pattern.repeatCount).toBe(15);
        expect(settings.vibration_pattern.steps).toEqual([
            { intensity: 90, duration: 100 },
            { intensity: 0, duration: 50 }
        ]);
    });

    it('marks strong secondary emotions as mixed and boosts intensity and frequency', () => {
        const { settings, pattern } = generator.react({ joy: 5, fun: 3 });

        expect(settings.pattern).toBe('pulse_mixed');
        expect(settings.mixed_emotions).toEqual(['fun']);
        expect(settings.intensity).toBeCloseTo(0.66);
        expect(settings.frequency).toBeCloseTo(2.4);
        expect(pattern.steps.map(s => s.duration)).toEqual([250, 250]);
        expect(pattern.steps[0].intensity).toBeCloseTo(0.66);
        expect(pattern.steps[1].intensity).toBe(0);
        expect(pattern.interval).toBe(50);
        expect(pattern.repeatCount).toBe(2);
    });

    it('ignores secondary emotions below the mixed threshold', () => {
        const settings = generator.describe({ joy: 5, fun: 2 });

        expect(settings.pattern).toBe('pulse');
        expect(settings.intensity).toBeCloseTo(0.6);
        expect(settings.mixed_emotions).toEqual([]);
    });

    it('breaks ties by key order joy, fun, anger, sad', () => {
        expect(generator.describe({ joy: 3, fun: 3 }).dominant_emotion).toBe('joy');
        expect(generator.describe({ anger: 4, sad: 4 }).dominant_emotion).toBe('anger');
        expect(generator.describe({ fun: 2, sad: 2 }).dominant_emotion).toBe('fun');
    });

    it('scales a weak emotion down to the 0.2 floor', () => {
        const { settings, pattern } = generator.react({ sad: 1 });

        expect(settings.pattern).toBe('fade');
        expect(settings.intensity).toBeCloseTo(0.08);
        expect(pattern.steps.map(s => s.duration)).toEqual([100, 50, 50]);
        expect(pattern.steps[1].intensity).toBeCloseTo(0.04);
        expect(pattern.steps[2].intensity).toBeCloseTo(0.016);
        expect(pattern.repeatCount).toBe(1);
    });

    it('clamps out-of-range and non-finite input', () => {
        expect(generator.describe({ anger: 12 })).toEqual(generator.describe({ anger: 5 }));
        expect(generator.describe({ joy: Number.NaN, sad: -3 }).vibration_enabled).toBe(false);
    });

    it('never produces an intensity above 1', () => {
        const boosted = new PatternGenerator({ mixedIntensityAdjustment: 3 });
        const settings = boosted.describe({ anger: 5, joy: 4 });

        expect(settings.intensity).toBe(1);
        expect(settings.vibration_pattern.steps[0].intensity).toBe(100);
    });

    it('is deterministic', () => {
        const vector = { joy: 2, fun: 4, anger: 1, sad: 3 };
        expect(generator.generate(vector)).toEqual(generator.generate(vector));
    });

    it('serializes to the configured intensity scale', () => {
        const wide = new PatternGenerator({ intensityScale: 255 });
        expect(wide.describe({ joy: 5 }).vibration_pattern.steps[0].intensity).toBe(153);
    });

    it('honours a custom mixed threshold', () => {
        const strict = new PatternGenerator({ mixedThreshold: 4.5 });
        expect(strict.describe({ joy: 5, fun: 4 }).pattern).toBe('pulse');
    });

    describe('sustained profile', () => {
        const sustained = new PatternGenerator({ profile: 'sustained' });

        it('plays long fixed pulses at the computed intensity', () => {
            const { settings, pattern } = sustained.react({ anger: 5 });

            expect(sustained.getProfileName()).toBe('sustained');
            expect(settings.intensity).toBe(1);
            expect(pattern.steps.map(s => s.duration)).toEqual([2000, 200, 2000, 200, 2000]);
            expect(pattern.steps.map(s => s.intensity)).toEqual([1, 0, 1, 0, 1]);
            expect(pattern.interval).toBe(0);
            expect(pattern.repeatCount).toBe(8);
        });

        it('clamps a boosted full-scale intensity to 1', () => {
            const settings = sustained.describe({ anger: 5, joy: 4 });
            expect(settings.pattern).toBe('burst_mixed');
            expect(settings.intensity).toBe(1);
        });

        it('repeats at least three times', () => {
            expect(sustained.generate({ joy: 2 }).repeatCount).toBe(3);
        });
    });

    describe('scripted profile', () => {
        const scripted = new PatternGenerator({ profile: 'scripted' });

        it('plays the emotion script at full level unchanged', () => {
            const { settings, pattern } = scripted.react({ anger: 5 });

            expect(settings.pattern).toBe('burst');
            expect(settings.intensity).toBe(1);
            expect(pattern.steps.map(s => s.duration)).toEqual([200, 30, 150, 30, 200]);
            expect(settings.vibration_pattern.steps.map(s => s.intensity)).toEqual([90, 0, 100, 0, 80]);
            expect(pattern.interval).toBe(20);
            expect(pattern.repeatCount).toBe(9);
        });

        it('scales every step by the level', () => {
            const pattern = scripted.generate({ joy: 3 });

            expect(pattern.steps.map(s => s.duration)).toEqual([100, 50, 150, 50, 100]);
            expect(pattern.steps[0].intensity).toBeCloseTo(0.36);
            expect(pattern.steps[2].intensity).toBeCloseTo(0.48);
            expect(pattern.steps[1].intensity).toBe(0);
            expect(pattern.repeatCount).toBe(4);
        });

        it('keeps the script repeat count at level 1', () => {
            expect(scripted.generate({ sad: 1 }).repeatCount).toBe(2);
        });

        it('applies the mixed adjustments to steps and repeats', () => {
            const { settings, pattern } = scripted.react({ sad: 5, fun: 3 });

            expect(settings.pattern).toBe('fade_mixed');
            expect(settings.intensity).toBeCloseTo(0.88);
            expect(pattern.steps[0].intensity).toBeCloseTo(0.88);
            expect(pattern.steps[1].intensity).toBeCloseTo(0.66);
            expect(pattern.steps[2].intensity).toBeCloseTo(0.44);
            expect(pattern.interval).toBe(100);
            expect(pattern.repeatCount).toBe(7);
        });
    });

    it('builds from config values', () => {
        const fromConfig = PatternGenerator.fromConfig({
            patternProfile: 'sustained',
            mixedEmotionThreshold: 3,
            mixedIntensityAdjustment: 1.1,
            mixedFrequencyAdjustment: 1.2,
            intensityScale: 255
        });

        expect(fromConfig.getProfileName()).toBe('sustained');
        expect(fromConfig.describe({ sad: 5 }).vibration_pattern.steps[0].intensity).toBe(255);
    });
});

describe('emotionMultiplier', () => {
    it('maps 1-5 onto 0.2-1.0', () => {
        expect(emotionMultiplier(1)).toBe(0.2);
        expect(emotionMultiplier(3)).toBeCloseTo(0.6);
        expect(emotionMultiplier(5)).toBe(1);
    });

    it('floors nonzero levels at 0.2 and returns 0 for zero', () => {
        expect(emotionMultiplier(0.5)).toBe(0.2);
        expect(emotionMultiplier(0)).toBe(0);
        expect(emotionMultiplier(Number.NaN)).toBe(0);
    });
});
