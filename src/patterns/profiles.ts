import type { EmotionName } from './emotion';
import type { PatternType } from './presets';
import { VibrationPattern, pattern, step } from './types';

export interface EmotionPreset {
    pattern: PatternType;
    intensityBase: number;  // 0.0-1.0
    frequencyBase: number;  // repeat count proxy
    durationBase: number;   // seconds
    description: string;
    /** Fixed step table, played by the `scaled` step style. */
    script?: VibrationPattern;
}

/**
 * `template` expands the preset through its pattern-type template;
 * `sustained` plays long fixed 2 s pulses at the computed intensity;
 * `scaled` plays the preset's script with every step scaled.
 */
export type StepStyle = 'template' | 'sustained' | 'scaled';

export interface PatternProfile {
    name: ProfileName;
    stepStyle: StepStyle;
    presets: Record<EmotionName, EmotionPreset>;
}

export type ProfileName = 'standard' | 'sustained' | 'scripted';

export const PROFILE_NAMES = ['standard', 'sustained', 'scripted'] as const satisfies readonly ProfileName[];

export const PATTERN_PROFILES: Record<ProfileName, PatternProfile> = {
    standard: {
        name: 'standard',
        stepStyle: 'template',
        presets: {
            joy: { pattern: 'pulse', intensityBase: 0.6, frequencyBase: 2.0, durationBase: 0.5, description: 'Light, rhythmic pulses' },
            fun: { pattern: 'wave', intensityBase: 0.7, frequencyBase: 3.0, durationBase: 0.3, description: 'Playful rising waves' },
            anger: { pattern: 'burst', intensityBase: 0.9, frequencyBase: 5.0, durationBase: 0.2, description: 'Strong, intermittent bursts' },
            sad: { pattern: 'fade', intensityBase: 0.4, frequencyBase: 1.0, durationBase: 1.0, description: 'Slow, weak fading vibration' }
        }
    },
    // Tuned for motors that need long drive times to be felt through clothing.
    sustained: {
        name: 'sustained',
        stepStyle: 'sustained',
        presets: {
            joy: { pattern: 'pulse', intensityBase: 1.0, frequencyBase: 5.0, durationBase: 10.0, description: 'Light, rhythmic pulses' },
            fun: { pattern: 'wave', intensityBase: 1.0, frequencyBase: 6.0, durationBase: 8.0, description: 'Playful rising waves' },
            anger: { pattern: 'burst', intensityBase: 1.0, frequencyBase: 8.0, durationBase: 6.0, description: 'Strong, intermittent bursts' },
            sad: { pattern: 'fade', intensityBase: 1.0, frequencyBase: 4.0, durationBase: 12.0, description: 'Slow, weak fading vibration' }
        }
    },
    // Hand-written step tables; intensityBase is each script's peak step.
    scripted: {
        name: 'scripted',
        stepStyle: 'scaled',
        presets: {
            joy: {
                pattern: 'pulse', intensityBase: 0.8, frequencyBase: 2.0, durationBase: 0.45, description: 'Light, rhythmic pattern',
                script: pattern([step(0.6, 100), step(0, 50), step(0.8, 150), step(0, 50), step(0.6, 100)], 50, 2)
            },
            fun: {
                pattern: 'wave', intensityBase: 0.8, frequencyBase: 1.0, durationBase: 1.2, description: 'Smooth, moderate pattern',
                script: pattern([step(0.6, 300), step(0.8, 400), step(0.7, 300), step(0.5, 200)], 50, 1)
            },
            anger: {
                pattern: 'burst', intensityBase: 1.0, frequencyBase: 3.0, durationBase: 0.61, description: 'Intense, rapid pattern',
                script: pattern([step(0.9, 200), step(0, 30), step(1.0, 150), step(0, 30), step(0.8, 200)], 20, 3)
            },
            sad: {
                pattern: 'fade', intensityBase: 0.8, frequencyBase: 2.0, durationBase: 1.0, description: 'Slow, gentle pattern',
                script: pattern([step(0.8, 500), step(0.6, 300), step(0.4, 200)], 100, 2)
            }
        }
    }
};

export function isProfileName(value: string): value is ProfileName {
    return Object.prototype.hasOwnProperty.call(PATTERN_PROFILES, value);
}
