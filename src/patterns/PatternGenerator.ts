import {
    EmotionName,
    EmotionVector,
    clampEmotionVector,
    emotionMultiplier,
    findDominantEmotion,
    findMixedEmotions
} from './emotion';
import { MIXED_SUFFIX, createCustomPattern } from './presets';
import { PATTERN_PROFILES, PatternProfile, ProfileName, isProfileName } from './profiles';
import {
    IntensityScale,
    NO_OP_PATTERN,
    VibrationPattern,
    WirePattern,
    pattern,
    serializePattern,
    step
} from './types';

/**
 * Agent-facing description of a generated reaction. Field names follow the
 * tool-call payloads the agent side exchanges.
 */
export interface VibrationSettings {
    vibration_enabled: boolean;
    pattern: string;
    intensity: number;
    frequency: number;
    duration: number; // seconds
    dominant_emotion: EmotionName | null;
    mixed_emotions: EmotionName[];
    description: string;
    emotion_level: number;
    vibration_pattern: WirePattern;
    /** Scale `vibration_pattern` intensities are encoded on. */
    intensity_scale: IntensityScale;
}

export interface Reaction {
    settings: VibrationSettings;
    pattern: VibrationPattern;
}

export interface PatternGeneratorOptions {
    profile?: ProfileName | PatternProfile;
    mixedThreshold?: number;
    mixedIntensityAdjustment?: number;
    mixedFrequencyAdjustment?: number;
    intensityScale?: IntensityScale;
}

export interface GeneratorConfigSource {
    patternProfile: ProfileName;
    mixedEmotionThreshold: number;
    mixedIntensityAdjustment: number;
    mixedFrequencyAdjustment: number;
    intensityScale: IntensityScale;
}

const SUSTAINED_ON_MS = 2000;
const SUSTAINED_OFF_MS = 200;
const SUSTAINED_MIN_REPEATS = 3;

/**
 * Turns an emotion vector into a haptic reaction. Pure: the same vector and
 * options always give the same pattern, and nothing here throws.
 */
export class PatternGenerator {
    private readonly profile: PatternProfile;
    private readonly mixedThreshold: number;
    private readonly mixedIntensityAdjustment: number;
    private readonly mixedFrequencyAdjustment: number;
    private readonly intensityScale: IntensityScale;

    constructor(options: PatternGeneratorOptions = {}) {
        const profile = options.profile ?? 'standard';
        this.profile = typeof profile === 'string'
            ? PATTERN_PROFILES[isProfileName(profile) ? profile : 'standard']
            : profile;
        this.mixedThreshold = options.mixedThreshold ?? 3;
        this.mixedIntensityAdjustment = options.mixedIntensityAdjustment ?? 1.1;
        this.mixedFrequencyAdjustment = options.mixedFrequencyAdjustment ?? 1.2;
        this.intensityScale = options.intensityScale ?? 100;
    }

    public static fromConfig(config: GeneratorConfigSource): PatternGenerator {
        return new PatternGenerator({
            profile: config.patternProfile,
            mixedThreshold: config.mixedEmotionThreshold,
            mixedIntensityAdjustment: config.mixedIntensityAdjustment,
            mixedFrequencyAdjustment: config.mixedFrequencyAdjustment,
            intensityScale: config.intensityScale
        });
    }

    public getProfileName(): ProfileName {
        return this.profile.name;
    }

    public generate(emotions: Partial<EmotionVector>): VibrationPattern {
        return this.react(emotions).pattern;
    }

    public describe(emotions: Partial<EmotionVector>): VibrationSettings {
        return this.react(emotions).settings;
    }

    public react(emotions: Partial<EmotionVector>): Reaction {
        const vector = clampEmotionVector(emotions);
        const dominant = findDominantEmotion(vector);

        if (dominant.value === 0) {
            return {
                pattern: NO_OP_PATTERN,
                settings: {
                    vibration_enabled: false,
                    pattern: 'none',
                    intensity: 0,
                    frequency: 0,
                    duration: 0,
                    dominant_emotion: null,
                    mixed_emotions: [],
                    description: 'No vibration',
                    emotion_level: 0,
                    vibration_pattern: serializePattern(NO_OP_PATTERN, this.intensityScale),
                    intensity_scale: this.intensityScale
                }
            };
        }

        const preset = this.profile.presets[dominant.name];
        const multiplier = emotionMultiplier(dominant.value);
        const mixed = findMixedEmotions(vector, dominant.name, this.mixedThreshold);

        const intensityAdjustment = mixed.length > 0 ? this.mixedIntensityAdjustment : 1.0;
        const frequencyAdjustment = mixed.length > 0 ? this.mixedFrequencyAdjustment : 1.0;
        const patternName = mixed.length > 0 ? `${preset.pattern}${MIXED_SUFFIX}` : preset.pattern;

        const intensity = Math.min(preset.intensityBase * multiplier * intensityAdjustment, 1.0);
        const frequency = preset.frequencyBase * multiplier * frequencyAdjustment;
        const durationSeconds = preset.durationBase * multiplier;

        let built: VibrationPattern;
        if (this.profile.stepStyle === 'sustained') {
            built = this.sustainedSteps(intensity, frequency);
        } else if (this.profile.stepStyle === 'scaled' && preset.script) {
            built = this.scaledSteps(preset.script, multiplier * intensityAdjustment, dominant.value, frequencyAdjustment);
        } else {
            built = createCustomPattern(preset.pattern, intensity, Math.round(durationSeconds * 1000), Math.max(1, Math.round(frequency)));
        }

        return {
            pattern: built,
            settings: {
                vibration_enabled: true,
                pattern: patternName,
                intensity,
                frequency,
                duration: durationSeconds,
                dominant_emotion: dominant.name,
                mixed_emotions: mixed,
                description: preset.description,
                emotion_level: dominant.value,
                vibration_pattern: serializePattern(built, this.intensityScale),
                intensity_scale: this.intensityScale
            }
        };
    }

    /**
     * Every step of the script scaled by `gain` (capped at 1). Repeats grow
     * by one script-length for every two levels above 1.
     */
    private scaledSteps(script: VibrationPattern, gain: number, level: number, frequencyAdjustment: number): VibrationPattern {
        const repeatScale = Math.max(1, 1 + Math.floor((level - 1) / 2));
        return pattern(
            script.steps.map(s => step(Math.min(s.intensity * gain, 1.0), s.duration)),
            script.interval,
            Math.max(1, Math.round(script.repeatCount * repeatScale * frequencyAdjustment))
        );
    }

    private sustainedSteps(intensity: number, frequency: number): VibrationPattern {
        return pattern(
            [
                step(intensity, SUSTAINED_ON_MS),
                step(0, SUSTAINED_OFF_MS),
                step(intensity, SUSTAINED_ON_MS),
                step(0, SUSTAINED_OFF_MS),
                step(intensity, SUSTAINED_ON_MS)
            ],
            0,
            Math.max(SUSTAINED_MIN_REPEATS, Math.round(frequency))
        );
    }
}
