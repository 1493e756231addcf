import { VibrationPattern, pattern, step, clampUnit } from './types';

export type PatternType = 'pulse' | 'wave' | 'burst' | 'fade';

export const PATTERN_TYPES: readonly PatternType[] = ['pulse', 'wave', 'burst', 'fade'];

export const MIXED_SUFFIX = '_mixed';

export function isPatternType(value: string): value is PatternType {
    return (PATTERN_TYPES as readonly string[]).includes(value);
}

export function basePatternType(name: string): string {
    return name.endsWith(MIXED_SUFFIX) ? name.slice(0, -MIXED_SUFFIX.length) : name;
}

/**
 * Builds a pattern from a named template. Used for direct hardware tests and
 * as the step template of the standard emotion profile. Unknown types become
 * one flat step.
 */
export function createCustomPattern(
    patternType: string,
    intensity: number,
    durationMs: number,
    repeatCount: number = 1
): VibrationPattern {
    const level = clampUnit(intensity);
    const d = Math.max(0, Math.floor(Number.isFinite(durationMs) ? durationMs : 0));
    const repeats = Math.max(0, Math.floor(Number.isFinite(repeatCount) ? repeatCount : 0));

    switch (basePatternType(patternType)) {
        case 'pulse':
            return pattern([step(level, d / 2), step(0, d / 2)], 50, repeats);
        case 'wave':
            return pattern([step(level * 0.3, d / 3), step(level * 0.7, d / 3), step(level, d / 3)], 50, repeats);
        case 'burst':
            // fixed-length bursts; three per requested repeat
            return pattern([step(level, 100), step(0, 50)], 30, repeats * 3);
        case 'fade':
            return pattern([step(level, d / 2), step(level * 0.5, d / 4), step(level * 0.2, d / 4)], 50, repeats);
        default:
            return pattern([step(level, d)], 0, repeats);
    }
}

// Sensor response levels

export enum VibrationLevel {
    NONE = 0,
    LOW = 1,
    MEDIUM = 2,
    HIGH = 3,
    EXTREME = 4
}

export const LEVEL_THRESHOLDS = {
    LOW: 50,
    MEDIUM: 200,
    HIGH: 500,
    EXTREME: 800
} as const;

export function classifyVibrationLevel(value: number): VibrationLevel {
    if (!Number.isFinite(value) || value < LEVEL_THRESHOLDS.LOW) return VibrationLevel.NONE;
    if (value < LEVEL_THRESHOLDS.MEDIUM) return VibrationLevel.LOW;
    if (value < LEVEL_THRESHOLDS.HIGH) return VibrationLevel.MEDIUM;
    if (value < LEVEL_THRESHOLDS.EXTREME) return VibrationLevel.HIGH;
    return VibrationLevel.EXTREME;
}

const LEVEL_PATTERNS: Record<VibrationLevel, VibrationPattern> = {
    [VibrationLevel.NONE]: pattern([], 0, 0),
    [VibrationLevel.LOW]: pattern([step(0.3, 100), step(0, 200)], 50, 2),
    [VibrationLevel.MEDIUM]: pattern([step(0.6, 150), step(0, 100), step(0.4, 100)], 50, 3),
    [VibrationLevel.HIGH]: pattern([step(0.9, 200), step(0, 50), step(0.7, 150)], 30, 4),
    [VibrationLevel.EXTREME]: pattern([step(1.0, 300), step(0, 50), step(1.0, 300)], 20, 5)
};

export function responsePatternForLevel(level: VibrationLevel): VibrationPattern {
    return LEVEL_PATTERNS[level] ?? LEVEL_PATTERNS[VibrationLevel.NONE];
}

/**
 * Emotion level (0-5) to response level: 0 → NONE, ≤1 LOW, ≤3 MEDIUM,
 * ≤4 HIGH, above that EXTREME.
 */
export function levelForEmotion(emotionLevel: number): VibrationLevel {
    if (!Number.isFinite(emotionLevel) || emotionLevel <= 0) return VibrationLevel.NONE;
    if (emotionLevel <= 1) return VibrationLevel.LOW;
    if (emotionLevel <= 3) return VibrationLevel.MEDIUM;
    if (emotionLevel <= 4) return VibrationLevel.HIGH;
    return VibrationLevel.EXTREME;
}

// Alerts

export type AlertType = 'earthquake' | 'machine_fault' | 'proximity_warning';

const ALERT_PATTERNS: Record<AlertType, VibrationPattern> = {
    earthquake: pattern([step(1.0, 500), step(0, 100), step(1.0, 500)], 10, 10),
    machine_fault: pattern([step(0.8, 100), step(0, 100)], 50, 20),
    proximity_warning: pattern([step(0.5, 200), step(0.7, 200), step(1.0, 200)], 100, 3)
};

export function isAlertType(value: string): value is AlertType {
    return Object.prototype.hasOwnProperty.call(ALERT_PATTERNS, value);
}

export function alertPattern(alertType: string): VibrationPattern {
    return isAlertType(alertType) ? ALERT_PATTERNS[alertType] : ALERT_PATTERNS.proximity_warning;
}
