/**
 * Vibration pattern value types and their wire encoding.
 */

export interface VibrationStep {
    readonly intensity: number; // 0.0-1.0
    readonly duration: number;  // ms
}

export interface VibrationPattern {
    readonly steps: readonly VibrationStep[];
    readonly interval: number;    // ms between repeats
    readonly repeatCount: number;
}

/** Intensity encodings seen across firmware builds. */
export type IntensityScale = 100 | 255;

export interface WireStep {
    intensity: number;
    duration: number;
}

export interface WirePattern {
    steps: WireStep[];
    interval: number;
    repeat_count: number;
}

export const NO_OP_PATTERN: VibrationPattern = Object.freeze({
    steps: Object.freeze([]),
    interval: 0,
    repeatCount: 0
});

export function clampUnit(value: number): number {
    if (!Number.isFinite(value)) return 0;
    return Math.max(0, Math.min(1, value));
}

export function step(intensity: number, duration: number): VibrationStep {
    return Object.freeze({
        intensity: clampUnit(intensity),
        duration: Math.max(0, Math.floor(Number.isFinite(duration) ? duration : 0))
    });
}

export function pattern(steps: VibrationStep[], interval: number, repeatCount: number): VibrationPattern {
    return Object.freeze({
        steps: Object.freeze([...steps]),
        interval: Math.max(0, Math.floor(interval)),
        repeatCount: Math.max(0, Math.floor(repeatCount))
    });
}

/** A pattern with nothing to play means "stop". */
export function isNoOp(p: VibrationPattern): boolean {
    return p.repeatCount === 0 || p.steps.length === 0;
}

export function serializePattern(p: VibrationPattern, scale: IntensityScale = 100): WirePattern {
    return {
        steps: p.steps.map(s => ({
            intensity: Math.min(scale, Math.max(0, Math.round(s.intensity * scale))),
            duration: s.duration
        })),
        interval: p.interval,
        repeat_count: p.repeatCount
    };
}

export function deserializePattern(wire: WirePattern, scale: IntensityScale = 100): VibrationPattern {
    return pattern(
        wire.steps.map(s => step(s.intensity / scale, s.duration)),
        wire.interval,
        wire.repeat_count
    );
}

/** Total play time in ms, counting the gap between repeats but not after the last one. */
export function patternDurationMs(p: VibrationPattern): number {
    if (isNoOp(p)) return 0;
    const once = p.steps.reduce((sum, s) => sum + s.duration, 0);
    return once * p.repeatCount + p.interval * (p.repeatCount - 1);
}
