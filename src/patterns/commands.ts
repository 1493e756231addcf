import type { VibrationSettings } from './PatternGenerator';
import { MIXED_SUFFIX, basePatternType, createCustomPattern, isPatternType } from './presets';
import { IntensityScale, NO_OP_PATTERN, VibrationPattern } from './types';

/**
 * Compact command strings of the form `TYPE:intensity,frequency,durationMs`,
 * e.g. `PULSE:66,2.4,500` or `MIXED_WAVE:77,3.6,300`. Intensity is encoded in
 * the device's scale (0-100 or 0-255).
 */

export const STOP_COMMAND = 'STOP';

export type CommandSettings = Pick<VibrationSettings, 'vibration_enabled' | 'pattern' | 'intensity' | 'frequency' | 'duration'>;

export function formatVibrationCommand(settings: CommandSettings, scale: IntensityScale = 100): string {
    if (!settings.vibration_enabled) return STOP_COMMAND;

    const base = basePatternType(settings.pattern);
    const mixed = settings.pattern.endsWith(MIXED_SUFFIX);
    const type = isPatternType(base) ? `${mixed ? 'MIXED_' : ''}${base.toUpperCase()}` : 'DEFAULT';

    const intensity = Math.round(Math.max(0, Math.min(1, settings.intensity)) * scale);
    const frequency = Number(settings.frequency.toFixed(2));
    const durationMs = Math.round(settings.duration * 1000);

    return `${type}:${intensity},${frequency},${durationMs}`;
}

/**
 * Parses a command string back into a pattern. Returns null when the string
 * is malformed; `STOP` yields the no-op pattern.
 */
export function parseVibrationCommand(command: string, scale: IntensityScale = 100): VibrationPattern | null {
    const trimmed = command.trim();
    if (trimmed.toUpperCase() === STOP_COMMAND) return NO_OP_PATTERN;

    const parts = trimmed.split(':');
    if (parts.length !== 2) return null;

    const params = parts[1].split(',').map(p => p.trim());
    if (params.length !== 3 || params.some(p => p === '')) return null;

    const rawIntensity = Number(params[0]);
    const frequency = Number(params[1]);
    const durationMs = Number(params[2]);
    if (![rawIntensity, frequency, durationMs].every(Number.isFinite)) return null;

    const type = parts[0].toLowerCase().replace(/^mixed_/, '');
    const repeats = Math.max(1, Math.round(frequency));

    return createCustomPattern(type, rawIntensity / scale, durationMs, isPatternType(type) ? repeats : 1);
}
