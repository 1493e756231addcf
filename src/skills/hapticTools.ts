import { z, ZodTypeAny } from 'zod';
import { logger } from '../utils/logger';
import { ConfigManager } from '../config/ConfigManager';
import { HapticContext, Skill } from '../core/SkillsManager';
import { HapticDeviceController } from '../devices/HapticDeviceController';
import type { DeviceStatus } from '../devices/types';
import { TouchEmotionModel, TouchResult } from '../emotion/TouchEmotionModel';
import { selectEmoji } from '../emotion/emoji';
import { formatVibrationCommand, STOP_COMMAND } from '../patterns/commands';
import { PatternGenerator, VibrationSettings } from '../patterns/PatternGenerator';
import { basePatternType, createCustomPattern } from '../patterns/presets';
import { VibrationPattern, WirePattern, deserializePattern, serializePattern } from '../patterns/types';

/**
 * Haptic skills for the agent. Arguments are validated with zod; numbers out
 * of range are clamped and missing ones take defaults, so a sloppy tool call
 * still produces a usable result. Handlers never throw.
 */

const MAX_DURATION_MS = 10000;
const MAX_REPEAT_COUNT = 20;
// Generated settings run longer than a raw pattern (sustained sad is 12 s).
const MAX_SETTINGS_DURATION_S = 60;
const MAX_STEP_DURATION_MS = 60000;

function clamped(min: number, max: number, fallback: number) {
    return z.coerce.number().finite().catch(fallback).transform(v => Math.max(min, Math.min(max, v)));
}

function parseArgs<S extends ZodTypeAny>(schema: S, args: unknown): z.output<S> {
    // Schemas below catch per field, so only a non-object can fail here.
    const result = schema.safeParse(args ?? {});
    return result.success ? result.data : schema.parse({});
}

const EmotionArgsSchema = z.object({
    joy: clamped(0, 5, 0),
    fun: clamped(0, 5, 0),
    anger: clamped(0, 5, 0),
    sad: clamped(0, 5, 0)
});

const WirePatternArgsSchema = z.object({
    steps: z.array(z.object({
        intensity: clamped(0, 255, 0),
        duration: clamped(0, MAX_STEP_DURATION_MS, 0).transform(Math.round)
    })),
    interval: clamped(0, MAX_STEP_DURATION_MS, 0).transform(Math.round),
    repeat_count: clamped(0, MAX_REPEAT_COUNT, 1).transform(Math.round)
});

const ControlArgsSchema = z.object({
    vibration_settings: z.object({
        vibration_enabled: z.boolean().catch(false),
        pattern: z.string().catch('none'),
        intensity: clamped(0, 1, 0),
        frequency: clamped(0, MAX_REPEAT_COUNT, 0),
        duration: clamped(0, MAX_SETTINGS_DURATION_S, 0),
        dominant_emotion: z.string().nullable().catch(null),
        description: z.string().catch(''),
        vibration_pattern: WirePatternArgsSchema.optional().catch(undefined),
        intensity_scale: z.union([z.literal(100), z.literal(255)]).optional().catch(undefined)
    }).catch({
        vibration_enabled: false,
        pattern: 'none',
        intensity: 0,
        frequency: 0,
        duration: 0,
        dominant_emotion: null,
        description: '',
        vibration_pattern: undefined,
        intensity_scale: undefined
    })
});

type ControlSettings = z.output<typeof ControlArgsSchema>['vibration_settings'];

const SendPatternArgsSchema = z.object({
    pattern_type: z.string().catch('pulse'),
    intensity: clamped(0, 1, 0.5),
    duration_ms: clamped(0, MAX_DURATION_MS, 500).transform(Math.round),
    repeat_count: clamped(1, MAX_REPEAT_COUNT, 1).transform(Math.round)
});

const InitializeArgsSchema = z.object({
    host: z.string().min(1).optional().catch(undefined),
    port: z.coerce.number().int().min(1).max(65535).optional().catch(undefined)
});

const TouchArgsSchema = z.object({
    intensity: clamped(0, 1, 0),
    area: z.string().catch('')
});

export interface ControlVibrationResult {
    command: string;
    message: string;
    details?: {
        pattern: string;
        intensity: number;
        frequency: number;
        duration: number;
        emotion: string;
    };
    device_sent: boolean;
}

export interface SendPatternResult {
    success: boolean;
    message?: string;
    error?: string;
    pattern: WirePattern;
}

export interface InitializeResult {
    success: boolean;
    host: string;
    port: number;
    message?: string;
    error?: string;
    calibrated?: boolean;
    status?: DeviceStatus | null;
}

export interface DeviceStatusResult {
    connected: boolean;
    deviceId: string | null;
    baseUrl: string | null;
    status: DeviceStatus | null;
}

function connectedController(context: HapticContext): HapticDeviceController | null {
    return context.controller && context.controller.isConnected ? context.controller : null;
}

export async function generateVibrationPatternSkill(args: unknown, context: HapticContext): Promise<VibrationSettings> {
    const emotions = parseArgs(EmotionArgsSchema, args);
    return context.generator.describe(emotions);
}

/**
 * Settings from generate_vibration_pattern carry the exact pattern to play;
 * hand-written settings without one are played from their command string.
 */
function generatedPattern(settings: ControlSettings, context: HapticContext): VibrationPattern | null {
    const wire = settings.vibration_pattern;
    if (!wire || wire.steps.length === 0 || wire.repeat_count === 0) return null;
    return deserializePattern(wire, settings.intensity_scale ?? context.config.get('intensityScale'));
}

export async function controlVibrationSkill(args: unknown, context: HapticContext): Promise<ControlVibrationResult> {
    const settings = parseArgs(ControlArgsSchema, args).vibration_settings;
    const controller = connectedController(context);
    // The command is read back by the device, so it uses the device's scale.
    const scale = controller ? controller.getIntensityScale() : context.config.get('intensityScale');

    if (!settings.vibration_enabled) {
        const stopped = controller ? await controller.stop() : false;
        return { command: STOP_COMMAND, message: 'Stopping vibration', device_sent: stopped };
    }

    const command = formatVibrationCommand(settings, scale);
    let deviceSent = false;
    if (controller) {
        const generated = generatedPattern(settings, context);
        deviceSent = generated ? await controller.sendPattern(generated) : await controller.sendVibrationCommand(command);
    } else {
        logger.warn('control_vibration: no connected device, command generated only');
    }

    return {
        command,
        message: `Running: ${settings.description || basePatternType(settings.pattern)}`,
        details: {
            pattern: settings.pattern,
            intensity: Math.round(settings.intensity * scale),
            frequency: Number(settings.frequency.toFixed(2)),
            duration: Math.round(settings.duration * 1000),
            emotion: settings.dominant_emotion ?? 'unknown'
        },
        device_sent: deviceSent
    };
}

export async function sendVibrationPatternSkill(args: unknown, context: HapticContext): Promise<SendPatternResult> {
    const { pattern_type, intensity, duration_ms, repeat_count } = parseArgs(SendPatternArgsSchema, args);
    const built = createCustomPattern(pattern_type, intensity, duration_ms, repeat_count);
    const controller = connectedController(context);
    const wire = serializePattern(built, controller ? controller.getIntensityScale() : context.config.get('intensityScale'));

    if (!controller) {
        return { success: false, error: 'Device not connected. Run initialize_device first.', pattern: wire };
    }

    const receipt = await controller.dispatch(built);
    if (receipt.accepted) {
        return { success: true, message: `Sent vibration pattern '${pattern_type}'`, pattern: receipt.pattern };
    }
    return { success: false, error: `Failed to send vibration pattern: ${receipt.reason ?? 'rejected'}`, pattern: receipt.pattern };
}

export async function initializeDeviceSkill(args: unknown, context: HapticContext): Promise<InitializeResult> {
    const parsed = parseArgs(InitializeArgsSchema, args);
    const host = parsed.host ?? context.config.get('deviceHost');
    const port = parsed.port ?? context.config.get('devicePort');

    if (context.controller) {
        await context.controller.disconnect();
        context.controller = null;
    }

    const controller = context.createController(host, port);
    if (!(await controller.connect())) {
        return { success: false, host, port, error: `Could not connect to device at ${host}:${port}` };
    }

    context.controller = controller;
    const calibrated = await controller.calibrate();
    const status = await controller.getStatus();
    return { success: true, host, port, message: 'Device initialized', calibrated, status };
}

export async function deviceStatusSkill(_args: unknown, context: HapticContext): Promise<DeviceStatusResult> {
    const controller = context.controller;
    if (!controller) {
        return { connected: false, deviceId: null, baseUrl: null, status: null };
    }
    return {
        connected: controller.isConnected,
        deviceId: controller.deviceId,
        baseUrl: controller.baseUrl,
        status: controller.isConnected ? await controller.getStatus() : null
    };
}

export async function stopVibrationSkill(_args: unknown, context: HapticContext): Promise<{ success: boolean }> {
    const controller = connectedController(context);
    return { success: controller ? await controller.stop() : false };
}

export async function addEmojiSkill(args: unknown, _context: HapticContext): Promise<string> {
    return selectEmoji(parseArgs(EmotionArgsSchema, args));
}

export async function applyTouchSkill(args: unknown, context: HapticContext): Promise<TouchResult> {
    const { intensity, area } = parseArgs(TouchArgsSchema, args);
    return context.touchModel.applyTouch(intensity, area);
}

export function createHapticContext(config: ConfigManager, controller: HapticDeviceController | null = null): HapticContext {
    return {
        config,
        // Built per use so profile and scale changes apply to the next call.
        get generator() {
            return PatternGenerator.fromConfig(config.getAll());
        },
        touchModel: new TouchEmotionModel(),
        controller,
        createController: (host, port) => HapticDeviceController.fromConfig(config.getAll(), { host, port })
    };
}

export const hapticToolsSkills: Skill[] = [
    {
        name: 'generate_vibration_pattern',
        description: 'Generate vibration settings from emotion levels (0-5 each). The dominant emotion picks the pattern; strong secondary emotions make it a mixed pattern.',
        usage: 'generate_vibration_pattern joy=4 fun=2 anger=0 sad=0',
        handler: generateVibrationPatternSkill
    },
    {
        name: 'control_vibration',
        description: 'Turn settings from generate_vibration_pattern into a device command and send it to the connected device. Disabled settings stop vibration.',
        usage: 'control_vibration vibration_settings={...}',
        handler: controlVibrationSkill
    },
    {
        name: 'send_vibration_pattern',
        description: 'Send a raw pulse, wave, burst or fade pattern to the connected device.',
        usage: 'send_vibration_pattern pattern_type="pulse" intensity=0.5 duration_ms=500 repeat_count=1',
        handler: sendVibrationPatternSkill
    },
    {
        name: 'initialize_device',
        description: 'Connect to the haptic device over WiFi, replacing the current device. Defaults to the configured host and port.',
        usage: 'initialize_device host="192.168.4.1" port=80',
        handler: initializeDeviceSkill
    },
    {
        name: 'device_status',
        description: 'Report whether a device is connected and its current status.',
        usage: 'device_status',
        handler: deviceStatusSkill
    },
    {
        name: 'stop_vibration',
        description: 'Stop any vibration playing on the connected device.',
        usage: 'stop_vibration',
        handler: stopVibrationSkill
    },
    {
        name: 'add_emoji',
        description: 'Pick emoji matching emotion levels (0-5 each). Returns an empty string when every level is 0.',
        usage: 'add_emoji joy=4 fun=3 anger=0 sad=0',
        handler: addEmojiSkill
    },
    {
        name: 'apply_touch',
        description: 'Update the emotion state from a touch of the given intensity (0.0-1.0) on a body area.',
        usage: 'apply_touch intensity=0.5 area="head"',
        handler: applyTouchSkill
    }
];
