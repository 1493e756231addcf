import { z } from 'zod';
import type { VibrationLevel } from '../patterns/presets';
import type { WirePattern } from '../patterns/types';

export type ConnectionState = 'disconnected' | 'connecting' | 'connected';

// Device response bodies. Unknown fields are kept; firmware adds diagnostics freely.

export const DeviceStatusSchema = z.object({
    status: z.string()
}).passthrough();

export const PatternAckSchema = z.object({
    status: z.string()
}).passthrough();

export const SensorResponseSchema = z.object({
    value: z.number()
}).passthrough();

export const SuccessResponseSchema = z.object({
    success: z.boolean()
}).passthrough();

export type DeviceStatus = z.infer<typeof DeviceStatusSchema>;

export interface SensorReading {
    timestamp: string;
    deviceId: string;
    value: number;
    level: VibrationLevel;
    raw: Record<string, unknown>;
}

/**
 * Outcome of handing a pattern to the device. `accepted` means the device
 * acknowledged the request; it says nothing about when playback ends.
 */
export interface DispatchReceipt {
    accepted: boolean;
    deviceId: string;
    sentAt: string;
    pattern: WirePattern;
    statusCode?: number;
    reason?: string;
}
