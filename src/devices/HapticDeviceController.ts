import { logger } from '../utils/logger';
import { errorMessage } from '../utils/ErrorHandler';
import { ErrorClassifier } from '../core/ErrorClassifier';
import { eventBus } from '../core/EventBus';
import type { HapticLinkConfig } from '../config/ConfigManager';
import { parseVibrationCommand } from '../patterns/commands';
import { classifyVibrationLevel } from '../patterns/presets';
import { IntensityScale, VibrationPattern, isNoOp, serializePattern } from '../patterns/types';
import { BaseDeviceController, DeviceControllerOptions } from './BaseDeviceController';
import {
    DeviceStatus,
    DeviceStatusSchema,
    DispatchReceipt,
    PatternAckSchema,
    SensorReading,
    SensorResponseSchema,
    SuccessResponseSchema
} from './types';

export interface HapticDeviceOptions extends DeviceControllerOptions {
    intensityScale?: IntensityScale;
    /** `status` values from GET /status that count as ready. */
    readyStatuses?: string[];
    sensorThreshold?: number;
}

/**
 * Vibration motor on a WiFi microcontroller, driven over its small JSON
 * HTTP API (/status, /pattern, /stop, /sensor, /calibrate, /threshold).
 */
export class HapticDeviceController extends BaseDeviceController {
    private readonly intensityScale: IntensityScale;
    private readonly readyStatuses: readonly string[];
    private sensorThreshold: number;

    constructor(options: HapticDeviceOptions) {
        super(options);
        this.intensityScale = options.intensityScale ?? 100;
        this.readyStatuses = options.readyStatuses && options.readyStatuses.length > 0
            ? [...options.readyStatuses]
            : ['online', 'ready'];
        this.sensorThreshold = options.sensorThreshold ?? 100;
    }

    public static fromConfig(config: HapticLinkConfig, overrides: Partial<HapticDeviceOptions> = {}): HapticDeviceController {
        return new HapticDeviceController({
            deviceId: config.deviceId,
            host: config.deviceHost,
            port: config.devicePort,
            timeoutMs: config.requestTimeoutMs,
            retryCount: config.retryCount,
            retryInitialDelayMs: config.retryInitialDelayMs,
            intensityScale: config.intensityScale,
            readyStatuses: config.readyStatuses,
            sensorThreshold: config.sensorThreshold,
            ...overrides
        });
    }

    public getIntensityScale(): IntensityScale {
        return this.intensityScale;
    }

    public getSensorThreshold(): number {
        return this.sensorThreshold;
    }

    public async connect(): Promise<boolean> {
        if (this.isConnected) return true;

        this.state = 'connecting';
        this.openSession();

        const status = await this.getStatus();
        if (status && this.readyStatuses.includes(status.status)) {
            this.state = 'connected';
            logger.info(`${this.label()}: connected to ${this.baseUrl} (status: ${status.status})`);
            eventBus.emit('device:connected', { deviceId: this.deviceId, baseUrl: this.baseUrl, status });
            return true;
        }

        logger.error(`${this.label()}: device at ${this.baseUrl} not ready (${status ? `status: ${status.status}` : 'unreachable'})`);
        this.closeSession();
        this.state = 'disconnected';
        return false;
    }

    public async disconnect(): Promise<void> {
        const wasConnected = this.isConnected;
        if (wasConnected && !(await this.stop())) {
            logger.warn(`${this.label()}: stop before disconnect was not acknowledged`);
        }

        this.closeSession();
        this.state = 'disconnected';

        if (wasConnected) {
            logger.info(`${this.label()}: disconnected`);
            eventBus.emit('device:disconnected', { deviceId: this.deviceId, baseUrl: this.baseUrl });
        }
    }

    /**
     * Sends a pattern once. The receipt reports the device's acknowledgment
     * only; playback continues on the device after this resolves.
     */
    public async dispatch(pattern: VibrationPattern): Promise<DispatchReceipt> {
        const receipt: DispatchReceipt = {
            accepted: false,
            deviceId: this.deviceId,
            sentAt: new Date().toISOString(),
            pattern: serializePattern(pattern, this.intensityScale)
        };

        if (!this.isConnected) {
            receipt.reason = 'not connected';
            logger.error(`${this.label()}: cannot send pattern, device not connected`);
            return receipt;
        }

        try {
            const response = await this.request('POST', '/pattern', receipt.pattern);
            receipt.statusCode = response.status;
            const ack = PatternAckSchema.safeParse(response.data);
            if (ack.success && ack.data.status === 'ok') {
                receipt.accepted = true;
            } else {
                receipt.reason = ack.success ? `device answered status '${ack.data.status}'` : 'unexpected acknowledgment body';
            }
        } catch (error) {
            const classified = ErrorClassifier.classify(error);
            receipt.statusCode = classified.status;
            receipt.reason = `${classified.type}: ${errorMessage(error)}`;
        }

        if (receipt.accepted) {
            logger.debug(`${this.label()}: pattern accepted (${receipt.pattern.steps.length} steps x${receipt.pattern.repeat_count})`);
        } else {
            logger.error(`${this.label()}: pattern rejected: ${receipt.reason}`);
        }
        eventBus.emit('pattern:dispatched', receipt);
        return receipt;
    }

    public async sendPattern(pattern: VibrationPattern): Promise<boolean> {
        return (await this.dispatch(pattern)).accepted;
    }

    public async stop(): Promise<boolean> {
        if (!this.isConnected) return false;
        try {
            const response = await this.request('POST', '/stop');
            const ack = PatternAckSchema.safeParse(response.data);
            return ack.success && ack.data.status === 'stopped';
        } catch (error) {
            logger.error(`${this.label()}: stop failed: ${errorMessage(error)}`);
            return false;
        }
    }

    public async getStatus(): Promise<DeviceStatus | null> {
        const response = await this.requestWithRetry('GET', '/status');
        if (!response) return null;

        const status = DeviceStatusSchema.safeParse(response.data);
        if (!status.success) {
            logger.error(`${this.label()}: unexpected /status body`);
            return null;
        }
        return status.data;
    }

    public async readSensor(): Promise<SensorReading | null> {
        if (!this.isConnected) return null;

        const response = await this.requestWithRetry('GET', '/sensor');
        if (!response) return null;

        try {
            const body = this.parseBody(SensorResponseSchema, response.data, '/sensor');
            const reading: SensorReading = {
                timestamp: new Date().toISOString(),
                deviceId: this.deviceId,
                value: body.value,
                level: classifyVibrationLevel(body.value),
                raw: body
            };
            eventBus.emit('sensor:reading', reading);
            return reading;
        } catch (error) {
            logger.error(`${this.label()}: ${errorMessage(error)}`);
            return null;
        }
    }

    public async calibrate(): Promise<boolean> {
        if (!this.isConnected) return false;
        try {
            const response = await this.request('POST', '/calibrate');
            return this.parseBody(SuccessResponseSchema, response.data, '/calibrate').success;
        } catch (error) {
            logger.error(`${this.label()}: calibration failed: ${errorMessage(error)}`);
            return false;
        }
    }

    public async setThreshold(value: number): Promise<boolean> {
        if (!this.isConnected) return false;
        const threshold = Math.max(0, Math.round(Number.isFinite(value) ? value : 0));
        try {
            const response = await this.request('POST', '/threshold', { value: threshold });
            const ok = this.parseBody(SuccessResponseSchema, response.data, '/threshold').success;
            if (ok) this.sensorThreshold = threshold;
            return ok;
        } catch (error) {
            logger.error(`${this.label()}: setting threshold failed: ${errorMessage(error)}`);
            return false;
        }
    }

    /** Accepts `PULSE:66,2.4,500` style commands; `STOP` stops playback. */
    public async sendVibrationCommand(command: string): Promise<boolean> {
        if (!this.isConnected) return false;

        const parsed = parseVibrationCommand(command, this.intensityScale);
        if (!parsed) {
            logger.error(`${this.label()}: malformed vibration command '${command}'`);
            return false;
        }
        return isNoOp(parsed) ? this.stop() : this.sendPattern(parsed);
    }
}
