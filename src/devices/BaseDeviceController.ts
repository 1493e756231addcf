import { ZodType } from 'zod';
import { logger } from '../utils/logger';
import { ErrorHandler, errorMessage } from '../utils/ErrorHandler';
import { ErrorClassifier } from '../core/ErrorClassifier';
import type { VibrationPattern } from '../patterns/types';
import { ConnectionState, DeviceStatus } from './types';
import {
    DeviceHttpError,
    DeviceResponseError,
    RequestTimeoutError,
    SessionClosedError
} from './errors';

export type HttpMethod = 'GET' | 'POST';

export interface DeviceControllerOptions {
    deviceId: string;
    host: string;
    port?: number;
    /** Upper bound for each HTTP request, in ms. */
    timeoutMs?: number;
    /** Total attempts for retried reads, first try included. */
    retryCount?: number;
    /** Backoff before the second attempt; doubles after each failure. */
    retryInitialDelayMs?: number;
}

export interface DeviceResponse {
    status: number;
    data: unknown;
}

interface DeviceSession {
    abort: AbortController;
    openedAt: number;
}

/**
 * Shared plumbing for HTTP-attached actuators: session lifecycle, bounded
 * requests and retry. Public methods of subclasses report failure through
 * their return value and never throw.
 */
export abstract class BaseDeviceController {
    public readonly deviceId: string;
    public readonly host: string;
    public readonly port: number;
    public readonly baseUrl: string;

    protected readonly timeoutMs: number;
    protected readonly retryCount: number;
    protected readonly retryInitialDelayMs: number;

    protected state: ConnectionState = 'disconnected';
    private session: DeviceSession | null = null;

    constructor(options: DeviceControllerOptions) {
        this.deviceId = options.deviceId;
        this.host = options.host;
        this.port = options.port ?? 80;
        this.baseUrl = `http://${this.host}:${this.port}`;
        this.timeoutMs = options.timeoutMs ?? 5000;
        this.retryCount = Math.max(1, options.retryCount ?? 3);
        this.retryInitialDelayMs = options.retryInitialDelayMs ?? 1000;
    }

    public abstract connect(): Promise<boolean>;
    public abstract disconnect(): Promise<void>;
    public abstract sendPattern(pattern: VibrationPattern): Promise<boolean>;
    public abstract stop(): Promise<boolean>;
    public abstract getStatus(): Promise<DeviceStatus | null>;

    public get isConnected(): boolean {
        return this.state === 'connected';
    }

    public getState(): ConnectionState {
        return this.state;
    }

    public hasSession(): boolean {
        return this.session !== null;
    }

    /**
     * Connects, runs `fn`, and always disconnects afterwards. Resolves to
     * null when the device cannot be reached.
     */
    public async withConnection<T>(fn: (controller: this) => Promise<T>): Promise<T | null> {
        if (!(await this.connect())) return null;
        try {
            return await fn(this);
        } finally {
            await this.disconnect();
        }
    }

    protected openSession(): DeviceSession {
        if (!this.session) {
            this.session = { abort: new AbortController(), openedAt: Date.now() };
            logger.debug(`${this.label()}: session opened`);
        }
        return this.session;
    }

    /** Releases the session; requests still running on it are aborted. */
    protected closeSession(): void {
        if (!this.session) return;
        this.session.abort.abort();
        this.session = null;
        logger.debug(`${this.label()}: session closed`);
    }

    protected label(): string {
        return `${this.constructor.name}[${this.deviceId}]`;
    }

    /**
     * One HTTP exchange bounded by `timeoutMs`. Throws DeviceHttpError on a
     * non-2xx status, RequestTimeoutError, SessionClosedError, or
     * DeviceResponseError for an unreadable 2xx body. Requests made while
     * no session is open run on their own and do not open one.
     */
    protected async request(method: HttpMethod, path: string, body?: unknown): Promise<DeviceResponse> {
        const session = this.session;
        const controller = new AbortController();
        let timedOut = false;
        const timer = setTimeout(() => {
            timedOut = true;
            controller.abort();
        }, this.timeoutMs);
        const onSessionClosed = () => controller.abort();
        session?.abort.signal.addEventListener('abort', onSessionClosed, { once: true });

        try {
            const response = await fetch(`${this.baseUrl}${path}`, {
                method,
                headers: body !== undefined ? { 'content-type': 'application/json' } : undefined,
                body: body !== undefined ? JSON.stringify(body) : undefined,
                signal: controller.signal
            });

            const text = await response.text();
            let data: unknown = null;
            if (text.trim().length > 0) {
                try {
                    data = JSON.parse(text);
                } catch (parseError) {
                    if (response.ok) throw new DeviceResponseError(errorMessage(parseError), path);
                    data = text;
                }
            }

            if (!response.ok) throw new DeviceHttpError(response.status, path, data);
            return { status: response.status, data };
        } catch (error) {
            if (timedOut) throw new RequestTimeoutError(this.timeoutMs, path);
            if (session?.abort.signal.aborted) throw new SessionClosedError(path);
            throw error;
        } finally {
            clearTimeout(timer);
            session?.abort.signal.removeEventListener('abort', onSessionClosed);
        }
    }

    /**
     * `request` with exponential backoff for transient failures (timeouts,
     * network errors, 5xx). Client errors are final. Resolves to null once
     * attempts are exhausted.
     */
    protected async requestWithRetry(method: HttpMethod, path: string, body?: unknown): Promise<DeviceResponse | null> {
        try {
            return await ErrorHandler.withRetry(() => this.request(method, path, body), {
                maxRetries: this.retryCount - 1,
                initialDelay: this.retryInitialDelayMs,
                maxDelay: Number.MAX_SAFE_INTEGER,
                factor: 2,
                retryCondition: (error) => ErrorClassifier.isRetryable(error),
                label: this.label()
            });
        } catch (error) {
            const classified = ErrorClassifier.classify(error);
            logger.error(`${this.label()}: ${method} ${path} failed (${classified.type}): ${errorMessage(error)}`);
            return null;
        }
    }

    protected parseBody<T>(schema: ZodType<T>, data: unknown, path: string): T {
        const result = schema.safeParse(data);
        if (!result.success) {
            throw new DeviceResponseError(result.error.issues[0]?.message ?? 'unexpected body', path);
        }
        return result.data;
    }
}
