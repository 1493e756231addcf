/**
 * Errors raised inside the device transport. None of them escape a
 * controller's public methods; they drive retry decisions and log lines.
 */

export class DeviceHttpError extends Error {
    constructor(public readonly status: number, public readonly path: string, public readonly body?: unknown) {
        super(`HTTP ${status} from ${path}`);
        this.name = 'DeviceHttpError';
    }
}

export class RequestTimeoutError extends Error {
    constructor(public readonly timeoutMs: number, public readonly path: string) {
        super(`Request to ${path} timed out after ${timeoutMs}ms`);
        this.name = 'RequestTimeoutError';
    }
}

export class DeviceResponseError extends Error {
    constructor(message: string, public readonly path: string) {
        super(`Malformed response from ${path}: ${message}`);
        this.name = 'DeviceResponseError';
    }
}

export class SessionClosedError extends Error {
    constructor(public readonly path: string) {
        super(`Session closed while requesting ${path}`);
        this.name = 'SessionClosedError';
    }
}
