import {
    DeviceHttpError,
    DeviceResponseError,
    RequestTimeoutError,
    SessionClosedError
} from '../devices/errors';

export enum ErrorType {
    TIMEOUT = 'timeout',
    NETWORK_ERROR = 'network_error',
    SERVER_ERROR = 'server_error',
    CLIENT_ERROR = 'client_error',
    INVALID_RESPONSE = 'invalid_response',
    CANCELLED = 'cancelled',
    UNKNOWN = 'unknown'
}

export interface ClassifiedError {
    type: ErrorType;
    message: string;
    retryable: boolean;
    status?: number;
    originalError?: unknown;
}

/**
 * Classifies transport errors so the retry loop knows which failures are
 * transient (timeouts, dropped connections, 5xx) and which are final (4xx,
 * malformed bodies, a session closed under the request).
 */
export class ErrorClassifier {
    public static classify(error: unknown): ClassifiedError {
        if (error instanceof DeviceHttpError) {
            if (error.status >= 500) {
                return {
                    type: ErrorType.SERVER_ERROR,
                    message: `Device server error (HTTP ${error.status})`,
                    retryable: true,
                    status: error.status,
                    originalError: error
                };
            }
            return {
                type: ErrorType.CLIENT_ERROR,
                message: `Device rejected request (HTTP ${error.status})`,
                retryable: false,
                status: error.status,
                originalError: error
            };
        }

        if (error instanceof SessionClosedError) {
            return {
                type: ErrorType.CANCELLED,
                message: 'Session closed',
                retryable: false,
                originalError: error
            };
        }

        if (error instanceof RequestTimeoutError) {
            return {
                type: ErrorType.TIMEOUT,
                message: 'Request timeout',
                retryable: true,
                originalError: error
            };
        }

        if (error instanceof DeviceResponseError) {
            return {
                type: ErrorType.INVALID_RESPONSE,
                message: 'Invalid or malformed response',
                retryable: false,
                originalError: error
            };
        }

        const errorMsg = this.describe(error).toLowerCase();

        if (this.isTimeout(errorMsg)) {
            return {
                type: ErrorType.TIMEOUT,
                message: 'Request timeout',
                retryable: true,
                originalError: error
            };
        }

        if (this.isNetworkError(errorMsg)) {
            return {
                type: ErrorType.NETWORK_ERROR,
                message: 'Network connectivity issue',
                retryable: true,
                originalError: error
            };
        }

        if (this.isInvalidResponse(errorMsg)) {
            return {
                type: ErrorType.INVALID_RESPONSE,
                message: 'Invalid or malformed response',
                retryable: false,
                originalError: error
            };
        }

        return {
            type: ErrorType.UNKNOWN,
            message: errorMsg || 'Unknown error occurred',
            retryable: false,
            originalError: error
        };
    }

    public static isRetryable(error: unknown): boolean {
        return this.classify(error).retryable;
    }

    /**
     * Flattens an error and its `cause` chain into one string; fetch hides
     * the socket error code (ECONNREFUSED etc.) in `cause`.
     */
    private static describe(error: unknown): string {
        const parts: string[] = [];
        let current: unknown = error;
        for (let depth = 0; depth < 3 && current !== undefined && current !== null; depth++) {
            if (current instanceof Error) {
                parts.push(`${current.name} ${current.message}`);
                if ('code' in current && typeof current.code === 'string') parts.push(current.code);
                current = current.cause;
            } else {
                parts.push(String(current));
                break;
            }
        }
        return parts.join(' ');
    }

    private static isTimeout(msg: string): boolean {
        const patterns = [
            'timeout',
            'timed out',
            'etimedout',
            'econnaborted',
            'und_err_connect_timeout'
        ];
        return patterns.some(p => msg.includes(p));
    }

    private static isNetworkError(msg: string): boolean {
        const patterns = [
            'econnrefused',
            'enotfound',
            'econnreset',
            'ehostunreach',
            'enetunreach',
            'fetch failed',
            'network',
            'socket hang up',
            'other side closed'
        ];
        return patterns.some(p => msg.includes(p));
    }

    private static isInvalidResponse(msg: string): boolean {
        const patterns = [
            'invalid json',
            'unexpected token',
            'unexpected end of json',
            'malformed'
        ];
        return patterns.some(p => msg.includes(p));
    }
}
