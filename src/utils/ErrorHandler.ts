import { logger } from './logger';

export interface RetryOptions {
    maxRetries?: number;
    initialDelay?: number;
    maxDelay?: number;
    factor?: number;
    retryCondition?: (error: unknown) => boolean;
    label?: string;
}

export function errorMessage(error: unknown): string {
    if (error instanceof Error) return error.message;
    return String(error);
}

export class ErrorHandler {
    /**
     * Executes a function with exponential backoff retries.
     * Attempt n (0-based) waits initialDelay * factor^n before the next try.
     */
    public static async withRetry<T>(
        fn: () => Promise<T>,
        options: RetryOptions = {}
    ): Promise<T> {
        const {
            maxRetries = 3,
            initialDelay = 1000,
            maxDelay = 10000,
            factor = 2,
            retryCondition = () => true,
            label = 'ErrorHandler'
        } = options;

        let lastError: unknown;
        let delay = initialDelay;

        for (let attempt = 1; attempt <= maxRetries + 1; attempt++) {
            try {
                return await fn();
            } catch (error) {
                lastError = error;

                if (attempt > maxRetries || !retryCondition(error)) {
                    break;
                }

                logger.warn(`${label}: Attempt ${attempt} failed. Retrying in ${delay}ms... (Error: ${errorMessage(error)})`);
                await new Promise(resolve => setTimeout(resolve, delay));

                delay = Math.min(delay * factor, maxDelay);
            }
        }

        throw lastError;
    }

    /**
     * Executes a function with a fallback if it fails after all retries.
     */
    public static async withFallback<T>(
        fn: () => Promise<T>,
        fallback: (error: unknown) => T | Promise<T>,
        options: RetryOptions = {}
    ): Promise<T> {
        try {
            return await this.withRetry(fn, options);
        } catch (error) {
            logger.warn(`${options.label ?? 'ErrorHandler'}: Final attempt failed (${errorMessage(error)}). Triggering fallback...`);
            return await fallback(error);
        }
    }
}
