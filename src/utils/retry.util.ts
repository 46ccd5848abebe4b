import { logger } from '../config/logger';
import { errorMessage, PipelineError } from './errors';

export interface RetryOptions {
    maxAttempts?: number;
    baseDelay?: number;
    maxDelay?: number;
    backoffMultiplier?: number;
    operationName?: string;
}

export interface IRetryUtil {
    executeWithRetry<T>(operation: () => Promise<T>, options?: RetryOptions): Promise<T>;
}

const RETRYABLE_CODES = new Set(['ECONNRESET', 'ENOTFOUND', 'ECONNREFUSED', 'ETIMEDOUT', 'EAI_AGAIN', 'EPIPE']);
const RETRYABLE_STATUSES = new Set([408, 409, 429, 500, 502, 503, 504]);

function readField(error: unknown, field: 'status' | 'code'): unknown {
    if (typeof error === 'object' && error !== null && field in error) {
        return Reflect.get(error, field);
    }
    return undefined;
}

/**
 * Retry Utility
 *
 * Exponential backoff for calls into external capabilities. Only transient
 * failures (network, timeouts, rate limiting, 5xx) are retried; anything else
 * is rethrown after the first attempt.
 */
export class RetryUtil {
    static async executeWithRetry<T>(
        operation: () => Promise<T>,
        options: RetryOptions = {}
    ): Promise<T> {
        const {
            maxAttempts = 3,
            baseDelay = 1000,
            maxDelay = 10000,
            backoffMultiplier = 2,
            operationName = 'operation'
        } = options;

        let lastError: unknown = null;

        for (let attempt = 1; attempt <= maxAttempts; attempt++) {
            try {
                logger.debug({
                    operation: operationName,
                    attempt,
                    maxAttempts
                }, `Executing ${operationName} (attempt ${attempt}/${maxAttempts})`);

                const result = await operation();

                if (attempt > 1) {
                    logger.info({
                        operation: operationName,
                        attempt,
                        maxAttempts
                    }, `${operationName} succeeded on attempt ${attempt}`);
                }

                return result;

            } catch (error: unknown) {
                lastError = error;
                const retryable = this.isRetryableError(error);

                logger.warn({
                    operation: operationName,
                    attempt,
                    maxAttempts,
                    error: errorMessage(error),
                    isRetryable: retryable
                }, `${operationName} failed on attempt ${attempt}`);

                if (attempt === maxAttempts) {
                    break;
                }

                if (!retryable) {
                    logger.error({
                        operation: operationName,
                        error: errorMessage(error)
                    }, `${operationName} failed with non-retryable error`);
                    break;
                }

                const delay = Math.min(
                    baseDelay * Math.pow(backoffMultiplier, attempt - 1),
                    maxDelay
                );

                logger.info({
                    operation: operationName,
                    attempt,
                    delay
                }, `Retrying ${operationName} in ${delay}ms`);

                await this.sleep(delay);
            }
        }

        logger.error({
            operation: operationName,
            maxAttempts,
            error: errorMessage(lastError)
        }, `${operationName} failed after retries`);

        throw lastError instanceof Error ? lastError : new Error(`${operationName} failed: ${errorMessage(lastError)}`);
    }

    /**
     * Transient errors only; logical failures are never retried.
     */
    static isRetryableError(error: unknown): boolean {
        if (error instanceof PipelineError) {
            return false;
        }

        const code = readField(error, 'code');
        if (typeof code === 'string' && RETRYABLE_CODES.has(code)) {
            return true;
        }

        const status = readField(error, 'status');
        if (typeof status === 'number' && RETRYABLE_STATUSES.has(status)) {
            return true;
        }

        const message = errorMessage(error).toLowerCase();
        return message.includes('timeout')
            || message.includes('timed out')
            || message.includes('rate limit')
            || message.includes('network')
            || message.includes('socket hang up');
    }

    private static sleep(ms: number): Promise<void> {
        return new Promise(resolve => setTimeout(resolve, ms));
    }
}
