import { describe, it, expect, beforeEach, vi } from 'vitest';
import { RetryUtil } from '../../../src/utils/retry.util';
import { NotIndexedError, ValidationError } from '../../../src/utils/errors';

// Mock the logger
vi.mock('../../../src/config/logger', () => ({
    logger: {
        debug: vi.fn(),
        info: vi.fn(),
        warn: vi.fn(),
        error: vi.fn()
    }
}));

function errorWith(fields: { code?: string; status?: number }): Error {
    return Object.assign(new Error('request failed'), fields);
}

describe('RetryUtil - Static Utility Tests', () => {
    beforeEach(() => {
        vi.clearAllMocks();
    });

    describe('executeWithRetry - Success Cases', () => {
        it('should execute operation successfully on first attempt', async () => {
            const mockOperation = vi.fn().mockResolvedValue('success');
            const result = await RetryUtil.executeWithRetry(mockOperation, {
                operationName: 'test-operation'
            });

            expect(result).toBe('success');
            expect(mockOperation).toHaveBeenCalledTimes(1);
        });

        it('should succeed on second attempt after a transient failure', async () => {
            const mockOperation = vi.fn()
                .mockRejectedValueOnce(new Error('network error'))
                .mockResolvedValueOnce('success');

            const result = await RetryUtil.executeWithRetry(mockOperation, {
                operationName: 'test-operation',
                maxAttempts: 3,
                baseDelay: 10
            });

            expect(result).toBe('success');
            expect(mockOperation).toHaveBeenCalledTimes(2);
        });

        it('should use default options when none provided', async () => {
            const mockOperation = vi.fn().mockResolvedValue({ data: [1, 2, 3] });
            const result = await RetryUtil.executeWithRetry(mockOperation);

            expect(result).toEqual({ data: [1, 2, 3] });
            expect(mockOperation).toHaveBeenCalledTimes(1);
        });
    });

    describe('executeWithRetry - Failure Cases', () => {
        it('should fail after max attempts with retryable error', async () => {
            const mockOperation = vi.fn().mockRejectedValue(new Error('network error'));

            await expect(RetryUtil.executeWithRetry(mockOperation, {
                operationName: 'test-operation',
                maxAttempts: 2,
                baseDelay: 10
            })).rejects.toThrow('network error');

            expect(mockOperation).toHaveBeenCalledTimes(2);
        });

        it('should fail immediately with non-retryable error', async () => {
            const mockOperation = vi.fn().mockRejectedValue(new Error('Invalid API key'));

            await expect(RetryUtil.executeWithRetry(mockOperation, {
                operationName: 'test-operation',
                maxAttempts: 3
            })).rejects.toThrow('Invalid API key');

            expect(mockOperation).toHaveBeenCalledTimes(1);
        });

        it('should never retry pipeline errors', async () => {
            const mockOperation = vi.fn().mockRejectedValue(new NotIndexedError(4));

            await expect(RetryUtil.executeWithRetry(mockOperation, {
                operationName: 'test-operation',
                maxAttempts: 3,
                baseDelay: 10
            })).rejects.toBeInstanceOf(NotIndexedError);

            expect(mockOperation).toHaveBeenCalledTimes(1);
        });

        it('should wrap non-Error throws', async () => {
            const mockOperation = vi.fn().mockRejectedValue('String error');

            await expect(RetryUtil.executeWithRetry(mockOperation, {
                operationName: 'test-operation',
                maxAttempts: 2,
                baseDelay: 10
            })).rejects.toThrow('test-operation failed: String error');

            expect(mockOperation).toHaveBeenCalledTimes(1);
        });

        it('should handle maxAttempts of 1', async () => {
            const mockOperation = vi.fn().mockRejectedValue(new Error('Network error'));

            await expect(RetryUtil.executeWithRetry(mockOperation, {
                operationName: 'test-operation',
                maxAttempts: 1
            })).rejects.toThrow('Network error');

            expect(mockOperation).toHaveBeenCalledTimes(1);
        });
    });

    describe('isRetryableError - Error Classification', () => {
        it('should identify network error codes as retryable', () => {
            for (const code of ['ECONNRESET', 'ENOTFOUND', 'ECONNREFUSED', 'ETIMEDOUT']) {
                expect(RetryUtil.isRetryableError(errorWith({ code }))).toBe(true);
            }
        });

        it('should identify rate limits and server errors as retryable', () => {
            for (const status of [429, 500, 502, 503]) {
                expect(RetryUtil.isRetryableError(errorWith({ status }))).toBe(true);
            }
        });

        it('should identify transient messages as retryable', () => {
            expect(RetryUtil.isRetryableError(new Error('Request timeout'))).toBe(true);
            expect(RetryUtil.isRetryableError(new Error('rate limit exceeded'))).toBe(true);
            expect(RetryUtil.isRetryableError(new Error('socket hang up'))).toBe(true);
        });

        it('should identify non-retryable errors correctly', () => {
            expect(RetryUtil.isRetryableError(new Error('Invalid API key'))).toBe(false);
            expect(RetryUtil.isRetryableError(errorWith({ status: 400 }))).toBe(false);
            expect(RetryUtil.isRetryableError(errorWith({ code: 'VALIDATION_ERROR' }))).toBe(false);
            expect(RetryUtil.isRetryableError(new ValidationError('network is not a field'))).toBe(false);
        });
    });

    describe('executeWithRetry - Logging Integration', () => {
        it('should log debug information for each attempt', async () => {
            const { logger } = await import('../../../src/config/logger');
            const mockOperation = vi.fn().mockRejectedValue(new Error('network error'));

            await expect(RetryUtil.executeWithRetry(mockOperation, {
                operationName: 'test-operation',
                maxAttempts: 2,
                baseDelay: 10
            })).rejects.toThrow();

            expect(logger.debug).toHaveBeenCalledWith(
                { operation: 'test-operation', attempt: 1, maxAttempts: 2 },
                'Executing test-operation (attempt 1/2)'
            );
            expect(logger.debug).toHaveBeenCalledWith(
                { operation: 'test-operation', attempt: 2, maxAttempts: 2 },
                'Executing test-operation (attempt 2/2)'
            );
            expect(logger.debug).toHaveBeenCalledTimes(2);
        });

        it('should log the backoff delay between attempts', async () => {
            const { logger } = await import('../../../src/config/logger');
            const mockOperation = vi.fn().mockRejectedValue(new Error('network error'));

            await expect(RetryUtil.executeWithRetry(mockOperation, {
                operationName: 'test-operation',
                maxAttempts: 3,
                baseDelay: 5,
                maxDelay: 8,
                backoffMultiplier: 2
            })).rejects.toThrow();

            expect(logger.info).toHaveBeenCalledWith(
                { operation: 'test-operation', attempt: 1, delay: 5 },
                'Retrying test-operation in 5ms'
            );
            expect(logger.info).toHaveBeenCalledWith(
                { operation: 'test-operation', attempt: 2, delay: 8 },
                'Retrying test-operation in 8ms'
            );
        });

        it('should log success on retry', async () => {
            const { logger } = await import('../../../src/config/logger');
            const mockOperation = vi.fn()
                .mockRejectedValueOnce(new Error('network error'))
                .mockResolvedValueOnce('success');

            await RetryUtil.executeWithRetry(mockOperation, {
                operationName: 'test-operation',
                maxAttempts: 3,
                baseDelay: 10
            });

            expect(logger.info).toHaveBeenCalledWith(
                { operation: 'test-operation', attempt: 2, maxAttempts: 3 },
                'test-operation succeeded on attempt 2'
            );
        });

        it('should log warnings for failed attempts and a final error', async () => {
            const { logger } = await import('../../../src/config/logger');
            const mockOperation = vi.fn().mockRejectedValue(new Error('network error'));

            await expect(RetryUtil.executeWithRetry(mockOperation, {
                operationName: 'test-operation',
                maxAttempts: 2,
                baseDelay: 10
            })).rejects.toThrow();

            expect(logger.warn).toHaveBeenCalledWith(
                {
                    operation: 'test-operation',
                    attempt: 1,
                    maxAttempts: 2,
                    error: 'network error',
                    isRetryable: true
                },
                'test-operation failed on attempt 1'
            );
            expect(logger.error).toHaveBeenCalledWith(
                { operation: 'test-operation', maxAttempts: 2, error: 'network error' },
                'test-operation failed after retries'
            );
        });
    });
});
