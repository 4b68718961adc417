/**
 * Unit Tests for RetryUtils
 */

import {
    RetryExhaustedError,
    isRetryableStatus,
    withRetry,
    withTimeout,
} from '../../../src/infrastructure/resilience/RetryUtils';
import { GenerationTimeoutError } from '../../../src/domain/errors/StoryboardErrors';

describe('RetryUtils', () => {
    describe('withRetry', () => {
        it('should return result on first successful attempt', async () => {
            const fn = jest.fn().mockResolvedValue('success');

            const result = await withRetry(fn);

            expect(result).toBe('success');
            expect(fn).toHaveBeenCalledTimes(1);
            expect(fn).toHaveBeenCalledWith(1);
        });

        it('should retry on failure and succeed', async () => {
            const fn = jest.fn()
                .mockRejectedValueOnce(new Error('Transient'))
                .mockResolvedValueOnce('success');

            const result = await withRetry(fn, {
                maxAttempts: 3,
                initialBackoffMs: 10
            });

            expect(result).toBe('success');
            expect(fn).toHaveBeenCalledTimes(2);
            expect(fn).toHaveBeenLastCalledWith(2);
        });

        it('should throw RetryExhaustedError after max attempts', async () => {
            const fn = jest.fn().mockRejectedValue(new Error('Persistent failure'));

            const attempt = withRetry(fn, { maxAttempts: 3, initialBackoffMs: 10 });

            await expect(attempt).rejects.toBeInstanceOf(RetryExhaustedError);
            await expect(attempt).rejects.toMatchObject({ message: 'Persistent failure', attempts: 3 });
            expect(fn).toHaveBeenCalledTimes(3);
        });

        it('should call onRetry callback', async () => {
            const fn = jest.fn()
                .mockRejectedValueOnce(new Error('Error 1'))
                .mockRejectedValueOnce(new Error('Error 2'))
                .mockResolvedValueOnce('success');

            const onRetry = jest.fn();

            await withRetry(fn, {
                maxAttempts: 3,
                initialBackoffMs: 10,
                onRetry
            });

            expect(onRetry).toHaveBeenCalledTimes(2);
            expect(onRetry).toHaveBeenCalledWith(1, expect.any(Error), expect.any(Number));
        });

        it('should not retry non-retryable errors', async () => {
            const fn = jest.fn().mockRejectedValue(new Error('Bad request'));

            await expect(withRetry(fn, {
                maxAttempts: 3,
                initialBackoffMs: 10,
                isRetryable: () => false
            })).rejects.toMatchObject({ attempts: 1 });

            expect(fn).toHaveBeenCalledTimes(1);
        });

        it('should make at least one attempt', async () => {
            const fn = jest.fn().mockResolvedValue('once');

            await expect(withRetry(fn, { maxAttempts: 0 })).resolves.toBe('once');
        });
    });

    describe('withTimeout', () => {
        it('should resolve when the call finishes in time', async () => {
            await expect(withTimeout(async () => 'done', 100)).resolves.toBe('done');
        });

        it('should reject with GenerationTimeoutError and abort the signal', async () => {
            let seen: AbortSignal | undefined;

            const pending = withTimeout(signal => {
                seen = signal;
                return new Promise<string>(() => undefined);
            }, 10);

            await expect(pending).rejects.toBeInstanceOf(GenerationTimeoutError);
            expect(seen?.aborted).toBe(true);
        });

        it('should pass failures through', async () => {
            await expect(withTimeout(() => Promise.reject(new Error('boom')), 100)).rejects.toThrow('boom');
        });

        it('should reject when the call throws synchronously', async () => {
            await expect(withTimeout(() => {
                throw new Error('sync boom');
            }, 100)).rejects.toThrow('sync boom');
        });
    });

    describe('isRetryableStatus', () => {
        it('should return true for network errors', () => {
            expect(isRetryableStatus(undefined)).toBe(true);
        });

        it('should return true for rate limits and server errors', () => {
            expect(isRetryableStatus(429)).toBe(true);
            expect(isRetryableStatus(500)).toBe(true);
            expect(isRetryableStatus(503)).toBe(true);
        });

        it('should return false for client errors', () => {
            expect(isRetryableStatus(400)).toBe(false);
            expect(isRetryableStatus(401)).toBe(false);
            expect(isRetryableStatus(404)).toBe(false);
        });
    });
});
