/**
 * Retry Utility Unit Tests
 */

import { jitterDelay, retryWithJitter, RetryError } from '../../src/utils/retry.js';

describe('Retry Utility', () => {
  const noSleep = jest.fn<Promise<void>, [number]>(async () => undefined);

  beforeEach(() => {
    noSleep.mockClear();
  });

  describe('retryWithJitter', () => {
    it('should succeed on first attempt if no error', async () => {
      const fn = jest.fn().mockResolvedValue('success');

      const result = await retryWithJitter(fn, { sleep: noSleep });

      expect(result).toBe('success');
      expect(fn).toHaveBeenCalledTimes(1);
      expect(fn).toHaveBeenCalledWith(1);
      expect(noSleep).not.toHaveBeenCalled();
    });

    it('should retry on failure and succeed', async () => {
      const fn = jest
        .fn()
        .mockRejectedValueOnce(new Error('bind: address already in use'))
        .mockRejectedValueOnce(new Error('bind: address already in use'))
        .mockResolvedValue('success');

      const result = await retryWithJitter(fn, { maxAttempts: 3, sleep: noSleep });

      expect(result).toBe('success');
      expect(fn.mock.calls).toEqual([[1], [2], [3]]);
    });

    it('should throw RetryError with the last error after max attempts', async () => {
      const fn = jest
        .fn()
        .mockRejectedValueOnce(new Error('first'))
        .mockRejectedValueOnce(new Error('second'))
        .mockRejectedValueOnce(new Error('third'));

      const error = await retryWithJitter(fn, { maxAttempts: 3, sleep: noSleep }).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(RetryError);
      expect((error as RetryError).message).toBe('Failed after 3 attempts: third');
      expect((error as RetryError).lastError.message).toBe('third');
      expect((error as RetryError).cause).toBe((error as RetryError).lastError);
      expect((error as RetryError).attempts).toBe(3);
      expect(fn).toHaveBeenCalledTimes(3);
    });

    it('should default to 11 attempts', async () => {
      const fn = jest.fn().mockRejectedValue(new Error('persistent'));

      await expect(retryWithJitter(fn, { sleep: noSleep })).rejects.toThrow(RetryError);

      expect(fn).toHaveBeenCalledTimes(11);
      expect(noSleep).toHaveBeenCalledTimes(10);
    });

    it('should sleep a delay drawn from the random source', async () => {
      const fn = jest.fn().mockRejectedValueOnce(new Error('x')).mockResolvedValue('ok');

      await retryWithJitter(fn, { maxDelay: 2000, random: () => 0.5, sleep: noSleep });

      expect(noSleep).toHaveBeenCalledWith(1000);
    });

    it('should call onRetry before each retry', async () => {
      const onRetry = jest.fn();
      const fn = jest.fn().mockRejectedValueOnce(new Error('temporary')).mockResolvedValue('ok');

      await retryWithJitter(fn, { maxDelay: 100, random: () => 0.1, sleep: noSleep, onRetry });

      expect(onRetry).toHaveBeenCalledTimes(1);
      expect(onRetry).toHaveBeenCalledWith(expect.any(Error), 1, 10);
    });

    it('should not retry errors rejected by shouldRetry', async () => {
      const fn = jest.fn().mockRejectedValue(new Error('invalid options'));

      await expect(
        retryWithJitter(fn, { maxAttempts: 5, sleep: noSleep, shouldRetry: () => false })
      ).rejects.toThrow('invalid options');

      expect(fn).toHaveBeenCalledTimes(1);
    });

    it('should wrap non-Error rejections', async () => {
      const fn = jest.fn().mockRejectedValue('plain string');

      const error = await retryWithJitter(fn, { maxAttempts: 1, sleep: noSleep }).catch((e: unknown) => e);

      expect((error as RetryError).lastError.message).toBe('plain string');
    });
  });

  describe('jitterDelay', () => {
    it('should stay within [0, maxDelay)', () => {
      expect(jitterDelay(2000, () => 0)).toBe(0);
      expect(jitterDelay(2000, () => 0.9999)).toBe(1999);
      expect(jitterDelay(0, () => 0.7)).toBe(0);
    });
  });
});
