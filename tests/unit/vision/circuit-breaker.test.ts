/**
 * Unit tests for the vision circuit breaker and server-error classification
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import {
  CircuitBreaker,
  CircuitBreakerOpenError,
  CircuitState,
  isServerError,
  VisionAPIError,
  VisionTimeoutError,
  ExtractionError,
} from '../../../src/services/vision/index.js';

const serverFailure = (): Promise<never> =>
  Promise.reject(new VisionAPIError('Ollama API error 503: Service Unavailable. ', 503));

describe('isServerError', () => {
  it('accepts 5xx and 429 API errors', () => {
    expect(isServerError(new VisionAPIError('Ollama API error 500: Internal Server Error. ', 500))).toBe(true);
    expect(isServerError(new VisionAPIError('Ollama API error 429: Too Many Requests. ', 429))).toBe(true);
  });

  it('accepts timeouts and connection failures', () => {
    expect(isServerError(new VisionTimeoutError('Ollama request timed out after 10ms', 10))).toBe(true);
    expect(isServerError(new TypeError('fetch failed', { cause: new Error('connect ECONNREFUSED') }))).toBe(true);
  });

  it('accepts a model that is still loading', () => {
    expect(isServerError(new Error('model is loading, try again'))).toBe(true);
  });

  it('rejects client-side failures', () => {
    expect(isServerError(new VisionAPIError('Ollama API error 404: Not Found. model not found', 404))).toBe(false);
    expect(isServerError(new ExtractionError('Vision model output is not valid JSON (3 chars)'))).toBe(false);
    expect(isServerError('503')).toBe(false);
  });
});

describe('CircuitBreaker', () => {
  let breaker: CircuitBreaker;

  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2026-01-01T00:00:00Z'));
    breaker = new CircuitBreaker({ failureThreshold: 2, recoveryTimeMs: 1000 });
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('starts closed and passes results through', async () => {
    await expect(breaker.execute(() => Promise.resolve('ok'))).resolves.toBe('ok');
    expect(breaker.getState()).toBe(CircuitState.CLOSED);
  });

  it('opens after the failure threshold and rejects further calls', async () => {
    await expect(breaker.execute(serverFailure)).rejects.toThrow(VisionAPIError);
    expect(breaker.getState()).toBe(CircuitState.CLOSED);
    await expect(breaker.execute(serverFailure)).rejects.toThrow(VisionAPIError);
    expect(breaker.isOpen()).toBe(true);

    const fn = vi.fn(() => Promise.resolve('never'));
    await expect(breaker.execute(fn)).rejects.toThrow(CircuitBreakerOpenError);
    expect(fn).not.toHaveBeenCalled();
  });

  it('does not count client-side errors', async () => {
    for (let i = 0; i < 3; i++) {
      await expect(
        breaker.execute(() => Promise.reject(new ExtractionError('bad output')))
      ).rejects.toThrow(ExtractionError);
    }
    expect(breaker.getStatus().failureCount).toBe(0);
    expect(breaker.getState()).toBe(CircuitState.CLOSED);
  });

  it('moves to HALF_OPEN after the recovery window and closes after two successes', async () => {
    await expect(breaker.execute(serverFailure)).rejects.toThrow();
    await expect(breaker.execute(serverFailure)).rejects.toThrow();

    vi.advanceTimersByTime(1000);
    expect(breaker.getState()).toBe(CircuitState.HALF_OPEN);

    await breaker.execute(() => Promise.resolve(1));
    expect(breaker.getState()).toBe(CircuitState.HALF_OPEN);
    await breaker.execute(() => Promise.resolve(2));
    expect(breaker.getState()).toBe(CircuitState.CLOSED);
  });

  it('doubles the recovery window when HALF_OPEN fails again', async () => {
    await expect(breaker.execute(serverFailure)).rejects.toThrow();
    await expect(breaker.execute(serverFailure)).rejects.toThrow();
    expect(breaker.getRecoveryTimeMs()).toBe(1000);

    vi.advanceTimersByTime(1000);
    await expect(breaker.execute(serverFailure)).rejects.toThrow();

    expect(breaker.isOpen()).toBe(true);
    expect(breaker.getRecoveryTimeMs()).toBe(2000);
    expect(breaker.getStatus().timeToRecovery).toBe(2000);
  });

  it('reset closes the breaker', async () => {
    await expect(breaker.execute(serverFailure)).rejects.toThrow();
    await expect(breaker.execute(serverFailure)).rejects.toThrow();
    breaker.reset();
    expect(breaker.getStatus()).toEqual({
      state: CircuitState.CLOSED,
      failureCount: 0,
      lastFailureTime: null,
      timeToRecovery: null,
    });
  });
});
