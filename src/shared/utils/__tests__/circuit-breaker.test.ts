/**
 * Unit tests for CircuitBreaker (circuit-breaker.ts)
 */

import { CircuitBreaker, CircuitState, getCircuitBreaker } from '../circuit-breaker';
import { CircuitBreakerError } from '../../types';

jest.mock('../logger', () => ({
  getLogger: jest.fn(() => ({
    debug: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  })),
}));

const embedOk = () => Promise.resolve([0.6, 0.8]);
const embedFails = () => Promise.reject(new Error('ModelStreamErrorException'));

function makeBreaker(overrides: Partial<{ failureThreshold: number; successThreshold: number; timeout: number }> = {}) {
  return new CircuitBreaker('bedrock-embeddings-test', {
    failureThreshold: 3,
    successThreshold: 2,
    timeout: 30_000,
    ...overrides,
  });
}

async function fail(cb: CircuitBreaker, times: number) {
  for (let i = 0; i < times; i++) {
    await expect(cb.execute(embedFails)).rejects.toThrow('ModelStreamErrorException');
  }
}

describe('CircuitBreaker', () => {
  let now: jest.SpyInstance<number, []>;

  beforeEach(() => {
    now = jest.spyOn(Date, 'now').mockReturnValue(1_000_000);
  });

  afterEach(() => {
    now.mockRestore();
  });

  it('passes results through while CLOSED', async () => {
    const cb = makeBreaker();
    await expect(cb.execute(embedOk)).resolves.toEqual([0.6, 0.8]);
    expect(cb.getState()).toEqual({ state: CircuitState.CLOSED, failureCount: 0, successCount: 0 });
  });

  it('stays CLOSED below the failure threshold and forgets failures after a success', async () => {
    const cb = makeBreaker();
    await fail(cb, 2);
    expect(cb.getState().failureCount).toBe(2);
    await cb.execute(embedOk);
    expect(cb.getState().failureCount).toBe(0);
    expect(cb.getState().state).toBe(CircuitState.CLOSED);
  });

  it('opens on the threshold-th consecutive failure and rejects without calling through', async () => {
    const cb = makeBreaker();
    await fail(cb, 3);
    expect(cb.getState().state).toBe(CircuitState.OPEN);

    const call = jest.fn(embedOk);
    const rejection = cb.execute(call);
    await expect(rejection).rejects.toBeInstanceOf(CircuitBreakerError);
    await expect(rejection).rejects.toMatchObject({ service: 'bedrock-embeddings-test' });
    expect(call).not.toHaveBeenCalled();
  });

  it('lets a trial call through once the timeout has elapsed', async () => {
    const cb = makeBreaker();
    await fail(cb, 3);

    now.mockReturnValue(1_000_000 + 30_000);
    await expect(cb.execute(embedOk)).resolves.toEqual([0.6, 0.8]);
    expect(cb.getState().state).toBe(CircuitState.HALF_OPEN);
    expect(cb.getState().successCount).toBe(1);
  });

  it('closes after successThreshold successes in HALF_OPEN', async () => {
    const cb = makeBreaker();
    await fail(cb, 3);
    now.mockReturnValue(1_000_000 + 30_000);

    await cb.execute(embedOk);
    await cb.execute(embedOk);
    expect(cb.getState().state).toBe(CircuitState.CLOSED);
  });

  it('re-opens on any failure in HALF_OPEN', async () => {
    const cb = makeBreaker();
    await fail(cb, 3);
    now.mockReturnValue(1_000_000 + 30_000);

    await fail(cb, 1);
    expect(cb.getState().state).toBe(CircuitState.OPEN);
    await expect(cb.execute(embedOk)).rejects.toBeInstanceOf(CircuitBreakerError);
  });

  it('reset() returns an OPEN breaker to CLOSED', async () => {
    const cb = makeBreaker({ failureThreshold: 1 });
    await fail(cb, 1);
    cb.reset();
    expect(cb.getState()).toEqual({ state: CircuitState.CLOSED, failureCount: 0, successCount: 0 });
    await expect(cb.execute(embedOk)).resolves.toEqual([0.6, 0.8]);
  });
});

describe('getCircuitBreaker', () => {
  it('returns the same instance for the same name', () => {
    expect(getCircuitBreaker('bedrock-a')).toBe(getCircuitBreaker('bedrock-a'));
    expect(getCircuitBreaker('bedrock-a')).not.toBe(getCircuitBreaker('bedrock-b'));
  });
});
