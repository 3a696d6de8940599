import { describe, expect, it } from 'vitest';
import { initialBackoff, nextBackoff } from '../../../../src/infra/sources/backoff.js';

const policy = { initialDelayMs: 250, maxDelayMs: 5000 };

describe('backoff', () => {
  it('starts at the initial delay', () => {
    expect(initialBackoff(policy)).toEqual({ attempt: 0, nextDelayMs: 250 });
  });

  it('doubles after each failure and caps at the maximum', () => {
    const delays: number[] = [];
    let state = initialBackoff(policy);
    for (let i = 0; i < 7; i += 1) {
      delays.push(state.nextDelayMs);
      state = nextBackoff(state, policy);
    }

    expect(delays).toEqual([250, 500, 1000, 2000, 4000, 5000, 5000]);
    expect(state.attempt).toBe(7);
  });
});
