/**
 * Tests for the concurrency gate
 */

import { describe, it, expect } from 'vitest';
import { ConcurrencyGate } from '../concurrency-gate';

function deferred() {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe('ConcurrencyGate', () => {
  it('should never run more tasks than the limit', async () => {
    const gate = new ConcurrencyGate(2);
    let active = 0;
    let peak = 0;

    await Promise.all(
      Array.from({ length: 6 }, () =>
        gate.run(async () => {
          active++;
          peak = Math.max(peak, active);
          await new Promise((r) => setTimeout(r, 5));
          active--;
        })
      )
    );

    expect(peak).toBe(2);
    expect(gate.inFlight).toBe(0);
  });

  it('should release waiters in FIFO order', async () => {
    const gate = new ConcurrencyGate(1);
    const blocker = deferred();
    const order: number[] = [];

    const first = gate.run(() => blocker.promise);
    const rest = [1, 2, 3].map((n) => gate.run(async () => void order.push(n)));

    expect(gate.waiting).toBe(3);
    blocker.resolve();
    await Promise.all([first, ...rest]);

    expect(order).toEqual([1, 2, 3]);
  });

  it('should free the slot when a task throws', async () => {
    const gate = new ConcurrencyGate(1);

    await expect(gate.run(async () => Promise.reject(new Error('boom')))).rejects.toThrow('boom');
    expect(await gate.run(async () => 'next')).toBe('next');
  });

  it('should reject a limit below one', () => {
    expect(() => new ConcurrencyGate(0)).toThrow(RangeError);
  });
});
