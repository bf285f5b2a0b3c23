/**
 * Tests for cycle-context (AsyncLocalStorage-based fetch-cycle tracing)
 */

import { runWithCycleContext, getCycleContext, getCycleElapsedMs } from '@/lib/cycle-context';

describe('cycle-context', () => {
  it('is undefined outside a cycle', () => {
    expect(getCycleContext()).toBeUndefined();
    expect(getCycleElapsedMs()).toBeUndefined();
  });

  it('exposes the context inside the callback and returns its value', () => {
    const result = runWithCycleContext({ sequence: 4, viewportKey: 'k', cycleId: 'cycle-4' }, () => {
      expect(getCycleContext()).toMatchObject({ sequence: 4, viewportKey: 'k', cycleId: 'cycle-4' });
      return 42;
    });

    expect(result).toBe(42);
  });

  it('generates a cycle id when none is given', () => {
    runWithCycleContext({ sequence: 1 }, () => {
      expect(getCycleContext()?.cycleId).toMatch(/^[0-9a-f-]{36}$/);
    });
  });

  it('survives awaits', async () => {
    await runWithCycleContext({ sequence: 2 }, async () => {
      await new Promise((resolve) => setTimeout(resolve, 1));
      expect(getCycleContext()?.sequence).toBe(2);
    });
  });

  it('keeps concurrent cycles apart', async () => {
    const seen = await Promise.all(
      [1, 2, 3].map((sequence) =>
        runWithCycleContext({ sequence }, async () => {
          await new Promise((resolve) => setTimeout(resolve, 4 - sequence));
          return getCycleContext()?.sequence;
        }),
      ),
    );

    expect(seen).toEqual([1, 2, 3]);
  });

  it('measures elapsed time from the start time', () => {
    jest.useFakeTimers();
    jest.setSystemTime(10_000);
    runWithCycleContext({ sequence: 1, startTime: 9_000 }, () => {
      expect(getCycleElapsedMs()).toBe(1_000);
    });
    jest.useRealTimers();
  });
});
