/**
 * Fetch-cycle context management using AsyncLocalStorage
 * Provides cycle-scoped context (cycle ID, sequence, viewport key) for logging and tracing
 */

import { AsyncLocalStorage } from 'async_hooks';
import { randomUUID } from 'crypto';

export interface CycleContext {
  cycleId: string;
  /** Monotonic per-session sequence number of the fetch cycle */
  sequence: number;
  viewportKey?: string;
  startTime: number;
}

const cycleContextStorage = new AsyncLocalStorage<CycleContext>();

/**
 * Run a function within a fetch-cycle context
 * All code within the callback will have access to the context via getCycleContext()
 *
 * @example
 * ```ts
 * await runWithCycleContext({ sequence: 4, viewportKey: '37.770,-122.420,0.050,0.050' }, async () => {
 *   logger.info('Fetching viewport');
 * });
 * ```
 */
export function runWithCycleContext<T>(
  context: Partial<CycleContext> & Pick<CycleContext, 'sequence'>,
  fn: () => T
): T {
  const fullContext: CycleContext = {
    cycleId: context.cycleId || randomUUID(),
    sequence: context.sequence,
    viewportKey: context.viewportKey,
    startTime: context.startTime || Date.now(),
  };

  return cycleContextStorage.run(fullContext, fn);
}

/**
 * Get the current cycle context
 * Returns undefined if called outside of a fetch cycle
 */
export function getCycleContext(): CycleContext | undefined {
  return cycleContextStorage.getStore();
}

/**
 * Milliseconds elapsed since the current cycle started, if any
 */
export function getCycleElapsedMs(): number | undefined {
  const context = getCycleContext();
  return context ? Date.now() - context.startTime : undefined;
}
