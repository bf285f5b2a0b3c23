/**
 * One map-viewing session: viewport events in, changed record lists out.
 *
 * renderer → onViewportChanged → gate (debounce + key) → planner/orchestrator
 *   → sequence check → diff cache → onFetchResult
 *
 * The session owns the cell cache and hands it to the orchestrator each cycle.
 */

import { runWithCycleContext } from '../cycle-context';
import { engineConfig } from '../env';
import { isInvalidViewportError } from '../errors';
import { parseViewport, type Viewport } from '../geo/viewport';
import { logger } from '../logger';
import { createCellCache, type CellCache } from './cell-cache';
import { fetchViewportTraces, type ViewportFetchResult } from './fetch-orchestrator';
import { RenderedTraceCache } from './result-cache';
import type { TraceReader, TraceRecord } from './types';
import { ViewportChangeGate, type GateCycle } from './viewport-gate';

export interface CycleReport {
  sequence: number;
  viewportKey: string;
  result: ViewportFetchResult;
  /** False when the result was dropped as stale */
  applied: boolean;
  /** True when the renderer was notified */
  rendered: boolean;
}

export interface TraceMapSessionOptions {
  store: TraceReader;
  onFetchResult: (records: readonly TraceRecord[]) => void;
  /** Observability hook, called after every finished cycle */
  onCycleComplete?: (report: CycleReport) => void;
  debounceMs?: number;
  cellQueryTimeoutMs?: number;
  globalSampleLimit?: number;
  cellCacheTtlMs?: number;
  /** Replaces the cache built from cellCacheTtlMs */
  cellCache?: CellCache;
  maxPrefixes?: number;
}

export class TraceMapSession {
  private readonly gate: ViewportChangeGate;
  private readonly rendered = new RenderedTraceCache();
  private readonly cellCache: CellCache;
  private readonly inFlight = new Set<Promise<void>>();
  private lastViewport: Viewport | null = null;
  private disposed = false;

  constructor(private readonly options: TraceMapSessionOptions) {
    this.cellCache =
      options.cellCache ?? createCellCache(options.cellCacheTtlMs ?? engineConfig.cellCacheTtlMs);
    this.gate = new ViewportChangeGate({
      settleMs: options.debounceMs ?? engineConfig.debounceMs,
      onCycle: (cycle) => this.track(this.runCycle(cycle)),
    });
  }

  /**
   * Renderer push. Invalid viewports are logged and ignored.
   */
  onViewportChanged(input: unknown): void {
    if (this.disposed) return;

    try {
      const viewport = parseViewport(input);
      this.lastViewport = viewport;
      this.gate.push(viewport);
    } catch (error) {
      if (!isInvalidViewportError(error)) throw error;
      logger.sync.warn('Ignoring invalid viewport', { issues: error.issues });
    }
  }

  /**
   * Re-fetches the last viewport now, skipping the debounce, the key check and cached cells
   */
  async refresh(): Promise<void> {
    if (this.disposed || !this.lastViewport) return;

    this.cellCache.clear();
    this.gate.force(this.lastViewport);
    await this.whenIdle();
  }

  current(): readonly TraceRecord[] {
    return this.rendered.current();
  }

  /** Resolves once every in-flight cycle has settled */
  async whenIdle(): Promise<void> {
    await Promise.all([...this.inFlight]);
  }

  dispose(): void {
    this.disposed = true;
    this.gate.cancel();
    this.cellCache.clear();
  }

  private track(task: Promise<void>): void {
    this.inFlight.add(task);
    task.finally(() => this.inFlight.delete(task)).catch((error: unknown) => {
      logger.sync.error('Fetch cycle bookkeeping failed', {
        error: error instanceof Error ? error.message : 'Unknown error',
      });
    });
  }

  private runCycle(cycle: GateCycle): Promise<void> {
    return runWithCycleContext({ sequence: cycle.sequence, viewportKey: cycle.key }, async () => {
      try {
        this.cellCache.sweep();
        const result = await fetchViewportTraces(this.options.store, cycle.viewport, {
          cellQueryTimeoutMs: this.options.cellQueryTimeoutMs ?? engineConfig.cellQueryTimeoutMs,
          globalSampleLimit: this.options.globalSampleLimit ?? engineConfig.globalSampleLimit,
          maxPrefixes: this.options.maxPrefixes,
          cellCache: this.cellCache,
        });

        const applied = !this.disposed && this.gate.complete(cycle);
        if (!applied) {
          logger.sync.debug('Discarding stale cycle result', {
            latestSequence: this.gate.sequence,
          });
        }

        const rendered = applied && this.render(result.records);
        this.report({ sequence: cycle.sequence, viewportKey: cycle.key, result, applied, rendered });
      } catch (error) {
        logger.sync.error('Fetch cycle failed', {
          error: error instanceof Error ? error.message : 'Unknown error',
        });
      }
    });
  }

  private render(records: readonly TraceRecord[]): boolean {
    const diff = this.rendered.apply(records);
    if (!diff.changed) {
      logger.sync.debug('Result unchanged, render suppressed', { records: records.length });
      return false;
    }

    try {
      this.options.onFetchResult(diff.records);
    } catch (error) {
      logger.sync.error('onFetchResult callback threw', {
        error: error instanceof Error ? error.message : 'Unknown error',
      });
    }
    return true;
  }

  private report(report: CycleReport): void {
    if (!this.options.onCycleComplete) return;
    try {
      this.options.onCycleComplete(report);
    } catch (error) {
      logger.sync.error('onCycleComplete callback threw', {
        error: error instanceof Error ? error.message : 'Unknown error',
      });
    }
  }
}
