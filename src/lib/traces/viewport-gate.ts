/**
 * Viewport change gate: trailing debounce, coarse key check, cycle sequencing.
 *
 * All state here is touched from the event loop only.
 */

import type { Viewport } from '../geo/viewport';
import { logger } from '../logger';

/** Key quantum in degrees (~100m at the equator) */
export const VIEWPORT_KEY_EPSILON = 0.001;

function quantize(value: number): string {
  return (Math.round(value / VIEWPORT_KEY_EPSILON) * VIEWPORT_KEY_EPSILON).toFixed(3);
}

/**
 * Stable key for a viewport: center and spans rounded to 3 decimal degrees.
 * Sub-threshold jitter maps to the same key.
 */
export function viewportKey({ center, span }: Viewport): string {
  return [center.latitude, center.longitude, span.latDelta, span.lonDelta].map(quantize).join(',');
}

export interface GateCycle {
  viewport: Viewport;
  key: string;
  sequence: number;
}

export interface ViewportGateOptions {
  settleMs: number;
  onCycle: (cycle: GateCycle) => void;
}

export class ViewportChangeGate {
  private timer: ReturnType<typeof setTimeout> | null = null;
  private pending: Viewport | null = null;
  private issuedSequence = 0;
  private lastCompletedSequence = 0;
  private lastCompletedKey: string | null = null;

  constructor(private readonly options: ViewportGateOptions) {}

  /**
   * Records the latest viewport and restarts the settle timer
   */
  push(viewport: Viewport): void {
    this.pending = viewport;
    if (this.timer) {
      clearTimeout(this.timer);
    }
    this.timer = setTimeout(() => this.settle(), this.options.settleMs);
  }

  /**
   * Issues a cycle for `viewport` without debouncing or the key check
   */
  force(viewport: Viewport): GateCycle {
    this.cancel();
    return this.issue(viewport, viewportKey(viewport));
  }

  /**
   * Marks a cycle finished. Returns false, and changes nothing, when a newer
   * cycle has been issued since; the caller then drops the cycle's results.
   */
  complete(cycle: GateCycle): boolean {
    if (cycle.sequence !== this.issuedSequence) {
      return false;
    }
    this.lastCompletedSequence = cycle.sequence;
    this.lastCompletedKey = cycle.key;
    return true;
  }

  isLatest(sequence: number): boolean {
    return sequence === this.issuedSequence;
  }

  /** Forget the last completed key so the next settle always fetches */
  invalidate(): void {
    this.lastCompletedKey = null;
  }

  cancel(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    this.pending = null;
  }

  get hasPending(): boolean {
    return this.timer !== null;
  }

  get sequence(): number {
    return this.issuedSequence;
  }

  private settle(): void {
    this.timer = null;
    const viewport = this.pending;
    this.pending = null;
    if (!viewport) return;

    const key = viewportKey(viewport);
    if (key === this.lastCompletedKey) {
      // Back on the rendered viewport: a cycle still in flight is for somewhere else
      if (this.issuedSequence > this.lastCompletedSequence) {
        this.issuedSequence++;
        logger.sync.debug('Returned to rendered viewport, superseding in-flight cycle', {
          viewportKey: key,
          sequence: this.issuedSequence,
        });
        return;
      }
      logger.sync.debug('Viewport unchanged since last fetch, skipping', { viewportKey: key });
      return;
    }

    this.issue(viewport, key);
  }

  private issue(viewport: Viewport, key: string): GateCycle {
    const cycle: GateCycle = { viewport, key, sequence: ++this.issuedSequence };
    this.options.onCycle(cycle);
    return cycle;
  }
}
