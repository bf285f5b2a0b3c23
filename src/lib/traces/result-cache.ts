/**
 * Diff-stable result cache
 *
 * Holds the identity set of what the renderer currently shows and only reports a
 * change when the next result has a different set of ids. Order and object
 * identity are ignored; a change replaces the whole list.
 */

import type { TraceRecord } from './types';

export interface ResultDiff {
  changed: boolean;
  records: readonly TraceRecord[];
}

export function identitySet(records: readonly TraceRecord[]): Set<string> {
  return new Set(records.map((record) => record.id));
}

export function sameIdentitySet(a: ReadonlySet<string>, b: ReadonlySet<string>): boolean {
  if (a.size !== b.size) return false;
  for (const id of a) {
    if (!b.has(id)) return false;
  }
  return true;
}

export class RenderedTraceCache {
  private ids: ReadonlySet<string> = new Set();
  private records: readonly TraceRecord[] = [];

  apply(next: readonly TraceRecord[]): ResultDiff {
    const nextIds = identitySet(next);
    if (sameIdentitySet(this.ids, nextIds)) {
      return { changed: false, records: this.records };
    }

    this.ids = nextIds;
    this.records = next;
    return { changed: true, records: next };
  }

  current(): readonly TraceRecord[] {
    return this.records;
  }

  clear(): void {
    this.ids = new Set();
    this.records = [];
  }

  get size(): number {
    return this.ids.size;
  }
}
