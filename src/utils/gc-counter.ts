/**
 * Garbage collection counters fed by perf_hooks 'gc' entries
 */

import { PerformanceObserver, constants } from 'perf_hooks';

export interface GcCounts {
  minor: number;
  major: number;
  incremental: number;
  weakCallbacks: number;
}

function gcKind(detail: unknown): number | undefined {
  if (typeof detail === 'object' && detail !== null && 'kind' in detail && typeof detail.kind === 'number') {
    return detail.kind;
  }
  return undefined;
}

export class GcCounter {
  private readonly counts: GcCounts = { minor: 0, major: 0, incremental: 0, weakCallbacks: 0 };
  private observer: PerformanceObserver | null = null;

  start(): void {
    if (this.observer) {
      return;
    }
    this.observer = new PerformanceObserver((list) => {
      for (const entry of list.getEntries()) {
        this.record(gcKind(entry.detail));
      }
    });
    this.observer.observe({ entryTypes: ['gc'] });
  }

  stop(): void {
    this.observer?.disconnect();
    this.observer = null;
  }

  record(kind: number | undefined): void {
    switch (kind) {
      case constants.NODE_PERFORMANCE_GC_MINOR:
        this.counts.minor += 1;
        break;
      case constants.NODE_PERFORMANCE_GC_MAJOR:
        this.counts.major += 1;
        break;
      case constants.NODE_PERFORMANCE_GC_INCREMENTAL:
        this.counts.incremental += 1;
        break;
      case constants.NODE_PERFORMANCE_GC_WEAKCB:
        this.counts.weakCallbacks += 1;
        break;
      default:
        break;
    }
  }

  snapshot(): GcCounts {
    return { ...this.counts };
  }
}
