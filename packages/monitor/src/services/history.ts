import type { ProbeResult, TargetMetrics } from "../types.js";

// ---------------------------------------------------------------------------
// RingBuffer
// ---------------------------------------------------------------------------

export const MAX_HISTORY_CAPACITY = 100_000;

/** Fixed-capacity buffer that overwrites its oldest entry when full. */
export class RingBuffer<T> {
  private readonly slots: (T | undefined)[];
  private head = 0;
  private count = 0;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1 || capacity > MAX_HISTORY_CAPACITY) {
      throw new RangeError(`RingBuffer capacity must be an integer between 1 and ${MAX_HISTORY_CAPACITY}, got ${capacity}`);
    }
    this.slots = new Array<T | undefined>(capacity);
  }

  get length(): number {
    return this.count;
  }

  push(item: T): void {
    this.slots[this.head] = item;
    this.head = (this.head + 1) % this.capacity;
    if (this.count < this.capacity) this.count++;
  }

  /** Newest first, at most `limit` entries. */
  newest(limit = this.count): T[] {
    const out: T[] = [];
    const n = Math.min(limit, this.count);
    for (let i = 1; i <= n; i++) {
      const item = this.slots[(this.head - i + this.capacity) % this.capacity];
      if (item !== undefined) out.push(item);
    }
    return out;
  }
}

// ---------------------------------------------------------------------------
// HistoryStore
// ---------------------------------------------------------------------------

/** Nearest-rank percentile. */
export function percentile(values: readonly number[], p: number): number {
  if (values.length === 0) return 0;
  const sorted = [...values].sort((a, b) => a - b);
  const idx = Math.ceil((p / 100) * sorted.length) - 1;
  return sorted[Math.max(0, idx)] ?? 0;
}

export class HistoryStore {
  private readonly windows = new Map<string, RingBuffer<ProbeResult>>();

  constructor(private readonly capacity: number) {}

  append(result: ProbeResult): void {
    let window = this.windows.get(result.targetId);
    if (!window) {
      window = new RingBuffer<ProbeResult>(this.capacity);
      this.windows.set(result.targetId, window);
    }
    window.push(result);
  }

  /** Most recent first. Unknown ids have an empty history. */
  query(targetId: string, limit?: number): ProbeResult[] {
    return this.windows.get(targetId)?.newest(limit) ?? [];
  }

  remove(targetId: string): void {
    this.windows.delete(targetId);
  }

  metrics(targetId: string): TargetMetrics {
    const results = this.query(targetId);
    const latencies: number[] = [];
    let failedChecks = 0;
    for (const r of results) {
      if (r.outcome !== "success") failedChecks++;
      if (r.latencyMs !== null) latencies.push(r.latencyMs);
    }

    const totalChecks = results.length;
    const uptime = totalChecks > 0 ? ((totalChecks - failedChecks) / totalChecks) * 100 : 0;
    const avg =
      latencies.length > 0 ? latencies.reduce((a, b) => a + b, 0) / latencies.length : 0;

    return {
      targetId,
      totalChecks,
      failedChecks,
      uptimePercent: Math.round(uptime * 100) / 100,
      avgLatencyMs: Math.round(avg),
      p50LatencyMs: percentile(latencies, 50),
      p95LatencyMs: percentile(latencies, 95),
      p99LatencyMs: percentile(latencies, 99),
    };
  }
}
