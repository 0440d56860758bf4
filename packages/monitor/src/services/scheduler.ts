import { NotFoundError, ServiceUnavailableError } from "@netpulse/shared/errors";
import { createLogger } from "@netpulse/shared/utils";
import type { ProbeResult, Target } from "../types.js";
import type { WorkerPool } from "./worker-pool.js";

const logger = createLogger("monitor:scheduler");

export interface SchedulerOptions {
  pool: WorkerPool;
  probe: (target: Target) => Promise<ProbeResult>;
  /** Called once per completed probe of a target that is still scheduled. */
  onResult: (target: Target, result: ProbeResult) => void;
  /** Fraction of the interval used as the upper bound of the random delay. */
  jitterRatio?: number;
  /** Uniform in [0, 1). */
  random?: () => number;
}

interface Slot {
  target: Target;
  timer: ReturnType<typeof setTimeout> | null;
  inFlight: Promise<ProbeResult | null> | null;
  /** Came due while a probe was in flight. */
  pending: boolean;
}

/**
 * One self-rearming timer per target. Each firing arms the next one before
 * dispatching, so cadence does not drift with probe duration. A target never
 * has more than one probe in flight; a firing that finds one running is
 * queued behind it.
 */
export class Scheduler {
  private readonly slots = new Map<string, Slot>();
  private readonly pool: WorkerPool;
  private readonly probe: (target: Target) => Promise<ProbeResult>;
  private readonly onResult: (target: Target, result: ProbeResult) => void;
  private readonly jitterRatio: number;
  private readonly random: () => number;

  private running = false;
  private closed = false;

  constructor(options: SchedulerOptions) {
    this.pool = options.pool;
    this.probe = options.probe;
    this.onResult = options.onResult;
    this.jitterRatio = options.jitterRatio ?? 0.2;
    this.random = options.random ?? Math.random;

    if (this.jitterRatio < 0 || this.jitterRatio > 1) {
      throw new RangeError(`jitterRatio must be between 0 and 1, got ${this.jitterRatio}`);
    }
  }

  // -----------------------------------------------------------------------
  // Public API
  // -----------------------------------------------------------------------

  get size(): number {
    return this.slots.size;
  }

  isScheduled(targetId: string): boolean {
    return this.slots.has(targetId);
  }

  /** Probes currently in flight or queued in the pool. */
  get inFlight(): number {
    let count = 0;
    for (const slot of this.slots.values()) {
      if (slot.inFlight) count++;
    }
    return count;
  }

  schedule(target: Target): void {
    if (this.slots.has(target.id)) {
      this.reschedule(target);
      return;
    }
    const slot: Slot = { target, timer: null, inFlight: null, pending: false };
    this.slots.set(target.id, slot);
    if (this.running) this.arm(slot, this.jitter(target.intervalMs));
  }

  /** Swap in a new target configuration; a changed interval re-arms the timer. */
  reschedule(target: Target): void {
    const slot = this.slots.get(target.id);
    if (!slot) throw new NotFoundError("Target", target.id);

    const intervalChanged = slot.target.intervalMs !== target.intervalMs;
    slot.target = target;
    if (intervalChanged && slot.timer) {
      clearTimeout(slot.timer);
      this.arm(slot, this.nextDelay(target.intervalMs));
    }
  }

  /** Stop scheduling a target. A probe already in flight is discarded. */
  unschedule(targetId: string): boolean {
    const slot = this.slots.get(targetId);
    if (!slot) return false;
    if (slot.timer) clearTimeout(slot.timer);
    slot.timer = null;
    slot.pending = false;
    this.slots.delete(targetId);
    return true;
  }

  /** Probe a target now, after any probe already in flight for it. */
  async trigger(targetId: string): Promise<ProbeResult> {
    const slot = this.slots.get(targetId);
    if (!slot) throw new NotFoundError("Target", targetId);

    while (slot.inFlight) {
      await slot.inFlight;
    }
    if (this.closed) throw new ServiceUnavailableError("Scheduler is stopped");
    if (this.slots.get(targetId) !== slot) throw new NotFoundError("Target", targetId);

    const inFlight = this.execute(slot);
    slot.inFlight = inFlight;
    const result = await inFlight;
    if (!result) throw new NotFoundError("Target", targetId);
    return result;
  }

  start(): void {
    if (this.running || this.closed) return;
    this.running = true;
    for (const slot of this.slots.values()) {
      if (!slot.timer) this.arm(slot, this.jitter(slot.target.intervalMs));
    }
    logger.info({ targets: this.slots.size, jitterRatio: this.jitterRatio }, "Scheduler started");
  }

  /**
   * Clear every timer and wait for probes in flight. Probes still queued in
   * the pool are skipped.
   */
  async stop(): Promise<void> {
    this.running = false;
    this.closed = true;

    const inFlight: Promise<ProbeResult | null>[] = [];
    for (const slot of this.slots.values()) {
      if (slot.timer) clearTimeout(slot.timer);
      slot.timer = null;
      slot.pending = false;
      if (slot.inFlight) inFlight.push(slot.inFlight);
    }

    await Promise.all(inFlight);
    logger.info("Scheduler stopped");
  }

  // -----------------------------------------------------------------------
  // Internal
  // -----------------------------------------------------------------------

  private jitter(intervalMs: number): number {
    return Math.floor(this.random() * this.jitterRatio * intervalMs);
  }

  private nextDelay(intervalMs: number): number {
    return intervalMs + this.jitter(intervalMs);
  }

  private arm(slot: Slot, delayMs: number): void {
    slot.timer = setTimeout(() => {
      this.fire(slot);
    }, delayMs);
  }

  private fire(slot: Slot): void {
    slot.timer = null;
    if (!this.running || this.slots.get(slot.target.id) !== slot) return;

    this.arm(slot, this.nextDelay(slot.target.intervalMs));
    this.dispatch(slot);
  }

  private dispatch(slot: Slot): void {
    if (slot.inFlight) {
      slot.pending = true;
      return;
    }
    slot.inFlight = this.execute(slot);
  }

  private isCurrent(slot: Slot): boolean {
    return this.slots.get(slot.target.id) === slot;
  }

  private async execute(slot: Slot): Promise<ProbeResult | null> {
    try {
      const result = await this.pool.run(async () => {
        // Skipped when the target was removed or the scheduler stopped while queued
        if (this.closed || !this.isCurrent(slot)) return null;
        return this.probe(slot.target);
      });

      if (result && this.isCurrent(slot)) {
        this.onResult(slot.target, result);
        return result;
      }
      return null;
    } catch (err) {
      logger.error({ err, targetId: slot.target.id }, "Probe dispatch failed");
      return null;
    } finally {
      slot.inFlight = null;
      if (slot.pending && !this.closed && this.isCurrent(slot)) {
        slot.pending = false;
        this.dispatch(slot);
      }
    }
  }
}
