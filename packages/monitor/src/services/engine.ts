import { NotFoundError } from "@netpulse/shared/errors";
import { createLogger } from "@netpulse/shared/utils";
import type {
  HealthState,
  MonitorConfig,
  ProbeResult,
  StatusSummary,
  StatusTransition,
  Target,
  TargetMetrics,
} from "../types.js";
import { StatusAggregator } from "./aggregator.js";
import { HistoryStore } from "./history.js";
import { ProbeExecutor } from "./probe.js";
import type { TransitionPublisher } from "./publisher.js";
import type { ResultRecorder } from "./recorder.js";
import { TargetRegistry } from "./registry.js";
import { Scheduler } from "./scheduler.js";
import { WorkerPool } from "./worker-pool.js";

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

const logger = createLogger("monitor:engine");

export const DEFAULT_MONITOR_CONFIG: MonitorConfig = {
  maxConcurrentProbes: 16,
  historyCapacity: 100,
  jitterRatio: 0.2,
  defaults: {
    timeoutMs: 5_000,
    successThreshold: 2,
    failureThreshold: 3,
  },
  transitionLogSize: 100,
};

export type TransitionListener = (transition: StatusTransition) => void;

export interface MonitorEngineOptions {
  config?: Partial<MonitorConfig>;
  /** Runs one check. Defaults to a ProbeExecutor. */
  probe?: (target: Target) => Promise<ProbeResult>;
  recorder?: ResultRecorder;
  publisher?: TransitionPublisher;
  random?: () => number;
  idFactory?: () => string;
}

// ---------------------------------------------------------------------------
// MonitorEngine
// ---------------------------------------------------------------------------

/**
 * Owns every monitoring component and the flow between them:
 * registry → scheduler → pool → probe → aggregator → history → sinks.
 *
 * All state changes happen synchronously between awaits on the event loop,
 * so a read never observes a target half added or half removed.
 */
export class MonitorEngine {
  readonly config: MonitorConfig;

  private readonly registry: TargetRegistry;
  private readonly aggregator: StatusAggregator;
  private readonly historyStore: HistoryStore;
  private readonly pool: WorkerPool;
  private readonly scheduler: Scheduler;
  private readonly recorder: ResultRecorder | undefined;
  private readonly publisher: TransitionPublisher | undefined;

  /** Newest first, capped at config.transitionLogSize. */
  private transitionLog: StatusTransition[] = [];
  private listeners = new Set<TransitionListener>();
  private pendingWrites = new Set<Promise<void>>();
  private running = false;

  constructor(options: MonitorEngineOptions = {}) {
    this.config = {
      ...DEFAULT_MONITOR_CONFIG,
      ...options.config,
      defaults: { ...DEFAULT_MONITOR_CONFIG.defaults, ...options.config?.defaults },
    };

    const executor = new ProbeExecutor();
    const probe = options.probe ?? ((target: Target) => executor.probe(target));

    this.registry = new TargetRegistry({
      defaults: this.config.defaults,
      idFactory: options.idFactory,
    });
    this.aggregator = new StatusAggregator({ idFactory: options.idFactory });
    this.historyStore = new HistoryStore(this.config.historyCapacity);
    this.pool = new WorkerPool(this.config.maxConcurrentProbes);
    this.scheduler = new Scheduler({
      pool: this.pool,
      probe,
      onResult: (target, result) => this.handleResult(target, result),
      jitterRatio: this.config.jitterRatio,
      random: options.random,
    });
    this.recorder = options.recorder;
    this.publisher = options.publisher;
  }

  // -----------------------------------------------------------------------
  // Targets
  // -----------------------------------------------------------------------

  add(spec: unknown): Target {
    const id = this.registry.add(spec);
    const target = this.registry.get(id);
    this.aggregator.register(id);
    this.scheduler.schedule(target);
    logger.info(
      { targetId: id, name: target.name, address: target.address, intervalMs: target.intervalMs },
      "Target added",
    );
    return target;
  }

  remove(id: string): void {
    const target = this.registry.remove(id);
    this.scheduler.unschedule(id);
    this.aggregator.remove(id);
    this.historyStore.remove(id);
    logger.info({ targetId: id, name: target.name }, "Target removed");
  }

  update(id: string, partial: unknown): Target {
    const target = this.registry.update(id, partial);
    this.scheduler.reschedule(target);
    logger.info({ targetId: id }, "Target updated");
    return target;
  }

  get(id: string): Target {
    return this.registry.get(id);
  }

  list(): Target[] {
    return this.registry.list();
  }

  // -----------------------------------------------------------------------
  // Status and history
  // -----------------------------------------------------------------------

  status(id: string): HealthState {
    const state = this.aggregator.get(id);
    if (!state) throw new NotFoundError("Target", id);
    return state;
  }

  statuses(): HealthState[] {
    return this.aggregator.list();
  }

  history(id: string, limit?: number): ProbeResult[] {
    this.registry.get(id);
    return this.historyStore.query(id, limit);
  }

  metrics(id: string): TargetMetrics {
    this.registry.get(id);
    return this.historyStore.metrics(id);
  }

  summary(): StatusSummary {
    return this.aggregator.summary();
  }

  transitions(limit?: number): StatusTransition[] {
    return this.transitionLog.slice(0, limit);
  }

  /** Probe a target immediately. Resolves with the result once it is applied. */
  async probeNow(id: string): Promise<ProbeResult> {
    this.registry.get(id);
    return this.scheduler.trigger(id);
  }

  /** Subscribe to status transitions. Returns the unsubscribe function. */
  onTransition(listener: TransitionListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /** Probes in flight or waiting for a worker. */
  get load(): { active: number; pending: number } {
    return { active: this.pool.active, pending: this.pool.pending };
  }

  // -----------------------------------------------------------------------
  // Lifecycle
  // -----------------------------------------------------------------------

  start(): void {
    if (this.running) return;
    this.running = true;
    this.scheduler.start();
    logger.info(
      {
        targets: this.registry.size,
        maxConcurrentProbes: this.config.maxConcurrentProbes,
        historyCapacity: this.config.historyCapacity,
      },
      "Monitor engine started",
    );
  }

  /** Stop scheduling, wait for in-flight probes, then for pending sink writes. */
  async shutdown(): Promise<void> {
    this.running = false;
    await this.scheduler.stop();
    await this.pool.drain();
    await Promise.all(this.pendingWrites);
    logger.info("Monitor engine stopped");
  }

  // -----------------------------------------------------------------------
  // Internal
  // -----------------------------------------------------------------------

  private handleResult(target: Target, result: ProbeResult): void {
    this.historyStore.append(result);
    const transition = this.aggregator.apply(target, result);

    logger.debug(
      { targetId: target.id, outcome: result.outcome, latencyMs: result.latencyMs },
      "Probe completed",
    );

    if (this.recorder) {
      this.track(this.recorder.recordResult(result), "Failed to record probe result", target.id);
    }

    if (transition) this.emitTransition(transition);
  }

  private emitTransition(transition: StatusTransition): void {
    const logMethod =
      transition.severity === "critical" ? "error" : transition.severity === "warning" ? "warn" : "info";
    logger[logMethod](
      { transition },
      `Target ${transition.targetName} is ${transition.to}: ${transition.reason}`,
    );

    this.transitionLog.unshift(transition);
    if (this.transitionLog.length > this.config.transitionLogSize) {
      this.transitionLog.pop();
    }

    if (this.recorder) {
      this.track(
        this.recorder.recordTransition(transition),
        "Failed to record status transition",
        transition.targetId,
      );
    }
    if (this.publisher) {
      this.track(
        this.publisher.publish(transition),
        "Failed to publish status transition",
        transition.targetId,
      );
    }

    for (const listener of this.listeners) {
      try {
        listener(transition);
      } catch (err) {
        logger.error({ err, targetId: transition.targetId }, "Transition listener failed");
      }
    }
  }

  /** Keep a sink write alive until it settles so shutdown can wait for it. */
  private track(write: Promise<void>, message: string, targetId: string): void {
    const tracked = write
      .catch((err: unknown) => {
        logger.error({ err, targetId }, message);
      })
      .finally(() => {
        this.pendingWrites.delete(tracked);
      });
    this.pendingWrites.add(tracked);
  }
}
