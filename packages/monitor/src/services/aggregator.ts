import { randomUUID } from "node:crypto";
import type {
  HealthState,
  ProbeResult,
  StatusSummary,
  StatusTransition,
  Target,
  TargetStatus,
  TransitionSeverity,
} from "../types.js";

export interface StatusAggregatorOptions {
  idFactory?: () => string;
}

function severityOf(to: TargetStatus): TransitionSeverity {
  if (to === "DOWN") return "critical";
  if (to === "DEGRADED") return "warning";
  return "info";
}

function isSlow(target: Target, result: ProbeResult): boolean {
  return (
    target.degradedLatencyMs !== null &&
    result.latencyMs !== null &&
    result.latencyMs > target.degradedLatencyMs
  );
}

/**
 * Folds probe results into one HealthState per target.
 *
 * A status only changes after `successThreshold` consecutive successes or
 * `failureThreshold` consecutive failures, so a single flapping result never
 * flips it. Latency crossing `degradedLatencyMs` moves UP and DEGRADED
 * between each other without waiting for a run.
 */
export class StatusAggregator {
  private readonly states = new Map<string, HealthState>();
  private readonly idFactory: () => string;

  constructor(options: StatusAggregatorOptions = {}) {
    this.idFactory = options.idFactory ?? randomUUID;
  }

  register(targetId: string): void {
    if (this.states.has(targetId)) return;
    this.states.set(targetId, {
      targetId,
      status: "UNKNOWN",
      consecutiveSuccesses: 0,
      consecutiveFailures: 0,
      lastTransitionAt: null,
      lastResultAt: null,
      lastLatencyMs: null,
    });
  }

  /**
   * Apply one result. Returns the transition it caused, or null when the
   * status is unchanged, the target is unknown or the result is older than
   * the last one applied.
   */
  apply(target: Target, result: ProbeResult): StatusTransition | null {
    const state = this.states.get(target.id);
    if (!state) return null;
    if (state.lastResultAt !== null && Date.parse(result.timestamp) < Date.parse(state.lastResultAt)) {
      return null;
    }

    state.lastResultAt = result.timestamp;
    state.lastLatencyMs = result.latencyMs;

    let next: TargetStatus = state.status;
    let reason = "";

    if (result.outcome === "success") {
      state.consecutiveSuccesses++;
      state.consecutiveFailures = 0;
      const slow = isSlow(target, result);

      switch (state.status) {
        case "UNKNOWN":
        case "DOWN":
          if (state.consecutiveSuccesses >= target.successThreshold) {
            next = slow ? "DEGRADED" : "UP";
            reason = `${state.consecutiveSuccesses} consecutive successful probes`;
          }
          break;
        case "UP":
          if (slow) {
            next = "DEGRADED";
            reason = `latency ${result.latencyMs}ms above ${target.degradedLatencyMs}ms`;
          }
          break;
        case "DEGRADED":
          if (!slow) {
            next = "UP";
            reason = `latency ${result.latencyMs}ms back within limits`;
          }
          break;
      }
    } else {
      state.consecutiveFailures++;
      state.consecutiveSuccesses = 0;
      if (state.status !== "DOWN" && state.consecutiveFailures >= target.failureThreshold) {
        next = "DOWN";
        const detail = result.message ? `: ${result.message}` : "";
        reason = `${state.consecutiveFailures} consecutive failed probes (last ${result.outcome}${detail})`;
      }
    }

    if (next === state.status) return null;

    const from = state.status;
    state.status = next;
    state.lastTransitionAt = result.timestamp;

    return Object.freeze({
      id: this.idFactory(),
      targetId: target.id,
      targetName: target.name,
      from,
      to: next,
      at: result.timestamp,
      reason,
      severity: severityOf(next),
    });
  }

  /** A copy of the current state, or undefined for unknown ids. */
  get(targetId: string): HealthState | undefined {
    const state = this.states.get(targetId);
    return state ? { ...state } : undefined;
  }

  list(): HealthState[] {
    return Array.from(this.states.values(), (s) => ({ ...s }));
  }

  remove(targetId: string): void {
    this.states.delete(targetId);
  }

  summary(): StatusSummary {
    const summary: StatusSummary = { up: 0, down: 0, degraded: 0, unknown: 0, total: 0 };
    for (const state of this.states.values()) {
      summary.total++;
      switch (state.status) {
        case "UP":
          summary.up++;
          break;
        case "DOWN":
          summary.down++;
          break;
        case "DEGRADED":
          summary.degraded++;
          break;
        default:
          summary.unknown++;
      }
    }
    return summary;
  }
}
