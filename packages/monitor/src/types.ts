// ---------------------------------------------------------------------------
// Monitor Types
// ---------------------------------------------------------------------------

export type Protocol = "TCP" | "HTTP" | "ICMP";

export const PROTOCOLS: readonly Protocol[] = ["TCP", "HTTP", "ICMP"];

export type ProbeOutcome = "success" | "failure" | "timeout" | "error";

export type TargetStatus = "UNKNOWN" | "UP" | "DOWN" | "DEGRADED";

export interface TargetAddress {
  host: string;
  /** 0 for ICMP. */
  port: number;
  protocol: Protocol;
}

/** Input accepted by the registry. Fields are checked, never trusted. */
export interface TargetSpec {
  name?: string;
  host: string;
  port?: number;
  protocol: Protocol | Lowercase<Protocol>;
  /** HTTP only. */
  path?: string;
  /** HTTP only: use https. */
  tls?: boolean;
  intervalMs: number;
  timeoutMs?: number;
  successThreshold?: number;
  failureThreshold?: number;
  degradedLatencyMs?: number | null;
}

/** Fields an update may change. */
export interface TargetUpdate {
  name?: string;
  intervalMs?: number;
  timeoutMs?: number;
  successThreshold?: number;
  failureThreshold?: number;
  degradedLatencyMs?: number | null;
}

export interface Target {
  id: string;
  name: string;
  address: TargetAddress;
  path: string;
  tls: boolean;
  intervalMs: number;
  timeoutMs: number;
  successThreshold: number;
  failureThreshold: number;
  degradedLatencyMs: number | null;
  createdAt: string;
  updatedAt: string;
}

export interface ProbeResult {
  targetId: string;
  /** Probe start, ISO 8601. */
  timestamp: string;
  outcome: ProbeOutcome;
  /** null for timeout and error. */
  latencyMs: number | null;
  message?: string;
  statusCode?: number;
}

export interface HealthState {
  targetId: string;
  status: TargetStatus;
  consecutiveSuccesses: number;
  consecutiveFailures: number;
  lastTransitionAt: string | null;
  lastResultAt: string | null;
  lastLatencyMs: number | null;
}

export type TransitionSeverity = "critical" | "warning" | "info";

export interface StatusTransition {
  id: string;
  targetId: string;
  targetName: string;
  from: TargetStatus;
  to: TargetStatus;
  at: string;
  reason: string;
  severity: TransitionSeverity;
}

export interface StatusSummary {
  up: number;
  down: number;
  degraded: number;
  unknown: number;
  total: number;
}

export interface TargetMetrics {
  targetId: string;
  totalChecks: number;
  failedChecks: number;
  uptimePercent: number;
  avgLatencyMs: number;
  p50LatencyMs: number;
  p95LatencyMs: number;
  p99LatencyMs: number;
}

export interface TargetDefaults {
  timeoutMs: number;
  successThreshold: number;
  failureThreshold: number;
}

export interface MonitorConfig {
  maxConcurrentProbes: number;
  historyCapacity: number;
  /** Upper bound of the random delay added to each interval, as a fraction of it. */
  jitterRatio: number;
  defaults: TargetDefaults;
  /** Size of the in-memory transition log. */
  transitionLogSize: number;
}
