export * from "./types.js";
export { buildApp, type AppOptions } from "./app.js";
export {
  ConfigError,
  loadConfig,
  loadTargetsFile,
  parseTargetsJson,
  seedTargets,
  type SeedReport,
  type ServiceConfig,
} from "./config.js";
export {
  MonitorEngine,
  DEFAULT_MONITOR_CONFIG,
  type MonitorEngineOptions,
  type TransitionListener,
} from "./services/engine.js";
export { TargetRegistry, type TargetRegistryOptions } from "./services/registry.js";
export { ProbeExecutor, parsePingLatency, targetUrl, type ProbeExecutorOptions } from "./services/probe.js";
export { WorkerPool } from "./services/worker-pool.js";
export { Scheduler, type SchedulerOptions } from "./services/scheduler.js";
export { StatusAggregator } from "./services/aggregator.js";
export { HistoryStore, RingBuffer, percentile, MAX_HISTORY_CAPACITY } from "./services/history.js";
export { DrizzleResultRecorder, type ResultRecorder } from "./services/recorder.js";
export {
  RedisTransitionPublisher,
  TRANSITIONS_CHANNEL,
  type TransitionPublisher,
} from "./services/publisher.js";
export {
  validateTargetSpec,
  validateTargetUpdate,
  isValidHost,
  MAX_INTERVAL_MS,
  MAX_TIMER_DELAY_MS,
} from "./services/validation.js";
