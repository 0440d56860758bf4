export { createLogger, type Logger, type LoggerOptions } from "./logger.js";
export {
  validateEnvironment,
  type EnvRequirement,
  type EnvValidationResult,
  type EnvValidationOptions,
  MONITOR_ENV_REQUIREMENTS,
} from "./env-validator.js";
