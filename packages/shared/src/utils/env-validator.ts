/**
 * Environment Variable Validator
 *
 * Checks environment variables against a list of requirements at startup so
 * that a misconfigured process stops before it binds a port.
 */

import { createLogger } from "./logger.js";

const logger = createLogger("env-validator");

export interface EnvRequirement {
  /** Environment variable name */
  name: string;
  /** Whether the variable is required (service won't start without it) */
  required: boolean;
  /** Default value if not set (only for optional vars) */
  default?: string;
  /** Description for error messages */
  description?: string;
  /** Shape the value must match when it is set */
  pattern?: RegExp;
}

export interface EnvValidationResult {
  valid: boolean;
  errors: string[];
  warnings: string[];
  values: Record<string, string>;
}

export interface EnvValidationOptions {
  /** process.exit(1) on validation failure. Default: true */
  exitOnError?: boolean;
  /** Variable source. Default: process.env */
  env?: NodeJS.ProcessEnv;
}

/**
 * Validate environment variables against a set of requirements.
 *
 * @returns Validation result with resolved values (defaults applied)
 */
export function validateEnvironment(
  requirements: EnvRequirement[],
  options: EnvValidationOptions = {},
): EnvValidationResult {
  const { exitOnError = true, env = process.env } = options;
  const errors: string[] = [];
  const warnings: string[] = [];
  const values: Record<string, string> = {};

  for (const req of requirements) {
    const value = env[req.name];
    const suffix = req.description ? ` (${req.description})` : "";

    if (value === undefined || value === "") {
      if (req.required) {
        errors.push(`Missing required env var: ${req.name}${suffix}`);
      } else if (req.default !== undefined) {
        values[req.name] = req.default;
      } else {
        warnings.push(`Optional env var ${req.name} not set${suffix}`);
      }
      continue;
    }

    if (req.pattern && !req.pattern.test(value)) {
      errors.push(`Invalid value for ${req.name}: "${value}"${suffix}`);
      continue;
    }

    values[req.name] = value;
  }

  if (warnings.length > 0) {
    logger.debug({ warnings }, "Environment variable warnings");
  }

  if (errors.length > 0) {
    logger.error({ errors }, "Environment variable validation failed");
    if (exitOnError) {
      process.exit(1);
    }
  }

  return {
    valid: errors.length === 0,
    errors,
    warnings,
    values,
  };
}

// ---------------------------------------------------------------------------
// Service requirement sets
// ---------------------------------------------------------------------------

const POSITIVE_INT = /^[1-9]\d*$/;
const RATIO = /^(0(\.\d+)?|1(\.0+)?)$/;

export const MONITOR_ENV_REQUIREMENTS: EnvRequirement[] = [
  { name: "NETPULSE_PORT", required: false, default: "5000", pattern: POSITIVE_INT, description: "HTTP port" },
  { name: "NETPULSE_HOST", required: false, default: "0.0.0.0", description: "Bind address" },
  { name: "INTERNAL_API_KEY", required: false, description: "Enables x-internal-api-key auth" },
  { name: "DATABASE_URL", required: false, description: "PostgreSQL connection string for the result recorder" },
  { name: "REDIS_URL", required: false, description: "Redis connection string for transition publishing" },
  { name: "MAX_CONCURRENT_PROBES", required: false, default: "16", pattern: POSITIVE_INT },
  { name: "HISTORY_CAPACITY", required: false, default: "100", pattern: POSITIVE_INT },
  { name: "JITTER_RATIO", required: false, default: "0.2", pattern: RATIO, description: "Between 0 and 1" },
  { name: "DEFAULT_TIMEOUT_MS", required: false, default: "5000", pattern: POSITIVE_INT },
  { name: "DEFAULT_SUCCESS_THRESHOLD", required: false, default: "2", pattern: POSITIVE_INT },
  { name: "DEFAULT_FAILURE_THRESHOLD", required: false, default: "3", pattern: POSITIVE_INT },
  { name: "TARGETS_FILE", required: false, description: "JSON file of targets registered at startup" },
];
