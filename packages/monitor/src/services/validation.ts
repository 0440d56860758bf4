import { isIP } from "node:net";
import {
  PROTOCOLS,
  type Protocol,
  type TargetDefaults,
  type TargetUpdate,
} from "../types.js";

export type ValidationResult<T> =
  | { valid: true; value: T; errors: [] }
  | { valid: false; errors: string[] };

/** A spec with every default applied, ready to become a Target. */
export interface NormalizedSpec {
  name: string;
  host: string;
  port: number;
  protocol: Protocol;
  path: string;
  tls: boolean;
  intervalMs: number;
  timeoutMs: number;
  successThreshold: number;
  failureThreshold: number;
  degradedLatencyMs: number | null;
}

// RFC 1123 hostname: dot-separated labels of letters, digits and inner hyphens
const HOSTNAME_REGEX =
  /^(?=.{1,253}\.?$)[a-z0-9](?:[a-z0-9-]{0,61}[a-z0-9])?(?:\.[a-z0-9](?:[a-z0-9-]{0,61}[a-z0-9])?)*\.?$/i;

const ALL_NUMERIC_LABELS = /^[\d.]+$/;

/** Longest delay a Node timer honours; larger delays fire after 1ms. */
export const MAX_TIMER_DELAY_MS = 2_147_483_647;

/** Leaves room for up to 100% jitter on top of the interval. */
export const MAX_INTERVAL_MS = Math.floor(MAX_TIMER_DELAY_MS / 2);

const DURATION_LIMITS: Readonly<Record<string, number>> = {
  intervalMs: MAX_INTERVAL_MS,
  timeoutMs: MAX_TIMER_DELAY_MS,
};

const SPEC_FIELDS = new Set([
  "name",
  "host",
  "port",
  "protocol",
  "path",
  "tls",
  "intervalMs",
  "timeoutMs",
  "successThreshold",
  "failureThreshold",
  "degradedLatencyMs",
]);

const MUTABLE_FIELDS: readonly (keyof TargetUpdate)[] = [
  "name",
  "intervalMs",
  "timeoutMs",
  "successThreshold",
  "failureThreshold",
  "degradedLatencyMs",
];

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

function isPositiveInteger(value: unknown): value is number {
  return typeof value === "number" && Number.isInteger(value) && value > 0;
}

function isMutableField(key: string): key is keyof TargetUpdate {
  return MUTABLE_FIELDS.some((field) => field === key);
}

/**
 * Whether `host` is a hostname, an IPv4 literal or an IPv6 literal.
 * All-numeric names such as "999.1.1.1" only pass as valid IPv4.
 */
export function isValidHost(host: string): boolean {
  if (isIP(host) !== 0) return true;
  if (ALL_NUMERIC_LABELS.test(host)) return false;
  return HOSTNAME_REGEX.test(host);
}

export function parseProtocol(value: unknown): Protocol | null {
  if (typeof value !== "string") return null;
  const upper = value.toUpperCase();
  return PROTOCOLS.find((p) => p === upper) ?? null;
}

function checkPositiveInteger(
  errors: string[],
  field: string,
  value: unknown,
): void {
  if (!isPositiveInteger(value)) {
    errors.push(`${field} must be a positive integer`);
    return;
  }
  const limit = DURATION_LIMITS[field];
  if (limit !== undefined && value > limit) {
    errors.push(`${field} must be at most ${limit}`);
  }
}

function checkName(errors: string[], value: unknown): void {
  if (typeof value !== "string" || value.trim() === "" || value.length > 200) {
    errors.push("name must be a non-empty string of at most 200 characters");
  }
}

function checkDegradedLatency(errors: string[], value: unknown): void {
  if (value !== null && !isPositiveInteger(value)) {
    errors.push("degradedLatencyMs must be a positive integer or null");
  }
}

/**
 * Validate a target spec received from a caller and apply defaults.
 *
 * Checks:
 *   - the body is an object with no unknown fields
 *   - protocol is TCP, HTTP or ICMP (any case)
 *   - host is a hostname or IP literal
 *   - port is 1-65535 for TCP (required) and HTTP (defaults to 80/443)
 *   - path and tls are only given for HTTP, path starts with "/"
 *   - intervalMs is a positive integer no larger than MAX_INTERVAL_MS
 *   - timeoutMs and both thresholds are positive integers when present,
 *     timeoutMs no larger than MAX_TIMER_DELAY_MS
 *   - degradedLatencyMs is a positive integer or null when present
 */
export function validateTargetSpec(
  input: unknown,
  defaults: TargetDefaults,
): ValidationResult<NormalizedSpec> {
  const errors: string[] = [];

  if (!isRecord(input)) {
    return { valid: false, errors: ["Target spec must be a non-null object"] };
  }

  for (const key of Object.keys(input)) {
    if (!SPEC_FIELDS.has(key)) errors.push(`Unknown field: ${key}`);
  }

  const protocol = parseProtocol(input["protocol"]);
  if (!protocol) {
    errors.push(`protocol must be one of ${PROTOCOLS.join(", ")}`);
  }

  const host = input["host"];
  if (typeof host !== "string" || host === "") {
    errors.push("host is required");
  } else if (!isValidHost(host)) {
    errors.push(`host is not a valid hostname or IP address: ${host}`);
  }

  const tlsInput = input["tls"];
  if (tlsInput !== undefined && typeof tlsInput !== "boolean") {
    errors.push("tls must be a boolean");
  }
  const tls = tlsInput === true;

  let port = 0;
  const portInput = input["port"];
  if (protocol === "TCP" || (protocol === "HTTP" && portInput !== undefined)) {
    if (!isPositiveInteger(portInput) || portInput > 65535) {
      errors.push("port must be an integer between 1 and 65535");
    } else {
      port = portInput;
    }
  } else if (protocol === "HTTP") {
    port = tls ? 443 : 80;
  }

  const pathInput = input["path"];
  let path = "/";
  if (pathInput !== undefined) {
    if (protocol !== "HTTP") {
      errors.push("path is only allowed for HTTP targets");
    } else if (typeof pathInput !== "string" || !pathInput.startsWith("/")) {
      errors.push('path must be a string starting with "/"');
    } else {
      path = pathInput;
    }
  }
  if (tlsInput !== undefined && protocol !== null && protocol !== "HTTP") {
    errors.push("tls is only allowed for HTTP targets");
  }

  checkPositiveInteger(errors, "intervalMs", input["intervalMs"]);
  for (const field of ["timeoutMs", "successThreshold", "failureThreshold"] as const) {
    if (input[field] !== undefined) checkPositiveInteger(errors, field, input[field]);
  }
  if (input["degradedLatencyMs"] !== undefined) {
    checkDegradedLatency(errors, input["degradedLatencyMs"]);
  }
  if (input["name"] !== undefined) checkName(errors, input["name"]);

  if (errors.length > 0 || !protocol || typeof host !== "string") {
    return { valid: false, errors };
  }

  const pick = (field: string, fallback: number): number => {
    const value = input[field];
    return isPositiveInteger(value) ? value : fallback;
  };
  const degraded = input["degradedLatencyMs"];
  const name = input["name"];

  return {
    valid: true,
    errors: [],
    value: {
      name: typeof name === "string" ? name.trim() : protocol === "ICMP" ? host : `${host}:${port}`,
      host,
      port,
      protocol,
      path,
      tls,
      intervalMs: pick("intervalMs", 0),
      timeoutMs: pick("timeoutMs", defaults.timeoutMs),
      successThreshold: pick("successThreshold", defaults.successThreshold),
      failureThreshold: pick("failureThreshold", defaults.failureThreshold),
      degradedLatencyMs: isPositiveInteger(degraded) ? degraded : null,
    },
  };
}

/**
 * Validate a partial update. Only schedule, threshold and name fields may
 * change; the address of a target is fixed at creation.
 */
export function validateTargetUpdate(input: unknown): ValidationResult<TargetUpdate> {
  if (!isRecord(input)) {
    return { valid: false, errors: ["Update must be a non-null object"] };
  }

  const errors: string[] = [];
  const update: TargetUpdate = {};
  const keys = Object.keys(input);

  if (keys.length === 0) {
    return { valid: false, errors: ["No fields to update"] };
  }

  for (const key of keys) {
    const value = input[key];
    if (!isMutableField(key)) {
      errors.push(
        SPEC_FIELDS.has(key) || key === "id"
          ? `${key} cannot be changed after creation`
          : `Unknown field: ${key}`,
      );
      continue;
    }

    switch (key) {
      case "name":
        checkName(errors, value);
        if (typeof value === "string") update.name = value.trim();
        break;
      case "degradedLatencyMs":
        checkDegradedLatency(errors, value);
        if (value === null || isPositiveInteger(value)) update.degradedLatencyMs = value;
        break;
      default:
        checkPositiveInteger(errors, key, value);
        if (isPositiveInteger(value)) update[key] = value;
    }
  }

  if (errors.length > 0) return { valid: false, errors };
  return { valid: true, errors: [], value: update };
}
