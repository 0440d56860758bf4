// ---------------------------------------------------------------------------
// netpulse error taxonomy
// ---------------------------------------------------------------------------
// Errors raised at the registry boundary and by lookups. Probe outcomes are
// never errors: they travel as ProbeResult values.
// ---------------------------------------------------------------------------

export type ErrorCode = "VALIDATION_ERROR" | "NOT_FOUND" | "BAD_REQUEST" | "UNAUTHORIZED" | "SERVICE_UNAVAILABLE" | "INTERNAL_ERROR";

/**
 * Base class for errors that map onto an HTTP response.
 */
export class AppError extends Error {
  readonly statusCode: number;
  readonly code: ErrorCode;

  constructor(message: string, statusCode: number, code: ErrorCode) {
    super(message);
    this.name = new.target.name;
    this.statusCode = statusCode;
    this.code = code;
  }
}

/**
 * A target spec or update was rejected. `details` lists every problem found,
 * not only the first.
 */
export class ValidationError extends AppError {
  readonly details: string[];

  constructor(details: string[] | string) {
    const list = Array.isArray(details) ? details : [details];
    super(list.length === 1 ? (list[0] ?? "Invalid input") : `Invalid input: ${list.join("; ")}`, 400, "VALIDATION_ERROR");
    this.details = list;
  }
}

export class NotFoundError extends AppError {
  readonly resource: string;
  readonly id: string;

  constructor(resource: string, id: string) {
    super(`${resource} not found: ${id}`, 404, "NOT_FOUND");
    this.resource = resource;
    this.id = id;
  }
}

/** The service is shutting down and takes no more work. */
export class ServiceUnavailableError extends AppError {
  constructor(message: string) {
    super(message, 503, "SERVICE_UNAVAILABLE");
  }
}

export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}
