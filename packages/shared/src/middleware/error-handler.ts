import type { FastifyError, FastifyReply, FastifyRequest } from "fastify";
import { isAppError, ValidationError, type ErrorCode } from "../errors/index.js";
import { createLogger } from "../utils/logger.js";

const logger = createLogger("api-error-handler");

export interface ApiErrorBody {
  error: {
    code: ErrorCode;
    message: string;
    details?: string[];
  };
}

function codeForStatus(statusCode: number): ErrorCode {
  if (statusCode === 401) return "UNAUTHORIZED";
  if (statusCode === 404) return "NOT_FOUND";
  if (statusCode >= 400 && statusCode < 500) return "BAD_REQUEST";
  return "INTERNAL_ERROR";
}

/**
 * Fastify error handler for the netpulse API.
 *
 * AppError subclasses keep their status and code; Fastify's own 4xx errors
 * (body parsing, schema validation) become BAD_REQUEST; anything else is a
 * 500 whose message is not exposed.
 *
 * Usage:
 *   fastify.setErrorHandler(apiErrorHandler);
 */
export function apiErrorHandler(
  error: FastifyError,
  request: FastifyRequest,
  reply: FastifyReply,
): void {
  let statusCode: number;
  let body: ApiErrorBody;

  if (isAppError(error)) {
    statusCode = error.statusCode;
    body = { error: { code: error.code, message: error.message } };
    if (error instanceof ValidationError) {
      body.error.details = error.details;
    }
  } else {
    statusCode = error.statusCode ?? 500;
    const code = codeForStatus(statusCode);
    body = {
      error: {
        code,
        message:
          statusCode >= 500
            ? "Internal server error. Please try again later."
            : error.message || "An error occurred processing the request.",
      },
    };
  }

  const log = statusCode >= 500 ? logger.error.bind(logger) : logger.warn.bind(logger);
  log(
    {
      err: error,
      url: request.url,
      method: request.method,
      statusCode,
    },
    "API request error",
  );

  reply.code(statusCode).send(body);
}
