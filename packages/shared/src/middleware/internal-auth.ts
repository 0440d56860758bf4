import type { FastifyReply, FastifyRequest } from "fastify";

export interface InternalAuthConfig {
  /** Expected value of the x-internal-api-key header. Empty disables the check. */
  apiKey: string | undefined;
  /** Paths reachable without the key. Default: ["/", "/health"] */
  publicPaths?: string[];
}

/**
 * onRequest hook requiring a shared key on every non-public route.
 *
 * Usage:
 *   fastify.addHook("onRequest", createInternalAuthHook({ apiKey }));
 */
export function createInternalAuthHook(config: InternalAuthConfig) {
  const publicPaths = new Set(config.publicPaths ?? ["/", "/health"]);

  return async function internalAuthHook(
    request: FastifyRequest,
    reply: FastifyReply,
  ): Promise<FastifyReply | undefined> {
    if (!config.apiKey) return undefined;

    const path = request.url.split("?")[0] ?? request.url;
    if (publicPaths.has(path)) return undefined;

    const providedKey = request.headers["x-internal-api-key"];
    if (providedKey !== config.apiKey) {
      return reply.code(401).send({
        error: {
          code: "UNAUTHORIZED",
          message: "Invalid or missing x-internal-api-key header",
        },
      });
    }
    return undefined;
  };
}
