import fp from "fastify-plugin";
import { timingSafeEqual } from "node:crypto";
import type { FastifyInstance, FastifyRequest, FastifyReply } from "fastify";
import { UnauthorizedError } from "../errors.js";

// ---------------------------------------------------------------------------
// Type augmentation: request.caller is set by verifyAuth
// ---------------------------------------------------------------------------

export interface ApiKeyCaller {
  type: "api-key";
}

export interface AnonymousCaller {
  type: "anonymous";
}

export type Caller = ApiKeyCaller | AnonymousCaller;

declare module "fastify" {
  interface FastifyRequest {
    caller?: Caller;
  }
  interface FastifyInstance {
    verifyAuth: (
      request: FastifyRequest,
      reply: FastifyReply,
    ) => Promise<void>;
  }
}

function presentedKey(request: FastifyRequest): string | null {
  const header = request.headers["x-api-key"];
  if (typeof header === "string") return header;

  const authorization = request.headers.authorization;
  if (authorization?.startsWith("Bearer ")) return authorization.slice(7);

  return null;
}

// ---------------------------------------------------------------------------
// Plugin
// ---------------------------------------------------------------------------

export default fp(async function authPlugin(fastify: FastifyInstance) {
  const apiKey = fastify.serverConfig.apiKey;
  const expected = apiKey ? Buffer.from(apiKey, "utf-8") : null;

  async function verifyAuth(
    request: FastifyRequest,
    _reply: FastifyReply,
  ): Promise<void> {
    // No key configured: everyone is let through
    if (!expected) {
      request.caller = { type: "anonymous" };
      return;
    }

    const provided = presentedKey(request);
    if (provided !== null) {
      const a = Buffer.from(provided, "utf-8");
      if (a.length === expected.length && timingSafeEqual(a, expected)) {
        request.caller = { type: "api-key" };
        return;
      }
    }

    throw new UnauthorizedError();
  }

  fastify.decorate("verifyAuth", verifyAuth);
});
