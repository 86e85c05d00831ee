import fp from "fastify-plugin";
import type { FastifyError, FastifyInstance } from "fastify";
import type { ErrorResponse } from "@buildrelay/shared";
import { RelayError } from "../errors.js";

function isFastifyClientError(err: unknown): err is FastifyError {
  return (
    err instanceof Error &&
    "statusCode" in err &&
    typeof err.statusCode === "number" &&
    err.statusCode >= 400 &&
    err.statusCode < 500
  );
}

/**
 * Maps thrown errors to `{ error, message }` bodies. RelayErrors carry their
 * own status; Fastify's own client errors (bad JSON, unsupported media type)
 * keep theirs; anything else is logged and reported as an internal error.
 */
export default fp(async function errorsPlugin(fastify: FastifyInstance) {
  fastify.setErrorHandler((err, request, reply) => {
    if (err instanceof RelayError) {
      return reply
        .status(err.statusCode)
        .send({ error: err.code, message: err.message } satisfies ErrorResponse);
    }

    if (isFastifyClientError(err)) {
      return reply
        .status(err.statusCode ?? 400)
        .send({ error: "invalid_request", message: err.message } satisfies ErrorResponse);
    }

    request.log.error({ err }, "Unhandled error");
    return reply
      .status(500)
      .send({ error: "internal_error", message: "Internal error" } satisfies ErrorResponse);
  });
});
