import type { FastifyInstance } from "fastify";
import type { ServiceStatusResponse } from "@buildrelay/shared";

export default async function statusRoutes(fastify: FastifyInstance) {
  // GET /status: health check
  fastify.get(
    "/status",
    { preHandler: [fastify.verifyAuth] },
    async (_request, reply) => {
      return reply.send({
        healthy: true,
        toolVersion: fastify.toolVersion,
        jobs: fastify.jobRegistry.counts(),
      } satisfies ServiceStatusResponse);
    },
  );
}
