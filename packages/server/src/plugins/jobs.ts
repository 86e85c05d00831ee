import fp from "fastify-plugin";
import type { FastifyInstance } from "fastify";
import { JobRegistry } from "../services/job-registry.js";
import { JobDriver } from "../services/job-driver.js";
import { PathPolicy } from "../services/path-policy.js";
import { runProcess, type ProcessRunner } from "../services/process-runner.js";

declare module "fastify" {
  interface FastifyInstance {
    jobRegistry: JobRegistry;
    jobDriver: JobDriver;
  }
}

export interface JobsPluginOptions {
  /** Replaces the real process runner; used by tests. */
  runner?: ProcessRunner;
  registry?: JobRegistry;
}

/**
 * Owns the job registry and driver for the lifetime of the server, and
 * periodically evicts the oldest finished jobs.
 */
export default fp(async function jobsPlugin(
  fastify: FastifyInstance,
  opts: JobsPluginOptions,
) {
  const config = fastify.serverConfig;
  const registry = opts.registry ?? new JobRegistry();
  const driver = new JobDriver(
    registry,
    new PathPolicy(config.allowedPaths),
    opts.runner ?? runProcess,
    fastify.log,
    {
      buildTool: config.buildTool,
      logQueueCapacity: config.logQueueCapacity,
      killOnCancel: config.killOnCancel,
    },
  );

  fastify.decorate("jobRegistry", registry);
  fastify.decorate("jobDriver", driver);

  const reclaimTimer = setInterval(() => {
    const evicted = registry.reclaim(config.maxRetainedJobs);
    if (evicted > 0) {
      fastify.log.debug({ evicted }, "Reclaimed finished jobs");
    }
  }, config.reclaimIntervalMs);
  reclaimTimer.unref();

  fastify.addHook("onClose", async () => {
    clearInterval(reclaimTimer);
    await driver.shutdown();
  });
});
