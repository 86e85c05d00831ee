import Fastify from "fastify";
import { loadConfig, validateConfig, type ServerConfig } from "./config.js";
import { detectToolVersion } from "./services/toolchain.js";
import corsPlugin from "./plugins/cors.js";
import errorsPlugin from "./plugins/errors.js";
import authPlugin from "./plugins/auth.js";
import jobsPlugin from "./plugins/jobs.js";
import statusRoutes from "./routes/status.js";
import jobRoutes from "./routes/jobs.js";

declare module "fastify" {
  interface FastifyInstance {
    serverConfig: ServerConfig;
    toolVersion: string;
  }
}

async function main() {
  const config = loadConfig();

  // Validate config before constructing the server
  const issues = validateConfig(config);
  for (const issue of issues) {
    if (issue.level === "error") {
      console.error(`Config error: ${issue.message}`);
    } else {
      console.warn(`Config warning: ${issue.message}`);
    }
  }
  if (issues.some((i) => i.level === "error")) {
    process.exit(1);
  }

  const fastify = Fastify({
    logger: {
      level: config.logLevel,
      transport: {
        target: "pino-pretty",
        options: { translateTime: "HH:MM:ss Z", ignore: "pid,hostname" },
      },
    },
  });

  // The build tool must be usable before any job can be accepted
  let toolVersion: string;
  try {
    toolVersion = await detectToolVersion(config.buildTool);
  } catch (err) {
    fastify.log.fatal({ err }, `${config.buildTool} is required but not available`);
    await fastify.close();
    process.exit(1);
  }
  fastify.log.info(`Build tool: ${toolVersion}`);

  fastify.decorate("serverConfig", config);
  fastify.decorate("toolVersion", toolVersion);

  // Plugins (order matters: errors + auth before routes)
  await fastify.register(corsPlugin);
  await fastify.register(errorsPlugin);
  await fastify.register(authPlugin);
  await fastify.register(jobsPlugin);

  await fastify.register(statusRoutes);
  await fastify.register(jobRoutes);

  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.once(signal, () => {
      fastify.log.info({ signal }, "Shutting down");
      fastify.close().then(
        () => process.exit(0),
        (err: unknown) => {
          fastify.log.error({ err }, "Shutdown failed");
          process.exit(1);
        },
      );
    });
  }

  await fastify.listen({ port: config.port, host: config.host });
  fastify.log.info(`buildrelay listening on http://${config.host}:${config.port}`);

  if (config.apiKey) {
    fastify.log.info("API key authentication enabled");
  } else {
    fastify.log.warn("No API key configured, authentication disabled");
  }
}

main().catch((err) => {
  console.error("Failed to start server:", err);
  process.exit(1);
});
