import { describe, it } from "node:test";
import assert from "node:assert/strict";
import Fastify from "fastify";
import type { FastifyInstance } from "fastify";
import type { ServerConfig } from "../../config.js";
import errorsPlugin from "../errors.js";
import authPlugin from "../auth.js";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const API_KEY = "test-secret";

async function buildApp(apiKey: string | null): Promise<FastifyInstance> {
  const app = Fastify({ logger: false });

  app.decorate("serverConfig", {
    port: 0,
    host: "127.0.0.1",
    apiKey,
    logLevel: "silent",
    allowedPaths: null,
    buildTool: "fakebuild",
    maxRetainedJobs: 100,
    reclaimIntervalMs: 60_000,
    logQueueCapacity: 100,
    logPollIntervalMs: 100,
    killOnCancel: false,
  } satisfies ServerConfig);

  await app.register(errorsPlugin);
  await app.register(authPlugin);

  // Test route that requires auth
  app.get("/api/test", { preHandler: [app.verifyAuth] }, async (request) => {
    return { caller: request.caller };
  });

  return app;
}

// ---------------------------------------------------------------------------
// API key auth
// ---------------------------------------------------------------------------

describe("Auth plugin: API key", () => {
  it("accepts the key in X-API-Key", async () => {
    const app = await buildApp(API_KEY);
    const res = await app.inject({ method: "GET", url: "/api/test", headers: { "x-api-key": API_KEY } });
    assert.equal(res.statusCode, 200);
    assert.deepEqual(res.json(), { caller: { type: "api-key" } });
    await app.close();
  });

  it("accepts the key as a Bearer token", async () => {
    const app = await buildApp(API_KEY);
    const res = await app.inject({
      method: "GET",
      url: "/api/test",
      headers: { authorization: `Bearer ${API_KEY}` },
    });
    assert.equal(res.statusCode, 200);
    await app.close();
  });

  it("rejects a missing key", async () => {
    const app = await buildApp(API_KEY);
    const res = await app.inject({ method: "GET", url: "/api/test" });
    assert.equal(res.statusCode, 401);
    assert.deepEqual(res.json(), { error: "unauthorized", message: "Missing or invalid API key" });
    await app.close();
  });

  it("rejects a wrong key of the same length", async () => {
    const app = await buildApp(API_KEY);
    const res = await app.inject({ method: "GET", url: "/api/test", headers: { "x-api-key": "test-secreT" } });
    assert.equal(res.statusCode, 401);
    await app.close();
  });

  it("rejects a wrong key of a different length", async () => {
    const app = await buildApp(API_KEY);
    const res = await app.inject({
      method: "GET",
      url: "/api/test",
      headers: { authorization: "Bearer nope" },
    });
    assert.equal(res.statusCode, 401);
    await app.close();
  });
});

describe("Auth plugin: no key configured", () => {
  it("lets every request through as anonymous", async () => {
    const app = await buildApp(null);
    const res = await app.inject({ method: "GET", url: "/api/test" });
    assert.equal(res.statusCode, 200);
    assert.deepEqual(res.json(), { caller: { type: "anonymous" } });
    await app.close();
  });
});
