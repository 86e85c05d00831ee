#!/usr/bin/env node

// ---------------------------------------------------------------------------
// buildrelay MCP server: stdio transport for coding agents.
// All logging goes to stderr (stdout is reserved for MCP JSON-RPC).
// ---------------------------------------------------------------------------

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { FetchRelayApiClient } from "./http-client.js";
import { registerJobTools } from "./tools/job-tools.js";

const BASE_URL = process.env.BUILDRELAY_URL ?? "http://127.0.0.1:9090";
const API_KEY = process.env.BUILDRELAY_API_KEY;

const server = new McpServer({
  name: "buildrelay",
  version: "0.1.0",
});

const client = new FetchRelayApiClient(BASE_URL, API_KEY);

registerJobTools(server, client);

const transport = new StdioServerTransport();
await server.connect(transport);

console.error(`buildrelay MCP server running (API: ${BASE_URL})`);
