#!/usr/bin/env node
/**
 * mcp-sketchfab-threejs
 *
 * An MCP server that finds downloadable Sketchfab models for three.js
 * scenes and hands back direct glTF archive URLs.
 *
 * Credentials come from flags, SKETCHFAB_* environment variables or
 * ~/.sketchfab_credentials.json; rotated tokens are written back there.
 */

import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";

import { bootstrap } from "./bootstrap.js";
import { createServer, SERVER_VERSION } from "./server.js";
import { createThreejsHandlers } from "./tools/handlers.js";

// ─── CLI Commands ─────────────────────────────────────────────────

const args = process.argv.slice(2);

if (args.includes("--help") || args.includes("-h")) {
  console.log(`mcp-sketchfab-threejs: Sketchfab model search for three.js agents

Usage:
  mcp-sketchfab-threejs [options]     Start MCP server (stdio transport)

Options:
  --sketchfab_access_token <token>    OAuth2 access token
  --sketchfab_refresh_token <token>   OAuth2 refresh token
  --sketchfab_client_id <id>          OAuth2 client ID
  --sketchfab_client_secret <secret>  OAuth2 client secret
  --credentials_file <path>           Stored credentials (default: ~/.sketchfab_credentials.json)
  --help, -h                          Show this help
  --version, -v                       Show version

Environment:
  SKETCHFAB_ACCESS_TOKEN              Used when the matching flag is absent
  SKETCHFAB_REFRESH_TOKEN
  SKETCHFAB_CLIENT_ID
  SKETCHFAB_CLIENT_SECRET
  SKETCHFAB_API_URL                   API base URL (default: https://api.sketchfab.com/v3)
  THREEJS_VERBOSE                     Set "true" for per-request debug logging

Without an access token only threejs_search_models is available.`);
  process.exit(0);
}

if (args.includes("--version") || args.includes("-v")) {
  console.log(SERVER_VERSION);
  process.exit(0);
}

// ─── Bootstrap ────────────────────────────────────────────────────

const ctx = await bootstrap({ argv: args });
const server = createServer({
  handlers: createThreejsHandlers(ctx.client),
  gltfEnabled: ctx.gltfEnabled,
});

// ─── Start Server ─────────────────────────────────────────────────

async function main() {
  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error("[bootstrap] Server running with stdio transport");
}

main().catch((err) => {
  console.error("Fatal:", err);
  process.exit(1);
});
