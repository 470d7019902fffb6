/**
 * MCP server definition: tool registration only, no transport.
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";

import type { ToolHandlers } from "./types.js";

export const SERVER_NAME = "threejs";
export const SERVER_VERSION = "0.2.0";

export const SEARCH_TOOL = "threejs_search_models";
export const GLTF_URL_TOOL = "threejs_get_gltf_model_url";

export interface ServerOptions {
  handlers: ToolHandlers;
  /** Register the glTF URL tool; only useful with an access token */
  gltfEnabled: boolean;
}

export function createServer({ handlers, gltfEnabled }: ServerOptions): McpServer {
  const server = new McpServer({
    name: SERVER_NAME,
    version: SERVER_VERSION,
  });

  // Arguments that fail these schemas reach the handlers as undefined, and
  // the handlers answer with an `{error}` payload.

  // ═══════════════════════════════════════════════════════════════════
  // TOOL: threejs_search_models
  // ═══════════════════════════════════════════════════════════════════

  server.registerTool(
    SEARCH_TOOL,
    {
      title: "Search Sketchfab Models",
      description: `Search for 3D models on Sketchfab that match your query.

Only downloadable models are returned, with their available archive formats and sizes.`,
      inputSchema: {
        query: z
          .string()
          .describe("Search term for 3D models (e.g., 'car', 'house', 'character')")
          .optional()
          .catch(undefined),
        limit: z
          .number()
          .describe("Maximum number of results to return (1-24, default: 10)")
          .optional()
          .catch(undefined),
      },
      annotations: {
        readOnlyHint: true,
        destructiveHint: false,
        idempotentHint: true,
        openWorldHint: true,
      },
    },
    async (params) => handlers.searchModels(params)
  );

  // ═══════════════════════════════════════════════════════════════════
  // TOOL: threejs_get_gltf_model_url
  // Needs an OAuth2 access token, so it is only offered when one is set
  // ═══════════════════════════════════════════════════════════════════

  if (gltfEnabled) {
    server.registerTool(
      GLTF_URL_TOOL,
      {
        title: "Get glTF Model URL",
        description:
          "Get direct url of a GLTF file for a Sketchfab model without downloading it",
        inputSchema: {
          model_id: z
            .string()
            .describe("The uid of the model returned in the Sketchfab search response.")
            .optional()
            .catch(undefined),
        },
        annotations: {
          readOnlyHint: true,
          destructiveHint: false,
          idempotentHint: false,
          openWorldHint: true,
        },
      },
      async (params) => handlers.getGltfModelUrl(params)
    );
  }

  return server;
}
