/**
 * Sketchfab Tool Handlers
 *
 * Maps MCP tool calls onto the catalog client. Every outcome, including
 * every failure, comes back as JSON text content; nothing thrown here
 * reaches the transport.
 */

import { errorMessage } from "../errors.js";
import type { SketchfabClient } from "../sketchfab/client.js";
import type {
  GetGltfModelUrlParams,
  GltfResolution,
  SearchModelsParams,
  ToolHandlers,
  ToolResult,
} from "../types.js";

export type CatalogClient = Pick<SketchfabClient, "search" | "resolveGltfUrl">;

// ─── Response Helpers ─────────────────────────────────────────────

function json(data: unknown): ToolResult {
  return {
    content: [{ type: "text", text: JSON.stringify(data, null, 2) }],
  };
}

function error(message: string, extra: Record<string, unknown> = {}): ToolResult {
  return { ...json({ error: message, ...extra }), isError: true };
}

function renderGltf(result: GltfResolution): ToolResult {
  switch (result.kind) {
    case "ok":
      return json({
        model_name: result.modelName,
        model_id: result.modelId,
        gltf_url: result.gltfUrl,
      });
    case "not_downloadable":
      return error(`Model '${result.modelName}' is not downloadable.`);
    case "format_unavailable":
      return error(
        `GLTF format is not available for model '${result.modelName}'.`,
        { available_formats: result.availableFormats }
      );
  }
}

// ─── Factory ──────────────────────────────────────────────────────

export function createThreejsHandlers(client: CatalogClient): ToolHandlers {
  return {
    async searchModels(params: SearchModelsParams): Promise<ToolResult> {
      if (typeof params.query !== "string") {
        return error("Missing required argument: query");
      }
      try {
        const models = await client.search(params.query, params.limit);
        return json({ models });
      } catch (err) {
        console.error(`[tools] Error invoking threejs_search_models: ${errorMessage(err)}`);
        return error(errorMessage(err));
      }
    },

    async getGltfModelUrl(params: GetGltfModelUrlParams): Promise<ToolResult> {
      if (!params.model_id) {
        return error("Missing required argument: model_id");
      }
      try {
        return renderGltf(await client.resolveGltfUrl(params.model_id));
      } catch (err) {
        console.error(
          `[tools] Error invoking threejs_get_gltf_model_url: ${errorMessage(err)}`
        );
        return error(errorMessage(err));
      }
    },
  };
}
