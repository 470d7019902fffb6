/**
 * Sketchfab Catalog Client
 *
 * Minimal HTTP client for the Sketchfab v3 API: search, model detail,
 * download links, and the glTF URL lookup built on them.
 */

import { SketchfabError, errorMessage } from "../errors.js";
import type {
  DownloadLinks,
  DownloadResult,
  FetchFn,
  GltfResolution,
  ModelDetail,
  ModelSummary,
} from "../types.js";
import type { TokenManager } from "./auth.js";
import { DOWNLOAD_TIMEOUT_MS, downloadModel } from "./download.js";
import {
  DownloadLinkSchema,
  DownloadLinksSchema,
  ModelDetailSchema,
  SearchModelSchema,
  SearchResponseSchema,
  parseOrDefault,
  type SearchModel,
} from "./parse.js";

// ─── Types ───────────────────────────────────────────────────────

export interface SketchfabClientConfig {
  tokens: TokenManager;
  api_url?: string;
  fetch?: FetchFn;
  default_timeout_ms?: number;
  download_timeout_ms?: number;
}

// ─── Defaults ────────────────────────────────────────────────────

export const DEFAULT_API_URL = "https://api.sketchfab.com/v3";
const DEFAULT_TIMEOUT_MS = 30_000;

export const DEFAULT_SEARCH_LIMIT = 10;
/** Largest page the search endpoint serves */
export const MAX_SEARCH_LIMIT = 24;

const VERBOSE = process.env.THREEJS_VERBOSE === "true";

export function clampSearchLimit(limit?: number): number {
  if (!limit || !Number.isFinite(limit)) return DEFAULT_SEARCH_LIMIT;
  return Math.min(Math.max(Math.trunc(limit), 1), MAX_SEARCH_LIMIT);
}

// ─── Implementation ──────────────────────────────────────────────

export class SketchfabClient {
  private readonly tokens: TokenManager;
  private readonly baseUrl: string;
  private readonly fetchImpl: FetchFn;
  private readonly timeoutMs: number;
  private readonly downloadTimeoutMs: number;

  constructor(config: SketchfabClientConfig) {
    this.tokens = config.tokens;
    this.baseUrl = (config.api_url ?? DEFAULT_API_URL).replace(/\/+$/, "");
    this.fetchImpl = config.fetch ?? ((url, init) => fetch(url, init));
    this.timeoutMs = config.default_timeout_ms ?? DEFAULT_TIMEOUT_MS;
    this.downloadTimeoutMs = config.download_timeout_ms ?? DOWNLOAD_TIMEOUT_MS;
  }

  /**
   * Search for downloadable models.
   *
   * Unauthenticated. Failures are logged and reported as no results.
   */
  async search(query: string, limit?: number): Promise<ModelSummary[]> {
    const count = clampSearchLimit(limit);
    const params = new URLSearchParams({ q: query, count: String(count) });

    let data: unknown;
    try {
      data = await this.request("GET", `/search?${params}`, {});
    } catch (err) {
      console.error(`[sketchfab] Failed to search Sketchfab: ${errorMessage(err)}`);
      return [];
    }

    const { results } = parseOrDefault(SearchResponseSchema, data, {
      results: { models: [] },
    });

    const models: ModelSummary[] = [];
    for (const raw of results.models) {
      const parsed = SearchModelSchema.safeParse(raw);
      if (!parsed.success) continue;

      const model = parsed.data;
      if (!model.isDownloadable) {
        console.error(
          `[sketchfab] Skipping model ${model.name || model.uid} because it is not downloadable`
        );
        continue;
      }
      models.push(toSummary(model));
    }
    return models;
  }

  async getModel(modelId: string): Promise<ModelDetail> {
    const headers = await this.tokens.authHeaders();
    const data = await this.catalogCall(
      "get model details",
      `/models/${encodeURIComponent(modelId)}`,
      headers
    );

    const parsed = ModelDetailSchema.safeParse(data);
    if (!parsed.success) {
      throw remoteFailure("Failed to get model details: response is not an object");
    }
    return parsed.data;
  }

  /** Signed download URLs per archive format. Requires an access token. */
  async getDownloadLinks(modelId: string): Promise<DownloadLinks> {
    if (!this.tokens.hasAccessToken()) {
      throw new SketchfabError(
        "OAuth2 access token is required for downloading models",
        "AUTH_REQUIRED"
      );
    }

    const headers = await this.tokens.authHeaders();
    const data = await this.catalogCall(
      "get download link",
      `/models/${encodeURIComponent(modelId)}/download`,
      headers
    );

    const parsed = DownloadLinksSchema.safeParse(data);
    if (!parsed.success) {
      throw remoteFailure("Failed to get download link: response is not an object");
    }

    const links: DownloadLinks = {};
    for (const [format, value] of Object.entries(parsed.data)) {
      links[format] = DownloadLinkSchema.parse(value);
    }
    return links;
  }

  download(url: string, destination?: string): Promise<DownloadResult> {
    return downloadModel(url, {
      destination,
      fetch: this.fetchImpl,
      timeoutMs: this.downloadTimeoutMs,
    });
  }

  /**
   * Look up the glTF archive URL of a model.
   *
   * "Not downloadable" and "no glTF" are results, not errors. Request
   * failures at either step throw and are not retried.
   */
  async resolveGltfUrl(modelId: string): Promise<GltfResolution> {
    const model = await this.getModel(modelId);
    const modelName = model.name || modelId;

    if (!model.isDownloadable) {
      return { kind: "not_downloadable", modelId, modelName };
    }

    const links = await this.getDownloadLinks(modelId);
    const gltf = links["gltf"];
    if (!gltf) {
      return {
        kind: "format_unavailable",
        modelId,
        modelName,
        availableFormats: Object.keys(links),
      };
    }
    if (!gltf.url) {
      throw remoteFailure(`Download link for '${modelName}' has no glTF url`);
    }

    return { kind: "ok", modelId, modelName, gltfUrl: gltf.url };
  }

  // ─── Private ─────────────────────────────────────────────────

  /** Authenticated catalog call; every failure becomes REMOTE_REQUEST_FAILED. */
  private async catalogCall(
    context: string,
    path: string,
    headers: Record<string, string>
  ): Promise<unknown> {
    try {
      return await this.request("GET", path, headers);
    } catch (err) {
      const status = err instanceof SketchfabError ? err.httpStatus : undefined;
      throw remoteFailure(`Failed to ${context}: ${errorMessage(err)}`, status);
    }
  }

  private async request(
    method: string,
    path: string,
    headers: Record<string, string>
  ): Promise<unknown> {
    const url = `${this.baseUrl}${path}`;
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      const res = await this.fetchImpl(url, {
        method,
        headers: { Accept: "application/json", ...headers },
        signal: controller.signal,
      });

      if (VERBOSE) {
        console.error(`[sketchfab] ${method} ${path} → ${res.status}`);
      }

      if (!res.ok) {
        throw new SketchfabError(
          `Sketchfab ${method} ${path} returned ${res.status}`,
          "REMOTE_REQUEST_FAILED",
          res.status
        );
      }

      return await res.json();
    } finally {
      clearTimeout(timer);
    }
  }
}

// ─── Helpers ───────────────────────────────────────────────────

function toSummary(model: SearchModel): ModelSummary {
  const formats: Record<string, number> = {};
  for (const [format, archive] of Object.entries(model.archives)) {
    if (archive) formats[format] = archive.size;
  }

  return {
    uid: model.uid,
    name: model.name,
    description: model.description,
    viewerUrl: model.viewerUrl,
    embedUrl: model.embedUrl,
    thumbnailUrl: model.thumbnails?.images[0]?.url ?? "",
    ownerName: model.user?.username ?? "",
    isDownloadable: model.isDownloadable,
    formats,
  };
}

function remoteFailure(message: string, httpStatus?: number): SketchfabError {
  console.error(`[sketchfab] REMOTE_REQUEST_FAILED: ${message}`);
  return new SketchfabError(message, "REMOTE_REQUEST_FAILED", httpStatus);
}
