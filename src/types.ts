/**
 * mcp-sketchfab-threejs types
 */

// ─── Credentials ─────────────────────────────────────────────────

export interface Credential {
  /** OAuth2 bearer token attached to authenticated catalog calls */
  accessToken?: string;
  /** Long-lived token exchanged for a new access token */
  refreshToken?: string;
  /** OAuth2 client identity, needed for the refresh grant */
  clientId?: string;
  clientSecret?: string;
  /** Access token expiry in epoch seconds. Absent or 0 means unknown. */
  tokenExpiry?: number;
}

export type CredentialField = Exclude<keyof Credential, "tokenExpiry">;

// ─── Catalog ─────────────────────────────────────────────────────

export interface ModelSummary {
  uid: string;
  name: string;
  description: string;
  viewerUrl: string;
  embedUrl: string;
  thumbnailUrl: string;
  /** Username of the model's author */
  ownerName: string;
  isDownloadable: boolean;
  /** Archive format name → size in bytes */
  formats: Record<string, number>;
}

export interface ModelDetail {
  uid: string;
  name: string;
  description: string;
  viewerUrl: string;
  isDownloadable: boolean;
}

export interface DownloadLink {
  url: string;
  size: number;
  /** Seconds until the signed URL stops working (0 if not reported) */
  expires: number;
}

export type DownloadLinks = Record<string, DownloadLink>;

export interface DownloadResult {
  localPath: string;
  isArchive: boolean;
  /** Extraction directory, `null` when the payload is not an archive */
  extractedDir: string | null;
  /** Entry names in JSZip's order (directory entries included) */
  extractedEntries: string[];
}

export type GltfResolution =
  | { kind: "ok"; modelId: string; modelName: string; gltfUrl: string }
  | { kind: "not_downloadable"; modelId: string; modelName: string }
  | {
      kind: "format_unavailable";
      modelId: string;
      modelName: string;
      availableFormats: string[];
    };

/** The HTTP capability every remote-facing component is built on. */
export type FetchFn = (url: string, init?: RequestInit) => Promise<Response>;

// ─── Tools ───────────────────────────────────────────────────────

export interface ToolResult {
  [key: string]: unknown;
  content: Array<{ type: "text"; text: string }>;
  isError?: boolean;
}

/** Tool arguments as they arrive; handlers reject missing required ones. */
export interface SearchModelsParams {
  query?: string;
  limit?: number;
}

export interface GetGltfModelUrlParams {
  model_id?: string;
}

export interface ToolHandlers {
  searchModels(params: SearchModelsParams): Promise<ToolResult>;
  getGltfModelUrl(params: GetGltfModelUrlParams): Promise<ToolResult>;
}
