/**
 * Sketchfab access layer: credentials, token lifecycle, catalog client.
 */

export {
  loadCredentials,
  saveCredentials,
  resolveCredentials,
  defaultCredentialsPath,
  CREDENTIAL_ENV_VARS,
  type StoredCredentials,
  type SaveResult,
  type CredentialOverrides,
  type CredentialSources,
} from "./credentials.js";

export {
  TokenManager,
  DEFAULT_OAUTH_URL,
  EXPIRY_MARGIN_SECONDS,
  DEFAULT_TOKEN_TTL_SECONDS,
  type TokenManagerOptions,
  type RefreshResult,
  type CredentialWriter,
} from "./auth.js";

export {
  SketchfabClient,
  DEFAULT_API_URL,
  clampSearchLimit,
  type SketchfabClientConfig,
} from "./client.js";

export { downloadModel, extractArchive, isZipArchive } from "./download.js";
