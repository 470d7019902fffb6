/**
 * Sketchfab Credential Management
 *
 * Reads/writes the persisted OAuth2 record (default
 * ~/.sketchfab_credentials.json) and layers it under environment
 * variables and explicit overrides.
 */

import { mkdir, readFile, rename, rm, writeFile } from "node:fs/promises";
import { dirname, join } from "node:path";
import { homedir } from "node:os";

import { errorMessage } from "../errors.js";
import type { Credential, CredentialField } from "../types.js";
import { CredentialsFileSchema, type CredentialsFile } from "./parse.js";

// ─── Types ───────────────────────────────────────────────────────

export interface StoredCredentials {
  credential: Credential;
  path: string;
  status: "loaded" | "missing" | "invalid";
}

export type SaveResult =
  | { ok: true; path: string }
  | { ok: false; code: "CREDENTIALS_WRITE_FAILED"; message: string };

export type CredentialOverrides = Partial<Record<CredentialField, string>>;

export interface CredentialSources {
  /** Explicit values, e.g. from command-line flags */
  overrides?: CredentialOverrides;
  env?: NodeJS.ProcessEnv;
  stored?: Credential;
}

export const CREDENTIAL_ENV_VARS: Record<CredentialField, string> = {
  accessToken: "SKETCHFAB_ACCESS_TOKEN",
  refreshToken: "SKETCHFAB_REFRESH_TOKEN",
  clientId: "SKETCHFAB_CLIENT_ID",
  clientSecret: "SKETCHFAB_CLIENT_SECRET",
};

const FIELDS: CredentialField[] = [
  "accessToken",
  "refreshToken",
  "clientId",
  "clientSecret",
];

// ─── Paths ───────────────────────────────────────────────────────

export function defaultCredentialsPath(): string {
  return join(homedir(), ".sketchfab_credentials.json");
}

// ─── Mapping ─────────────────────────────────────────────────────

function fromFile(file: CredentialsFile): Credential {
  const credential: Credential = {};
  if (file.access_token) credential.accessToken = file.access_token;
  if (file.refresh_token) credential.refreshToken = file.refresh_token;
  if (file.client_id) credential.clientId = file.client_id;
  if (file.client_secret) credential.clientSecret = file.client_secret;
  if (file.token_expiry) credential.tokenExpiry = file.token_expiry;
  return credential;
}

function toFile(credential: Credential): CredentialsFile {
  return {
    access_token: credential.accessToken ?? "",
    refresh_token: credential.refreshToken ?? "",
    client_id: credential.clientId ?? "",
    client_secret: credential.clientSecret ?? "",
    token_expiry: credential.tokenExpiry ?? 0,
  };
}

// ─── Public API ──────────────────────────────────────────────────

/**
 * Load the persisted credentials.
 *
 * A missing or malformed file yields an empty credential; this never
 * throws, so a broken file cannot stop the server from starting.
 */
export async function loadCredentials(
  credentialsPath?: string
): Promise<StoredCredentials> {
  const path = credentialsPath ?? defaultCredentialsPath();

  let raw: string;
  try {
    raw = await readFile(path, "utf-8");
  } catch (err) {
    if (isFileNotFound(err)) {
      console.warn(`[credentials] Credentials file not found: ${path}`);
      return { credential: {}, path, status: "missing" };
    }
    console.error(
      `[credentials] CONFIG_INVALID: cannot read ${path}: ${errorMessage(err)}`
    );
    return { credential: {}, path, status: "invalid" };
  }

  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (err) {
    console.error(
      `[credentials] CONFIG_INVALID: ${path} is not valid JSON: ${errorMessage(err)}`
    );
    return { credential: {}, path, status: "invalid" };
  }

  const parsed = CredentialsFileSchema.safeParse(data);
  if (!parsed.success) {
    console.error(
      `[credentials] CONFIG_INVALID: ${path} does not hold a JSON object`
    );
    return { credential: {}, path, status: "invalid" };
  }

  console.error(`[credentials] Loaded credentials from ${path}`);
  return { credential: fromFile(parsed.data), path, status: "loaded" };
}

/**
 * Persist credentials.
 *
 * Serialized to `<path>.tmp` first, then renamed over the target, so an
 * interrupted write never leaves a truncated credentials file behind.
 */
export async function saveCredentials(
  credential: Credential,
  credentialsPath?: string
): Promise<SaveResult> {
  const path = credentialsPath ?? defaultCredentialsPath();
  const tmpPath = `${path}.tmp`;

  try {
    await mkdir(dirname(path), { recursive: true });
    await writeFile(tmpPath, JSON.stringify(toFile(credential), null, 2) + "\n", {
      mode: 0o600,
    });
    await rename(tmpPath, path);
  } catch (err) {
    const message = `Failed to store credentials to ${path}: ${errorMessage(err)}`;
    console.error(`[credentials] ${message}`);
    await rm(tmpPath, { force: true }).catch((cleanupErr: unknown) => {
      console.error(
        `[credentials] Could not remove ${tmpPath}: ${errorMessage(cleanupErr)}`
      );
    });
    return { ok: false, code: "CREDENTIALS_WRITE_FAILED", message };
  }

  console.error(`[credentials] Stored updated credentials to ${path}`);
  return { ok: true, path };
}

/**
 * Merge credential sources field by field:
 * override > environment variable > stored value.
 *
 * Empty strings count as unset at every layer. The expiry only ever
 * comes from the stored record.
 */
export function resolveCredentials(sources: CredentialSources): Credential {
  const { overrides = {}, env = {}, stored = {} } = sources;
  const credential: Credential = {};

  for (const field of FIELDS) {
    const value =
      overrides[field] || env[CREDENTIAL_ENV_VARS[field]] || stored[field];
    if (value) credential[field] = value;
  }

  if (stored.tokenExpiry) credential.tokenExpiry = stored.tokenExpiry;
  return credential;
}

function isFileNotFound(error: unknown): boolean {
  return (
    error instanceof Error &&
    "code" in error &&
    error.code === "ENOENT"
  );
}
