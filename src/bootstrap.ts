/**
 * Startup Bootstrap
 *
 * Resolves Sketchfab credentials from flags, environment and the
 * credentials file, then builds the token manager and catalog client.
 *
 * Missing credentials are not fatal: search works without a token, and
 * the glTF tool is simply not offered.
 */

import type { CredentialField, FetchFn } from "./types.js";
import {
  CREDENTIAL_ENV_VARS,
  SketchfabClient,
  TokenManager,
  loadCredentials,
  resolveCredentials,
  type CredentialOverrides,
} from "./sketchfab/index.js";

export interface CliOptions {
  overrides: CredentialOverrides;
  credentialsFile?: string;
}

export interface BootstrapOptions {
  argv?: string[];
  env?: NodeJS.ProcessEnv;
  fetch?: FetchFn;
}

export interface BootstrapResult {
  tokens: TokenManager;
  client: SketchfabClient;
  credentialsPath: string;
  /** Whether an access token was configured at startup */
  gltfEnabled: boolean;
}

const FLAG_FIELDS: Record<string, CredentialField> = {
  "--sketchfab_access_token": "accessToken",
  "--sketchfab_refresh_token": "refreshToken",
  "--sketchfab_client_id": "clientId",
  "--sketchfab_client_secret": "clientSecret",
};

const CREDENTIALS_FILE_FLAG = "--credentials_file";

/**
 * Parse `--flag value` and `--flag=value` forms. Unknown arguments are
 * ignored so the server can sit behind launchers that add their own.
 */
export function parseCliArgs(argv: string[]): CliOptions {
  const options: CliOptions = { overrides: {} };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    const eq = arg.indexOf("=");
    const flag = eq === -1 ? arg : arg.slice(0, eq);

    if (!(flag in FLAG_FIELDS) && flag !== CREDENTIALS_FILE_FLAG) continue;

    let value: string | undefined;
    if (eq !== -1) {
      value = arg.slice(eq + 1);
    } else if (i + 1 < argv.length && !argv[i + 1].startsWith("--")) {
      value = argv[++i];
    }
    if (!value) continue;

    if (flag === CREDENTIALS_FILE_FLAG) {
      options.credentialsFile = value;
    } else {
      options.overrides[FLAG_FIELDS[flag]] = value;
    }
  }

  return options;
}

/**
 * Resolve credentials and build the client. Logs what was found (never
 * the values) to stderr.
 */
export async function bootstrap(
  options: BootstrapOptions = {}
): Promise<BootstrapResult> {
  const argv = options.argv ?? process.argv.slice(2);
  const env = options.env ?? process.env;

  const cli = parseCliArgs(argv);
  const stored = await loadCredentials(cli.credentialsFile);
  const credential = resolveCredentials({
    overrides: cli.overrides,
    env,
    stored: stored.credential,
  });

  const tokens = new TokenManager(credential, {
    credentialsPath: stored.path,
    fetch: options.fetch,
  });
  const client = new SketchfabClient({
    tokens,
    api_url: env.SKETCHFAB_API_URL || undefined,
    fetch: options.fetch,
  });

  logCredentialStatus(tokens);

  return {
    tokens,
    client,
    credentialsPath: stored.path,
    gltfEnabled: tokens.hasAccessToken(),
  };
}

function logCredentialStatus(tokens: TokenManager): void {
  const credential = tokens.current;

  if (!credential.accessToken) {
    console.warn(
      "[bootstrap] No Sketchfab access token provided. Download functionality will be DISABLED."
    );
    return;
  }

  console.error("[bootstrap] Sketchfab OAuth2 access token found");

  const missing = (["refreshToken", "clientId", "clientSecret"] as const)
    .filter((field) => !credential[field])
    .map((field) => CREDENTIAL_ENV_VARS[field]);
  if (missing.length > 0) {
    console.warn(
      `[bootstrap] Automatic token refresh is unavailable; missing ${missing.join(", ")}`
    );
  } else {
    console.error("[bootstrap] Automatic token refresh is available");
  }

  if (tokens.isExpiring()) {
    console.warn(
      "[bootstrap] Access token is expired or about to expire - will attempt to refresh on first use"
    );
  }
}
