/**
 * Sketchfab Token Lifecycle
 *
 * Owns the process's single credential. Tracks expiry, runs the OAuth2
 * refresh grant ahead of it, and persists rotated tokens.
 *
 * The credential is held as a frozen snapshot and swapped whole after a
 * successful refresh, so readers never see half of a rotated token pair.
 */

import { errorMessage } from "../errors.js";
import type { Credential, FetchFn } from "../types.js";
import { saveCredentials, type SaveResult } from "./credentials.js";
import { TokenResponseSchema } from "./parse.js";

// ─── Types ───────────────────────────────────────────────────────

export type RefreshResult =
  | { ok: true }
  | { ok: false; code: "AUTH_REFRESH_FAILED"; message: string };

export interface CredentialWriter {
  save(credential: Credential): Promise<SaveResult>;
}

export interface TokenManagerOptions {
  /** Where rotated tokens are written (default ~/.sketchfab_credentials.json) */
  credentialsPath?: string;
  /** Replaces the file writer entirely; `credentialsPath` is then unused */
  store?: CredentialWriter;
  oauthUrl?: string;
  fetch?: FetchFn;
  /** Clock in epoch milliseconds */
  now?: () => number;
  timeoutMs?: number;
}

// ─── Defaults ────────────────────────────────────────────────────

export const DEFAULT_OAUTH_URL = "https://sketchfab.com/oauth2/token/";

/** Refresh this many seconds before the recorded expiry */
export const EXPIRY_MARGIN_SECONDS = 300;

/** Lifetime assumed when the provider omits `expires_in` */
export const DEFAULT_TOKEN_TTL_SECONDS = 30 * 24 * 60 * 60;

const DEFAULT_TIMEOUT_MS = 30_000;

// ─── Implementation ──────────────────────────────────────────────

export class TokenManager {
  private credential: Readonly<Credential>;
  private inflight: Promise<RefreshResult> | null = null;
  private readonly store: CredentialWriter;
  private readonly oauthUrl: string;
  private readonly fetchImpl: FetchFn;
  private readonly now: () => number;
  private readonly timeoutMs: number;

  constructor(credential: Credential, options: TokenManagerOptions = {}) {
    this.credential = Object.freeze({ ...credential });
    const credentialsPath = options.credentialsPath;
    this.store = options.store ?? {
      save: (c) => saveCredentials(c, credentialsPath),
    };
    this.oauthUrl = options.oauthUrl ?? DEFAULT_OAUTH_URL;
    this.fetchImpl = options.fetch ?? ((url, init) => fetch(url, init));
    this.now = options.now ?? Date.now;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  get current(): Readonly<Credential> {
    return this.credential;
  }

  hasAccessToken(): boolean {
    return Boolean(this.credential.accessToken);
  }

  canRefresh(): boolean {
    const { refreshToken, clientId, clientSecret } = this.credential;
    return Boolean(refreshToken && clientId && clientSecret);
  }

  /** True when an expiry is recorded and falls within the safety margin. */
  isExpiring(): boolean {
    const expiry = this.credential.tokenExpiry;
    if (!expiry) return false;
    return this.nowSeconds() > expiry - EXPIRY_MARGIN_SECONDS;
  }

  /**
   * Decide whether calls may go ahead with the current token, refreshing
   * first when it is about to expire.
   *
   * Returns false only when there is no access token at all. A failed or
   * impossible refresh still returns true: the stale token is sent and the
   * API decides whether it is accepted.
   */
  async ensureValid(): Promise<boolean> {
    if (!this.credential.accessToken) return false;
    if (!this.isExpiring()) return true;

    if (!this.canRefresh()) {
      console.warn(
        "[auth] Access token is expiring but refresh_token, client_id or client_secret is missing; using it as-is"
      );
      return true;
    }

    console.error("[auth] Access token is about to expire, refreshing");
    const result = await this.refresh();
    if (!result.ok) {
      console.warn(`[auth] Continuing with the existing token: ${result.message}`);
    }
    return true;
  }

  /**
   * Exchange the refresh token for a new access token.
   *
   * Concurrent callers share one in-flight exchange.
   */
  refresh(): Promise<RefreshResult> {
    if (!this.inflight) {
      this.inflight = this.exchange().finally(() => {
        this.inflight = null;
      });
    }
    return this.inflight;
  }

  /** Authorization header for the current token, refreshing first if due. */
  async authHeaders(): Promise<Record<string, string>> {
    await this.ensureValid();
    const token = this.credential.accessToken;
    if (!token) {
      console.error("[auth] No access token available, making unauthenticated request");
      return {};
    }
    return { Authorization: `Bearer ${token}` };
  }

  // ─── Private ─────────────────────────────────────────────────

  private async exchange(): Promise<RefreshResult> {
    const { refreshToken, clientId, clientSecret } = this.credential;
    if (!refreshToken || !clientId || !clientSecret) {
      return this.failed(
        "Cannot refresh token: missing refresh_token, client_id, or client_secret"
      );
    }

    const body = new URLSearchParams({
      grant_type: "refresh_token",
      client_id: clientId,
      client_secret: clientSecret,
      refresh_token: refreshToken,
    });

    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);

    let payload: unknown;
    try {
      const res = await this.fetchImpl(this.oauthUrl, {
        method: "POST",
        headers: {
          "Content-Type": "application/x-www-form-urlencoded",
          Accept: "application/json",
        },
        body: body.toString(),
        signal: controller.signal,
      });
      if (!res.ok) {
        return this.failed(`Token endpoint returned ${res.status}`);
      }
      payload = await res.json();
    } catch (err) {
      return this.failed(`Token request failed: ${errorMessage(err)}`);
    } finally {
      clearTimeout(timer);
    }

    const parsed = TokenResponseSchema.safeParse(payload);
    if (!parsed.success) {
      return this.failed("Token endpoint returned no access_token");
    }

    const token = parsed.data;
    const next: Credential = {
      ...this.credential,
      accessToken: token.access_token,
      refreshToken: token.refresh_token ?? refreshToken,
      tokenExpiry:
        this.nowSeconds() + (token.expires_in ?? DEFAULT_TOKEN_TTL_SECONDS),
    };
    this.credential = Object.freeze(next);
    console.error("[auth] Successfully refreshed access token");

    const saved = await this.store.save(next);
    if (!saved.ok) {
      console.warn(
        `[auth] Refreshed token is in use but was not persisted: ${saved.message}`
      );
    }
    return { ok: true };
  }

  private failed(message: string): RefreshResult {
    console.error(`[auth] AUTH_REFRESH_FAILED: ${message}`);
    return { ok: false, code: "AUTH_REFRESH_FAILED", message };
  }

  private nowSeconds(): number {
    return this.now() / 1000;
  }
}
