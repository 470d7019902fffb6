/**
 * Failure taxonomy shared by the credential, catalog and download layers.
 */

export type FailureKind =
  /** Operation needs an access token that is not configured */
  | "AUTH_REQUIRED"
  /** Refresh grant rejected or unreachable; callers keep the stale token */
  | "AUTH_REFRESH_FAILED"
  | "REMOTE_REQUEST_FAILED"
  | "DOWNLOAD_FAILED"
  /** Credentials file exists but is not a JSON object */
  | "CONFIG_INVALID"
  | "CREDENTIALS_WRITE_FAILED";

export class SketchfabError extends Error {
  constructor(
    message: string,
    public code: FailureKind,
    public httpStatus?: number
  ) {
    super(message);
    this.name = "SketchfabError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
