/**
 * Sketchfab payload schemas
 *
 * Every field the provider may omit or mistype carries its own default,
 * so one bad field degrades to empty instead of failing the whole decode.
 */

import { z } from "zod";

/** Decode `value` with `schema`, or return `fallback` if it does not fit. */
export function parseOrDefault<T extends z.ZodTypeAny>(
  schema: T,
  value: unknown,
  fallback: z.output<T>
): z.output<T> {
  const result = schema.safeParse(value);
  return result.success ? result.data : fallback;
}

const text = z.string().catch("");
const flag = z.boolean().catch(false);
const count = z.number().finite().catch(0);

// ─── Credentials file ────────────────────────────────────────────

export const CredentialsFileSchema = z.object({
  access_token: text,
  refresh_token: text,
  client_id: text,
  client_secret: text,
  token_expiry: z.number().finite().nonnegative().catch(0),
});

export type CredentialsFile = z.output<typeof CredentialsFileSchema>;

// ─── OAuth ───────────────────────────────────────────────────────

export const TokenResponseSchema = z.object({
  access_token: z.string().min(1),
  refresh_token: z.string().min(1).optional().catch(undefined),
  expires_in: z.number().positive().optional().catch(undefined),
});

// ─── Search ──────────────────────────────────────────────────────

export const SearchResponseSchema = z.object({
  results: z
    .object({ models: z.array(z.unknown()).catch([]) })
    .catch({ models: [] }),
});

export const SearchModelSchema = z.object({
  uid: text,
  name: text,
  description: text,
  viewerUrl: text,
  embedUrl: text,
  isDownloadable: flag,
  thumbnails: z
    .object({
      images: z.array(z.object({ url: text }).catch({ url: "" })).catch([]),
    })
    .nullable()
    .catch(null),
  user: z.object({ username: text }).nullable().catch(null),
  archives: z
    .record(z.string(), z.object({ size: count }).nullable().catch(null))
    .catch({}),
});

export type SearchModel = z.output<typeof SearchModelSchema>;

// ─── Models ──────────────────────────────────────────────────────

export const ModelDetailSchema = z.object({
  uid: text,
  name: text,
  description: text,
  viewerUrl: text,
  isDownloadable: flag,
});

export const DownloadLinksSchema = z.record(z.string(), z.unknown());

export const DownloadLinkSchema = z
  .object({ url: text, size: count, expires: count })
  .catch({ url: "", size: 0, expires: 0 });
