/**
 * Model download and archive extraction.
 *
 * Archives are recognised by the ZIP local-file-header signature, never by
 * file name or content type: Sketchfab's signed URLs often carry neither.
 */

import { randomUUID } from "node:crypto";
import { mkdir, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { dirname, join, resolve, sep } from "node:path";
import JSZip from "jszip";

import { SketchfabError, errorMessage } from "../errors.js";
import type { DownloadResult, FetchFn } from "../types.js";

export interface DownloadOptions {
  /** Target file; a temp path is allocated when omitted */
  destination?: string;
  fetch?: FetchFn;
  timeoutMs?: number;
}

export const DOWNLOAD_TIMEOUT_MS = 300_000;

const ZIP_SIGNATURE = [0x50, 0x4b, 0x03, 0x04];

export function isZipArchive(bytes: Uint8Array): boolean {
  return (
    bytes.length >= ZIP_SIGNATURE.length &&
    ZIP_SIGNATURE.every((byte, i) => bytes[i] === byte)
  );
}

export async function downloadModel(
  url: string,
  options: DownloadOptions = {}
): Promise<DownloadResult> {
  const fetchImpl = options.fetch ?? ((u, init) => fetch(u, init));
  const timeoutMs = options.timeoutMs ?? DOWNLOAD_TIMEOUT_MS;

  console.error(`[download] Downloading model from ${redactQuery(url)}`);

  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), timeoutMs);

  let bytes: Uint8Array;
  try {
    const res = await fetchImpl(url, { signal: controller.signal });
    if (!res.ok) {
      throw new Error(`download returned ${res.status}`);
    }
    bytes = new Uint8Array(await res.arrayBuffer());
  } catch (err) {
    throw failure(`Failed to download model: ${errorMessage(err)}`);
  } finally {
    clearTimeout(timer);
  }

  const isArchive = isZipArchive(bytes);
  const localPath =
    options.destination ??
    join(tmpdir(), `sketchfab-${randomUUID()}${isArchive ? ".zip" : ""}`);

  try {
    await mkdir(dirname(localPath), { recursive: true });
    await writeFile(localPath, bytes);
  } catch (err) {
    await discard(localPath);
    throw failure(`Failed to write ${localPath}: ${errorMessage(err)}`);
  }

  if (!isArchive) {
    return { localPath, isArchive, extractedDir: null, extractedEntries: [] };
  }

  const extractedDir = `${localPath}_extracted`;
  try {
    const extractedEntries = await extractArchive(bytes, extractedDir);
    return { localPath, isArchive, extractedDir, extractedEntries };
  } catch (err) {
    await discard(localPath);
    throw failure(`Failed to extract ${localPath}: ${errorMessage(err)}`);
  }
}

/**
 * Unpack a ZIP payload into `targetDir`.
 *
 * Returns entry names in JSZip's order: archive order, except that
 * integer-like names such as "2" come first. Entries that would land
 * outside `targetDir` abort the extraction.
 */
export async function extractArchive(
  bytes: Uint8Array,
  targetDir: string
): Promise<string[]> {
  const zip = await JSZip.loadAsync(bytes);
  const root = resolve(targetDir);
  await mkdir(root, { recursive: true });

  const entries: JSZip.JSZipObject[] = [];
  zip.forEach((_relativePath, entry) => {
    entries.push(entry);
  });

  const names: string[] = [];
  for (const entry of entries) {
    const target = resolve(root, entry.name);
    if (target !== root && !target.startsWith(root + sep)) {
      throw new Error(`archive entry "${entry.name}" escapes ${targetDir}`);
    }

    if (entry.dir) {
      await mkdir(target, { recursive: true });
    } else {
      await mkdir(dirname(target), { recursive: true });
      await writeFile(target, await entry.async("nodebuffer"));
    }
    names.push(entry.name);
  }

  return names;
}

// ─── Helpers ───────────────────────────────────────────────────

function failure(message: string): SketchfabError {
  console.error(`[download] DOWNLOAD_FAILED: ${message}`);
  return new SketchfabError(message, "DOWNLOAD_FAILED");
}

async function discard(path: string): Promise<void> {
  try {
    await rm(path, { force: true });
  } catch (err) {
    console.error(`[download] Could not remove ${path}: ${errorMessage(err)}`);
  }
}

/** Signed download URLs carry credentials in the query string. */
function redactQuery(url: string): string {
  const index = url.indexOf("?");
  return index === -1 ? url : `${url.slice(0, index)}?…`;
}
