import { readFile, readdir, rm, stat } from "node:fs/promises";
import { join } from "node:path";
import JSZip from "jszip";
import { describe, expect, it } from "vitest";

import { downloadModel, isZipArchive } from "../src/sketchfab/download.js";
import { SketchfabError } from "../src/errors.js";
import { fakeFetch, withTempDir } from "./helpers.js";

async function createZip(files: Record<string, string>, folders: string[] = []): Promise<Uint8Array> {
  const zip = new JSZip();
  for (const folder of folders) {
    zip.folder(folder);
  }
  for (const [name, content] of Object.entries(files)) {
    zip.file(name, content);
  }
  return zip.generateAsync({ type: "uint8array" });
}

function binaryResponse(bytes: Uint8Array, contentType = "application/octet-stream"): Response {
  return new Response(bytes, { status: 200, headers: { "Content-Type": contentType } });
}

describe("isZipArchive", () => {
  it("matches the local file header signature", () => {
    expect(isZipArchive(new Uint8Array([0x50, 0x4b, 0x03, 0x04, 0x14]))).toBe(true);
  });

  it("rejects other payloads", () => {
    expect(isZipArchive(new Uint8Array([0x50, 0x4b, 0x05, 0x06]))).toBe(false);
    expect(isZipArchive(new TextEncoder().encode("glTF"))).toBe(false);
  });

  it("rejects payloads shorter than the signature", () => {
    expect(isZipArchive(new Uint8Array([0x50, 0x4b, 0x03]))).toBe(false);
  });
});

describe("downloadModel", () => {
  it("extracts an archive regardless of the content type", async () => {
    await withTempDir(async (dir) => {
      const bytes = await createZip({ "scene.gltf": '{"asset":{}}', "scene.bin": "binary" });
      const { fn } = fakeFetch(() => binaryResponse(bytes, "text/plain"));
      const destination = join(dir, "model.dat");

      const result = await downloadModel("https://cdn.example.test/model.txt", {
        destination,
        fetch: fn,
      });

      expect(result).toEqual({
        localPath: destination,
        isArchive: true,
        extractedDir: `${destination}_extracted`,
        extractedEntries: ["scene.gltf", "scene.bin"],
      });
      expect(await readFile(join(`${destination}_extracted`, "scene.gltf"), "utf-8")).toBe(
        '{"asset":{}}'
      );
    });
  });

  it("lists integer-like entry names ahead of the others", async () => {
    await withTempDir(async (dir) => {
      const bytes = await createZip({ "b.txt": "b", "2": "two", "a.txt": "a" });
      const { fn } = fakeFetch(() => binaryResponse(bytes));
      const destination = join(dir, "model.zip");

      const result = await downloadModel("https://cdn.example.test/m", { destination, fetch: fn });

      expect(result.extractedEntries).toEqual(["2", "b.txt", "a.txt"]);
      expect(await readFile(join(`${destination}_extracted`, "2"), "utf-8")).toBe("two");
    });
  });

  it("writes nested entries into subdirectories", async () => {
    await withTempDir(async (dir) => {
      const bytes = await createZip({ "textures/base.png": "png-bytes" });
      const { fn } = fakeFetch(() => binaryResponse(bytes));
      const destination = join(dir, "model.zip");

      const result = await downloadModel("https://cdn.example.test/m", { destination, fetch: fn });

      expect(result.extractedEntries).toContain("textures/base.png");
      expect(
        await readFile(join(`${destination}_extracted`, "textures", "base.png"), "utf-8")
      ).toBe("png-bytes");
    });
  });

  it("creates the extraction directory for an archive of directories only", async () => {
    await withTempDir(async (dir) => {
      const bytes = await createZip({}, ["empty"]);
      const { fn } = fakeFetch(() => binaryResponse(bytes));
      const destination = join(dir, "model.zip");

      const result = await downloadModel("https://cdn.example.test/m", { destination, fetch: fn });

      expect(result.isArchive).toBe(true);
      expect(result.extractedEntries).toEqual(["empty/"]);
      expect((await stat(`${destination}_extracted`)).isDirectory()).toBe(true);
    });
  });

  it("saves a plain payload without extraction", async () => {
    await withTempDir(async (dir) => {
      const { fn } = fakeFetch(() => binaryResponse(new TextEncoder().encode("glTF-binary")));
      const destination = join(dir, "nested", "model.glb");

      const result = await downloadModel("https://cdn.example.test/model.zip", {
        destination,
        fetch: fn,
      });

      expect(result).toEqual({
        localPath: destination,
        isArchive: false,
        extractedDir: null,
        extractedEntries: [],
      });
      expect(await readFile(destination, "utf-8")).toBe("glTF-binary");
      expect(await readdir(join(dir, "nested"))).toEqual(["model.glb"]);
    });
  });

  it("allocates a .zip temp path for archives when no destination is given", async () => {
    const bytes = await createZip({ "a.txt": "a" });
    const { fn } = fakeFetch(() => binaryResponse(bytes));

    const result = await downloadModel("https://cdn.example.test/m", { fetch: fn });

    try {
      expect(result.localPath.endsWith(".zip")).toBe(true);
      expect(result.extractedDir).toBe(`${result.localPath}_extracted`);
    } finally {
      await rm(result.localPath, { force: true });
      await rm(`${result.localPath}_extracted`, { recursive: true, force: true });
    }
  });

  it("throws DOWNLOAD_FAILED on a non-2xx response", async () => {
    const { fn } = fakeFetch(() => new Response("gone", { status: 410 }));

    const err = await downloadModel("https://cdn.example.test/m", { fetch: fn }).catch(
      (e: unknown) => e
    );

    expect(err).toBeInstanceOf(SketchfabError);
    expect(err).toMatchObject({
      code: "DOWNLOAD_FAILED",
      message: "Failed to download model: download returned 410",
    });
  });

  it("throws DOWNLOAD_FAILED on a corrupt archive and removes the file", async () => {
    await withTempDir(async (dir) => {
      const corrupt = new Uint8Array([0x50, 0x4b, 0x03, 0x04, 0x00, 0x01, 0x02]);
      const { fn } = fakeFetch(() => binaryResponse(corrupt));
      const destination = join(dir, "model.zip");

      await expect(
        downloadModel("https://cdn.example.test/m", { destination, fetch: fn })
      ).rejects.toMatchObject({ code: "DOWNLOAD_FAILED" });
      expect(await readdir(dir)).toEqual([]);
    });
  });
});
