import { readFile, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { describe, expect, it } from "vitest";

import { bootstrap, parseCliArgs } from "../src/bootstrap.js";
import { fakeFetch, headerOf, jsonResponse, withTempDir } from "./helpers.js";

describe("parseCliArgs", () => {
  it("reads space- and equals-separated flags", () => {
    const options = parseCliArgs([
      "--sketchfab_access_token",
      "flag-access",
      "--sketchfab_client_id=flag-client",
      "--credentials_file",
      "/tmp/creds.json",
    ]);

    expect(options).toEqual({
      overrides: { accessToken: "flag-access", clientId: "flag-client" },
      credentialsFile: "/tmp/creds.json",
    });
  });

  it("ignores unknown arguments and flags without a value", () => {
    const options = parseCliArgs([
      "--verbose",
      "--sketchfab_refresh_token",
      "--sketchfab_client_secret=",
      "serve",
    ]);

    expect(options).toEqual({ overrides: {} });
  });
});

describe("bootstrap", () => {
  it("layers flags over environment over the credentials file", async () => {
    await withTempDir(async (dir) => {
      const path = join(dir, "creds.json");
      await writeFile(
        path,
        JSON.stringify({
          access_token: "file-access",
          refresh_token: "file-refresh",
          client_id: "file-client",
          client_secret: "file-secret",
          token_expiry: 1_900_000_000,
        })
      );

      const ctx = await bootstrap({
        argv: ["--credentials_file", path, "--sketchfab_access_token=flag-access"],
        env: { SKETCHFAB_CLIENT_ID: "env-client" },
      });

      expect(ctx.credentialsPath).toBe(path);
      expect(ctx.gltfEnabled).toBe(true);
      expect(ctx.tokens.current).toEqual({
        accessToken: "flag-access",
        refreshToken: "file-refresh",
        clientId: "env-client",
        clientSecret: "file-secret",
        tokenExpiry: 1_900_000_000,
      });
    });
  });

  it("disables glTF lookup without an access token", async () => {
    await withTempDir(async (dir) => {
      const ctx = await bootstrap({
        argv: ["--credentials_file", join(dir, "none.json")],
        env: {},
      });

      expect(ctx.gltfEnabled).toBe(false);
      expect(ctx.tokens.current).toEqual({});
    });
  });

  it("points the client at SKETCHFAB_API_URL", async () => {
    await withTempDir(async (dir) => {
      const { fn, calls } = fakeFetch(() => jsonResponse({ uid: "car-1" }));
      const ctx = await bootstrap({
        argv: ["--credentials_file", join(dir, "none.json")],
        env: {
          SKETCHFAB_API_URL: "https://mirror.example.test/v3/",
          SKETCHFAB_ACCESS_TOKEN: "env-access",
        },
        fetch: fn,
      });

      await ctx.client.getModel("car-1");

      expect(calls[0].url).toBe("https://mirror.example.test/v3/models/car-1");
      expect(headerOf(calls[0].init, "Authorization")).toBe("Bearer env-access");
    });
  });

  it("writes a refreshed token back to the credentials file it loaded", async () => {
    await withTempDir(async (dir) => {
      const path = join(dir, "creds.json");
      await writeFile(
        path,
        JSON.stringify({
          access_token: "file-access",
          refresh_token: "file-refresh",
          client_id: "file-client",
          client_secret: "file-secret",
          token_expiry: 1_000,
        })
      );
      const { fn, calls } = fakeFetch(() =>
        jsonResponse({
          access_token: "test-new-access",
          refresh_token: "test-new-refresh",
          expires_in: 3600,
        })
      );

      const ctx = await bootstrap({ argv: ["--credentials_file", path], env: {}, fetch: fn });
      expect(await ctx.tokens.ensureValid()).toBe(true);

      expect(calls.map((c) => c.url)).toEqual(["https://sketchfab.com/oauth2/token/"]);
      const stored: unknown = JSON.parse(await readFile(path, "utf-8"));
      expect(stored).toMatchObject({
        access_token: "test-new-access",
        refresh_token: "test-new-refresh",
        client_id: "file-client",
        client_secret: "file-secret",
      });
      expect(stored).toHaveProperty("token_expiry", ctx.tokens.current.tokenExpiry);
    });
  });
});
