import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, describe, expect, it, vi } from "vitest";
import type { GitHubRelease } from "@srctar/shared-types";
import { GitHubReleaseClient } from "../src/github.js";

const originalFetch = global.fetch;
const API = "https://api.example.test";

function json(body: unknown, status = 200) {
  return new Response(JSON.stringify(body), {
    status,
    headers: {
      "content-type": "application/json"
    }
  });
}

const releaseBody = {
  id: 42,
  tag_name: "1.0",
  name: "1.0",
  html_url: "https://github.example.test/o/r/releases/tag/1.0",
  upload_url: "https://uploads.example.test/repos/o/r/releases/42/assets{?name,label}"
};

function client() {
  return new GitHubReleaseClient(API, "o/r", "test-secret");
}

describe("github release client", () => {
  afterEach(() => {
    global.fetch = originalFetch;
    vi.restoreAllMocks();
  });

  it("classifies network failures as NETWORK_ERROR", async () => {
    global.fetch = vi.fn().mockRejectedValue(new Error("connect ECONNREFUSED 127.0.0.1:443"));

    await expect(client().getReleaseByTag("1.0")).rejects.toMatchObject({
      code: "NETWORK_ERROR",
      exitCode: 2,
      message: "connect ECONNREFUSED 127.0.0.1:443"
    });
  });

  it("classifies server 5xx failures as GITHUB_UNAVAILABLE", async () => {
    global.fetch = vi.fn().mockResolvedValue(json({ message: "server busy" }, 503));

    await expect(client().getReleaseByTag("1.0")).rejects.toMatchObject({
      code: "GITHUB_UNAVAILABLE",
      message: "server busy",
      details: { status_code: 503, retry_after_seconds: 30 }
    });
  });

  it("classifies rejected credentials as GITHUB_AUTH_FAILED", async () => {
    global.fetch = vi.fn().mockResolvedValue(json({ message: "Bad credentials" }, 401));

    await expect(client().listAssets(42)).rejects.toMatchObject({
      code: "GITHUB_AUTH_FAILED",
      exitCode: 4,
      message: "Bad credentials"
    });
  });

  it("reports other failures with GitHub's message", async () => {
    global.fetch = vi
      .fn()
      .mockResolvedValue(json({ message: "Validation Failed" }, 422));

    await expect(
      client().createRelease({ tag_name: "1.0", name: "1.0" })
    ).rejects.toMatchObject({
      code: "GITHUB_API_ERROR",
      message: "Validation Failed",
      details: { status_code: 422, url: `${API}/repos/o/r/releases` }
    });
  });

  it("returns null for a missing release", async () => {
    const fetchMock = vi.fn().mockResolvedValue(json({ message: "Not Found" }, 404));
    global.fetch = fetchMock;

    await expect(client().getReleaseByTag("1.0")).resolves.toBeNull();
    expect(fetchMock.mock.calls[0][0]).toBe(`${API}/repos/o/r/releases/tags/1.0`);
  });

  it("rejects payloads that do not look like a release", async () => {
    global.fetch = vi.fn().mockResolvedValue(json({ id: "nope" }));

    await expect(client().getReleaseByTag("1.0")).rejects.toMatchObject({
      code: "INVALID_RESPONSE"
    });
  });

  it("sends authenticated JSON when creating a release", async () => {
    const fetchMock = vi.fn().mockResolvedValue(json(releaseBody, 201));
    global.fetch = fetchMock;

    const release = await client().createRelease({
      tag_name: "1.0",
      name: "1.0",
      target_commitish: "abc123"
    });

    expect(release.id).toBe(42);
    expect(release.assets).toEqual([]);
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe(`${API}/repos/o/r/releases`);
    expect(init.method).toBe("POST");
    expect(init.headers).toMatchObject({
      authorization: "Bearer test-secret",
      "content-type": "application/json",
      "x-github-api-version": "2022-11-28"
    });
    expect(JSON.parse(init.body)).toEqual({
      tag_name: "1.0",
      name: "1.0",
      target_commitish: "abc123"
    });
  });

  it("pages through release assets", async () => {
    const firstPage = Array.from({ length: 100 }, (_, index) => ({
      id: index,
      name: `asset-${index}`,
      size: 1
    }));
    const fetchMock = vi
      .fn()
      .mockResolvedValueOnce(json(firstPage))
      .mockResolvedValueOnce(json([{ id: 100, name: "last", size: 1 }]));
    global.fetch = fetchMock;

    const assets = await client().listAssets(42);

    expect(assets).toHaveLength(101);
    expect(fetchMock.mock.calls.map((call) => call[0])).toEqual([
      `${API}/repos/o/r/releases/42/assets?per_page=100&page=1`,
      `${API}/repos/o/r/releases/42/assets?per_page=100&page=2`
    ]);
  });

  it("uploads an asset to the templated upload url", async () => {
    const dir = mkdtempSync(join(tmpdir(), "srctar-upload-"));
    try {
      const path = join(dir, "a.tar.xz");
      writeFileSync(path, "12345");
      const fetchMock = vi
        .fn()
        .mockResolvedValue(json({ id: 5, name: "a.tar.xz", size: 5 }, 201));
      global.fetch = fetchMock;

      const release: GitHubRelease = {
        ...releaseBody,
        draft: false,
        prerelease: false,
        assets: []
      };
      const asset = await client().uploadAsset(release, path, "a.tar.xz");

      expect(asset).toEqual({ id: 5, name: "a.tar.xz", size: 5 });
      const [url, init] = fetchMock.mock.calls[0];
      expect(url).toBe("https://uploads.example.test/repos/o/r/releases/42/assets?name=a.tar.xz");
      expect(init.headers).toMatchObject({
        "content-type": "application/x-xz",
        "content-length": "5"
      });
    } finally {
      rmSync(dir, { recursive: true, force: true });
    }
  });
});
