import { createReadStream } from "node:fs";
import { stat } from "node:fs/promises";
import type { z } from "zod";
import {
  GitHubAssetSchema,
  GitHubErrorSchema,
  GitHubReleaseSchema,
  splitRepository,
  type GitHubAsset,
  type GitHubRelease
} from "@srctar/shared-types";
import { CliError } from "./errors.js";

export const GITHUB_API_VERSION = "2022-11-28";
const REQUEST_TIMEOUT_MS = 15_000;
const ASSET_PAGE_SIZE = 100;

export interface ReleaseFields {
  tag_name?: string;
  name?: string;
  target_commitish?: string;
  draft?: boolean;
  prerelease?: boolean;
}

interface SendOptions {
  allowNotFound?: boolean;
  timeoutMs?: number | null;
}

const AssetListSchema = GitHubAssetSchema.array();

export class GitHubReleaseClient {
  private readonly owner: string;
  private readonly repo: string;

  constructor(
    private readonly apiUrl: string,
    repository: string,
    private readonly token: string
  ) {
    const { owner, repo } = splitRepository(repository);
    this.owner = owner;
    this.repo = repo;
  }

  private repoUrl(path: string) {
    return `${this.apiUrl}/repos/${encodeURIComponent(this.owner)}/${encodeURIComponent(
      this.repo
    )}${path}`;
  }

  private async send(url: string, init: RequestInit, options: SendOptions = {}) {
    const timeoutMs = options.timeoutMs === undefined ? REQUEST_TIMEOUT_MS : options.timeoutMs;
    const controller = new AbortController();
    const timeout = timeoutMs === null ? undefined : setTimeout(() => controller.abort(), timeoutMs);

    let response: Response;
    try {
      response = await fetch(url, {
        ...init,
        headers: {
          accept: "application/vnd.github+json",
          authorization: `Bearer ${this.token}`,
          "user-agent": "srctar-cli",
          "x-github-api-version": GITHUB_API_VERSION,
          ...(init.headers ?? {})
        },
        signal: controller.signal
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : "Unable to reach GitHub";
      throw new CliError("NETWORK_ERROR", message, 2, { url });
    } finally {
      clearTimeout(timeout);
    }

    if (response.status === 404 && options.allowNotFound) {
      return null;
    }
    if (!response.ok) {
      throw await this.toError(response, url);
    }
    return response;
  }

  private async toError(response: Response, url: string) {
    let message = `GitHub request failed (${response.status})`;
    try {
      const parsed = GitHubErrorSchema.safeParse(await response.json());
      if (parsed.success) {
        message = parsed.data.message;
      }
    } catch {
      // Error bodies are not always JSON.
    }

    if (response.status === 401 || response.status === 403) {
      return new CliError("GITHUB_AUTH_FAILED", message, 4, { status_code: response.status });
    }
    if (response.status >= 500) {
      return new CliError("GITHUB_UNAVAILABLE", message, 2, {
        status_code: response.status,
        retry_after_seconds: 30
      });
    }
    return new CliError("GITHUB_API_ERROR", message, 2, { status_code: response.status, url });
  }

  private async parse<S extends z.ZodTypeAny>(response: Response, schema: S): Promise<z.infer<S>> {
    let payload: unknown;
    try {
      payload = await response.json();
    } catch {
      throw new CliError("INVALID_RESPONSE", "GitHub returned a non-JSON payload", 2);
    }

    const parsed = schema.safeParse(payload);
    if (!parsed.success) {
      throw new CliError("INVALID_RESPONSE", "GitHub payload did not match the expected shape", 2, {
        issues: parsed.error.issues.map(
          (issue: z.ZodIssue) => `${issue.path.join(".")}: ${issue.message}`
        )
      });
    }
    return parsed.data;
  }

  async getReleaseByTag(tag: string): Promise<GitHubRelease | null> {
    const response = await this.send(
      this.repoUrl(`/releases/tags/${encodeURIComponent(tag)}`),
      {},
      { allowNotFound: true }
    );
    return response ? this.parse(response, GitHubReleaseSchema) : null;
  }

  async createRelease(fields: ReleaseFields & { tag_name: string }): Promise<GitHubRelease> {
    const response = await this.send(this.repoUrl("/releases"), {
      method: "POST",
      headers: { "content-type": "application/json" },
      body: JSON.stringify(fields)
    });
    if (!response) {
      throw new CliError("GITHUB_API_ERROR", "Release creation returned no response", 2);
    }
    return this.parse(response, GitHubReleaseSchema);
  }

  async updateRelease(id: number, fields: ReleaseFields): Promise<GitHubRelease> {
    const response = await this.send(this.repoUrl(`/releases/${id}`), {
      method: "PATCH",
      headers: { "content-type": "application/json" },
      body: JSON.stringify(fields)
    });
    if (!response) {
      throw new CliError("GITHUB_API_ERROR", "Release update returned no response", 2);
    }
    return this.parse(response, GitHubReleaseSchema);
  }

  async listAssets(releaseId: number): Promise<GitHubAsset[]> {
    const assets: GitHubAsset[] = [];
    for (let page = 1; ; page += 1) {
      const response = await this.send(
        this.repoUrl(`/releases/${releaseId}/assets?per_page=${ASSET_PAGE_SIZE}&page=${page}`),
        {}
      );
      if (!response) {
        break;
      }
      const batch = await this.parse(response, AssetListSchema);
      assets.push(...batch);
      if (batch.length < ASSET_PAGE_SIZE) {
        break;
      }
    }
    return assets;
  }

  async deleteAsset(assetId: number): Promise<void> {
    await this.send(this.repoUrl(`/releases/assets/${assetId}`), { method: "DELETE" });
  }

  async uploadAsset(release: GitHubRelease, path: string, name: string): Promise<GitHubAsset> {
    const size = (await stat(path)).size;
    const url = new URL(release.upload_url.replace(/\{[^}]*\}$/, ""));
    url.searchParams.set("name", name);

    // Source archives run to gigabytes; no request timeout for the upload itself.
    const response = await this.send(
      url.toString(),
      {
        method: "POST",
        headers: {
          "content-type": "application/x-xz",
          "content-length": String(size)
        },
        body: createReadStream(path),
        duplex: "half"
      },
      { timeoutMs: null }
    );
    if (!response) {
      throw new CliError("GITHUB_API_ERROR", `Upload of ${name} returned no response`, 2);
    }
    return this.parse(response, GitHubAssetSchema);
  }
}
