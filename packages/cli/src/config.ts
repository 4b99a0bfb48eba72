import { chmodSync, mkdirSync, readFileSync, writeFileSync } from "node:fs";
import { dirname, join, resolve } from "node:path";
import { homedir } from "node:os";
import {
  ConfigFileSchema,
  DEFAULT_ARTIFACT_PREFIX,
  RepositorySchema,
  type ConfigFile
} from "@srctar/shared-types";
import { CliError } from "./errors.js";

export const DEFAULT_API_URL = "https://api.github.com";
export const DEFAULT_DEPOT_TOOLS_URL =
  "https://chromium.googlesource.com/chromium/tools/depot_tools.git";
export const DEFAULT_CHROMIUM_SRC_URL = "https://chromium.googlesource.com/chromium/src.git";
export const DEFAULT_MOUNT_OWNER = "runner:runner";

const CONFIG_PATH = join(homedir(), ".srctar", "config.json");

type Env = Record<string, string | undefined>;

export interface GitHubConfig {
  token?: string;
  apiUrl: string;
  repository?: string;
  commit?: string;
}

export interface WorkspaceConfig {
  workspace: string;
  prefix: string;
  depotToolsUrl: string;
  chromiumSrcUrl: string;
  mountDir?: string;
  mountOwner: string;
}

export interface ConfigOverrides {
  token?: string;
  apiUrl?: string;
  repository?: string;
  commit?: string;
  workspace?: string;
  prefix?: string;
  mountDir?: string;
  mountOwner?: string;
}

function normalize(value?: string) {
  if (!value) {
    return undefined;
  }

  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

function isMissingFile(error: unknown) {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

export function getConfigPath() {
  return CONFIG_PATH;
}

export function readConfig(path = CONFIG_PATH): ConfigFile {
  let content: string;
  try {
    content = readFileSync(path, "utf-8");
  } catch (error) {
    if (isMissingFile(error)) {
      return {};
    }
    throw error;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch {
    throw new CliError("CONFIG_INVALID", `Config file is not valid JSON: ${path}`, 1);
  }

  const parsed = ConfigFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new CliError("CONFIG_INVALID", `Config file failed validation: ${path}`, 1, {
      issues: parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
    });
  }
  return parsed.data;
}

export function writeConfig(config: ConfigFile, path = CONFIG_PATH) {
  const validated = ConfigFileSchema.parse(config);
  const dir = dirname(path);
  mkdirSync(dir, { recursive: true });
  try {
    chmodSync(dir, 0o700);
  } catch {
    // Not supported on every platform.
  }
  writeFileSync(path, JSON.stringify(validated, null, 2));
  try {
    chmodSync(path, 0o600);
  } catch {
    // Not supported on every platform.
  }
}

export function resolveGitHubConfig(
  overrides: ConfigOverrides,
  env: Env = process.env,
  fileConfig: ConfigFile = readConfig()
): GitHubConfig {
  const token =
    normalize(overrides.token) ??
    normalize(env.SRCTAR_TOKEN) ??
    normalize(env.GITHUB_TOKEN) ??
    normalize(fileConfig.token);
  const apiUrl =
    normalize(overrides.apiUrl) ??
    normalize(env.GITHUB_API_URL) ??
    normalize(fileConfig.apiUrl) ??
    DEFAULT_API_URL;
  const repository =
    normalize(overrides.repository) ??
    normalize(env.GITHUB_REPOSITORY) ??
    normalize(fileConfig.repository);
  const commit = normalize(overrides.commit) ?? normalize(env.GITHUB_SHA);

  if (repository && !RepositorySchema.safeParse(repository).success) {
    throw new CliError("VALIDATION_ERROR", `Repository must look like owner/repo: ${repository}`, 1);
  }

  return {
    token,
    apiUrl: apiUrl.replace(/\/+$/, ""),
    repository,
    commit
  };
}

export function resolveWorkspaceConfig(
  overrides: ConfigOverrides,
  env: Env = process.env,
  cwd = process.cwd()
): WorkspaceConfig {
  const workspace = resolve(
    cwd,
    normalize(overrides.workspace) ?? normalize(env.GITHUB_WORKSPACE) ?? "."
  );
  const mountDir = normalize(overrides.mountDir);

  return {
    workspace,
    prefix: normalize(overrides.prefix) ?? DEFAULT_ARTIFACT_PREFIX,
    depotToolsUrl: normalize(env.SRCTAR_DEPOT_TOOLS_URL) ?? DEFAULT_DEPOT_TOOLS_URL,
    chromiumSrcUrl: normalize(env.SRCTAR_SRC_URL) ?? DEFAULT_CHROMIUM_SRC_URL,
    mountDir: mountDir ? resolve(cwd, mountDir) : undefined,
    mountOwner: normalize(overrides.mountOwner) ?? DEFAULT_MOUNT_OWNER
  };
}
