import { z } from "zod";

const TAG_PATTERN = /^[A-Za-z0-9][A-Za-z0-9._-]*$/;

export const TagSchema = z
  .string()
  .min(1)
  .max(128)
  .regex(TAG_PATTERN, "Tag may only contain letters, digits, '.', '_' and '-'")
  .refine((value) => !value.includes(".."), "Tag must not contain '..'")
  .refine(
    (value) => !value.endsWith(".") && !value.endsWith(".lock"),
    "Tag must not end with '.' or '.lock'"
  );

export const ArtifactPrefixSchema = TagSchema;

export const DEFAULT_ARTIFACT_PREFIX = "chromium";

export const ReleaseInputsSchema = z.object({
  tag: TagSchema,
  v8PgoProfile: z.boolean().default(true)
});

export interface ArtifactNames {
  /** Base name without extension; also the top-level directory inside both archives. */
  base: string;
  source: string;
  testData: string;
}

export function artifactNames(prefix: string, tag: string): ArtifactNames {
  const base = `${ArtifactPrefixSchema.parse(prefix)}-${TagSchema.parse(tag)}`;
  return {
    base,
    source: `${base}.tar.xz`,
    testData: `${base}-testdata.tar.xz`
  };
}

export const RepositorySchema = z
  .string()
  .regex(/^[A-Za-z0-9_.-]+\/[A-Za-z0-9_.-]+$/, "Repository must look like owner/repo");

export function splitRepository(value: string): { owner: string; repo: string } {
  const [owner, repo] = RepositorySchema.parse(value).split("/");
  return { owner, repo };
}

const RelativePathSchema = z
  .string()
  .min(1)
  .refine((value) => !value.startsWith("/") && !value.split("/").includes(".."), {
    message: "Export rule paths must be relative to the source directory"
  });

export const ExportRulesSchema = z.object({
  nonessentialDirs: z.array(RelativePathSchema),
  testDirs: z.array(RelativePathSchema),
  essentialFiles: z.array(RelativePathSchema),
  essentialGitDirs: z.array(RelativePathSchema)
});

export const ConfigFileSchema = z
  .object({
    token: z.string().min(1).optional(),
    apiUrl: z.string().url().optional(),
    repository: RepositorySchema.optional()
  })
  .strict();

export const GitHubAssetSchema = z.object({
  id: z.number().int(),
  name: z.string(),
  size: z.number().int().nonnegative(),
  browser_download_url: z.string().url().optional()
});

export const GitHubReleaseSchema = z.object({
  id: z.number().int(),
  tag_name: z.string(),
  name: z.string().nullable(),
  html_url: z.string().url(),
  upload_url: z.string().min(1),
  target_commitish: z.string().optional(),
  draft: z.boolean().default(false),
  prerelease: z.boolean().default(false),
  assets: z.array(GitHubAssetSchema).default([])
});

export const GitHubErrorSchema = z.object({
  message: z.string(),
  documentation_url: z.string().optional()
});

const SHA256_DIGEST_PATTERN = /^[a-f0-9]{64}$/i;

export function normalizeSha256Checksum(
  value: string | undefined | null
): string | undefined {
  if (!value) {
    return undefined;
  }

  const trimmed = value.trim();
  if (!trimmed) {
    return undefined;
  }

  const digest = trimmed.toLowerCase().startsWith("sha256:")
    ? trimmed.slice(7).trim()
    : trimmed;

  if (!SHA256_DIGEST_PATTERN.test(digest)) {
    return undefined;
  }

  return `sha256:${digest.toLowerCase()}`;
}

export function checksumDigest(value: string | undefined | null): string | undefined {
  const normalized = normalizeSha256Checksum(value);
  if (!normalized) {
    return undefined;
  }
  return normalized.slice(7);
}

export const StepResultSchema = z.object({
  id: z.string().min(1),
  title: z.string().min(1),
  duration_ms: z.number().int().nonnegative()
});

export const ArtifactSummarySchema = z.object({
  name: z.string().min(1),
  path: z.string().min(1),
  bytes: z.number().int().nonnegative(),
  sha256: z.string().regex(/^sha256:[a-f0-9]{64}$/)
});

export const PublishedReleaseSchema = z.object({
  id: z.number().int(),
  html_url: z.string().url(),
  created: z.boolean(),
  uploaded: z.array(z.string().min(1))
});

export const RunReportSchema = z.object({
  tag: TagSchema,
  steps: z.array(StepResultSchema),
  artifacts: z.array(ArtifactSummarySchema),
  release: PublishedReleaseSchema.optional()
});

export type Tag = z.infer<typeof TagSchema>;
export type ReleaseInputs = z.infer<typeof ReleaseInputsSchema>;
export type ReleaseInputsInput = z.input<typeof ReleaseInputsSchema>;
export type ExportRules = z.infer<typeof ExportRulesSchema>;
export type ConfigFile = z.infer<typeof ConfigFileSchema>;
export type GitHubAsset = z.infer<typeof GitHubAssetSchema>;
export type GitHubRelease = z.infer<typeof GitHubReleaseSchema>;
export type StepResult = z.infer<typeof StepResultSchema>;
export type ArtifactSummary = z.infer<typeof ArtifactSummarySchema>;
export type PublishedRelease = z.infer<typeof PublishedReleaseSchema>;
export type RunReport = z.infer<typeof RunReportSchema>;
