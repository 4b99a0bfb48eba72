import { createHash } from 'node:crypto';
import { createReadStream } from 'node:fs';
import { stat } from 'node:fs/promises';
import { basename } from 'node:path';
import { normalizeSha256Checksum, type ArtifactSummary } from '@srctar/shared-types';
import { CliError } from './errors.js';

export async function sha256File(path: string): Promise<string> {
  const hash = createHash('sha256');
  for await (const chunk of createReadStream(path)) {
    hash.update(chunk);
  }
  const normalized = normalizeSha256Checksum(hash.digest('hex'));
  if (!normalized) {
    throw new CliError('ARCHIVE_FAILED', `Could not hash ${path}`, 1);
  }
  return normalized;
}

export async function summarizeArtifact(path: string): Promise<ArtifactSummary> {
  let bytes: number;
  try {
    bytes = (await stat(path)).size;
  } catch {
    throw new CliError('ARTIFACT_NOT_FOUND', `Artifact not found: ${path}`, 1, { path });
  }

  return {
    name: basename(path),
    path,
    bytes,
    sha256: await sha256File(path),
  };
}
