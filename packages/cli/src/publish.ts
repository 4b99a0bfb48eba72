import { basename } from 'node:path';
import type { GitHubRelease, PublishedRelease } from '@srctar/shared-types';
import { CliError } from './errors.js';
import type { GitHubReleaseClient } from './github.js';
import { silentLogger, type Logger } from './log.js';

export interface PublishRequest {
  tag: string;
  commit?: string;
  artifacts: string[];
  allowUpdates: boolean;
}

export type ReleaseClient = Pick<
  GitHubReleaseClient,
  'getReleaseByTag' | 'createRelease' | 'updateRelease' | 'listAssets' | 'deleteAsset' | 'uploadAsset'
>;

/**
 * Creates the release for `tag`, or updates it when `allowUpdates` is set, then
 * uploads every artifact. An existing asset with the same file name is replaced.
 */
export async function publishRelease(
  request: PublishRequest,
  client: ReleaseClient,
  log: Logger = silentLogger,
): Promise<PublishedRelease> {
  if (request.artifacts.length === 0) {
    throw new CliError('ARTIFACT_NOT_FOUND', 'At least one artifact is required', 1);
  }

  const names = request.artifacts.map((path) => basename(path));
  const duplicate = names.find((name, index) => names.indexOf(name) !== index);
  if (duplicate) {
    throw new CliError('VALIDATION_ERROR', `Duplicate artifact name: ${duplicate}`, 1);
  }

  const fields = {
    name: request.tag,
    ...(request.commit ? { target_commitish: request.commit } : {}),
  };

  let release: GitHubRelease;
  let created: boolean;
  const existing = await client.getReleaseByTag(request.tag);
  if (!existing) {
    log.info(`Creating release ${request.tag}`);
    release = await client.createRelease({
      tag_name: request.tag,
      draft: false,
      prerelease: false,
      ...fields,
    });
    created = true;
  } else {
    if (!request.allowUpdates) {
      throw new CliError('RELEASE_EXISTS', `Release ${request.tag} already exists`, 1, {
        release_id: existing.id,
        html_url: existing.html_url,
      });
    }
    log.info(`Updating release ${request.tag} (${existing.id})`);
    release = await client.updateRelease(existing.id, fields);
    created = false;
  }

  const currentAssets = created ? [] : await client.listAssets(release.id);
  const uploaded: string[] = [];
  for (const [index, path] of request.artifacts.entries()) {
    const name = names[index];
    const stale = currentAssets.find((asset) => asset.name === name);
    if (stale) {
      log.info(`Replacing asset ${name}`);
      await client.deleteAsset(stale.id);
    }
    log.info(`Uploading ${name}`);
    const asset = await client.uploadAsset(release, path, name);
    uploaded.push(asset.name);
  }

  return {
    id: release.id,
    html_url: release.html_url,
    created,
    uploaded,
  };
}
