import { delimiter, dirname, join } from 'node:path';
import {
  artifactNames,
  ReleaseInputsSchema,
  type ReleaseInputs,
  type ReleaseInputsInput,
} from '@srctar/shared-types';
import type { WorkspaceConfig } from './config.js';
import { CliError } from './errors.js';
import type { ExportOptions } from './exporter.js';

interface StepBase {
  id: string;
  title: string;
  /** Extra environment merged over process.env for this step. */
  env?: Record<string, string>;
}

export interface ExecStep extends StepBase {
  kind: 'exec';
  command: string;
  args: string[];
  cwd: string;
}

export interface AppendFileStep extends StepBase {
  kind: 'append-file';
  path: string;
  content: string;
}

export interface TouchStep extends StepBase {
  kind: 'touch';
  path: string;
}

export interface ExportStep extends StepBase {
  kind: 'export-tarball';
  options: ExportOptions;
  /** Final archive path, i.e. `options.output` + '.tar.xz'. */
  artifact: string;
}

export interface PublishStep extends StepBase {
  kind: 'publish';
  tag: string;
  commit?: string;
  artifacts: string[];
  allowUpdates: boolean;
}

export type PlanStep = ExecStep | AppendFileStep | TouchStep | ExportStep | PublishStep;

export interface PlanOptions {
  commit?: string;
  skipPublish?: boolean;
  /** List every archived and skipped path while exporting. */
  verbose?: boolean;
  /** PATH the depot_tools directory is prepended to. */
  basePath?: string;
}

const LASTCHANGE = 'src/build/util/lastchange.py';
const V8_PGO_DOWNLOADER = 'src/v8/tools/builtins-pgo/download_profiles.py';

export function parseReleaseInputs(raw: ReleaseInputsInput): ReleaseInputs {
  const parsed = ReleaseInputsSchema.safeParse(raw);
  if (!parsed.success) {
    throw new CliError('VALIDATION_ERROR', 'Invalid release inputs', 1, {
      issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    });
  }
  return parsed.data;
}

export function buildPlan(
  rawInputs: ReleaseInputsInput,
  config: WorkspaceConfig,
  options: PlanOptions = {},
): PlanStep[] {
  const inputs = parseReleaseInputs(rawInputs);
  const ws = config.workspace;
  const depotTools = join(ws, 'depot_tools');
  const names = artifactNames(config.prefix, inputs.tag);
  const basePath = options.basePath ?? process.env.PATH ?? '';
  const env = { PATH: basePath ? `${depotTools}${delimiter}${basePath}` : depotTools };

  const exec = (
    id: string,
    title: string,
    command: string,
    args: string[],
    cwd = ws,
  ): ExecStep => ({
    id,
    title,
    kind: 'exec',
    command,
    args,
    cwd,
    env,
  });

  const steps: PlanStep[] = [];

  if (config.mountDir) {
    // The workspace may not exist yet, so these run from its parent.
    const parent = dirname(ws);
    steps.push(
      exec('mount-workspace-mkdir', 'Create mount directory', 'sudo', [
        'mkdir',
        '-p',
        config.mountDir,
        ws,
      ], parent),
      exec('mount-workspace-bind', 'Bind-mount workspace', 'sudo', [
        'mount',
        '--bind',
        config.mountDir,
        ws,
      ], parent),
      exec('mount-workspace-chown', 'Take ownership of workspace', 'sudo', [
        'chown',
        config.mountOwner,
        ws,
      ], parent),
    );
  }

  steps.push(
    exec('fetch-depot-tools', 'Fetch depot_tools', 'git', [
      'clone',
      config.depotToolsUrl,
      'depot_tools',
    ]),
    exec('gclient-config', 'Configure gclient', 'gclient', [
      'config',
      '--name',
      'src',
      `${config.chromiumSrcUrl}@${inputs.tag}`,
    ]),
    {
      id: 'gclient-target-os',
      title: 'Restrict gclient to linux',
      kind: 'append-file',
      path: join(ws, '.gclient'),
      content: "target_os = [ 'linux' ]\n",
    },
    exec('gclient-sync', 'Sync source', 'gclient', ['sync', '--nohooks', '--no-history']),
    exec('lastchange', 'Stamp LASTCHANGE', LASTCHANGE, ['-o', 'src/build/util/LASTCHANGE']),
    exec('gpu-lists-version', 'Stamp GPU lists version', LASTCHANGE, [
      '-m',
      'GPU_LISTS_VERSION',
      '--revision-id-only',
      '--header',
      'src/gpu/config/gpu_lists_version.h',
    ]),
    exec('skia-commit-hash', 'Stamp Skia commit hash', LASTCHANGE, [
      '-m',
      'SKIA_COMMIT_HASH',
      '-s',
      'src/third_party/skia',
      '--header',
      'src/skia/ext/skia_commit_hash.h',
    ]),
    exec('dawn-version', 'Stamp Dawn version', LASTCHANGE, [
      '-s',
      'src/third_party/dawn',
      '--revision',
      'src/gpu/webgpu/DAWN_VERSION',
    ]),
    {
      id: 'touch-i18n-test',
      title: 'Create i18n_process_css_test.html',
      kind: 'touch',
      path: join(ws, 'src/chrome/test/data/webui/i18n_process_css_test.html'),
    },
    exec('update-pgo-profiles', 'Download PGO profiles', 'src/tools/update_pgo_profiles.py', [
      '--target=linux',
      'update',
      '--gs-url-base=chromium-optimization-profiles/pgo_profiles',
    ]),
  );

  if (inputs.v8PgoProfile) {
    steps.push(
      exec('v8-pgo-profile', 'Download V8 builtins PGO profile', V8_PGO_DOWNLOADER, [
        `--depot-tools=${depotTools}`,
        '--force',
        'download',
      ]),
    );
  }

  const srcDir = join(ws, 'src');
  const sourceArtifact = join(ws, names.source);
  const testDataArtifact = join(ws, names.testData);

  steps.push(
    {
      id: 'export-testdata',
      title: `Export ${names.testData}`,
      kind: 'export-tarball',
      artifact: testDataArtifact,
      options: {
        output: join(ws, `${names.base}-testdata`),
        basename: names.base,
        version: inputs.tag,
        srcDir,
        testData: true,
        removeNonessentialFiles: true,
        verbose: options.verbose,
        progress: true,
      },
    },
    {
      id: 'export-source',
      title: `Export ${names.source}`,
      kind: 'export-tarball',
      artifact: sourceArtifact,
      options: {
        output: join(ws, names.base),
        version: inputs.tag,
        srcDir,
        removeNonessentialFiles: true,
        verbose: options.verbose,
        progress: true,
      },
    },
  );

  if (!options.skipPublish) {
    steps.push({
      id: 'publish',
      title: `Publish release ${inputs.tag}`,
      kind: 'publish',
      tag: inputs.tag,
      commit: options.commit,
      artifacts: [sourceArtifact, testDataArtifact],
      allowUpdates: true,
    });
  }

  return steps;
}

export function artifactPaths(steps: PlanStep[]): string[] {
  return steps.flatMap((step) => (step.kind === 'export-tarball' ? [step.artifact] : []));
}
