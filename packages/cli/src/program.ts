import { Command } from 'commander';
import {
  ArtifactPrefixSchema,
  artifactNames,
  DEFAULT_ARTIFACT_PREFIX,
  TagSchema,
  type ConfigFile,
} from '@srctar/shared-types';
import {
  DEFAULT_MOUNT_OWNER,
  getConfigPath,
  readConfig,
  resolveGitHubConfig,
  resolveWorkspaceConfig,
  writeConfig,
  type ConfigOverrides,
  type GitHubConfig,
} from './config.js';
import { CliError, errorMessage } from './errors.js';
import { exportTarball } from './exporter.js';
import { GitHubReleaseClient } from './github.js';
import { createLogger, isVerbose, type Logger } from './log.js';
import { renderOutput, type OutputMode } from './output.js';
import { buildPlan } from './plan.js';
import { publishRelease, type ReleaseClient } from './publish.js';
import { NodeStepExecutor, runPlan, type StepExecutor } from './runner.js';

export const CLI_VERSION = '0.1.0';

type GlobalOptions = {
  json?: boolean;
  human?: boolean;
  verbose?: boolean;
};

interface PlanCommandOptions {
  tag: string;
  v8PgoProfile?: boolean;
  workspace?: string;
  mountDir?: string;
  mountOwner?: string;
  prefix?: string;
  commit?: string;
  repository?: string;
  skipPublish?: boolean;
}

interface ExportCommandOptions {
  version?: string;
  srcDir?: string;
  basename?: string;
  testData?: boolean;
  removeNonessentialFiles?: boolean;
  xz?: boolean;
  progress?: boolean;
}

interface PublishCommandOptions {
  tag: string;
  artifact: string[];
  commit?: string;
  repository?: string;
  allowUpdates: boolean;
}

export interface ProgramContext {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  env: Record<string, string | undefined>;
  cwd: string;
  isTTY: boolean;
  configPath: string;
  /** Replaces the GitHub client; used by tests. */
  releaseClient?: (config: GitHubConfig) => ReleaseClient;
  /** Replaces the step executor for `run`; used by tests. */
  executor?: (client: () => ReleaseClient, log: Logger) => StepExecutor;
}

export function defaultContext(): ProgramContext {
  return {
    stdout: (text) => process.stdout.write(text),
    stderr: (text) => process.stderr.write(text),
    env: process.env,
    cwd: process.cwd(),
    isTTY: Boolean(process.stdout.isTTY),
    configPath: getConfigPath(),
  };
}

function pickOutputMode(options: GlobalOptions, isTTY: boolean): OutputMode {
  if (options.human) {
    return 'human';
  }
  if (options.json || !isTTY) {
    return 'json';
  }
  return 'human';
}

function addPlanOptions(command: Command) {
  return command
    .requiredOption('--tag <tag>', 'Source tag to fetch and release')
    .option('--v8-pgo-profile', 'Download the V8 builtins PGO profile (default)')
    .option('--no-v8-pgo-profile', 'Skip the V8 builtins PGO profile download')
    .option('--workspace <dir>', 'Working directory (default: $GITHUB_WORKSPACE or cwd)')
    .option('--mount-dir <dir>', 'Bind-mount this directory over the workspace first')
    .option('--mount-owner <owner>', 'Owner for the mounted workspace', DEFAULT_MOUNT_OWNER)
    .option('--prefix <prefix>', 'Archive name prefix', DEFAULT_ARTIFACT_PREFIX)
    .option('--commit <sha>', 'Commit the release points at (default: $GITHUB_SHA)')
    .option('--repository <owner/repo>', 'Repository to publish to (default: $GITHUB_REPOSITORY)')
    .option('--skip-publish', 'Stop after the tarballs are written');
}

function collect(value: string, previous: string[]) {
  return [...previous, value];
}

export function buildProgram(context: ProgramContext = defaultContext()) {
  const program = new Command();

  const globals = (command: Command) => command.optsWithGlobals<GlobalOptions>();
  const print = (command: Command, name: string, data: unknown) => {
    const mode = pickOutputMode(globals(command), context.isTTY);
    context.stdout(`${renderOutput(name, data, mode)}\n`);
  };
  const verbose = (command: Command) =>
    Boolean(globals(command).verbose) || isVerbose(context.env);
  const logger = (command: Command) =>
    createLogger({ verbose: verbose(command), write: context.stderr });
  const fileConfig = () => readConfig(context.configPath);

  const clientFor = (overrides: ConfigOverrides) => (): ReleaseClient => {
    const config = resolveGitHubConfig(overrides, context.env, fileConfig());
    if (context.releaseClient) {
      return context.releaseClient(config);
    }
    if (!config.token) {
      throw new CliError(
        'GITHUB_TOKEN_REQUIRED',
        'A GitHub token is required (GITHUB_TOKEN, SRCTAR_TOKEN or `srctar configure --token`)',
        4,
      );
    }
    if (!config.repository) {
      throw new CliError(
        'REPOSITORY_REQUIRED',
        'Repository is required (--repository, GITHUB_REPOSITORY or config file)',
        4,
      );
    }
    return new GitHubReleaseClient(config.apiUrl, config.repository, config.token);
  };

  const planFrom = (options: PlanCommandOptions, verboseExport: boolean) => {
    const overrides: ConfigOverrides = {
      workspace: options.workspace,
      prefix: options.prefix,
      mountDir: options.mountDir,
      mountOwner: options.mountOwner,
      commit: options.commit,
      repository: options.repository,
    };
    const workspace = resolveWorkspaceConfig(overrides, context.env, context.cwd);
    const commit = resolveGitHubConfig(overrides, context.env, fileConfig()).commit;
    const steps = buildPlan({ tag: options.tag, v8PgoProfile: options.v8PgoProfile }, workspace, {
      commit,
      skipPublish: options.skipPublish,
      verbose: verboseExport,
      basePath: context.env.PATH,
    });
    return { overrides, steps };
  };

  program
    .name('srctar')
    .description('Fetch a tagged browser source tree, package it as tarballs and publish a release')
    .version(CLI_VERSION, '-V, --cli-version', 'Print the srctar version')
    .option('--json', 'Render machine-parseable JSON output')
    .option('--human', 'Render human-readable output')
    .option('--verbose', 'Log every step detail and archive entry');

  program.addHelpText(
    'after',
    '\nDefault output is human-readable in a TTY and JSON when piped.\nEnv: GITHUB_TOKEN, GITHUB_REPOSITORY, GITHUB_SHA, GITHUB_WORKSPACE, GITHUB_API_URL.',
  );

  addPlanOptions(
    program.command('plan').description('Print the release steps without running them'),
  ).action((options: PlanCommandOptions, command: Command) => {
    print(command, 'plan', planFrom(options, verbose(command)).steps);
  });

  addPlanOptions(
    program.command('run').description('Fetch, stamp, package and publish a tag'),
  ).action(async (options: PlanCommandOptions, command: Command) => {
    const log = logger(command);
    const { overrides, steps } = planFrom(options, verbose(command));
    // Credentials are resolved before the first step runs.
    const client = steps.some((step) => step.kind === 'publish')
      ? clientFor(overrides)()
      : undefined;
    const resolveClient = (): ReleaseClient => client ?? clientFor(overrides)();
    const executor = context.executor
      ? context.executor(resolveClient, log)
      : new NodeStepExecutor(resolveClient, log);
    const report = await runPlan(steps, { tag: options.tag, executor, log });
    print(command, 'run', report);
  });

  program
    .command('export')
    .description('Write <output>.tar.xz from a source directory')
    .argument('[output...]', 'Output file name without the .tar.xz extension')
    .option('--version <version>', 'Version being packaged (required)')
    .option('--src-dir <dir>', 'Source directory to archive')
    .option('--basename <name>', 'Top-level directory name inside the archive')
    .option('--test-data', 'Archive only the test data directories')
    .option('--remove-nonessential-files', 'Strip files not needed to build')
    .option('--xz', 'Accepted for compatibility; output is always xz')
    .option('--progress', 'Show compressor progress')
    .action(async (outputs: string[], options: ExportCommandOptions, command: Command) => {
      if (outputs.length !== 1) {
        throw new CliError(
          'OUTPUT_REQUIRED',
          'You must provide only one argument: output file name (without .tar.xz extension).',
          1,
          { received: outputs },
        );
      }
      const result = await exportTarball({
        output: outputs[0],
        version: options.version,
        srcDir: options.srcDir,
        basename: options.basename,
        testData: options.testData,
        removeNonessentialFiles: options.removeNonessentialFiles,
        verbose: verbose(command),
        progress: options.progress,
        report: (line) => context.stderr(`${line}\n`),
      });
      print(command, 'export', result);
    });

  program
    .command('publish')
    .description('Create or update a release and upload artifacts to it')
    .requiredOption('--tag <tag>', 'Release tag')
    .requiredOption('--artifact <path>', 'Artifact to upload (repeatable)', collect, [])
    .option('--commit <sha>', 'Commit the release points at (default: $GITHUB_SHA)')
    .option('--repository <owner/repo>', 'Repository to publish to (default: $GITHUB_REPOSITORY)')
    .option('--no-allow-updates', 'Fail when the release already exists')
    .action(async (options: PublishCommandOptions, command: Command) => {
      const overrides = { commit: options.commit, repository: options.repository };
      const commit = resolveGitHubConfig(overrides, context.env, fileConfig()).commit;
      const release = await publishRelease(
        {
          tag: options.tag,
          commit,
          artifacts: options.artifact,
          allowUpdates: options.allowUpdates,
        },
        clientFor(overrides)(),
        logger(command),
      );
      print(command, 'publish', release);
    });

  program
    .command('artifacts')
    .description('Print the archive file names for a tag')
    .requiredOption('--tag <tag>', 'Source tag')
    .option('--prefix <prefix>', 'Archive name prefix', DEFAULT_ARTIFACT_PREFIX)
    .action((options: { tag: string; prefix: string }, command: Command) => {
      const tag = TagSchema.safeParse(options.tag);
      const prefix = ArtifactPrefixSchema.safeParse(options.prefix);
      if (!tag.success || !prefix.success) {
        throw new CliError('VALIDATION_ERROR', 'Tag and prefix must be usable as file names', 1, {
          tag: options.tag,
          prefix: options.prefix,
        });
      }
      const names = artifactNames(prefix.data, tag.data);
      print(command, 'artifacts', { source: names.source, test_data: names.testData });
    });

  program
    .command('configure')
    .description('Store GitHub settings in the local config file')
    .option('--token <token>', 'GitHub token')
    .option('--api-url <url>', 'GitHub API base URL')
    .option('--repository <owner/repo>', 'Default repository to publish to')
    .action((options: ConfigFile, command: Command) => {
      const next: ConfigFile = { ...fileConfig() };
      if (options.token) {
        next.token = options.token;
      }
      if (options.apiUrl) {
        next.apiUrl = options.apiUrl;
      }
      if (options.repository) {
        next.repository = options.repository;
      }
      try {
        writeConfig(next, context.configPath);
      } catch (error) {
        throw new CliError('CONFIG_INVALID', errorMessage(error, 'Invalid config'), 1);
      }
      print(command, 'configure', {
        config_path: context.configPath,
        token: next.token ? 'configured' : 'missing',
        api_url: next.apiUrl ?? null,
        repository: next.repository ?? null,
      });
    });

  return program;
}
