import { spawnSync } from 'node:child_process';
import { appendFileSync, closeSync, openSync, utimesSync } from 'node:fs';
import {
  RunReportSchema,
  type PublishedRelease,
  type RunReport,
  type StepResult,
} from '@srctar/shared-types';
import { summarizeArtifact } from './checksum.js';
import { CliError, errorMessage } from './errors.js';
import { exportTarball } from './exporter.js';
import { silentLogger, type Logger } from './log.js';
import {
  artifactPaths,
  type AppendFileStep,
  type ExecStep,
  type ExportStep,
  type PlanStep,
  type PublishStep,
  type TouchStep,
} from './plan.js';
import { publishRelease, type ReleaseClient } from './publish.js';

export interface StepExecutor {
  exec(step: ExecStep): void | Promise<void>;
  appendFile(step: AppendFileStep): void | Promise<void>;
  touch(step: TouchStep): void | Promise<void>;
  exportTarball(step: ExportStep): void | Promise<void>;
  publish(step: PublishStep): PublishedRelease | Promise<PublishedRelease>;
}

export class NodeStepExecutor implements StepExecutor {
  constructor(
    private readonly resolveClient: () => ReleaseClient,
    private readonly log: Logger = silentLogger,
  ) {}

  exec(step: ExecStep) {
    this.log.debug(`$ ${[step.command, ...step.args].join(' ')} (in ${step.cwd})`);
    const run = spawnSync(step.command, step.args, {
      cwd: step.cwd,
      env: { ...process.env, ...step.env },
      stdio: 'inherit',
    });
    if (run.error) {
      throw new CliError('STEP_FAILED', `Could not run ${step.command}: ${run.error.message}`, 1, {
        step_id: step.id,
      });
    }
    if (run.status !== 0) {
      throw new CliError(
        'STEP_FAILED',
        `${step.command} exited with ${run.status ?? run.signal ?? 'unknown status'}`,
        run.status ?? 1,
        { step_id: step.id, exit_code: run.status, signal: run.signal },
      );
    }
  }

  appendFile(step: AppendFileStep) {
    appendFileSync(step.path, step.content);
  }

  touch(step: TouchStep) {
    const now = new Date();
    try {
      utimesSync(step.path, now, now);
    } catch {
      closeSync(openSync(step.path, 'a'));
    }
  }

  async exportTarball(step: ExportStep) {
    const result = await exportTarball({
      ...step.options,
      report: (line) => this.log.info(line),
    });
    this.log.debug(
      `${step.artifact}: ${result.added} entries, ${result.skipped} skipped, mtime ${result.mtime}`,
    );
  }

  publish(step: PublishStep) {
    return publishRelease(
      {
        tag: step.tag,
        commit: step.commit,
        artifacts: step.artifacts,
        allowUpdates: step.allowUpdates,
      },
      this.resolveClient(),
      this.log,
    );
  }
}

function dispatch(step: Exclude<PlanStep, PublishStep>, executor: StepExecutor) {
  switch (step.kind) {
    case 'exec':
      return executor.exec(step);
    case 'append-file':
      return executor.appendFile(step);
    case 'touch':
      return executor.touch(step);
    case 'export-tarball':
      return executor.exportTarball(step);
  }
}

export interface RunOptions {
  tag: string;
  executor: StepExecutor;
  log?: Logger;
  /** Hash and size the produced archives for the report. */
  summarizeArtifacts?: boolean;
  now?: () => number;
}

/** Runs `steps` in order and stops at the first failure. */
export async function runPlan(steps: PlanStep[], options: RunOptions): Promise<RunReport> {
  const log = options.log ?? silentLogger;
  const now = options.now ?? Date.now;
  const results: StepResult[] = [];
  let release: PublishedRelease | undefined;

  for (const [index, step] of steps.entries()) {
    log.info(`[${index + 1}/${steps.length}] ${step.title}`);
    const startedAt = now();
    try {
      if (step.kind === 'publish') {
        release = await options.executor.publish(step);
      } else {
        await dispatch(step, options.executor);
      }
    } catch (error) {
      const completed = results.map((result) => result.id);
      if (error instanceof CliError) {
        const details =
          error.code === 'STEP_FAILED'
            ? { ...error.details, step_id: step.id, completed }
            : { step_id: step.id, cause_code: error.code, cause_details: error.details, completed };
        throw new CliError(
          'STEP_FAILED',
          `${step.title} failed: ${error.message}`,
          error.exitCode,
          details,
        );
      }
      throw new CliError('STEP_FAILED', `${step.title} failed: ${errorMessage(error)}`, 1, {
        step_id: step.id,
        cause_code: 'UNEXPECTED_ERROR',
        completed,
      });
    }
    results.push({
      id: step.id,
      title: step.title,
      duration_ms: Math.max(0, Math.round(now() - startedAt)),
    });
  }

  const artifacts =
    options.summarizeArtifacts === false
      ? []
      : await Promise.all(artifactPaths(steps).map((path) => summarizeArtifact(path)));

  return RunReportSchema.parse({
    tag: options.tag,
    steps: results,
    artifacts,
    ...(release ? { release } : {}),
  });
}
