import { checksumDigest, type RunReport } from '@srctar/shared-types';
import type { PlanStep } from './plan.js';

export type OutputMode = 'json' | 'human';
const OUTPUT_SCHEMA_VERSION = '1.0.0';

export function renderOutput(command: string, data: unknown, mode: OutputMode) {
  if (mode === 'json') {
    return JSON.stringify(
      {
        ok: true,
        schema_version: OUTPUT_SCHEMA_VERSION,
        command,
        data,
      },
      null,
      2,
    );
  }

  return renderHuman(command, data);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isPlanStep(value: unknown): value is PlanStep {
  return isRecord(value) && typeof value.kind === 'string' && typeof value.id === 'string';
}

function isRunReport(value: unknown): value is RunReport {
  return (
    isRecord(value) &&
    typeof value.tag === 'string' &&
    Array.isArray(value.steps) &&
    Array.isArray(value.artifacts)
  );
}

export function describeStep(step: PlanStep): string {
  switch (step.kind) {
    case 'exec':
      return [step.command, ...step.args].join(' ');
    case 'append-file':
      return `append ${JSON.stringify(step.content)} to ${step.path}`;
    case 'touch':
      return `touch ${step.path}`;
    case 'export-tarball': {
      const flags = [
        step.options.testData ? '--test-data' : '',
        step.options.removeNonessentialFiles ? '--remove-nonessential-files' : '',
      ].filter(Boolean);
      return [`export ${step.artifact}`, ...flags].join(' ');
    }
    case 'publish':
      return `release ${step.tag} <- ${step.artifacts.join(', ')}${
        step.allowUpdates ? ' (allow updates)' : ''
      }`;
  }
}

function renderPlanHuman(steps: PlanStep[]) {
  if (steps.length === 0) {
    return 'Nothing to do.';
  }
  return steps
    .map((step, index) => `${index + 1}. ${step.title} [${step.id}]\n   ${describeStep(step)}`)
    .join('\n');
}

function renderRunHuman(report: RunReport) {
  const lines = [`Tag ${report.tag}: ${report.steps.length} steps completed`];
  for (const step of report.steps) {
    lines.push(`  ✓ ${step.title} (${(step.duration_ms / 1000).toFixed(1)}s)`);
  }
  for (const artifact of report.artifacts) {
    lines.push(
      `${artifact.name}  ${artifact.bytes} bytes  sha256 ${checksumDigest(artifact.sha256) ?? 'unavailable'}`,
    );
  }
  if (report.release) {
    lines.push(
      `Release ${report.release.created ? 'created' : 'updated'}: ${report.release.html_url}`,
    );
  }
  return lines.join('\n');
}

function renderHuman(command: string, data: unknown): string {
  if (command === 'plan' && Array.isArray(data) && data.every(isPlanStep)) {
    return renderPlanHuman(data);
  }

  if (command === 'run' && isRunReport(data)) {
    return renderRunHuman(data);
  }

  if (Array.isArray(data)) {
    return data.length === 0 ? 'No results.' : data.map((entry) => String(entry)).join('\n');
  }

  if (isRecord(data)) {
    return Object.entries(data)
      .map(([key, value]) => `${key}: ${typeof value === 'string' ? value : JSON.stringify(value)}`)
      .join('\n');
  }

  return String(data);
}
