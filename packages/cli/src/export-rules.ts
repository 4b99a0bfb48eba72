import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { ExportRulesSchema, type ExportRules } from '@srctar/shared-types';
import { CliError } from './errors.js';

export const DEFAULT_RULES_PATH = fileURLToPath(
  new URL('../data/export-rules.json', import.meta.url),
);

let cached: ExportRules | undefined;

export function loadExportRules(path = DEFAULT_RULES_PATH): ExportRules {
  if (path === DEFAULT_RULES_PATH && cached) {
    return cached;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (error) {
    const message = error instanceof Error ? error.message : 'unreadable';
    throw new CliError('CONFIG_INVALID', `Cannot read export rules (${path}): ${message}`, 1);
  }

  const parsed = ExportRulesSchema.safeParse(raw);
  if (!parsed.success) {
    throw new CliError('CONFIG_INVALID', `Export rules failed validation: ${path}`, 1, {
      issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    });
  }

  if (path === DEFAULT_RULES_PATH) {
    cached = parsed.data;
  }
  return parsed.data;
}
