import { posix } from 'node:path';
import type { ExportRules } from '@srctar/shared-types';

export type EntryKind = 'file' | 'directory' | 'symlink' | 'other';

export interface EntryInfo {
  /** Path relative to the source directory, '/'-separated. */
  relPath: string;
  kind: EntryKind;
  /** Symlink whose target does not exist. */
  dangling: boolean;
}

export type SkipReason =
  | 'dangling-symlink'
  | 'python-cache'
  | 'build-output'
  | 'git-metadata'
  | 'changelog'
  | 'nonessential';

export type FilterDecision = { keep: true } | { keep: false; reason: SkipReason };

export interface FilterOptions {
  removeNonessentialFiles: boolean;
  testData: boolean;
}

// gn needs these even inside directories that are otherwise stripped.
const BUILD_CRITICAL_FILE = /\.(gn|gni|grd|grdp|isolate|pydeps)(\.\S+)?$/;

const KEEP: FilterDecision = { keep: true };

function skip(reason: SkipReason): FilterDecision {
  return { keep: false, reason };
}

function isUnder(relPath: string, dir: string) {
  return relPath === dir || relPath.startsWith(`${dir}/`);
}

export class ExportFilter {
  private readonly strippedDirs: string[];
  private readonly essentialFiles: Set<string>;

  constructor(
    private readonly rules: ExportRules,
    private readonly options: FilterOptions,
  ) {
    // Test directories are the payload of a test-data archive, so they are only
    // stripped from the full source archive.
    this.strippedDirs = options.testData
      ? [...rules.nonessentialDirs]
      : [...new Set([...rules.nonessentialDirs, ...rules.testDirs])];
    this.essentialFiles = new Set(rules.essentialFiles);
  }

  classify(entry: EntryInfo): FilterDecision {
    const relPath = entry.relPath;
    const parent = posix.dirname(relPath);
    const name = posix.basename(relPath);

    if (entry.kind === 'symlink' && entry.dangling) {
      return skip('dangling-symlink');
    }

    if (name === '__pycache__' || name.endsWith('.pyc')) {
      return skip('python-cache');
    }

    // devtools-frontend ships required files in node_modules/<module>/out.
    if ((name === '.svn' || name === 'out') && !parent.includes('node_modules')) {
      return skip('build-output');
    }

    if (
      name === '.git' &&
      !this.rules.essentialGitDirs.some((essential) => relPath.startsWith(essential))
    ) {
      return skip('git-metadata');
    }

    if (!this.options.removeNonessentialFiles) {
      return KEEP;
    }

    if (relPath.includes('ChangeLog')) {
      return skip('changelog');
    }

    const keepFile = BUILD_CRITICAL_FILE.test(name) || this.essentialFiles.has(relPath);
    if (
      !keepFile &&
      (entry.kind === 'file' || entry.kind === 'symlink') &&
      this.strippedDirs.some((dir) => isUnder(relPath, dir))
    ) {
      return skip('nonessential');
    }

    return KEEP;
  }
}
