import { spawn } from 'node:child_process';
import { closeSync, openSync } from 'node:fs';
import { lstat, readdir, readFile, stat } from 'node:fs/promises';
import { basename, join, posix, resolve } from 'node:path';
import * as tar from 'tar';
import type { ExportRules } from '@srctar/shared-types';
import { CliError, errorMessage } from './errors.js';
import { ExportFilter, type EntryKind } from './export-filter.js';
import { loadExportRules } from './export-rules.js';

export const TARBALL_EXTENSION = '.tar.xz';
export const COMMIT_TIME_FILE = 'build/util/LASTCHANGE.committime';

export interface CompressorCommand {
  command: string;
  args: string[];
}

export interface ExportOptions {
  /** Output path without the .tar.xz extension. */
  output: string;
  version?: string;
  srcDir?: string;
  /** Top-level directory inside the archive; defaults to the output's base name. */
  basename?: string;
  testData?: boolean;
  removeNonessentialFiles?: boolean;
  verbose?: boolean;
  progress?: boolean;
  rules?: ExportRules;
  compressor?: CompressorCommand;
  /** Receives the A/D listing and skip notices. Defaults to stderr. */
  report?: (line: string) => void;
}

export interface ExportResult {
  outputPath: string;
  basename: string;
  mtime: number;
  added: number;
  skipped: number;
  missingTestDirs: string[];
}

export function xzCompressor(progress = false): CompressorCommand {
  return { command: 'xz', args: ['-T', '0', '-9', ...(progress ? ['-v'] : []), '-'] };
}

export function tarballPath(output: string) {
  return `${output}${TARBALL_EXTENSION}`;
}

async function pathExists(path: string) {
  try {
    await stat(path);
    return true;
  } catch {
    return false;
  }
}

async function isDirectory(path: string) {
  try {
    return (await stat(path)).isDirectory();
  } catch {
    return false;
  }
}

export async function readCommitTime(srcDir: string): Promise<number> {
  const path = join(srcDir, COMMIT_TIME_FILE);
  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch (error) {
    throw new CliError('COMMIT_TIME_UNREADABLE', `Cannot read ${path}: ${errorMessage(error)}`, 1);
  }

  const trimmed = content.trim();
  if (!/^\d+$/.test(trimmed)) {
    throw new CliError('COMMIT_TIME_UNREADABLE', `${path} does not hold a unix timestamp`, 1, {
      content: trimmed.slice(0, 64),
    });
  }
  return Number(trimmed);
}

interface StatsLike {
  isFile(): boolean;
  isDirectory(): boolean;
  isSymbolicLink(): boolean;
}

function kindOf(stats: StatsLike): EntryKind {
  if (stats.isSymbolicLink()) {
    return 'symlink';
  }
  if (stats.isDirectory()) {
    return 'directory';
  }
  if (stats.isFile()) {
    return 'file';
  }
  return 'other';
}

interface CollectedEntries {
  paths: string[];
  skipped: number;
}

/** Walks `roots` depth-first in name order, pruning skipped directories. */
async function collectEntries(
  srcDir: string,
  roots: string[],
  filter: ExportFilter,
  listing: ((line: string) => void) | undefined,
): Promise<CollectedEntries> {
  const collected: CollectedEntries = { paths: [], skipped: 0 };

  const visit = async (relPath: string) => {
    const absolute = join(srcDir, relPath);
    const kind = kindOf(await lstat(absolute));
    const dangling = kind === 'symlink' && !(await pathExists(absolute));
    const decision = filter.classify({ relPath, kind, dangling });

    if (!decision.keep) {
      collected.skipped += 1;
      listing?.(`D\t${absolute}`);
      return;
    }

    listing?.(`A\t${absolute}`);
    collected.paths.push(relPath);

    if (kind === 'directory') {
      const children = (await readdir(absolute)).sort();
      for (const child of children) {
        await visit(posix.join(relPath, child));
      }
    }
  };

  for (const root of roots) {
    await visit(root);
  }
  return collected;
}

interface CompressOptions {
  cwd: string;
  prefix: string;
  mtime: number;
  compressor: CompressorCommand;
  outputPath: string;
}

function compress(paths: string[], options: CompressOptions): Promise<void> {
  const fd = openSync(options.outputPath, 'w');

  return new Promise<void>((resolvePromise, reject) => {
    const child = spawn(options.compressor.command, options.compressor.args, {
      stdio: ['pipe', fd, 'inherit'],
    });
    let stdinError: Error | undefined;
    let settled = false;

    const fail = (error: unknown) => {
      if (!settled) {
        settled = true;
        reject(error);
      }
    };

    child.once('error', (error) => {
      fail(
        new CliError('XZ_FAILED', `Cannot start ${options.compressor.command}: ${error.message}`, 1),
      );
    });

    child.once('close', (code) => {
      if (code !== 0) {
        fail(new CliError('XZ_FAILED', 'xz -9 failed!', 1, { exit_code: code }));
        return;
      }
      if (stdinError) {
        fail(new CliError('ARCHIVE_FAILED', stdinError.message, 1));
        return;
      }
      if (!settled) {
        settled = true;
        resolvePromise();
      }
    });

    const stdin = child.stdin;
    if (!stdin) {
      child.kill();
      fail(new CliError('ARCHIVE_FAILED', 'Compressor stdin is not writable', 1));
      return;
    }
    stdin.on('error', (error) => {
      stdinError = error;
    });

    const pack = tar.create(
      {
        cwd: options.cwd,
        prefix: options.prefix,
        portable: true,
        mtime: new Date(options.mtime * 1000),
        noDirRecurse: true,
        strict: true,
        // Portable mode leaves directory mtimes out; every member carries the commit time.
        onWriteEntry: (entry) => {
          entry.noMtime = false;
        },
      },
      paths,
    );
    pack.on('error', (error: unknown) => {
      child.kill();
      fail(new CliError('ARCHIVE_FAILED', errorMessage(error, 'tar stream failed'), 1));
    });
    pack.pipe(stdin);
  }).finally(() => {
    closeSync(fd);
  });
}

export async function exportTarball(options: ExportOptions): Promise<ExportResult> {
  if (!options.version) {
    throw new CliError(
      'VERSION_REQUIRED',
      'A version number must be provided via the --version option.',
      1,
    );
  }
  if (!options.srcDir || !(await pathExists(options.srcDir))) {
    throw new CliError(
      'SRC_DIR_NOT_FOUND',
      `Cannot find the src directory ${options.srcDir ?? '(not set)'}`,
      1,
    );
  }

  const srcDir = resolve(options.srcDir);
  const outputPath = resolve(tarballPath(options.output));
  const archiveBase = options.basename ?? basename(options.output);
  const report = options.report ?? ((line: string) => process.stderr.write(`${line}\n`));
  const rules = options.rules ?? loadExportRules();
  const testData = options.testData ?? false;
  const filter = new ExportFilter(rules, {
    removeNonessentialFiles: options.removeNonessentialFiles ?? false,
    testData,
  });

  const mtime = await readCommitTime(srcDir);

  const roots: string[] = [];
  const missingTestDirs: string[] = [];
  if (testData) {
    for (const directory of rules.testDirs) {
      const testDir = join(srcDir, directory);
      if (!(await isDirectory(testDir))) {
        // Depends on the milestone being packaged.
        report(`"${testDir}" not present; skipping.`);
        missingTestDirs.push(directory);
        continue;
      }
      roots.push(directory);
    }
  } else {
    roots.push(...(await readdir(srcDir)).sort());
  }

  const collected = await collectEntries(
    srcDir,
    roots,
    filter,
    options.verbose ? report : undefined,
  );

  await compress(collected.paths, {
    cwd: srcDir,
    prefix: archiveBase,
    mtime,
    compressor: options.compressor ?? xzCompressor(options.progress ?? false),
    outputPath,
  });

  return {
    outputPath,
    basename: archiveBase,
    mtime,
    added: collected.paths.length,
    skipped: collected.skipped,
    missingTestDirs,
  };
}
