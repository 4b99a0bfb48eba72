import { describe, expect, it } from 'vitest';
import type { ExportRules } from '@srctar/shared-types';
import { ExportFilter, type EntryInfo } from '../src/export-filter.js';
import { loadExportRules } from '../src/export-rules.js';

const rules: ExportRules = {
  nonessentialDirs: ['third_party/blink/web_tests', 'v8/test', 'third_party/rust-src'],
  testDirs: ['chrome/test/data', 'media/test/data'],
  essentialFiles: ['chrome/test/data/webui/i18n_process_css_test.html', 'v8/test/torque/test-torque.tq'],
  essentialGitDirs: ['third_party/rust-src/'],
};

function file(relPath: string): EntryInfo {
  return { relPath, kind: 'file', dangling: false };
}

function dir(relPath: string): EntryInfo {
  return { relPath, kind: 'directory', dangling: false };
}

describe('export filter', () => {
  const plain = new ExportFilter(rules, { removeNonessentialFiles: false, testData: false });
  const lite = new ExportFilter(rules, { removeNonessentialFiles: true, testData: false });
  const testData = new ExportFilter(rules, { removeNonessentialFiles: true, testData: true });

  it('always drops dangling symlinks and python caches', () => {
    expect(plain.classify({ relPath: 'base/link', kind: 'symlink', dangling: true })).toEqual({
      keep: false,
      reason: 'dangling-symlink',
    });
    expect(plain.classify(dir('tools/__pycache__'))).toEqual({ keep: false, reason: 'python-cache' });
    expect(plain.classify(file('tools/foo.pyc'))).toEqual({ keep: false, reason: 'python-cache' });
    expect(plain.classify({ relPath: 'base/link', kind: 'symlink', dangling: false }).keep).toBe(true);
  });

  it('drops out/ and .svn except under node_modules', () => {
    expect(plain.classify(dir('out'))).toEqual({ keep: false, reason: 'build-output' });
    expect(plain.classify(dir('third_party/foo/.svn')).keep).toBe(false);
    expect(
      plain.classify(dir('third_party/devtools-frontend/src/node_modules/typescript/out')).keep,
    ).toBe(true);
  });

  it('drops .git directories outside the essential git dirs', () => {
    expect(plain.classify(dir('.git'))).toEqual({ keep: false, reason: 'git-metadata' });
    expect(plain.classify(dir('third_party/skia/.git')).keep).toBe(false);
    expect(plain.classify(dir('third_party/rust-src/src/llvm-project/.git')).keep).toBe(true);
  });

  it('keeps nonessential content unless removal is requested', () => {
    expect(plain.classify(file('v8/test/mjsunit/array.js')).keep).toBe(true);
    expect(plain.classify(file('WebKit/ChangeLog')).keep).toBe(true);
  });

  it('removes change logs and files under nonessential dirs', () => {
    expect(lite.classify(file('third_party/foo/ChangeLog.txt'))).toEqual({
      keep: false,
      reason: 'changelog',
    });
    expect(lite.classify(file('v8/test/mjsunit/array.js'))).toEqual({
      keep: false,
      reason: 'nonessential',
    });
    expect(lite.classify(file('v8/test'))).toEqual({ keep: false, reason: 'nonessential' });
  });

  it('matches nonessential dirs on path components only', () => {
    expect(lite.classify(file('v8/testing/helper.cc')).keep).toBe(true);
  });

  it('keeps directories so the tree shape survives', () => {
    expect(lite.classify(dir('v8/test/mjsunit')).keep).toBe(true);
  });

  it('keeps gn inputs and essential files inside nonessential dirs', () => {
    expect(lite.classify(file('v8/test/BUILD.gn')).keep).toBe(true);
    expect(lite.classify(file('v8/test/unittests/unittests.gni')).keep).toBe(true);
    expect(lite.classify(file('v8/test/foo.pydeps')).keep).toBe(true);
    expect(lite.classify(file('v8/test/resources.grd.orig')).keep).toBe(true);
    expect(lite.classify(file('v8/test/torque/test-torque.tq')).keep).toBe(true);
    expect(lite.classify(file('chrome/test/data/webui/i18n_process_css_test.html')).keep).toBe(
      true,
    );
  });

  it('strips test data from the source archive only', () => {
    expect(lite.classify(file('media/test/data/bear.webm'))).toEqual({
      keep: false,
      reason: 'nonessential',
    });
    expect(testData.classify(file('media/test/data/bear.webm')).keep).toBe(true);
    expect(testData.classify(file('v8/test/mjsunit/array.js')).keep).toBe(false);
  });

  it('loads the bundled rule set', () => {
    const bundled = loadExportRules();
    expect(bundled.nonessentialDirs).toContain('v8/test');
    expect(bundled.testDirs).toContain('chrome/test/data');
    expect(bundled.essentialGitDirs).toEqual(['third_party/rust-src/']);
  });
});
