import { describe, expect, it } from 'vitest';
import type { RunReport } from '@srctar/shared-types';
import { describeStep, renderOutput } from '../src/output.js';
import type { PlanStep } from '../src/plan.js';

const steps: PlanStep[] = [
  {
    id: 'gclient-sync',
    title: 'Sync source',
    kind: 'exec',
    command: 'gclient',
    args: ['sync', '--nohooks', '--no-history'],
    cwd: '/work',
  },
  {
    id: 'gclient-target-os',
    title: 'Restrict gclient to linux',
    kind: 'append-file',
    path: '/work/.gclient',
    content: "target_os = [ 'linux' ]\n",
  },
  {
    id: 'export-testdata',
    title: 'Export chromium-1.0-testdata.tar.xz',
    kind: 'export-tarball',
    artifact: '/work/chromium-1.0-testdata.tar.xz',
    options: { output: '/work/chromium-1.0-testdata', testData: true, removeNonessentialFiles: true },
  },
  {
    id: 'publish',
    title: 'Publish release 1.0',
    kind: 'publish',
    tag: '1.0',
    artifacts: ['/work/chromium-1.0.tar.xz', '/work/chromium-1.0-testdata.tar.xz'],
    allowUpdates: true,
  },
];

describe('output rendering', () => {
  it('returns JSON envelope', () => {
    const parsed = JSON.parse(renderOutput('plan', steps, 'json'));
    expect(parsed.ok).toBe(true);
    expect(parsed.schema_version).toBe('1.0.0');
    expect(parsed.command).toBe('plan');
    expect(parsed.data[0].id).toBe('gclient-sync');
  });

  it('describes each kind of step', () => {
    expect(steps.map((step) => describeStep(step))).toEqual([
      'gclient sync --nohooks --no-history',
      `append "target_os = [ 'linux' ]\\n" to /work/.gclient`,
      'export /work/chromium-1.0-testdata.tar.xz --test-data --remove-nonessential-files',
      'release 1.0 <- /work/chromium-1.0.tar.xz, /work/chromium-1.0-testdata.tar.xz (allow updates)',
    ]);
  });

  it('renders a numbered human plan', () => {
    const output = renderOutput('plan', steps.slice(0, 1), 'human');
    expect(output).toBe('1. Sync source [gclient-sync]\n   gclient sync --nohooks --no-history');
    expect(renderOutput('plan', [], 'human')).toBe('Nothing to do.');
  });

  it('renders a human run report', () => {
    const report: RunReport = {
      tag: '1.0',
      steps: [{ id: 'gclient-sync', title: 'Sync source', duration_ms: 61_250 }],
      artifacts: [
        {
          name: 'chromium-1.0.tar.xz',
          path: '/work/chromium-1.0.tar.xz',
          bytes: 3,
          sha256: 'sha256:ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad',
        },
      ],
      release: {
        id: 9,
        html_url: 'https://github.example.test/o/r/releases/tag/1.0',
        created: false,
        uploaded: ['chromium-1.0.tar.xz'],
      },
    };

    expect(renderOutput('run', report, 'human').split('\n')).toEqual([
      'Tag 1.0: 1 steps completed',
      '  ✓ Sync source (61.3s)',
      'chromium-1.0.tar.xz  3 bytes  sha256 ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad',
      'Release updated: https://github.example.test/o/r/releases/tag/1.0',
    ]);
  });

  it('falls back to key/value lines', () => {
    expect(renderOutput('publish', { id: 9, created: true }, 'human')).toBe('id: 9\ncreated: true');
    expect(renderOutput('other', [], 'human')).toBe('No results.');
  });
});
