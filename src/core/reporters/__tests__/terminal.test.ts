import { describe, expect, it } from 'vitest';
import type { PipelineRun, StageResult } from '@pipeline/types';
import { formatResultLine, renderHeader, renderSummary, renderUnitList } from '../terminal';

const failed: StageResult = {
  name: 'static-check:net/ssh',
  status: 'failed',
  duration: 3.456,
  stdout: 'o'.repeat(300),
  stderr: 'e'.repeat(300),
  command: 'yamllint roles/net/ssh',
  unit: 'net/ssh',
};

describe('formatResultLine', () => {
  it('prints the status line and a 200 character error preview', () => {
    expect(formatResultLine(failed, { color: false })).toBe(
      `  [FAILED] static-check:net/ssh (3.46s)\n    Error: ${'e'.repeat(200)}...\n`
    );
  });

  it('adds an output preview in verbose mode', () => {
    const passed: StageResult = { ...failed, status: 'passed', stdout: 'all good' };

    expect(formatResultLine(passed, { color: false, verbose: true })).toBe(
      '  [PASSED] static-check:net/ssh (3.46s)\n    Output: all good...\n'
    );
  });

  it('colours the label when asked to', () => {
    const skipped: StageResult = { ...failed, status: 'skipped', stdout: '', stderr: '' };

    expect(formatResultLine(skipped, { color: true })).toBe(
      '  [\u001b[93mSKIPPED\u001b[0m] static-check:net/ssh (3.46s)\n'
    );
  });
});

describe('renderSummary', () => {
  const run: PipelineRun = {
    startTime: '2026-03-01T10:00:00.000Z',
    endTime: '2026-03-01T10:00:05.000Z',
    totalDuration: 5.004,
    stages: [failed],
    passed: 0,
    failed: 1,
    skipped: 0,
    overallStatus: 'failed',
  };

  it('lists counts, duration and the banner', () => {
    expect(renderSummary(run, { color: false }).split('\n')).toEqual([
      '',
      '='.repeat(60),
      'Pipeline Summary',
      '='.repeat(60),
      '  Total stages: 1',
      '  Passed: 0',
      '  Failed: 1',
      '  Skipped: 0',
      '  Duration: 5.00s',
      '',
      'Pipeline FAILED',
      '',
    ]);
  });

  it('shows the passed banner when nothing failed', () => {
    const ok: PipelineRun = { ...run, stages: [], failed: 0, overallStatus: 'passed' };

    expect(renderSummary(ok, { color: false }).endsWith('\nPipeline PASSED\n')).toBe(true);
  });
});

describe('renderHeader', () => {
  it('names stage, unit and parallelism', () => {
    expect(
      renderHeader({ stage: 'all', parallelism: 4, dryRun: true }, { color: false }).split('\n')
    ).toEqual([
      '='.repeat(60),
      '  Role Pipeline',
      '='.repeat(60),
      '  Stage: all',
      '  Unit: all',
      '  Parallel jobs: 4',
      '  [DRY RUN MODE]',
      '',
      '',
    ]);
  });
});

describe('renderUnitList', () => {
  it('prints a count and one line per unit', () => {
    expect(renderUnitList(['common/base', 'net/ssh/hardened'])).toBe(
      'Found 2 units with scenario tests:\n  - common/base\n  - net/ssh/hardened\n'
    );
  });
});
