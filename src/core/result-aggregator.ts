import type {
  PipelineRun,
  ResultOrder,
  StageKind,
  StageOutcome,
  StageResult,
} from '@pipeline/types';
import { STAGE_ORDER } from './scheduler';

export type Presentation = {
  label: string;
  /** ANSI SGR code */
  color: string;
};

export const STATUS_PRESENTATION = {
  pending: { label: 'PENDING', color: '\u001b[95m' },
  running: { label: 'RUNNING', color: '\u001b[94m' },
  passed: { label: 'PASSED', color: '\u001b[92m' },
  failed: { label: 'FAILED', color: '\u001b[91m' },
  skipped: { label: 'SKIPPED', color: '\u001b[93m' },
} as const satisfies Record<StageOutcome, Presentation>;

export type ResultSummary = {
  total: number;
  passed: number;
  failed: number;
  skipped: number;
  overallStatus: 'passed' | 'failed';
};

export function createPipelineRun(now: Date = new Date()): PipelineRun {
  return {
    startTime: now.toISOString(),
    endTime: '',
    totalDuration: 0,
    stages: [],
    passed: 0,
    failed: 0,
    skipped: 0,
    overallStatus: 'pending',
  };
}

export function recordResult(run: PipelineRun, result: StageResult) {
  run.stages.push(result);
}

export function summarizeResults(results: readonly StageResult[]): ResultSummary {
  let passed = 0;
  let failed = 0;
  let skipped = 0;
  for (const r of results) {
    switch (r.status) {
      case 'passed':
        passed += 1;
        break;
      case 'failed':
        failed += 1;
        break;
      case 'skipped':
        skipped += 1;
        break;
    }
  }
  return {
    total: results.length,
    passed,
    failed,
    skipped,
    overallStatus: failed > 0 ? 'failed' : 'passed',
  };
}

/** Stamp end time, duration and counts on the run. Counts come from `run.stages`. */
export function finalizeRun(
  run: PipelineRun,
  end: { endTime: Date; totalDuration: number }
): PipelineRun {
  const summary = summarizeResults(run.stages);
  run.endTime = end.endTime.toISOString();
  run.totalDuration = Math.max(0, end.totalDuration);
  run.passed = summary.passed;
  run.failed = summary.failed;
  run.skipped = summary.skipped;
  run.overallStatus = summary.overallStatus;
  return run;
}

function stageOf(result: StageResult): StageKind | undefined {
  const prefix = result.name.split(':')[0];
  return STAGE_ORDER.find((s) => s === prefix);
}

/**
 * `completion` keeps the order results arrived in. `discovery` groups by
 * stage in pipeline order, then by unit (`all` first, then lexicographic),
 * which is the order units were discovered in.
 */
export function orderResults(results: readonly StageResult[], order: ResultOrder): StageResult[] {
  if (order === 'completion') {
    return [...results];
  }
  const stageIndex = (r: StageResult) => {
    const stage = stageOf(r);
    return stage ? STAGE_ORDER.indexOf(stage) : STAGE_ORDER.length;
  };
  return [...results].sort((a, b) => {
    const stageDiff = stageIndex(a) - stageIndex(b);
    if (stageDiff !== 0) {
      return stageDiff;
    }
    if (a.unit === b.unit) {
      return 0;
    }
    if (a.unit === 'all') {
      return -1;
    }
    if (b.unit === 'all') {
      return 1;
    }
    return a.unit < b.unit ? -1 : 1;
  });
}
