import type { PipelineRun, StageOutcome, StageResult } from '@pipeline/types';
import { STATUS_PRESENTATION } from '../result-aggregator';

export const CONSOLE_PREVIEW = 200;

export type ReporterContext = {
  color: boolean;
  verbose?: boolean;
};

const RESET = '\u001b[0m';
const BOLD = '\u001b[1m';
const RULE = '='.repeat(60);

function paint(text: string, code: string, ctx: ReporterContext) {
  return ctx.color ? `${code}${text}${RESET}` : text;
}

function statusLabel(status: StageOutcome, ctx: ReporterContext) {
  const p = STATUS_PRESENTATION[status];
  return paint(p.label, p.color, ctx);
}

/** One status line per result, with output/error previews underneath. */
export function formatResultLine(result: StageResult, ctx: ReporterContext): string {
  const lines = [`  [${statusLabel(result.status, ctx)}] ${result.name} (${result.duration.toFixed(2)}s)`];
  if (ctx.verbose && result.stdout) {
    lines.push(`    Output: ${result.stdout.slice(0, CONSOLE_PREVIEW)}...`);
  }
  if (result.status === 'failed' && result.stderr) {
    const label = paint('Error:', STATUS_PRESENTATION.failed.color, ctx);
    lines.push(`    ${label} ${result.stderr.slice(0, CONSOLE_PREVIEW)}...`);
  }
  return `${lines.join('\n')}\n`;
}

export function renderHeader(
  info: { stage: string; unit?: string; parallelism: number; dryRun: boolean },
  ctx: ReporterContext
): string {
  const lines = [
    paint(RULE, BOLD, ctx),
    paint('  Role Pipeline', BOLD, ctx),
    paint(RULE, BOLD, ctx),
    `  Stage: ${info.stage}`,
    `  Unit: ${info.unit ?? 'all'}`,
    `  Parallel jobs: ${info.parallelism}`,
  ];
  if (info.dryRun) {
    lines.push(paint('  [DRY RUN MODE]', STATUS_PRESENTATION.skipped.color, ctx));
  }
  return `${lines.join('\n')}\n\n`;
}

export function renderSummary(run: PipelineRun, ctx: ReporterContext): string {
  const passed = STATUS_PRESENTATION.passed.color;
  const failed = STATUS_PRESENTATION.failed.color;
  const skipped = STATUS_PRESENTATION.skipped.color;
  const banner =
    run.failed === 0 ? paint('Pipeline PASSED', passed, ctx) : paint('Pipeline FAILED', failed, ctx);
  const lines = [
    '',
    RULE,
    paint('Pipeline Summary', BOLD, ctx),
    RULE,
    `  Total stages: ${run.stages.length}`,
    `  ${paint('Passed:', passed, ctx)} ${run.passed}`,
    `  ${paint('Failed:', failed, ctx)} ${run.failed}`,
    `  ${paint('Skipped:', skipped, ctx)} ${run.skipped}`,
    `  Duration: ${run.totalDuration.toFixed(2)}s`,
    '',
    banner,
  ];
  return `${lines.join('\n')}\n`;
}

export function renderUnitList(units: readonly string[]): string {
  const lines = [`Found ${units.length} units with scenario tests:`, ...units.map((u) => `  - ${u}`)];
  return `${lines.join('\n')}\n`;
}
