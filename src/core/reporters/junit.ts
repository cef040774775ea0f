import type { PipelineRun } from '@pipeline/types';
import { escapeMarkup as esc, MAX_REPORT_TEXT, truncate } from './shared';

export const SUITE_NAME = 'role-pipeline';

export function renderJunitReport(run: PipelineRun): string {
  const testcases: string[] = [];
  for (const r of run.stages) {
    const open = `  <testcase name="${esc(r.name)}" classname="${esc(r.unit)}" time="${r.duration.toFixed(2)}"`;
    if (r.status === 'failed') {
      testcases.push(
        `${open}>\n    <failure message="Stage failed">${esc(truncate(r.stderr, MAX_REPORT_TEXT))}</failure>\n  </testcase>`
      );
    } else if (r.status === 'skipped') {
      testcases.push(`${open}>\n    <skipped/>\n  </testcase>`);
    } else {
      testcases.push(`${open}/>`);
    }
  }
  const header = `<testsuite name="${SUITE_NAME}" tests="${run.stages.length}" failures="${run.failed}" skipped="${run.skipped}" time="${run.totalDuration.toFixed(2)}">`;
  const body = testcases.length > 0 ? `${testcases.join('\n')}\n` : '';
  return `<?xml version="1.0" encoding="UTF-8"?>\n${header}\n${body}</testsuite>\n`;
}
