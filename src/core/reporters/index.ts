import fs from 'node:fs';
import path from 'node:path';
import type { PipelineRun, ReportFormat } from '@pipeline/types';
import { renderHtmlReport } from './html';
import { renderJsonReport } from './json';
import { renderJunitReport } from './junit';

export { renderHtmlReport } from './html';
export { renderJsonReport, toJsonReport } from './json';
export { renderJunitReport } from './junit';
export * from './terminal';

const pad = (n: number) => String(n).padStart(2, '0');

/** Local time as `YYYYMMDD_HHMMSS`. */
export function reportTimestamp(d: Date): string {
  const date = `${d.getFullYear()}${pad(d.getMonth() + 1)}${pad(d.getDate())}`;
  const time = `${pad(d.getHours())}${pad(d.getMinutes())}${pad(d.getSeconds())}`;
  return `${date}_${time}`;
}

const FORMATS: Record<ReportFormat, { prefix: string; ext: string; render: (run: PipelineRun) => string }> = {
  json: { prefix: 'report', ext: 'json', render: renderJsonReport },
  junit: { prefix: 'junit', ext: 'xml', render: renderJunitReport },
  html: { prefix: 'report', ext: 'html', render: renderHtmlReport },
};

/**
 * Write the run to `<reportsDir>/<prefix>_<timestamp>.<ext>` and return the path.
 * The directory is created when missing; write errors are not caught.
 */
export function writeReport(
  run: PipelineRun,
  format: ReportFormat,
  opts: { reportsDir: string; now?: Date }
): string {
  const target = FORMATS[format];
  fs.mkdirSync(opts.reportsDir, { recursive: true });
  const file = path.join(
    opts.reportsDir,
    `${target.prefix}_${reportTimestamp(opts.now ?? new Date())}.${target.ext}`
  );
  fs.writeFileSync(file, target.render(run), 'utf8');
  return file;
}
