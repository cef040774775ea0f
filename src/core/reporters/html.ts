import type { PipelineRun } from '@pipeline/types';
import { escapeMarkup as esc } from './shared';

const STYLE = `
    body { font-family: Arial, sans-serif; margin: 20px; }
    .passed { color: green; }
    .failed { color: red; }
    .skipped { color: orange; }
    table { border-collapse: collapse; width: 100%; }
    th, td { border: 1px solid #ddd; padding: 8px; text-align: left; }
    th { background-color: #4caf50; color: white; }
    tr:nth-child(even) { background-color: #f2f2f2; }
    .summary { margin: 20px 0; padding: 15px; background: #f5f5f5; border-radius: 5px; }`;

export function renderHtmlReport(run: PipelineRun): string {
  const rows = run.stages
    .map(
      (s) =>
        `      <tr><td>${esc(s.name)}</td><td>${esc(s.unit)}</td><td class="${s.status}">${s.status.toUpperCase()}</td><td>${s.duration.toFixed(2)}s</td></tr>`
    )
    .join('\n');

  return `<!DOCTYPE html>
<html>
<head>
  <meta charset="utf-8">
  <title>CI Pipeline Report</title>
  <style>${STYLE}
  </style>
</head>
<body>
  <h1>CI Pipeline Report</h1>
  <div class="summary">
    <h2>Summary</h2>
    <p>Start Time: ${esc(run.startTime)}</p>
    <p>End Time: ${esc(run.endTime)}</p>
    <p>Duration: ${run.totalDuration.toFixed(2)}s</p>
    <p class="passed">Passed: ${run.passed}</p>
    <p class="failed">Failed: ${run.failed}</p>
    <p class="skipped">Skipped: ${run.skipped}</p>
    <p><strong>Overall Status: <span class="${run.overallStatus}">${run.overallStatus.toUpperCase()}</span></strong></p>
  </div>
  <h2>Stage Results</h2>
  <table>
    <thead>
      <tr><th>Stage</th><th>Unit</th><th>Status</th><th>Duration</th></tr>
    </thead>
    <tbody>
${rows}
    </tbody>
  </table>
</body>
</html>
`;
}
