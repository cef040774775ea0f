import type { PipelineRun } from '@pipeline/types';
import { MAX_REPORT_TEXT, truncate } from './shared';

export type JsonStage = {
  name: string;
  status: string;
  duration: number;
  unit: string;
  command: string;
  output: string;
  error: string;
};

export type JsonReport = {
  start_time: string;
  end_time: string;
  total_duration: number;
  passed: number;
  failed: number;
  skipped: number;
  overall_status: string;
  stages: JsonStage[];
};

export function toJsonReport(run: PipelineRun): JsonReport {
  return {
    start_time: run.startTime,
    end_time: run.endTime,
    total_duration: run.totalDuration,
    passed: run.passed,
    failed: run.failed,
    skipped: run.skipped,
    overall_status: run.overallStatus,
    stages: run.stages.map((s) => ({
      name: s.name,
      status: s.status,
      duration: s.duration,
      unit: s.unit,
      command: s.command,
      output: truncate(s.stdout, MAX_REPORT_TEXT),
      error: truncate(s.stderr, MAX_REPORT_TEXT),
    })),
  };
}

export function renderJsonReport(run: PipelineRun): string {
  return `${JSON.stringify(toJsonReport(run), null, 2)}\n`;
}
