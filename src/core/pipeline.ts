import path from 'node:path';
import type { CommandExecutor, PipelineConfig, PipelineRun, RunOptions } from '@pipeline/types';
import {
  formatResultLine,
  type ReporterContext,
  renderHeader,
  renderSummary,
  writeReport,
} from './reporters';
import { createPipelineRun, finalizeRun, orderResults, recordResult } from './result-aggregator';
import { runStage } from './scheduler';

export type PipelineDeps = {
  config: PipelineConfig;
  executor: CommandExecutor;
  signal?: AbortSignal;
  color?: boolean;
  write?: (chunk: string) => void;
};

export type PipelineOutcome = {
  run: PipelineRun;
  reportPath?: string;
};

/**
 * Run the requested stage(s), print live result lines and the summary, and
 * write the report when one was asked for. The caller owns the exit code.
 */
export async function runPipeline(options: RunOptions, deps: PipelineDeps): Promise<PipelineOutcome> {
  const write = deps.write ?? ((chunk: string) => process.stdout.write(chunk));
  const reporterCtx: ReporterContext = { color: deps.color ?? false, verbose: options.verbose };
  const header: Parameters<typeof renderHeader>[0] = {
    stage: options.stage,
    parallelism: options.parallelism,
    dryRun: deps.executor.dryRun,
  };
  if (options.unit) {
    header.unit = options.unit;
  }
  write(renderHeader(header, reporterCtx));

  const run = createPipelineRun();
  const t0 = Date.now();
  write('Stage Results:\n');

  const request: Parameters<typeof runStage>[1] = {
    stage: options.stage,
    parallelism: options.parallelism,
    onResult: (result) => {
      recordResult(run, result);
      write(formatResultLine(result, reporterCtx));
    },
  };
  if (options.unit) {
    request.unit = options.unit;
  }
  if (deps.signal) {
    request.signal = deps.signal;
  }
  await runStage({ root: options.cwd, config: deps.config, executor: deps.executor }, request);

  finalizeRun(run, { endTime: new Date(), totalDuration: (Date.now() - t0) / 1000 });
  write(renderSummary(run, reporterCtx));

  if (!options.report) {
    return { run };
  }
  const ordered: PipelineRun = { ...run, stages: orderResults(run.stages, options.order) };
  const reportPath = writeReport(ordered, options.report, {
    reportsDir: path.resolve(options.cwd, deps.config.reportsDir),
  });
  write(`\n${options.report.toUpperCase()} report saved to: ${reportPath}\n`);
  return { run, reportPath };
}
