#!/usr/bin/env -S node --import tsx
import { readFileSync } from 'node:fs';
import path from 'node:path';
import { discoverUnits } from '@pipeline/core/discovery';
import { PipelineInterruptedError } from '@pipeline/core/errors';
import { createCommandExecutor } from '@pipeline/core/executor';
import { runPipeline } from '@pipeline/core/pipeline';
import { renderUnitList } from '@pipeline/core/reporters';
import { mergeConfig, moleculePreset } from '@pipeline/presets/molecule';
import type { PipelineConfig, RunOptions } from '@pipeline/types';
import { type CLIOptions, HELP, parseArgs } from './args';
import { loadUserConfig } from './config-loader';

const pkgPath = new URL('../../package.json', import.meta.url);
const pkg = JSON.parse(readFileSync(pkgPath, 'utf-8')) as { version: string };

function buildOptions(opts: CLIOptions, cwd: string): RunOptions {
  const result: RunOptions = {
    stage: opts.stage ?? 'all',
    parallelism: opts.parallel ?? 4,
    order: opts.order ?? 'completion',
    verbose: opts.verbose ?? false,
    dryRun: opts.dryRun ?? false,
    cwd,
  };
  if (opts.unit) {
    result.unit = opts.unit;
  }
  if (opts.report) {
    result.report = opts.report;
  }
  return result;
}

async function resolveConfig(cwd: string, opts: CLIOptions): Promise<PipelineConfig> {
  const config = mergeConfig(moleculePreset(), await loadUserConfig(cwd));
  if (opts.scenario) {
    config.scenario = opts.scenario;
  }
  if (opts.driver) {
    config.driver = opts.driver;
  }
  return config;
}

async function main() {
  const { cmd, opts, errors } = parseArgs(process.argv);
  if (opts.help) {
    process.stdout.write(`${HELP}\n`);
    return;
  }
  if (opts.version) {
    process.stdout.write(`${pkg.version}\n`);
    return;
  }
  if (errors.length > 0) {
    process.stderr.write(`${errors.join('\n')}\n\n${HELP}\n`);
    process.exit(1);
  }

  const cwd = opts.cwd ? path.resolve(process.cwd(), opts.cwd) : process.cwd();
  const config = await resolveConfig(cwd, opts);

  if (cmd === 'list') {
    const units = discoverUnits(path.join(cwd, config.unitsDir), { markerDir: config.markerDir });
    process.stdout.write(renderUnitList(units));
    process.exit(0);
  }

  const options = buildOptions(opts, cwd);
  const executor = createCommandExecutor({ dryRun: options.dryRun, timeoutMs: config.timeoutMs });
  const controller = new AbortController();
  process.once('SIGINT', () => {
    controller.abort();
    executor.abortAll();
  });

  try {
    const { run } = await runPipeline(options, {
      config,
      executor,
      signal: controller.signal,
      color: Boolean(process.stdout.isTTY),
    });
    process.exit(run.failed === 0 ? 0 : 1);
  } catch (err: unknown) {
    if (err instanceof PipelineInterruptedError) {
      process.stderr.write(`\n\n${err.message}\n`);
      process.exit(err.exitCode);
    }
    throw err;
  }
}

main().catch((err: unknown) => {
  process.stderr.write(`${err instanceof Error ? err.message : String(err)}\n`);
  process.exit(1);
});
