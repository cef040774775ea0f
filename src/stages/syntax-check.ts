import { existsSync } from 'node:fs';
import path from 'node:path';
import { unitPath } from '@pipeline/core/discovery';
import { renderCommand } from '@pipeline/utils/template';
import { secondsSince } from '@pipeline/utils/stage-utils';
import type { StageContext, StageResult } from '@pipeline/types';

export function entryFilePath(ctx: StageContext, unit: string): string {
  const { unitsDir, markerDir, scenario, entryFile } = ctx.config;
  return path.join(unitPath(path.join(ctx.root, unitsDir), unit), markerDir, scenario, entryFile);
}

export async function runSyntaxCheck(ctx: StageContext, unit?: string): Promise<StageResult> {
  const start = Date.now();
  const name = `syntax-check:${unit ?? 'all'}`;

  let command: string;
  if (unit) {
    const file = entryFilePath(ctx, unit);
    if (!existsSync(file)) {
      return {
        name,
        status: 'skipped',
        duration: 0,
        stdout: `No ${ctx.config.entryFile} found`,
        stderr: '',
        command: '',
        unit,
      };
    }
    command = renderCommand(ctx.config.commands.syntax, { file });
  } else {
    command = renderCommand(ctx.config.commands.syntaxAll, { dir: ctx.config.playbooksDir });
  }

  const res = await ctx.executor.execute(command, { cwd: ctx.root });
  return {
    name,
    status: res.exitCode === 0 ? 'passed' : 'failed',
    duration: secondsSince(start),
    stdout: res.stdout,
    stderr: res.stderr,
    command,
    unit: unit ?? 'all',
  };
}
