import { renderCommand } from '@pipeline/utils/template';
import { scopePath, secondsSince } from '@pipeline/utils/stage-utils';
import type { StageContext, StageResult } from '@pipeline/types';

/**
 * Lint one unit (or the whole units tree) with the regular and the strict
 * linter. Both always run and share a single result; a non-zero exit from
 * either fails it.
 */
export async function runStaticCheck(ctx: StageContext, unit?: string): Promise<StageResult> {
  const start = Date.now();
  const vars = { path: scopePath(ctx, unit) };
  const lintCmd = renderCommand(ctx.config.commands.lint, vars);
  const strictCmd = renderCommand(ctx.config.commands.strictLint, vars);

  const lint = await ctx.executor.execute(lintCmd, { cwd: ctx.root });
  const strict = await ctx.executor.execute(strictCmd, { cwd: ctx.root });

  let stdout = lint.stdout;
  if (strict.exitCode !== 0) {
    stdout += `\n\nStrict lint output:\n${strict.stdout}`;
  }

  return {
    name: `static-check:${unit ?? 'all'}`,
    status: lint.exitCode === 0 && strict.exitCode === 0 ? 'passed' : 'failed',
    duration: secondsSince(start),
    stdout,
    stderr: lint.stderr + strict.stderr,
    command: `${lintCmd}; ${strictCmd}`,
    unit: unit ?? 'all',
  };
}
