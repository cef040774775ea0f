import path from 'node:path';
import { unitPath } from '@pipeline/core/discovery';
import { renderCommand } from '@pipeline/utils/template';
import { secondsSince } from '@pipeline/utils/stage-utils';
import type { StageContext, StageResult } from '@pipeline/types';

export function scenarioEnv(ctx: StageContext): Record<string, string> {
  const env = { ...ctx.config.scenarioEnv };
  if (ctx.config.driver === 'podman') {
    env.MOLECULE_DRIVER_NAME = 'podman';
  }
  return env;
}

/**
 * Run the full scenario (create, converge, verify, destroy) for one unit from
 * inside the unit's directory. There is no whole-tree form of this stage.
 */
export async function runScenarioTest(ctx: StageContext, unit: string): Promise<StageResult> {
  const start = Date.now();
  const { scenario } = ctx.config;
  const command = renderCommand(ctx.config.commands.scenario, { scenario });

  const res = await ctx.executor.execute(command, {
    cwd: unitPath(path.join(ctx.root, ctx.config.unitsDir), unit),
    env: scenarioEnv(ctx),
  });

  return {
    name: `scenario-test:${unit}:${scenario}`,
    status: res.exitCode === 0 ? 'passed' : 'failed',
    duration: secondsSince(start),
    stdout: res.stdout,
    stderr: res.stderr,
    command,
    unit,
  };
}
