import fs from 'node:fs';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { moleculePreset } from '@pipeline/presets/molecule';
import { createFakeExecutor, delayed, type Responder } from '@pipeline/test-utils/fake-executor';
import { makeRoleTree, markedUnits, removeTree } from '@pipeline/test-utils/role-tree';
import type { StageContext, StageResult } from '@pipeline/types';
import { PipelineInterruptedError } from '../errors';
import { createCommandExecutor } from '../executor';
import { runStage, STAGE_ORDER } from '../scheduler';

const UNITS = ['app/api', 'app/web', 'db/postgres', 'net/ssh/hardened'];

describe('runStage', () => {
  let root = '';

  beforeEach(() => {
    root = makeRoleTree([
      ...markedUnits(...UNITS),
      'roles/app/api/molecule/default/converge.yml',
      'roles/app/web/molecule/default/converge.yml',
      'roles/db/postgres/molecule/default/converge.yml',
    ]);
  });

  afterEach(() => {
    removeTree(root);
  });

  function context(responder?: Responder) {
    const executor = createFakeExecutor(responder);
    const ctx: StageContext = { root, config: moleculePreset(), executor };
    return { ctx, executor };
  }

  function concurrencyProbe(ms: number) {
    const probe = { inFlight: 0, max: 0 };
    const responder: Responder = async () => {
      probe.inFlight += 1;
      probe.max = Math.max(probe.max, probe.inFlight);
      const res = await delayed(ms);
      probe.inFlight -= 1;
      return res;
    };
    return { probe, responder };
  }

  it('keeps the fixed stage order', () => {
    expect(STAGE_ORDER).toEqual(['static-check', 'syntax-check', 'scenario-test']);
  });

  it('runs exactly one runner call when a unit is given', async () => {
    const { ctx, executor } = context();

    const results = await runStage(ctx, { stage: 'static-check', unit: 'db/postgres', parallelism: 4 });

    expect(results.map((r) => r.name)).toEqual(['static-check:db/postgres']);
    expect(executor.execute).toHaveBeenCalledTimes(2);
  });

  it('fans lint out over every discovered unit', async () => {
    const { ctx } = context();

    const results = await runStage(ctx, { stage: 'static-check', parallelism: 4 });

    expect(results).toHaveLength(UNITS.length);
    expect(results.map((r) => r.unit).sort()).toEqual(UNITS);
  });

  it('returns parallel results in completion order', async () => {
    const { ctx } = context((cmd) =>
      cmd.endsWith('roles/app/api') ? delayed(80) : delayed(5)
    );
    const seen: string[] = [];

    const results = await runStage(ctx, {
      stage: 'static-check',
      parallelism: 4,
      onResult: (r) => seen.push(r.unit),
    });

    expect(results.at(-1)?.unit).toBe('app/api');
    expect(results.map((r) => r.unit)).toEqual(seen);
  });

  it('never exceeds the worker pool size', async () => {
    const { probe, responder } = concurrencyProbe(20);
    const { ctx } = context(responder);

    await runStage(ctx, { stage: 'static-check', parallelism: 2 });

    expect(probe.max).toBe(2);
  });

  it('treats a parallelism below one as a single worker', async () => {
    const { probe, responder } = concurrencyProbe(5);
    const { ctx } = context(responder);

    const results = await runStage(ctx, { stage: 'syntax-check', parallelism: 0 });

    expect(probe.max).toBe(1);
    expect(results).toHaveLength(UNITS.length);
  });

  it('runs scenario tests one at a time in discovery order', async () => {
    const { probe, responder } = concurrencyProbe(10);
    const { ctx, executor } = context(responder);

    const results = await runStage(ctx, { stage: 'scenario-test', parallelism: 8 });

    expect(probe.max).toBe(1);
    expect(results.map((r) => r.unit)).toEqual(UNITS);
    expect(executor.execute.mock.calls.map(([, opts]) => opts.cwd)).toEqual(
      UNITS.map((u) => path.join(root, 'roles', ...u.split('/')))
    );
  });

  it('runs every stage in order when all pass', async () => {
    const { ctx } = context();

    const results = await runStage(ctx, { stage: 'all', parallelism: 3 });

    const byStage = (prefix: string) => results.filter((r) => r.name.startsWith(`${prefix}:`));
    expect(results).toHaveLength(UNITS.length * 3);
    expect(byStage('static-check')).toHaveLength(4);
    expect(byStage('syntax-check').map((r) => r.status).sort()).toEqual([
      'passed',
      'passed',
      'passed',
      'skipped',
    ]);
    expect(results.slice(-4).map((r) => r.name)).toEqual(
      UNITS.map((u) => `scenario-test:${u}:default`)
    );
  });

  it('stops after the first stage that has a failed result', async () => {
    const { ctx, executor } = context((cmd) =>
      cmd === 'ansible-lint roles/app/web' ? { exitCode: 2, stdout: '', stderr: 'lint' } : undefined
    );

    const results = await runStage(ctx, { stage: 'all', parallelism: 4 });

    expect(results).toHaveLength(UNITS.length);
    expect(results.every((r) => r.name.startsWith('static-check:'))).toBe(true);
    expect(results.filter((r) => r.status === 'failed').map((r) => r.unit)).toEqual(['app/web']);
    const commands = executor.execute.mock.calls.map(([cmd]) => cmd);
    expect(commands.some((c) => c.includes('--syntax-check') || c.startsWith('molecule'))).toBe(false);
  });

  it('applies the short-circuit to a single unit as well', async () => {
    const { ctx, executor } = context((cmd) =>
      cmd.includes('--syntax-check') ? { exitCode: 1, stdout: '', stderr: 'syntax' } : undefined
    );

    const results = await runStage(ctx, { stage: 'all', unit: 'app/api', parallelism: 4 });

    expect(results.map((r) => `${r.name}=${r.status}`)).toEqual([
      'static-check:app/api=passed',
      'syntax-check:app/api=failed',
    ]);
    expect(executor.execute.mock.calls.some(([cmd]) => cmd.startsWith('molecule'))).toBe(false);
  });

  it('turns a crashing runner into a failed result', async () => {
    const { ctx } = context((cmd) => {
      if (cmd.endsWith('roles/db/postgres')) {
        throw new Error('executor exploded');
      }
      return undefined;
    });

    const results = await runStage(ctx, { stage: 'static-check', parallelism: 2 });
    const crashed = results.find((r) => r.unit === 'db/postgres');

    expect(results).toHaveLength(UNITS.length);
    expect(crashed?.name).toBe('static-check:db/postgres');
    expect(crashed?.status).toBe('failed');
    expect(crashed?.stderr).toContain('executor exploded');
  });

  it('names a crashed scenario test the way the runner does', async () => {
    const { ctx } = context((cmd) => {
      if (cmd.startsWith('molecule')) {
        throw new Error('molecule exploded');
      }
      return undefined;
    });

    const results = await runStage(ctx, { stage: 'scenario-test', unit: 'app/api', parallelism: 1 });

    expect(results).toHaveLength(1);
    expect(results[0]?.name).toBe('scenario-test:app/api:default');
    expect(results[0]?.status).toBe('failed');
    expect(results[0]?.stderr).toContain('molecule exploded');
  });

  it('returns nothing when no units are discovered', async () => {
    removeTree(root);
    root = makeRoleTree(['roles/common/base/tasks/main.yml']);
    const { ctx, executor } = context();

    const results = await runStage(ctx, { stage: 'all', parallelism: 4 });

    expect(results).toEqual([]);
    expect(executor.execute).not.toHaveBeenCalled();
  });

  it('rejects when the signal is already aborted', async () => {
    const { ctx, executor } = context();
    const controller = new AbortController();
    controller.abort();

    await expect(
      runStage(ctx, { stage: 'all', parallelism: 4, signal: controller.signal })
    ).rejects.toBeInstanceOf(PipelineInterruptedError);
    expect(executor.execute).not.toHaveBeenCalled();
  });

  it('stops handing out work once interrupted mid-stage', async () => {
    const { ctx, executor } = context(() => delayed(10));
    const controller = new AbortController();
    const seen: StageResult[] = [];

    await expect(
      runStage(ctx, {
        stage: 'static-check',
        parallelism: 1,
        signal: controller.signal,
        onResult: (r) => {
          seen.push(r);
          controller.abort();
        },
      })
    ).rejects.toThrow('Pipeline interrupted by user');
    expect(seen).toHaveLength(1);
    expect(executor.execute).toHaveBeenCalledTimes(2);
  });

  it('interrupts the sequential scenario stage between units', async () => {
    const { ctx, executor } = context();
    const controller = new AbortController();

    await expect(
      runStage(ctx, {
        stage: 'scenario-test',
        parallelism: 1,
        signal: controller.signal,
        onResult: () => controller.abort(),
      })
    ).rejects.toBeInstanceOf(PipelineInterruptedError);
    expect(executor.execute).toHaveBeenCalledTimes(1);
  });

  it('does not start the strict linter once a unit run is interrupted', async () => {
    const marker = path.join(root, 'strict-lint-ran');
    const executor = createCommandExecutor();
    const base = moleculePreset();
    const ctx: StageContext = {
      root,
      config: {
        ...base,
        commands: { ...base.commands, lint: 'sleep 2', strictLint: `touch "${marker}"` },
      },
      executor,
    };
    const controller = new AbortController();
    setTimeout(() => {
      controller.abort();
      executor.abortAll();
    }, 150);

    await expect(
      runStage(ctx, {
        stage: 'static-check',
        unit: 'db/postgres',
        parallelism: 1,
        signal: controller.signal,
      })
    ).rejects.toBeInstanceOf(PipelineInterruptedError);
    expect(fs.existsSync(marker)).toBe(false);
  });
});
