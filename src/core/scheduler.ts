import path from 'node:path';
import { runScenarioTest, runStaticCheck, runSyntaxCheck } from '@pipeline/stages';
import type {
  StageContext,
  StageKind,
  StageResult,
  StageSelection,
} from '@pipeline/types';
import { discoverUnits } from './discovery';
import { PipelineInterruptedError } from './errors';

export const STAGE_ORDER: readonly StageKind[] = ['static-check', 'syntax-check', 'scenario-test'];

export type StageRequest = {
  stage: StageSelection;
  unit?: string;
  parallelism: number;
  signal?: AbortSignal;
  onResult?: (result: StageResult) => void;
};

type Task = () => Promise<StageResult>;

/**
 * Run one stage, or every stage in order when `stage` is `all`.
 *
 * Results come back in completion order. Lint and syntax stages fan out over
 * a bounded pool; scenario tests always run one unit at a time. In `all` mode
 * the first stage that yields a failed result ends the run.
 */
export async function runStage(ctx: StageContext, request: StageRequest): Promise<StageResult[]> {
  if (request.stage !== 'all') {
    return runSingleStage(ctx, request.stage, request);
  }

  const results: StageResult[] = [];
  for (const stage of STAGE_ORDER) {
    const stageResults = await runSingleStage(ctx, stage, request);
    results.push(...stageResults);
    if (stageResults.some((r) => r.status === 'failed')) {
      return results;
    }
  }
  return results;
}

async function runSingleStage(
  ctx: StageContext,
  stage: StageKind,
  request: StageRequest
): Promise<StageResult[]> {
  const { unit, signal } = request;
  const emit = (r: StageResult) => {
    request.onResult?.(r);
    return r;
  };
  throwIfAborted(signal);

  if (unit) {
    const result = await runTask(taskName(ctx, stage, unit), unit, () => invoke(ctx, stage, unit));
    throwIfAborted(signal);
    return [emit(result)];
  }

  const units = discoverUnits(path.join(ctx.root, ctx.config.unitsDir), {
    markerDir: ctx.config.markerDir,
  });
  const tasks: Task[] = units.map(
    (u) => () => runTask(taskName(ctx, stage, u), u, () => invoke(ctx, stage, u))
  );

  if (stage === 'scenario-test') {
    return runSequential(tasks, emit, signal);
  }
  const workers = Math.max(1, Math.floor(request.parallelism) || 1);
  return runParallel(tasks, workers, emit, signal);
}

function invoke(ctx: StageContext, stage: StageKind, unit: string): Promise<StageResult> {
  switch (stage) {
    case 'static-check':
      return runStaticCheck(ctx, unit);
    case 'syntax-check':
      return runSyntaxCheck(ctx, unit);
    case 'scenario-test':
      return runScenarioTest(ctx, unit);
  }
}

/** The result name the stage runner would have used. */
function taskName(ctx: StageContext, stage: StageKind, unit: string): string {
  return stage === 'scenario-test' ? `${stage}:${unit}:${ctx.config.scenario}` : `${stage}:${unit}`;
}

async function runTask(
  name: string,
  unit: string,
  fn: () => Promise<StageResult>
): Promise<StageResult> {
  const t0 = Date.now();
  try {
    return await fn();
  } catch (err: unknown) {
    const msg = err instanceof Error ? (err.stack ?? err.message) : String(err);
    return {
      name,
      status: 'failed',
      duration: Math.max(0, (Date.now() - t0) / 1000),
      stdout: '',
      stderr: msg,
      command: '',
      unit,
    };
  }
}

function throwIfAborted(signal?: AbortSignal) {
  if (signal?.aborted) {
    throw new PipelineInterruptedError();
  }
}

function runParallel(
  tasks: Task[],
  maxWorkers: number,
  emit: (r: StageResult) => StageResult,
  signal?: AbortSignal
): Promise<StageResult[]> {
  const out: StageResult[] = [];
  const queue = tasks.slice();
  let running = 0;
  return new Promise((resolve, reject) => {
    let done = false;
    const onAbort = () => {
      if (!done) {
        done = true;
        reject(new PipelineInterruptedError());
      }
    };
    if (signal?.aborted) {
      onAbort();
      return;
    }
    signal?.addEventListener('abort', onAbort, { once: true });

    const pump = () => {
      if (done) {
        return;
      }
      if (queue.length === 0 && running === 0) {
        done = true;
        signal?.removeEventListener('abort', onAbort);
        resolve(out);
        return;
      }
      while (running < maxWorkers && queue.length > 0) {
        const fn = queue.shift();
        if (!fn) {
          break;
        }
        running += 1;
        fn()
          .then((res) => {
            running -= 1;
            if (done) {
              return;
            }
            out.push(emit(res));
            pump();
          })
          .catch((err: unknown) => {
            // Only a throwing onResult callback lands here; runTask never rejects.
            if (!done) {
              done = true;
              signal?.removeEventListener('abort', onAbort);
              reject(err);
            }
          });
      }
    };
    pump();
  });
}

async function runSequential(
  tasks: Task[],
  emit: (r: StageResult) => StageResult,
  signal?: AbortSignal
): Promise<StageResult[]> {
  const out: StageResult[] = [];
  for (const t of tasks) {
    throwIfAborted(signal);
    const res = await t();
    throwIfAborted(signal);
    out.push(emit(res));
  }
  return out;
}
