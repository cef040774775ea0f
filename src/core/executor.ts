import { type ChildProcess, spawn } from 'node:child_process';
import type { CommandExecutor, CommandOutcome, ExecuteOptions } from '@pipeline/types';

export const DEFAULT_TIMEOUT_MS = 600_000;

export type ExecutorOptions = {
  dryRun?: boolean;
  timeoutMs?: number;
  env?: Record<string, string>;
};

function killTree(child: ChildProcess) {
  if (child.pid === undefined) {
    return;
  }
  try {
    // Commands run in their own process group so the shell's children go too.
    process.kill(-child.pid, 'SIGKILL');
  } catch {
    child.kill('SIGKILL');
  }
}

export function timeoutMessage(timeoutMs: number): string {
  return `Command timed out after ${timeoutMs / 1000} seconds`;
}

export function createCommandExecutor(options: ExecutorOptions = {}): CommandExecutor {
  const dryRun = options.dryRun ?? false;
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  const active = new Set<ChildProcess>();
  let aborted = false;

  function execute(command: string, opts: ExecuteOptions): Promise<CommandOutcome> {
    if (dryRun) {
      return Promise.resolve({
        exitCode: 0,
        stdout: `[DRY RUN] Would execute: ${command}`,
        stderr: '',
      });
    }
    if (aborted) {
      return Promise.resolve({
        exitCode: 1,
        stdout: '',
        stderr: 'Command aborted',
        failure: 'invocation',
      });
    }

    return new Promise((resolve) => {
      let settled = false;
      const finish = (outcome: CommandOutcome) => {
        if (settled) {
          return;
        }
        settled = true;
        resolve(outcome);
      };

      let child: ChildProcess;
      try {
        child = spawn(command, {
          cwd: opts.cwd,
          env: { ...process.env, ...options.env, ...opts.env },
          stdio: ['ignore', 'pipe', 'pipe'],
          shell: true,
          detached: true,
        });
      } catch (err: unknown) {
        finish({
          exitCode: 1,
          stdout: '',
          stderr: err instanceof Error ? err.message : String(err),
          failure: 'invocation',
        });
        return;
      }
      active.add(child);

      let out = '';
      let errOut = '';
      child.stdout?.setEncoding('utf8');
      child.stderr?.setEncoding('utf8');
      child.stdout?.on('data', (d: string) => {
        out += d;
      });
      child.stderr?.on('data', (d: string) => {
        errOut += d;
      });

      const timer = setTimeout(() => {
        killTree(child);
        child.stdout?.destroy();
        child.stderr?.destroy();
        active.delete(child);
        finish({ exitCode: 1, stdout: '', stderr: timeoutMessage(timeoutMs), failure: 'timeout' });
      }, timeoutMs);

      child.on('error', (err) => {
        clearTimeout(timer);
        active.delete(child);
        finish({ exitCode: 1, stdout: '', stderr: err.message, failure: 'invocation' });
      });

      child.on('close', (code, signal) => {
        clearTimeout(timer);
        active.delete(child);
        if (code === null) {
          finish({
            exitCode: 1,
            stdout: out,
            stderr: `${errOut}Command terminated by ${signal ?? 'unknown signal'}`,
            failure: 'invocation',
          });
          return;
        }
        finish({ exitCode: code, stdout: out, stderr: errOut });
      });
    });
  }

  function abortAll() {
    aborted = true;
    for (const child of active) {
      killTree(child);
    }
    active.clear();
  }

  return { dryRun, execute, abortAll };
}
