import type { CommandExecutor, CommandOutcome, ExecuteOptions } from '@pipeline/types';
import { vi } from 'vitest';

export type Responder = (
  command: string,
  options: ExecuteOptions
) => CommandOutcome | Promise<CommandOutcome> | undefined;

export const OK: CommandOutcome = { exitCode: 0, stdout: 'ok', stderr: '' };

/**
 * Executor stand-in for runner and scheduler tests. Every call is recorded on
 * `execute.mock.calls`; the responder decides the outcome (default: exit 0).
 *
 * ```typescript
 * const executor = createFakeExecutor((cmd) =>
 *   cmd.startsWith('ansible-lint') ? { exitCode: 2, stdout: '', stderr: 'bad' } : undefined
 * );
 * ```
 */
export function createFakeExecutor(responder?: Responder) {
  const execute = vi.fn(
    async (command: string, options: ExecuteOptions): Promise<CommandOutcome> =>
      (await responder?.(command, options)) ?? OK
  );
  return {
    dryRun: false,
    execute,
    abortAll: vi.fn(),
  } satisfies CommandExecutor;
}

/** Resolve after `ms` milliseconds with the given outcome. */
export function delayed(ms: number, outcome: CommandOutcome = OK): Promise<CommandOutcome> {
  return new Promise((resolve) => setTimeout(() => resolve(outcome), ms));
}
