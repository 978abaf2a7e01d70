/**
 * Command Output Capture
 *
 * Runs an external command and hands back what it printed on stdout.
 * On failure the captured stderr is folded into the thrown CommandError
 * so callers see why the tool complained, not just its exit status.
 *
 * Execution goes through a CommandExecutor so tests can substitute a fake.
 */

import { execFile } from 'node:child_process';

import { CommandError, getErrorMessage } from './errorTypes.js';

/**
 * What a finished command produced.
 */
export interface CommandOutcome {
  stdout: Buffer;
  stderr: string;
  /** Set when the command could not be launched or exited non-zero */
  error?: Error;
}

/**
 * Runs `command` with `args`. Implementations resolve with the outcome
 * rather than rejecting, so stderr is always available.
 */
export type CommandExecutor = (command: string, args: readonly string[]) => Promise<CommandOutcome>;

/**
 * Executor backed by child_process.execFile (no shell involved).
 */
export const execFileExecutor: CommandExecutor = (command, args) =>
  new Promise<CommandOutcome>((resolve) => {
    execFile(command, [...args], { encoding: 'buffer', maxBuffer: 16 * 1024 * 1024 }, (error, stdout, stderr) => {
      resolve({
        stdout,
        stderr: stderr.toString('utf8'),
        error: error ?? undefined,
      });
    });
  });

/**
 * Execute a command and return its standard output.
 *
 * @throws CommandError combining captured stderr with the underlying failure
 *
 * @example
 * ```typescript
 * const out = await readFromCommand(execFileExecutor, 'lsblk', '--json');
 * ```
 */
export async function readFromCommand(
  executor: CommandExecutor,
  command: string,
  ...args: string[]
): Promise<Buffer> {
  const outcome = await executor(command, args);

  if (outcome.error) {
    throw new CommandError(
      `${outcome.stderr}: ${getErrorMessage(outcome.error)}`,
      command,
      args,
      outcome.stderr,
      outcome.error
    );
  }

  return outcome.stdout;
}
