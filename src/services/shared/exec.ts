/**
 * Command Execution
 *
 * Synchronous wrapper around child_process used by every setup service.
 * Services take a CommandRunner so tests can substitute a simulated machine.
 */

import { spawn, spawnSync } from 'child_process';

export interface CommandResult {
  status: number;
  stdout: string;
  stderr: string;
}

export interface RunOptions {
  /** Attach the child to this terminal (password prompts). Output is not captured. */
  interactive?: boolean;
  timeout?: number;
}

export interface BackgroundProcess {
  pid: number | undefined;
  stop(): void;
}

export interface CommandRunner {
  run(command: string, args: string[], options?: RunOptions): CommandResult;
  runBackground(command: string, args: string[]): BackgroundProcess;
}

/** Exit status reported when the executable is not on PATH (same as a shell). */
export const COMMAND_NOT_FOUND = 127;

export class SystemRunner implements CommandRunner {
  run(command: string, args: string[], options: RunOptions = {}): CommandResult {
    const result = spawnSync(command, args, {
      encoding: 'utf8',
      stdio: options.interactive ? 'inherit' : 'pipe',
      timeout: options.timeout,
    });

    if (result.error) {
      const code = 'code' in result.error ? result.error.code : undefined;
      if (code === 'ENOENT') {
        return { status: COMMAND_NOT_FOUND, stdout: '', stderr: `command not found: ${command}` };
      }
      return { status: result.status ?? 1, stdout: '', stderr: result.error.message };
    }

    return {
      status: result.status ?? 1,
      stdout: result.stdout ?? '',
      stderr: result.stderr ?? '',
    };
  }

  runBackground(command: string, args: string[]): BackgroundProcess {
    const child = spawn(command, args, { detached: true, stdio: 'ignore' });
    child.on('error', (err) => {
      console.error(`[exec] Background ${command} failed: ${err.message}`);
    });
    child.unref();

    return {
      pid: child.pid,
      stop: () => {
        if (child.exitCode === null && child.signalCode === null) {
          child.kill();
        }
      },
    };
  }
}

/**
 * One-line description of a failed command for step results.
 */
export function describeFailure(result: CommandResult): string {
  const message = result.stderr.trim() || result.stdout.trim();
  return message ? `exit ${result.status}: ${message}` : `exit ${result.status}`;
}
