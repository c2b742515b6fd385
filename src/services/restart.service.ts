/**
 * Restart Service
 *
 * Kills the UI processes that cache preferences; launchd brings them back
 * with the new values. Restart success is not verified.
 */

import { describeFailure, type CommandRunner } from './shared/exec';
import { result, type StepResult } from './shared/results';

/** killall exits 1 when nothing matched the name. */
const NO_MATCHING_PROCESS = 1;

export function restartProcess(runner: CommandRunner, name: string): StepResult {
  const res = runner.run('killall', [name]);
  if (res.status === 0) return result('restart', name, 'applied');
  if (res.status === NO_MATCHING_PROCESS) return result('restart', name, 'skipped', 'not running');
  return result('restart', name, 'failed', describeFailure(res));
}

export function restartProcesses(runner: CommandRunner, names: string[]): StepResult[] {
  return names.map(name => restartProcess(runner, name));
}
