/**
 * Git Service
 *
 * Global git configuration: default branch, and the commit identity when it
 * is not configured yet. An existing identity is never overwritten.
 */

import { describeFailure, type CommandRunner } from './shared/exec';
import { createLogger } from './shared/log';
import type { Prompter } from './shared/prompt';
import { result, type StepResult } from './shared/results';

const logger = createLogger('git');

const IDENTITY_FIELDS = [
  { key: 'user.name', label: 'name', question: 'Enter your full name for Git commits:' },
  { key: 'user.email', label: 'email', question: 'Enter your email for Git commits:' },
] as const;

/**
 * Read a global config value. Unset keys read as ''.
 */
export function readGlobalConfig(runner: CommandRunner, key: string): string {
  const res = runner.run('git', ['config', '--global', key]);
  return res.status === 0 ? res.stdout.trim() : '';
}

function writeGlobalConfig(runner: CommandRunner, key: string, value: string): StepResult {
  const res = runner.run('git', ['config', '--global', key, value]);
  return res.status === 0
    ? result('git', key, 'applied', value)
    : result('git', key, 'failed', describeFailure(res));
}

export function setDefaultBranch(runner: CommandRunner, branch: string): StepResult {
  if (readGlobalConfig(runner, 'init.defaultBranch') === branch) {
    return result('git', 'init.defaultBranch', 'unchanged', branch);
  }
  return writeGlobalConfig(runner, 'init.defaultBranch', branch);
}

/**
 * Prompt for user.name / user.email where they are empty.
 * Answers are written as typed; an empty answer is accepted.
 */
export async function ensureIdentity(runner: CommandRunner, prompter: Prompter): Promise<StepResult[]> {
  const results: StepResult[] = [];

  for (const field of IDENTITY_FIELDS) {
    const current = readGlobalConfig(runner, field.key);
    if (current) {
      logger.log(`Git user ${field.label} is already set to: ${current}`);
      results.push(result('git', field.key, 'unchanged', current));
      continue;
    }

    logger.log(`Git user ${field.label} not set. Let's configure it.`);
    const answer = await prompter.input(field.question);
    results.push(writeGlobalConfig(runner, field.key, answer));
  }

  return results;
}

export async function configureGit(
  runner: CommandRunner,
  prompter: Prompter,
  options: { defaultBranch: string },
): Promise<StepResult[]> {
  return [setDefaultBranch(runner, options.defaultBranch), ...(await ensureIdentity(runner, prompter))];
}
