/**
 * Setup Run
 *
 * Applies a profile to the machine step by step, in a fixed order:
 * privileges, git, SSH key, preferences, default handlers and hotkeys,
 * Dock, process restarts. Every step reports StepResults; nothing throws
 * past this function except prompt failures.
 */

import crypto from 'crypto';
import type { SetupPaths } from './config';
import type { Profile } from './configs/schema';
import { ensureDirectories } from './services/directories.service';
import { reconcileDock } from './services/dock.service';
import { configureGit, readGlobalConfig } from './services/git.service';
import { applySymbolicHotkeys, registerDefaultHandlers } from './services/handlers.service';
import { applyDarkMode, applyPreferences, type PreferenceStore } from './services/preferences.service';
import { SudoSession } from './services/privilege.service';
import { restartProcesses } from './services/restart.service';
import type { CommandRunner } from './services/shared/exec';
import { dim, green, header, red, yellow } from './services/shared/log';
import type { Prompter } from './services/shared/prompt';
import { countResults, result, type RunSummary, type StepResult, type StepStatus } from './services/shared/results';
import { ensureSshKey, showPublicKey } from './services/ssh.service';

export interface SetupContext {
  runner: CommandRunner;
  prompter: Prompter;
  store: PreferenceStore;
  /** Resolved profile (no `~` left in paths). */
  profile: Profile;
  paths: SetupPaths;
  /** Skip killall of UI processes. */
  noRestart?: boolean;
  /** Installed-app check for the Dock; defaults to a directory check. */
  appExists?: (path: string) => boolean;
  /** Called for every result as soon as it is produced. */
  onResult?: (stepResult: StepResult) => void;
  runId?: string;
  now?: () => number;
}

export async function runSetup(ctx: SetupContext): Promise<RunSummary> {
  const now = ctx.now ?? Date.now;
  const startedAt = now();
  const results: StepResult[] = [];
  const collect = (batch: StepResult | StepResult[]): void => {
    for (const r of Array.isArray(batch) ? batch : [batch]) {
      results.push(r);
      ctx.onResult?.(r);
    }
  };

  const { runner, profile } = ctx;
  const sudo = new SudoSession(runner);

  header('Starting macOS Configuration');
  const elevated = sudo.acquire();
  collect(elevated);
  if (elevated.status !== 'failed') sudo.startKeepAlive();

  try {
    header('Configuring Git');
    collect(await configureGit(runner, ctx.prompter, { defaultBranch: profile.git.defaultBranch }));

    header('Checking for SSH Key');
    collect(ensureSshKey(runner, ctx.paths.sshKeyPath, readGlobalConfig(runner, 'user.email')));
    showPublicKey(ctx.paths.sshKeyPath);

    header('Applying System, Finder & Quality-of-Life Tweaks');
    collect(ensureDirectories(profile.directories));
    collect(applyPreferences(ctx.store, profile.preferences));
    collect(applyDarkMode(runner, profile.appearance.darkMode));

    header('Setting Default Applications and Keyboard Shortcuts');
    collect(registerDefaultHandlers(runner, profile.defaultHandlers));
    collect(applySymbolicHotkeys(ctx.store, profile.hotkeys));

    header('Configuring the Dock');
    collect(reconcileDock(runner, {
      apps: profile.dock.apps,
      folder: profile.dock.folder,
      exists: ctx.appExists,
    }));

    header('Finalizing Setup');
    if (ctx.noRestart) {
      collect(profile.restartProcesses.map(name => result('restart', name, 'skipped', '--no-restart')));
    } else {
      collect(restartProcesses(runner, profile.restartProcesses));
    }
  } finally {
    sudo.stop();
  }

  return {
    runId: ctx.runId ?? crypto.randomUUID(),
    startedAt,
    finishedAt: now(),
    results,
    counts: countResults(results),
  };
}

const STATUS_LABEL: Record<StepStatus, (text: string) => string> = {
  applied: green,
  unchanged: dim,
  skipped: yellow,
  failed: red,
};

export function formatResultLine(r: StepResult): string {
  const status = STATUS_LABEL[r.status](r.status.padEnd(9));
  const detail = r.detail ? `  ${dim(r.detail)}` : '';
  return `  ${status} ${r.step.padEnd(11)} ${r.target}${detail}`;
}

export function printSummary(summary: RunSummary): void {
  header('Summary');
  for (const r of summary.results) {
    console.log(formatResultLine(r));
  }
  const { applied, unchanged, skipped, failed } = summary.counts;
  console.log('');
  console.log(`${applied} applied, ${unchanged} unchanged, ${skipped} skipped, ${failed} failed`);
  console.log('');

  if (failed > 0) {
    console.log(red('❌ macOS configuration finished with failures. Re-run after fixing the steps above.'));
  } else {
    console.log('✅ macOS configuration is complete! Note: Some changes may require a logout/restart to take full effect.');
  }
  console.log("💡 Don't forget to set a developer font such as 'JetBrains Mono Nerd Font' or 'Hack Nerd Font' in your terminal and code editor settings!");
}
