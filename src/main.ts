/**
 * workstation-setup CLI
 *
 * One-time, re-runnable configuration of a developer Mac. Requires git,
 * ssh-keygen, duti and dockutil on PATH (see README).
 */

import { parseArgs, UsageError, USAGE, type CliCommand } from './cli';
import { resolvePaths } from './config';
import { loadProfile, resolveProfile } from './configs/load';
import { openJournalDatabase } from './database';
import {
  listRuns,
  recordStep,
  verifyJournalIntegrity,
  withJournaledRun,
  type RunOverview,
} from './services/journal.service';
import { DefaultsStore } from './services/preferences.service';
import { SystemRunner } from './services/shared/exec';
import { errorMessage } from './services/shared/log';
import { inquirerPrompter } from './services/shared/prompt';
import { hasFailures } from './services/shared/results';
import { printSummary, runSetup } from './setup';
import { VERSION } from './version';

function formatTime(ms: number | null): string {
  return ms === null ? 'unfinished' : new Date(ms).toISOString();
}

function formatEnd(run: RunOverview): string {
  const end = formatTime(run.finishedAt);
  return run.aborted ? `${end} (aborted)` : end;
}

function showHistory(limit: number): number {
  const runs = listRuns(limit);
  if (runs.length === 0) {
    console.log('[setup] No runs recorded yet.');
    return 0;
  }
  for (const run of runs) {
    const { applied, unchanged, skipped, failed } = run.counts;
    console.log(`${run.runId}  ${formatTime(run.startedAt)}  ${formatEnd(run)}  ` +
      `applied=${applied} unchanged=${unchanged} skipped=${skipped} failed=${failed}`);
  }
  return 0;
}

function verifyJournal(): number {
  const integrity = verifyJournalIntegrity();
  if (integrity.valid) {
    console.log(`[setup] Journal OK (${integrity.total} entries)`);
    return 0;
  }
  for (const e of integrity.errors) {
    console.error(`[setup] Entry ${e.id}: ${e.error} (expected ${e.expected ?? '?'}, found ${e.actual ?? '?'})`);
  }
  return 1;
}

async function run(command: Extract<CliCommand, { kind: 'run' }>): Promise<number> {
  if (process.platform !== 'darwin') {
    console.error(`[setup] This tool configures macOS; refusing to run on ${process.platform}.`);
    return 1;
  }

  const paths = resolvePaths();
  const profile = resolveProfile(loadProfile(command.profile), paths.home);
  const db = openJournalDatabase(command.journal ?? paths.journalPath);

  try {
    const runner = new SystemRunner();
    const details = { version: VERSION, profile: command.profile ?? 'built-in' };
    const summary = await withJournaledRun(details, (runId) => runSetup({
      runner,
      prompter: inquirerPrompter,
      store: new DefaultsStore(runner),
      profile,
      paths,
      noRestart: command.noRestart,
      runId,
      onResult: (r) => recordStep(runId, r),
    }));
    printSummary(summary);
    return hasFailures(summary.results) ? 1 : 0;
  } finally {
    db.close();
  }
}

async function main(argv: string[]): Promise<number> {
  let command: CliCommand;
  try {
    command = parseArgs(argv);
  } catch (err) {
    if (err instanceof UsageError) {
      process.stderr.write(`${err.message}\n\n${USAGE}`);
      return 1;
    }
    throw err;
  }

  switch (command.kind) {
    case 'help':
      process.stdout.write(USAGE);
      return 0;
    case 'version':
      console.log(VERSION);
      return 0;
    case 'history':
    case 'verify-journal': {
      const db = openJournalDatabase(command.journal ?? resolvePaths().journalPath);
      try {
        return command.kind === 'history' ? showHistory(command.limit) : verifyJournal();
      } finally {
        db.close();
      }
    }
    case 'run':
      return run(command);
  }
}

main(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    console.error(`[setup] Fatal: ${errorMessage(err)}`);
    process.exitCode = 1;
  },
);
