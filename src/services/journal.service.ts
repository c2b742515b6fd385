/**
 * Journal Service
 *
 * Tamper-evident record of setup runs with hash chain integrity.
 * One row per step result, bracketed by run_started and a run_finished
 * (or run_aborted) row.
 */

import crypto from 'crypto';
import type Database from 'better-sqlite3';
import { errorMessage } from './shared/log';
import { countResults, type RunSummary, type StatusCounts, type StepResult, type StepStatus } from './shared/results';

// Database will be injected to avoid circular dependencies
let db: Database.Database;

export function setDatabase(database: Database.Database): void {
  db = database;
}

export type JournalEvent = 'run_started' | 'step' | 'run_finished' | 'run_aborted';

export interface JournalEntry {
  run_id: string;
  timestamp: number;
  event: JournalEvent;
  step: string | null;
  target: string | null;
  status: StepStatus | null;
  detail: string | null;
  prev_hash: string;
  hash: string;
}

export interface StoredJournalEntry extends JournalEntry {
  id: number;
}

export interface RunOverview {
  runId: string;
  startedAt: number;
  finishedAt: number | null;
  aborted: boolean;
  counts: StatusCounts;
}

export interface IntegrityResult {
  valid: boolean;
  total: number;
  errors: Array<{
    id: number;
    error: 'chain_broken' | 'hash_mismatch';
    expected?: string;
    actual?: string;
  }>;
}

function computeHash(entry: JournalEntry): string {
  // Field order is part of the hash; keep it in sync with JournalEntry
  const material: JournalEntry = {
    run_id: entry.run_id,
    timestamp: entry.timestamp,
    event: entry.event,
    step: entry.step,
    target: entry.target,
    status: entry.status,
    detail: entry.detail,
    prev_hash: entry.prev_hash,
    hash: '',
  };
  return crypto.createHash('sha256').update(JSON.stringify(material)).digest('hex');
}

function appendEntry(fields: Omit<JournalEntry, 'prev_hash' | 'hash' | 'timestamp'>): JournalEntry {
  const last = db.prepare<[], { hash: string }>('SELECT hash FROM journal ORDER BY id DESC LIMIT 1').get();

  const entry: JournalEntry = {
    ...fields,
    timestamp: Date.now(),
    prev_hash: last ? last.hash : '0',
    hash: '',
  };
  entry.hash = computeHash(entry);

  db.prepare(
    'INSERT INTO journal (run_id, timestamp, event, step, target, status, detail, prev_hash, hash) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)'
  ).run(
    entry.run_id,
    entry.timestamp,
    entry.event,
    entry.step,
    entry.target,
    entry.status,
    entry.detail,
    entry.prev_hash,
    entry.hash
  );

  return entry;
}

/**
 * Open a new run and return its id.
 */
export function startRun(details?: Record<string, unknown>): string {
  const runId = crypto.randomUUID();
  appendEntry({
    run_id: runId,
    event: 'run_started',
    step: null,
    target: null,
    status: null,
    detail: details ? JSON.stringify(details) : null,
  });
  return runId;
}

export function recordStep(runId: string, stepResult: StepResult): JournalEntry {
  return appendEntry({
    run_id: runId,
    event: 'step',
    step: stepResult.step,
    target: stepResult.target,
    status: stepResult.status,
    detail: stepResult.detail ?? null,
  });
}

export function finishRun(runId: string, results: StepResult[]): JournalEntry {
  return appendEntry({
    run_id: runId,
    event: 'run_finished',
    step: null,
    target: null,
    status: null,
    detail: JSON.stringify(countResults(results)),
  });
}

/**
 * Close a run that stopped on an error before it could finish.
 */
export function abortRun(runId: string, reason: string): JournalEntry {
  return appendEntry({
    run_id: runId,
    event: 'run_aborted',
    step: null,
    target: null,
    status: null,
    detail: reason,
  });
}

/**
 * Run `body` inside a journaled run. The run is closed with run_finished
 * on success and run_aborted when `body` throws; the error is rethrown.
 */
export async function withJournaledRun(
  details: Record<string, unknown>,
  body: (runId: string) => Promise<RunSummary>,
): Promise<RunSummary> {
  const runId = startRun(details);
  try {
    const summary = await body(runId);
    finishRun(runId, summary.results);
    return summary;
  } catch (err) {
    abortRun(runId, errorMessage(err));
    throw err;
  }
}

/**
 * Entries of one run in insertion order
 */
export function getRunEntries(runId: string): StoredJournalEntry[] {
  return db.prepare<[string], StoredJournalEntry>(
    'SELECT * FROM journal WHERE run_id = ? ORDER BY id ASC'
  ).all(runId);
}

/**
 * Most recent runs first
 */
export function listRuns(limit = 10): RunOverview[] {
  const runs = db.prepare<[number], { run_id: string; started_at: number }>(
    "SELECT run_id, timestamp AS started_at FROM journal WHERE event = 'run_started' ORDER BY id DESC LIMIT ?"
  ).all(limit);

  const closed = db.prepare<[string], { event: JournalEvent; timestamp: number }>(
    "SELECT event, timestamp FROM journal WHERE run_id = ? AND event IN ('run_finished', 'run_aborted') ORDER BY id DESC LIMIT 1"
  );
  const statuses = db.prepare<[string], { status: StepStatus; n: number }>(
    "SELECT status, COUNT(*) AS n FROM journal WHERE run_id = ? AND event = 'step' GROUP BY status"
  );

  return runs.map(run => {
    const counts: StatusCounts = { applied: 0, unchanged: 0, skipped: 0, failed: 0 };
    for (const row of statuses.all(run.run_id)) counts[row.status] = row.n;
    const end = closed.get(run.run_id);
    return {
      runId: run.run_id,
      startedAt: run.started_at,
      finishedAt: end?.timestamp ?? null,
      aborted: end?.event === 'run_aborted',
      counts,
    };
  });
}

/**
 * Verify journal integrity (hash chain)
 */
export function verifyJournalIntegrity(): IntegrityResult {
  const rows = db.prepare<[], StoredJournalEntry>('SELECT * FROM journal ORDER BY id ASC').all();

  let prevHash = '0';
  const errors: IntegrityResult['errors'] = [];

  for (const row of rows) {
    if (row.prev_hash !== prevHash) {
      errors.push({ id: row.id, error: 'chain_broken', expected: prevHash, actual: row.prev_hash });
    }

    const expected = computeHash(row);
    if (row.hash !== expected) {
      errors.push({ id: row.id, error: 'hash_mismatch', expected, actual: row.hash });
    }

    prevHash = row.hash;
  }

  return { valid: errors.length === 0, total: rows.length, errors };
}
