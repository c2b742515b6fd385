/**
 * Step results.
 *
 * Every setup step reports what it did instead of throwing, so one failed
 * write never hides the rest of the run.
 */

export const STEPS = [
  'privileges',
  'git',
  'ssh',
  'directories',
  'preferences',
  'appearance',
  'handlers',
  'hotkeys',
  'dock',
  'restart',
] as const;

export type StepName = typeof STEPS[number];

export type StepStatus = 'applied' | 'unchanged' | 'skipped' | 'failed';

export interface StepResult {
  step: StepName;
  target: string;
  status: StepStatus;
  detail?: string;
}

export type StatusCounts = Record<StepStatus, number>;

export interface RunSummary {
  runId: string;
  startedAt: number;
  finishedAt: number;
  results: StepResult[];
  counts: StatusCounts;
}

export function result(step: StepName, target: string, status: StepStatus, detail?: string): StepResult {
  return detail === undefined ? { step, target, status } : { step, target, status, detail };
}

export function countResults(results: StepResult[]): StatusCounts {
  const counts: StatusCounts = { applied: 0, unchanged: 0, skipped: 0, failed: 0 };
  for (const r of results) counts[r.status]++;
  return counts;
}

export function hasFailures(results: StepResult[]): boolean {
  return results.some(r => r.status === 'failed');
}
