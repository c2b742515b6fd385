/**
 * Directory Service
 *
 * Creates the folders other steps point at (screenshot location, Dock folder).
 */

import fs from 'fs';
import { errorMessage } from './shared/log';
import { result, type StepResult } from './shared/results';

export function ensureDirectory(dir: string): StepResult {
  if (fs.existsSync(dir)) {
    return fs.statSync(dir).isDirectory()
      ? result('directories', dir, 'unchanged')
      : result('directories', dir, 'failed', 'exists and is not a directory');
  }

  try {
    fs.mkdirSync(dir, { recursive: true });
    return result('directories', dir, 'applied');
  } catch (err) {
    return result('directories', dir, 'failed', errorMessage(err));
  }
}

export function ensureDirectories(dirs: string[]): StepResult[] {
  return dirs.map(ensureDirectory);
}

export function isDirectory(p: string): boolean {
  try {
    return fs.statSync(p).isDirectory();
  } catch {
    return false;
  }
}
