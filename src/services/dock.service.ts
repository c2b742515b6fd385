/**
 * Dock Service
 *
 * Rebuilds the Dock from the profile: remove everything, then add the
 * installed apps in declared order followed by the folder shortcut.
 * A full reset keeps the final order independent of what was there before.
 */

import type { DockFolder } from '../configs/schema';
import { ensureDirectory, isDirectory } from './directories.service';
import { describeFailure, type CommandRunner } from './shared/exec';
import { createLogger } from './shared/log';
import { result, type StepResult } from './shared/results';

const logger = createLogger('dock');

export type DockItem =
  | { kind: 'app'; path: string }
  | { kind: 'folder'; path: string; displayAs: DockFolder['displayAs'] };

export interface DockPlan {
  items: DockItem[];
  missing: string[];
}

/**
 * Ordered Dock contents for the given apps and folder.
 * An app is included iff `exists` reports it installed.
 */
export function planDock(apps: string[], folder: DockFolder, exists: (path: string) => boolean): DockPlan {
  const items: DockItem[] = [];
  const missing: string[] = [];

  for (const app of apps) {
    if (exists(app)) {
      items.push({ kind: 'app', path: app });
    } else {
      missing.push(app);
    }
  }
  items.push({ kind: 'folder', path: folder.path, displayAs: folder.displayAs });

  return { items, missing };
}

function addArgs(item: DockItem): string[] {
  return item.kind === 'folder'
    ? ['--add', item.path, '--displayas', item.displayAs, '--no-restart']
    : ['--add', item.path, '--no-restart'];
}

export interface ReconcileDockOptions {
  apps: string[];
  folder: DockFolder;
  exists?: (path: string) => boolean;
}

export function reconcileDock(runner: CommandRunner, options: ReconcileDockOptions): StepResult[] {
  const exists = options.exists ?? isDirectory;
  const results: StepResult[] = [];

  const folderDir = ensureDirectory(options.folder.path);
  if (folderDir.status !== 'unchanged') results.push(folderDir);

  const plan = planDock(options.apps, options.folder, exists);

  const cleared = runner.run('dockutil', ['--remove', 'all', '--no-restart']);
  if (cleared.status !== 0) {
    // Adding on top of the old items would leave duplicates and the wrong order
    results.push(result('dock', 'remove all', 'failed', describeFailure(cleared)));
    return results;
  }
  results.push(result('dock', 'remove all', 'applied'));

  for (const app of plan.missing) {
    logger.warn(`Application not found at '${app}'. It may not be installed.`);
    results.push(result('dock', app, 'skipped', 'not installed'));
  }

  for (const item of plan.items) {
    logger.log(item.kind === 'folder' ? `Adding folder '${item.path}' to Dock` : `Adding '${item.path}' to Dock`);
    const res = runner.run('dockutil', addArgs(item));
    const detail = item.kind === 'folder' ? `display as ${item.displayAs}` : undefined;
    results.push(
      res.status === 0
        ? result('dock', item.path, 'applied', detail)
        : result('dock', item.path, 'failed', describeFailure(res)),
    );
  }

  return results;
}
