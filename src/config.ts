/**
 * Workstation Setup Configuration
 *
 * File paths and fixed constants. Everything that describes the desired
 * machine state lives in the profile (./configs), not here.
 */

import os from 'os';
import path from 'path';

export const APP_NAME = 'workstation-setup';

/** `sudo -n true` interval for the keep-alive loop. */
export const SUDO_KEEPALIVE_SECONDS = 60;

export const SSH_KEY_TYPE = 'ed25519';

export interface SetupPaths {
  home: string;
  sshDir: string;
  sshKeyPath: string;
  dataDir: string;
  journalPath: string;
}

export function resolvePaths(home: string = os.homedir()): SetupPaths {
  const sshDir = path.join(home, '.ssh');
  const dataDir = path.join(home, `.${APP_NAME}`);
  return {
    home,
    sshDir,
    sshKeyPath: path.join(sshDir, `id_${SSH_KEY_TYPE}`),
    dataDir,
    journalPath: path.join(dataDir, 'journal.db'),
  };
}

/**
 * Expand a leading `~` against the given home directory.
 */
export function expandHome(p: string, home: string): string {
  if (p === '~') return home;
  if (p.startsWith('~/')) return path.join(home, p.slice(2));
  return p;
}
