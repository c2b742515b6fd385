/**
 * workstation-setup CLI arguments
 *
 * Usage:
 *   workstation-setup [--profile <file>] [--journal <file>] [--no-restart]
 *   workstation-setup --history [n]
 *   workstation-setup --verify-journal
 */

import { APP_NAME } from './config';

export type CliCommand =
  | { kind: 'run'; profile?: string; journal?: string; noRestart: boolean }
  | { kind: 'history'; limit: number; journal?: string }
  | { kind: 'verify-journal'; journal?: string }
  | { kind: 'version' }
  | { kind: 'help' };

export const USAGE = `Usage: ${APP_NAME} [options]

Configures this Mac for development: git identity, SSH key, system
preferences, default browser, keyboard shortcut, Dock.

Options:
  --profile <file>     JSON profile replacing sections of the built-in one
  --journal <file>     Journal database (default ~/.${APP_NAME}/journal.db)
  --no-restart         Do not restart Finder, Dock and friends at the end
  --history [n]        Show the last n runs (default 10)
  --verify-journal     Check the journal hash chain
  --version            Print version
  --help               Show this help
`;

export const DEFAULT_HISTORY_LIMIT = 10;

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export function parseArgs(argv: string[]): CliCommand {
  let profile: string | undefined;
  let journal: string | undefined;
  let noRestart = false;
  let history: number | undefined;
  let verify = false;

  const takeValue = (flag: string, i: number): string => {
    const value = argv[i + 1];
    if (value === undefined || value.startsWith('--')) {
      throw new UsageError(`${flag} requires a value`);
    }
    return value;
  };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    switch (arg) {
      case '--help':
      case '-h':
        return { kind: 'help' };
      case '--version':
      case '-v':
        return { kind: 'version' };
      case '--profile':
        profile = takeValue(arg, i++);
        break;
      case '--journal':
        journal = takeValue(arg, i++);
        break;
      case '--no-restart':
        noRestart = true;
        break;
      case '--history': {
        const next = argv[i + 1];
        if (next !== undefined && /^\d+$/.test(next)) {
          history = Number(next);
          i++;
        } else {
          history = DEFAULT_HISTORY_LIMIT;
        }
        break;
      }
      case '--verify-journal':
        verify = true;
        break;
      default:
        throw new UsageError(`Unknown argument: ${arg}`);
    }
  }

  if (history !== undefined && verify) {
    throw new UsageError('--history and --verify-journal cannot be combined');
  }
  if (history !== undefined) return { kind: 'history', limit: history, journal };
  if (verify) return { kind: 'verify-journal', journal };
  return { kind: 'run', profile, journal, noRestart };
}
