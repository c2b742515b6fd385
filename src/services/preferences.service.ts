/**
 * Preference Service
 *
 * All preference-database writes go through a PreferenceStore. Each setting
 * is read before it is written and read back after, so re-running a profile
 * reports `unchanged` instead of rewriting the same value.
 */

import type { PreferenceSetting, PreferenceType } from '../configs/schema';
import { describeFailure, type CommandRunner } from './shared/exec';
import { result, type StepResult } from './shared/results';

export interface PreferenceLocation {
  domain: string;
  key: string;
  currentHost?: boolean;
}

export interface WriteResult {
  success: boolean;
  error?: string;
}

/** Storage type names as `defaults read-type` reports them. */
export type StoredType = 'boolean' | 'integer' | 'float' | 'string' | 'array' | 'dictionary' | 'data' | 'date';

export interface StoredValue {
  type: StoredType;
  /** Value as `defaults read` prints it, without the final newline. */
  raw: string;
}

export interface PreferenceStore {
  /** Stored type and value, or undefined if the key is unset. */
  read(location: PreferenceLocation): StoredValue | undefined;
  write(setting: PreferenceSetting): WriteResult;
  /** Add or replace one entry of a dictionary-valued key (`-dict-add`). */
  mergeDictEntry(location: PreferenceLocation, entryKey: string, encodedValue: string): WriteResult;
}

function hostArgs(location: PreferenceLocation): string[] {
  return location.currentHost ? ['-currentHost'] : [];
}

const STORED_TYPES: readonly StoredType[] = ['boolean', 'integer', 'float', 'string', 'array', 'dictionary', 'data', 'date'];

function isStoredType(value: string): value is StoredType {
  return STORED_TYPES.some(t => t === value);
}

/** Parse `Type is integer` from `defaults read-type`. */
export function parseStoredType(output: string): StoredType | undefined {
  const match = /^Type is (\w+)/.exec(output.trim());
  const name = match?.[1];
  return name !== undefined && isStoredType(name) ? name : undefined;
}

const EXPECTED_TYPE: Record<PreferenceType, StoredType> = {
  bool: 'boolean',
  int: 'integer',
  float: 'float',
  string: 'string',
};

export function formatValue(setting: PreferenceSetting): string {
  switch (setting.type) {
    case 'bool':
      return setting.value ? 'true' : 'false';
    case 'int':
    case 'float':
      return String(setting.value);
    case 'string':
      return setting.value;
  }
}

/**
 * PreferenceStore backed by the `defaults` command.
 */
export class DefaultsStore implements PreferenceStore {
  constructor(private readonly runner: CommandRunner) {}

  read(location: PreferenceLocation): StoredValue | undefined {
    const typed = this.runner.run('defaults', [...hostArgs(location), 'read-type', location.domain, location.key]);
    if (typed.status !== 0) return undefined;
    const type = parseStoredType(typed.stdout);
    if (!type) return undefined;

    const res = this.runner.run('defaults', [...hostArgs(location), 'read', location.domain, location.key]);
    if (res.status !== 0) return undefined;
    return { type, raw: res.stdout.replace(/\n$/, '') };
  }

  write(setting: PreferenceSetting): WriteResult {
    const res = this.runner.run('defaults', [
      ...hostArgs(setting),
      'write',
      setting.domain,
      setting.key,
      `-${setting.type}`,
      formatValue(setting),
    ]);
    return res.status === 0 ? { success: true } : { success: false, error: describeFailure(res) };
  }

  mergeDictEntry(location: PreferenceLocation, entryKey: string, encodedValue: string): WriteResult {
    const res = this.runner.run('defaults', [
      ...hostArgs(location),
      'write',
      location.domain,
      location.key,
      '-dict-add',
      entryKey,
      encodedValue,
    ]);
    return res.status === 0 ? { success: true } : { success: false, error: describeFailure(res) };
  }
}

/**
 * Whether a stored value already equals the desired setting, type included.
 * Booleans read back as 1/0; numbers are compared numerically.
 */
export function matchesStored(setting: PreferenceSetting, stored: StoredValue | undefined): boolean {
  if (stored === undefined || stored.type !== EXPECTED_TYPE[setting.type]) return false;
  const { raw } = stored;
  switch (setting.type) {
    case 'bool': {
      const v = raw.toLowerCase();
      return setting.value ? v === '1' || v === 'true' || v === 'yes' : v === '0' || v === 'false' || v === 'no';
    }
    case 'int':
    case 'float':
      return raw !== '' && Number(raw) === setting.value;
    case 'string':
      return raw === setting.value;
  }
}

export function describeSetting(setting: PreferenceLocation): string {
  const host = setting.currentHost ? ' (current host)' : '';
  return `${setting.domain} ${setting.key}${host}`;
}

export function applyPreference(store: PreferenceStore, setting: PreferenceSetting): StepResult {
  const target = describeSetting(setting);
  const wanted = formatValue(setting);

  if (matchesStored(setting, store.read(setting))) {
    return result('preferences', target, 'unchanged', wanted);
  }

  const written = store.write(setting);
  if (!written.success) {
    return result('preferences', target, 'failed', written.error);
  }

  const after = store.read(setting);
  if (!matchesStored(setting, after)) {
    return result('preferences', target, 'failed', `read back ${after ? `${after.raw} (${after.type})` : '(unset)'}, expected ${wanted}`);
  }

  return result('preferences', target, 'applied', wanted);
}

/**
 * Apply every setting independently; a failure does not stop the rest.
 */
export function applyPreferences(store: PreferenceStore, settings: PreferenceSetting[]): StepResult[] {
  return settings.map(setting => applyPreference(store, setting));
}

const DARK_MODE_SCRIPT = 'tell application "System Events" to tell appearance preferences to';

/**
 * Dark mode is not a plain preference key; System Events owns it.
 */
export function applyDarkMode(runner: CommandRunner, enabled: boolean): StepResult {
  const target = 'dark mode';
  const current = runner.run('osascript', ['-e', `${DARK_MODE_SCRIPT} get dark mode`]);
  if (current.status === 0 && current.stdout.trim() === String(enabled)) {
    return result('appearance', target, 'unchanged', String(enabled));
  }

  const res = runner.run('osascript', ['-e', `${DARK_MODE_SCRIPT} set dark mode to ${enabled}`]);
  if (res.status !== 0) {
    return result('appearance', target, 'failed', describeFailure(res));
  }
  return result('appearance', target, 'applied', String(enabled));
}
