/**
 * Profile loading and resolution.
 */

import fs from 'fs';
import { expandHome } from '../config';
import { errorMessage } from '../services/shared/log';
import { DEFAULT_PROFILE } from './default-profile';
import { ProfileOverrideSchema, type PreferenceSetting, type Profile } from './schema';

export class ProfileError extends Error {
  constructor(message: string, public readonly issues: string[] = []) {
    super(issues.length > 0 ? `${message}\n  - ${issues.join('\n  - ')}` : message);
    this.name = 'ProfileError';
  }
}

/**
 * Read a profile file and lay its sections over the built-in profile.
 * Without a file the built-in profile is returned unchanged.
 */
export function loadProfile(file?: string): Profile {
  if (!file) return DEFAULT_PROFILE;

  let raw: string;
  try {
    raw = fs.readFileSync(file, 'utf8');
  } catch (err) {
    throw new ProfileError(`Cannot read profile ${file}: ${errorMessage(err)}`);
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw new ProfileError(`Profile ${file} is not valid JSON: ${errorMessage(err)}`);
  }

  const parsed = ProfileOverrideSchema.safeParse(json);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => {
      const where = issue.path.length > 0 ? issue.path.join('.') : '(root)';
      return `${where}: ${issue.message}`;
    });
    throw new ProfileError(`Invalid profile ${file}`, issues);
  }

  return { ...DEFAULT_PROFILE, ...parsed.data };
}

function expandPreference(setting: PreferenceSetting, home: string): PreferenceSetting {
  if (setting.type !== 'string') return setting;
  return { ...setting, value: expandHome(setting.value, home) };
}

/**
 * Expand `~/` in every path-valued field of the profile.
 */
export function resolveProfile(profile: Profile, home: string): Profile {
  return {
    ...profile,
    directories: profile.directories.map(d => expandHome(d, home)),
    preferences: profile.preferences.map(p => expandPreference(p, home)),
    dock: {
      apps: profile.dock.apps.map(a => expandHome(a, home)),
      folder: { ...profile.dock.folder, path: expandHome(profile.dock.folder.path, home) },
    },
  };
}
