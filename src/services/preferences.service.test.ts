import { describe, expect, it } from 'vitest';
import type { PreferenceSetting } from '../configs/schema';
import { FakeWorkstation } from '../testing/fake-workstation';
import {
  DefaultsStore,
  applyDarkMode,
  applyPreference,
  applyPreferences,
  formatValue,
  matchesStored,
  parseStoredType,
  type StoredValue,
} from './preferences.service';

const tilesize = { domain: 'com.apple.dock', key: 'tilesize', type: 'int', value: 64 } satisfies PreferenceSetting;
const autohide = { domain: 'com.apple.dock', key: 'autohide', type: 'bool', value: true } satisfies PreferenceSetting;
const tapBehavior = {
  domain: 'NSGlobalDomain',
  key: 'com.apple.mouse.tapBehavior',
  type: 'int',
  value: 1,
  currentHost: true,
} satisfies PreferenceSetting;

const boolean = (raw: string): StoredValue => ({ type: 'boolean', raw });
const integer = (raw: string): StoredValue => ({ type: 'integer', raw });
const string = (raw: string): StoredValue => ({ type: 'string', raw });

describe('matchesStored', () => {
  it('treats unset keys as different', () => {
    expect(matchesStored(autohide, undefined)).toBe(false);
  });

  it('reads booleans as 1/0', () => {
    expect(matchesStored(autohide, boolean('1'))).toBe(true);
    expect(matchesStored(autohide, boolean('0'))).toBe(false);
    expect(matchesStored({ ...autohide, value: false }, boolean('0'))).toBe(true);
  });

  it('accepts textual booleans', () => {
    expect(matchesStored(autohide, boolean('TRUE'))).toBe(true);
    expect(matchesStored({ ...autohide, value: false }, boolean('no'))).toBe(true);
  });

  it('compares numbers numerically', () => {
    expect(matchesStored(tilesize, integer('64'))).toBe(true);
    expect(matchesStored(tilesize, integer('64.0'))).toBe(true);
    expect(matchesStored(tilesize, integer('48'))).toBe(false);
    expect(matchesStored({ ...tilesize, value: 0 }, integer(''))).toBe(false);
  });

  it('compares strings exactly', () => {
    const location: PreferenceSetting = { domain: 'com.apple.screencapture', key: 'location', type: 'string', value: '/Users/dev/Screenshots' };
    expect(matchesStored(location, string('/Users/dev/Screenshots'))).toBe(true);
    expect(matchesStored(location, string('/Users/dev/Desktop'))).toBe(false);
    expect(matchesStored(location, string(' /Users/dev/Screenshots'))).toBe(false);
  });

  it('requires the stored type to match the declared one', () => {
    expect(matchesStored(tilesize, string('64'))).toBe(false);
    expect(matchesStored(tilesize, { type: 'float', raw: '64' })).toBe(false);
    expect(matchesStored(autohide, integer('1'))).toBe(false);
  });
});

describe('parseStoredType', () => {
  it('reads the type name from read-type output', () => {
    expect(parseStoredType('Type is integer\n')).toBe('integer');
    expect(parseStoredType('Type is dictionary\n')).toBe('dictionary');
  });

  it('rejects unexpected output', () => {
    expect(parseStoredType('')).toBeUndefined();
    expect(parseStoredType('Type is widget')).toBeUndefined();
  });
});

describe('formatValue', () => {
  it('formats each type for defaults write', () => {
    expect(formatValue(autohide)).toBe('true');
    expect(formatValue({ ...autohide, value: false })).toBe('false');
    expect(formatValue({ domain: 'NSGlobalDomain', key: 'AppleAccentColor', type: 'int', value: -2 })).toBe('-2');
  });
});

describe('DefaultsStore', () => {
  it('writes with a typed flag', () => {
    const mac = new FakeWorkstation();
    new DefaultsStore(mac).write(tilesize);
    expect(mac.callsTo('defaults')).toEqual([['write', 'com.apple.dock', 'tilesize', '-int', '64']]);
  });

  it('prefixes -currentHost for per-host settings', () => {
    const mac = new FakeWorkstation();
    const store = new DefaultsStore(mac);
    store.write(tapBehavior);
    expect(mac.callsTo('defaults')[0]).toEqual([
      '-currentHost', 'write', 'NSGlobalDomain', 'com.apple.mouse.tapBehavior', '-int', '1',
    ]);
    expect(store.read(tapBehavior)).toEqual({ type: 'integer', raw: '1' });
    expect(store.read({ domain: 'NSGlobalDomain', key: 'com.apple.mouse.tapBehavior' })).toBeUndefined();
  });

  it('keeps surrounding whitespace of string values', () => {
    const mac = new FakeWorkstation().setDefault('com.example.app', 'Label', string('  padded  '));
    expect(new DefaultsStore(mac).read({ domain: 'com.example.app', key: 'Label' })).toEqual(string('  padded  '));
  });

  it('reports the failing command', () => {
    const mac = new FakeWorkstation().failWhen(c => c.command === 'defaults', { status: 1, stdout: '', stderr: 'Could not write domain\n' });
    expect(new DefaultsStore(mac).write(tilesize)).toEqual({ success: false, error: 'exit 1: Could not write domain' });
  });
});

describe('applyPreference', () => {
  it('writes a missing value and verifies it', () => {
    const mac = new FakeWorkstation();
    const res = applyPreference(new DefaultsStore(mac), tilesize);
    expect(res).toEqual({ step: 'preferences', target: 'com.apple.dock tilesize', status: 'applied', detail: '64' });
    expect(mac.getDefault('com.apple.dock', 'tilesize')).toBe('64');
  });

  it('leaves an equal value alone', () => {
    const mac = new FakeWorkstation().setDefault('com.apple.dock', 'autohide', boolean('1'));
    const res = applyPreference(new DefaultsStore(mac), autohide);
    expect(res.status).toBe('unchanged');
    expect(mac.callsTo('defaults')).toEqual([
      ['read-type', 'com.apple.dock', 'autohide'],
      ['read', 'com.apple.dock', 'autohide'],
    ]);
  });

  it('overwrites a different value', () => {
    const mac = new FakeWorkstation().setDefault('com.apple.dock', 'tilesize', integer('48'));
    expect(applyPreference(new DefaultsStore(mac), tilesize).status).toBe('applied');
    expect(mac.getDefault('com.apple.dock', 'tilesize')).toBe('64');
  });

  it('rewrites an equal value stored under another type', () => {
    const mac = new FakeWorkstation();
    const store = new DefaultsStore(mac);
    store.write({ ...tilesize, type: 'string', value: '64' });

    const res = applyPreference(store, tilesize);

    expect(res).toEqual({ step: 'preferences', target: 'com.apple.dock tilesize', status: 'applied', detail: '64' });
    expect(mac.callsTo('defaults')).toContainEqual(['write', 'com.apple.dock', 'tilesize', '-int', '64']);
    expect(mac.getDefaultType('com.apple.dock', 'tilesize')).toBe('integer');
  });

  it('keeps a padded string stable across runs', () => {
    const label = { domain: 'com.example.app', key: 'Label', type: 'string', value: ' padded ' } satisfies PreferenceSetting;
    const store = new DefaultsStore(new FakeWorkstation());
    expect(applyPreference(store, label).status).toBe('applied');
    expect(applyPreference(store, label).status).toBe('unchanged');
  });

  it('fails when the value does not read back', () => {
    const mac = new FakeWorkstation().failWhen(
      c => c.command === 'defaults' && c.args[0] === 'write',
      { status: 0, stdout: '', stderr: '' },
    );
    const res = applyPreference(new DefaultsStore(mac), tilesize);
    expect(res).toEqual({
      step: 'preferences',
      target: 'com.apple.dock tilesize',
      status: 'failed',
      detail: 'read back (unset), expected 64',
    });
  });

  it('labels per-host settings', () => {
    const res = applyPreference(new DefaultsStore(new FakeWorkstation()), tapBehavior);
    expect(res.target).toBe('NSGlobalDomain com.apple.mouse.tapBehavior (current host)');
  });
});

describe('applyPreferences', () => {
  it('keeps going after a failed write', () => {
    const mac = new FakeWorkstation().failWhen(
      c => c.args[0] === 'write' && c.args[2] === 'tilesize',
      { status: 1, stdout: '', stderr: 'denied' },
    );
    const results = applyPreferences(new DefaultsStore(mac), [tilesize, autohide]);
    expect(results.map(r => r.status)).toEqual(['failed', 'applied']);
    expect(mac.getDefault('com.apple.dock', 'autohide')).toBe('1');
  });

  it('is idempotent', () => {
    const mac = new FakeWorkstation();
    const store = new DefaultsStore(mac);
    applyPreferences(store, [tilesize, autohide, tapBehavior]);
    const snapshot = new Map(mac.defaults);

    const second = applyPreferences(store, [tilesize, autohide, tapBehavior]);
    expect(second.map(r => r.status)).toEqual(['unchanged', 'unchanged', 'unchanged']);
    expect(mac.defaults).toEqual(snapshot);
  });
});

describe('applyDarkMode', () => {
  it('switches dark mode on', () => {
    const mac = new FakeWorkstation();
    expect(applyDarkMode(mac, true).status).toBe('applied');
    expect(mac.darkMode).toBe(true);
  });

  it('does nothing when already dark', () => {
    const mac = new FakeWorkstation();
    mac.darkMode = true;
    expect(applyDarkMode(mac, true).status).toBe('unchanged');
    expect(mac.callsTo('osascript')).toHaveLength(1);
  });
});
