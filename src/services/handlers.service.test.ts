import { describe, expect, it } from 'vitest';
import { SYMBOLIC_HOTKEY_160 } from '../configs/hotkeys';
import { FakeWorkstation } from '../testing/fake-workstation';
import {
  SYMBOLIC_HOTKEYS_DOMAIN,
  SYMBOLIC_HOTKEYS_KEY,
  applySymbolicHotkey,
  encodeSymbolicHotkey,
  registerDefaultHandlers,
} from './handlers.service';
import { DefaultsStore } from './preferences.service';

describe('registerDefaultHandlers', () => {
  it('registers the bundle for every target', () => {
    const mac = new FakeWorkstation();
    const results = registerDefaultHandlers(mac, [{ bundleId: 'com.brave.Browser', targets: ['http', 'https', 'html'] }]);

    expect(mac.callsTo('duti')).toEqual([
      ['-s', 'com.brave.Browser', 'http'],
      ['-s', 'com.brave.Browser', 'https'],
      ['-s', 'com.brave.Browser', 'html'],
    ]);
    expect(results.map(r => r.target)).toEqual([
      'http -> com.brave.Browser',
      'https -> com.brave.Browser',
      'html -> com.brave.Browser',
    ]);
    expect(results.every(r => r.status === 'applied')).toBe(true);
  });

  it('reports a missing duti per target', () => {
    const mac = new FakeWorkstation().failWhen(c => c.command === 'duti', { status: 127, stdout: '', stderr: 'command not found: duti' });
    const results = registerDefaultHandlers(mac, [{ bundleId: 'com.brave.Browser', targets: ['http'] }]);
    expect(results).toEqual([
      { step: 'handlers', target: 'http -> com.brave.Browser', status: 'failed', detail: 'exit 127: command not found: duti' },
    ]);
  });
});

describe('encodeSymbolicHotkey', () => {
  it('encodes hotkey 160 as a plist dictionary', () => {
    expect(encodeSymbolicHotkey(SYMBOLIC_HOTKEY_160)).toBe(
      "{enabled = 1; value = { parameters = (100, 2, 1048576); type = 'standard'; }; }",
    );
  });

  it('encodes disabled hotkeys with 0', () => {
    expect(encodeSymbolicHotkey({ ...SYMBOLIC_HOTKEY_160, enabled: false })).toBe(
      "{enabled = 0; value = { parameters = (100, 2, 1048576); type = 'standard'; }; }",
    );
  });
});

describe('applySymbolicHotkey', () => {
  it('adds the entry to AppleSymbolicHotKeys', () => {
    const mac = new FakeWorkstation();
    const res = applySymbolicHotkey(new DefaultsStore(mac), SYMBOLIC_HOTKEY_160);

    expect(res).toEqual({ step: 'hotkeys', target: 'hotkey 160 (macos-14.0)', status: 'applied' });
    expect(mac.callsTo('defaults')).toEqual([[
      'write',
      SYMBOLIC_HOTKEYS_DOMAIN,
      SYMBOLIC_HOTKEYS_KEY,
      '-dict-add',
      '160',
      "{enabled = 1; value = { parameters = (100, 2, 1048576); type = 'standard'; }; }",
    ]]);
  });

  it('stores the same entry when applied twice', () => {
    const mac = new FakeWorkstation();
    const store = new DefaultsStore(mac);
    applySymbolicHotkey(store, SYMBOLIC_HOTKEY_160);
    applySymbolicHotkey(store, SYMBOLIC_HOTKEY_160);

    const dict = mac.dictEntries.get(`${SYMBOLIC_HOTKEYS_DOMAIN}|${SYMBOLIC_HOTKEYS_KEY}`);
    expect(dict?.size).toBe(1);
    expect(dict?.get('160')).toBe(encodeSymbolicHotkey(SYMBOLIC_HOTKEY_160));
  });
});
