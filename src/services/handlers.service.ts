/**
 * Handler Service
 *
 * Default-application registration (duti) and symbolic hotkey overrides.
 */

import type { DefaultHandler, SymbolicHotkey } from '../configs/schema';
import type { PreferenceStore } from './preferences.service';
import { describeFailure, type CommandRunner } from './shared/exec';
import { result, type StepResult } from './shared/results';

export const SYMBOLIC_HOTKEYS_DOMAIN = 'com.apple.symbolichotkeys';
export const SYMBOLIC_HOTKEYS_KEY = 'AppleSymbolicHotKeys';

/**
 * Make `bundleId` the handler for each URL scheme or file type.
 * duti has no reliable read for URL schemes, so every target is written.
 */
export function registerDefaultHandler(runner: CommandRunner, handler: DefaultHandler): StepResult[] {
  return handler.targets.map(target => {
    const label = `${target} -> ${handler.bundleId}`;
    const res = runner.run('duti', ['-s', handler.bundleId, target]);
    return res.status === 0
      ? result('handlers', label, 'applied')
      : result('handlers', label, 'failed', describeFailure(res));
  });
}

export function registerDefaultHandlers(runner: CommandRunner, handlers: DefaultHandler[]): StepResult[] {
  return handlers.flatMap(h => registerDefaultHandler(runner, h));
}

/**
 * Encode a hotkey as the old-style plist dictionary `defaults -dict-add` takes.
 */
export function encodeSymbolicHotkey(hotkey: SymbolicHotkey): string {
  const params = hotkey.parameters.join(', ');
  return `{enabled = ${hotkey.enabled ? 1 : 0}; value = { parameters = (${params}); type = '${hotkey.type}'; }; }`;
}

export function applySymbolicHotkey(store: PreferenceStore, hotkey: SymbolicHotkey): StepResult {
  const target = `hotkey ${hotkey.id} (${hotkey.revision})`;
  const written = store.mergeDictEntry(
    { domain: SYMBOLIC_HOTKEYS_DOMAIN, key: SYMBOLIC_HOTKEYS_KEY },
    String(hotkey.id),
    encodeSymbolicHotkey(hotkey),
  );
  return written.success
    ? result('hotkeys', target, 'applied')
    : result('hotkeys', target, 'failed', written.error);
}

export function applySymbolicHotkeys(store: PreferenceStore, hotkeys: SymbolicHotkey[]): StepResult[] {
  return hotkeys.map(h => applySymbolicHotkey(store, h));
}
