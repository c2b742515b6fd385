import type { SymbolicHotkey } from './schema';

/**
 * Symbolic hotkey 160 as captured from a configured macOS 14 machine.
 *
 * The meaning of the ID and of the parameter tuple is owned by macOS and is
 * not documented. Do not edit the numbers by hand: re-capture them with
 * `defaults read com.apple.symbolichotkeys AppleSymbolicHotKeys` and bump
 * `revision`.
 */
export const SYMBOLIC_HOTKEY_160: SymbolicHotkey = {
  id: 160,
  enabled: true,
  type: 'standard',
  parameters: [100, 2, 1048576],
  revision: 'macos-14.0',
};
