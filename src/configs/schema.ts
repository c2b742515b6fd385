/**
 * Zod schemas for setup profiles.
 *
 * A profile is the full desired state of the workstation. The built-in
 * profile lives in ./default-profile; a JSON file passed with --profile may
 * replace any top-level section.
 *
 * @module configs/schema
 */

import { z } from 'zod';

const base = {
  domain: z.string().min(1, 'domain is required'),
  key: z.string().min(1, 'key is required'),
  currentHost: z.boolean().optional(),
  description: z.string().optional(),
};

/**
 * One value in a preference domain, written with `defaults write`.
 */
export const PreferenceSettingSchema = z.discriminatedUnion('type', [
  z.object({ ...base, type: z.literal('bool'), value: z.boolean() }),
  z.object({ ...base, type: z.literal('int'), value: z.number().int() }),
  z.object({ ...base, type: z.literal('float'), value: z.number() }),
  z.object({ ...base, type: z.literal('string'), value: z.string() }),
]);

export const DefaultHandlerSchema = z.object({
  bundleId: z.string().min(1, 'bundleId is required'),
  targets: z.array(z.string().min(1)).min(1, 'at least one target is required'),
});

/**
 * Entry of com.apple.symbolichotkeys. IDs and parameter tuples are defined by
 * macOS; `revision` records where the values were captured.
 */
export const SymbolicHotkeySchema = z.object({
  id: z.number().int().nonnegative(),
  enabled: z.boolean(),
  type: z.string().min(1),
  parameters: z.tuple([z.number().int(), z.number().int(), z.number().int()]),
  revision: z.string().min(1),
});

export const DockFolderSchema = z.object({
  path: z.string().min(1, 'path is required'),
  displayAs: z.enum(['grid', 'stack', 'folder']),
});

export const ProfileSchema = z.object({
  git: z.object({
    defaultBranch: z.string().min(1, 'defaultBranch is required'),
  }),
  directories: z.array(z.string().min(1)),
  preferences: z.array(PreferenceSettingSchema),
  appearance: z.object({
    darkMode: z.boolean(),
  }),
  defaultHandlers: z.array(DefaultHandlerSchema),
  hotkeys: z.array(SymbolicHotkeySchema),
  dock: z.object({
    apps: z.array(z.string().min(1)),
    folder: DockFolderSchema,
  }),
  restartProcesses: z.array(z.string().min(1)),
});

/** Shape accepted from a profile file: every section optional. */
export const ProfileOverrideSchema = ProfileSchema.partial().strict();

export type PreferenceSetting = z.infer<typeof PreferenceSettingSchema>;
export type PreferenceType = PreferenceSetting['type'];
export type DefaultHandler = z.infer<typeof DefaultHandlerSchema>;
export type SymbolicHotkey = z.infer<typeof SymbolicHotkeySchema>;
export type DockFolder = z.infer<typeof DockFolderSchema>;
export type Profile = z.infer<typeof ProfileSchema>;
export type ProfileOverride = z.infer<typeof ProfileOverrideSchema>;
