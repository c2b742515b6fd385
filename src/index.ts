/**
 * workstation-setup
 *
 * Idempotent post-install configuration for a developer Mac.
 *
 * This package provides:
 * - The setup run (runSetup) and its step services
 * - Profile schema, built-in profile and loader
 * - The hash-chained run journal
 *
 * Usage:
 *   import { runSetup, DEFAULT_PROFILE } from 'workstation-setup';
 */

export { VERSION } from './version';

export { runSetup, printSummary, formatResultLine, type SetupContext } from './setup';

export { resolvePaths, expandHome, type SetupPaths } from './config';

// Profile
export { DEFAULT_PROFILE } from './configs/default-profile';
export { SYMBOLIC_HOTKEY_160 } from './configs/hotkeys';
export { loadProfile, resolveProfile, ProfileError } from './configs/load';
export {
  ProfileSchema,
  ProfileOverrideSchema,
  type Profile,
  type ProfileOverride,
  type PreferenceSetting,
  type PreferenceType,
  type DefaultHandler,
  type SymbolicHotkey,
  type DockFolder,
} from './configs/schema';

// Services
export {
  DefaultsStore,
  applyPreference,
  applyPreferences,
  applyDarkMode,
  matchesStored,
  type PreferenceStore,
  type StoredValue,
  type PreferenceLocation,
} from './services/preferences.service';
export { configureGit, readGlobalConfig } from './services/git.service';
export { ensureSshKey, computeSshFingerprint, readPublicKey } from './services/ssh.service';
export { registerDefaultHandlers, encodeSymbolicHotkey, applySymbolicHotkeys } from './services/handlers.service';
export { planDock, reconcileDock, type DockItem, type DockPlan } from './services/dock.service';
export { restartProcesses } from './services/restart.service';
export { SudoSession } from './services/privilege.service';

// Journal
export { openJournalDatabase } from './database';
export {
  startRun,
  recordStep,
  finishRun,
  abortRun,
  withJournaledRun,
  listRuns,
  getRunEntries,
  verifyJournalIntegrity,
  type RunOverview,
  type IntegrityResult,
} from './services/journal.service';

// Shared
export { SystemRunner, type CommandRunner, type CommandResult } from './services/shared/exec';
export type { Prompter } from './services/shared/prompt';
export type { StepResult, StepStatus, RunSummary } from './services/shared/results';
