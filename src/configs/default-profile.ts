/**
 * Built-in profile: the developer workstation this tool was written for.
 *
 * Paths may start with `~/`; they are expanded against the home directory
 * when the profile is resolved.
 */

import { SYMBOLIC_HOTKEY_160 } from './hotkeys';
import type { Profile } from './schema';

export const SCREENSHOTS_DIR = '~/Screenshots';
export const DEVELOPMENT_DIR = '~/Development';

export const DEFAULT_PROFILE: Profile = {
  git: {
    defaultBranch: 'main',
  },

  directories: [SCREENSHOTS_DIR],

  preferences: [
    // Finder
    { domain: 'com.apple.finder', key: 'ShowPathbar', type: 'bool', value: true },
    { domain: 'NSGlobalDomain', key: 'AppleShowAllExtensions', type: 'bool', value: true },
    { domain: 'com.apple.finder', key: '_FXSortFoldersFirst', type: 'bool', value: true },

    { domain: 'com.apple.screencapture', key: 'location', type: 'string', value: SCREENSHOTS_DIR },

    // Smart punctuation breaks code pasted into editors
    { domain: 'NSGlobalDomain', key: 'NSAutomaticQuoteSubstitutionEnabled', type: 'bool', value: false },
    { domain: 'NSGlobalDomain', key: 'NSAutomaticDashSubstitutionEnabled', type: 'bool', value: false },

    { domain: 'com.apple.TextEdit', key: 'RichText', type: 'int', value: 0, description: 'plain text by default' },

    // Activity Monitor
    { domain: 'com.apple.ActivityMonitor', key: 'OpenMainWindow', type: 'bool', value: true },
    { domain: 'com.apple.ActivityMonitor', key: 'IconType', type: 'int', value: 5, description: 'CPU usage in the Dock icon' },
    { domain: 'com.apple.ActivityMonitor', key: 'ShowCategory', type: 'int', value: 0, description: 'all processes' },

    // Trackpad: tap to click
    { domain: 'com.apple.AppleMultitouchTrackpad', key: 'Clicking', type: 'bool', value: true },
    { domain: 'NSGlobalDomain', key: 'com.apple.mouse.tapBehavior', type: 'int', value: 1, currentHost: true },

    { domain: 'NSGlobalDomain', key: 'AppleAccentColor', type: 'int', value: -2 },

    // Menu bar clock
    { domain: 'com.apple.menuextra.clock', key: 'FlashDateSeparators', type: 'bool', value: true },
    { domain: 'com.apple.menuextra.clock', key: 'ShowDate', type: 'int', value: 2 },

    // Dock & Mission Control
    { domain: 'com.apple.dock', key: 'mru-spaces', type: 'bool', value: false },
    { domain: 'com.apple.dock', key: 'show-recents', type: 'bool', value: false },
    { domain: 'com.apple.dock', key: 'tilesize', type: 'int', value: 64 },
    { domain: 'com.apple.dock', key: 'magnification', type: 'bool', value: true },
    { domain: 'com.apple.dock', key: 'largesize', type: 'int', value: 32 },
    { domain: 'com.apple.dock', key: 'autohide', type: 'bool', value: true },
  ],

  appearance: {
    darkMode: true,
  },

  defaultHandlers: [
    { bundleId: 'com.brave.Browser', targets: ['http', 'https', 'html'] },
  ],

  hotkeys: [SYMBOLIC_HOTKEY_160],

  dock: {
    apps: [
      '/Applications/Brave Browser.app',
      '/Applications/Visual Studio Code.app',
      '/Applications/Warp.app',
      '/Applications/Fork.app',
      '/Applications/Notion.app',
    ],
    folder: { path: DEVELOPMENT_DIR, displayAs: 'grid' },
  },

  restartProcesses: ['Finder', 'Dock', 'SystemUIServer', 'TextEdit', 'Activity Monitor'],
};
