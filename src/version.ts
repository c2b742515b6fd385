/**
 * Release version, printed by --version and stored with every journaled run.
 */
export const VERSION = '1.0.0';
