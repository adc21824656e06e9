/**
 * colwrap - comment reflow for the terminal
 *
 * Utility exports
 */

// Config
export {
  loadConfig,
  saveConfig,
  getSetting,
  setSetting,
  configFromEnv,
  resolveSettings,
  SETTINGS_FILE,
  DEFAULT_SETTINGS,
} from './config.js';
export type { Config, EditorSettings } from './config.js';

// CLI arguments
export { parseCliArgs, USAGE } from './args.js';
export type { ParsedArgs } from './args.js';

// Logging
export { logger } from './logger.js';
export type { LogEntry, LogLevel } from './logger.js';

// Input Utilities
export {
  findPrevWordStart,
  findNextWordEnd,
  getLineAndColumn,
  getCursorPosition,
  getLineStart,
  getLineEnd,
  getLineCount,
  cursorHandlers,
} from './input-utils.js';
export type { CursorContext } from './input-utils.js';
