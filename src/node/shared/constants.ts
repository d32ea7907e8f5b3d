/**
 * Node-specific constants for the backend.
 */

/**
 * Remote used when neither the caller nor the config names one.
 */
export const DEFAULT_REMOTE = 'origin'

/**
 * Maximum number of output lines kept in a log entry excerpt.
 */
export const LOG_EXCERPT_MAX_LINES = 20

/**
 * Hard cap on excerpt length, for commands that print very long lines.
 */
export const LOG_EXCERPT_MAX_CHARS = 4000

export const SESSION_FILE_NAME = 'session.json'
export const HISTORY_DIR_NAME = 'history'
export const HISTORY_INDEX_FILE_NAME = 'index.json'
