/**
 * Centralized constants for the dump converter
 *
 * This file contains magic numbers and configuration defaults that are
 * shared across multiple modules. Import from here to ensure consistency.
 */

// ============================================================================
// Scanning
// ============================================================================

/**
 * Longest `INSERT INTO ... VALUES` header accepted, in characters.
 * Headers with an explicit column list for the widest table stay well under.
 */
export const DEFAULT_MAX_HEADER_LENGTH = 64 * 1024;

// ============================================================================
// Progress Reporting
// ============================================================================

/** Default number of parsed rows between progress reports */
export const DEFAULT_PROGRESS_INTERVAL = 500_000;

// ============================================================================
// Output
// ============================================================================

/** Line terminator for CSV output */
export const CSV_LINE_TERMINATOR = '\n';

/** Extension appended to the dump basename for the default output path */
export const CSV_EXTENSION = '.csv';

// ============================================================================
// Configuration
// ============================================================================

/** Name of the JSON configuration file looked up in cwd and home */
export const CONFIG_FILE_NAME = '.wikisqlrc';
