/**
 * Shared types and interfaces for the addon-sync CLI
 */

// ============================================================================
// Global Options and Context
// ============================================================================

/**
 * Global options available to all commands, as parsed by commander.
 * Settings left undefined fall back to the config file, then defaults.
 */
export interface GlobalOptions {
  addonsRoot?: string;
  feedRoot?: string;
  destRoot?: string;
  /** Raw margin as given on the command line or in the environment */
  spaceMarginBytes?: string;
  acceptedTag?: string;
  /** Path to a YAML config file */
  config?: string;
  logDir?: string;
  /** false when --no-log-file is given */
  logFile: boolean;
  /** Move without a verified free-space figure when the check fails */
  allowUncheckedMove?: boolean;
  /** Output JSON for CI/automation */
  json: boolean;
  /** Enable verbose logging */
  verbose: boolean;
}

/**
 * Output format
 */
export type OutputFormat = 'human' | 'json';

/**
 * Command execution context
 */
export interface CommandContext {
  options: GlobalOptions;
  outputFormat: OutputFormat;
  /** Directory relative paths and the default config file resolve from */
  cwd: string;
}

/**
 * Result of a command execution
 */
export interface CommandResult<T = unknown> {
  success: boolean;
  message: string;
  data?: T;
  errors?: string[];
}
