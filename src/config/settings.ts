/**
 * Run configuration
 *
 * Each setting is resolved from (highest first):
 * 1. Command line flag or its environment variable (merged by commander)
 * 2. YAML config file (--config, or addon-sync.yaml in the working directory)
 * 3. Built-in default
 *
 * Relative paths from the command line resolve against the working directory;
 * relative paths from the config file resolve against the file's directory.
 */

import { existsSync, mkdirSync, readFileSync, statSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import type { SpaceCheckFailurePolicy } from '../reconcilers/relocation/types.js';
import {
  ConfigFileError,
  DestinationRootError,
  InvalidSettingError,
  RootNotFoundError,
} from './errors.js';

// =============================================================================
// Types
// =============================================================================

/**
 * Fully resolved settings for one run
 */
export interface RunConfig {
  addonsRoot: string;
  feedRoot: string;
  destRoot: string;
  spaceMarginBytes: number;
  acceptedTag: string;
  /** Mutate manifests and move directories (false = dry run) */
  apply: boolean;
  /** Directory for the per-run log file, or null for no log file */
  logDir: string | null;
  spaceCheckFailurePolicy: SpaceCheckFailurePolicy;
}

/**
 * Settings accepted in the YAML config file
 */
export interface ConfigFileSettings {
  addonsRoot?: string;
  feedRoot?: string;
  destRoot?: string;
  spaceMarginBytes?: number | string;
  acceptedTag?: string;
  /** false or null disables the log file */
  logDir?: string | false | null;
  allowUncheckedMove?: boolean;
}

/**
 * Values supplied by the caller (CLI flags and environment)
 */
export interface RunConfigInput {
  addonsRoot?: string;
  feedRoot?: string;
  destRoot?: string;
  spaceMarginBytes?: number | string;
  acceptedTag?: string;
  apply?: boolean;
  /** null disables the log file */
  logDir?: string | null;
  allowUncheckedMove?: boolean;
  /** Explicit config file path */
  configPath?: string;
  /** Base for relative paths (default: process.cwd()) */
  cwd?: string;
}

export type SettingSource = 'cli' | 'file' | 'default';

type ResolvedSetting = Exclude<keyof RunConfig, 'apply'>;

/**
 * Resolution result with the provenance of each setting
 */
export interface RunConfigResolution {
  config: RunConfig;
  sources: Record<ResolvedSetting, SettingSource>;
  /** Config file that was read, if any */
  configFile: string | null;
}

// =============================================================================
// Defaults
// =============================================================================

/** Config file picked up from the working directory when present */
export const DEFAULT_CONFIG_FILE = 'addon-sync.yaml';

export const DEFAULT_SPACE_MARGIN_BYTES = 250 * 1024 * 1024;

export const DEFAULT_ACCEPTED_TAG = 'MSFS 2020/2024';

export const DEFAULTS = {
  addonsRoot: 'addons',
  feedRoot: 'feed',
  destRoot: 'relocated',
  spaceMarginBytes: DEFAULT_SPACE_MARGIN_BYTES,
  acceptedTag: DEFAULT_ACCEPTED_TAG,
  logDir: 'logs',
} as const;

const FILE_KEYS: ReadonlyArray<keyof ConfigFileSettings> = [
  'addonsRoot',
  'feedRoot',
  'destRoot',
  'spaceMarginBytes',
  'acceptedTag',
  'logDir',
  'allowUncheckedMove',
];

// =============================================================================
// Config File
// =============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalString(data: Record<string, unknown>, key: string): string | undefined {
  const value = data[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'string') {
    throw new InvalidSettingError(key, value, 'expected a string');
  }
  return value;
}

/**
 * Parse config file text into settings
 *
 * @throws InvalidSettingError for a known key with the wrong type
 */
export function parseConfigFile(content: string, path: string): ConfigFileSettings {
  let data: unknown;
  try {
    data = parseYaml(content);
  } catch (err) {
    throw new ConfigFileError(path, err instanceof Error ? err : undefined);
  }

  if (data === null || data === undefined) return {};
  if (!isRecord(data)) {
    throw new ConfigFileError(path, new Error('top level is not a mapping'));
  }

  const unknownKeys = Object.keys(data).filter((key) => !FILE_KEYS.some((known) => known === key));
  if (unknownKeys.length > 0) {
    throw new ConfigFileError(path, new Error(`unknown setting(s): ${unknownKeys.join(', ')}`));
  }

  const settings: ConfigFileSettings = {
    addonsRoot: optionalString(data, 'addonsRoot'),
    feedRoot: optionalString(data, 'feedRoot'),
    destRoot: optionalString(data, 'destRoot'),
    acceptedTag: optionalString(data, 'acceptedTag'),
  };

  const margin = data.spaceMarginBytes;
  if (typeof margin === 'number' || typeof margin === 'string') {
    settings.spaceMarginBytes = margin;
  } else if (margin !== undefined && margin !== null) {
    throw new InvalidSettingError('spaceMarginBytes', margin, 'expected a number');
  }

  const logDir = data.logDir;
  if (logDir === false || logDir === null) {
    settings.logDir = logDir;
  } else if (logDir !== undefined) {
    settings.logDir = optionalString(data, 'logDir');
  }

  const unchecked = data.allowUncheckedMove;
  if (typeof unchecked === 'boolean') {
    settings.allowUncheckedMove = unchecked;
  } else if (unchecked !== undefined && unchecked !== null) {
    throw new InvalidSettingError('allowUncheckedMove', unchecked, 'expected true or false');
  }

  return settings;
}

/**
 * Read a config file from disk
 */
export function loadConfigFile(path: string): ConfigFileSettings {
  let content: string;
  try {
    content = readFileSync(path, 'utf-8');
  } catch (err) {
    throw new ConfigFileError(path, err instanceof Error ? err : undefined);
  }
  return parseConfigFile(content, path);
}

/**
 * Locate the config file to use, if any
 *
 * An explicit path must exist; the default file is optional.
 */
export function findConfigFile(cwd: string, explicitPath?: string): string | null {
  if (explicitPath) {
    const path = resolve(cwd, explicitPath);
    if (!existsSync(path)) {
      throw new ConfigFileError(path, new Error('file not found'));
    }
    return path;
  }
  const fallback = resolve(cwd, DEFAULT_CONFIG_FILE);
  return existsSync(fallback) ? fallback : null;
}

// =============================================================================
// Resolution
// =============================================================================

/**
 * Parse a byte margin given as a number or a decimal string
 */
export function parseSpaceMargin(value: number | string): number {
  const parsed = typeof value === 'number' ? value : /^\s*\d+\s*$/.test(value) ? Number(value) : Number.NaN;
  if (!Number.isSafeInteger(parsed) || parsed < 0) {
    throw new InvalidSettingError('spaceMarginBytes', value, 'expected a non-negative whole number of bytes');
  }
  return parsed;
}

interface Resolved<T> {
  value: T;
  source: SettingSource;
}

/**
 * Resolve every setting from CLI input, config file and defaults
 */
export function resolveRunConfig(input: RunConfigInput = {}): RunConfigResolution {
  const cwd = input.cwd ?? process.cwd();
  const configFile = findConfigFile(cwd, input.configPath);
  const file = configFile ? loadConfigFile(configFile) : {};
  const fileDir = configFile ? dirname(configFile) : cwd;

  function pathSetting(key: 'addonsRoot' | 'feedRoot' | 'destRoot'): Resolved<string> {
    const cli = input[key];
    if (cli) return { value: resolve(cwd, cli), source: 'cli' };
    const fromFile = file[key];
    if (fromFile) return { value: resolve(fileDir, fromFile), source: 'file' };
    return { value: resolve(cwd, DEFAULTS[key]), source: 'default' };
  }

  function marginSetting(): Resolved<number> {
    if (input.spaceMarginBytes !== undefined && input.spaceMarginBytes !== '') {
      return { value: parseSpaceMargin(input.spaceMarginBytes), source: 'cli' };
    }
    if (file.spaceMarginBytes !== undefined) {
      return { value: parseSpaceMargin(file.spaceMarginBytes), source: 'file' };
    }
    return { value: DEFAULTS.spaceMarginBytes, source: 'default' };
  }

  function tagSetting(): Resolved<string> {
    const resolved: Resolved<string> = input.acceptedTag !== undefined
      ? { value: input.acceptedTag, source: 'cli' }
      : file.acceptedTag !== undefined
        ? { value: file.acceptedTag, source: 'file' }
        : { value: DEFAULTS.acceptedTag, source: 'default' };
    const tag = resolved.value.trim();
    if (!tag) {
      throw new InvalidSettingError('acceptedTag', resolved.value, 'must not be empty');
    }
    return { value: tag, source: resolved.source };
  }

  function logDirSetting(): Resolved<string | null> {
    if (input.logDir !== undefined) {
      return { value: input.logDir === null ? null : resolve(cwd, input.logDir), source: 'cli' };
    }
    if (file.logDir !== undefined) {
      return { value: file.logDir ? resolve(fileDir, file.logDir) : null, source: 'file' };
    }
    return { value: resolve(cwd, DEFAULTS.logDir), source: 'default' };
  }

  function policySetting(): Resolved<SpaceCheckFailurePolicy> {
    if (input.allowUncheckedMove !== undefined) {
      return { value: input.allowUncheckedMove ? 'attempt' : 'skip', source: 'cli' };
    }
    if (file.allowUncheckedMove !== undefined) {
      return { value: file.allowUncheckedMove ? 'attempt' : 'skip', source: 'file' };
    }
    return { value: 'skip', source: 'default' };
  }

  const addonsRoot = pathSetting('addonsRoot');
  const feedRoot = pathSetting('feedRoot');
  const destRoot = pathSetting('destRoot');
  const spaceMarginBytes = marginSetting();
  const acceptedTag = tagSetting();
  const logDir = logDirSetting();
  const policy = policySetting();

  const config: RunConfig = {
    addonsRoot: addonsRoot.value,
    feedRoot: feedRoot.value,
    destRoot: destRoot.value,
    spaceMarginBytes: spaceMarginBytes.value,
    acceptedTag: acceptedTag.value,
    apply: input.apply ?? false,
    logDir: logDir.value,
    spaceCheckFailurePolicy: policy.value,
  };

  const sources: Record<ResolvedSetting, SettingSource> = {
    addonsRoot: addonsRoot.source,
    feedRoot: feedRoot.source,
    destRoot: destRoot.source,
    spaceMarginBytes: spaceMarginBytes.source,
    acceptedTag: acceptedTag.source,
    logDir: logDir.source,
    spaceCheckFailurePolicy: policy.source,
  };

  return { config, sources, configFile };
}

// =============================================================================
// Validation
// =============================================================================

function isDirectory(path: string): boolean {
  try {
    return statSync(path).isDirectory();
  } catch {
    return false;
  }
}

/**
 * Check that the input roots exist before any processing
 *
 * @throws RootNotFoundError
 */
export function validateRunConfig(
  config: Pick<RunConfig, 'addonsRoot' | 'feedRoot'>,
  roots: ReadonlyArray<'addons' | 'feed'> = ['addons', 'feed']
): void {
  if (roots.includes('addons') && !isDirectory(config.addonsRoot)) {
    throw new RootNotFoundError('addons', config.addonsRoot);
  }
  if (roots.includes('feed') && !isDirectory(config.feedRoot)) {
    throw new RootNotFoundError('feed', config.feedRoot);
  }
}

/**
 * Create the destination root for an apply run
 *
 * Dry runs never create it.
 *
 * @throws DestinationRootError
 */
export function ensureDestinationRoot(config: RunConfig): void {
  if (!config.apply || isDirectory(config.destRoot)) return;
  try {
    mkdirSync(config.destRoot, { recursive: true });
  } catch (err) {
    throw new DestinationRootError(config.destRoot, err instanceof Error ? err : undefined);
  }
}
