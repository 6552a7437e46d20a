/**
 * Configuration module exports
 */

export {
  resolveRunConfig,
  validateRunConfig,
  ensureDestinationRoot,
  loadConfigFile,
  parseConfigFile,
  findConfigFile,
  parseSpaceMargin,
  DEFAULTS,
  DEFAULT_CONFIG_FILE,
  DEFAULT_SPACE_MARGIN_BYTES,
  DEFAULT_ACCEPTED_TAG,
  type RunConfig,
  type RunConfigInput,
  type RunConfigResolution,
  type ConfigFileSettings,
  type SettingSource,
} from './settings.js';

export {
  ConfigError,
  RootNotFoundError,
  DestinationRootError,
  InvalidSettingError,
  ConfigFileError,
  isConfigError,
  formatError,
} from './errors.js';
