/**
 * Unit Tests: Run Configuration
 *
 * Tests the resolution chain (CLI, config file, defaults), config file
 * validation and the fatal root checks.
 *
 * @see src/config/settings.ts
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync, mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  DEFAULT_SPACE_MARGIN_BYTES,
  ensureDestinationRoot,
  parseConfigFile,
  parseSpaceMargin,
  resolveRunConfig,
  validateRunConfig,
  type RunConfig,
} from '../../src/config/settings.js';
import {
  ConfigFileError,
  DestinationRootError,
  InvalidSettingError,
  RootNotFoundError,
  formatError,
} from '../../src/config/errors.js';

let cwd: string;

beforeEach(() => {
  cwd = mkdtempSync(join(tmpdir(), 'addon-sync-config-'));
});

afterEach(() => {
  rmSync(cwd, { recursive: true, force: true });
});

function createConfig(overrides: Partial<RunConfig> = {}): RunConfig {
  return {
    addonsRoot: join(cwd, 'addons'),
    feedRoot: join(cwd, 'feed'),
    destRoot: join(cwd, 'relocated'),
    spaceMarginBytes: 0,
    acceptedTag: 'MSFS 2020/2024',
    apply: false,
    logDir: null,
    spaceCheckFailurePolicy: 'skip',
    ...overrides,
  };
}

// =============================================================================
// resolveRunConfig Tests
// =============================================================================

describe('resolveRunConfig', () => {
  it('should fall back to defaults relative to the working directory', () => {
    const { config, sources, configFile } = resolveRunConfig({ cwd });

    expect(configFile).toBeNull();
    expect(config).toEqual({
      addonsRoot: join(cwd, 'addons'),
      feedRoot: join(cwd, 'feed'),
      destRoot: join(cwd, 'relocated'),
      spaceMarginBytes: DEFAULT_SPACE_MARGIN_BYTES,
      acceptedTag: 'MSFS 2020/2024',
      apply: false,
      logDir: join(cwd, 'logs'),
      spaceCheckFailurePolicy: 'skip',
    });
    expect(Object.values(sources).every((source) => source === 'default')).toBe(true);
  });

  it('should use a 250 MiB default margin', () => {
    expect(DEFAULT_SPACE_MARGIN_BYTES).toBe(262144000);
  });

  it('should read addon-sync.yaml from the working directory', () => {
    writeFileSync(
      join(cwd, 'addon-sync.yaml'),
      [
        'addonsRoot: /mnt/sim/Community',
        'feedRoot: catalog',
        'spaceMarginBytes: 1024',
        'logDir: false',
        'allowUncheckedMove: true',
      ].join('\n')
    );

    const { config, sources, configFile } = resolveRunConfig({ cwd });

    expect(configFile).toBe(join(cwd, 'addon-sync.yaml'));
    expect(config.addonsRoot).toBe('/mnt/sim/Community');
    expect(config.feedRoot).toBe(join(cwd, 'catalog'));
    expect(config.spaceMarginBytes).toBe(1024);
    expect(config.logDir).toBeNull();
    expect(config.spaceCheckFailurePolicy).toBe('attempt');
    expect(sources.addonsRoot).toBe('file');
    expect(sources.destRoot).toBe('default');
  });

  it('should let CLI values override the config file', () => {
    writeFileSync(join(cwd, 'addon-sync.yaml'), 'addonsRoot: from-file\nacceptedTag: File Tag\n');

    const { config, sources } = resolveRunConfig({
      cwd,
      addonsRoot: 'from-cli',
      acceptedTag: ' CLI Tag ',
      spaceMarginBytes: '2048',
      logDir: null,
      allowUncheckedMove: false,
      apply: true,
    });

    expect(config.addonsRoot).toBe(join(cwd, 'from-cli'));
    expect(config.acceptedTag).toBe('CLI Tag');
    expect(config.spaceMarginBytes).toBe(2048);
    expect(config.logDir).toBeNull();
    expect(config.apply).toBe(true);
    expect(sources.addonsRoot).toBe('cli');
    expect(sources.acceptedTag).toBe('cli');
  });

  it('should resolve config file paths against the file directory', () => {
    mkdirSync(join(cwd, 'etc'));
    writeFileSync(join(cwd, 'etc', 'sync.yaml'), 'destRoot: ../moved\nlogDir: logs\n');

    const { config, configFile } = resolveRunConfig({ cwd, configPath: 'etc/sync.yaml' });

    expect(configFile).toBe(join(cwd, 'etc', 'sync.yaml'));
    expect(config.destRoot).toBe(join(cwd, 'moved'));
    expect(config.logDir).toBe(join(cwd, 'etc', 'logs'));
  });

  it('should fail when an explicit config file is missing', () => {
    expect(() => resolveRunConfig({ cwd, configPath: 'missing.yaml' })).toThrow(ConfigFileError);
  });

  it('should reject an empty accepted tag', () => {
    expect(() => resolveRunConfig({ cwd, acceptedTag: '   ' })).toThrow(InvalidSettingError);
  });

  it('should reject an invalid margin', () => {
    expect(() => resolveRunConfig({ cwd, spaceMarginBytes: '10MB' })).toThrow(InvalidSettingError);
  });
});

// =============================================================================
// Config File Tests
// =============================================================================

describe('parseConfigFile', () => {
  it('should treat an empty file as no settings', () => {
    expect(parseConfigFile('', 'a.yaml')).toEqual({});
  });

  it('should reject malformed YAML', () => {
    expect(() => parseConfigFile('addonsRoot: [unclosed', 'a.yaml')).toThrow(ConfigFileError);
  });

  it('should reject a top level that is not a mapping', () => {
    expect(() => parseConfigFile('- one\n- two\n', 'a.yaml')).toThrow(
      'Failed to load config file a.yaml: top level is not a mapping'
    );
  });

  it('should reject unknown settings', () => {
    expect(() => parseConfigFile('addonRoot: x\n', 'a.yaml')).toThrow(
      'Failed to load config file a.yaml: unknown setting(s): addonRoot'
    );
  });

  it('should reject a setting of the wrong type', () => {
    expect(() => parseConfigFile('addonsRoot: 42\n', 'a.yaml')).toThrow(InvalidSettingError);
    expect(() => parseConfigFile('allowUncheckedMove: maybe\n', 'a.yaml')).toThrow(InvalidSettingError);
  });
});

describe('parseSpaceMargin', () => {
  it('should accept whole numbers of bytes', () => {
    expect(parseSpaceMargin('1024')).toBe(1024);
    expect(parseSpaceMargin(' 10 ')).toBe(10);
    expect(parseSpaceMargin(0)).toBe(0);
  });

  it('should reject negative, fractional and non-numeric values', () => {
    expect(() => parseSpaceMargin('-1')).toThrow(InvalidSettingError);
    expect(() => parseSpaceMargin('1.5')).toThrow(InvalidSettingError);
    expect(() => parseSpaceMargin(1.5)).toThrow(InvalidSettingError);
    expect(() => parseSpaceMargin(-3)).toThrow(InvalidSettingError);
    expect(() => parseSpaceMargin('')).toThrow(InvalidSettingError);
  });
});

// =============================================================================
// Validation Tests
// =============================================================================

describe('validateRunConfig', () => {
  it('should pass when both roots exist', () => {
    mkdirSync(join(cwd, 'addons'));
    mkdirSync(join(cwd, 'feed'));
    expect(() => validateRunConfig(createConfig())).not.toThrow();
  });

  it('should fail on a missing addons root', () => {
    mkdirSync(join(cwd, 'feed'));
    expect(() => validateRunConfig(createConfig())).toThrow(RootNotFoundError);
  });

  it('should fail on a feed root that is a file', () => {
    mkdirSync(join(cwd, 'addons'));
    writeFileSync(join(cwd, 'feed'), '');
    expect(() => validateRunConfig(createConfig())).toThrow(`Feed root not found: ${join(cwd, 'feed')}`);
  });

  it('should check only the requested roots', () => {
    mkdirSync(join(cwd, 'feed'));
    expect(() => validateRunConfig(createConfig(), ['feed'])).not.toThrow();
  });

  it('should format a suggestion for the user', () => {
    const err = new RootNotFoundError('addons', '/nowhere');
    expect(formatError(err)).toBe(
      'Error: Addons root not found: /nowhere\n\nSuggestion: Check the path or pass --addons-root <dir>'
    );
  });
});

describe('ensureDestinationRoot', () => {
  it('should not create the destination in a dry run', () => {
    ensureDestinationRoot(createConfig());
    expect(existsSync(join(cwd, 'relocated'))).toBe(false);
  });

  it('should create the destination in apply mode', () => {
    ensureDestinationRoot(createConfig({ apply: true, destRoot: join(cwd, 'deep', 'relocated') }));
    expect(existsSync(join(cwd, 'deep', 'relocated'))).toBe(true);
  });

  it('should fail when the destination cannot be created', () => {
    writeFileSync(join(cwd, 'blocker'), '');
    expect(() => ensureDestinationRoot(createConfig({ apply: true, destRoot: join(cwd, 'blocker', 'relocated') }))).toThrow(
      DestinationRootError
    );
  });
});
