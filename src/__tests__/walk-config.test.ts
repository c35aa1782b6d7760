/**
 * Tests for walk config loading and merging
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, mkdirSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import {
  getDefaultWalkConfig,
  loadWalkConfig,
  mergeWalkConfig,
  parseWalkConfig,
  resolveConfigPath,
} from '../infra/config/index.js';
import { ConfigLoadError } from '../shared/errors.js';

describe('getDefaultWalkConfig', () => {
  it('should describe a 100x100 walk of 100 steps', () => {
    expect(getDefaultWalkConfig()).toEqual({
      width: 100,
      height: 100,
      steps: 100,
      maxAttempts: 1000,
      progress: 'summary',
      progressEvery: 10,
      render: 'path',
      logLevel: 'info',
    });
  });
});

describe('parseWalkConfig', () => {
  it('should convert snake_case keys', () => {
    const config = parseWalkConfig(
      {
        max_attempts: 5,
        progress_every: 3,
        log_level: 'debug',
        debug: { enabled: true, log_file: 'walk.log' },
      },
      'gridwalk.yaml',
    );

    expect(config.maxAttempts).toBe(5);
    expect(config.progressEvery).toBe(3);
    expect(config.logLevel).toBe('debug');
    expect(config.debug).toEqual({ enabled: true, logFile: 'walk.log' });
  });

  it('should treat null content as an empty file', () => {
    expect(parseWalkConfig(null, 'gridwalk.yaml')).toEqual(getDefaultWalkConfig());
  });

  it('should list every invalid field with its path', () => {
    let thrown: unknown;
    try {
      parseWalkConfig({ width: 0, start: { x: -1, y: 0 } }, 'bad.yaml');
    } catch (e) {
      thrown = e;
    }

    expect(thrown).toBeInstanceOf(ConfigLoadError);
    expect(thrown).toMatchObject({ filePath: 'bad.yaml', code: 'CONFIG_LOAD_FAILED' });
    const issues = thrown instanceof ConfigLoadError ? thrown.issues : [];
    expect(issues).toHaveLength(2);
    expect(issues[0]?.startsWith('width: ')).toBe(true);
    expect(issues[1]?.startsWith('start.x: ')).toBe(true);
  });

  it('should report root-level type errors', () => {
    expect(() => parseWalkConfig('just a string', 'bad.yaml')).toThrow(/\(root\): /);
  });
});

describe('config files', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'gridwalk-test-config-'));
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  it('should fall back to defaults when no config file exists', () => {
    expect(resolveConfigPath(tempDir)).toBeUndefined();
    expect(loadWalkConfig(tempDir)).toEqual(getDefaultWalkConfig());
  });

  it('should load gridwalk.yaml from the working directory', () => {
    writeFileSync(join(tempDir, 'gridwalk.yaml'), 'width: 12\nheight: 8\nseed: demo\n');

    const config = loadWalkConfig(tempDir);

    expect(config.width).toBe(12);
    expect(config.height).toBe(8);
    expect(config.seed).toBe('demo');
    expect(config.steps).toBe(100);
  });

  it('should prefer gridwalk.yaml over .gridwalk/config.yaml', () => {
    mkdirSync(join(tempDir, '.gridwalk'));
    writeFileSync(join(tempDir, '.gridwalk', 'config.yaml'), 'width: 30\n');
    writeFileSync(join(tempDir, 'gridwalk.yaml'), 'width: 40\n');

    expect(loadWalkConfig(tempDir).width).toBe(40);
  });

  it('should use .gridwalk/config.yaml when it is the only file', () => {
    mkdirSync(join(tempDir, '.gridwalk'));
    writeFileSync(join(tempDir, '.gridwalk', 'config.yaml'), 'width: 30\n');

    expect(resolveConfigPath(tempDir)).toBe(join(tempDir, '.gridwalk', 'config.yaml'));
    expect(loadWalkConfig(tempDir).width).toBe(30);
  });

  it('should load an explicit path relative to the working directory', () => {
    mkdirSync(join(tempDir, 'walks'));
    writeFileSync(join(tempDir, 'walks', 'narrow.yaml'), 'width: 1\nheight: 50\n');

    const config = loadWalkConfig(tempDir, 'walks/narrow.yaml');

    expect(config.width).toBe(1);
    expect(config.height).toBe(50);
  });

  it('should fail when an explicit path does not exist', () => {
    expect(() => loadWalkConfig(tempDir, 'missing.yaml')).toThrow(
      `Invalid config file ${join(tempDir, 'missing.yaml')}:\n  - file not found`,
    );
  });

  it('should wrap YAML syntax errors', () => {
    writeFileSync(join(tempDir, 'gridwalk.yaml'), 'width: [1, 2\n');

    expect(() => loadWalkConfig(tempDir)).toThrow(ConfigLoadError);
  });

  it('should reject invalid values from the file', () => {
    writeFileSync(join(tempDir, 'gridwalk.yaml'), 'progress: loud\n');

    expect(() => loadWalkConfig(tempDir)).toThrow(/progress: /);
  });
});

describe('mergeWalkConfig', () => {
  it('should apply defined overrides only', () => {
    const base = { ...getDefaultWalkConfig(), seed: 'base', debug: { enabled: true } };

    const merged = mergeWalkConfig(base, {
      width: 9,
      steps: undefined,
      start: { x: 1, y: 2 },
      progress: 'silent',
    });

    expect(merged).toEqual({
      ...base,
      width: 9,
      start: { x: 1, y: 2 },
      progress: 'silent',
    });
  });

  it('should keep the loaded debug settings', () => {
    const base = { ...getDefaultWalkConfig(), debug: { enabled: true, logFile: 'x.log' } };

    expect(mergeWalkConfig(base, {}).debug).toEqual({ enabled: true, logFile: 'x.log' });
  });
});
