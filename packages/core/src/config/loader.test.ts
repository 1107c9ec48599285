import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { loadConfig, applyThresholdOverrides, CONFIG_FILENAME } from './loader.js';
import { defaultConfig } from './schema.js';
import { ConfigError } from '../errors/index.js';

describe('Config Loader', () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = await fs.mkdtemp(path.join(os.tmpdir(), 'tangle-config-'));
  });

  afterEach(async () => {
    await fs.rm(testDir, { recursive: true, force: true });
  });

  describe('loadConfig', () => {
    it('should return default config when no config file exists', () => {
      expect(loadConfig(testDir)).toEqual({
        thresholds: { cyclomaticLimit: 10, cognitiveLimit: 15, nestingLimit: 3, lineLimit: 50 },
        exclude: [],
        concurrency: 8,
      });
    });

    it('should merge a partial config file with defaults', async () => {
      await fs.writeFile(
        path.join(testDir, CONFIG_FILENAME),
        'thresholds:\n  cyclomatic: 5\nexclude:\n  - "**/*.test.ts"\n'
      );

      const config = loadConfig(testDir);

      expect(config.thresholds).toEqual({
        cyclomaticLimit: 5,
        cognitiveLimit: 15,
        nestingLimit: 3,
        lineLimit: 50,
      });
      expect(config.exclude).toEqual(['**/*.test.ts']);
      expect(config.concurrency).toBe(8);
    });

    it('should treat an empty file as defaults', async () => {
      await fs.writeFile(path.join(testDir, CONFIG_FILENAME), '');

      expect(loadConfig(testDir)).toEqual(defaultConfig());
    });

    it('should load an explicit config path', async () => {
      await fs.writeFile(path.join(testDir, 'strict.yml'), 'thresholds: { nesting: 2 }\n');

      expect(loadConfig(testDir, 'strict.yml').thresholds.nestingLimit).toBe(2);
    });

    it('should reject a missing explicit config path', () => {
      expect(() => loadConfig(testDir, 'missing.yml')).toThrow(ConfigError);
    });

    it('should reject thresholds that are not positive integers', async () => {
      await fs.writeFile(path.join(testDir, CONFIG_FILENAME), 'thresholds:\n  cognitive: 0\n');

      expect(() => loadConfig(testDir)).toThrow(ConfigError);
      expect(() => loadConfig(testDir)).toThrow(/thresholds\.cognitive/);
    });

    it('should reject unknown keys', async () => {
      await fs.writeFile(path.join(testDir, CONFIG_FILENAME), 'threshold: 3\n');

      expect(() => loadConfig(testDir)).toThrow(ConfigError);
    });

    it('should reject malformed YAML', async () => {
      await fs.writeFile(path.join(testDir, CONFIG_FILENAME), 'thresholds: [1, 2\n');

      expect(() => loadConfig(testDir)).toThrow(/Failed to parse/);
    });
  });

  describe('applyThresholdOverrides', () => {
    it('should let flags win over the config file', () => {
      const config = applyThresholdOverrides(defaultConfig(), { cyclomaticLimit: 4, lineLimit: 80 });

      expect(config.thresholds).toEqual({
        cyclomaticLimit: 4,
        cognitiveLimit: 15,
        nestingLimit: 3,
        lineLimit: 80,
      });
    });

    it('should not modify the input config', () => {
      const base = defaultConfig();
      applyThresholdOverrides(base, { nestingLimit: 1 });

      expect(base.thresholds.nestingLimit).toBe(3);
    });

    it.each([0, -2, 1.5, Number.NaN])('should reject %s as a limit', value => {
      expect(() => applyThresholdOverrides(defaultConfig(), { cognitiveLimit: value })).toThrow(
        '--cognitive-limit must be a positive integer'
      );
    });
  });
});
