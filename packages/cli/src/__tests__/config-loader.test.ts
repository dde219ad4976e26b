import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { ConfigError } from '@querylens/core';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import {
  CONFIG_FILE,
  findConfigFile,
  loadConfig,
  loadProjectConfig,
  mergeConfig,
  validateConfig,
} from '../config/loader.js';

describe('config loader', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'querylens-config-'));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  function writeConfig(dir: string, content: string): string {
    const file = path.join(dir, CONFIG_FILE);
    fs.writeFileSync(file, content);
    return file;
  }

  describe('findConfigFile', () => {
    it('should find the file in a parent directory', () => {
      const file = writeConfig(tmpDir, '{}');
      const nested = path.join(tmpDir, 'a', 'b');
      fs.mkdirSync(nested, { recursive: true });

      expect(findConfigFile(nested)).toBe(file);
    });

    it('should prefer the nearest file', () => {
      writeConfig(tmpDir, '{}');
      const nested = path.join(tmpDir, 'app');
      fs.mkdirSync(nested);
      const nearest = writeConfig(nested, '{}');

      expect(findConfigFile(nested)).toBe(nearest);
    });
  });

  describe('loadConfig', () => {
    it('should load a valid file', () => {
      const file = writeConfig(tmpDir, JSON.stringify({ offsetThreshold: 500, format: 'json' }));

      expect(loadConfig(file)).toEqual({ offsetThreshold: 500, format: 'json' });
    });

    it('should reject unknown keys and bad values', () => {
      const file = writeConfig(tmpDir, JSON.stringify({ offsetTreshold: 500, minRunLength: 1 }));

      let caught: unknown;
      try {
        loadConfig(file);
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(ConfigError);
      if (!(caught instanceof ConfigError)) return;
      expect(caught.code).toBe('QLENS_C200');
      expect(caught.issues).toHaveLength(2);
      expect(caught.context).toMatchObject({ path: file });
    });

    it('should report unreadable JSON with its cause', () => {
      const file = writeConfig(tmpDir, '{ not json');

      try {
        loadConfig(file);
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(ConfigError);
        expect(error).toMatchObject({ code: 'QLENS_C201' });
      }
    });
  });

  describe('loadProjectConfig', () => {
    it('should return null without a config file', () => {
      const isolated = path.join(tmpDir, 'none');
      fs.mkdirSync(isolated);

      expect(loadProjectConfig(isolated)).toBeNull();
    });

    it('should load the discovered file', () => {
      writeConfig(tmpDir, JSON.stringify({ topShapes: 3 }));

      expect(loadProjectConfig(tmpDir)).toEqual({ topShapes: 3 });
    });
  });

  describe('mergeConfig', () => {
    it('should apply layers over the defaults', () => {
      expect(mergeConfig({ offsetThreshold: 500, format: 'json' }, { offsetThreshold: 200 })).toEqual({
        format: 'json',
        failOnFindings: false,
        offsetThreshold: 200,
      });
    });

    it('should ignore missing layers and undefined values', () => {
      expect(mergeConfig(null, undefined, { format: undefined })).toEqual({
        format: 'text',
        failOnFindings: false,
      });
    });
  });

  describe('validateConfig', () => {
    it('should accept an empty object', () => {
      expect(validateConfig({})).toEqual({});
    });

    it('should leave advisor defaults out of the result', () => {
      expect(validateConfig({ minRunLength: 3 })).toEqual({ minRunLength: 3 });
    });

    it('should apply the advisor ranges', () => {
      expect(() => validateConfig({ maxErrors: -1 })).toThrow(/^Invalid configuration: maxErrors: /);
      expect(() => validateConfig({ fullScanRowThreshold: 0 })).toThrow(ConfigError);
    });

    it('should reject unknown pattern kinds', () => {
      expect(() => validateConfig({ enabledKinds: ['cartesian_join'] })).toThrow(ConfigError);
    });
  });
});
