/**
 * Environment Configuration Tests
 *
 * Tests for the Zod-based environment variable validation and the frozen
 * config built from it.
 */

import {
  DEFAULT_START_HOLE_ENV,
  parseEnv,
  getEffectiveNodeEnv,
  type RawEnv,
} from '../../src/cli/config/env';
import { DEFAULT_START_HOLE } from '../../src/shared/engine/boardState';
import { loadConfig } from '../../src/cli/config';
import { ConfigurationError } from '../../src/cli/errors';

function parseValid(env: Record<string, string | undefined>): RawEnv {
  const result = parseEnv(env);
  if (!result.success) {
    throw new Error(`unexpected validation failure: ${JSON.stringify(result.errors)}`);
  }
  return result.data;
}

function errorPaths(env: Record<string, string | undefined>): string[] {
  const result = parseEnv(env);
  return result.success ? [] : result.errors.map((e) => e.path);
}

describe('EnvSchema', () => {
  it('should apply defaults to an empty environment', () => {
    expect(parseValid({})).toEqual({
      NODE_ENV: 'development',
      LOG_FORMAT: 'pretty',
      PEG_START_HOLE: { row: 3, position: 2 },
      PEG_FRAME_DELAY_MS: 1000,
    });
  });

  describe('NODE_ENV validation', () => {
    it('should accept valid NODE_ENV values', () => {
      for (const nodeEnv of ['development', 'production', 'test']) {
        expect(parseValid({ NODE_ENV: nodeEnv }).NODE_ENV).toBe(nodeEnv);
      }
    });

    it('should reject invalid NODE_ENV values', () => {
      expect(errorPaths({ NODE_ENV: 'staging' })).toEqual(['NODE_ENV']);
    });
  });

  describe('logging', () => {
    it('should accept known levels and formats', () => {
      const env = parseValid({ LOG_LEVEL: 'debug', LOG_FORMAT: 'json' });
      expect(env.LOG_LEVEL).toBe('debug');
      expect(env.LOG_FORMAT).toBe('json');
    });

    it('should reject unknown levels and formats', () => {
      expect(errorPaths({ LOG_LEVEL: 'verbose', LOG_FORMAT: 'xml' })).toEqual([
        'LOG_LEVEL',
        'LOG_FORMAT',
      ]);
    });
  });

  describe('PEG_START_HOLE', () => {
    it("should default to the engine's default starting hole", () => {
      expect(DEFAULT_START_HOLE_ENV).toBe('3,2');
      expect(parseValid({}).PEG_START_HOLE).toEqual(DEFAULT_START_HOLE);
    });

    it('should parse row,position with surrounding whitespace', () => {
      expect(parseValid({ PEG_START_HOLE: ' 1 , 1 ' }).PEG_START_HOLE).toEqual({
        row: 1,
        position: 1,
      });
      expect(parseValid({ PEG_START_HOLE: '5,5' }).PEG_START_HOLE).toEqual({
        row: 5,
        position: 5,
      });
    });

    it('should reject text that is not row,position', () => {
      const result = parseEnv({ PEG_START_HOLE: 'apex' });
      expect(result).toEqual({
        success: false,
        errors: [
          { path: 'PEG_START_HOLE', message: 'Expected row,position (for example 3,2)' },
        ],
      });
    });

    it('should reject positions outside the triangle', () => {
      for (const hole of ['0,1', '6,1', '2,3']) {
        expect(parseEnv({ PEG_START_HOLE: hole })).toEqual({
          success: false,
          errors: [{ path: 'PEG_START_HOLE', message: 'Position is outside the 5-row triangle' }],
        });
      }
    });
  });

  describe('PEG_FRAME_DELAY_MS', () => {
    it('should coerce numeric strings', () => {
      expect(parseValid({ PEG_FRAME_DELAY_MS: '250' }).PEG_FRAME_DELAY_MS).toBe(250);
      expect(parseValid({ PEG_FRAME_DELAY_MS: '0' }).PEG_FRAME_DELAY_MS).toBe(0);
    });

    it('should reject negative, fractional and oversized delays', () => {
      expect(errorPaths({ PEG_FRAME_DELAY_MS: '-5' })).toEqual(['PEG_FRAME_DELAY_MS']);
      expect(errorPaths({ PEG_FRAME_DELAY_MS: '1.5' })).toEqual(['PEG_FRAME_DELAY_MS']);
      expect(errorPaths({ PEG_FRAME_DELAY_MS: '60001' })).toEqual(['PEG_FRAME_DELAY_MS']);
    });
  });
});

describe('getEffectiveNodeEnv', () => {
  it('should report test inside Jest whatever NODE_ENV says', () => {
    expect(getEffectiveNodeEnv(parseValid({ NODE_ENV: 'production' }))).toBe('test');
  });
});

describe('loadConfig', () => {
  it('should build a frozen config with test defaults', () => {
    const config = loadConfig({});
    expect(config).toEqual({
      nodeEnv: 'test',
      isProduction: false,
      isTest: true,
      isDevelopment: false,
      logging: { level: 'error', format: 'pretty' },
      search: { startHole: { row: 3, position: 2 } },
      display: { frameDelayMs: 1000 },
    });
    expect(Object.isFrozen(config)).toBe(true);
  });

  it('should honour an explicit log level and start hole', () => {
    const config = loadConfig({ LOG_LEVEL: 'debug', PEG_START_HOLE: '1,1' });
    expect(config.logging.level).toBe('debug');
    expect(config.search.startHole).toEqual({ row: 1, position: 1 });
  });

  it('should throw ConfigurationError listing every invalid variable', () => {
    try {
      loadConfig({ PEG_START_HOLE: '9,9', PEG_FRAME_DELAY_MS: 'soon' });
      throw new Error('expected loadConfig to throw');
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigurationError);
      if (!(error instanceof ConfigurationError)) return;
      expect(error.exitCode).toBe(78);
      expect(error.issues.map((issue) => issue.path)).toEqual([
        'PEG_START_HOLE',
        'PEG_FRAME_DELAY_MS',
      ]);
    }
  });
});
