/**
 * Environment Configuration Tests
 *
 * Tests for the Zod-based environment variable validation and the assembled
 * config object.
 */

import { config, getEffectiveNodeEnv, loadConfig, parseEnv } from '../../src/shared/config';
import { GameErrorCode, InvalidConfigurationError } from '../../src/shared/errors';

describe('parseEnv', () => {
  it('applies defaults to an empty environment', () => {
    const result = parseEnv({});
    expect(result.success).toBe(true);
    expect(result.data).toEqual({
      NODE_ENV: 'development',
      BLOKUS_PLAYER_ORDER: ['blue', 'yellow', 'red', 'green'],
      BLOKUS_KEEP_SELECTION_ON_FAILURE: true,
      BLOKUS_DEBUG_BOARD: false,
    });
  });

  describe('NODE_ENV validation', () => {
    it('should accept valid NODE_ENV values', () => {
      for (const nodeEnv of ['development', 'production', 'test']) {
        const result = parseEnv({ NODE_ENV: nodeEnv });
        expect(result.success).toBe(true);
        expect(result.data?.NODE_ENV).toBe(nodeEnv);
      }
    });

    it('should reject invalid NODE_ENV values', () => {
      const result = parseEnv({ NODE_ENV: 'staging' });
      expect(result.success).toBe(false);
      expect(result.errors?.some((e) => e.path === 'NODE_ENV')).toBe(true);
    });
  });

  describe('logging', () => {
    it('accepts known levels and formats', () => {
      const result = parseEnv({ LOG_LEVEL: 'warn', LOG_FORMAT: 'json' });
      expect(result.data?.LOG_LEVEL).toBe('warn');
      expect(result.data?.LOG_FORMAT).toBe('json');
    });

    it('rejects an unknown level', () => {
      const result = parseEnv({ LOG_LEVEL: 'verbose' });
      expect(result.success).toBe(false);
      expect(result.errors?.map((e) => e.path)).toEqual(['LOG_LEVEL']);
    });
  });

  describe('BLOKUS_PLAYER_ORDER', () => {
    it('splits, trims and lowercases colours', () => {
      expect(parseEnv({ BLOKUS_PLAYER_ORDER: ' Red, green ,BLUE' }).data?.BLOKUS_PLAYER_ORDER).toEqual(
        ['red', 'green', 'blue']
      );
    });

    it('falls back to the standard order when blank', () => {
      expect(parseEnv({ BLOKUS_PLAYER_ORDER: '  ' }).data?.BLOKUS_PLAYER_ORDER).toEqual([
        'blue',
        'yellow',
        'red',
        'green',
      ]);
    });

    it('rejects a single colour', () => {
      const result = parseEnv({ BLOKUS_PLAYER_ORDER: 'red' });
      expect(result.success).toBe(false);
      expect(result.errors?.[0].path).toBe('BLOKUS_PLAYER_ORDER');
    });

    it('rejects repeated colours', () => {
      const result = parseEnv({ BLOKUS_PLAYER_ORDER: 'red,red' });
      expect(result.success).toBe(false);
      expect(result.errors).toEqual([
        { path: 'BLOKUS_PLAYER_ORDER', message: 'Player colours must be distinct' },
      ]);
    });

    it('rejects unknown colours', () => {
      const result = parseEnv({ BLOKUS_PLAYER_ORDER: 'red,purple' });
      expect(result.success).toBe(false);
      expect(result.errors?.[0].path).toBe('BLOKUS_PLAYER_ORDER.1');
    });
  });

  describe('boolean flags', () => {
    it.each<[string, boolean]>([
      ['true', true],
      ['1', true],
      ['false', false],
      ['0', false],
      ['', true],
    ])('reads BLOKUS_KEEP_SELECTION_ON_FAILURE=%p as %p', (raw, expected) => {
      expect(
        parseEnv({ BLOKUS_KEEP_SELECTION_ON_FAILURE: raw }).data?.BLOKUS_KEEP_SELECTION_ON_FAILURE
      ).toBe(expected);
    });

    it.each(['ture', 'yes', 'TRUE', ' 1'])('rejects %p', (raw) => {
      const result = parseEnv({ BLOKUS_KEEP_SELECTION_ON_FAILURE: raw });
      expect(result.success).toBe(false);
      expect(result.errors?.map((e) => e.path)).toEqual(['BLOKUS_KEEP_SELECTION_ON_FAILURE']);
    });

    it('enables the board dump with 1', () => {
      expect(parseEnv({ BLOKUS_DEBUG_BOARD: '1' }).data?.BLOKUS_DEBUG_BOARD).toBe(true);
    });
  });

  it('treats the Jest runtime as test regardless of NODE_ENV', () => {
    const result = parseEnv({ NODE_ENV: 'production' });
    expect(result.data && getEffectiveNodeEnv(result.data)).toBe('test');
  });
});

describe('loadConfig', () => {
  it('assembles defaults', () => {
    expect(loadConfig({})).toEqual({
      nodeEnv: 'test',
      isTest: true,
      logging: { level: 'debug', format: 'pretty', levelExplicit: false },
      game: {
        playerOrder: ['blue', 'yellow', 'red', 'green'],
        keepSelectionOnFailure: true,
        debugBoard: false,
      },
    });
  });

  it('records an explicit log level', () => {
    const loaded = loadConfig({ LOG_LEVEL: 'error', LOG_FORMAT: 'json' });
    expect(loaded.logging).toEqual({ level: 'error', format: 'json', levelExplicit: true });
  });

  it('returns a frozen object', () => {
    const loaded = loadConfig({ BLOKUS_PLAYER_ORDER: 'green,red' });
    expect(Object.isFrozen(loaded)).toBe(true);
    expect(Object.isFrozen(loaded.game.playerOrder)).toBe(true);
    expect(loaded.game.playerOrder).toEqual(['green', 'red']);
  });

  it('throws InvalidConfigurationError on bad input', () => {
    expect(() => loadConfig({ BLOKUS_PLAYER_ORDER: 'red,red' })).toThrow(
      new InvalidConfigurationError([
        { path: 'BLOKUS_PLAYER_ORDER', message: 'Player colours must be distinct' },
      ])
    );
    expect(() => loadConfig({ LOG_FORMAT: 'xml' })).toThrow(
      expect.objectContaining({ code: GameErrorCode.CONFIGURATION_ERROR, isFatal: true })
    );
  });

  it('exposes the loaded process config', () => {
    expect(config.isTest).toBe(true);
    expect(config.game.playerOrder).toEqual(['blue', 'yellow', 'red', 'green']);
  });
});
