import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import {
  DEFAULT_ENGINE_CONFIG,
  readEngineConfigFromEnv,
  resolveEngineConfig,
  validateEngineConfig,
} from './engine-config';
import { InvalidConfigurationError } from './errors';

describe('resolveEngineConfig', () => {
  beforeEach(() => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('returns the defaults with no overrides', () => {
    expect(resolveEngineConfig()).toEqual(DEFAULT_ENGINE_CONFIG);
  });

  it('expands a single pick count into a fixed range', () => {
    expect(resolveEngineConfig({ picks_per_game: 6 }).picks_per_game).toEqual({ min: 6, max: 6 });
  });

  it('merges partial weights onto the defaults', () => {
    const config = resolveEngineConfig({ weights: { historical: 0.3, sample: 0.1 } });
    expect(config.weights).toEqual({
      historical: 0.3,
      recent: 0.25,
      line_delta: 0.2,
      consistency: 0.15,
      sample: 0.1,
    });
  });

  it('applies the unders preset', () => {
    const config = resolveEngineConfig({}, 'unders');
    expect(config.side_filter).toBe('under');
    expect(config.score_threshold).toBe(75);
    expect(config.recent_hit_threshold).toBe(4);
    expect(config.num_tickets).toBe(3);
    expect(config.games_per_ticket).toBe(5);
  });

  it('applies the nhl preset', () => {
    const config = resolveEngineConfig({}, 'nhl');
    expect(config.score_threshold).toBe(70);
    expect(config.historical_hit_threshold).toBe(0.65);
    expect(config.recent_hit_threshold).toBe(4);
    expect(config.num_tickets).toBe(3);
    expect(config.games_per_ticket).toBe(9);
    expect(config.picks_per_game).toEqual({ min: 3, max: 3 });
    expect(config.side_filter).toBeNull();
  });

  it('lets explicit overrides win over a preset', () => {
    expect(resolveEngineConfig({ num_tickets: 1 }, 'unders').num_tickets).toBe(1);
  });

  it('rejects weights that do not sum to one', () => {
    expect(() => resolveEngineConfig({ weights: { historical: 0.5 } })).toThrow(
      'Invalid engine configuration: weights must sum to 1.0 (got 1.15)'
    );
  });

  it('lists every problem at once', () => {
    try {
      resolveEngineConfig({ num_tickets: 0, picks_per_game: { min: 7, max: 6 } });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(InvalidConfigurationError);
      if (err instanceof InvalidConfigurationError) {
        expect(err.code).toBe('INVALID_CONFIGURATION');
        expect(err.problems).toEqual([
          'num_tickets must be an integer >= 1 (got 0)',
          'picks_per_game min 7 exceeds max 6',
        ]);
      }
    }
  });
});

describe('validateEngineConfig', () => {
  it('accepts the defaults', () => {
    expect(validateEngineConfig(DEFAULT_ENGINE_CONFIG)).toEqual([]);
  });

  it('rejects a recent threshold above the recent window', () => {
    expect(validateEngineConfig({ ...DEFAULT_ENGINE_CONFIG, recent_hit_threshold: 8 })).toEqual([
      'recent_hit_threshold must be an integer within 0-7 (got 8)',
    ]);
  });

  it('rejects a season hit-rate gate outside 0-1', () => {
    expect(validateEngineConfig({ ...DEFAULT_ENGINE_CONFIG, historical_hit_threshold: 65 })).toEqual([
      'historical_hit_threshold must be within 0-1 (got 65)',
    ]);
  });

  it('rejects negative weights', () => {
    const weights = { ...DEFAULT_ENGINE_CONFIG.weights, historical: 0.45, sample: -0.05 };
    expect(validateEngineConfig({ ...DEFAULT_ENGINE_CONFIG, weights })).toEqual([
      'weights must be non-negative numbers (sample)',
    ]);
  });
});

describe('readEngineConfigFromEnv', () => {
  it('reads every supported variable', () => {
    const overrides = readEngineConfigFromEnv({
      PROP_ENGINE_NUM_TICKETS: '3',
      PROP_ENGINE_SCORE_THRESHOLD: '72.5',
      PROP_ENGINE_HISTORICAL_HIT_THRESHOLD: '0.6',
      PROP_ENGINE_PICKS_PER_GAME: '5-6',
      PROP_ENGINE_SIDE_FILTER: 'under',
      PROP_ENGINE_WEIGHTS: '0.4,0.2,0.2,0.15,0.05',
    });

    expect(overrides).toEqual({
      num_tickets: 3,
      score_threshold: 72.5,
      historical_hit_threshold: 0.6,
      picks_per_game: { min: 5, max: 6 },
      side_filter: 'under',
      weights: { historical: 0.4, recent: 0.2, line_delta: 0.2, consistency: 0.15, sample: 0.05 },
    });
  });

  it('returns no overrides for an empty environment', () => {
    expect(readEngineConfigFromEnv({})).toEqual({});
  });

  it('reads a single pick count', () => {
    expect(readEngineConfigFromEnv({ PROP_ENGINE_PICKS_PER_GAME: '6' })).toEqual({ picks_per_game: 6 });
  });

  it('rejects a non-numeric value', () => {
    expect(() => readEngineConfigFromEnv({ PROP_ENGINE_GAMES_PER_TICKET: 'four' })).toThrow(
      'PROP_ENGINE_GAMES_PER_TICKET is not a number ("four")'
    );
  });

  it('rejects an unknown side', () => {
    expect(() => readEngineConfigFromEnv({ PROP_ENGINE_SIDE_FILTER: 'both' })).toThrow(InvalidConfigurationError);
  });

  it('needs five weights', () => {
    expect(() => readEngineConfigFromEnv({ PROP_ENGINE_WEIGHTS: '0.5,0.5' })).toThrow(
      'PROP_ENGINE_WEIGHTS needs 5 values (got 2)'
    );
  });
});
