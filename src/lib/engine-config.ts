// ============================================================================
// ENGINE CONFIGURATION
// ============================================================================
// Defaults, validation and environment overrides for the scoring weights,
// strong-prop gates and ticket shape. Invalid configuration is fatal and is
// rejected before any prop is scored.
// ============================================================================

import { InvalidConfigurationError } from './errors';
import type {
  EngineConfig,
  EngineConfigOverrides,
  PickCountRange,
  ScoringWeights,
  TicketStrategy,
} from '@/types/engine-config';

export const RECENT_WINDOW = 7;

const WEIGHT_SUM_TOLERANCE = 1e-6;

export const DEFAULT_SCORING_WEIGHTS: ScoringWeights = {
  historical: 0.35,
  recent: 0.25,
  line_delta: 0.20,
  consistency: 0.15,
  sample: 0.05,
};

export const DEFAULT_ENGINE_CONFIG: EngineConfig = {
  num_tickets: 5,
  games_per_ticket: 4,
  picks_per_game: { min: 6, max: 7 },
  score_threshold: 70,
  recent_hit_threshold: 5,
  historical_hit_threshold: 0,
  season_lookback: 82,
  full_sample_games: 20,
  weights: DEFAULT_SCORING_WEIGHTS,
  side_filter: null,
};

// Preset overrides per ticket strategy
const STRATEGY_OVERRIDES: Record<TicketStrategy, EngineConfigOverrides> = {
  standard: {},
  unders: {
    side_filter: 'under',
    score_threshold: 75,
    recent_hit_threshold: 4,
    num_tickets: 3,
    games_per_ticket: 5,
  },
  positional: {},
  nhl: {
    score_threshold: 70,
    historical_hit_threshold: 0.65,
    recent_hit_threshold: 4,
    num_tickets: 3,
    games_per_ticket: 9,
    picks_per_game: 3,
  },
};

export function toPickCountRange(value: number | PickCountRange): PickCountRange {
  if (typeof value === 'number') return { min: value, max: value };
  return { min: value.min, max: value.max };
}

function isPositiveInteger(n: number): boolean {
  return Number.isInteger(n) && n >= 1;
}

/**
 * Collect every problem with a configuration. Empty means valid.
 */
export function validateEngineConfig(config: EngineConfig): string[] {
  const problems: string[] = [];

  if (!isPositiveInteger(config.num_tickets)) {
    problems.push(`num_tickets must be an integer >= 1 (got ${config.num_tickets})`);
  }
  if (!isPositiveInteger(config.games_per_ticket)) {
    problems.push(`games_per_ticket must be an integer >= 1 (got ${config.games_per_ticket})`);
  }

  const { min, max } = config.picks_per_game;
  if (!isPositiveInteger(min) || !isPositiveInteger(max)) {
    problems.push(`picks_per_game bounds must be integers >= 1 (got ${min}-${max})`);
  } else if (min > max) {
    problems.push(`picks_per_game min ${min} exceeds max ${max}`);
  }

  if (!Number.isFinite(config.score_threshold) || config.score_threshold < 0 || config.score_threshold > 100) {
    problems.push(`score_threshold must be within 0-100 (got ${config.score_threshold})`);
  }
  if (
    !Number.isInteger(config.recent_hit_threshold) ||
    config.recent_hit_threshold < 0 ||
    config.recent_hit_threshold > RECENT_WINDOW
  ) {
    problems.push(`recent_hit_threshold must be an integer within 0-${RECENT_WINDOW} (got ${config.recent_hit_threshold})`);
  }
  if (
    !Number.isFinite(config.historical_hit_threshold) ||
    config.historical_hit_threshold < 0 ||
    config.historical_hit_threshold > 1
  ) {
    problems.push(`historical_hit_threshold must be within 0-1 (got ${config.historical_hit_threshold})`);
  }
  if (!isPositiveInteger(config.season_lookback)) {
    problems.push(`season_lookback must be an integer >= 1 (got ${config.season_lookback})`);
  }
  if (!isPositiveInteger(config.full_sample_games)) {
    problems.push(`full_sample_games must be an integer >= 1 (got ${config.full_sample_games})`);
  }

  const weights = Object.entries(config.weights);
  const negative = weights.filter(([, w]) => !Number.isFinite(w) || w < 0).map(([name]) => name);
  if (negative.length > 0) {
    problems.push(`weights must be non-negative numbers (${negative.join(', ')})`);
  }
  const total = weights.reduce((sum, [, w]) => sum + w, 0);
  if (Math.abs(total - 1) > WEIGHT_SUM_TOLERANCE) {
    problems.push(`weights must sum to 1.0 (got ${Number(total.toFixed(6))})`);
  }

  return problems;
}

/**
 * Merge overrides onto the defaults (or a strategy preset) and validate.
 * Throws InvalidConfigurationError listing every problem.
 */
export function resolveEngineConfig(
  overrides: EngineConfigOverrides = {},
  strategy: TicketStrategy = 'standard'
): EngineConfig {
  const preset = STRATEGY_OVERRIDES[strategy];
  const merged: EngineConfig = {
    ...DEFAULT_ENGINE_CONFIG,
    ...preset,
    ...overrides,
    weights: { ...DEFAULT_SCORING_WEIGHTS, ...preset.weights, ...overrides.weights },
    picks_per_game: toPickCountRange(
      overrides.picks_per_game ?? preset.picks_per_game ?? DEFAULT_ENGINE_CONFIG.picks_per_game
    ),
  };

  const problems = validateEngineConfig(merged);
  if (problems.length > 0) {
    console.error(`[engine-config] Rejected configuration: ${problems.join('; ')}`);
    throw new InvalidConfigurationError(problems);
  }
  return merged;
}

// ============================================================================
// ENVIRONMENT OVERRIDES
// ============================================================================

const INTEGER_ENV_KEYS = {
  PROP_ENGINE_NUM_TICKETS: 'num_tickets',
  PROP_ENGINE_GAMES_PER_TICKET: 'games_per_ticket',
  PROP_ENGINE_RECENT_HIT_THRESHOLD: 'recent_hit_threshold',
  PROP_ENGINE_SEASON_LOOKBACK: 'season_lookback',
  PROP_ENGINE_FULL_SAMPLE_GAMES: 'full_sample_games',
} as const;

function parseNumber(name: string, raw: string): number {
  const n = Number(raw.trim());
  if (raw.trim() === '' || !Number.isFinite(n)) {
    throw new InvalidConfigurationError([`${name} is not a number ("${raw}")`]);
  }
  return n;
}

/**
 * Read PROP_ENGINE_* variables into config overrides.
 * PROP_ENGINE_PICKS_PER_GAME accepts "6" or "6-7".
 * PROP_ENGINE_WEIGHTS accepts five comma-separated numbers in the order
 * historical, recent, line_delta, consistency, sample.
 */
export function readEngineConfigFromEnv(env: NodeJS.ProcessEnv = process.env): EngineConfigOverrides {
  const overrides: EngineConfigOverrides = {};

  for (const [name, key] of Object.entries(INTEGER_ENV_KEYS)) {
    const raw = env[name];
    if (raw !== undefined) overrides[key] = parseNumber(name, raw);
  }

  const threshold = env.PROP_ENGINE_SCORE_THRESHOLD;
  if (threshold !== undefined) {
    overrides.score_threshold = parseNumber('PROP_ENGINE_SCORE_THRESHOLD', threshold);
  }

  const hitRate = env.PROP_ENGINE_HISTORICAL_HIT_THRESHOLD;
  if (hitRate !== undefined) {
    overrides.historical_hit_threshold = parseNumber('PROP_ENGINE_HISTORICAL_HIT_THRESHOLD', hitRate);
  }

  const picks = env.PROP_ENGINE_PICKS_PER_GAME;
  if (picks !== undefined) {
    const [low, high] = picks.split('-');
    const min = parseNumber('PROP_ENGINE_PICKS_PER_GAME', low);
    overrides.picks_per_game = high === undefined
      ? min
      : { min, max: parseNumber('PROP_ENGINE_PICKS_PER_GAME', high) };
  }

  const side = env.PROP_ENGINE_SIDE_FILTER;
  if (side !== undefined) {
    if (side !== 'over' && side !== 'under') {
      throw new InvalidConfigurationError([`PROP_ENGINE_SIDE_FILTER must be "over" or "under" (got "${side}")`]);
    }
    overrides.side_filter = side;
  }

  const weights = env.PROP_ENGINE_WEIGHTS;
  if (weights !== undefined) {
    const values = weights.split(',').map(w => parseNumber('PROP_ENGINE_WEIGHTS', w));
    if (values.length !== 5) {
      throw new InvalidConfigurationError([`PROP_ENGINE_WEIGHTS needs 5 values (got ${values.length})`]);
    }
    const [historical, recent, line_delta, consistency, sample] = values;
    overrides.weights = { historical, recent, line_delta, consistency, sample };
  }

  return overrides;
}
