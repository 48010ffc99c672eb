// ============================================================================
// PROP SCORER
// ============================================================================
// Weighted composite over five sub-metrics, each normalized to [0, 1]:
//   historical hit rate (season window)   0.35
//   recent hit rate (last 7 games)        0.25
//   favorable gap between mean and line   0.20
//   consistency (1 - CV)                  0.15
//   sample size factor                    0.05
// score = 100 * sum(weight * component), rounded to one decimal.
// ============================================================================

import { DEFAULT_ENGINE_CONFIG, RECENT_WINDOW } from '@/lib/engine-config';
import type { EngineConfig } from '@/types/engine-config';
import type { GameOutcome, Prop, PropSide, ScoreComponents, ScoredProp } from '@/types/props';

// Relative gap (delta / line) that earns full line-delta credit
const LINE_DELTA_FULL_CREDIT = 0.05;

// Consistency for a one-game sample, where spread is undefined
const SINGLE_GAME_CONSISTENCY = 0.5;

export type ScoringConfig = Pick<EngineConfig, 'weights' | 'full_sample_games'>;

export type StrongPropGate = Pick<EngineConfig, 'score_threshold' | 'recent_hit_threshold'> &
  Partial<Pick<EngineConfig, 'historical_hit_threshold'>>;

function clamp(n: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, n));
}

function round1(n: number): number {
  return Math.round(n * 10) / 10;
}

/**
 * Ties miss in both directions.
 */
export function isHit(value: number, line: number, side: PropSide): boolean {
  return side === 'over' ? value > line : value < line;
}

export function countHits(values: number[], line: number, side: PropSide): number {
  return values.filter(v => isHit(v, line, side)).length;
}

function mean(values: number[]): number {
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

function sampleStdDev(values: number[], avg: number): number {
  const squared = values.reduce((sum, v) => sum + (v - avg) ** 2, 0);
  return Math.sqrt(squared / (values.length - 1));
}

/**
 * 1 - coefficient of variation, clamped to [0, 1].
 */
export function consistencyOf(values: number[]): number {
  if (values.length === 0) return 0;
  if (values.length === 1) return SINGLE_GAME_CONSISTENCY;

  const avg = mean(values);
  const sd = sampleStdDev(values, avg);
  if (sd === 0) return 1;
  if (avg <= 0) return 0;
  return 1 - clamp(sd / avg, 0, 1);
}

/**
 * Favorable gap between the season mean and the line, in stat units.
 * Positive when the average clears the line in the bet's direction.
 */
export function favorableDelta(avg: number, line: number, side: PropSide): number {
  return side === 'over' ? avg - line : line - avg;
}

export function normalizeLineDelta(delta: number, line: number): number {
  const relative = line !== 0 ? delta / Math.abs(line) : delta;
  return clamp(relative / LINE_DELTA_FULL_CREDIT, 0, 1);
}

function emptyComponents(): ScoreComponents {
  return { historical: 0, recent: 0, line_delta: 0, consistency: 0, sample: 0 };
}

/**
 * Score one prop from its season and recent outcome windows.
 * A prop with no season games scores 0 on every metric.
 */
export function scoreProp(
  prop: Prop,
  seasonOutcomes: readonly GameOutcome[],
  recentOutcomes: readonly GameOutcome[],
  config: ScoringConfig = DEFAULT_ENGINE_CONFIG
): ScoredProp {
  const seasonValues = seasonOutcomes.map(o => o.statistic_value);
  const recentValues = recentOutcomes.slice(0, RECENT_WINDOW).map(o => o.statistic_value);

  if (seasonValues.length === 0) {
    return Object.freeze({
      ...prop,
      historical_hit_rate: 0,
      recent_hit_rate: 0,
      recent_hits: 0,
      recent_games: 0,
      line_vs_average_delta: 0,
      average_value: 0,
      consistency: 0,
      sample_size: 0,
      score: 0,
      components: Object.freeze(emptyComponents()),
      recent_values: Object.freeze(recentValues),
    });
  }

  const historicalHitRate = countHits(seasonValues, prop.line, prop.side) / seasonValues.length;
  const recentHits = countHits(recentValues, prop.line, prop.side);
  const recentHitRate = recentValues.length > 0 ? recentHits / recentValues.length : 0;

  const avg = mean(seasonValues);
  const delta = favorableDelta(avg, prop.line, prop.side);
  const consistency = consistencyOf(seasonValues);

  const components: ScoreComponents = {
    historical: historicalHitRate,
    recent: recentHitRate,
    line_delta: normalizeLineDelta(delta, prop.line),
    consistency,
    sample: Math.min(seasonValues.length / config.full_sample_games, 1),
  };

  const { weights } = config;
  const weighted =
    weights.historical * components.historical +
    weights.recent * components.recent +
    weights.line_delta * components.line_delta +
    weights.consistency * components.consistency +
    weights.sample * components.sample;

  return Object.freeze({
    ...prop,
    historical_hit_rate: historicalHitRate,
    recent_hit_rate: recentHitRate,
    recent_hits: recentHits,
    recent_games: recentValues.length,
    line_vs_average_delta: delta,
    average_value: avg,
    consistency,
    sample_size: seasonValues.length,
    score: clamp(round1(weighted * 100), 0, 100),
    components: Object.freeze(components),
    recent_values: Object.freeze(recentValues),
  });
}

/**
 * The composite score and recent form must both pass, plus the season hit
 * rate when that gate is set. A prop with no season sample is never strong.
 */
export function isStrongProp(
  scored: ScoredProp,
  gate: StrongPropGate = DEFAULT_ENGINE_CONFIG
): boolean {
  return (
    scored.sample_size > 0 &&
    scored.score >= gate.score_threshold &&
    scored.recent_hits >= gate.recent_hit_threshold &&
    scored.historical_hit_rate >= (gate.historical_hit_threshold ?? 0)
  );
}
