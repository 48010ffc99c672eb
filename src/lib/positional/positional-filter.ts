// ============================================================================
// POSITIONAL FILTER (NBA)
// ============================================================================
// Keeps props whose side agrees with what the player's position usually does
// for the stat (centers under on assists, point guards over on assists...).
// A player whose season average sits far from the positional norm is not
// playing the usual role, so those props are set apart as outliers.
// Rules, norms, priorities and multipliers live in data/positional-rules.json.
// ============================================================================

import positionalRulesData from '@/data/positional-rules.json';
import type { PropSide, ScoredProp, StatCategory } from '@/types/props';
import { resolveStatCategory } from '@/lib/stats/stat-categories';
import { comparePicks } from '@/lib/tickets/ticket-assembler';

export type Position = 'C' | 'PG' | 'SG' | 'PF' | 'SF';

const POSITIONS: readonly Position[] = ['C', 'PG', 'SG', 'PF', 'SF'];

export interface PositionalRule {
  side: PropSide;
  reason: string;
}

export interface PositionalNorm {
  mean: number;
  std: number;
}

export interface PositionalRules {
  rules: Map<Position, Map<StatCategory, PositionalRule>>;
  norms: Map<Position, Map<StatCategory, PositionalNorm>>;
  priority: Map<Position, number>;
  score_multiplier: Map<Position, number>;
  outlier_z_threshold: number;
}

export interface PositionalProp extends ScoredProp {
  position: Position;
  position_priority: number;    // 1 = strongest positional edge (C)
  rule_description: string;
  positional_score: number;     // score * position multiplier, one decimal
}

export interface PositionalOutlier {
  prop: ScoredProp;
  position: Position;
  positional_mean: number;
  z_score: number;              // (season average - positional mean) / std
}

export interface PositionalAnalysis {
  positional: PositionalProp[];  // Sorted by priority, then positional_score desc
  outliers: PositionalOutlier[];
}

// Priority for positions without an entry
const LOWEST_PRIORITY = 99;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isPosition(value: string): value is Position {
  return POSITIONS.some(p => p === value);
}

function toPositionMap<T>(
  value: unknown,
  parse: (entry: unknown) => T | null
): Map<Position, T> {
  const out = new Map<Position, T>();
  if (!isRecord(value)) return out;
  for (const [key, entry] of Object.entries(value)) {
    if (!isPosition(key)) continue;
    const parsed = parse(entry);
    if (parsed !== null) out.set(key, parsed);
  }
  return out;
}

function toStatMap<T>(
  value: unknown,
  parse: (entry: Record<string, unknown>) => T | null
): Map<StatCategory, T> | null {
  if (!isRecord(value)) return null;
  const out = new Map<StatCategory, T>();
  for (const [key, entry] of Object.entries(value)) {
    const category = resolveStatCategory(key);
    if (!category || !isRecord(entry)) continue;
    const parsed = parse(entry);
    if (parsed !== null) out.set(category, parsed);
  }
  return out;
}

function finiteOrNull(value: unknown): number | null {
  return typeof value === 'number' && Number.isFinite(value) ? value : null;
}

/**
 * Validate a positional rules document. Entries that do not fit the shape
 * are dropped.
 */
export function loadPositionalRules(data: unknown): PositionalRules {
  const doc = isRecord(data) ? data : {};

  const rules = toPositionMap(doc.rules, entry =>
    toStatMap<PositionalRule>(entry, rule =>
      (rule.side === 'over' || rule.side === 'under') && typeof rule.reason === 'string'
        ? { side: rule.side, reason: rule.reason }
        : null
    )
  );

  const norms = toPositionMap(doc.norms, entry =>
    toStatMap(entry, norm => {
      const mean = finiteOrNull(norm.mean);
      const std = finiteOrNull(norm.std);
      return mean !== null && std !== null && std > 0 ? { mean, std } : null;
    })
  );

  return {
    rules,
    norms,
    priority: toPositionMap(doc.priority, finiteOrNull),
    score_multiplier: toPositionMap(doc.score_multiplier, finiteOrNull),
    outlier_z_threshold: finiteOrNull(doc.outlier_z_threshold) ?? 2,
  };
}

export const DEFAULT_POSITIONAL_RULES: PositionalRules = loadPositionalRules(positionalRulesData);

/**
 * Listing positions come as "C", "pg", "G-F"; the first recognised token wins.
 */
export function normalizePosition(position: string | undefined): Position | null {
  if (!position) return null;
  for (const token of position.toUpperCase().split(/[^A-Z]+/)) {
    if (isPosition(token)) return token;
  }
  return null;
}

/**
 * Pick order for positional tickets: clearer positional patterns first
 * (C, PG, PF, SG), then the multiplied score.
 */
export function comparePositionalPicks(a: PositionalProp, b: PositionalProp): number {
  return (
    a.position_priority - b.position_priority ||
    b.positional_score - a.positional_score ||
    comparePicks(a, b)
  );
}

/**
 * Split scored NBA props into positional matches and outliers.
 * Other sports, SF and unlisted positions have no rules and are skipped.
 */
export function analyzePositionalProps(
  scored: readonly ScoredProp[],
  positionalRules: PositionalRules = DEFAULT_POSITIONAL_RULES
): PositionalAnalysis {
  const positional: PositionalProp[] = [];
  const outliers: PositionalOutlier[] = [];

  for (const prop of scored) {
    if (prop.sport !== 'nba') continue;
    const position = normalizePosition(prop.position);
    if (!position) continue;

    const rule = positionalRules.rules.get(position)?.get(prop.stat_category);
    if (!rule || rule.side !== prop.side) continue;

    const norm = positionalRules.norms.get(position)?.get(prop.stat_category);
    if (norm && prop.sample_size > 0) {
      const z = (prop.average_value - norm.mean) / norm.std;
      if (Math.abs(z) > positionalRules.outlier_z_threshold) {
        outliers.push({
          prop,
          position,
          positional_mean: norm.mean,
          z_score: Number(z.toFixed(2)),
        });
        continue;
      }
    }

    const multiplier = positionalRules.score_multiplier.get(position) ?? 1;
    positional.push({
      ...prop,
      position,
      position_priority: positionalRules.priority.get(position) ?? LOWEST_PRIORITY,
      rule_description: rule.reason,
      positional_score: Math.round(prop.score * multiplier * 10) / 10,
    });
  }

  positional.sort(comparePositionalPicks);

  console.log(`[positional] ${positional.length} positional props, ${outliers.length} outliers`);
  return { positional, outliers };
}
