// ============================================================================
// STAT CATEGORY DEFINITIONS
// ============================================================================
// Maps each sport's stat categories to the game-log fields that make them up.
// Combo categories (PRA, stocks) are the sum of their fields.
// ============================================================================

import type { Sport, StatCategory } from '@/types/props';

export type RawStatLine = Record<string, number | undefined>;

export const STAT_FIELDS: Record<Sport, Partial<Record<StatCategory, readonly string[]>>> = {
  // NBA box-score columns
  nba: {
    points: ['PTS'],
    rebounds: ['REB'],
    assists: ['AST'],
    steals: ['STL'],
    blocks: ['BLK'],
    turnovers: ['TOV'],
    fg_made: ['FGM'],
    fg_attempted: ['FGA'],
    threes_made: ['FG3M'],
    threes_attempted: ['FG3A'],
    ft_made: ['FTM'],
    ft_attempted: ['FTA'],
    points_assists: ['PTS', 'AST'],
    points_rebounds: ['PTS', 'REB'],
    points_rebounds_assists: ['PTS', 'REB', 'AST'],
    steals_blocks: ['STL', 'BLK'],
  },
  // NHL skater game-log fields
  nhl: {
    points: ['points'],
    goals: ['goals'],
    assists: ['assists'],
    shots_on_goal: ['shots'],
  },
};

// Listing stat names (lowercased, punctuation collapsed) -> category
const STAT_NAME_ALIASES: Record<string, StatCategory> = {
  'points': 'points',
  'rebounds': 'rebounds',
  'assists': 'assists',
  'steals': 'steals',
  'blocks': 'blocks',
  'turnovers': 'turnovers',
  'fg made': 'fg_made',
  'field goals made': 'fg_made',
  'fg attempted': 'fg_attempted',
  'field goals attempted': 'fg_attempted',
  'threes made': 'threes_made',
  '3 pointers made': 'threes_made',
  'three made': 'threes_made',
  'three attempted': 'threes_attempted',
  'threes attempted': 'threes_attempted',
  '3 pointers attempted': 'threes_attempted',
  'ft made': 'ft_made',
  'free throws made': 'ft_made',
  'ft attempted': 'ft_attempted',
  'free throws attempted': 'ft_attempted',
  'points assists': 'points_assists',
  'points rebounds': 'points_rebounds',
  'points rebounds assists': 'points_rebounds_assists',
  'pra': 'points_rebounds_assists',
  'steals blocks': 'steals_blocks',
  'goals': 'goals',
  'shots': 'shots_on_goal',
  'shots on goal': 'shots_on_goal',
};

function normalizeStatName(name: string): string {
  return name
    .toLowerCase()
    .replace(/[^a-z0-9\s]/g, ' ')
    .replace(/\s+/g, ' ')
    .trim();
}

/**
 * Resolve a listing's stat name ("Points + Rebounds", "3 Pointers Made")
 * to a category. Returns null for names with no category.
 */
export function resolveStatCategory(name: string): StatCategory | null {
  return STAT_NAME_ALIASES[normalizeStatName(name)] ?? null;
}

export function isStatSupported(sport: Sport, category: StatCategory): boolean {
  return STAT_FIELDS[sport][category] !== undefined;
}

/**
 * Value of a category for one game-log row, or null when the sport does not
 * record the category or the row is missing one of its fields.
 */
export function extractStatValue(sport: Sport, category: StatCategory, stats: RawStatLine): number | null {
  const fields = STAT_FIELDS[sport][category];
  if (!fields) return null;

  let total = 0;
  for (const field of fields) {
    const value = stats[field];
    if (value === undefined || !Number.isFinite(value)) return null;
    total += value;
  }
  return total;
}
