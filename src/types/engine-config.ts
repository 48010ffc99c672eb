// Engine configuration types for scoring and ticket assembly

import type { PropSide } from './props';

export interface ScoringWeights {
  historical: number;        // Season hit rate (default 0.35)
  recent: number;            // Last-7 hit rate (default 0.25)
  line_delta: number;        // Mean vs line gap (default 0.20)
  consistency: number;       // 1 - coefficient of variation (default 0.15)
  sample: number;            // Sample size factor (default 0.05)
}

export interface PickCountRange {
  min: number;
  max: number;               // Inclusive
}

export interface EngineConfig {
  num_tickets: number;
  games_per_ticket: number;
  picks_per_game: PickCountRange;
  score_threshold: number;       // Strong gate on composite score
  recent_hit_threshold: number;  // Strong gate on hits in the last 7 games
  historical_hit_threshold: number; // Strong gate on season hit rate, 0-1 (0 = off)
  season_lookback: number;       // Games requested for the season window
  full_sample_games: number;     // Games that count as a full sample
  weights: ScoringWeights;
  side_filter: PropSide | null;  // Restrict the ticket pool to one side
}

export type EngineConfigOverrides = Partial<Omit<EngineConfig, 'weights' | 'picks_per_game'>> & {
  weights?: Partial<ScoringWeights>;
  picks_per_game?: number | PickCountRange;
};

export type TicketStrategy = 'standard' | 'unders' | 'positional' | 'nhl';
