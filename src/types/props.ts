// Prop, outcome and ticket types shared by the scoring and assembly engines

export type Sport = 'nba' | 'nhl';

export type PropSide = 'over' | 'under';

export type StatCategory =
  | 'points'
  | 'rebounds'
  | 'assists'
  | 'steals'
  | 'blocks'
  | 'turnovers'
  | 'fg_made'
  | 'fg_attempted'
  | 'threes_made'
  | 'threes_attempted'
  | 'ft_made'
  | 'ft_attempted'
  | 'points_assists'
  | 'points_rebounds'
  | 'points_rebounds_assists'
  | 'steals_blocks'
  | 'goals'
  | 'shots_on_goal';

export interface GameOutcome {
  game_index: number;        // 0 = most recent game
  statistic_value: number;
  game_date?: string;        // ISO date of the game, when the source provides it
}

export interface Prop {
  player_id: string;
  player_name: string;
  team?: string;
  position?: string;         // 'C' | 'PG' | 'SG' | 'PF' | 'SF' for NBA listings
  sport: Sport;
  game_id: string;
  game_name?: string;
  stat_category: StatCategory;
  line: number;
  side: PropSide;
  offered_odds: number;      // Decimal odds as listed (1.85)
  market_id?: string;
  line_id?: string;
  stat_id?: string;
}

export interface ScoreComponents {
  historical: number;        // Each component normalized to [0, 1]
  recent: number;
  line_delta: number;
  consistency: number;
  sample: number;
}

export interface ScoredProp extends Prop {
  historical_hit_rate: number;   // [0, 1] over the season window
  recent_hit_rate: number;       // [0, 1] over the last 7 games
  recent_hits: number;
  recent_games: number;
  line_vs_average_delta: number; // Favorable gap between season mean and line, in stat units
  average_value: number;
  consistency: number;           // 1 - clamped coefficient of variation
  sample_size: number;
  score: number;                 // 0-100 weighted composite
  components: ScoreComponents;
  recent_values: readonly number[]; // Most-recent-first
}

export interface Ticket {
  ticket_number: number;     // 1-based position in the batch
  games: string[];           // Distinct game_ids, ranked order
  picks: ScoredProp[];       // Grouped by game, in the order of `games`
  target_picks: number;      // Sum of the drawn per-game pick counts
  missing_picks: number;
  missing_games: number;
  total_odds: number;        // Product of offered_odds
  average_score: number;
}

export interface TicketShortfall {
  code: 'INSUFFICIENT_POOL' | null;
  requested_tickets: number;
  generated_tickets: number;
  pool_size: number;             // Strong props available to the batch
  required_pool_size: number;    // num_tickets * games_per_ticket * minimum picks per game
  missing_picks: number;         // Summed over emitted tickets
  missing_games: number;
}

export interface TicketBatch {
  tickets: Ticket[];
  seed: number;
  shortfall: TicketShortfall;
}
