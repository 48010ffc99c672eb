import type { Sport } from './props';

export interface RawGameLog {
  game_id?: string;
  game_date?: string;                          // ISO date (yyyy-MM-dd)
  stats: Record<string, number | undefined>;   // Box-score fields keyed as the source names them
}

export interface GameLogQuery {
  sport: Sport;
  season_lookback: number;   // Most recent games to return
}

/**
 * Historical stats collaborator. Resolves to null when the source has no
 * record of the player; rows come back most-recent-first.
 */
export interface GameLogSource {
  fetchGameLogs(playerId: string, query: GameLogQuery): Promise<RawGameLog[] | null>;
}
