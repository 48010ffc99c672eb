// ============================================================================
// HISTORICAL STAT AGGREGATOR
// ============================================================================
// Turns a player's raw game logs into most-recent-first outcome windows for
// one stat category. Logs are fetched once per player and reused for the
// season window, the recent window and every category of that player.
// ============================================================================

import { PlayerNotFoundError, UnsupportedStatCategoryError } from '@/lib/errors';
import { extractStatValue, isStatSupported } from './stat-categories';
import type { GameLogSource, RawGameLog } from '@/types/game-logs';
import type { GameOutcome, Prop, StatCategory } from '@/types/props';

export type PlayerRef = Pick<Prop, 'player_id' | 'sport'>;

export interface StatAggregatorOptions {
  season_lookback: number;   // Games requested from the source per player
}

/**
 * Order rows newest first when every row is dated; otherwise trust the
 * source's order.
 */
function orderMostRecentFirst(logs: RawGameLog[]): RawGameLog[] {
  if (!logs.every(log => log.game_date !== undefined)) return logs;
  return [...logs].sort((a, b) => (b.game_date ?? '').localeCompare(a.game_date ?? ''));
}

/**
 * Extract one category from rows already ordered newest first.
 * Rows that lack the category's fields are not outcomes.
 */
export function buildOutcomes(
  player: PlayerRef,
  category: StatCategory,
  logs: RawGameLog[],
  lookbackN: number
): GameOutcome[] {
  const outcomes: GameOutcome[] = [];

  for (const log of logs) {
    if (outcomes.length >= lookbackN) break;
    const value = extractStatValue(player.sport, category, log.stats);
    if (value === null) continue;

    outcomes.push(Object.freeze({
      game_index: outcomes.length,
      statistic_value: value,
      ...(log.game_date !== undefined && { game_date: log.game_date }),
    }));
  }

  return outcomes;
}

export class StatAggregator {
  private readonly logsByPlayer = new Map<string, Promise<RawGameLog[]>>();

  constructor(
    private readonly source: GameLogSource,
    private readonly options: StatAggregatorOptions
  ) {}

  /**
   * Most-recent-first outcomes for a player's stat category, at most
   * `lookbackN` long. An empty result means the player has no usable history
   * for the category.
   *
   * @throws PlayerNotFoundError when the source has no record of the player
   * @throws UnsupportedStatCategoryError when the sport does not record the category
   */
  async fetchRecentOutcomes(
    player: PlayerRef,
    category: StatCategory,
    lookbackN: number
  ): Promise<GameOutcome[]> {
    if (!isStatSupported(player.sport, category)) {
      throw new UnsupportedStatCategoryError(player.sport, category);
    }

    const logs = await this.loadLogs(player);
    return buildOutcomes(player, category, logs, lookbackN);
  }

  private loadLogs(player: PlayerRef): Promise<RawGameLog[]> {
    const key = `${player.sport}|${player.player_id}`;
    const cached = this.logsByPlayer.get(key);
    if (cached) return cached;

    const pending = this.source
      .fetchGameLogs(player.player_id, {
        sport: player.sport,
        season_lookback: this.options.season_lookback,
      })
      .then(logs => {
        if (logs === null) throw new PlayerNotFoundError(player.player_id);
        console.log(`[stat-aggregator] Loaded ${logs.length} game logs for ${player.player_id}`);
        return orderMostRecentFirst(logs);
      });

    this.logsByPlayer.set(key, pending);
    return pending;
  }
}
