// ============================================================================
// GAME LOG SOURCES
// ============================================================================
// GameLogSource implementations the aggregator reads from:
//   - Supabase: `players` (id) + `player_game_logs`
//     (player_id, sport, season, game_id, game_date, stats jsonb)
//   - In-memory: a fixed record of rows per player id
// ============================================================================

import { getMonth, getYear } from 'date-fns';
import type { SupabaseClient } from '@supabase/supabase-js';
import type { GameLogQuery, GameLogSource, RawGameLog } from '@/types/game-logs';

export interface SupabaseGameLogSourceOptions {
  request_delay_ms?: number;   // Pause between player lookups
  season?: string | null;      // Season label filter; null reads every season
}

// NBA and NHL regular seasons open in October
const SEASON_START_MONTH = 9;

/**
 * Season label for a date: "2025-26" from October 2025 through September 2026.
 */
export function getSeasonLabel(date: Date = new Date()): string {
  const year = getYear(date);
  const startYear = getMonth(date) >= SEASON_START_MONTH ? year : year - 1;
  return `${startYear}-${String((startYear + 1) % 100).padStart(2, '0')}`;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Validate one `player_game_logs` row. Non-numeric stat fields are dropped;
 * a row without a stats object is rejected.
 */
export function parseGameLogRow(row: unknown): RawGameLog | null {
  if (!isRecord(row) || !isRecord(row.stats)) return null;

  const stats: Record<string, number> = {};
  for (const [field, value] of Object.entries(row.stats)) {
    if (typeof value === 'number' && Number.isFinite(value)) stats[field] = value;
  }

  const log: RawGameLog = { stats };
  if (typeof row.game_id === 'string' || typeof row.game_id === 'number') log.game_id = String(row.game_id);
  if (typeof row.game_date === 'string' && row.game_date.length > 0) log.game_date = row.game_date;
  return log;
}

function parseRows(playerId: string, rows: unknown): RawGameLog[] {
  if (!Array.isArray(rows)) return [];

  const logs: RawGameLog[] = [];
  let invalid = 0;
  for (const row of rows) {
    const log = parseGameLogRow(row);
    if (log) logs.push(log);
    else invalid++;
  }
  if (invalid > 0) {
    console.warn(`[game-logs] ⚠️ Dropped ${invalid} invalid game log rows for ${playerId}`);
  }
  return logs;
}

export function createSupabaseGameLogSource(
  supabase: SupabaseClient,
  options: SupabaseGameLogSourceOptions = {}
): GameLogSource {
  const delayMs = options.request_delay_ms ?? 0;
  const season = options.season === undefined ? getSeasonLabel() : options.season;
  let requests = 0;

  return {
    async fetchGameLogs(playerId: string, query: GameLogQuery): Promise<RawGameLog[] | null> {
      if (delayMs > 0 && requests > 0) {
        await new Promise(resolve => setTimeout(resolve, delayMs));
      }
      requests++;

      const { data: player, error: playerError } = await supabase
        .from('players')
        .select('id')
        .eq('id', playerId)
        .maybeSingle();

      if (playerError) throw playerError;
      if (!player) return null;

      let logsQuery = supabase
        .from('player_game_logs')
        .select('game_id, game_date, stats')
        .eq('player_id', playerId)
        .eq('sport', query.sport);
      if (season !== null) logsQuery = logsQuery.eq('season', season);

      const { data, error } = await logsQuery
        .order('game_date', { ascending: false })
        .limit(query.season_lookback);

      if (error) throw error;
      return parseRows(playerId, data);
    },
  };
}

/**
 * Source over rows already in memory, keyed by player id and stored newest
 * first. Players missing from the record are unknown.
 */
export function createInMemoryGameLogSource(logsByPlayer: Record<string, RawGameLog[]>): GameLogSource {
  const logs = new Map(Object.entries(logsByPlayer));
  return {
    async fetchGameLogs(playerId: string, query: GameLogQuery): Promise<RawGameLog[] | null> {
      const rows = logs.get(playerId);
      return rows ? rows.slice(0, query.season_lookback) : null;
    },
  };
}
