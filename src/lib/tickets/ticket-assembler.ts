// ============================================================================
// TICKET ASSEMBLER
// ============================================================================
// Builds a batch of parlay tickets from strong props:
//   1. Keep props passing both strong gates (and the side filter, if any)
//   2. Group by game, rank games by summed score (ties: game_id ascending)
//   3. Per ticket, take the top-ranked games that still have an eligible prop
//      and draw a seeded 6-7 picks from each, in pick order (best score first
//      unless the caller passes its own ordering)
//   4. Every drawn (player, stat, game) key goes into one used-key set shared
//      by the whole batch, so no prop repeats across tickets
// Short tickets are emitted with their shortfall; nothing is invented.
// ============================================================================

import { InvalidConfigurationError } from '@/lib/errors';
import { resolveEngineConfig } from '@/lib/engine-config';
import { isStrongProp } from '@/lib/scoring/prop-scorer';
import { createSeededRandom, randomIntInclusive } from './seeded-random';
import type { EngineConfig, EngineConfigOverrides } from '@/types/engine-config';
import type { ScoredProp, Ticket, TicketBatch, TicketShortfall } from '@/types/props';

export type TicketAssemblyOptions = EngineConfigOverrides & {
  seed: number;
};

export type PickOrder<T extends ScoredProp = ScoredProp> = (a: T, b: T) => number;

interface RankedGame<T extends ScoredProp = ScoredProp> {
  game_id: string;
  props: T[];                // In pick order
  total_score: number;
}

/**
 * Key that may appear at most once across a batch.
 */
export function pickKey(prop: Pick<ScoredProp, 'player_id' | 'stat_category' | 'game_id'>): string {
  return `${prop.player_id}|${prop.stat_category}|${prop.game_id}`;
}

function compareText(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Score descending, then player_id ascending; stat, line and side settle the
 * remaining ties so the order never depends on input order.
 */
export function comparePicks(a: ScoredProp, b: ScoredProp): number {
  return (
    b.score - a.score ||
    compareText(a.player_id, b.player_id) ||
    compareText(a.stat_category, b.stat_category) ||
    a.line - b.line ||
    compareText(a.side, b.side)
  );
}

export function rankGames<T extends ScoredProp>(
  pool: T[],
  order: PickOrder<T> = comparePicks
): RankedGame<T>[] {
  const byGame = new Map<string, T[]>();
  for (const prop of pool) {
    const existing = byGame.get(prop.game_id);
    if (existing) existing.push(prop);
    else byGame.set(prop.game_id, [prop]);
  }

  return [...byGame.entries()]
    .map(([game_id, props]) => ({
      game_id,
      props: [...props].sort(order),
      total_score: props.reduce((sum, p) => sum + p.score, 0),
    }))
    .sort((a, b) => b.total_score - a.total_score || compareText(a.game_id, b.game_id));
}

function hasEligibleProp<T extends ScoredProp>(game: RankedGame<T>, usedKeys: ReadonlySet<string>): boolean {
  return game.props.some(p => !usedKeys.has(pickKey(p)));
}

/**
 * Best unused props for one game. Keys are claimed as they are drawn.
 */
function drawPicks<T extends ScoredProp>(game: RankedGame<T>, count: number, usedKeys: Set<string>): T[] {
  const picks: T[] = [];
  for (const prop of game.props) {
    if (picks.length >= count) break;
    const key = pickKey(prop);
    if (usedKeys.has(key)) continue;
    usedKeys.add(key);
    picks.push(prop);
  }
  return picks;
}

function buildTicket<T extends ScoredProp>(
  ticketNumber: number,
  games: RankedGame<T>[],
  config: EngineConfig,
  usedKeys: Set<string>,
  random: () => number
): Ticket {
  const picks: T[] = [];
  let targetPicks = 0;

  for (const game of games) {
    const count = randomIntInclusive(random, config.picks_per_game.min, config.picks_per_game.max);
    const drawn = drawPicks(game, count, usedKeys);
    targetPicks += count;

    if (drawn.length < count) {
      console.warn(`[ticket-assembler] ⚠️ Ticket ${ticketNumber}: only ${drawn.length}/${count} picks for ${game.game_id}`);
    }
    picks.push(...drawn);
  }

  const totalOdds = picks.reduce((product, p) => product * p.offered_odds, 1);
  const averageScore = picks.length > 0
    ? picks.reduce((sum, p) => sum + p.score, 0) / picks.length
    : 0;

  return {
    ticket_number: ticketNumber,
    games: games.map(g => g.game_id),
    picks,
    target_picks: targetPicks,
    missing_picks: targetPicks - picks.length,
    missing_games: config.games_per_ticket - games.length,
    total_odds: Number(totalOdds.toFixed(2)),
    average_score: Number(averageScore.toFixed(1)),
  };
}

/**
 * Assemble a deterministic ticket batch for a seed. `order` decides which
 * props of a game are drawn first; it must be a total order for the batch to
 * stay independent of input order.
 *
 * @throws InvalidConfigurationError before any work when the options are invalid
 */
export function generateTickets<T extends ScoredProp>(
  scoredProps: T[],
  options: TicketAssemblyOptions,
  order: PickOrder<T> = comparePicks
): TicketBatch {
  const { seed, ...overrides } = options;
  if (!Number.isInteger(seed)) {
    throw new InvalidConfigurationError([`seed must be an integer (got ${seed})`]);
  }
  const config = resolveEngineConfig(overrides);

  const pool = scoredProps.filter(p =>
    isStrongProp(p, config) && (config.side_filter === null || p.side === config.side_filter)
  );
  const requiredPoolSize = config.num_tickets * config.games_per_ticket * config.picks_per_game.min;

  if (pool.length < requiredPoolSize) {
    console.warn(`[ticket-assembler] ⚠️ Pool has ${pool.length} strong props, ${requiredPoolSize} needed for ${config.num_tickets} full tickets`);
  }

  const rankedGames = rankGames(pool, order);
  const usedKeys = new Set<string>();
  const random = createSeededRandom(seed);
  const tickets: Ticket[] = [];

  for (let ticketNumber = 1; ticketNumber <= config.num_tickets; ticketNumber++) {
    const available = rankedGames.filter(g => hasEligibleProp(g, usedKeys));
    if (available.length === 0) {
      console.warn(`[ticket-assembler] Pool exhausted after ${tickets.length} tickets`);
      break;
    }

    const ticket = buildTicket(
      ticketNumber,
      available.slice(0, config.games_per_ticket),
      config,
      usedKeys,
      random
    );
    tickets.push(ticket);
    console.log(`[ticket-assembler] Ticket ${ticketNumber}: ${ticket.picks.length} picks across ${ticket.games.length} games, ${ticket.total_odds}x`);
  }

  const missingPicks = tickets.reduce((sum, t) => sum + t.missing_picks, 0);
  const missingGames = tickets.reduce((sum, t) => sum + t.missing_games, 0);
  const short =
    pool.length < requiredPoolSize ||
    tickets.length < config.num_tickets ||
    missingPicks > 0 ||
    missingGames > 0;

  const shortfall: TicketShortfall = {
    code: short ? 'INSUFFICIENT_POOL' : null,
    requested_tickets: config.num_tickets,
    generated_tickets: tickets.length,
    pool_size: pool.length,
    required_pool_size: requiredPoolSize,
    missing_picks: missingPicks,
    missing_games: missingGames,
  };

  return { tickets, seed, shortfall };
}
