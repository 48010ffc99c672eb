// ============================================================================
// PROP LISTING PARSER
// ============================================================================
// Parses the scraper's per-game prop listing into Prop records.
// Shape: { [game_slug]: { game_name, props: [{ name, team, position,
//   props: { [stat_key]: { marketId, swishStatId, swishStatName,
//   allLines: [{ line, lineId, overOdds, underOdds }] } } }] } }
// Every line yields an OVER and an UNDER prop when both odds are listed.
// ============================================================================

import { resolveStatCategory } from '@/lib/stats/stat-categories';
import type { Prop, PropSide, Sport, StatCategory } from '@/types/props';

export interface ListingParseResult {
  props: Prop[];
  errors: string[];
  summary: {
    games: number;
    players: number;
    props: number;
    failed: number;
  };
}

interface PlayerContext {
  sport: Sport;
  game_id: string;
  game_name: string;
  player_id: string;
  player_name: string;
  team?: string;
  position?: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function asArray(value: unknown): unknown[] | null {
  return Array.isArray(value) ? value : null;
}

function optionalString(value: unknown): string | undefined {
  if (typeof value === 'string' && value.trim().length > 0) return value.trim();
  if (typeof value === 'number') return String(value);
  return undefined;
}

function finiteNumber(value: unknown): number | null {
  return typeof value === 'number' && Number.isFinite(value) ? value : null;
}

/**
 * Stable player id from a display name.
 * "Nikola Jokić" -> "nikola_jokic"
 */
export function playerKey(name: string): string {
  return name
    .normalize('NFD')
    .replace(/[\u0300-\u036f]/g, '')
    .toLowerCase()
    .replace(/[^a-z0-9\s]/g, '')
    .trim()
    .replace(/\s+/g, '_');
}

function buildProp(
  ctx: PlayerContext,
  market: Record<string, unknown>,
  category: StatCategory,
  line: number,
  lineId: string | undefined,
  side: PropSide,
  odds: number
): Prop {
  const prop: Prop = {
    player_id: ctx.player_id,
    player_name: ctx.player_name,
    sport: ctx.sport,
    game_id: ctx.game_id,
    game_name: ctx.game_name,
    stat_category: category,
    line,
    side,
    offered_odds: odds,
  };

  const marketId = optionalString(market.marketId);
  const statId = optionalString(market.swishStatId);
  if (ctx.team) prop.team = ctx.team;
  if (ctx.position) prop.position = ctx.position;
  if (marketId) prop.market_id = marketId;
  if (lineId) prop.line_id = lineId;
  if (statId) prop.stat_id = statId;
  return prop;
}

function parseMarket(
  ctx: PlayerContext,
  statKey: string,
  market: unknown,
  errors: string[]
): Prop[] {
  if (!isRecord(market)) {
    errors.push(`${ctx.player_name}: market "${statKey}" is not an object`);
    return [];
  }

  const statName = optionalString(market.swishStatName) ?? statKey.replace(/_/g, ' ');
  const category = resolveStatCategory(statName);
  if (!category) {
    errors.push(`${ctx.player_name}: unknown stat "${statName}"`);
    return [];
  }

  const lines = asArray(market.allLines);
  if (lines === null) {
    errors.push(`${ctx.player_name}: no lines for ${statName}`);
    return [];
  }

  const props: Prop[] = [];
  for (const entry of lines) {
    if (!isRecord(entry)) continue;
    const line = finiteNumber(entry.line);
    if (line === null) {
      errors.push(`${ctx.player_name}: invalid line for ${statName}`);
      continue;
    }

    const lineId = optionalString(entry.lineId);
    const overOdds = finiteNumber(entry.overOdds);
    const underOdds = finiteNumber(entry.underOdds);
    if (overOdds !== null) props.push(buildProp(ctx, market, category, line, lineId, 'over', overOdds));
    if (underOdds !== null) props.push(buildProp(ctx, market, category, line, lineId, 'under', underOdds));
  }
  return props;
}

/**
 * Parse a listing object (already JSON-decoded). Malformed entries are
 * reported in `errors` and skipped.
 */
export function parsePropListing(listing: unknown, sport: Sport): ListingParseResult {
  const props: Prop[] = [];
  const errors: string[] = [];
  let games = 0;
  let players = 0;

  if (!isRecord(listing)) {
    return {
      props,
      errors: ['Listing is not an object keyed by game'],
      summary: { games: 0, players: 0, props: 0, failed: 1 },
    };
  }

  for (const [gameSlug, game] of Object.entries(listing)) {
    const roster = isRecord(game) ? asArray(game.props) : null;
    if (!isRecord(game) || roster === null) {
      errors.push(`Game "${gameSlug}" has no player list`);
      continue;
    }
    games++;
    const gameName = optionalString(game.game_name) ?? gameSlug;

    for (const player of roster) {
      const name = isRecord(player) ? optionalString(player.name) : undefined;
      if (!isRecord(player) || !name) {
        errors.push(`${gameName}: player entry without a name`);
        continue;
      }
      const markets = player.props;
      if (!isRecord(markets)) continue;
      players++;

      const ctx: PlayerContext = {
        sport,
        game_id: gameSlug,
        game_name: gameName,
        player_id: playerKey(name),
        player_name: name,
        team: optionalString(player.team),
        position: optionalString(player.position),
      };

      for (const [statKey, market] of Object.entries(markets)) {
        props.push(...parseMarket(ctx, statKey, market, errors));
      }
    }
  }

  console.log(`[prop-listing] Parsed ${props.length} props from ${players} players across ${games} games`);

  return {
    props,
    errors,
    summary: { games, players, props: props.length, failed: errors.length },
  };
}
