// ============================================================================
// TICKET EXPORT
// ============================================================================
// Two views of a ticket for whatever writes it out: a readable summary grouped
// by game, and a bet-slip record with one outcome per pick.
// ============================================================================

import type { ScoredProp, Ticket } from '@/types/props';

const RULE = '='.repeat(60);
const GAME_RULE = '-'.repeat(60);

export interface BetSlipOutcome {
  odds: number;
  isActive: boolean;
  marketId: string | null;
  lineId: string | null;
  statId: string | null;
  player: string;
  stat: string;
  line: number;
  side: 'OVER' | 'UNDER';
}

export interface BetSlip {
  type: 'sports-multi';
  outcomes: BetSlipOutcome[];
  totalOdds: number;
  stake: number;
}

function formatPercent(rate: number): string {
  return `${(rate * 100).toFixed(1)}%`;
}

function pickLines(pick: ScoredProp): string[] {
  const team = pick.team ? ` (${pick.team})` : '';
  return [
    `${pick.player_name}${team}`,
    `  ${pick.stat_category} ${pick.side.toUpperCase()} ${pick.line}`,
    `  Odds: ${pick.offered_odds}x | Score: ${pick.score}`,
    `  Recent: ${pick.recent_hits}/${pick.recent_games} | Historical: ${formatPercent(pick.historical_hit_rate)}`,
    `  Last ${pick.recent_values.length}: ${pick.recent_values.join(', ')}`,
  ];
}

/**
 * Readable ticket text, picks grouped under their game.
 */
export function formatTicketSummary(ticket: Ticket, title = 'TICKET'): string {
  const gameNames = new Map<string, string>();
  for (const pick of ticket.picks) {
    if (!gameNames.has(pick.game_id)) gameNames.set(pick.game_id, pick.game_name ?? pick.game_id);
  }

  const lines = [
    `${title} #${ticket.ticket_number}`,
    RULE,
    `Total Picks: ${ticket.picks.length}`,
    `Total Odds: ${ticket.total_odds}x`,
    `Avg Score: ${ticket.average_score}`,
    `Games: ${ticket.games.map(id => gameNames.get(id) ?? id).join(', ')}`,
  ];
  if (ticket.missing_picks > 0 || ticket.missing_games > 0) {
    lines.push(`Shortfall: ${ticket.missing_picks} picks, ${ticket.missing_games} games`);
  }
  lines.push(RULE);

  for (const gameId of ticket.games) {
    lines.push('', gameNames.get(gameId) ?? gameId, GAME_RULE);
    for (const pick of ticket.picks.filter(p => p.game_id === gameId)) {
      lines.push(...pickLines(pick), '');
    }
  }

  return lines.join('\n');
}

export function toBetSlip(ticket: Ticket): BetSlip {
  return {
    type: 'sports-multi',
    outcomes: ticket.picks.map(pick => ({
      odds: pick.offered_odds,
      isActive: true,
      marketId: pick.market_id ?? null,
      lineId: pick.line_id ?? null,
      statId: pick.stat_id ?? null,
      player: pick.player_name,
      stat: pick.stat_category,
      line: pick.line,
      side: pick.side === 'over' ? 'OVER' : 'UNDER',
    })),
    totalOdds: ticket.total_odds,
    stake: 0,
  };
}
