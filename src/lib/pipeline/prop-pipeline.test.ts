import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { formatISO } from 'date-fns';
import { createInMemoryGameLogSource } from '@/lib/api/game-logs';
import { InvalidConfigurationError } from '@/lib/errors';
import { runPropPipeline } from './prop-pipeline';
import type { GameLogSource, RawGameLog } from '@/types/game-logs';
import type { Prop } from '@/types/props';

const POINTS = [30, 32, 28, 31, 29, 33, 27];
const ASSISTS = [8, 9, 7, 8, 6, 9, 8];

const forwardLogs: RawGameLog[] = POINTS.map((pts, i) => ({
  game_date: `2026-01-${String(20 - i).padStart(2, '0')}`,
  stats: { PTS: pts, REB: 5, AST: ASSISTS[i] },
}));

function reboundLogs(values: number[]): RawGameLog[] {
  return values.map(reb => ({ stats: { PTS: 10, REB: reb, AST: 2 } }));
}

const source = createInMemoryGameLogSource({
  test_forward: forwardLogs,
  rookie: [],
  test_center: reboundLogs([11, 12, 10, 9, 13, 11, 12]),
  test_guard: reboundLogs([2, 3, 2, 3, 2, 3, 2]),
  test_skater: [3, 4, 3, 2, 4, 3, 5].map(shots => ({ stats: { goals: 0, assists: 1, points: 1, shots } })),
});

function makeProp(overrides: Partial<Prop> = {}): Prop {
  return {
    player_id: 'test_forward',
    player_name: 'Test Forward',
    position: 'PG',
    sport: 'nba',
    game_id: 'hom-vs-awy',
    stat_category: 'points',
    line: 28.5,
    side: 'over',
    offered_odds: 1.85,
    ...overrides,
  };
}

const singlePick = { num_tickets: 1, games_per_ticket: 1, picks_per_game: 1 };

describe('runPropPipeline', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('scores props, reports skips and assembles tickets', async () => {
    const now = new Date(2026, 0, 21, 9, 30);
    const result = await runPropPipeline({
      props: [
        makeProp(),
        makeProp({ stat_category: 'goals', line: 0.5 }),
        makeProp({ player_id: 'ghost', player_name: 'Ghost' }),
        makeProp({ player_id: 'rookie', player_name: 'Rookie' }),
      ],
      source,
      config: singlePick,
      seed: 11,
      now,
    });

    expect(result.scored.map(p => [p.player_id, p.score])).toEqual([
      ['test_forward', 78.5],
      ['rookie', 0],
    ]);
    expect(result.skipped.map(s => [s.prop.player_id, s.reason])).toEqual([
      ['test_forward', 'UNSUPPORTED_STAT'],
      ['ghost', 'PLAYER_NOT_FOUND'],
      ['rookie', 'INSUFFICIENT_HISTORY'],
    ]);
    expect(result.skipped[1].message).toBe('No game-log record for player "ghost"');
    expect(result.skipped[2].message).toBe('No points history for Rookie');

    expect(result.positional).toBeNull();
    expect(result.batch.seed).toBe(11);
    expect(result.batch.tickets).toHaveLength(1);
    expect(result.batch.tickets[0].picks.map(p => [p.player_id, p.stat_category, p.side])).toEqual([
      ['test_forward', 'points', 'over'],
    ]);
    expect(result.batch.shortfall.code).toBeNull();
    expect(result.generated_at).toBe(formatISO(now));
  });

  it('builds unders tickets from under props only', async () => {
    const result = await runPropPipeline({
      props: [makeProp(), makeProp({ side: 'under', line: 35.5 })],
      source,
      config: singlePick,
      seed: 3,
      strategy: 'unders',
    });

    const [under] = result.scored.filter(p => p.side === 'under');
    expect(under.score).toBe(95.7);
    expect(result.batch.tickets[0].picks).toEqual([under]);
  });

  it('limits the positional strategy to positional props', async () => {
    const result = await runPropPipeline({
      props: [makeProp(), makeProp({ stat_category: 'assists', line: 5.5 })],
      source,
      config: singlePick,
      seed: 5,
      strategy: 'positional',
    });

    expect(result.positional?.positional.map(p => p.stat_category)).toEqual(['assists']);
    expect(result.batch.tickets[0].picks.map(p => p.stat_category)).toEqual(['assists']);
  });

  it('draws positional picks by position priority before score', async () => {
    const props = [
      makeProp({ player_id: 'test_guard', player_name: 'Test Guard', position: 'SG', stat_category: 'rebounds', line: 4.5, side: 'under' }),
      makeProp({ player_id: 'test_center', player_name: 'Test Center', position: 'C', stat_category: 'rebounds', line: 9.5 }),
    ];

    const standard = await runPropPipeline({ props, source, config: singlePick, seed: 6 });
    const [guard, center] = standard.scored;
    expect(guard.score).toBeGreaterThan(center.score);
    expect(standard.batch.tickets[0].picks.map(p => p.player_id)).toEqual(['test_guard']);

    const positional = await runPropPipeline({ props, source, config: singlePick, seed: 6, strategy: 'positional' });
    expect(positional.positional?.positional.map(p => [p.player_id, p.position_priority])).toEqual([
      ['test_center', 1],
      ['test_guard', 4],
    ]);
    expect(positional.batch.tickets[0].picks.map(p => p.player_id)).toEqual(['test_center']);
  });

  it('builds nhl tickets of three picks per game', async () => {
    const result = await runPropPipeline({
      props: [makeProp({ player_id: 'test_skater', player_name: 'Test Skater', sport: 'nhl', position: 'C', stat_category: 'shots_on_goal', line: 2.5 })],
      source,
      seed: 9,
      strategy: 'nhl',
    });

    expect(result.scored[0].score).toBe(83.9);
    expect(result.batch.tickets).toHaveLength(1);
    expect(result.batch.tickets[0].target_picks).toBe(3);
    expect(result.batch.tickets[0].missing_games).toBe(8);
    expect(result.batch.shortfall.code).toBe('INSUFFICIENT_POOL');
  });

  it('skips a prop whose source request fails and keeps going', async () => {
    const flaky: GameLogSource = {
      async fetchGameLogs(playerId, query) {
        if (playerId === 'flaky') throw new Error('request timed out');
        return source.fetchGameLogs(playerId, query);
      },
    };

    const result = await runPropPipeline({
      props: [makeProp({ player_id: 'flaky', player_name: 'Flaky' }), makeProp()],
      source: flaky,
      config: singlePick,
      seed: 8,
    });

    expect(result.skipped).toEqual([
      { prop: makeProp({ player_id: 'flaky', player_name: 'Flaky' }), reason: 'SOURCE_ERROR', message: 'request timed out' },
    ]);
    expect(result.scored.map(p => p.player_id)).toEqual(['test_forward']);
  });

  it('rejects a non-integer seed before scoring', async () => {
    await expect(
      runPropPipeline({ props: [makeProp()], source, seed: 0.5 })
    ).rejects.toThrow('seed must be an integer (got 0.5)');
  });

  it('rejects an invalid configuration before reading any logs', async () => {
    const fetchSpy = vi.spyOn(source, 'fetchGameLogs');

    await expect(
      runPropPipeline({ props: [makeProp()], source, config: { score_threshold: 120 }, seed: 1 })
    ).rejects.toBeInstanceOf(InvalidConfigurationError);
    expect(fetchSpy).not.toHaveBeenCalled();
  });
});
