import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { parsePropListing, playerKey } from './prop-listing-parser';

const listing = {
  'home-vs-away': {
    game_name: 'Home vs Away',
    props: [
      {
        name: 'Nikola Jokić',
        team: 'HOM',
        position: 'C',
        props: {
          points_rebounds: {
            marketId: 'm1',
            swishStatId: 7,
            swishStatName: 'Points + Rebounds',
            allLines: [{ line: 40.5, lineId: 'l1', overOdds: 1.87, underOdds: 1.93 }],
          },
          dunks: { swishStatName: 'Dunks', allLines: [] },
          assists: { allLines: [{ line: 'x' }] },
        },
      },
      { team: 'AWY' },
    ],
  },
  'bad-game': { game_name: 'Bad' },
};

describe('parsePropListing', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
  });
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('emits an over and an under prop per line', () => {
    const result = parsePropListing(listing, 'nba');

    expect(result.props).toEqual([
      {
        player_id: 'nikola_jokic',
        player_name: 'Nikola Jokić',
        team: 'HOM',
        position: 'C',
        sport: 'nba',
        game_id: 'home-vs-away',
        game_name: 'Home vs Away',
        stat_category: 'points_rebounds',
        line: 40.5,
        side: 'over',
        offered_odds: 1.87,
        market_id: 'm1',
        line_id: 'l1',
        stat_id: '7',
      },
      {
        player_id: 'nikola_jokic',
        player_name: 'Nikola Jokić',
        team: 'HOM',
        position: 'C',
        sport: 'nba',
        game_id: 'home-vs-away',
        game_name: 'Home vs Away',
        stat_category: 'points_rebounds',
        line: 40.5,
        side: 'under',
        offered_odds: 1.93,
        market_id: 'm1',
        line_id: 'l1',
        stat_id: '7',
      },
    ]);
  });

  it('collects malformed entries instead of throwing', () => {
    const result = parsePropListing(listing, 'nba');

    expect(result.errors).toEqual([
      'Nikola Jokić: unknown stat "Dunks"',
      'Nikola Jokić: invalid line for assists',
      'Home vs Away: player entry without a name',
      'Game "bad-game" has no player list',
    ]);
    expect(result.summary).toEqual({ games: 1, players: 1, props: 2, failed: 4 });
  });

  it('skips a side without odds', () => {
    const result = parsePropListing({
      g: {
        props: [{ name: 'Test Winger', props: { Shots: { allLines: [{ line: 2.5, overOdds: 1.7 }] } } }],
      },
    }, 'nhl');

    expect(result.props).toHaveLength(1);
    expect(result.props[0]).toMatchObject({
      player_id: 'test_winger',
      game_name: 'g',
      stat_category: 'shots_on_goal',
      side: 'over',
      sport: 'nhl',
    });
    expect(result.props[0].line_id).toBeUndefined();
  });

  it('rejects a listing that is not an object', () => {
    expect(parsePropListing([], 'nba')).toEqual({
      props: [],
      errors: ['Listing is not an object keyed by game'],
      summary: { games: 0, players: 0, props: 0, failed: 1 },
    });
  });
});

describe('playerKey', () => {
  it('strips accents and punctuation', () => {
    expect(playerKey("De'Aaron Fox Jr.")).toBe('deaaron_fox_jr');
    expect(playerKey('Luka Dončić')).toBe('luka_doncic');
  });
});
