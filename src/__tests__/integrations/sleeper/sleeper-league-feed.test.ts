import { SleeperApiClient } from '../../../integrations/sleeper/sleeper-api-client';
import {
  SleeperLeagueFeed,
  toPlayerInfo,
  toSnapshot,
  toTransactionEvent,
} from '../../../integrations/sleeper/sleeper-league-feed';
import { RequestAbortedException } from '../../../utils/exceptions';

function createFeed(routes: Record<string, unknown>, ttlMs = 60_000) {
  let clock = 1_000;
  const get = jest.fn().mockImplementation((path: string) => {
    if (!(path in routes)) return Promise.reject(new Error(`unexpected path ${path}`));
    return Promise.resolve({ data: routes[path] });
  });
  const client = new SleeperApiClient({
    baseUrl: 'http://sleeper.test/v1',
    timeoutMs: 1000,
    maxRetries: 0,
    baseDelayMs: 0,
    http: { get },
  });
  const feed = new SleeperLeagueFeed(client, { playersCacheTtlMs: ttlMs, now: () => clock });
  return {
    feed,
    get,
    advance: (ms: number) => {
      clock += ms;
    },
  };
}

const PLAYERS = {
  '4046': { full_name: 'Pat Quarterback', position: 'QB', team: 'KC' },
  BUF: { first_name: 'Buffalo', last_name: 'Bills', position: 'DEF', team: 'BUF' },
};

describe('payload mapping', () => {
  it('names team defenses from first and last name', () => {
    expect(toPlayerInfo('BUF', { first_name: 'Buffalo', last_name: 'Bills', position: 'DEF' })).toEqual({
      playerId: 'BUF',
      name: 'Buffalo Bills',
      position: 'DEF',
      team: 'FA',
    });
  });

  it('falls back to the id and unknown position', () => {
    expect(toPlayerInfo('9999', {})).toEqual({
      playerId: '9999',
      name: '9999',
      position: 'Unknown',
      team: 'FA',
    });
  });

  it('drops empty starter slots from a matchup', () => {
    const snapshot = toSnapshot(
      {
        roster_id: 2,
        matchup_id: null,
        points: null,
        starters: ['a', '0', 'b'],
        players: ['a', 'b', 'c'],
        players_points: { a: 10, b: 4.5 },
      },
      6
    );

    expect(snapshot).toEqual({
      rosterId: 2,
      week: 6,
      matchupId: null,
      points: 0,
      starters: ['a', 'b'],
      players: ['a', 'b', 'c'],
      pointsByPlayer: { a: 10, b: 4.5 },
    });
    expect(Object.isFrozen(snapshot)).toBe(true);
  });

  it('uses the transaction leg as its week', () => {
    const event = toTransactionEvent(
      {
        transaction_id: 't1',
        type: 'waiver',
        status: 'complete',
        roster_ids: [3],
        adds: { p1: 3 },
        drops: null,
        settings: { waiver_bid: 17 },
        metadata: { notes: 'ok' },
        leg: 5,
      },
      4,
      2
    );

    expect(event).toEqual({
      transactionId: 't1',
      week: 5,
      type: 'waiver',
      status: 'complete',
      rosterIds: [3],
      adds: { p1: 3 },
      drops: {},
      draftPicks: [],
      waiverBid: 17,
      notes: 'ok',
      created: null,
      sequence: 2,
    });
  });
});

describe('SleeperLeagueFeed', () => {
  it('maps league settings', async () => {
    const { feed } = createFeed({
      '/league/1001': {
        league_id: '1001',
        name: 'Test League',
        season: '2024',
        total_rosters: 10,
        roster_positions: ['QB', 'RB', 'BN'],
        settings: { waiver_budget: 0 },
      },
    });

    await expect(feed.getLeague('1001')).resolves.toEqual({
      leagueId: '1001',
      name: 'Test League',
      season: '2024',
      rosterPositions: ['QB', 'RB', 'BN'],
      waiverBudget: 0,
      totalRosters: 10,
    });
  });

  it('sorts rosters and drops empty player ids', async () => {
    const { feed } = createFeed({
      '/league/1001/rosters': [
        { roster_id: 2, owner_id: 'u2', players: ['a', ''] },
        { roster_id: 1, owner_id: null, players: null },
      ],
    });

    await expect(feed.getRosters('1001')).resolves.toEqual([
      { rosterId: 1, ownerId: null, players: [] },
      { rosterId: 2, ownerId: 'u2', players: ['a'] },
    ]);
  });

  it('treats a blank team name as missing', async () => {
    const { feed } = createFeed({
      '/league/1001/users': [
        { user_id: 'u1', display_name: 'Casey', metadata: { team_name: '' } },
        { user_id: 'u2', metadata: { team_name: 'Gridiron Gang' } },
      ],
    });

    await expect(feed.getUsers('1001')).resolves.toEqual([
      { userId: 'u1', displayName: 'Casey', teamName: null },
      { userId: 'u2', displayName: 'u2', teamName: 'Gridiron Gang' },
    ]);
  });

  it('numbers transactions in feed order', async () => {
    const { feed } = createFeed({
      '/league/1001/transactions/3': [
        { transaction_id: 'a', type: 'free_agent', status: 'complete', adds: { p1: 1 } },
        { transaction_id: 'b', type: 'free_agent', status: 'complete', drops: { p1: 1 } },
      ],
    });

    const events = await feed.getTransactions('1001', 3);

    expect(events.map((e) => [e.transactionId, e.week, e.sequence])).toEqual([
      ['a', 3, 0],
      ['b', 3, 1],
    ]);
  });

  it('maps drafts and their picks', async () => {
    const { feed } = createFeed({
      '/league/1001/drafts': [{ draft_id: 'd-1', season: '2024', status: 'complete' }],
      '/draft/d-1/picks': [{ pick_no: 1, round: 1, draft_slot: 1, roster_id: 4, player_id: '' }],
    });

    await expect(feed.getDrafts('1001')).resolves.toEqual([
      { draftId: 'd-1', season: '2024', status: 'complete' },
    ]);
    await expect(feed.getDraftPicks('d-1')).resolves.toEqual([
      { pickNumber: 1, round: 1, pickInRound: 1, rosterId: 4, playerId: null },
    ]);
  });

  describe('player directory cache', () => {
    it('serves one download until the TTL runs out', async () => {
      const { feed, get, advance } = createFeed({ '/players/nfl': PLAYERS }, 1_000);

      const first = await feed.getPlayers();
      advance(999);
      const second = await feed.getPlayers();

      expect(second).toBe(first);
      expect(get).toHaveBeenCalledTimes(1);
      expect(first.get('BUF')?.name).toBe('Buffalo Bills');

      advance(1);
      await feed.getPlayers();
      expect(get).toHaveBeenCalledTimes(2);
    });

    it('shares one download between concurrent callers', async () => {
      const { feed, get } = createFeed({ '/players/nfl': PLAYERS });

      const [a, b] = await Promise.all([feed.getPlayers(), feed.getPlayers()]);

      expect(a).toBe(b);
      expect(get).toHaveBeenCalledTimes(1);
    });

    it('lets one caller give up without cancelling the download for others', async () => {
      const { feed, get } = createFeed({ '/players/nfl': PLAYERS });
      const controller = new AbortController();

      const abandoned = feed.getPlayers(controller.signal);
      const kept = feed.getPlayers();
      controller.abort();

      await expect(abandoned).rejects.toBeInstanceOf(RequestAbortedException);
      const directory = await kept;
      expect(directory.size).toBe(2);
      expect(get).toHaveBeenCalledTimes(1);
    });

    it('refuses an already-aborted caller before downloading', async () => {
      const { feed, get } = createFeed({ '/players/nfl': PLAYERS });
      const controller = new AbortController();
      controller.abort();

      await expect(feed.getPlayers(controller.signal)).rejects.toBeInstanceOf(RequestAbortedException);
      expect(get).not.toHaveBeenCalled();
    });
  });
});
