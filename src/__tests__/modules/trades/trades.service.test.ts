import { TradesService } from '../../../modules/trades/trades.service';
import { ErrorCode } from '../../../utils/exceptions';
import { makeEvent } from '../../helpers/fixtures';
import { seasonDataFor, twoTeamLeague } from '../../helpers/league-scenario';

/**
 * Adds a week-2 trade to the two-team league: Quinn Beta (10 points in
 * week 2) goes to team 1, Rudy Alpha (4) to team 2.
 */
function tradingLeague() {
  const base = twoTeamLeague();
  return twoTeamLeague({
    transactions: [
      ...(base.transactions ?? []),
      makeEvent({
        week: 2,
        type: 'trade',
        rosterIds: [1, 2],
        adds: { qb2: 1, rb1: 2 },
        drops: { qb2: 2, rb1: 1 },
        sequence: 1,
      }),
    ],
  });
}

describe('TradesService', () => {
  const createService = () => new TradesService(seasonDataFor(tradingLeague()).seasonData);

  it('summarises league transactions', async () => {
    const summary = await createService().getTransactionSummary('1001', 2);

    expect(summary.total).toBe(2);
    expect(summary.byType).toEqual({ trade: 1, waiver: 1, free_agent: 0, commissioner: 0 });
    expect(summary.byWeek).toEqual([
      { week: 1, count: 1 },
      { week: 2, count: 1 },
    ]);
    expect(summary.byRoster[0]).toEqual({
      rosterId: 1,
      teamName: 'Casey Crushers',
      total: 2,
      trades: 1,
      waivers: 1,
      freeAgents: 0,
      commissioner: 0,
    });
  });

  it('ranks the most active teams', async () => {
    const report = await createService().getMostActiveTeams('1001', 2);

    expect(report.teams.map((t) => [t.teamName, t.total])).toEqual([
      ['Casey Crushers', 2],
      ['jordan', 1],
    ]);
  });

  it('values a trade by the points each side received', async () => {
    const { trades } = await createService().getTrades('1001', 2);

    expect(trades).toHaveLength(1);
    expect(trades[0].sides.map((s) => [s.teamName, s.assets.map((a) => a.name), s.totalValue])).toEqual([
      ['Casey Crushers', ['Quinn Beta'], 10],
      ['jordan', ['Rudy Alpha'], 4],
    ]);
    expect(trades[0].valueDifference).toBe(6);
    expect(trades[0].winnerRosterId).toBe(1);
  });

  it('splits trade winners from losers', async () => {
    const report = await createService().getTradeWinnersLosers('1001', 2);

    expect(report.winners).toEqual([{ rosterId: 1, teamName: 'Casey Crushers', trades: 1, netValue: 6 }]);
    expect(report.losers).toEqual([{ rosterId: 2, teamName: 'jordan', trades: 1, netValue: -6 }]);
  });

  it('reads roster needs from the current roster and template', async () => {
    const needs = await createService().getRosterNeeds('1001', 1);

    expect(needs.teamName).toBe('Casey Crushers');
    expect(needs.positions.slice(0, 2)).toEqual([
      { position: 'QB', count: 1, startersNeeded: 1, bench: 0, level: 'moderate' },
      { position: 'RB', count: 2, startersNeeded: 1, bench: 1, level: 'moderate' },
    ]);
    expect(needs.topNeed).toBe('QB');
    expect(needs.priority).toBe('balanced');
  });

  it('evaluates a proposed swap with season values', async () => {
    const evaluation = await createService().evaluateTrade(
      '1001',
      { rosterId: 1, gives: ['rb3'], opponentId: 2, receives: ['rb2'] },
      2
    );

    expect(evaluation.roster.teamName).toBe('Casey Crushers');
    expect(evaluation.roster.valueIn).toBe(11.5);
    expect(evaluation.opponent.valueIn).toBe(13.5);
    expect(evaluation.valueDifference).toBe(2);
    expect(evaluation.winnerRosterId).toBeNull();
    expect(evaluation.confidence).toBe('medium');
  });

  it('refuses to trade a player the roster does not hold', async () => {
    await expect(
      createService().evaluateTrade('1001', { rosterId: 1, gives: ['qb2'], opponentId: 2, receives: ['rb2'] }, 2)
    ).rejects.toMatchObject({ statusCode: 400, errorCode: ErrorCode.PLAYER_NOT_ON_ROSTER });
  });
});
