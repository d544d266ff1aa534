import { MatchupsService } from '../../../modules/matchups/matchups.service';
import { ErrorCode, ValidationException } from '../../../utils/exceptions';
import { seasonDataFor, twoTeamLeague } from '../../helpers/league-scenario';

describe('MatchupsService', () => {
  const createService = (payout?: number) => new MatchupsService(seasonDataFor(twoTeamLeague()).seasonData, payout);

  it('lists the season matchups with team names', async () => {
    const report = await createService().getMatchups('1001', 2, undefined);

    expect(report.weeksAnalyzed).toBe(2);
    expect(report.matchups[0]).toEqual({
      week: 1,
      matchupId: 1,
      home: { rosterId: 1, points: 30, teamName: 'Casey Crushers' },
      away: { rosterId: 2, points: 32, teamName: 'jordan' },
      margin: 2,
      winnerRosterId: 2,
    });
    expect(report.matchups[1].winnerRosterId).toBe(1);
  });

  it('loads a single week when asked', async () => {
    const report = await createService().getMatchups('1001', 17, 2);

    expect(report.weeksAnalyzed).toBe(1);
    expect(report.matchups.map((m) => [m.week, m.margin])).toEqual([[2, 18]]);
  });

  it('keeps only the close games', async () => {
    const report = await createService().getCloseGames('1001', 2, 10);

    expect(report.threshold).toBe(10);
    expect(report.games.map((g) => g.week)).toEqual([1]);
  });

  it('summarises one team', async () => {
    const team = await createService().getTeamPerformance('1001', 1, 2);

    expect(team.teamName).toBe('Casey Crushers');
    expect(team).toMatchObject({ wins: 1, losses: 1, pointsFor: 67, pointsAgainst: 51, averagePoints: 33.5, consistency: 3.5 });
    expect(team.bestWeek).toMatchObject({ week: 2, points: 37, opponentTeamName: 'jordan' });
    expect(team.worstWeek).toMatchObject({ week: 1, points: 30 });
  });

  it('reports the head-to-head series', async () => {
    const series = await createService().getHeadToHead('1001', 2, 1, 2);

    expect(series.teamName).toBe('jordan');
    expect(series.opponentTeamName).toBe('Casey Crushers');
    expect([series.wins, series.losses, series.ties]).toEqual([1, 1, 0]);
  });

  it('refuses a series against itself', async () => {
    await expect(createService().getHeadToHead('1001', 1, 1, 2)).rejects.toBeInstanceOf(ValidationException);
  });

  it('rejects an unknown roster', async () => {
    await expect(createService().getTeamPerformance('1001', 7, 2)).rejects.toMatchObject({
      errorCode: ErrorCode.ROSTER_NOT_FOUND,
    });
  });

  it('names the weekly high and low scorers', async () => {
    const award = await createService().getWeekAwards('1001', 1);

    expect(award).toEqual({
      week: 1,
      high: { rosterId: 2, points: 32, teamName: 'jordan' },
      low: { rosterId: 1, points: 30, teamName: 'Casey Crushers' },
    });
  });

  it('answers 404 for a week nobody played', async () => {
    await expect(createService().getWeekAwards('1001', 5)).rejects.toMatchObject({
      statusCode: 404,
      errorCode: ErrorCode.NO_MATCHUPS,
    });
  });

  it('settles the season payouts', async () => {
    const awards = await createService(10).getSeasonAwards('1001', 1);

    expect(awards.weeksAnalyzed).toBe(1);
    expect(awards.totalPayoutHigh).toBe(10);
    expect(awards.teams).toEqual([
      { rosterId: 2, teamName: 'jordan', highScores: 1, lowScores: 0, netPayout: 10 },
      { rosterId: 1, teamName: 'Casey Crushers', highScores: 0, lowScores: 1, netPayout: -10 },
    ]);
  });
});
