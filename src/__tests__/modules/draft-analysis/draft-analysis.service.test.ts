import { DraftAnalysisService } from '../../../modules/draft-analysis/draft-analysis.service';
import { ErrorCode } from '../../../utils/exceptions';
import { FakeLeagueData } from '../../helpers/fake-league-feed';
import { seasonDataFor, twoTeamLeague } from '../../helpers/league-scenario';

function createService(data: FakeLeagueData) {
  const { feed, seasonData } = seasonDataFor(data);
  return { feed, service: new DraftAnalysisService(feed, seasonData) };
}

describe('DraftAnalysisService', () => {
  it('grades the first draft and skips empty picks', async () => {
    const { feed, service } = createService(twoTeamLeague());

    const report = await service.getDraftAnalysis('1001', 2);

    expect(feed.calls).toContain('picks:d-1');
    expect(report.totalPicks).toBe(4);
    expect(report.leagueAveragePointsPerPick).toBe(27.5);
    expect(report.bestOverallPick.playerName).toBe('Quinn Alpha');
    expect(report.teamGrades.map((grade) => [grade.rosterId, grade.teamName, grade.averagePointsPerPick])).toEqual([
      [1, 'Casey Crushers', 29.5],
      [2, 'jordan', 25.5],
    ]);
  });

  it('reports a league without a draft as unavailable', async () => {
    const { feed, service } = createService(twoTeamLeague({ drafts: [] }));

    await expect(service.getDraftAnalysis('1001', 2)).rejects.toMatchObject({
      statusCode: 404,
      errorCode: ErrorCode.DRAFT_UNAVAILABLE,
      message: 'No draft found for this league',
    });
    expect(feed.calls.some((call) => call.startsWith('picks'))).toBe(false);
  });

  it('reports a draft without picks as unavailable', async () => {
    const { service } = createService(twoTeamLeague({ picks: [] }));

    await expect(service.getDraftAnalysis('1001', 2)).rejects.toMatchObject({
      errorCode: ErrorCode.DRAFT_UNAVAILABLE,
      message: 'No draft picks found for draft d-1',
    });
  });
});
