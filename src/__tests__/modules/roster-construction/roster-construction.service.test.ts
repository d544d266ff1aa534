import { RosterConstructionService } from '../../../modules/roster-construction/roster-construction.service';
import { seasonDataFor, twoTeamLeague } from '../../helpers/league-scenario';

describe('RosterConstructionService', () => {
  const createService = () => new RosterConstructionService(seasonDataFor(twoTeamLeague()).seasonData);

  it('splits a roster by acquisition method', async () => {
    const team = await createService().getTeamConstruction('1001', 1, 2);

    expect(team.teamName).toBe('Casey Crushers');
    expect(team.totalPoints).toBe(86);
    expect(team.breakdown.draft).toEqual({ points: 59, percentage: 68.6, count: 2 });
    expect(team.breakdown.waiver).toEqual({ points: 27, percentage: 31.4, count: 1 });
    expect(team.primarySource).toBe('draft');
    expect(team.draftReliance).toBe('moderate');
  });

  it('averages the league and names the champions', async () => {
    const league = await createService().getLeagueConstruction('1001', 2);

    expect(league.averagePercentages).toEqual({ draft: 84.3, trade: 0, waiver: 15.7, free_agent: 0 });
    expect(league.bestDrafter).toEqual({ rosterId: 2, value: 100, teamName: 'jordan' });
    expect(league.waiverKing).toEqual({ rosterId: 1, value: 27, teamName: 'Casey Crushers' });
  });
});
