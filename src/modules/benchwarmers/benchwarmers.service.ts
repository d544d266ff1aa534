import { buildLeagueBenchReport, buildTeamBenchReport } from '../../domain/reports';
import { SeasonDataService } from '../league-context/season-data.service';
import { allSnapshots, rosterIds, teamName } from '../league-context/league-context.model';
import { LeagueBench, nameBenchPerformance, nameTeamBench } from './benchwarmers.model';

/**
 * Points left on the bench by players who could have filled a starting slot.
 */
export class BenchwarmersService {
  constructor(private readonly seasonData: SeasonDataService) {}

  async getLeagueBenchwarmers(leagueId: string, weeks: number, signal?: AbortSignal): Promise<LeagueBench> {
    const season = await this.seasonData.loadSeason(leagueId, weeks, { signal });
    const { context } = season;
    const snapshots = allSnapshots(season);

    const teams = rosterIds(context).map((rosterId) =>
      buildTeamBenchReport(rosterId, snapshots, context.template, context.directory, weeks)
    );
    const league = buildLeagueBenchReport(teams);

    return {
      leagueId,
      leagueName: context.league.name,
      weeksAnalyzed: weeks,
      teams: league.teams.map((team) => nameTeamBench(context, team)),
      biggestBenchingMistakes: league.biggestBenchingMistakes.map((p) => nameBenchPerformance(context, p)),
      champion: league.champion
        ? { ...league.champion, teamName: teamName(context, league.champion.rosterId) }
        : null,
    };
  }
}
