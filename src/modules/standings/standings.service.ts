import { buildStandings } from '../../domain/reports';
import { SeasonDataService } from '../league-context/season-data.service';
import { rosterIds, teamName } from '../league-context/league-context.model';
import { leagueWeeklyRecords } from '../luck/luck.service';
import { TeamStanding } from './standings.model';

/**
 * Head-to-head standings computed from the weekly matchup snapshots.
 */
export class StandingsService {
  constructor(private readonly seasonData: SeasonDataService) {}

  async getStandings(leagueId: string, weeks: number, signal?: AbortSignal): Promise<TeamStanding[]> {
    const season = await this.seasonData.loadSeason(leagueId, weeks, { signal });
    const standings = buildStandings(rosterIds(season.context), leagueWeeklyRecords(season));

    return standings.map((standing) => ({
      ...standing,
      teamName: teamName(season.context, standing.rosterId),
    }));
  }
}
