import { buildRosterConstruction } from '../../domain/attribution';
import { buildLeagueRosterConstruction } from '../../domain/reports';
import { SeasonDataService } from '../league-context/season-data.service';
import { SeasonData, requireRoster, rosterIds } from '../league-context/league-context.model';
import { analyzeOwnership } from '../ownership/ownership-analysis';
import {
  LeagueConstruction,
  TeamConstruction,
  nameChampion,
  nameConstruction,
} from './roster-construction.model';

/**
 * Where each roster's points came from: draft, trade, waiver or free agency.
 */
export class RosterConstructionService {
  constructor(private readonly seasonData: SeasonDataService) {}

  async getLeagueConstruction(leagueId: string, weeks: number, signal?: AbortSignal): Promise<LeagueConstruction> {
    const season = await this.loadSeason(leagueId, weeks, signal);
    const { intervals } = analyzeOwnership(season);
    const { context } = season;

    const teams = rosterIds(context).map((rosterId) => buildRosterConstruction(rosterId, intervals));
    const league = buildLeagueRosterConstruction(teams);

    return {
      leagueId,
      leagueName: context.league.name,
      weeksAnalyzed: weeks,
      teams: league.teams.map((team) => nameConstruction(context, team)),
      averagePercentages: league.averagePercentages,
      bestDrafter: nameChampion(context, league.bestDrafter),
      mostActiveTrader: nameChampion(context, league.mostActiveTrader),
      waiverKing: nameChampion(context, league.waiverKing),
    };
  }

  async getTeamConstruction(
    leagueId: string,
    rosterId: number,
    weeks: number,
    signal?: AbortSignal
  ): Promise<TeamConstruction> {
    const season = await this.loadSeason(leagueId, weeks, signal);
    requireRoster(season.context, rosterId);

    const { intervals } = analyzeOwnership(season);
    return nameConstruction(season.context, buildRosterConstruction(rosterId, intervals));
  }

  private loadSeason(leagueId: string, weeks: number, signal?: AbortSignal): Promise<SeasonData> {
    return this.seasonData.loadSeason(leagueId, weeks, { signal, includeTransactions: true });
  }
}
