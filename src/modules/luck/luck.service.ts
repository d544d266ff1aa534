import {
  WeeklyLuckRecord,
  analyzeWeeklyLuck,
  buildLuckReport,
  rollUpLeagueLuck,
} from '../../domain/luck';
import { SeasonDataService } from '../league-context/season-data.service';
import { SeasonData, requireRoster, rosterIds } from '../league-context/league-context.model';
import { LeagueLuckReport, TeamLuck, WeekLuck, nameLuckRecord, nameLuckReport } from './luck.model';

/**
 * Weekly luck records for every paired team-week of the season.
 */
export function leagueWeeklyRecords(season: SeasonData): WeeklyLuckRecord[] {
  const records: WeeklyLuckRecord[] = [];
  for (let week = 1; week <= season.weeks; week++) {
    records.push(...analyzeWeeklyLuck(week, season.snapshotsByWeek.get(week) ?? []));
  }
  return records;
}

/**
 * Schedule luck: how each team's record compares with how it scored
 * against the whole league.
 */
export class LuckService {
  constructor(private readonly seasonData: SeasonDataService) {}

  async getLeagueLuck(leagueId: string, weeks: number, signal?: AbortSignal): Promise<LeagueLuckReport> {
    const season = await this.seasonData.loadSeason(leagueId, weeks, { signal });
    const { context } = season;
    const records = leagueWeeklyRecords(season);

    const league = rollUpLeagueLuck(rosterIds(context).map((rosterId) => buildLuckReport(rosterId, records)));

    return {
      leagueId,
      leagueName: context.league.name,
      weeksAnalyzed: weeks,
      teams: league.teams.map((team) => nameLuckReport(context, team)),
      luckiest: league.luckiest ? nameLuckReport(context, league.luckiest) : null,
      unluckiest: league.unluckiest ? nameLuckReport(context, league.unluckiest) : null,
    };
  }

  /**
   * One team's report, with its schedule ranked against the rest of the league.
   */
  async getTeamLuck(leagueId: string, rosterId: number, weeks: number, signal?: AbortSignal): Promise<TeamLuck> {
    const season = await this.seasonData.loadSeason(leagueId, weeks, { signal });
    const { context } = season;
    requireRoster(context, rosterId);

    const records = leagueWeeklyRecords(season);
    const league = rollUpLeagueLuck(rosterIds(context).map((id) => buildLuckReport(id, records)));
    const team = league.teams.find((report) => report.rosterId === rosterId) ?? buildLuckReport(rosterId, records);

    return nameLuckReport(context, team);
  }

  async getWeekLuck(leagueId: string, week: number, signal?: AbortSignal): Promise<WeekLuck> {
    const { context, snapshots } = await this.seasonData.loadWeek(leagueId, week, signal);
    const records = analyzeWeeklyLuck(week, snapshots);

    return {
      leagueId,
      week,
      leagueMedian: records[0]?.leagueMedian ?? 0,
      records: records.map((record) => nameLuckRecord(context, record)),
    };
  }
}
