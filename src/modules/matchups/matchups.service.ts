import {
  DEFAULT_AWARD_PAYOUT,
  Matchup,
  WeeklyAward,
  buildHeadToHead,
  buildSeasonAwards,
  buildTeamPerformance,
  buildWeekMatchups,
  findCloseGames,
  weeklyHighLow,
} from '../../domain/reports';
import { analyzeWeeklyLuck } from '../../domain/luck';
import { LeagueErrors, ValidationException } from '../../utils/exceptions';
import { SeasonDataService } from '../league-context/season-data.service';
import { SeasonData, requireRoster, rosterIds, teamName } from '../league-context/league-context.model';
import { leagueWeeklyRecords } from '../luck/luck.service';
import {
  CloseGames,
  LeagueMatchups,
  NamedAward,
  NamedHeadToHead,
  NamedPerformance,
  NamedSeasonAwards,
  nameAward,
  nameMatchup,
  namePerformance,
} from './matchups.model';

function seasonMatchups(season: SeasonData): Matchup[] {
  const matchups: Matchup[] = [];
  for (let week = 1; week <= season.weeks; week++) {
    matchups.push(...buildWeekMatchups(week, season.snapshotsByWeek.get(week) ?? []));
  }
  return matchups;
}

/**
 * Head-to-head results: weekly matchups, close games, team performance and
 * the weekly high/low score awards.
 */
export class MatchupsService {
  constructor(
    private readonly seasonData: SeasonDataService,
    private readonly payoutPerAward = DEFAULT_AWARD_PAYOUT
  ) {}

  async getMatchups(
    leagueId: string,
    weeks: number,
    week: number | undefined,
    signal?: AbortSignal
  ): Promise<LeagueMatchups> {
    if (week !== undefined) {
      const { context, snapshots } = await this.seasonData.loadWeek(leagueId, week, signal);
      return {
        leagueId,
        weeksAnalyzed: 1,
        matchups: buildWeekMatchups(week, snapshots).map((matchup) => nameMatchup(context, matchup)),
      };
    }

    const season = await this.seasonData.loadSeason(leagueId, weeks, { signal });
    return {
      leagueId,
      weeksAnalyzed: weeks,
      matchups: seasonMatchups(season).map((matchup) => nameMatchup(season.context, matchup)),
    };
  }

  async getCloseGames(leagueId: string, weeks: number, threshold: number, signal?: AbortSignal): Promise<CloseGames> {
    const season = await this.seasonData.loadSeason(leagueId, weeks, { signal });
    return {
      leagueId,
      weeksAnalyzed: weeks,
      threshold,
      games: findCloseGames(seasonMatchups(season), threshold).map((game) => nameMatchup(season.context, game)),
    };
  }

  async getTeamPerformance(
    leagueId: string,
    rosterId: number,
    weeks: number,
    signal?: AbortSignal
  ): Promise<NamedPerformance> {
    const season = await this.seasonData.loadSeason(leagueId, weeks, { signal });
    requireRoster(season.context, rosterId);

    return namePerformance(season.context, buildTeamPerformance(rosterId, leagueWeeklyRecords(season)));
  }

  /**
   * @throws ValidationException when both ids name the same roster
   */
  async getHeadToHead(
    leagueId: string,
    rosterId: number,
    opponentId: number,
    weeks: number,
    signal?: AbortSignal
  ): Promise<NamedHeadToHead> {
    const season = await this.seasonData.loadSeason(leagueId, weeks, { signal });
    const { context } = season;
    if (rosterId === opponentId) {
      throw new ValidationException('opponentId must differ from rosterId');
    }
    requireRoster(context, rosterId);
    requireRoster(context, opponentId);

    return {
      ...buildHeadToHead(rosterId, opponentId, leagueWeeklyRecords(season)),
      teamName: teamName(context, rosterId),
      opponentTeamName: teamName(context, opponentId),
    };
  }

  /**
   * @throws NotFoundException (NO_MATCHUPS) when nobody played that week
   */
  async getWeekAwards(leagueId: string, week: number, signal?: AbortSignal): Promise<NamedAward> {
    const { context, snapshots } = await this.seasonData.loadWeek(leagueId, week, signal);
    const award = weeklyHighLow(week, analyzeWeeklyLuck(week, snapshots));
    if (!award) {
      throw LeagueErrors.noMatchups(week);
    }
    return nameAward(context, award);
  }

  async getSeasonAwards(leagueId: string, weeks: number, signal?: AbortSignal): Promise<NamedSeasonAwards> {
    const season = await this.seasonData.loadSeason(leagueId, weeks, { signal });
    const { context } = season;
    const records = leagueWeeklyRecords(season);

    const awards: WeeklyAward[] = [];
    for (let week = 1; week <= weeks; week++) {
      const award = weeklyHighLow(week, records);
      if (award) awards.push(award);
    }

    const report = buildSeasonAwards(rosterIds(context), awards, this.payoutPerAward);
    return {
      ...report,
      leagueId,
      weeks: report.weeks.map((award) => nameAward(context, award)),
      teams: report.teams.map((team) => ({ ...team, teamName: teamName(context, team.rosterId) })),
    };
  }
}
