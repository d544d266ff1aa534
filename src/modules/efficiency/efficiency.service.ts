import {
  EfficiencyContext,
  LineupStrategy,
  SeasonEfficiency,
  WeeklyEfficiency,
  analyzeWeeklyEfficiency,
  starterTotalsMatch,
  summarizeSeasonEfficiency,
} from '../../domain/lineup';
import { PlayerSnapshot } from '../../domain/snapshot';
import { biggestMissedStarts, rankEfficiency } from '../../domain/reports';
import { logger } from '../../config/logger.config';
import { SeasonDataService } from '../league-context/season-data.service';
import {
  LeagueContext,
  SeasonData,
  requireRoster,
  rosterIds,
  snapshotFor,
  teamName,
} from '../league-context/league-context.model';
import {
  LeagueEfficiency,
  NamedMissedStart,
  RankedEfficiency,
  TeamSeasonEfficiency,
  WeekEfficiency,
} from './efficiency.model';

/**
 * Lineup efficiency reports: actual vs. best-possible lineup per team-week.
 */
export class EfficiencyService {
  constructor(
    private readonly seasonData: SeasonDataService,
    private readonly strategy: LineupStrategy
  ) {}

  async getLeagueEfficiency(leagueId: string, weeks: number, signal?: AbortSignal): Promise<LeagueEfficiency> {
    const season = await this.seasonData.loadSeason(leagueId, weeks, { signal });
    return {
      leagueId,
      leagueName: season.context.league.name,
      weeksAnalyzed: weeks,
      strategy: this.strategy,
      teams: this.seasonsFor(season),
    };
  }

  async getWeekEfficiency(leagueId: string, week: number, signal?: AbortSignal): Promise<WeekEfficiency> {
    const { context, snapshots } = await this.seasonData.loadWeek(leagueId, week, signal);
    const ctx = this.efficiencyContext(context);

    return {
      leagueId,
      week,
      strategy: this.strategy,
      teams: rosterIds(context).map((rosterId) => ({
        ...this.analyzeWeek(
          context,
          snapshots.find((snapshot) => snapshot.rosterId === rosterId),
          rosterId,
          week,
          ctx
        ),
        teamName: teamName(context, rosterId),
      })),
    };
  }

  async getRosterEfficiency(
    leagueId: string,
    rosterId: number,
    weeks: number,
    signal?: AbortSignal
  ): Promise<TeamSeasonEfficiency> {
    const season = await this.seasonData.loadSeason(leagueId, weeks, { signal });
    requireRoster(season.context, rosterId);
    return this.teamSeason(season, rosterId, this.efficiencyContext(season.context));
  }

  async getRankings(leagueId: string, weeks: number, signal?: AbortSignal): Promise<RankedEfficiency[]> {
    const season = await this.seasonData.loadSeason(leagueId, weeks, { signal });
    return rankEfficiency(this.seasonsFor(season)).map((ranking) => ({
      ...ranking,
      teamName: teamName(season.context, ranking.rosterId),
    }));
  }

  async getMissedStarts(
    leagueId: string,
    weeks: number,
    limit: number,
    signal?: AbortSignal
  ): Promise<NamedMissedStart[]> {
    const season = await this.seasonData.loadSeason(leagueId, weeks, { signal });
    return biggestMissedStarts(this.seasonsFor(season), limit).map((missed) => ({
      ...missed,
      teamName: teamName(season.context, missed.rosterId),
    }));
  }

  private efficiencyContext(context: LeagueContext): EfficiencyContext {
    return { template: context.template, directory: context.directory, strategy: this.strategy };
  }

  private seasonsFor(season: SeasonData): TeamSeasonEfficiency[] {
    const ctx = this.efficiencyContext(season.context);
    return rosterIds(season.context).map((rosterId) => this.teamSeason(season, rosterId, ctx));
  }

  private teamSeason(season: SeasonData, rosterId: number, ctx: EfficiencyContext): TeamSeasonEfficiency {
    const weekly: WeeklyEfficiency[] = [];
    for (let week = 1; week <= season.weeks; week++) {
      weekly.push(this.analyzeWeek(season.context, snapshotFor(season, rosterId, week), rosterId, week, ctx));
    }
    const summary: SeasonEfficiency = summarizeSeasonEfficiency(rosterId, weekly);
    return { ...summary, teamName: teamName(season.context, rosterId), strategy: this.strategy };
  }

  private analyzeWeek(
    context: LeagueContext,
    snapshot: PlayerSnapshot | undefined,
    rosterId: number,
    week: number,
    ctx: EfficiencyContext
  ): WeeklyEfficiency {
    if (snapshot && snapshot.starters.length > 0 && !starterTotalsMatch(snapshot)) {
      logger.warn('Starter points do not add up to the reported score', {
        leagueId: context.league.leagueId,
        rosterId,
        week,
        reported: snapshot.points,
      });
    }
    return analyzeWeeklyEfficiency(rosterId, week, snapshot, ctx);
  }
}
