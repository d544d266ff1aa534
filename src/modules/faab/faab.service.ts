import {
  OwnerFaabPerformance,
  PlayerLifecycle,
  buildOwnerFaabPerformance,
  buildPlayerLifecycle,
} from '../../domain/attribution';
import { buildLeagueFaabReport } from '../../domain/reports';
import { LeagueErrors } from '../../utils/exceptions';
import { SeasonDataService } from '../league-context/season-data.service';
import { SeasonData, requireRoster, rosterIds } from '../league-context/league-context.model';
import { OwnershipAnalysis, analyzeOwnership, intervalsByPlayer } from '../ownership/ownership-analysis';
import { nameInterval } from '../ownership/ownership.model';
import {
  LeagueFaab,
  OwnerFaab,
  PlayerLifecycleView,
  nameLifecycle,
  nameOwnerFaab,
} from './faab.model';

/**
 * FAAB spending, returns and player lifecycles, built on the replayed
 * ownership timeline.
 */
export class FaabService {
  constructor(private readonly seasonData: SeasonDataService) {}

  async getLeagueFaab(leagueId: string, weeks: number, signal?: AbortSignal): Promise<LeagueFaab> {
    const season = await this.loadSeason(leagueId, weeks, signal);
    const analysis = analyzeOwnership(season);
    const { context } = season;

    const owners = this.ownersFor(season, analysis);
    const lifecycles = this.lifecyclesFor(season, analysis);
    const report = buildLeagueFaabReport(owners, lifecycles);

    return {
      leagueId,
      leagueName: context.league.name,
      weeksAnalyzed: weeks,
      budget: context.faabBudget,
      totalSpent: report.totalSpent,
      ownerRankings: report.ownerRankings.map((owner) => ({
        ...nameOwnerFaab(context, owner),
        rank: owner.rank,
      })),
      bestValuePickups: report.bestValuePickups.map((interval) => nameInterval(context, interval)),
      worstValuePickups: report.worstValuePickups.map((interval) => nameInterval(context, interval)),
      mostTransactedPlayers: report.mostTransactedPlayers.map((lifecycle) => nameLifecycle(context, lifecycle)),
    };
  }

  async getOwnerFaab(
    leagueId: string,
    rosterId: number,
    weeks: number,
    signal?: AbortSignal
  ): Promise<OwnerFaab> {
    const season = await this.loadSeason(leagueId, weeks, signal);
    requireRoster(season.context, rosterId);

    const analysis = analyzeOwnership(season);
    const owner = buildOwnerFaabPerformance(rosterId, analysis.intervals, season.context.faabBudget);
    return nameOwnerFaab(season.context, owner);
  }

  /**
   * @throws NotFoundException (PLAYER_NOT_FOUND) when no roster held the player
   */
  async getPlayerLifecycle(
    leagueId: string,
    playerId: string,
    weeks: number,
    signal?: AbortSignal
  ): Promise<PlayerLifecycleView> {
    const season = await this.loadSeason(leagueId, weeks, signal);
    const analysis = analyzeOwnership(season);

    const history = analysis.intervals.filter((interval) => interval.playerId === playerId);
    if (history.length === 0) {
      throw LeagueErrors.playerNotFound(playerId);
    }

    const lifecycle = buildPlayerLifecycle(playerId, history, season.context.directory);
    return nameLifecycle(season.context, lifecycle);
  }

  private loadSeason(leagueId: string, weeks: number, signal?: AbortSignal): Promise<SeasonData> {
    return this.seasonData.loadSeason(leagueId, weeks, { signal, includeTransactions: true });
  }

  private ownersFor(season: SeasonData, analysis: OwnershipAnalysis): OwnerFaabPerformance[] {
    return rosterIds(season.context).map((rosterId) =>
      buildOwnerFaabPerformance(rosterId, analysis.intervals, season.context.faabBudget)
    );
  }

  private lifecyclesFor(season: SeasonData, analysis: OwnershipAnalysis): PlayerLifecycle[] {
    return [...intervalsByPlayer(analysis.intervals)].map(([playerId, history]) =>
      buildPlayerLifecycle(playerId, history, season.context.directory)
    );
  }
}
