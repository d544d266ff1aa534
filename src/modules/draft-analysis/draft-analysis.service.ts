import { DraftPickInput, analyzeDraft } from '../../domain/reports';
import { buildPlayerPointsIndex } from '../../domain/attribution';
import { DraftPickRecord } from '../../integrations/shared/league-data.types';
import { ILeagueDataFeed } from '../../integrations/shared/league-data-feed.interface';
import { LeagueErrors } from '../../utils/exceptions';
import { logger } from '../../config/logger.config';
import { SeasonDataService } from '../league-context/season-data.service';
import { allSnapshots } from '../league-context/league-context.model';
import { LeagueDraftReport, nameDraftAnalysis } from './draft-analysis.model';

function toPickInput(pick: DraftPickRecord): DraftPickInput | null {
  if (pick.rosterId === null || pick.playerId === null) return null;
  return {
    pickNumber: pick.pickNumber,
    round: pick.round,
    pickInRound: pick.pickInRound,
    rosterId: pick.rosterId,
    playerId: pick.playerId,
  };
}

/**
 * How each team's draft picks produced over the season. Only the league's
 * first draft is analysed.
 */
export class DraftAnalysisService {
  constructor(
    private readonly feed: ILeagueDataFeed,
    private readonly seasonData: SeasonDataService
  ) {}

  /**
   * @throws NotFoundException (DRAFT_UNAVAILABLE) when the league has no draft or no picks
   */
  async getDraftAnalysis(leagueId: string, weeks: number, signal?: AbortSignal): Promise<LeagueDraftReport> {
    const [season, drafts] = await Promise.all([
      this.seasonData.loadSeason(leagueId, weeks, { signal }),
      this.feed.getDrafts(leagueId, signal),
    ]);

    const draftId = drafts[0]?.draftId ?? null;
    const picks = draftId ? await this.feed.getDraftPicks(draftId, signal) : [];
    const inputs = picks.map(toPickInput).filter((pick): pick is DraftPickInput => pick !== null);

    const result = analyzeDraft({
      draftId,
      picks: inputs,
      pointsIndex: buildPlayerPointsIndex(allSnapshots(season)),
      heldRosters: season.context.heldRosters,
      directory: season.context.directory,
      lastWeek: weeks,
    });

    if (result.status === 'unavailable') {
      logger.info('Draft analysis unavailable', { leagueId, draftId, reason: result.reason });
      throw LeagueErrors.draftUnavailable(result.reason);
    }

    return nameDraftAnalysis(season.context, result);
  }
}
