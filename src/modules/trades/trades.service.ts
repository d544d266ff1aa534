import {
  analyzeRosterNeeds,
  analyzeTrades,
  evaluateTrade,
  mostActiveTeams,
  summarizeTransactions,
  tradeWinnersLosers,
  TradeAnalysis,
  TradeProposal,
} from '../../domain/reports';
import { buildPlayerPointsIndex } from '../../domain/attribution';
import { LeagueErrors } from '../../utils/exceptions';
import { SeasonDataService } from '../league-context/season-data.service';
import {
  LeagueContext,
  SeasonData,
  allSnapshots,
  requireRoster,
  rosterIds,
  teamName,
} from '../league-context/league-context.model';
import { analyzeOwnership } from '../ownership/ownership-analysis';
import {
  ActiveTeams,
  LeagueTrades,
  LeagueTransactions,
  NamedEvaluation,
  NamedNeeds,
  TradeStandings,
  nameActivity,
  nameBalance,
  nameTrade,
} from './trades.model';

/**
 * Transaction activity, completed-trade outcomes and trade-fit analysis.
 */
export class TradesService {
  constructor(private readonly seasonData: SeasonDataService) {}

  async getTransactionSummary(leagueId: string, weeks: number, signal?: AbortSignal): Promise<LeagueTransactions> {
    const season = await this.loadSeason(leagueId, weeks, signal);
    const summary = summarizeTransactions(rosterIds(season.context), season.transactions);

    return {
      ...summary,
      leagueId,
      weeksAnalyzed: weeks,
      byRoster: summary.byRoster.map((activity) => nameActivity(season.context, activity)),
    };
  }

  async getMostActiveTeams(leagueId: string, weeks: number, signal?: AbortSignal): Promise<ActiveTeams> {
    const season = await this.loadSeason(leagueId, weeks, signal);
    const summary = summarizeTransactions(rosterIds(season.context), season.transactions);

    return {
      leagueId,
      weeksAnalyzed: weeks,
      teams: mostActiveTeams(summary).map((activity) => nameActivity(season.context, activity)),
    };
  }

  async getTrades(leagueId: string, weeks: number, signal?: AbortSignal): Promise<LeagueTrades> {
    const season = await this.loadSeason(leagueId, weeks, signal);
    return {
      leagueId,
      weeksAnalyzed: weeks,
      trades: this.tradesFor(season).map((trade) => nameTrade(season.context, trade)),
    };
  }

  async getTradeWinnersLosers(leagueId: string, weeks: number, signal?: AbortSignal): Promise<TradeStandings> {
    const season = await this.loadSeason(leagueId, weeks, signal);
    const { winners, losers } = tradeWinnersLosers(this.tradesFor(season));

    return {
      leagueId,
      weeksAnalyzed: weeks,
      winners: winners.map((balance) => nameBalance(season.context, balance)),
      losers: losers.map((balance) => nameBalance(season.context, balance)),
    };
  }

  /**
   * Needs of the roster as it stands now.
   */
  async getRosterNeeds(leagueId: string, rosterId: number, signal?: AbortSignal): Promise<NamedNeeds> {
    const context = await this.seasonData.loadContext(leagueId, signal);
    requireRoster(context, rosterId);

    const needs = analyzeRosterNeeds(
      rosterId,
      context.heldRosters.get(rosterId) ?? [],
      context.directory,
      context.template
    );
    return { ...needs, teamName: teamName(context, rosterId) };
  }

  /**
   * @throws ValidationException (PLAYER_NOT_ON_ROSTER) when a side offers a player it does not hold
   */
  async evaluateTrade(
    leagueId: string,
    proposal: TradeProposal,
    weeks: number,
    signal?: AbortSignal
  ): Promise<NamedEvaluation> {
    const season = await this.seasonData.loadSeason(leagueId, weeks, { signal });
    const { context } = season;
    requireRoster(context, proposal.rosterId);
    requireRoster(context, proposal.opponentId);
    this.requireHeld(context, proposal.rosterId, proposal.gives);
    this.requireHeld(context, proposal.opponentId, proposal.receives);

    const evaluation = evaluateTrade(
      proposal,
      context.heldRosters,
      context.directory,
      context.template,
      buildPlayerPointsIndex(allSnapshots(season))
    );

    return {
      ...evaluation,
      roster: { ...evaluation.roster, teamName: teamName(context, evaluation.roster.rosterId) },
      opponent: { ...evaluation.opponent, teamName: teamName(context, evaluation.opponent.rosterId) },
    };
  }

  private requireHeld(context: LeagueContext, rosterId: number, playerIds: readonly string[]): void {
    const held = context.heldRosters.get(rosterId) ?? [];
    const missing = playerIds.find((playerId) => !held.includes(playerId));
    if (missing !== undefined) {
      throw LeagueErrors.playerNotOnRoster(missing, rosterId);
    }
  }

  private tradesFor(season: SeasonData): TradeAnalysis[] {
    return analyzeTrades(season.transactions, analyzeOwnership(season).intervals);
  }

  private loadSeason(leagueId: string, weeks: number, signal?: AbortSignal): Promise<SeasonData> {
    return this.seasonData.loadSeason(leagueId, weeks, { signal, includeTransactions: true });
  }
}
