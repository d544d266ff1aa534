/**
 * Transaction activity, trade analysis and trade-fit models
 */

import {
  PositionNeed,
  RosterActivity,
  RosterNeeds,
  TradeAnalysis,
  TradeAsset,
  TradeBalance,
  TradeEvaluation,
  TradeFit,
  TransactionSummary,
} from '../../domain/reports';
import { describePlayer } from '../../domain/snapshot';
import { LeagueContext, teamName } from '../league-context/league-context.model';

export type NamedActivity = RosterActivity & { teamName: string };

export interface LeagueTransactions extends Omit<TransactionSummary, 'byRoster'> {
  leagueId: string;
  weeksAnalyzed: number;
  byRoster: NamedActivity[];
}

export interface ActiveTeams {
  leagueId: string;
  weeksAnalyzed: number;
  teams: NamedActivity[];
}

export type NamedAsset = TradeAsset & { name: string };

export interface NamedTradeSide {
  rosterId: number;
  teamName: string;
  assets: NamedAsset[];
  totalValue: number;
}

export interface NamedTrade extends Omit<TradeAnalysis, 'sides'> {
  sides: NamedTradeSide[];
}

export interface LeagueTrades {
  leagueId: string;
  weeksAnalyzed: number;
  trades: NamedTrade[];
}

export type NamedBalance = TradeBalance & { teamName: string };

export interface TradeStandings {
  leagueId: string;
  weeksAnalyzed: number;
  winners: NamedBalance[];
  losers: NamedBalance[];
}

export interface NamedNeeds extends RosterNeeds {
  teamName: string;
}

export interface NamedFit extends TradeFit {
  teamName: string;
}

export interface NamedEvaluation extends Omit<TradeEvaluation, 'roster' | 'opponent'> {
  roster: NamedFit;
  opponent: NamedFit;
}

export function nameActivity(context: LeagueContext, activity: RosterActivity): NamedActivity {
  return { ...activity, teamName: teamName(context, activity.rosterId) };
}

function assetName(context: LeagueContext, asset: TradeAsset): string {
  if (asset.kind === 'player') return describePlayer(context.directory, asset.playerId).name;
  return `${asset.season} round ${asset.round} pick (${teamName(context, asset.originalRosterId)})`;
}

export function nameTrade(context: LeagueContext, trade: TradeAnalysis): NamedTrade {
  return {
    ...trade,
    sides: trade.sides.map((side) => ({
      ...side,
      teamName: teamName(context, side.rosterId),
      assets: side.assets.map((asset) => ({ ...asset, name: assetName(context, asset) })),
    })),
  };
}

export function nameBalance(context: LeagueContext, balance: TradeBalance): NamedBalance {
  return { ...balance, teamName: teamName(context, balance.rosterId) };
}

export function activityToResponse(activity: NamedActivity) {
  return {
    roster_id: activity.rosterId,
    team_name: activity.teamName,
    total: activity.total,
    trades: activity.trades,
    waivers: activity.waivers,
    free_agents: activity.freeAgents,
    commissioner: activity.commissioner,
  };
}

export function transactionSummaryToResponse(report: LeagueTransactions) {
  return {
    league_id: report.leagueId,
    weeks_analyzed: report.weeksAnalyzed,
    total: report.total,
    by_type: report.byType,
    by_week: report.byWeek,
    by_team: report.byRoster.map(activityToResponse),
  };
}

export function activeTeamsToResponse(report: ActiveTeams) {
  return {
    league_id: report.leagueId,
    weeks_analyzed: report.weeksAnalyzed,
    teams: report.teams.map(activityToResponse),
  };
}

function assetToResponse(asset: NamedAsset) {
  if (asset.kind === 'player') {
    return { type: 'player', player_id: asset.playerId, name: asset.name, value: asset.value };
  }
  return {
    type: 'pick',
    season: asset.season,
    round: asset.round,
    original_roster_id: asset.originalRosterId,
    name: asset.name,
    value: asset.value,
  };
}

export function tradeToResponse(trade: NamedTrade) {
  return {
    transaction_id: trade.transactionId,
    week: trade.week,
    sides: trade.sides.map((side) => ({
      roster_id: side.rosterId,
      team_name: side.teamName,
      assets: side.assets.map(assetToResponse),
      total_value: side.totalValue,
    })),
    value_difference: trade.valueDifference,
    fairness: trade.fairness,
    winner_roster_id: trade.winnerRosterId,
  };
}

export function leagueTradesToResponse(report: LeagueTrades) {
  return {
    league_id: report.leagueId,
    weeks_analyzed: report.weeksAnalyzed,
    total_trades: report.trades.length,
    trades: report.trades.map(tradeToResponse),
  };
}

function balanceToResponse(balance: NamedBalance) {
  return {
    roster_id: balance.rosterId,
    team_name: balance.teamName,
    trades: balance.trades,
    net_value: balance.netValue,
  };
}

export function tradeStandingsToResponse(report: TradeStandings) {
  return {
    league_id: report.leagueId,
    weeks_analyzed: report.weeksAnalyzed,
    winners: report.winners.map(balanceToResponse),
    losers: report.losers.map(balanceToResponse),
  };
}

function needToResponse(need: PositionNeed) {
  return {
    position: need.position,
    count: need.count,
    starters_needed: need.startersNeeded,
    bench: need.bench,
    level: need.level,
  };
}

export function rosterNeedsToResponse(needs: NamedNeeds) {
  return {
    roster_id: needs.rosterId,
    team_name: needs.teamName,
    positions: needs.positions.map(needToResponse),
    top_need: needs.topNeed,
    trade_priority: needs.priority,
  };
}

function fitToResponse(fit: NamedFit) {
  return {
    roster_id: fit.rosterId,
    team_name: fit.teamName,
    gives: fit.gives,
    receives: fit.receives,
    value_in: fit.valueIn,
    value_out: fit.valueOut,
    improvements: fit.improvements,
    downgrades: fit.downgrades,
    fit_score: fit.fitScore,
    recommendation: fit.recommendation,
  };
}

export function evaluationToResponse(evaluation: NamedEvaluation) {
  return {
    roster: fitToResponse(evaluation.roster),
    opponent: fitToResponse(evaluation.opponent),
    value_difference: evaluation.valueDifference,
    fairness: evaluation.fairness,
    winner_roster_id: evaluation.winnerRosterId,
    confidence: evaluation.confidence,
  };
}
