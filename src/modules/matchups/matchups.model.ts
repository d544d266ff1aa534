/**
 * Matchup & award models
 */

import {
  AwardWinner,
  HeadToHead,
  Matchup,
  MatchupSide,
  SeasonAwards,
  TeamAwardTally,
  TeamPerformance,
  WeeklyAward,
  WeeklyResult,
} from '../../domain/reports';
import { LeagueContext, teamName } from '../league-context/league-context.model';

export interface NamedSide extends MatchupSide {
  teamName: string;
}

export interface NamedMatchup extends Omit<Matchup, 'home' | 'away'> {
  home: NamedSide;
  away: NamedSide;
}

export interface LeagueMatchups {
  leagueId: string;
  weeksAnalyzed: number;
  matchups: NamedMatchup[];
}

export interface CloseGames {
  leagueId: string;
  weeksAnalyzed: number;
  threshold: number;
  games: NamedMatchup[];
}

export interface NamedWeeklyResult extends WeeklyResult {
  opponentTeamName: string;
}

export interface NamedPerformance extends Omit<TeamPerformance, 'bestWeek' | 'worstWeek' | 'weeklyResults'> {
  teamName: string;
  bestWeek: NamedWeeklyResult | null;
  worstWeek: NamedWeeklyResult | null;
  weeklyResults: NamedWeeklyResult[];
}

export interface NamedHeadToHead extends HeadToHead {
  teamName: string;
  opponentTeamName: string;
}

export interface NamedAward {
  week: number;
  high: AwardWinner & { teamName: string };
  low: AwardWinner & { teamName: string };
}

export interface NamedTally extends TeamAwardTally {
  teamName: string;
}

export interface NamedSeasonAwards extends Omit<SeasonAwards, 'weeks' | 'teams'> {
  leagueId: string;
  weeks: NamedAward[];
  teams: NamedTally[];
}

export function nameMatchup(context: LeagueContext, matchup: Matchup): NamedMatchup {
  return {
    ...matchup,
    home: { ...matchup.home, teamName: teamName(context, matchup.home.rosterId) },
    away: { ...matchup.away, teamName: teamName(context, matchup.away.rosterId) },
  };
}

function nameResult(context: LeagueContext, result: WeeklyResult): NamedWeeklyResult {
  return { ...result, opponentTeamName: teamName(context, result.opponentRosterId) };
}

export function namePerformance(context: LeagueContext, performance: TeamPerformance): NamedPerformance {
  return {
    ...performance,
    teamName: teamName(context, performance.rosterId),
    bestWeek: performance.bestWeek ? nameResult(context, performance.bestWeek) : null,
    worstWeek: performance.worstWeek ? nameResult(context, performance.worstWeek) : null,
    weeklyResults: performance.weeklyResults.map((result) => nameResult(context, result)),
  };
}

export function nameAward(context: LeagueContext, award: WeeklyAward): NamedAward {
  return {
    week: award.week,
    high: { ...award.high, teamName: teamName(context, award.high.rosterId) },
    low: { ...award.low, teamName: teamName(context, award.low.rosterId) },
  };
}

function sideToResponse(side: NamedSide) {
  return { roster_id: side.rosterId, team_name: side.teamName, points: side.points };
}

export function matchupToResponse(matchup: NamedMatchup) {
  return {
    week: matchup.week,
    matchup_id: matchup.matchupId,
    home: sideToResponse(matchup.home),
    away: sideToResponse(matchup.away),
    margin: matchup.margin,
    winner_roster_id: matchup.winnerRosterId,
  };
}

export function leagueMatchupsToResponse(report: LeagueMatchups) {
  return {
    league_id: report.leagueId,
    weeks_analyzed: report.weeksAnalyzed,
    matchups: report.matchups.map(matchupToResponse),
  };
}

export function closeGamesToResponse(report: CloseGames) {
  return {
    league_id: report.leagueId,
    weeks_analyzed: report.weeksAnalyzed,
    threshold: report.threshold,
    count: report.games.length,
    games: report.games.map(matchupToResponse),
  };
}

function resultToResponse(result: NamedWeeklyResult) {
  return {
    week: result.week,
    points: result.points,
    opponent_roster_id: result.opponentRosterId,
    opponent_team_name: result.opponentTeamName,
    opponent_points: result.opponentPoints,
    result: result.result,
  };
}

export function performanceToResponse(performance: NamedPerformance) {
  return {
    roster_id: performance.rosterId,
    team_name: performance.teamName,
    wins: performance.wins,
    losses: performance.losses,
    ties: performance.ties,
    record: `${performance.wins}-${performance.losses}-${performance.ties}`,
    points_for: performance.pointsFor,
    points_against: performance.pointsAgainst,
    average_points: performance.averagePoints,
    consistency: performance.consistency,
    best_week: performance.bestWeek ? resultToResponse(performance.bestWeek) : null,
    worst_week: performance.worstWeek ? resultToResponse(performance.worstWeek) : null,
    weekly_results: performance.weeklyResults.map(resultToResponse),
  };
}

export function headToHeadToResponse(report: NamedHeadToHead) {
  return {
    roster_id: report.rosterId,
    team_name: report.teamName,
    opponent_id: report.opponentId,
    opponent_team_name: report.opponentTeamName,
    wins: report.wins,
    losses: report.losses,
    ties: report.ties,
    games: report.games.map((game) => ({
      week: game.week,
      points: game.rosterPoints,
      opponent_points: game.opponentPoints,
      winner_roster_id: game.winnerRosterId,
    })),
  };
}

export function awardToResponse(award: NamedAward) {
  const winner = (entry: NamedAward['high']) => ({
    roster_id: entry.rosterId,
    team_name: entry.teamName,
    points: entry.points,
  });
  return { week: award.week, high_score: winner(award.high), low_score: winner(award.low) };
}

export function seasonAwardsToResponse(report: NamedSeasonAwards) {
  return {
    league_id: report.leagueId,
    weeks_analyzed: report.weeksAnalyzed,
    payout_per_award: report.payoutPerAward,
    total_payout_high: report.totalPayoutHigh,
    total_payout_low: report.totalPayoutLow,
    teams: report.teams.map((team) => ({
      roster_id: team.rosterId,
      team_name: team.teamName,
      high_scores: team.highScores,
      low_scores: team.lowScores,
      net_payout: team.netPayout,
    })),
    weekly_awards: report.weeks.map(awardToResponse),
  };
}
