/**
 * Efficiency report models
 */

import {
  LineupStrategy,
  MissedOpportunity,
  SeasonEfficiency,
  WeeklyEfficiency,
} from '../../domain/lineup';
import { EfficiencyRanking, LeagueMissedStart } from '../../domain/reports';

export interface TeamWeeklyEfficiency extends WeeklyEfficiency {
  teamName: string;
}

export interface TeamSeasonEfficiency extends SeasonEfficiency {
  teamName: string;
  strategy: LineupStrategy;
}

export interface LeagueEfficiency {
  leagueId: string;
  leagueName: string;
  weeksAnalyzed: number;
  strategy: LineupStrategy;
  teams: TeamSeasonEfficiency[];
}

export interface WeekEfficiency {
  leagueId: string;
  week: number;
  strategy: LineupStrategy;
  teams: TeamWeeklyEfficiency[];
}

export interface RankedEfficiency extends EfficiencyRanking {
  teamName: string;
}

export interface NamedMissedStart extends LeagueMissedStart {
  teamName: string;
}

export function missedOpportunityToResponse(missed: MissedOpportunity) {
  return {
    position: missed.position,
    benched_player_id: missed.benchedPlayerId,
    benched_player: missed.benchedPlayer,
    benched_points: missed.benchedPoints,
    started_player_id: missed.startedPlayerId,
    started_player: missed.startedPlayer,
    started_points: missed.startedPoints,
    points_lost: missed.pointsLost,
  };
}

export function weeklyEfficiencyToResponse(weekly: WeeklyEfficiency) {
  return {
    week: weekly.week,
    roster_id: weekly.rosterId,
    points_scored: weekly.pointsScored,
    potential_points: weekly.potentialPoints,
    efficiency_pct: weekly.efficiencyPct,
    bench_points: weekly.benchPoints,
    missed_opportunities: weekly.missedOpportunities.map(missedOpportunityToResponse),
    strategy: weekly.strategy,
  };
}

export function teamWeeklyEfficiencyToResponse(weekly: TeamWeeklyEfficiency) {
  return {
    ...weeklyEfficiencyToResponse(weekly),
    team_name: weekly.teamName,
  };
}

export function seasonEfficiencyToResponse(season: TeamSeasonEfficiency) {
  return {
    roster_id: season.rosterId,
    team_name: season.teamName,
    strategy: season.strategy,
    total_points_scored: season.totalPointsScored,
    total_potential_points: season.totalPotentialPoints,
    season_efficiency_pct: season.seasonEfficiencyPct,
    points_left_on_bench: season.pointsLeftOnBench,
    total_missed_opportunities: season.totalMissedOpportunities,
    weekly_efficiency: season.weeklyEfficiency.map(weeklyEfficiencyToResponse),
  };
}

export function leagueEfficiencyToResponse(report: LeagueEfficiency) {
  return {
    league_id: report.leagueId,
    league_name: report.leagueName,
    weeks_analyzed: report.weeksAnalyzed,
    strategy: report.strategy,
    teams: report.teams.map(seasonEfficiencyToResponse),
  };
}

export function weekEfficiencyToResponse(report: WeekEfficiency) {
  return {
    league_id: report.leagueId,
    week: report.week,
    strategy: report.strategy,
    teams: report.teams.map(teamWeeklyEfficiencyToResponse),
  };
}

export function rankedEfficiencyToResponse(ranking: RankedEfficiency) {
  return {
    rank: ranking.rank,
    roster_id: ranking.rosterId,
    team_name: ranking.teamName,
    season_efficiency_pct: ranking.seasonEfficiencyPct,
    total_points_scored: ranking.totalPointsScored,
    total_potential_points: ranking.totalPotentialPoints,
    points_left_on_bench: ranking.pointsLeftOnBench,
  };
}

export function missedStartToResponse(missed: NamedMissedStart) {
  return {
    ...missedOpportunityToResponse(missed),
    roster_id: missed.rosterId,
    team_name: missed.teamName,
    week: missed.week,
  };
}
