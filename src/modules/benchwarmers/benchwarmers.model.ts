import { BenchPerformance, TeamBenchReport } from '../../domain/reports';
import { LeagueContext, teamName } from '../league-context/league-context.model';

export interface NamedBenchPerformance extends BenchPerformance {
  teamName: string;
}

export interface TeamBench extends Omit<TeamBenchReport, 'topBenchwarmers' | 'worstBenchingDecision'> {
  teamName: string;
  topBenchwarmers: NamedBenchPerformance[];
  worstBenchingDecision: NamedBenchPerformance | null;
}

export interface LeagueBench {
  leagueId: string;
  leagueName: string;
  weeksAnalyzed: number;
  teams: TeamBench[];
  biggestBenchingMistakes: NamedBenchPerformance[];
  champion: { rosterId: number; teamName: string; totalBenchPoints: number } | null;
}

export function nameBenchPerformance(context: LeagueContext, performance: BenchPerformance): NamedBenchPerformance {
  return { ...performance, teamName: teamName(context, performance.rosterId) };
}

export function nameTeamBench(context: LeagueContext, team: TeamBenchReport): TeamBench {
  return {
    ...team,
    teamName: teamName(context, team.rosterId),
    topBenchwarmers: team.topBenchwarmers.map((p) => nameBenchPerformance(context, p)),
    worstBenchingDecision: team.worstBenchingDecision
      ? nameBenchPerformance(context, team.worstBenchingDecision)
      : null,
  };
}

export function benchPerformanceToResponse(performance: NamedBenchPerformance) {
  return {
    week: performance.week,
    roster_id: performance.rosterId,
    team_name: performance.teamName,
    player_id: performance.playerId,
    player_name: performance.playerName,
    position: performance.position,
    points: performance.points,
  };
}

export function teamBenchToResponse(team: TeamBench) {
  return {
    roster_id: team.rosterId,
    team_name: team.teamName,
    total_bench_points: team.totalBenchPoints,
    average_bench_points_per_week: team.averageBenchPointsPerWeek,
    worst_benching_decision: team.worstBenchingDecision
      ? benchPerformanceToResponse(team.worstBenchingDecision)
      : null,
    top_benchwarmers: team.topBenchwarmers.map(benchPerformanceToResponse),
  };
}

export function leagueBenchToResponse(report: LeagueBench) {
  return {
    league_id: report.leagueId,
    league_name: report.leagueName,
    weeks_analyzed: report.weeksAnalyzed,
    champion: report.champion
      ? {
          roster_id: report.champion.rosterId,
          team_name: report.champion.teamName,
          total_bench_points: report.champion.totalBenchPoints,
        }
      : null,
    biggest_benching_mistakes: report.biggestBenchingMistakes.map(benchPerformanceToResponse),
    teams: report.teams.map(teamBenchToResponse),
  };
}
