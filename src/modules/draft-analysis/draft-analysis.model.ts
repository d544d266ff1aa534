import { AnalyzedPick, DraftAnalysis, RoundSummary, TeamDraftGrade } from '../../domain/reports';
import { LeagueContext, teamName } from '../league-context/league-context.model';

export interface NamedPick extends AnalyzedPick {
  teamName: string;
}

export interface NamedTeamGrade extends Omit<TeamDraftGrade, 'bestPick' | 'worstPick' | 'picks'> {
  teamName: string;
  bestPick: NamedPick;
  worstPick: NamedPick;
  picks: NamedPick[];
}

export interface NamedRoundSummary extends Omit<RoundSummary, 'bestPick' | 'worstPick'> {
  bestPick: NamedPick;
  worstPick: NamedPick;
}

export interface LeagueDraftReport
  extends Omit<DraftAnalysis, 'status' | 'teamGrades' | 'roundSummaries' | 'bestOverallPick' | 'biggestBust'> {
  leagueId: string;
  leagueName: string;
  teamGrades: NamedTeamGrade[];
  roundSummaries: NamedRoundSummary[];
  bestOverallPick: NamedPick;
  biggestBust: NamedPick | null;
}

export function nameDraftAnalysis(context: LeagueContext, analysis: DraftAnalysis): LeagueDraftReport {
  const name = (pick: AnalyzedPick): NamedPick => ({ ...pick, teamName: teamName(context, pick.rosterId) });

  return {
    leagueId: context.league.leagueId,
    leagueName: context.league.name,
    draftId: analysis.draftId,
    totalRounds: analysis.totalRounds,
    totalPicks: analysis.totalPicks,
    leagueAveragePointsPerPick: analysis.leagueAveragePointsPerPick,
    leagueHitRate: analysis.leagueHitRate,
    teamGrades: analysis.teamGrades.map((grade) => ({
      ...grade,
      teamName: teamName(context, grade.rosterId),
      bestPick: name(grade.bestPick),
      worstPick: name(grade.worstPick),
      picks: grade.picks.map(name),
    })),
    roundSummaries: analysis.roundSummaries.map((summary) => ({
      ...summary,
      bestPick: name(summary.bestPick),
      worstPick: name(summary.worstPick),
    })),
    bestOverallPick: name(analysis.bestOverallPick),
    biggestBust: analysis.biggestBust ? name(analysis.biggestBust) : null,
  };
}

export function pickToResponse(pick: NamedPick) {
  return {
    pick_number: pick.pickNumber,
    round: pick.round,
    pick_in_round: pick.pickInRound,
    roster_id: pick.rosterId,
    team_name: pick.teamName,
    player_id: pick.playerId,
    player_name: pick.playerName,
    position: pick.position,
    points_scored: pick.pointsScored,
    games_played: pick.gamesPlayed,
    points_per_game: pick.pointsPerGame,
    is_on_roster: pick.isOnRoster,
    value_rating: pick.valueRating,
  };
}

export function teamGradeToResponse(grade: NamedTeamGrade) {
  return {
    roster_id: grade.rosterId,
    team_name: grade.teamName,
    grade: grade.grade,
    total_picks: grade.totalPicks,
    total_points: grade.totalPoints,
    average_points_per_pick: grade.averagePointsPerPick,
    hit_rate: grade.hitRate,
    best_pick: pickToResponse(grade.bestPick),
    worst_pick: pickToResponse(grade.worstPick),
    picks: grade.picks.map(pickToResponse),
  };
}

export function roundSummaryToResponse(summary: NamedRoundSummary) {
  return {
    round: summary.round,
    total_picks: summary.totalPicks,
    average_points: summary.averagePoints,
    hit_rate: summary.hitRate,
    best_pick: pickToResponse(summary.bestPick),
    worst_pick: pickToResponse(summary.worstPick),
  };
}

export function draftReportToResponse(report: LeagueDraftReport) {
  return {
    league_id: report.leagueId,
    league_name: report.leagueName,
    draft_id: report.draftId,
    total_rounds: report.totalRounds,
    total_picks: report.totalPicks,
    league_average_points_per_pick: report.leagueAveragePointsPerPick,
    league_hit_rate: report.leagueHitRate,
    best_overall_pick: pickToResponse(report.bestOverallPick),
    biggest_bust: report.biggestBust ? pickToResponse(report.biggestBust) : null,
    team_grades: report.teamGrades.map(teamGradeToResponse),
    round_summaries: report.roundSummaries.map(roundSummaryToResponse),
  };
}
