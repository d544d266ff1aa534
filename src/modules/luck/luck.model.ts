/**
 * Luck & schedule-strength models
 */

import { LuckReport, StrengthOfSchedule, WeeklyLuckRecord } from '../../domain/luck';
import { LeagueContext, teamName } from '../league-context/league-context.model';

export interface NamedLuckRecord extends WeeklyLuckRecord {
  teamName: string;
  opponentTeamName: string;
}

export interface TeamLuck extends Omit<LuckReport, 'luckyWins' | 'unluckyLosses' | 'weekly'> {
  teamName: string;
  luckyWins: NamedLuckRecord[];
  unluckyLosses: NamedLuckRecord[];
  weekly: NamedLuckRecord[];
}

export interface LeagueLuckReport {
  leagueId: string;
  leagueName: string;
  weeksAnalyzed: number;
  teams: TeamLuck[];
  luckiest: TeamLuck | null;
  unluckiest: TeamLuck | null;
}

export interface WeekLuck {
  leagueId: string;
  week: number;
  leagueMedian: number;
  records: NamedLuckRecord[];
}

export function nameLuckRecord(context: LeagueContext, record: WeeklyLuckRecord): NamedLuckRecord {
  return {
    ...record,
    teamName: teamName(context, record.rosterId),
    opponentTeamName: teamName(context, record.opponentRosterId),
  };
}

export function nameLuckReport(context: LeagueContext, report: LuckReport): TeamLuck {
  const named = (records: WeeklyLuckRecord[]) => records.map((record) => nameLuckRecord(context, record));
  return {
    ...report,
    teamName: teamName(context, report.rosterId),
    luckyWins: named(report.luckyWins),
    unluckyLosses: named(report.unluckyLosses),
    weekly: named(report.weekly),
  };
}

export function luckRecordToResponse(record: NamedLuckRecord) {
  return {
    week: record.week,
    roster_id: record.rosterId,
    team_name: record.teamName,
    points: record.points,
    opponent_roster_id: record.opponentRosterId,
    opponent: record.opponentTeamName,
    opponent_points: record.opponentPoints,
    result: record.result,
    league_median: record.leagueMedian,
    league_rank: record.leagueRank,
    wins_vs_all: record.winsVsAll,
    expected_win_pct: record.expectedWinPct,
    luck_factor: record.luckFactor,
  };
}

export function strengthOfScheduleToResponse(sos: StrengthOfSchedule) {
  return {
    average_opponent_points: sos.averageOpponentPoints,
    average_opponent_rank: sos.averageOpponentRank,
    toughest_schedule_rank: sos.toughestScheduleRank,
    easiest_weeks: sos.easiestWeeks,
    hardest_weeks: sos.hardestWeeks,
    total_weeks: sos.totalWeeks,
  };
}

export function teamLuckToResponse(team: TeamLuck) {
  return {
    roster_id: team.rosterId,
    team_name: team.teamName,
    actual_record: team.actualRecord,
    actual_wins: team.actualWins,
    actual_losses: team.actualLosses,
    actual_ties: team.actualTies,
    expected_record: team.expectedRecord,
    expected_wins: team.expectedWins,
    luck_score: team.luckScore,
    lucky_wins: team.luckyWins.map(luckRecordToResponse),
    unlucky_losses: team.unluckyLosses.map(luckRecordToResponse),
    strength_of_schedule: strengthOfScheduleToResponse(team.strengthOfSchedule),
    weekly: team.weekly.map(luckRecordToResponse),
  };
}

function luckSummary(team: TeamLuck | null) {
  return team
    ? { roster_id: team.rosterId, team_name: team.teamName, luck_score: team.luckScore }
    : null;
}

export function leagueLuckToResponse(report: LeagueLuckReport) {
  return {
    league_id: report.leagueId,
    league_name: report.leagueName,
    weeks_analyzed: report.weeksAnalyzed,
    luckiest: luckSummary(report.luckiest),
    unluckiest: luckSummary(report.unluckiest),
    teams: report.teams.map(teamLuckToResponse),
  };
}

export function weekLuckToResponse(report: WeekLuck) {
  return {
    league_id: report.leagueId,
    week: report.week,
    league_median: report.leagueMedian,
    records: report.records.map(luckRecordToResponse),
  };
}
