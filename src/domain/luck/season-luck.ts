/**
 * Season Luck & Strength of Schedule
 */

import { roundTo } from '../snapshot';
import { WeeklyLuckRecord } from './weekly-luck';

export interface StrengthOfSchedule {
  rosterId: number;
  averageOpponentPoints: number;
  /** Mean weekly rank of the opponents faced; lower is tougher */
  averageOpponentRank: number;
  /** 1 = toughest schedule in the league; null until ranked league-wide */
  toughestScheduleRank: number | null;
  /** Lowest opponent scores first */
  easiestWeeks: number[];
  /** Highest opponent scores first */
  hardestWeeks: number[];
  totalWeeks: number;
}

export interface LuckReport {
  rosterId: number;
  actualWins: number;
  actualLosses: number;
  actualTies: number;
  actualRecord: string;
  /** Weeks scored strictly above the league median */
  expectedWins: number;
  expectedRecord: string;
  /** actualWins - expectedWins; positive means lucky */
  luckScore: number;
  luckyWins: WeeklyLuckRecord[];
  unluckyLosses: WeeklyLuckRecord[];
  weekly: WeeklyLuckRecord[];
  strengthOfSchedule: StrengthOfSchedule;
}

export interface LeagueLuck {
  teams: LuckReport[];
  luckiest: LuckReport | null;
  unluckiest: LuckReport | null;
}

const EXTREME_WEEKS = 3;

/**
 * Strength of schedule for one roster from the whole league's weekly
 * records (the opponent's weekly rank comes from the opponent's record).
 */
export function computeStrengthOfSchedule(
  rosterId: number,
  leagueRecords: readonly WeeklyLuckRecord[]
): StrengthOfSchedule {
  const rankByWeekAndRoster = new Map<string, number>();
  for (const record of leagueRecords) {
    rankByWeekAndRoster.set(`${record.week}:${record.rosterId}`, record.leagueRank);
  }

  const own = leagueRecords.filter((record) => record.rosterId === rosterId);

  const opponentScores = own.map((record) => record.opponentPoints);
  const opponentRanks = own
    .map((record) => rankByWeekAndRoster.get(`${record.week}:${record.opponentRosterId}`))
    .filter((rank): rank is number => rank !== undefined);

  const mean = (values: readonly number[]): number =>
    values.length > 0 ? values.reduce((sum, v) => sum + v, 0) / values.length : 0;

  const easiest = [...own]
    .sort((a, b) => a.opponentPoints - b.opponentPoints || a.week - b.week)
    .slice(0, EXTREME_WEEKS)
    .map((record) => record.week);
  const hardest = [...own]
    .sort((a, b) => b.opponentPoints - a.opponentPoints || a.week - b.week)
    .slice(0, EXTREME_WEEKS)
    .map((record) => record.week);

  return {
    rosterId,
    averageOpponentPoints: roundTo(mean(opponentScores), 2),
    averageOpponentRank: roundTo(mean(opponentRanks), 2),
    toughestScheduleRank: null,
    easiestWeeks: easiest,
    hardestWeeks: hardest,
    totalWeeks: own.length,
  };
}

export function buildLuckReport(
  rosterId: number,
  leagueRecords: readonly WeeklyLuckRecord[]
): LuckReport {
  const weekly = leagueRecords
    .filter((record) => record.rosterId === rosterId)
    .sort((a, b) => a.week - b.week);

  const actualWins = weekly.filter((w) => w.result === 'W').length;
  const actualLosses = weekly.filter((w) => w.result === 'L').length;
  const actualTies = weekly.filter((w) => w.result === 'T').length;
  const expectedWins = weekly.filter((w) => w.points > w.leagueMedian).length;
  const expectedLosses = Math.max(0, weekly.length - expectedWins - actualTies);

  return {
    rosterId,
    actualWins,
    actualLosses,
    actualTies,
    actualRecord: `${actualWins}-${actualLosses}-${actualTies}`,
    expectedWins,
    expectedRecord: `${expectedWins}-${expectedLosses}-${actualTies}`,
    luckScore: actualWins - expectedWins,
    luckyWins: weekly.filter((w) => w.luckFactor === 'lucky_win'),
    unluckyLosses: weekly.filter((w) => w.luckFactor === 'unlucky_loss'),
    weekly,
    strengthOfSchedule: computeStrengthOfSchedule(rosterId, leagueRecords),
  };
}

/**
 * Rank schedules (highest average opponent score = 1, ties by roster id)
 * and pick the luckiest and unluckiest teams. Reports are expected in
 * roster order; the first team wins a luck-score tie.
 */
export function rollUpLeagueLuck(reports: readonly LuckReport[]): LeagueLuck {
  const bySchedule = [...reports].sort(
    (a, b) =>
      b.strengthOfSchedule.averageOpponentPoints - a.strengthOfSchedule.averageOpponentPoints ||
      a.rosterId - b.rosterId
  );
  const rankByRoster = new Map(bySchedule.map((report, idx) => [report.rosterId, idx + 1]));

  const teams = reports.map((report) => ({
    ...report,
    strengthOfSchedule: {
      ...report.strengthOfSchedule,
      toughestScheduleRank: rankByRoster.get(report.rosterId) ?? null,
    },
  }));

  let luckiest: LuckReport | null = null;
  let unluckiest: LuckReport | null = null;
  for (const team of teams) {
    if (luckiest === null || team.luckScore > luckiest.luckScore) luckiest = team;
    if (unluckiest === null || team.luckScore < unluckiest.luckScore) unluckiest = team;
  }

  return { teams, luckiest, unluckiest };
}
