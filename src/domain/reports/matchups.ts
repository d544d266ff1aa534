/**
 * Matchup reports: paired results, close games, per-team performance and
 * head-to-head history.
 */

import { PlayerSnapshot, roundTo } from '../snapshot';
import { MatchupResult, WeeklyLuckRecord, pairMatchups, resultFor } from '../luck';

export const CLOSE_GAME_THRESHOLD = 10;

export interface MatchupSide {
  rosterId: number;
  points: number;
}

export interface Matchup {
  week: number;
  matchupId: number;
  /** Lower roster id */
  home: MatchupSide;
  away: MatchupSide;
  margin: number;
  /** null on a tie */
  winnerRosterId: number | null;
}

export interface WeeklyResult {
  week: number;
  points: number;
  opponentRosterId: number;
  opponentPoints: number;
  result: MatchupResult;
}

export interface TeamPerformance {
  rosterId: number;
  wins: number;
  losses: number;
  ties: number;
  pointsFor: number;
  pointsAgainst: number;
  averagePoints: number;
  /** Population standard deviation of weekly points */
  consistency: number;
  bestWeek: WeeklyResult | null;
  worstWeek: WeeklyResult | null;
  weeklyResults: WeeklyResult[];
}

export interface HeadToHeadGame {
  week: number;
  rosterPoints: number;
  opponentPoints: number;
  winnerRosterId: number | null;
}

export interface HeadToHead {
  rosterId: number;
  opponentId: number;
  wins: number;
  losses: number;
  ties: number;
  games: HeadToHeadGame[];
}

function winnerOf(home: MatchupSide, away: MatchupSide): number | null {
  const result = resultFor(home.points, away.points);
  if (result === 'W') return home.rosterId;
  if (result === 'L') return away.rosterId;
  return null;
}

export function buildWeekMatchups(week: number, snapshots: readonly PlayerSnapshot[]): Matchup[] {
  return pairMatchups(snapshots).map(({ matchupId, home, away }) => {
    const homeSide = { rosterId: home.rosterId, points: roundTo(home.points, 2) };
    const awaySide = { rosterId: away.rosterId, points: roundTo(away.points, 2) };
    return {
      week,
      matchupId,
      home: homeSide,
      away: awaySide,
      margin: roundTo(Math.abs(home.points - away.points), 2),
      winnerRosterId: winnerOf(homeSide, awaySide),
    };
  });
}

/**
 * Margin at or under `threshold`, tightest first.
 */
export function findCloseGames(matchups: readonly Matchup[], threshold = CLOSE_GAME_THRESHOLD): Matchup[] {
  return matchups
    .filter((matchup) => matchup.margin <= threshold)
    .sort((a, b) => a.margin - b.margin || a.week - b.week || a.matchupId - b.matchupId);
}

export function populationStdDev(values: readonly number[]): number {
  if (values.length < 2) return 0;
  const mean = values.reduce((sum, value) => sum + value, 0) / values.length;
  const variance = values.reduce((sum, value) => sum + (value - mean) ** 2, 0) / values.length;
  return Math.sqrt(variance);
}

function toWeeklyResult(record: WeeklyLuckRecord): WeeklyResult {
  return {
    week: record.week,
    points: record.points,
    opponentRosterId: record.opponentRosterId,
    opponentPoints: record.opponentPoints,
    result: record.result,
  };
}

export function buildTeamPerformance(rosterId: number, records: readonly WeeklyLuckRecord[]): TeamPerformance {
  const weeklyResults = records
    .filter((record) => record.rosterId === rosterId)
    .sort((a, b) => a.week - b.week)
    .map(toWeeklyResult);

  const points = weeklyResults.map((result) => result.points);
  const pointsFor = points.reduce((sum, value) => sum + value, 0);

  let bestWeek: WeeklyResult | null = null;
  let worstWeek: WeeklyResult | null = null;
  for (const result of weeklyResults) {
    if (!bestWeek || result.points > bestWeek.points) bestWeek = result;
    if (!worstWeek || result.points < worstWeek.points) worstWeek = result;
  }

  return {
    rosterId,
    wins: weeklyResults.filter((r) => r.result === 'W').length,
    losses: weeklyResults.filter((r) => r.result === 'L').length,
    ties: weeklyResults.filter((r) => r.result === 'T').length,
    pointsFor: roundTo(pointsFor, 2),
    pointsAgainst: roundTo(weeklyResults.reduce((sum, r) => sum + r.opponentPoints, 0), 2),
    averagePoints: weeklyResults.length > 0 ? roundTo(pointsFor / weeklyResults.length, 2) : 0,
    consistency: roundTo(populationStdDev(points), 2),
    bestWeek,
    worstWeek,
    weeklyResults,
  };
}

/**
 * Every game `rosterId` played against `opponentId`, seen from `rosterId`.
 */
export function buildHeadToHead(
  rosterId: number,
  opponentId: number,
  records: readonly WeeklyLuckRecord[]
): HeadToHead {
  const games = records
    .filter((record) => record.rosterId === rosterId && record.opponentRosterId === opponentId)
    .sort((a, b) => a.week - b.week);

  return {
    rosterId,
    opponentId,
    wins: games.filter((g) => g.result === 'W').length,
    losses: games.filter((g) => g.result === 'L').length,
    ties: games.filter((g) => g.result === 'T').length,
    games: games.map((game) => ({
      week: game.week,
      rosterPoints: game.points,
      opponentPoints: game.opponentPoints,
      winnerRosterId: game.result === 'W' ? rosterId : game.result === 'L' ? opponentId : null,
    })),
  };
}
