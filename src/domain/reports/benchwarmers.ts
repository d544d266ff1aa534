/**
 * Benchwarmers: points left on the bench by players who could have started.
 */

import { PlayerDirectory, PlayerSnapshot, describePlayer, pointsFor, roundTo } from '../snapshot';
import { PositionSlot, canStartInTemplate } from '../lineup';

export interface BenchPerformance {
  week: number;
  rosterId: number;
  playerId: string;
  playerName: string;
  position: string;
  points: number;
}

export interface TeamBenchReport {
  rosterId: number;
  totalBenchPoints: number;
  averageBenchPointsPerWeek: number;
  topBenchwarmers: BenchPerformance[];
  worstBenchingDecision: BenchPerformance | null;
}

export interface LeagueBenchReport {
  teams: TeamBenchReport[];
  biggestBenchingMistakes: BenchPerformance[];
  champion: { rosterId: number; totalBenchPoints: number } | null;
}

export const BENCHWARMER_LIMIT = 10;

const byPointsDesc = (a: BenchPerformance, b: BenchPerformance): number =>
  b.points - a.points || a.week - b.week || a.playerId.localeCompare(b.playerId);

export function collectBenchPerformances(
  snapshot: PlayerSnapshot,
  template: readonly PositionSlot[],
  directory: PlayerDirectory
): BenchPerformance[] {
  const starters = new Set(snapshot.starters);
  const result: BenchPerformance[] = [];

  for (const playerId of snapshot.players) {
    if (!playerId || starters.has(playerId)) continue;
    const points = pointsFor(snapshot, playerId);
    if (points <= 0) continue;

    const info = describePlayer(directory, playerId);
    if (!canStartInTemplate(info.position, template)) continue;

    result.push({
      week: snapshot.week,
      rosterId: snapshot.rosterId,
      playerId,
      playerName: info.name,
      position: info.position,
      points: roundTo(points, 2),
    });
  }

  return result;
}

export function buildTeamBenchReport(
  rosterId: number,
  snapshots: readonly PlayerSnapshot[],
  template: readonly PositionSlot[],
  directory: PlayerDirectory,
  weeks: number
): TeamBenchReport {
  const performances = snapshots
    .filter((snapshot) => snapshot.rosterId === rosterId)
    .flatMap((snapshot) => collectBenchPerformances(snapshot, template, directory))
    .sort(byPointsDesc);

  const total = performances.reduce((sum, p) => sum + p.points, 0);

  return {
    rosterId,
    totalBenchPoints: roundTo(total, 2),
    averageBenchPointsPerWeek: weeks > 0 ? roundTo(total / weeks, 2) : 0,
    topBenchwarmers: performances.slice(0, BENCHWARMER_LIMIT),
    worstBenchingDecision: performances[0] ?? null,
  };
}

/**
 * Teams are expected in roster order; the first team wins a tie for most
 * bench points.
 */
export function buildLeagueBenchReport(teams: readonly TeamBenchReport[]): LeagueBenchReport {
  let champion: LeagueBenchReport['champion'] = null;
  for (const team of teams) {
    if (champion === null || team.totalBenchPoints > champion.totalBenchPoints) {
      champion = { rosterId: team.rosterId, totalBenchPoints: team.totalBenchPoints };
    }
  }

  return {
    teams: [...teams],
    biggestBenchingMistakes: teams
      .flatMap((team) => team.topBenchwarmers)
      .sort(byPointsDesc)
      .slice(0, BENCHWARMER_LIMIT),
    champion,
  };
}
