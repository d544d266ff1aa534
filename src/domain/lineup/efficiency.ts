/**
 * Roster Efficiency Domain Logic
 *
 * Compares the lineup a team actually started with the best lineup it could
 * have started, and lists the start/sit decisions that cost points.
 * Pure functions, no I/O.
 */

import { PlayerDirectory, PlayerSnapshot, describePlayer, pointsFor, roundTo } from '../snapshot';
import { LineupStrategy, optimizeLineup } from './lineup-optimizer';
import { PositionSlot } from './slot-eligibility';

export interface MissedOpportunity {
  position: string;
  benchedPlayerId: string;
  benchedPlayer: string;
  benchedPoints: number;
  startedPlayerId: string;
  startedPlayer: string;
  startedPoints: number;
  pointsLost: number;
}

export interface WeeklyEfficiency {
  week: number;
  rosterId: number;
  pointsScored: number;
  potentialPoints: number;
  efficiencyPct: number;
  benchPoints: number;
  missedOpportunities: MissedOpportunity[];
  strategy: LineupStrategy;
}

export interface SeasonEfficiency {
  rosterId: number;
  totalPointsScored: number;
  totalPotentialPoints: number;
  seasonEfficiencyPct: number;
  pointsLeftOnBench: number;
  totalMissedOpportunities: number;
  weeklyEfficiency: WeeklyEfficiency[];
}

export interface EfficiencyContext {
  template: readonly PositionSlot[];
  directory: PlayerDirectory;
  strategy: LineupStrategy;
}

export interface PositionedPlayer {
  playerId: string;
  name: string;
  points: number;
}

const STARTER_TOTAL_TOLERANCE = 0.01;

export function emptyWeeklyEfficiency(
  rosterId: number,
  week: number,
  strategy: LineupStrategy
): WeeklyEfficiency {
  return {
    week,
    rosterId,
    pointsScored: 0,
    potentialPoints: 0,
    efficiencyPct: 0,
    benchPoints: 0,
    missedOpportunities: [],
    strategy,
  };
}

/**
 * Sum of the starters' individual points.
 */
export function sumStarterPoints(snapshot: PlayerSnapshot): number {
  return snapshot.starters.reduce((sum, playerId) => sum + pointsFor(snapshot, playerId), 0);
}

/**
 * Whether the starters' points add up to the score the platform reported.
 */
export function starterTotalsMatch(snapshot: PlayerSnapshot): boolean {
  return Math.abs(sumStarterPoints(snapshot) - snapshot.points) <= STARTER_TOTAL_TOLERANCE;
}

/**
 * Group held players by position, highest scorer first.
 * Ties keep roster order.
 */
function groupByPosition(
  snapshot: PlayerSnapshot,
  directory: PlayerDirectory
): Map<string, PositionedPlayer[]> {
  const positions = new Map<string, PositionedPlayer[]>();

  for (const playerId of snapshot.players) {
    if (!playerId) continue;
    const info = describePlayer(directory, playerId);
    const group = positions.get(info.position) ?? [];
    group.push({ playerId, name: info.name, points: pointsFor(snapshot, playerId) });
    positions.set(info.position, group);
  }

  for (const group of positions.values()) {
    group.sort((a, b) => b.points - a.points);
  }

  return positions;
}

/**
 * For every position with more than one candidate: if its top scorer sat
 * while a lower-scoring player at the same position started, that is a
 * missed opportunity. Sorted by points lost, largest first.
 */
export function findMissedOpportunities(
  positions: Map<string, PositionedPlayer[]>,
  starters: ReadonlySet<string>
): MissedOpportunity[] {
  const missed: MissedOpportunity[] = [];

  for (const [position, players] of positions) {
    if (players.length < 2) continue;

    const best = players[0];
    if (starters.has(best.playerId)) continue;

    const started = players.find((p) => starters.has(p.playerId));
    if (!started || started.points >= best.points) continue;

    missed.push({
      position,
      benchedPlayerId: best.playerId,
      benchedPlayer: best.name,
      benchedPoints: roundTo(best.points, 2),
      startedPlayerId: started.playerId,
      startedPlayer: started.name,
      startedPoints: roundTo(started.points, 2),
      pointsLost: roundTo(best.points - started.points, 2),
    });
  }

  return missed.sort((a, b) => b.pointsLost - a.pointsLost);
}

/**
 * Efficiency for one team-week. A missing snapshot yields a zero-valued
 * report rather than an error.
 */
export function analyzeWeeklyEfficiency(
  rosterId: number,
  week: number,
  snapshot: PlayerSnapshot | undefined,
  ctx: EfficiencyContext
): WeeklyEfficiency {
  if (!snapshot) {
    return emptyWeeklyEfficiency(rosterId, week, ctx.strategy);
  }

  const starters = new Set(snapshot.starters);
  const positions = groupByPosition(snapshot, ctx.directory);

  const benchPoints = snapshot.players
    .filter((playerId) => playerId && !starters.has(playerId))
    .reduce((sum, playerId) => sum + pointsFor(snapshot, playerId), 0);

  const optimized = optimizeLineup(
    {
      template: ctx.template,
      players: snapshot.players
        .filter((playerId) => playerId)
        .map((playerId) => ({ id: playerId, position: describePlayer(ctx.directory, playerId).position })),
      pointsByPlayerId: new Map(Object.entries(snapshot.pointsByPlayer)),
    },
    ctx.strategy
  );

  // Greedy can miss the started lineup itself (a rigid slot taking a flex
  // player); the lineup that was actually fielded is always reachable
  const potentialPoints = Math.max(optimized.optimalPoints, sumStarterPoints(snapshot));
  const efficiencyPct = potentialPoints > 0 ? (snapshot.points / potentialPoints) * 100 : 0;

  return {
    week,
    rosterId,
    pointsScored: roundTo(snapshot.points, 2),
    potentialPoints: roundTo(potentialPoints, 2),
    efficiencyPct: roundTo(efficiencyPct, 1),
    benchPoints: roundTo(benchPoints, 2),
    missedOpportunities: findMissedOpportunities(positions, starters),
    strategy: optimized.strategy,
  };
}

/**
 * Roll weekly reports into a season view. Weeks without a score (byes,
 * missing snapshots, future weeks) are left out.
 */
export function summarizeSeasonEfficiency(
  rosterId: number,
  weekly: readonly WeeklyEfficiency[]
): SeasonEfficiency {
  const played = weekly.filter((w) => w.pointsScored > 0);
  const totalScored = played.reduce((sum, w) => sum + w.pointsScored, 0);
  const totalPotential = played.reduce((sum, w) => sum + w.potentialPoints, 0);
  const totalMissed = played.reduce((sum, w) => sum + w.missedOpportunities.length, 0);

  return {
    rosterId,
    totalPointsScored: roundTo(totalScored, 2),
    totalPotentialPoints: roundTo(totalPotential, 2),
    seasonEfficiencyPct: roundTo(totalPotential > 0 ? (totalScored / totalPotential) * 100 : 0, 1),
    pointsLeftOnBench: roundTo(totalPotential - totalScored, 2),
    totalMissedOpportunities: totalMissed,
    weeklyEfficiency: played,
  };
}
