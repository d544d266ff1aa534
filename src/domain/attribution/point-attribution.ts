/**
 * Point Attribution
 *
 * Credits a player's weekly points to whichever roster owned him that week,
 * and measures the return on what the roster paid to get him.
 */

import { PlayerSnapshot, roundTo } from '../snapshot';
import { OwnershipInterval, effectiveEndWeek } from '../ownership';

/**
 * ROI of an acquisition that cost nothing but produced points.
 * Excluded from every averaged or ranked ROI.
 */
export const INFINITE_ROI = Number.POSITIVE_INFINITY;

/** week -> points */
export type WeeklyPoints = ReadonlyMap<number, number>;

/** playerId -> week -> points */
export type PlayerPointsIndex = ReadonlyMap<string, WeeklyPoints>;

export interface AttributedInterval extends OwnershipInterval {
  points: number;
  weeksOwned: number;
  pointsPerWeek: number;
  roi: number;
}

/**
 * Index every player's weekly points from the roster snapshots. A player
 * only scores for the roster that held him, so each (player, week) pair
 * appears at most once in practice; the first value seen is kept.
 */
export function buildPlayerPointsIndex(snapshots: Iterable<PlayerSnapshot>): PlayerPointsIndex {
  const index = new Map<string, Map<number, number>>();

  for (const snapshot of snapshots) {
    for (const [playerId, points] of Object.entries(snapshot.pointsByPlayer)) {
      let weekly = index.get(playerId);
      if (!weekly) {
        weekly = new Map();
        index.set(playerId, weekly);
      }
      if (!weekly.has(snapshot.week)) {
        weekly.set(snapshot.week, points);
      }
    }
  }

  return index;
}

export function computeRoi(points: number, cost: number): number {
  if (cost > 0) return points / cost;
  return points > 0 ? INFINITE_ROI : 0;
}

export function isFiniteRoi(roi: number): boolean {
  return Number.isFinite(roi);
}

/**
 * Points, weeks owned and ROI for one interval. An open interval runs to
 * `lastWeek`.
 */
export function attributeInterval(
  interval: OwnershipInterval,
  weeklyPoints: WeeklyPoints | undefined,
  lastWeek: number
): AttributedInterval {
  const endWeek = effectiveEndWeek(interval, lastWeek);

  let points = 0;
  for (let week = interval.startWeek; week <= endWeek; week++) {
    points += weeklyPoints?.get(week) ?? 0;
  }

  const weeksOwned = Math.max(0, endWeek - interval.startWeek + 1);
  const roi = computeRoi(points, interval.cost);

  return {
    ...interval,
    points: roundTo(points, 2),
    weeksOwned,
    pointsPerWeek: weeksOwned > 0 ? roundTo(points / weeksOwned, 2) : 0,
    roi: isFiniteRoi(roi) ? roundTo(roi, 2) : roi,
  };
}

/**
 * Attribute every interval of one player.
 */
export function attributePlayer(
  intervals: readonly OwnershipInterval[],
  pointsIndex: PlayerPointsIndex,
  lastWeek: number
): AttributedInterval[] {
  return intervals.map((interval) =>
    attributeInterval(interval, pointsIndex.get(interval.playerId), lastWeek)
  );
}

/**
 * Attribute every interval in the league.
 */
export function attributeAll(
  intervalsByPlayer: ReadonlyMap<string, readonly OwnershipInterval[]>,
  pointsIndex: PlayerPointsIndex,
  lastWeek: number
): AttributedInterval[] {
  const result: AttributedInterval[] = [];
  for (const intervals of intervalsByPlayer.values()) {
    result.push(...attributePlayer(intervals, pointsIndex, lastWeek));
  }
  return result;
}
