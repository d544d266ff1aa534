/**
 * FAAB (free-agent acquisition budget) analysis
 *
 * Player lifecycles across every roster that held them, and how well each
 * owner turned waiver spending into points.
 */

import { PlayerDirectory, describePlayer, roundTo } from '../snapshot';
import { AttributedInterval, isFiniteRoi } from './point-attribution';

export interface PlayerLifecycle {
  playerId: string;
  playerName: string;
  position: string;
  ownershipHistory: AttributedInterval[];
  totalFaabSpent: number;
  /** Non-draft acquisitions */
  timesPickedUp: number;
  timesDropped: number;
  currentOwnerRosterId: number | null;
  bestRoiRosterId: number | null;
  worstRoiRosterId: number | null;
}

export interface OwnerFaabPerformance {
  rosterId: number;
  budget: number;
  totalSpent: number;
  remaining: number;
  acquisitions: AttributedInterval[];
  totalPointsFromFaab: number;
  /** Mean over finite-ROI acquisitions only; 0 when there are none */
  averageRoi: number;
  bestPickup: AttributedInterval | null;
  worstPickup: AttributedInterval | null;
}

/**
 * Highest and lowest finite-ROI entries; first occurrence wins ties.
 */
export function roiExtremes<T extends { roi: number }>(
  entries: readonly T[]
): { best: T | null; worst: T | null } {
  let best: T | null = null;
  let worst: T | null = null;

  for (const entry of entries) {
    if (!isFiniteRoi(entry.roi)) continue;
    if (best === null || entry.roi > best.roi) best = entry;
    if (worst === null || entry.roi < worst.roi) worst = entry;
  }

  return { best, worst };
}

/**
 * Average ROI, skipping the infinite sentinel.
 */
export function averageFiniteRoi(entries: readonly { roi: number }[]): number {
  const finite = entries.filter((entry) => isFiniteRoi(entry.roi));
  if (finite.length === 0) return 0;
  return roundTo(finite.reduce((sum, entry) => sum + entry.roi, 0) / finite.length, 2);
}

/**
 * A paid waiver acquisition.
 */
export function isFaabAcquisition(interval: AttributedInterval): boolean {
  return interval.method === 'waiver' && interval.cost > 0;
}

export function buildPlayerLifecycle(
  playerId: string,
  history: readonly AttributedInterval[],
  directory: PlayerDirectory
): PlayerLifecycle {
  const info = describePlayer(directory, playerId);
  const last = history[history.length - 1];
  const { best, worst } = roiExtremes(history);

  return {
    playerId,
    playerName: info.name,
    position: info.position,
    ownershipHistory: [...history],
    totalFaabSpent: history.reduce((sum, interval) => sum + interval.cost, 0),
    timesPickedUp: history.filter((interval) => interval.method !== 'draft').length,
    timesDropped: history.filter((interval) => interval.endWeek !== null).length,
    currentOwnerRosterId: last && last.endWeek === null ? last.rosterId : null,
    bestRoiRosterId: best ? best.rosterId : null,
    worstRoiRosterId: worst ? worst.rosterId : null,
  };
}

export function buildOwnerFaabPerformance(
  rosterId: number,
  intervals: readonly AttributedInterval[],
  budget: number
): OwnerFaabPerformance {
  const acquisitions = intervals
    .filter((interval) => interval.rosterId === rosterId && isFaabAcquisition(interval))
    .sort((a, b) => a.startWeek - b.startWeek);

  const totalSpent = acquisitions.reduce((sum, interval) => sum + interval.cost, 0);
  const { best, worst } = roiExtremes(acquisitions);

  return {
    rosterId,
    budget,
    totalSpent,
    remaining: budget - totalSpent,
    acquisitions,
    totalPointsFromFaab: roundTo(
      acquisitions.reduce((sum, interval) => sum + interval.points, 0),
      2
    ),
    averageRoi: averageFiniteRoi(acquisitions),
    bestPickup: best,
    worstPickup: worst,
  };
}
