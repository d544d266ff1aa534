/**
 * League-wide rankings over per-team reports.
 */

import { MissedOpportunity, SeasonEfficiency } from '../lineup';
import { OwnerFaabPerformance } from '../attribution';

export interface EfficiencyRanking {
  rank: number;
  rosterId: number;
  seasonEfficiencyPct: number;
  totalPointsScored: number;
  totalPotentialPoints: number;
  pointsLeftOnBench: number;
}

export interface LeagueMissedStart extends MissedOpportunity {
  rosterId: number;
  week: number;
}

export interface RankedFaabOwner extends OwnerFaabPerformance {
  rank: number;
}

/**
 * Efficiency % desc, roster id asc on ties.
 */
export function rankEfficiency(seasons: readonly SeasonEfficiency[]): EfficiencyRanking[] {
  return [...seasons]
    .sort((a, b) => b.seasonEfficiencyPct - a.seasonEfficiencyPct || a.rosterId - b.rosterId)
    .map((season, idx) => ({
      rank: idx + 1,
      rosterId: season.rosterId,
      seasonEfficiencyPct: season.seasonEfficiencyPct,
      totalPointsScored: season.totalPointsScored,
      totalPotentialPoints: season.totalPotentialPoints,
      pointsLeftOnBench: season.pointsLeftOnBench,
    }));
}

/**
 * The costliest start/sit decisions across the league.
 */
export function biggestMissedStarts(
  seasons: readonly SeasonEfficiency[],
  limit: number
): LeagueMissedStart[] {
  const all: LeagueMissedStart[] = [];
  for (const season of seasons) {
    for (const week of season.weeklyEfficiency) {
      for (const missed of week.missedOpportunities) {
        all.push({ ...missed, rosterId: season.rosterId, week: week.week });
      }
    }
  }

  return all
    .sort((a, b) => b.pointsLost - a.pointsLost || a.week - b.week || a.rosterId - b.rosterId)
    .slice(0, limit);
}

/**
 * Average ROI desc (infinite entries already excluded from the average),
 * roster id asc on ties.
 */
export function rankFaabOwners(owners: readonly OwnerFaabPerformance[]): RankedFaabOwner[] {
  return [...owners]
    .sort((a, b) => b.averageRoi - a.averageRoi || a.rosterId - b.rosterId)
    .map((owner, idx) => ({ ...owner, rank: idx + 1 }));
}
