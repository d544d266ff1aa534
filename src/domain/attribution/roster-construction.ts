/**
 * Roster Construction
 *
 * Splits a roster's points by how each player arrived (draft, trade,
 * waiver, free agent). The breakdown is keyed by the closed set of
 * acquisition methods so every method is always present.
 */

import { roundTo } from '../snapshot';
import { ACQUISITION_METHODS, AcquisitionMethod } from '../ownership';
import { AttributedInterval } from './point-attribution';

export interface MethodShare {
  points: number;
  /** Share of the roster's total points, one decimal */
  percentage: number;
  count: number;
}

export type MethodBreakdown = Record<AcquisitionMethod, MethodShare>;

export type DraftReliance = 'high' | 'moderate' | 'low';

export type WaiverActivity = 'very high' | 'high' | 'moderate' | 'low';

export interface RosterConstruction {
  rosterId: number;
  totalPoints: number;
  breakdown: MethodBreakdown;
  primarySource: AcquisitionMethod;
  draftReliance: DraftReliance;
  waiverActivity: WaiverActivity;
  acquisitions: AttributedInterval[];
}

export function emptyBreakdown(): MethodBreakdown {
  return {
    draft: { points: 0, percentage: 0, count: 0 },
    trade: { points: 0, percentage: 0, count: 0 },
    waiver: { points: 0, percentage: 0, count: 0 },
    free_agent: { points: 0, percentage: 0, count: 0 },
  };
}

export function classifyDraftReliance(draftPercentage: number): DraftReliance {
  if (draftPercentage >= 70) return 'high';
  if (draftPercentage >= 50) return 'moderate';
  return 'low';
}

export function classifyWaiverActivity(waiverCount: number): WaiverActivity {
  if (waiverCount >= 15) return 'very high';
  if (waiverCount >= 10) return 'high';
  if (waiverCount >= 5) return 'moderate';
  return 'low';
}

/**
 * Method with the most points. Ties resolve in ACQUISITION_METHODS order.
 */
export function primarySourceOf(breakdown: MethodBreakdown): AcquisitionMethod {
  let best: AcquisitionMethod = ACQUISITION_METHODS[0];
  for (const method of ACQUISITION_METHODS) {
    if (breakdown[method].points > breakdown[best].points) {
      best = method;
    }
  }
  return best;
}

/**
 * Aggregate the intervals a roster held into its construction report.
 * Intervals belonging to other rosters are ignored.
 */
export function buildRosterConstruction(
  rosterId: number,
  intervals: readonly AttributedInterval[]
): RosterConstruction {
  const owned = intervals.filter((interval) => interval.rosterId === rosterId);
  const raw = emptyBreakdown();

  for (const interval of owned) {
    raw[interval.method].points += interval.points;
    raw[interval.method].count += 1;
  }

  const total = ACQUISITION_METHODS.reduce((sum, method) => sum + raw[method].points, 0);

  const breakdown = emptyBreakdown();
  for (const method of ACQUISITION_METHODS) {
    breakdown[method] = {
      points: roundTo(raw[method].points, 2),
      percentage: total > 0 ? roundTo((raw[method].points / total) * 100, 1) : 0,
      count: raw[method].count,
    };
  }

  return {
    rosterId,
    totalPoints: roundTo(total, 2),
    breakdown,
    primarySource: primarySourceOf(breakdown),
    draftReliance: classifyDraftReliance(breakdown.draft.percentage),
    waiverActivity: classifyWaiverActivity(breakdown.waiver.count),
    acquisitions: [...owned].sort((a, b) => b.points - a.points),
  };
}
