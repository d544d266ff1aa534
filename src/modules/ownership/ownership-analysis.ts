import { OwnershipTimeline, reconstructOwnership } from '../../domain/ownership';
import {
  AttributedInterval,
  PlayerPointsIndex,
  attributeAll,
  buildPlayerPointsIndex,
} from '../../domain/attribution';
import { logger } from '../../config/logger.config';
import { SeasonData, allSnapshots } from '../league-context/league-context.model';

/**
 * Ownership timeline plus the points credited to every interval.
 * Shared by the FAAB and roster-construction reports.
 */
export interface OwnershipAnalysis {
  timeline: OwnershipTimeline;
  pointsIndex: PlayerPointsIndex;
  intervals: AttributedInterval[];
  lastWeek: number;
}

export function analyzeOwnership(season: SeasonData): OwnershipAnalysis {
  const timeline = reconstructOwnership(season.transactions, {
    lastWeek: season.weeks,
    heldRosters: season.context.heldRosters,
  });

  if (timeline.skippedEvents > 0) {
    logger.debug('Transactions skipped during ownership replay', {
      leagueId: season.context.league.leagueId,
      applied: timeline.appliedEvents,
      skipped: timeline.skippedEvents,
    });
  }

  const pointsIndex = buildPlayerPointsIndex(allSnapshots(season));

  return {
    timeline,
    pointsIndex,
    intervals: attributeAll(timeline.intervalsByPlayer, pointsIndex, season.weeks),
    lastWeek: season.weeks,
  };
}

/**
 * Attributed intervals per player, in timeline order.
 */
export function intervalsByPlayer(intervals: readonly AttributedInterval[]): Map<string, AttributedInterval[]> {
  const grouped = new Map<string, AttributedInterval[]>();
  for (const interval of intervals) {
    const list = grouped.get(interval.playerId) ?? [];
    list.push(interval);
    grouped.set(interval.playerId, list);
  }
  return grouped;
}
