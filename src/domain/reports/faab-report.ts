import { roundTo } from '../snapshot';
import {
  AttributedInterval,
  OwnerFaabPerformance,
  PlayerLifecycle,
  isFiniteRoi,
} from '../attribution';
import { RankedFaabOwner, rankFaabOwners } from './rankings';

export interface LeagueFaabReport {
  totalSpent: number;
  ownerRankings: RankedFaabOwner[];
  bestValuePickups: AttributedInterval[];
  worstValuePickups: AttributedInterval[];
  mostTransactedPlayers: PlayerLifecycle[];
}

export const BEST_PICKUPS_LIMIT = 20;
export const WORST_PICKUPS_LIMIT = 10;
export const MOST_TRANSACTED_LIMIT = 10;

/**
 * Players who changed hands the most (by non-draft acquisitions).
 * Players never picked up are left out.
 */
export function mostTransacted(
  lifecycles: readonly PlayerLifecycle[],
  limit: number = MOST_TRANSACTED_LIMIT
): PlayerLifecycle[] {
  return lifecycles
    .filter((lifecycle) => lifecycle.timesPickedUp > 0)
    .sort((a, b) => b.timesPickedUp - a.timesPickedUp || a.playerId.localeCompare(b.playerId))
    .slice(0, limit);
}

export function buildLeagueFaabReport(
  owners: readonly OwnerFaabPerformance[],
  lifecycles: readonly PlayerLifecycle[]
): LeagueFaabReport {
  const pickups = owners.flatMap((owner) => owner.acquisitions).filter((p) => isFiniteRoi(p.roi));

  const best = [...pickups].sort((a, b) => b.roi - a.roi).slice(0, BEST_PICKUPS_LIMIT);
  const worst = [...pickups].sort((a, b) => a.roi - b.roi).slice(0, WORST_PICKUPS_LIMIT);

  return {
    totalSpent: roundTo(
      owners.reduce((sum, owner) => sum + owner.totalSpent, 0),
      2
    ),
    ownerRankings: rankFaabOwners(owners),
    bestValuePickups: best,
    worstValuePickups: worst,
    mostTransactedPlayers: mostTransacted(lifecycles),
  };
}
