/**
 * FAAB report models
 */

import { OwnerFaabPerformance, PlayerLifecycle } from '../../domain/attribution';
import { LeagueContext, teamName } from '../league-context/league-context.model';
import { NamedInterval, intervalToResponse, nameInterval } from '../ownership/ownership.model';

export interface OwnerFaab
  extends Omit<OwnerFaabPerformance, 'acquisitions' | 'bestPickup' | 'worstPickup'> {
  teamName: string;
  acquisitions: NamedInterval[];
  bestPickup: NamedInterval | null;
  worstPickup: NamedInterval | null;
}

export interface RankedOwnerFaab extends OwnerFaab {
  rank: number;
}

export interface PlayerLifecycleView extends Omit<PlayerLifecycle, 'ownershipHistory'> {
  ownershipHistory: NamedInterval[];
  currentOwnerTeamName: string | null;
}

export interface LeagueFaab {
  leagueId: string;
  leagueName: string;
  weeksAnalyzed: number;
  budget: number;
  totalSpent: number;
  ownerRankings: RankedOwnerFaab[];
  bestValuePickups: NamedInterval[];
  worstValuePickups: NamedInterval[];
  mostTransactedPlayers: PlayerLifecycleView[];
}

export function nameOwnerFaab(context: LeagueContext, owner: OwnerFaabPerformance): OwnerFaab {
  return {
    ...owner,
    teamName: teamName(context, owner.rosterId),
    acquisitions: owner.acquisitions.map((interval) => nameInterval(context, interval)),
    bestPickup: owner.bestPickup ? nameInterval(context, owner.bestPickup) : null,
    worstPickup: owner.worstPickup ? nameInterval(context, owner.worstPickup) : null,
  };
}

export function nameLifecycle(context: LeagueContext, lifecycle: PlayerLifecycle): PlayerLifecycleView {
  return {
    ...lifecycle,
    ownershipHistory: lifecycle.ownershipHistory.map((interval) => nameInterval(context, interval)),
    currentOwnerTeamName:
      lifecycle.currentOwnerRosterId !== null ? teamName(context, lifecycle.currentOwnerRosterId) : null,
  };
}

export function ownerFaabToResponse(owner: OwnerFaab) {
  return {
    roster_id: owner.rosterId,
    team_name: owner.teamName,
    budget: owner.budget,
    total_spent: owner.totalSpent,
    remaining: owner.remaining,
    total_points_from_faab: owner.totalPointsFromFaab,
    average_roi: owner.averageRoi,
    best_pickup: owner.bestPickup ? intervalToResponse(owner.bestPickup) : null,
    worst_pickup: owner.worstPickup ? intervalToResponse(owner.worstPickup) : null,
    acquisitions: owner.acquisitions.map(intervalToResponse),
  };
}

export function rankedOwnerFaabToResponse(owner: RankedOwnerFaab) {
  return {
    rank: owner.rank,
    ...ownerFaabToResponse(owner),
  };
}

export function lifecycleToResponse(lifecycle: PlayerLifecycleView) {
  return {
    player_id: lifecycle.playerId,
    player_name: lifecycle.playerName,
    position: lifecycle.position,
    total_faab_spent: lifecycle.totalFaabSpent,
    times_picked_up: lifecycle.timesPickedUp,
    times_dropped: lifecycle.timesDropped,
    current_owner_roster_id: lifecycle.currentOwnerRosterId,
    current_owner: lifecycle.currentOwnerTeamName,
    best_roi_roster_id: lifecycle.bestRoiRosterId,
    worst_roi_roster_id: lifecycle.worstRoiRosterId,
    ownership_history: lifecycle.ownershipHistory.map(intervalToResponse),
  };
}

export function leagueFaabToResponse(report: LeagueFaab) {
  return {
    league_id: report.leagueId,
    league_name: report.leagueName,
    weeks_analyzed: report.weeksAnalyzed,
    budget: report.budget,
    total_spent: report.totalSpent,
    owner_rankings: report.ownerRankings.map(rankedOwnerFaabToResponse),
    best_value_pickups: report.bestValuePickups.map(intervalToResponse),
    worst_value_pickups: report.worstValuePickups.map(intervalToResponse),
    most_transacted_players: report.mostTransactedPlayers.map(lifecycleToResponse),
  };
}
