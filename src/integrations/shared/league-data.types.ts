/**
 * Provider-agnostic league DTOs
 * These types are stable across all feed implementations; snapshots and
 * transactions use the domain's own types directly.
 */

export interface LeagueInfo {
  leagueId: string;
  name: string;
  season: string;
  /** Ordered roster-slot template, bench and reserve included */
  rosterPositions: string[];
  /** FAAB budget per team; null when the league does not set one */
  waiverBudget: number | null;
  totalRosters: number;
}

export interface RosterInfo {
  rosterId: number;
  ownerId: string | null;
  /** Players held right now */
  players: string[];
}

export interface LeagueUser {
  userId: string;
  displayName: string;
  teamName: string | null;
}

export interface DraftInfo {
  draftId: string;
  season: string | null;
  status: string | null;
}

export interface DraftPickRecord {
  pickNumber: number;
  round: number;
  pickInRound: number;
  rosterId: number | null;
  playerId: string | null;
}
