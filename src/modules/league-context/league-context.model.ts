import { PlayerDirectory, PlayerSnapshot } from '../../domain/snapshot';
import { PositionSlot } from '../../domain/lineup';
import { TransactionEvent } from '../../domain/ownership';
import { LeagueInfo, RosterInfo } from '../../integrations/shared/league-data.types';
import { LeagueErrors } from '../../utils/exceptions';

/**
 * Immutable per-request view of a league's directory data.
 * Built once after all fetches resolve and passed into every computation.
 */
export interface LeagueContext {
  readonly league: LeagueInfo;
  /** Roster order (ascending roster id) */
  readonly rosters: readonly RosterInfo[];
  readonly teamNames: ReadonlyMap<number, string>;
  readonly directory: PlayerDirectory;
  /** Starter slots only, in declared order */
  readonly template: readonly PositionSlot[];
  readonly faabBudget: number;
  /** rosterId -> players held right now */
  readonly heldRosters: ReadonlyMap<number, readonly string[]>;
}

export interface SeasonData {
  readonly context: LeagueContext;
  /** Last analysed week; weeks run 1..weeks */
  readonly weeks: number;
  readonly snapshotsByWeek: ReadonlyMap<number, readonly PlayerSnapshot[]>;
  readonly transactions: readonly TransactionEvent[];
}

export interface WeekData {
  readonly context: LeagueContext;
  readonly week: number;
  readonly snapshots: readonly PlayerSnapshot[];
}

export function teamName(context: LeagueContext, rosterId: number): string {
  return context.teamNames.get(rosterId) ?? `Team ${rosterId}`;
}

export function rosterIds(context: LeagueContext): number[] {
  return context.rosters.map((roster) => roster.rosterId);
}

/**
 * @throws NotFoundException (ROSTER_NOT_FOUND) for a roster the league does not have
 */
export function requireRoster(context: LeagueContext, rosterId: number): RosterInfo {
  const roster = context.rosters.find((r) => r.rosterId === rosterId);
  if (!roster) {
    throw LeagueErrors.rosterNotFound(rosterId);
  }
  return roster;
}

export function allSnapshots(season: SeasonData): PlayerSnapshot[] {
  const result: PlayerSnapshot[] = [];
  for (let week = 1; week <= season.weeks; week++) {
    result.push(...(season.snapshotsByWeek.get(week) ?? []));
  }
  return result;
}

export function snapshotFor(
  season: SeasonData,
  rosterId: number,
  week: number
): PlayerSnapshot | undefined {
  return season.snapshotsByWeek.get(week)?.find((snapshot) => snapshot.rosterId === rosterId);
}
