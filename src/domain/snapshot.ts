/**
 * Snapshot Domain Types
 *
 * Immutable per-request inputs shared by every analytics engine.
 * Built once from the data feeds and never mutated afterwards.
 */

/**
 * One team's roster state for one week.
 */
export interface PlayerSnapshot {
  readonly rosterId: number;
  readonly week: number;
  /** Pairing key for head-to-head matchups; null on bye or unpaired weeks */
  readonly matchupId: number | null;
  /** Score reported by the platform */
  readonly points: number;
  readonly starters: readonly string[];
  readonly players: readonly string[];
  readonly pointsByPlayer: Readonly<Record<string, number>>;
}

export interface PlayerInfo {
  readonly playerId: string;
  readonly name: string;
  readonly position: string;
  readonly team: string;
}

export type PlayerDirectory = ReadonlyMap<string, PlayerInfo>;

/**
 * Resolve a player from the directory, falling back to the raw id for
 * players the directory does not know (retired, team defenses renamed, etc.).
 */
export function describePlayer(directory: PlayerDirectory, playerId: string): PlayerInfo {
  return (
    directory.get(playerId) ?? {
      playerId,
      name: playerId,
      position: 'Unknown',
      team: 'FA',
    }
  );
}

export function pointsFor(snapshot: PlayerSnapshot, playerId: string): number {
  return snapshot.pointsByPlayer[playerId] ?? 0;
}

export function createSnapshot(input: PlayerSnapshot): PlayerSnapshot {
  return Object.freeze({
    ...input,
    starters: Object.freeze([...input.starters]),
    players: Object.freeze([...input.players]),
    pointsByPlayer: Object.freeze({ ...input.pointsByPlayer }),
  });
}

/**
 * Round to a fixed number of decimals for report output.
 */
export function roundTo(value: number, decimals: number): number {
  const factor = Math.pow(10, decimals);
  return Math.round(value * factor) / factor;
}
