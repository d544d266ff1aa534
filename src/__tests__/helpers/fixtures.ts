import { PlayerDirectory, PlayerInfo, PlayerSnapshot, createSnapshot } from '../../domain/snapshot';
import { AcquisitionMethod, TransactionEvent } from '../../domain/ownership';
import { AttributedInterval, computeRoi } from '../../domain/attribution';

export interface SnapshotSpec {
  rosterId: number;
  week: number;
  matchupId?: number | null;
  /** Reported score; defaults to the starters' sum */
  points?: number;
  starters: Record<string, number>;
  bench?: Record<string, number>;
}

export function makeSnapshot(spec: SnapshotSpec): PlayerSnapshot {
  const bench = spec.bench ?? {};
  const starters = Object.keys(spec.starters);
  const pointsByPlayer = { ...spec.starters, ...bench };
  const starterTotal = Object.values(spec.starters).reduce((sum, points) => sum + points, 0);

  return createSnapshot({
    rosterId: spec.rosterId,
    week: spec.week,
    matchupId: spec.matchupId === undefined ? 1 : spec.matchupId,
    points: spec.points ?? starterTotal,
    starters,
    players: [...starters, ...Object.keys(bench)],
    pointsByPlayer,
  });
}

/**
 * A bare matchup score, for luck and standings tests.
 */
export function scoreSnapshot(rosterId: number, week: number, matchupId: number | null, points: number): PlayerSnapshot {
  return createSnapshot({
    rosterId,
    week,
    matchupId,
    points,
    starters: [],
    players: [],
    pointsByPlayer: {},
  });
}

export function makeDirectory(entries: Array<[string, string, string]>): PlayerDirectory {
  const directory = new Map<string, PlayerInfo>();
  for (const [playerId, name, position] of entries) {
    directory.set(playerId, { playerId, name, position, team: 'FA' });
  }
  return directory;
}

let transactionCounter = 0;

export function makeEvent(overrides: Partial<TransactionEvent> & Pick<TransactionEvent, 'week'>): TransactionEvent {
  transactionCounter++;
  return {
    transactionId: `tx-${transactionCounter}`,
    type: 'free_agent',
    status: 'complete',
    rosterIds: [],
    adds: {},
    drops: {},
    draftPicks: [],
    waiverBid: null,
    notes: null,
    created: null,
    sequence: 0,
    ...overrides,
  };
}

/**
 * Two weeks of a four-team league.
 * Week 1: 1 (85) beats 2 (80), 4 (120) beats 3 (100).
 * Week 2: 1 (110) beats 3 (70), 4 (100) beats 2 (95).
 */
export function twoWeekScores(): PlayerSnapshot[] {
  return [
    scoreSnapshot(1, 1, 1, 85),
    scoreSnapshot(2, 1, 1, 80),
    scoreSnapshot(3, 1, 2, 100),
    scoreSnapshot(4, 1, 2, 120),
    scoreSnapshot(1, 2, 1, 110),
    scoreSnapshot(3, 2, 1, 70),
    scoreSnapshot(2, 2, 2, 95),
    scoreSnapshot(4, 2, 2, 100),
  ];
}

export function makeAttributed(
  overrides: Partial<AttributedInterval> & { method: AcquisitionMethod; points: number }
): AttributedInterval {
  return {
    playerId: 'X',
    rosterId: 1,
    startWeek: 1,
    endWeek: null,
    cost: 0,
    weeksOwned: 1,
    pointsPerWeek: overrides.points,
    roi: computeRoi(overrides.points, overrides.cost ?? 0),
    ...overrides,
  };
}
