/**
 * Ownership Timeline Reconstruction
 *
 * Replays a season of transactions into per-player ownership intervals.
 * Pure functions, no I/O.
 *
 * Ordering: week ascending, then feed-arrival `sequence` within the week.
 * When two events touch the same player in the same week, the later one wins.
 */

import { classifyAcquisition, isFailedWaiver } from './acquisition';
import {
  AcquisitionMethod,
  OwnershipInterval,
  TRANSACTION_TYPES,
  TransactionEvent,
} from './ownership.types';

export interface ReconstructOptions {
  /** Last analysed week; events after it are ignored */
  lastWeek: number;
  /** rosterId -> players currently held */
  heldRosters: ReadonlyMap<number, readonly string[]>;
}

export interface OwnershipTimeline {
  intervalsByPlayer: ReadonlyMap<string, readonly OwnershipInterval[]>;
  appliedEvents: number;
  skippedEvents: number;
}

/**
 * Mutable per-player state used while replaying. Frozen on output.
 */
class PlayerTimeline {
  readonly intervals: OwnershipInterval[] = [];

  constructor(private readonly playerId: string) {}

  get isEmpty(): boolean {
    return this.intervals.length === 0;
  }

  get open(): OwnershipInterval | undefined {
    const last = this.intervals[this.intervals.length - 1];
    return last && last.endWeek === null ? last : undefined;
  }

  /**
   * Close the open interval. An interval left with no weeks is discarded.
   */
  close(endWeek: number): void {
    const open = this.open;
    if (!open) return;
    if (endWeek < open.startWeek) {
      this.intervals.pop();
    } else {
      open.endWeek = endWeek;
    }
  }

  begin(rosterId: number, startWeek: number, method: AcquisitionMethod, cost: number): void {
    this.close(startWeek - 1);

    // Keep intervals disjoint when a drop and a re-add land in the same week
    const last = this.intervals[this.intervals.length - 1];
    if (last && last.endWeek !== null && last.endWeek >= startWeek) {
      last.endWeek = startWeek - 1;
      if (last.endWeek < last.startWeek) this.intervals.pop();
    }

    this.intervals.push({
      playerId: this.playerId,
      rosterId,
      startWeek,
      endWeek: null,
      method,
      cost,
    });
  }

  seedDraft(rosterId: number): void {
    this.intervals.push({
      playerId: this.playerId,
      rosterId,
      startWeek: 1,
      endWeek: null,
      method: 'draft',
      cost: 0,
    });
  }
}

/**
 * Structural checks for an event coming off the feed.
 */
export function isWellFormedEvent(event: TransactionEvent): boolean {
  return (
    typeof event.transactionId === 'string' &&
    event.transactionId.length > 0 &&
    Number.isInteger(event.week) &&
    event.week >= 1 &&
    TRANSACTION_TYPES.includes(event.type) &&
    typeof event.adds === 'object' &&
    event.adds !== null &&
    typeof event.drops === 'object' &&
    event.drops !== null
  );
}

/**
 * Deterministic replay order: week, then feed-arrival sequence.
 */
export function orderTransactions(events: readonly TransactionEvent[]): TransactionEvent[] {
  return [...events].sort((a, b) => {
    if (a.week !== b.week) return a.week - b.week;
    return a.sequence - b.sequence;
  });
}

function applyEvent(
  event: TransactionEvent,
  timelines: Map<string, PlayerTimeline>
): void {
  const timelineFor = (playerId: string): PlayerTimeline => {
    let timeline = timelines.get(playerId);
    if (!timeline) {
      timeline = new PlayerTimeline(playerId);
      timelines.set(playerId, timeline);
    }
    return timeline;
  };

  const { method, cost } = classifyAcquisition(event);

  for (const [playerId, rosterId] of Object.entries(event.adds)) {
    const droppedBy = event.drops[playerId];

    // Added and dropped by the same roster in one move: nothing changed hands
    if (droppedBy === rosterId) continue;

    const timeline = timelineFor(playerId);

    // First sighting is a trade away from the drafting roster
    if (timeline.isEmpty && droppedBy !== undefined) {
      timeline.seedDraft(droppedBy);
    }

    timeline.begin(rosterId, event.week, method, cost);
  }

  for (const [playerId, rosterId] of Object.entries(event.drops)) {
    // The receiving side of the same transaction already closed this interval
    if (Object.prototype.hasOwnProperty.call(event.adds, playerId)) continue;

    const timeline = timelineFor(playerId);

    if (timeline.isEmpty) {
      timeline.seedDraft(rosterId);
      timeline.close(event.week);
    } else if (timeline.open?.rosterId === rosterId) {
      timeline.close(event.week);
    }
  }
}

/**
 * For each player in `events` (already ordered), the roster holding them
 * before their first move: the releasing roster, or null when the first move
 * picked them up as a free agent.
 */
function ownersBeforeFirstMove(events: readonly TransactionEvent[]): Map<string, number | null> {
  const owners = new Map<string, number | null>();
  for (const event of events) {
    for (const [playerId, rosterId] of Object.entries(event.drops)) {
      if (!owners.has(playerId)) owners.set(playerId, rosterId);
    }
    for (const playerId of Object.keys(event.adds)) {
      if (!owners.has(playerId)) owners.set(playerId, null);
    }
  }
  return owners;
}

/**
 * Replay the season's transactions into ownership intervals for every player
 * that was transacted or is currently held.
 *
 * - Failed waiver claims (and pending transactions) change nothing.
 * - Malformed events are skipped.
 * - Players held now but never seen in a transaction were drafted by their
 *   current roster and owned since week 1.
 * - Players first moved after `lastWeek` stay with the roster that released
 *   them, from week 1.
 * - Intervals still open at the end keep `endWeek: null`.
 */
export function reconstructOwnership(
  events: readonly TransactionEvent[],
  options: ReconstructOptions
): OwnershipTimeline {
  const timelines = new Map<string, PlayerTimeline>();
  let applied = 0;
  let skipped = 0;

  const wellFormed = orderTransactions(events.filter(isWellFormedEvent));
  const lateEvents: TransactionEvent[] = [];

  for (const event of wellFormed) {
    if (event.status === 'pending' || isFailedWaiver(event)) {
      skipped++;
      continue;
    }
    if (event.week > options.lastWeek) {
      lateEvents.push(event);
      skipped++;
      continue;
    }
    applyEvent(event, timelines);
    applied++;
  }
  skipped += events.length - wellFormed.length;

  // Players whose only moves come after the analysed range belonged to
  // whoever released them first, not to their current roster
  const lateOwners = ownersBeforeFirstMove(lateEvents);
  for (const [playerId, rosterId] of lateOwners) {
    if (rosterId === null || timelines.has(playerId)) continue;
    const timeline = new PlayerTimeline(playerId);
    timeline.seedDraft(rosterId);
    timelines.set(playerId, timeline);
  }

  for (const [rosterId, playerIds] of options.heldRosters) {
    for (const playerId of playerIds) {
      if (!playerId || timelines.has(playerId) || lateOwners.has(playerId)) continue;
      const timeline = new PlayerTimeline(playerId);
      timeline.seedDraft(rosterId);
      timelines.set(playerId, timeline);
    }
  }

  const intervalsByPlayer = new Map<string, readonly OwnershipInterval[]>();
  for (const [playerId, timeline] of timelines) {
    if (timeline.isEmpty) continue;
    intervalsByPlayer.set(
      playerId,
      Object.freeze(timeline.intervals.map((interval) => Object.freeze({ ...interval })))
    );
  }

  return { intervalsByPlayer, appliedEvents: applied, skippedEvents: skipped };
}

/**
 * Every interval a roster held, across all players, in start-week order.
 */
export function intervalsForRoster(
  timeline: OwnershipTimeline,
  rosterId: number
): OwnershipInterval[] {
  const result: OwnershipInterval[] = [];
  for (const intervals of timeline.intervalsByPlayer.values()) {
    result.push(...intervals.filter((i) => i.rosterId === rosterId));
  }
  return result.sort((a, b) => a.startWeek - b.startWeek || a.playerId.localeCompare(b.playerId));
}

export function effectiveEndWeek(interval: OwnershipInterval, lastWeek: number): number {
  return interval.endWeek ?? lastWeek;
}

/**
 * Intervals are ordered, disjoint, and only the last may be open.
 */
export function isWellOrdered(intervals: readonly OwnershipInterval[]): boolean {
  for (let i = 0; i < intervals.length; i++) {
    const current = intervals[i];
    if (current.endWeek !== null && current.endWeek < current.startWeek) return false;
    if (i === intervals.length - 1) break;
    const next = intervals[i + 1];
    if (current.endWeek === null) return false;
    if (next.startWeek <= current.endWeek) return false;
  }
  return true;
}
