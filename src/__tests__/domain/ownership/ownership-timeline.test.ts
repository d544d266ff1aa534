import {
  OwnershipInterval,
  classifyAcquisition,
  intervalsForRoster,
  isFailedWaiver,
  isWellOrdered,
  orderTransactions,
  reconstructOwnership,
} from '../../../domain/ownership';
import { makeEvent } from '../../helpers/fixtures';

const noHeld = new Map<number, readonly string[]>();

describe('classifyAcquisition', () => {
  it('treats multi-roster moves as trades', () => {
    expect(classifyAcquisition(makeEvent({ week: 1, type: 'trade', rosterIds: [1, 2] }))).toEqual({
      method: 'trade',
      cost: 0,
    });
    expect(classifyAcquisition(makeEvent({ week: 1, type: 'commissioner', rosterIds: [1, 2] }))).toEqual({
      method: 'trade',
      cost: 0,
    });
  });

  it('charges the bid for a successful waiver', () => {
    expect(classifyAcquisition(makeEvent({ week: 1, type: 'waiver', waiverBid: 12.4 }))).toEqual({
      method: 'waiver',
      cost: 12,
    });
    expect(classifyAcquisition(makeEvent({ week: 1, type: 'waiver', waiverBid: null }))).toEqual({
      method: 'waiver',
      cost: 0,
    });
  });

  it('charges nothing for a failed claim', () => {
    const failed = makeEvent({
      week: 1,
      type: 'waiver',
      waiverBid: 30,
      notes: 'Claimed by another roster, not processed',
    });
    expect(isFailedWaiver(failed)).toBe(true);
    expect(classifyAcquisition(failed)).toEqual({ method: 'free_agent', cost: 0 });
  });

  it('reads failed status regardless of notes', () => {
    expect(isFailedWaiver(makeEvent({ week: 1, type: 'waiver', status: 'failed' }))).toBe(true);
    expect(isFailedWaiver(makeEvent({ week: 1, type: 'free_agent', status: 'failed' }))).toBe(false);
  });
});

describe('orderTransactions', () => {
  it('sorts by week then feed sequence', () => {
    const a = makeEvent({ week: 2, sequence: 0 });
    const b = makeEvent({ week: 1, sequence: 1 });
    const c = makeEvent({ week: 1, sequence: 0 });

    expect(orderTransactions([a, b, c]).map((e) => e.transactionId)).toEqual([
      c.transactionId,
      b.transactionId,
      a.transactionId,
    ]);
  });
});

describe('reconstructOwnership', () => {
  it('follows a player through a trade, a drop and a waiver claim', () => {
    const events = [
      makeEvent({ week: 11, type: 'waiver', adds: { X: 3 }, rosterIds: [3], waiverBid: 12 }),
      makeEvent({ week: 5, type: 'trade', adds: { X: 2 }, drops: { X: 1 }, rosterIds: [1, 2] }),
      makeEvent({ week: 9, type: 'free_agent', drops: { X: 2 }, rosterIds: [2] }),
    ];

    const timeline = reconstructOwnership(events, {
      lastWeek: 17,
      heldRosters: new Map([[3, ['X']]]),
    });

    expect(timeline.appliedEvents).toBe(3);
    expect(timeline.skippedEvents).toBe(0);
    expect(timeline.intervalsByPlayer.get('X')).toEqual([
      { playerId: 'X', rosterId: 1, startWeek: 1, endWeek: 4, method: 'draft', cost: 0 },
      { playerId: 'X', rosterId: 2, startWeek: 5, endWeek: 9, method: 'trade', cost: 0 },
      { playerId: 'X', rosterId: 3, startWeek: 11, endWeek: null, method: 'waiver', cost: 12 },
    ]);
  });

  it('ignores a waiver claim that lost', () => {
    const timeline = reconstructOwnership(
      [
        makeEvent({
          week: 4,
          type: 'waiver',
          adds: { Y: 2 },
          rosterIds: [2],
          waiverBid: 20,
          notes: 'Claimed by another roster, not processed',
        }),
      ],
      { lastWeek: 17, heldRosters: noHeld }
    );

    expect(timeline.intervalsByPlayer.size).toBe(0);
    expect(timeline.appliedEvents).toBe(0);
    expect(timeline.skippedEvents).toBe(1);
  });

  it('treats an add and drop by the same roster as no change', () => {
    const timeline = reconstructOwnership(
      [makeEvent({ week: 2, adds: { Z: 1 }, drops: { Z: 1 }, rosterIds: [1] })],
      { lastWeek: 17, heldRosters: noHeld }
    );

    expect(timeline.appliedEvents).toBe(1);
    expect(timeline.intervalsByPlayer.has('Z')).toBe(false);
  });

  it('skips pending, late and malformed events', () => {
    const events = [
      makeEvent({ week: 1, adds: { A: 1 }, rosterIds: [1] }),
      makeEvent({ week: 0, adds: { B: 1 }, rosterIds: [1] }),
      makeEvent({ week: 2, status: 'pending', adds: { C: 1 }, rosterIds: [1] }),
      makeEvent({ week: 20, adds: { D: 1 }, rosterIds: [1] }),
    ];

    const timeline = reconstructOwnership(events, { lastWeek: 17, heldRosters: noHeld });

    expect(timeline.appliedEvents).toBe(1);
    expect(timeline.skippedEvents).toBe(3);
    expect([...timeline.intervalsByPlayer.keys()]).toEqual(['A']);
  });

  it('assumes a drop with no history came from the draft', () => {
    const timeline = reconstructOwnership(
      [makeEvent({ week: 6, drops: { Y: 4 }, rosterIds: [4] })],
      { lastWeek: 17, heldRosters: noHeld }
    );

    expect(timeline.intervalsByPlayer.get('Y')).toEqual([
      { playerId: 'Y', rosterId: 4, startWeek: 1, endWeek: 6, method: 'draft', cost: 0 },
    ]);
  });

  it('seeds untransacted held players as drafted', () => {
    const timeline = reconstructOwnership([], {
      lastWeek: 17,
      heldRosters: new Map([[2, ['H1', '']]]),
    });

    expect(timeline.intervalsByPlayer.get('H1')).toEqual([
      { playerId: 'H1', rosterId: 2, startWeek: 1, endWeek: null, method: 'draft', cost: 0 },
    ]);
    expect(timeline.intervalsByPlayer.size).toBe(1);
  });

  it('keeps a player moved only after the analysed range with the roster that released him', () => {
    const timeline = reconstructOwnership(
      [
        makeEvent({ week: 10, drops: { X: 1 }, rosterIds: [1] }),
        makeEvent({ week: 12, adds: { X: 2 }, rosterIds: [2] }),
      ],
      { lastWeek: 8, heldRosters: new Map([[2, ['X']]]) }
    );

    expect(timeline.appliedEvents).toBe(0);
    expect(timeline.skippedEvents).toBe(2);
    expect(timeline.intervalsByPlayer.get('X')).toEqual([
      { playerId: 'X', rosterId: 1, startWeek: 1, endWeek: null, method: 'draft', cost: 0 },
    ]);
  });

  it('gives no one a player first picked up after the analysed range', () => {
    const timeline = reconstructOwnership(
      [makeEvent({ week: 14, type: 'waiver', adds: { W: 3 }, rosterIds: [3], waiverBid: 9 })],
      { lastWeek: 8, heldRosters: new Map([[3, ['W', 'H']]]) }
    );

    expect(timeline.intervalsByPlayer.has('W')).toBe(false);
    expect(timeline.intervalsByPlayer.get('H')).toEqual([
      { playerId: 'H', rosterId: 3, startWeek: 1, endWeek: null, method: 'draft', cost: 0 },
    ]);
  });

  it('keeps every player\'s intervals ordered across a busy season', () => {
    const events = [
      makeEvent({ week: 3, type: 'trade', adds: { P: 2, Q: 1 }, drops: { P: 1, Q: 2 }, rosterIds: [1, 2] }),
      makeEvent({ week: 5, drops: { P: 2 }, rosterIds: [2] }),
      makeEvent({ week: 5, sequence: 1, type: 'waiver', adds: { P: 3 }, rosterIds: [3], waiverBid: 4 }),
      makeEvent({ week: 8, drops: { P: 3 }, rosterIds: [3] }),
      makeEvent({ week: 8, sequence: 1, adds: { P: 3 }, rosterIds: [3] }),
      makeEvent({ week: 10, type: 'trade', adds: { Q: 3 }, drops: { Q: 1 }, rosterIds: [1, 3] }),
      makeEvent({ week: 12, drops: { Q: 3 }, rosterIds: [3] }),
    ];

    const timeline = reconstructOwnership(events, {
      lastWeek: 14,
      heldRosters: new Map([[3, ['P']]]),
    });

    expect(timeline.intervalsByPlayer.get('P')).toEqual([
      { playerId: 'P', rosterId: 1, startWeek: 1, endWeek: 2, method: 'draft', cost: 0 },
      { playerId: 'P', rosterId: 2, startWeek: 3, endWeek: 4, method: 'trade', cost: 0 },
      { playerId: 'P', rosterId: 3, startWeek: 5, endWeek: 7, method: 'waiver', cost: 4 },
      { playerId: 'P', rosterId: 3, startWeek: 8, endWeek: null, method: 'free_agent', cost: 0 },
    ]);
    expect(timeline.intervalsByPlayer.get('Q')).toEqual([
      { playerId: 'Q', rosterId: 2, startWeek: 1, endWeek: 2, method: 'draft', cost: 0 },
      { playerId: 'Q', rosterId: 1, startWeek: 3, endWeek: 9, method: 'trade', cost: 0 },
      { playerId: 'Q', rosterId: 3, startWeek: 10, endWeek: 12, method: 'trade', cost: 0 },
    ]);
    for (const intervals of timeline.intervalsByPlayer.values()) {
      expect(isWellOrdered(intervals)).toBe(true);
    }
  });

  it('lets the last same-week event win regardless of input order', () => {
    const add = makeEvent({ week: 3, sequence: 0, adds: { X: 1 }, rosterIds: [1] });
    const drop = makeEvent({ week: 3, sequence: 1, drops: { X: 1 }, rosterIds: [1] });
    const claim = makeEvent({
      week: 3,
      sequence: 2,
      type: 'waiver',
      adds: { X: 2 },
      rosterIds: [2],
      waiverBid: 5,
    });

    const timeline = reconstructOwnership([claim, add, drop], { lastWeek: 17, heldRosters: noHeld });
    const intervals = timeline.intervalsByPlayer.get('X') ?? [];

    expect(intervals).toEqual([
      { playerId: 'X', rosterId: 2, startWeek: 3, endWeek: null, method: 'waiver', cost: 5 },
    ]);
    expect(isWellOrdered(intervals)).toBe(true);
  });

  it('lists a roster\'s intervals by start week', () => {
    const timeline = reconstructOwnership(
      [
        makeEvent({ week: 7, adds: { B: 1 }, rosterIds: [1] }),
        makeEvent({ week: 3, adds: { A: 1 }, rosterIds: [1] }),
        makeEvent({ week: 4, adds: { C: 2 }, rosterIds: [2] }),
      ],
      { lastWeek: 17, heldRosters: noHeld }
    );

    expect(intervalsForRoster(timeline, 1).map((i) => i.playerId)).toEqual(['A', 'B']);
  });
});

describe('isWellOrdered', () => {
  const interval = (startWeek: number, endWeek: number | null): OwnershipInterval => ({
    playerId: 'X',
    rosterId: 1,
    startWeek,
    endWeek,
    method: 'free_agent',
    cost: 0,
  });

  it('accepts disjoint ascending intervals with only the last open', () => {
    expect(isWellOrdered([interval(1, 4), interval(5, null)])).toBe(true);
    expect(isWellOrdered([])).toBe(true);
  });

  it('rejects overlaps and an open interval before the end', () => {
    expect(isWellOrdered([interval(1, 5), interval(5, null)])).toBe(false);
    expect(isWellOrdered([interval(1, null), interval(5, 6)])).toBe(false);
    expect(isWellOrdered([interval(4, 3)])).toBe(false);
  });
});
