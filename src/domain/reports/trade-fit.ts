/**
 * Trade Fit
 *
 * Roster needs at the skill positions, and how a proposed swap changes them
 * for both sides.
 */

import { PlayerDirectory, describePlayer, roundTo } from '../snapshot';
import { PositionSlot } from '../lineup';
import { PlayerPointsIndex } from '../attribution';

export const CORE_POSITIONS = ['QB', 'RB', 'WR', 'TE'] as const;

export type CorePosition = (typeof CORE_POSITIONS)[number];

export type NeedLevel = 'critical' | 'moderate' | 'satisfied';

export type TradePriority = 'win_now' | 'build_depth' | 'balanced';

export type FitRecommendation = 'Strong fit' | 'Reasonable fit' | 'Poor fit';

export type ProposalFairness = 'Fair' | 'Slightly Uneven' | 'Uneven';

export interface PositionNeed {
  position: CorePosition;
  count: number;
  startersNeeded: number;
  bench: number;
  level: NeedLevel;
}

export interface RosterNeeds {
  rosterId: number;
  positions: PositionNeed[];
  topNeed: CorePosition | null;
  priority: TradePriority;
}

export interface TradeProposal {
  rosterId: number;
  gives: readonly string[];
  opponentId: number;
  receives: readonly string[];
}

export interface TradeFit {
  rosterId: number;
  gives: string[];
  receives: string[];
  valueIn: number;
  valueOut: number;
  improvements: CorePosition[];
  downgrades: CorePosition[];
  fitScore: number;
  recommendation: FitRecommendation;
}

export interface TradeEvaluation {
  roster: TradeFit;
  opponent: TradeFit;
  valueDifference: number;
  fairness: ProposalFairness;
  winnerRosterId: number | null;
  confidence: 'high' | 'medium';
}

const LEVEL_RANK: Record<NeedLevel, number> = { critical: 0, moderate: 1, satisfied: 2 };

/**
 * Dedicated starter slots per position; flex slots are not counted.
 */
export function startersNeeded(template: readonly PositionSlot[]): Record<CorePosition, number> {
  const needed: Record<CorePosition, number> = { QB: 0, RB: 0, WR: 0, TE: 0 };
  for (const slot of template) {
    if (slot === 'QB' || slot === 'RB' || slot === 'WR' || slot === 'TE') needed[slot]++;
  }
  return needed;
}

export function classifyNeed(count: number, needed: number): NeedLevel {
  if (Math.min(count, needed) < needed) return 'critical';
  if (Math.max(0, count - needed) < 2) return 'moderate';
  return 'satisfied';
}

export function analyzeRosterNeeds(
  rosterId: number,
  players: readonly string[],
  directory: PlayerDirectory,
  template: readonly PositionSlot[]
): RosterNeeds {
  const needed = startersNeeded(template);
  const counts: Record<CorePosition, number> = { QB: 0, RB: 0, WR: 0, TE: 0 };
  for (const playerId of players) {
    const { position } = describePlayer(directory, playerId);
    if (position === 'QB' || position === 'RB' || position === 'WR' || position === 'TE') counts[position]++;
  }

  const positions = CORE_POSITIONS.map((position) => ({
    position,
    count: counts[position],
    startersNeeded: needed[position],
    bench: Math.max(0, counts[position] - needed[position]),
    level: classifyNeed(counts[position], needed[position]),
  }));

  const topNeed =
    positions.find((p) => p.level === 'critical')?.position ??
    positions.find((p) => p.level === 'moderate')?.position ??
    null;

  let priority: TradePriority = 'balanced';
  if (positions.some((p) => p.level === 'critical')) priority = 'win_now';
  else if (positions.filter((p) => p.level === 'satisfied').length >= 3) priority = 'build_depth';

  return { rosterId, positions, topNeed, priority };
}

/**
 * Season points per week the player scored in.
 */
export function playerTradeValue(pointsIndex: PlayerPointsIndex, playerId: string): number {
  const weekly = pointsIndex.get(playerId);
  if (!weekly || weekly.size === 0) return 0;
  let total = 0;
  for (const points of weekly.values()) total += points;
  return roundTo(total / weekly.size, 2);
}

export function classifyProposalFairness(valueDifference: number): ProposalFairness {
  if (valueDifference < 10) return 'Fair';
  if (valueDifference < 25) return 'Slightly Uneven';
  return 'Uneven';
}

export function recommendFit(fitScore: number): FitRecommendation {
  if (fitScore >= 70) return 'Strong fit';
  if (fitScore >= 50) return 'Reasonable fit';
  return 'Poor fit';
}

interface FitInput {
  rosterId: number;
  players: readonly string[];
  gives: readonly string[];
  receives: readonly string[];
}

function evaluateSide(
  side: FitInput,
  directory: PlayerDirectory,
  template: readonly PositionSlot[],
  pointsIndex: PlayerPointsIndex
): TradeFit {
  const given = new Set(side.gives);
  const after = [...side.players.filter((id) => !given.has(id)), ...side.receives];

  const before = analyzeRosterNeeds(side.rosterId, side.players, directory, template);
  const next = analyzeRosterNeeds(side.rosterId, after, directory, template);

  const improvements: CorePosition[] = [];
  const downgrades: CorePosition[] = [];
  before.positions.forEach((need, idx) => {
    const change = LEVEL_RANK[next.positions[idx].level] - LEVEL_RANK[need.level];
    if (change > 0) improvements.push(need.position);
    if (change < 0) downgrades.push(need.position);
  });

  const sumValue = (ids: readonly string[]) =>
    roundTo(ids.reduce((sum, id) => sum + playerTradeValue(pointsIndex, id), 0), 2);

  const fitScore = Math.max(0, Math.min(100, 50 + 15 * improvements.length - 10 * downgrades.length));

  return {
    rosterId: side.rosterId,
    gives: [...side.gives],
    receives: [...side.receives],
    valueIn: sumValue(side.receives),
    valueOut: sumValue(side.gives),
    improvements,
    downgrades,
    fitScore,
    recommendation: recommendFit(fitScore),
  };
}

/**
 * Both sides of a proposed swap. `rosters` holds each roster's current players.
 */
export function evaluateTrade(
  proposal: TradeProposal,
  rosters: ReadonlyMap<number, readonly string[]>,
  directory: PlayerDirectory,
  template: readonly PositionSlot[],
  pointsIndex: PlayerPointsIndex
): TradeEvaluation {
  const roster = evaluateSide(
    {
      rosterId: proposal.rosterId,
      players: rosters.get(proposal.rosterId) ?? [],
      gives: proposal.gives,
      receives: proposal.receives,
    },
    directory,
    template,
    pointsIndex
  );
  const opponent = evaluateSide(
    {
      rosterId: proposal.opponentId,
      players: rosters.get(proposal.opponentId) ?? [],
      gives: proposal.receives,
      receives: proposal.gives,
    },
    directory,
    template,
    pointsIndex
  );

  const valueDifference = roundTo(Math.abs(roster.valueIn - opponent.valueIn), 2);

  let winnerRosterId: number | null = null;
  if (roster.fitScore > opponent.fitScore + 10) winnerRosterId = roster.rosterId;
  else if (opponent.fitScore > roster.fitScore + 10) winnerRosterId = opponent.rosterId;

  return {
    roster,
    opponent,
    valueDifference,
    fairness: classifyProposalFairness(valueDifference),
    winnerRosterId,
    confidence: winnerRosterId !== null && valueDifference < 15 ? 'high' : 'medium',
  };
}
