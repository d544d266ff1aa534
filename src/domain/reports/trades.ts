/**
 * Trade Analysis
 *
 * Values each side of a completed trade by what it actually got out of it:
 * the points the received players scored while the receiving roster held
 * them, plus a fixed value per draft pick by round.
 */

import { roundTo } from '../snapshot';
import { TransactionEvent, orderTransactions } from '../ownership';
import { AttributedInterval } from '../attribution';
import { isCountedTransaction } from './transaction-summary';

/** Value of a mid-round pick, by round */
export const PICK_VALUES: Readonly<Record<number, number>> = { 1: 75, 2: 30, 3: 10, 4: 2 };
export const LATE_PICK_VALUE = 0.5;
export const TRADE_WINNER_MARGIN = 5;

export type TradeFairness = 'Fair' | 'Slightly Uneven' | 'Uneven' | 'Lopsided';

export type TradeAsset =
  | { kind: 'player'; playerId: string; value: number }
  | { kind: 'pick'; season: string; round: number; originalRosterId: number; value: number };

export interface TradeSide {
  rosterId: number;
  assets: TradeAsset[];
  totalValue: number;
}

export interface TradeAnalysis {
  transactionId: string;
  week: number;
  sides: TradeSide[];
  valueDifference: number;
  fairness: TradeFairness;
  winnerRosterId: number | null;
}

export interface TradeBalance {
  rosterId: number;
  trades: number;
  netValue: number;
}

export interface TradeWinnersLosers {
  winners: TradeBalance[];
  losers: TradeBalance[];
}

export function pickValue(round: number): number {
  return PICK_VALUES[round] ?? LATE_PICK_VALUE;
}

export function classifyTradeFairness(valueDifference: number): TradeFairness {
  if (valueDifference < 10) return 'Fair';
  if (valueDifference < 25) return 'Slightly Uneven';
  if (valueDifference < 50) return 'Uneven';
  return 'Lopsided';
}

const tradeKey = (playerId: string, rosterId: number, week: number) => `${playerId}:${rosterId}:${week}`;

/**
 * Points of every interval a trade opened, keyed by player, receiver and week.
 */
export function tradeValueIndex(intervals: readonly AttributedInterval[]): Map<string, number> {
  const index = new Map<string, number>();
  for (const interval of intervals) {
    if (interval.method !== 'trade') continue;
    index.set(tradeKey(interval.playerId, interval.rosterId, interval.startWeek), interval.points);
  }
  return index;
}

/**
 * null for anything that is not a completed trade between two or more rosters.
 */
export function analyzeTrade(event: TransactionEvent, valueIndex: ReadonlyMap<string, number>): TradeAnalysis | null {
  if (event.type !== 'trade' || !isCountedTransaction(event)) return null;

  const rosterIds = [...new Set(event.rosterIds)].sort((a, b) => a - b);
  if (rosterIds.length < 2) return null;

  const sides = rosterIds.map((rosterId): TradeSide => {
    const players: TradeAsset[] = Object.entries(event.adds)
      .filter(([, receiver]) => receiver === rosterId)
      .map(([playerId]) => playerId)
      .sort()
      .map((playerId): TradeAsset => ({
        kind: 'player',
        playerId,
        value: valueIndex.get(tradeKey(playerId, rosterId, event.week)) ?? 0,
      }));

    const picks: TradeAsset[] = event.draftPicks
      .filter((pick) => pick.ownerId === rosterId)
      .sort((a, b) => a.season.localeCompare(b.season) || a.round - b.round || a.rosterId - b.rosterId)
      .map((pick): TradeAsset => ({
        kind: 'pick',
        season: pick.season,
        round: pick.round,
        originalRosterId: pick.rosterId,
        value: pickValue(pick.round),
      }));

    const assets = [...players, ...picks];
    return { rosterId, assets, totalValue: roundTo(assets.reduce((sum, asset) => sum + asset.value, 0), 2) };
  });

  const ranked = [...sides].sort((a, b) => b.totalValue - a.totalValue || a.rosterId - b.rosterId);
  const [top, next] = ranked;
  const bottom = ranked[ranked.length - 1];
  const valueDifference = roundTo(top.totalValue - bottom.totalValue, 2);

  return {
    transactionId: event.transactionId,
    week: event.week,
    sides,
    valueDifference,
    fairness: classifyTradeFairness(valueDifference),
    winnerRosterId: top.totalValue - next.totalValue > TRADE_WINNER_MARGIN ? top.rosterId : null,
  };
}

export function analyzeTrades(
  events: readonly TransactionEvent[],
  intervals: readonly AttributedInterval[]
): TradeAnalysis[] {
  const valueIndex = tradeValueIndex(intervals);
  const analyses: TradeAnalysis[] = [];
  for (const event of orderTransactions(events)) {
    const analysis = analyzeTrade(event, valueIndex);
    if (analysis) analyses.push(analysis);
  }
  return analyses;
}

/**
 * Each side scores its value minus the average of the other sides.
 */
export function tradeWinnersLosers(analyses: readonly TradeAnalysis[]): TradeWinnersLosers {
  const balances = new Map<number, TradeBalance>();

  for (const analysis of analyses) {
    const total = analysis.sides.reduce((sum, side) => sum + side.totalValue, 0);
    const others = analysis.sides.length - 1;

    for (const side of analysis.sides) {
      const balance = balances.get(side.rosterId) ?? { rosterId: side.rosterId, trades: 0, netValue: 0 };
      balance.trades++;
      balance.netValue += side.totalValue - (total - side.totalValue) / others;
      balances.set(side.rosterId, balance);
    }
  }

  const rounded = [...balances.values()].map((balance) => ({ ...balance, netValue: roundTo(balance.netValue, 2) }));

  return {
    winners: rounded.filter((b) => b.netValue > 0).sort((a, b) => b.netValue - a.netValue || a.rosterId - b.rosterId),
    losers: rounded.filter((b) => b.netValue < 0).sort((a, b) => a.netValue - b.netValue || a.rosterId - b.rosterId),
  };
}
