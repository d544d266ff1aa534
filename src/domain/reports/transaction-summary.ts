/**
 * League transaction activity.
 */

import {
  TransactionEvent,
  TransactionType,
  isFailedWaiver,
  isWellFormedEvent,
} from '../ownership';

export interface RosterActivity {
  rosterId: number;
  total: number;
  trades: number;
  waivers: number;
  freeAgents: number;
  commissioner: number;
}

export interface TransactionSummary {
  total: number;
  byType: Record<TransactionType, number>;
  /** Weeks with activity, ascending */
  byWeek: Array<{ week: number; count: number }>;
  /** Roster order */
  byRoster: RosterActivity[];
}

/**
 * Completed moves only: pending, failed and malformed events never happened.
 */
export function isCountedTransaction(event: TransactionEvent): boolean {
  return isWellFormedEvent(event) && event.status === 'complete' && !isFailedWaiver(event);
}

function emptyActivity(rosterId: number): RosterActivity {
  return { rosterId, total: 0, trades: 0, waivers: 0, freeAgents: 0, commissioner: 0 };
}

function bump(activity: RosterActivity, type: TransactionType): void {
  activity.total++;
  switch (type) {
    case 'trade':
      activity.trades++;
      break;
    case 'waiver':
      activity.waivers++;
      break;
    case 'free_agent':
      activity.freeAgents++;
      break;
    case 'commissioner':
      activity.commissioner++;
      break;
  }
}

/**
 * A transaction counts once for each roster it names.
 */
export function summarizeTransactions(
  rosterIds: readonly number[],
  events: readonly TransactionEvent[]
): TransactionSummary {
  const counted = events.filter(isCountedTransaction);

  const byType: Record<TransactionType, number> = { trade: 0, waiver: 0, free_agent: 0, commissioner: 0 };
  const byWeek = new Map<number, number>();
  const byRoster = new Map<number, RosterActivity>(rosterIds.map((id) => [id, emptyActivity(id)]));

  for (const event of counted) {
    byType[event.type]++;
    byWeek.set(event.week, (byWeek.get(event.week) ?? 0) + 1);

    for (const rosterId of new Set(event.rosterIds)) {
      let activity = byRoster.get(rosterId);
      if (!activity) {
        activity = emptyActivity(rosterId);
        byRoster.set(rosterId, activity);
      }
      bump(activity, event.type);
    }
  }

  return {
    total: counted.length,
    byType,
    byWeek: [...byWeek.entries()].sort(([a], [b]) => a - b).map(([week, count]) => ({ week, count })),
    byRoster: [...byRoster.values()].sort((a, b) => a.rosterId - b.rosterId),
  };
}

export function mostActiveTeams(summary: TransactionSummary): RosterActivity[] {
  return [...summary.byRoster].sort((a, b) => b.total - a.total || a.rosterId - b.rosterId);
}
