/**
 * Standings derived from head-to-head matchup results.
 */

import { roundTo } from '../snapshot';
import { MatchupResult, WeeklyLuckRecord } from '../luck';

export interface Standing {
  rank: number;
  rosterId: number;
  wins: number;
  losses: number;
  ties: number;
  pointsFor: number;
  pointsAgainst: number;
  /** e.g. "W3"; empty when no games were played */
  streak: string;
}

/**
 * Current streak over the most recent five results.
 */
export function calculateStreak(results: readonly { week: number; result: MatchupResult }[]): string {
  const recent = [...results].sort((a, b) => a.week - b.week).slice(-5).reverse();

  let streak = 0;
  let streakType: MatchupResult | null = null;

  for (const { result } of recent) {
    if (streakType === null) {
      streakType = result;
      streak = 1;
    } else if (result === streakType) {
      streak++;
    } else {
      break;
    }
  }

  if (streakType === null) return '';
  return `${streakType}${streak}`;
}

/**
 * Sort order: wins desc, points for desc, roster id asc.
 * Rosters with no paired games still appear with an empty record.
 */
export function buildStandings(
  rosterIds: readonly number[],
  records: readonly WeeklyLuckRecord[]
): Standing[] {
  const byRoster = new Map<number, WeeklyLuckRecord[]>();
  for (const rosterId of rosterIds) byRoster.set(rosterId, []);
  for (const record of records) {
    const list = byRoster.get(record.rosterId) ?? [];
    list.push(record);
    byRoster.set(record.rosterId, list);
  }

  const standings = [...byRoster.entries()].map(([rosterId, games]) => ({
    rank: 0,
    rosterId,
    wins: games.filter((g) => g.result === 'W').length,
    losses: games.filter((g) => g.result === 'L').length,
    ties: games.filter((g) => g.result === 'T').length,
    pointsFor: roundTo(games.reduce((sum, g) => sum + g.points, 0), 2),
    pointsAgainst: roundTo(games.reduce((sum, g) => sum + g.opponentPoints, 0), 2),
    streak: calculateStreak(games),
  }));

  standings.sort((a, b) => b.wins - a.wins || b.pointsFor - a.pointsFor || a.rosterId - b.rosterId);

  return standings.map((standing, idx) => ({ ...standing, rank: idx + 1 }));
}
