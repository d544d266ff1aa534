/**
 * Weekly Luck
 *
 * Scores each team-week against the whole league rather than just its
 * head-to-head opponent. A win with a below-median score was lucky; a loss
 * with an above-median score was unlucky.
 */

import { PlayerSnapshot, roundTo } from '../snapshot';

export type MatchupResult = 'W' | 'L' | 'T';

export type LuckFactor = 'lucky_win' | 'unlucky_loss' | 'deserved_win' | 'deserved_loss' | 'tie';

export interface WeeklyLuckRecord {
  rosterId: number;
  week: number;
  points: number;
  opponentRosterId: number;
  opponentPoints: number;
  result: MatchupResult;
  leagueMedian: number;
  /** 1 = highest scorer of the week */
  leagueRank: number;
  /** Teams this team outscored that week */
  winsVsAll: number;
  expectedWinPct: number;
  luckFactor: LuckFactor;
}

export interface MatchupPair {
  matchupId: number;
  home: PlayerSnapshot;
  away: PlayerSnapshot;
}

/**
 * Median of a list of numbers; the mean of the two middle values for an
 * even count.
 */
export function calculateMedian(values: readonly number[]): number {
  if (values.length === 0) return 0;

  const sorted = [...values].sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);

  if (sorted.length % 2 === 0) {
    return (sorted[mid - 1] + sorted[mid]) / 2;
  }
  return sorted[mid];
}

/**
 * Pair a week's snapshots by matchup id. Only matchups with exactly two
 * teams count; byes and malformed groups are dropped.
 */
export function pairMatchups(snapshots: readonly PlayerSnapshot[]): MatchupPair[] {
  const groups = new Map<number, PlayerSnapshot[]>();

  for (const snapshot of snapshots) {
    if (snapshot.matchupId === null) continue;
    const group = groups.get(snapshot.matchupId) ?? [];
    group.push(snapshot);
    groups.set(snapshot.matchupId, group);
  }

  const pairs: MatchupPair[] = [];
  for (const [matchupId, group] of groups) {
    if (group.length !== 2) continue;
    const [home, away] = group[0].rosterId <= group[1].rosterId ? group : [group[1], group[0]];
    pairs.push({ matchupId, home, away });
  }

  return pairs.sort((a, b) => a.matchupId - b.matchupId);
}

export function resultFor(points: number, opponentPoints: number): MatchupResult {
  if (points > opponentPoints) return 'W';
  if (points < opponentPoints) return 'L';
  return 'T';
}

export function classifyLuck(result: MatchupResult, points: number, median: number): LuckFactor {
  if (result === 'T') return 'tie';
  if (result === 'W') return points < median ? 'lucky_win' : 'deserved_win';
  return points > median ? 'unlucky_loss' : 'deserved_loss';
}

/**
 * Luck records for every paired team in one week, in roster order.
 */
export function analyzeWeeklyLuck(
  week: number,
  snapshots: readonly PlayerSnapshot[]
): WeeklyLuckRecord[] {
  const pairs = pairMatchups(snapshots);

  const entries: Array<{ team: PlayerSnapshot; opponent: PlayerSnapshot }> = [];
  for (const { home, away } of pairs) {
    entries.push({ team: home, opponent: away });
    entries.push({ team: away, opponent: home });
  }

  if (entries.length === 0) return [];

  const scores = entries.map((entry) => entry.team.points);
  const median = calculateMedian(scores);

  const ranked = [...entries].sort(
    (a, b) => b.team.points - a.team.points || a.team.rosterId - b.team.rosterId
  );
  const rankByRoster = new Map(ranked.map((entry, idx) => [entry.team.rosterId, idx + 1]));

  const n = entries.length;

  return entries
    .map(({ team, opponent }) => {
      const winsVsAll = entries.filter(
        (other) => other.team.rosterId !== team.rosterId && team.points > other.team.points
      ).length;
      const result = resultFor(team.points, opponent.points);

      return {
        rosterId: team.rosterId,
        week,
        points: roundTo(team.points, 2),
        opponentRosterId: opponent.rosterId,
        opponentPoints: roundTo(opponent.points, 2),
        result,
        leagueMedian: roundTo(median, 2),
        leagueRank: rankByRoster.get(team.rosterId) ?? n,
        winsVsAll,
        expectedWinPct: n > 1 ? roundTo(winsVsAll / (n - 1), 3) : 0,
        luckFactor: classifyLuck(result, team.points, median),
      };
    })
    .sort((a, b) => a.rosterId - b.rosterId);
}
