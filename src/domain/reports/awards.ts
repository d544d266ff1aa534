/**
 * Weekly high/low score awards and the season payout ledger.
 */

import { WeeklyLuckRecord } from '../luck';

export const DEFAULT_AWARD_PAYOUT = 5;

export interface AwardWinner {
  rosterId: number;
  points: number;
}

export interface WeeklyAward {
  week: number;
  high: AwardWinner;
  low: AwardWinner;
}

export interface TeamAwardTally {
  rosterId: number;
  highScores: number;
  lowScores: number;
  netPayout: number;
}

export interface SeasonAwards {
  payoutPerAward: number;
  /** Weeks that produced an award */
  weeksAnalyzed: number;
  totalPayoutHigh: number;
  totalPayoutLow: number;
  weeks: WeeklyAward[];
  teams: TeamAwardTally[];
}

/**
 * Highest and lowest scorer among one week's paired teams. Ties go to the
 * lower roster id. null when nobody played.
 */
export function weeklyHighLow(week: number, records: readonly WeeklyLuckRecord[]): WeeklyAward | null {
  const scores = records.filter((record) => record.week === week);
  if (scores.length === 0) return null;

  const byHigh = [...scores].sort((a, b) => b.points - a.points || a.rosterId - b.rosterId);
  const byLow = [...scores].sort((a, b) => a.points - b.points || a.rosterId - b.rosterId);

  return {
    week,
    high: { rosterId: byHigh[0].rosterId, points: byHigh[0].points },
    low: { rosterId: byLow[0].rosterId, points: byLow[0].points },
  };
}

export function buildSeasonAwards(
  rosterIds: readonly number[],
  awards: readonly WeeklyAward[],
  payoutPerAward = DEFAULT_AWARD_PAYOUT
): SeasonAwards {
  const tallies = new Map<number, TeamAwardTally>();
  const tallyFor = (rosterId: number): TeamAwardTally => {
    let tally = tallies.get(rosterId);
    if (!tally) {
      tally = { rosterId, highScores: 0, lowScores: 0, netPayout: 0 };
      tallies.set(rosterId, tally);
    }
    return tally;
  };

  for (const rosterId of rosterIds) tallyFor(rosterId);
  for (const award of awards) {
    tallyFor(award.high.rosterId).highScores++;
    tallyFor(award.low.rosterId).lowScores++;
  }

  const teams = [...tallies.values()]
    .map((tally) => ({ ...tally, netPayout: (tally.highScores - tally.lowScores) * payoutPerAward }))
    .sort((a, b) => b.netPayout - a.netPayout || a.rosterId - b.rosterId);

  return {
    payoutPerAward,
    weeksAnalyzed: awards.length,
    totalPayoutHigh: awards.length * payoutPerAward,
    totalPayoutLow: awards.length * payoutPerAward,
    weeks: [...awards].sort((a, b) => a.week - b.week),
    teams,
  };
}
