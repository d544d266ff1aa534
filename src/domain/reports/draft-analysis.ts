/**
 * Draft Analysis
 *
 * Rates each pick against the other picks of its round, summarizes rounds,
 * and grades each team's draft against the league average.
 * Pure functions, no I/O.
 */

import { PlayerDirectory, describePlayer, roundTo } from '../snapshot';
import { PlayerPointsIndex } from '../attribution';

export type ValueRating = 'Hit' | 'Solid' | 'Bust';

export type DraftGrade = 'A+' | 'A' | 'B+' | 'B' | 'C+' | 'C' | 'D' | 'F';

export interface DraftPickInput {
  pickNumber: number;
  round: number;
  pickInRound: number;
  rosterId: number;
  playerId: string;
}

export interface AnalyzedPick extends DraftPickInput {
  playerName: string;
  position: string;
  pointsScored: number;
  /** Weeks with points > 0 */
  gamesPlayed: number;
  pointsPerGame: number;
  isOnRoster: boolean;
  valueRating: ValueRating;
}

export interface RoundSummary {
  round: number;
  totalPicks: number;
  averagePoints: number;
  bestPick: AnalyzedPick;
  worstPick: AnalyzedPick;
  hitRate: number;
}

export interface TeamDraftGrade {
  rosterId: number;
  totalPicks: number;
  totalPoints: number;
  averagePointsPerPick: number;
  bestPick: AnalyzedPick;
  worstPick: AnalyzedPick;
  /** Picks still rostered or rated Hit, as a percentage */
  hitRate: number;
  grade: DraftGrade;
  picks: AnalyzedPick[];
}

export interface DraftAnalysis {
  status: 'available';
  draftId: string;
  totalRounds: number;
  totalPicks: number;
  /** Average points per pick, best first */
  teamGrades: TeamDraftGrade[];
  roundSummaries: RoundSummary[];
  bestOverallPick: AnalyzedPick;
  /** Lowest scorer from rounds 1-3 */
  biggestBust: AnalyzedPick | null;
  leagueAveragePointsPerPick: number;
  leagueHitRate: number;
}

export interface DraftUnavailable {
  status: 'unavailable';
  reason: string;
}

export type DraftAnalysisResult = DraftAnalysis | DraftUnavailable;

export interface DraftAnalysisInput {
  draftId: string | null;
  picks: readonly DraftPickInput[];
  pointsIndex: PlayerPointsIndex;
  heldRosters: ReadonlyMap<number, readonly string[]>;
  directory: PlayerDirectory;
  lastWeek: number;
}

const EARLY_ROUND_CUTOFF = 4;
const BUST_ROUND_CUTOFF = 3;

const GRADE_THRESHOLDS: ReadonlyArray<[number, DraftGrade]> = [
  [1.4, 'A+'],
  [1.25, 'A'],
  [1.15, 'B+'],
  [1.05, 'B'],
  [0.95, 'C+'],
  [0.85, 'C'],
  [0.75, 'D'],
];

/**
 * Early rounds are held to a higher bar.
 */
export function rateDraftValue(points: number, round: number, roundAverage: number): ValueRating {
  const [hit, solid] = round <= EARLY_ROUND_CUTOFF ? [1.5, 0.7] : [1.3, 0.5];
  if (points >= roundAverage * hit) return 'Hit';
  if (points >= roundAverage * solid) return 'Solid';
  return 'Bust';
}

export function gradeDraft(teamAveragePerPick: number, leagueAveragePerPick: number): DraftGrade {
  const ratio = leagueAveragePerPick > 0 ? teamAveragePerPick / leagueAveragePerPick : 1.0;
  for (const [threshold, grade] of GRADE_THRESHOLDS) {
    if (ratio >= threshold) return grade;
  }
  return 'F';
}

function byPoints(picks: readonly AnalyzedPick[]): { best: AnalyzedPick; worst: AnalyzedPick } {
  let best = picks[0];
  let worst = picks[0];
  for (const pick of picks) {
    if (pick.pointsScored > best.pointsScored) best = pick;
    if (pick.pointsScored < worst.pointsScored) worst = pick;
  }
  return { best, worst };
}

function percentage(count: number, total: number): number {
  return total > 0 ? roundTo((count / total) * 100, 1) : 0;
}

function groupBy<T, K>(items: readonly T[], keyOf: (item: T) => K): Map<K, T[]> {
  const groups = new Map<K, T[]>();
  for (const item of items) {
    const key = keyOf(item);
    const group = groups.get(key) ?? [];
    group.push(item);
    groups.set(key, group);
  }
  return groups;
}

export function analyzeDraft(input: DraftAnalysisInput): DraftAnalysisResult {
  if (!input.draftId) {
    return { status: 'unavailable', reason: 'No draft found for this league' };
  }

  const valid = input.picks.filter((pick) => pick.rosterId > 0 && pick.playerId);
  if (valid.length === 0) {
    return { status: 'unavailable', reason: `No draft picks found for draft ${input.draftId}` };
  }

  const unrated = valid.map((pick) => {
    const weekly = input.pointsIndex.get(pick.playerId);
    let total = 0;
    let games = 0;
    if (weekly) {
      for (const [week, points] of weekly) {
        if (week > input.lastWeek) continue;
        total += points;
        if (points > 0) games++;
      }
    }
    const info = describePlayer(input.directory, pick.playerId);
    const held = input.heldRosters.get(pick.rosterId) ?? [];

    return {
      ...pick,
      playerName: info.name,
      position: info.position,
      pointsScored: roundTo(total, 2),
      gamesPlayed: games,
      pointsPerGame: games > 0 ? roundTo(total / games, 2) : 0,
      isOnRoster: held.includes(pick.playerId),
    };
  });

  const roundAverages = new Map<number, number>();
  for (const [round, picks] of groupBy(unrated, (pick) => pick.round)) {
    roundAverages.set(round, picks.reduce((sum, p) => sum + p.pointsScored, 0) / picks.length);
  }

  const picks: AnalyzedPick[] = unrated.map((pick) => ({
    ...pick,
    valueRating: rateDraftValue(pick.pointsScored, pick.round, roundAverages.get(pick.round) ?? 0),
  }));

  const roundSummaries: RoundSummary[] = [...groupBy(picks, (pick) => pick.round).entries()]
    .sort(([a], [b]) => a - b)
    .map(([round, roundPicks]) => {
      const { best, worst } = byPoints(roundPicks);
      return {
        round,
        totalPicks: roundPicks.length,
        averagePoints: roundTo(roundAverages.get(round) ?? 0, 2),
        bestPick: best,
        worstPick: worst,
        hitRate: percentage(roundPicks.filter((p) => p.valueRating === 'Hit').length, roundPicks.length),
      };
    });

  const leagueTotal = picks.reduce((sum, pick) => sum + pick.pointsScored, 0);
  const leagueAverage = leagueTotal / picks.length;

  const teamGrades: TeamDraftGrade[] = [...groupBy(picks, (pick) => pick.rosterId).entries()]
    .map(([rosterId, teamPicks]) => {
      const total = teamPicks.reduce((sum, pick) => sum + pick.pointsScored, 0);
      const average = total / teamPicks.length;
      const { best, worst } = byPoints(teamPicks);
      const hits = teamPicks.filter((p) => p.isOnRoster || p.valueRating === 'Hit').length;

      return {
        rosterId,
        totalPicks: teamPicks.length,
        totalPoints: roundTo(total, 2),
        averagePointsPerPick: roundTo(average, 2),
        bestPick: best,
        worstPick: worst,
        hitRate: percentage(hits, teamPicks.length),
        grade: gradeDraft(average, leagueAverage),
        picks: [...teamPicks].sort((a, b) => a.pickNumber - b.pickNumber),
      };
    })
    .sort((a, b) => b.averagePointsPerPick - a.averagePointsPerPick || a.rosterId - b.rosterId);

  const earlyPicks = picks.filter((pick) => pick.round <= BUST_ROUND_CUTOFF);

  return {
    status: 'available',
    draftId: input.draftId,
    totalRounds: Math.max(...picks.map((pick) => pick.round)),
    totalPicks: picks.length,
    teamGrades,
    roundSummaries,
    bestOverallPick: byPoints(picks).best,
    biggestBust: earlyPicks.length > 0 ? byPoints(earlyPicks).worst : null,
    leagueAveragePointsPerPick: roundTo(leagueAverage, 2),
    leagueHitRate: percentage(picks.filter((p) => p.valueRating === 'Hit').length, picks.length),
  };
}
