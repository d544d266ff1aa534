import { DraftAnalysis, DraftPickInput, analyzeDraft, gradeDraft, rateDraftValue } from '../../../domain/reports';
import { makeDirectory } from '../../helpers/fixtures';

const picks: DraftPickInput[] = [
  { pickNumber: 1, round: 1, pickInRound: 1, rosterId: 1, playerId: 'pA' },
  { pickNumber: 2, round: 1, pickInRound: 2, rosterId: 2, playerId: 'pB' },
  { pickNumber: 3, round: 2, pickInRound: 1, rosterId: 2, playerId: 'pC' },
  { pickNumber: 4, round: 2, pickInRound: 2, rosterId: 1, playerId: 'pD' },
];

const pointsIndex = new Map([
  ['pA', new Map([[1, 20], [2, 10], [3, 50]])],
  ['pB', new Map([[1, 10], [2, 0]])],
  ['pC', new Map([[1, 5], [2, 5]])],
  ['pD', new Map([[1, 0]])],
]);

function analyze(): DraftAnalysis {
  const result = analyzeDraft({
    draftId: 'd-1',
    picks,
    pointsIndex,
    heldRosters: new Map([[1, ['pA']]]),
    directory: makeDirectory([['pA', 'Alpha Back', 'RB']]),
    lastWeek: 2,
  });
  if (result.status !== 'available') throw new Error(result.reason);
  return result;
}

describe('gradeDraft', () => {
  it('grades against the league average', () => {
    expect(gradeDraft(14, 10)).toBe('A+');
    expect(gradeDraft(15, 12.5)).toBe('B+');
    expect(gradeDraft(10, 12.5)).toBe('D');
    expect(gradeDraft(1, 10)).toBe('F');
  });

  it('treats an empty league as average', () => {
    expect(gradeDraft(0, 0)).toBe('C+');
  });
});

describe('rateDraftValue', () => {
  it('holds early rounds to a higher bar', () => {
    expect(rateDraftValue(14, 1, 10)).toBe('Solid');
    expect(rateDraftValue(14, 5, 10)).toBe('Hit');
    expect(rateDraftValue(6, 2, 10)).toBe('Bust');
    expect(rateDraftValue(6, 6, 10)).toBe('Solid');
  });
});

describe('analyzeDraft', () => {
  it('rates picks within their round', () => {
    const draft = analyze();
    const ratings = draft.teamGrades
      .flatMap((team) => team.picks)
      .sort((a, b) => a.pickNumber - b.pickNumber)
      .map((pick) => [pick.playerId, pick.pointsScored, pick.gamesPlayed, pick.valueRating]);

    expect(ratings).toEqual([
      ['pA', 30, 2, 'Hit'],
      ['pB', 10, 1, 'Bust'],
      ['pC', 10, 2, 'Hit'],
      ['pD', 0, 0, 'Bust'],
    ]);
  });

  it('grades teams and summarizes rounds', () => {
    const draft = analyze();

    expect(draft.totalRounds).toBe(2);
    expect(draft.totalPicks).toBe(4);
    expect(draft.leagueAveragePointsPerPick).toBe(12.5);
    expect(draft.leagueHitRate).toBe(50);
    expect(draft.bestOverallPick.playerId).toBe('pA');
    expect(draft.bestOverallPick.playerName).toBe('Alpha Back');
    expect(draft.biggestBust?.playerId).toBe('pD');

    expect(
      draft.teamGrades.map((team) => [team.rosterId, team.averagePointsPerPick, team.grade, team.hitRate])
    ).toEqual([
      [1, 15, 'B+', 50],
      [2, 10, 'D', 50],
    ]);
    expect(
      draft.roundSummaries.map((round) => [round.round, round.averagePoints, round.bestPick.playerId, round.worstPick.playerId])
    ).toEqual([
      [1, 20, 'pA', 'pB'],
      [2, 5, 'pC', 'pD'],
    ]);
  });

  it('is unavailable without a draft or picks', () => {
    const base = { pointsIndex, heldRosters: new Map(), directory: new Map(), lastWeek: 2 };

    expect(analyzeDraft({ ...base, draftId: null, picks })).toEqual({
      status: 'unavailable',
      reason: 'No draft found for this league',
    });
    expect(analyzeDraft({ ...base, draftId: 'd-2', picks: [] })).toEqual({
      status: 'unavailable',
      reason: 'No draft picks found for draft d-2',
    });
  });
});
