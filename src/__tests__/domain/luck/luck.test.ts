import {
  WeeklyLuckRecord,
  analyzeWeeklyLuck,
  buildLuckReport,
  calculateMedian,
  pairMatchups,
  rollUpLeagueLuck,
} from '../../../domain/luck';
import { scoreSnapshot, twoWeekScores } from '../../helpers/fixtures';

function leagueRecords(): WeeklyLuckRecord[] {
  const snapshots = twoWeekScores();
  return [1, 2].flatMap((week) =>
    analyzeWeeklyLuck(
      week,
      snapshots.filter((s) => s.week === week)
    )
  );
}

describe('calculateMedian', () => {
  it('averages the middle pair of an even list', () => {
    expect(calculateMedian([120, 80, 100, 85])).toBe(92.5);
  });

  it('takes the middle of an odd list', () => {
    expect(calculateMedian([3, 1, 2])).toBe(2);
    expect(calculateMedian([])).toBe(0);
  });
});

describe('pairMatchups', () => {
  it('drops byes and incomplete matchups', () => {
    const pairs = pairMatchups([
      scoreSnapshot(2, 1, 1, 80),
      scoreSnapshot(1, 1, 1, 85),
      scoreSnapshot(3, 1, 2, 100),
      scoreSnapshot(4, 1, null, 90),
    ]);

    expect(pairs).toHaveLength(1);
    expect(pairs[0].home.rosterId).toBe(1);
    expect(pairs[0].away.rosterId).toBe(2);
  });
});

describe('analyzeWeeklyLuck', () => {
  it('scores every team against the whole league', () => {
    const week1 = analyzeWeeklyLuck(1, twoWeekScores().filter((s) => s.week === 1));

    expect(
      week1.map(({ rosterId, result, luckFactor, winsVsAll, expectedWinPct, leagueRank }) => ({
        rosterId,
        result,
        luckFactor,
        winsVsAll,
        expectedWinPct,
        leagueRank,
      }))
    ).toEqual([
      { rosterId: 1, result: 'W', luckFactor: 'lucky_win', winsVsAll: 1, expectedWinPct: 0.333, leagueRank: 3 },
      { rosterId: 2, result: 'L', luckFactor: 'deserved_loss', winsVsAll: 0, expectedWinPct: 0, leagueRank: 4 },
      { rosterId: 3, result: 'L', luckFactor: 'unlucky_loss', winsVsAll: 2, expectedWinPct: 0.667, leagueRank: 2 },
      { rosterId: 4, result: 'W', luckFactor: 'deserved_win', winsVsAll: 3, expectedWinPct: 1, leagueRank: 1 },
    ]);
    expect(week1.every((record) => record.leagueMedian === 92.5)).toBe(true);
  });

  it('marks a tie', () => {
    const records = analyzeWeeklyLuck(1, [scoreSnapshot(1, 1, 1, 90), scoreSnapshot(2, 1, 1, 90)]);
    expect(records.map((r) => r.luckFactor)).toEqual(['tie', 'tie']);
  });

  it('returns nothing for a week without pairs', () => {
    expect(analyzeWeeklyLuck(3, [scoreSnapshot(1, 3, null, 50)])).toEqual([]);
  });
});

describe('buildLuckReport', () => {
  it('compares the actual record with the median record', () => {
    const report = buildLuckReport(1, leagueRecords());

    expect(report.actualRecord).toBe('2-0-0');
    expect(report.expectedWins).toBe(1);
    expect(report.expectedRecord).toBe('1-1-0');
    expect(report.luckScore).toBe(1);
    expect(report.luckyWins.map((w) => w.week)).toEqual([1]);
    expect(report.unluckyLosses).toEqual([]);
  });

  it('measures the schedule from the opponents faced', () => {
    const { strengthOfSchedule } = buildLuckReport(1, leagueRecords());

    expect(strengthOfSchedule).toEqual({
      rosterId: 1,
      averageOpponentPoints: 75,
      averageOpponentRank: 4,
      toughestScheduleRank: null,
      easiestWeeks: [2, 1],
      hardestWeeks: [1, 2],
      totalWeeks: 2,
    });
  });

  it('counts a loss above the median as bad luck', () => {
    const report = buildLuckReport(3, leagueRecords());
    expect(report.luckScore).toBe(-1);
    expect(report.unluckyLosses.map((w) => w.week)).toEqual([1]);
    expect(report.strengthOfSchedule.averageOpponentPoints).toBe(115);
  });
});

describe('scoring exactly the weekly median', () => {
  // Scores 80, 90, 90, 100: the median is 90
  const records = analyzeWeeklyLuck(1, [
    scoreSnapshot(1, 1, 1, 90),
    scoreSnapshot(2, 1, 1, 100),
    scoreSnapshot(3, 1, 2, 90),
    scoreSnapshot(4, 1, 2, 80),
  ]);

  it('earns no expected win, so a loss there is neither lucky nor unlucky', () => {
    const report = buildLuckReport(1, records);

    expect(report.weekly[0]).toMatchObject({ leagueMedian: 90, result: 'L', luckFactor: 'deserved_loss' });
    expect(report.expectedWins).toBe(0);
    expect(report.luckScore).toBe(0);
  });

  it('counts a win there as deserved but still above expectation', () => {
    const report = buildLuckReport(3, records);

    expect(report.weekly[0]).toMatchObject({ result: 'W', luckFactor: 'deserved_win' });
    expect(report.expectedWins).toBe(0);
    expect(report.luckScore).toBe(1);
    expect(report.luckyWins).toEqual([]);
  });
});

describe('rollUpLeagueLuck', () => {
  it('ranks schedules and picks the luck extremes', () => {
    const records = leagueRecords();
    const league = rollUpLeagueLuck([1, 2, 3, 4].map((rosterId) => buildLuckReport(rosterId, records)));

    expect(
      league.teams.map((team) => [team.rosterId, team.strengthOfSchedule.toughestScheduleRank])
    ).toEqual([
      [1, 4],
      [2, 3],
      [3, 1],
      [4, 2],
    ]);
    expect(league.luckiest?.rosterId).toBe(1);
    expect(league.unluckiest?.rosterId).toBe(3);
  });

  it('handles an empty league', () => {
    expect(rollUpLeagueLuck([])).toEqual({ teams: [], luckiest: null, unluckiest: null });
  });
});
