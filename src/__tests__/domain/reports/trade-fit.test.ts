import {
  analyzeRosterNeeds,
  classifyNeed,
  evaluateTrade,
  playerTradeValue,
  recommendFit,
  startersNeeded,
} from '../../../domain/reports';
import { PositionSlot } from '../../../domain/lineup';
import { makeDirectory } from '../../helpers/fixtures';

const template: PositionSlot[] = ['QB', 'RB', 'RB', 'WR', 'WR', 'TE', 'FLEX'];

const directory = makeDirectory([
  ['qb1', 'Quinn One', 'QB'],
  ['rb1', 'Rudy One', 'RB'],
  ['wr1', 'Wes One', 'WR'],
  ['wr2', 'Wes Two', 'WR'],
  ['wr3', 'Wes Three', 'WR'],
  ['wr4', 'Wes Four', 'WR'],
  ['te1', 'Ted One', 'TE'],
  ['te2', 'Ted Two', 'TE'],
  ['te3', 'Ted Three', 'TE'],
  ['qb2', 'Quinn Two', 'QB'],
  ['qb3', 'Quinn Three', 'QB'],
  ['qb4', 'Quinn Four', 'QB'],
  ['rb2', 'Rudy Two', 'RB'],
  ['rb3', 'Rudy Three', 'RB'],
  ['rb4', 'Rudy Four', 'RB'],
  ['rb5', 'Rudy Five', 'RB'],
  ['wr5', 'Wes Five', 'WR'],
  ['wr6', 'Wes Six', 'WR'],
  ['te4', 'Ted Four', 'TE'],
  ['k1', 'Kay One', 'K'],
]);

const rosterA = ['qb1', 'rb1', 'wr1', 'wr2', 'wr3', 'wr4', 'te1', 'te2', 'te3', 'k1'];
const rosterB = ['qb2', 'qb3', 'qb4', 'rb2', 'rb3', 'rb4', 'rb5', 'wr5', 'wr6', 'te4'];

describe('startersNeeded', () => {
  it('counts dedicated slots and ignores flex', () => {
    expect(startersNeeded(template)).toEqual({ QB: 1, RB: 2, WR: 2, TE: 1 });
  });
});

describe('classifyNeed', () => {
  it('grades starters and depth', () => {
    expect(classifyNeed(0, 1)).toBe('critical');
    expect(classifyNeed(1, 2)).toBe('critical');
    expect(classifyNeed(2, 1)).toBe('moderate');
    expect(classifyNeed(3, 1)).toBe('satisfied');
    expect(classifyNeed(2, 0)).toBe('satisfied');
  });
});

describe('analyzeRosterNeeds', () => {
  it('flags a missing starter as the top need', () => {
    const needs = analyzeRosterNeeds(1, rosterA, directory, template);

    expect(needs.positions.map((p) => [p.position, p.count, p.bench, p.level])).toEqual([
      ['QB', 1, 0, 'moderate'],
      ['RB', 1, 0, 'critical'],
      ['WR', 4, 2, 'satisfied'],
      ['TE', 3, 2, 'satisfied'],
    ]);
    expect(needs.topNeed).toBe('RB');
    expect(needs.priority).toBe('win_now');
  });

  it('falls back to the first thin position', () => {
    const needs = analyzeRosterNeeds(2, rosterB, directory, template);

    expect(needs.topNeed).toBe('WR');
    expect(needs.priority).toBe('balanced');
  });

  it('builds depth once three positions are covered', () => {
    const deep = ['qb2', 'qb3', 'qb4', 'rb2', 'rb3', 'rb4', 'rb5', 'wr1', 'wr2', 'wr3', 'wr4', 'te1'];
    const needs = analyzeRosterNeeds(3, deep, directory, template);

    expect(needs.topNeed).toBe('TE');
    expect(needs.priority).toBe('build_depth');
  });

  it('ignores players the directory does not know', () => {
    const needs = analyzeRosterNeeds(4, ['ghost'], directory, template);

    expect(needs.positions.every((p) => p.count === 0)).toBe(true);
    expect(needs.topNeed).toBe('QB');
  });
});

describe('playerTradeValue', () => {
  it('averages the weeks a player scored in', () => {
    const index = new Map([['wr1', new Map([[1, 10], [2, 20], [4, 6]])]]);

    expect(playerTradeValue(index, 'wr1')).toBe(12);
    expect(playerTradeValue(index, 'nobody')).toBe(0);
  });
});

describe('recommendFit', () => {
  it('uses fixed score bands', () => {
    expect(recommendFit(70)).toBe('Strong fit');
    expect(recommendFit(50)).toBe('Reasonable fit');
    expect(recommendFit(49)).toBe('Poor fit');
  });
});

describe('evaluateTrade', () => {
  const rosters = new Map([
    [1, rosterA],
    [2, rosterB],
  ]);
  const pointsIndex = new Map([
    ['wr1', new Map([[1, 10], [2, 20]])],
    ['rb2', new Map([[1, 12]])],
  ]);

  it('favours the side whose needs the swap fills', () => {
    const evaluation = evaluateTrade(
      { rosterId: 1, gives: ['wr1'], opponentId: 2, receives: ['rb2'] },
      rosters,
      directory,
      template,
      pointsIndex
    );

    expect(evaluation.roster).toEqual({
      rosterId: 1,
      gives: ['wr1'],
      receives: ['rb2'],
      valueIn: 12,
      valueOut: 15,
      improvements: ['RB'],
      downgrades: ['WR'],
      fitScore: 55,
      recommendation: 'Reasonable fit',
    });
    expect(evaluation.opponent.improvements).toEqual([]);
    expect(evaluation.opponent.downgrades).toEqual(['RB']);
    expect(evaluation.opponent.fitScore).toBe(40);
    expect(evaluation.opponent.recommendation).toBe('Poor fit');
    expect(evaluation.valueDifference).toBe(3);
    expect(evaluation.fairness).toBe('Fair');
    expect(evaluation.winnerRosterId).toBe(1);
    expect(evaluation.confidence).toBe('high');
  });

  it('calls a like-for-like swap even', () => {
    const evaluation = evaluateTrade(
      { rosterId: 1, gives: ['te1'], opponentId: 2, receives: ['te4'] },
      rosters,
      directory,
      template,
      pointsIndex
    );

    expect(evaluation.roster.fitScore).toBe(50);
    expect(evaluation.opponent.fitScore).toBe(50);
    expect(evaluation.winnerRosterId).toBeNull();
    expect(evaluation.confidence).toBe('medium');
  });
});
