/**
 * Test suite for src/shared/engine/scoring.ts
 */

import {
  LineCategory,
  calculateScore,
  calculateScoreBreakdown,
  classifyLine,
  createEmptyGrid,
  scoreLine,
} from '../../../src/shared/engine';
import { createTestGrid } from '../../utils/fixtures';

describe('scoring', () => {
  describe('scoreLine', () => {
    it.each([
      ['five of a kind', [3, 3, 3, 3, 3], 10],
      ['four of a kind with one empty', [0, 4, 4, 4, 4], 6],
      ['four of a kind with a kicker', [4, 4, 9, 4, 4], 6],
      ['full house', [2, 2, 2, 5, 5], 8],
      ['two pairs with one empty', [6, 6, 9, 9, 0], 3],
      ['two pairs with a kicker', [6, 6, 9, 9, 2], 3],
      ['three of a kind with two kickers', [3, 3, 3, 5, 6], 3],
      ['three of a kind alone', [8, 0, 8, 0, 8], 3],
      ['one pair', [2, 2, 0, 0, 0], 1],
      ['one pair with kickers', [11, 5, 11, 3, 0], 1],
      ['straight without seven', [1, 2, 3, 4, 5], 12],
      ['straight with seven', [3, 4, 5, 6, 7], 8],
      ['unsorted straight with seven', [8, 6, 7, 5, 4], 8],
      ['high straight without seven', [12, 11, 10, 9, 8], 12],
      ['consecutive but not full', [1, 2, 3, 4, 0], 0],
      ['distinct but not consecutive', [2, 3, 4, 5, 7], 0],
      ['two distinct values', [2, 5, 0, 0, 0], 0],
      ['single value', [7, 0, 0, 0, 0], 0],
      ['empty line', [0, 0, 0, 0, 0], 0],
    ])('%s: %j scores %i', (_label, line, expected) => {
      expect(scoreLine(line)).toBe(expected);
    });

    it('does not depend on the order of the values', () => {
      expect(scoreLine([5, 2, 5, 2, 2])).toBe(scoreLine([2, 2, 2, 5, 5]));
      expect(scoreLine([0, 9, 6, 0, 9])).toBe(1);
    });
  });

  describe('classifyLine', () => {
    it('checks four of a kind before anything based on the top count', () => {
      expect(classifyLine([4, 4, 4, 4, 1])).toBe(LineCategory.FOUR_OF_A_KIND);
    });

    it('never reports a full house for three plus two singles', () => {
      expect(classifyLine([3, 3, 3, 1, 2])).toBe(LineCategory.THREE_OF_A_KIND);
    });

    it('reports two pairs for four filled cells in two pairs', () => {
      expect(classifyLine([5, 0, 5, 6, 6])).toBe(LineCategory.TWO_PAIRS);
    });

    it('returns NONE for fewer than two filled cells', () => {
      expect(classifyLine([0, 0, 12, 0, 0])).toBe(LineCategory.NONE);
    });

    it('treats only zero as empty', () => {
      expect(classifyLine([-1, -1, 0, 0, 0])).toBe(LineCategory.ONE_PAIR);
    });
  });

  describe('calculateScore', () => {
    it('scores an empty grid as zero', () => {
      expect(calculateScore(createEmptyGrid())).toBe(0);
    });

    it('doubles the main diagonal', () => {
      const grid = createTestGrid([
        [0, 0, 1],
        [1, 1, 2],
        [2, 2, 3],
        [3, 3, 4],
        [4, 4, 5],
      ]);

      expect(calculateScore(grid)).toBe(24);
    });

    it('doubles the anti-diagonal', () => {
      const grid = createTestGrid([
        [0, 4, 2],
        [1, 3, 2],
      ]);

      expect(calculateScore(grid)).toBe(2);
    });

    it('scores a grid full of one value across all twelve lines', () => {
      const grid = createEmptyGrid().map((row) => row.map(() => 7));

      // 5 rows×10 + 5 columns×10 + 2 diagonals×10×2
      expect(calculateScore(grid)).toBe(140);
    });

    it('counts the centre cell in both diagonals', () => {
      const grid = createTestGrid([
        [0, 0, 6],
        [2, 2, 6],
        [0, 4, 6],
      ]);

      // main diagonal pair (1×2) + anti-diagonal pair (1×2) + row 0 pair
      expect(calculateScore(grid)).toBe(5);
    });

    it('returns the same total on repeated calls', () => {
      const grid = createTestGrid([
        [0, 0, 5],
        [0, 1, 5],
        [3, 3, 9],
      ]);

      expect(calculateScore(grid)).toBe(calculateScore(grid));
    });
  });

  describe('calculateScoreBreakdown', () => {
    it('lists rows, columns, then both diagonals', () => {
      const breakdown = calculateScoreBreakdown(createEmptyGrid());

      expect(breakdown.map((line) => `${line.kind}:${line.index}`)).toEqual([
        'row:0',
        'row:1',
        'row:2',
        'row:3',
        'row:4',
        'column:0',
        'column:1',
        'column:2',
        'column:3',
        'column:4',
        'main_diagonal:0',
        'anti_diagonal:0',
      ]);
    });

    it('reports category, base score and multiplier per line', () => {
      const grid = createTestGrid([
        [0, 0, 1],
        [1, 1, 2],
        [2, 2, 3],
        [3, 3, 4],
        [4, 4, 5],
      ]);

      const mainDiagonal = calculateScoreBreakdown(grid).find((line) => line.kind === 'main_diagonal');

      expect(mainDiagonal).toEqual({
        kind: 'main_diagonal',
        index: 0,
        values: [1, 2, 3, 4, 5],
        category: LineCategory.STRAIGHT_NO_SEVEN,
        baseScore: 12,
        multiplier: 2,
        score: 24,
      });
    });

    it('sums to the total score', () => {
      const grid = createTestGrid([
        [0, 0, 7],
        [0, 1, 7],
        [0, 2, 7],
        [1, 1, 7],
        [2, 2, 8],
        [4, 0, 8],
      ]);

      const sum = calculateScoreBreakdown(grid).reduce((total, line) => total + line.score, 0);
      expect(sum).toBe(calculateScore(grid));
    });
  });
});
