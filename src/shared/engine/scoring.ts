import {
  DIAGONAL_MULTIPLIER,
  EMPTY_CELL,
  GRID_SIZE,
  LINE_CATEGORY_POINTS,
  LineCategory,
  STRAIGHT_PENALTY_VALUE,
} from './constants';
import { enumerateLines } from './grid';
import type { LineKind, LineScore, ReadonlyGrid } from './types';

/**
 * Knister line scoring.
 *
 * Each row, column and diagonal is classified independently from the
 * multiset of its filled values. Classification order matters: the first
 * matching branch wins, so e.g. counts [3,1,1] can only ever reach
 * THREE_OF_A_KIND and never FULL_HOUSE.
 */

function sameCounts(counts: readonly number[], expected: readonly number[]): boolean {
  return counts.length === expected.length && counts.every((c, i) => c === expected[i]);
}

/** Multiplicities of each distinct value, largest first. */
function valueCounts(values: readonly number[]): number[] {
  const counts = new Map<number, number>();
  for (const value of values) {
    counts.set(value, (counts.get(value) ?? 0) + 1);
  }
  return [...counts.values()].sort((a, b) => b - a);
}

function isStraight(values: readonly number[]): boolean {
  // Only a completely filled line can be a straight.
  if (values.length !== GRID_SIZE || new Set(values).size !== GRID_SIZE) {
    return false;
  }
  const sorted = [...values].sort((a, b) => a - b);
  for (let i = 0; i < sorted.length - 1; i++) {
    if ((sorted[i + 1] ?? 0) - (sorted[i] ?? 0) !== 1) {
      return false;
    }
  }
  return true;
}

/**
 * Classify the filled values of one line. Empty cells (0) are ignored.
 */
export function classifyLine(line: readonly number[]): LineCategory {
  const values = line.filter((v) => v !== EMPTY_CELL);

  if (values.length < 2) {
    return LineCategory.NONE;
  }

  const counts = valueCounts(values);
  const highest = counts[0] ?? 0;

  if (sameCounts(counts, [5])) return LineCategory.FIVE_OF_A_KIND;
  if (sameCounts(counts, [4]) || sameCounts(counts, [4, 1])) return LineCategory.FOUR_OF_A_KIND;
  if (sameCounts(counts, [3, 2])) return LineCategory.FULL_HOUSE;
  if (sameCounts(counts, [2, 2]) || sameCounts(counts, [2, 2, 1])) return LineCategory.TWO_PAIRS;
  if (highest === 3) return LineCategory.THREE_OF_A_KIND;
  if (highest === 2) return LineCategory.ONE_PAIR;

  if (isStraight(values)) {
    return values.includes(STRAIGHT_PENALTY_VALUE)
      ? LineCategory.STRAIGHT_WITH_SEVEN
      : LineCategory.STRAIGHT_NO_SEVEN;
  }

  return LineCategory.NONE;
}

/**
 * Score a single row, column or diagonal (without the diagonal multiplier).
 */
export function scoreLine(line: readonly number[]): number {
  return LINE_CATEGORY_POINTS[classifyLine(line)];
}

function multiplierFor(kind: LineKind): number {
  return kind === 'main_diagonal' || kind === 'anti_diagonal' ? DIAGONAL_MULTIPLIER : 1;
}

/**
 * Per-line scores for all twelve lines of the grid.
 */
export function calculateScoreBreakdown(grid: ReadonlyGrid): LineScore[] {
  return enumerateLines(grid).map(({ kind, index, values }) => {
    const category = classifyLine(values);
    const baseScore = LINE_CATEGORY_POINTS[category];
    const multiplier = multiplierFor(kind);
    return {
      kind,
      index,
      values,
      category,
      baseScore,
      multiplier,
      score: baseScore * multiplier,
    };
  });
}

/**
 * Total grid score: rows + columns + both diagonals counted double.
 */
export function calculateScore(grid: ReadonlyGrid): number {
  return calculateScoreBreakdown(grid).reduce((total, line) => total + line.score, 0);
}
