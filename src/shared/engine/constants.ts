/**
 * Fixed rules constants for Knister.
 *
 * The grid is always square; every scored line (row, column or diagonal)
 * therefore has exactly GRID_SIZE cells.
 */

export const GRID_SIZE = 5;

export const CELL_COUNT = GRID_SIZE * GRID_SIZE;

/** Marker value for a cell that has not been filled yet. */
export const EMPTY_CELL = 0;

export const DIE_FACES = 6;

/** Both diagonals score double. */
export const DIAGONAL_MULTIPLIER = 2;

/** The value that downgrades a straight. */
export const STRAIGHT_PENALTY_VALUE = 7;

/**
 * Line pattern categories, in classification order.
 */
export enum LineCategory {
  FIVE_OF_A_KIND = 'FIVE_OF_A_KIND',
  FOUR_OF_A_KIND = 'FOUR_OF_A_KIND',
  FULL_HOUSE = 'FULL_HOUSE',
  TWO_PAIRS = 'TWO_PAIRS',
  THREE_OF_A_KIND = 'THREE_OF_A_KIND',
  ONE_PAIR = 'ONE_PAIR',
  STRAIGHT_WITH_SEVEN = 'STRAIGHT_WITH_SEVEN',
  STRAIGHT_NO_SEVEN = 'STRAIGHT_NO_SEVEN',
  NONE = 'NONE',
}

export const LINE_CATEGORY_POINTS: Readonly<Record<LineCategory, number>> = {
  [LineCategory.FIVE_OF_A_KIND]: 10,
  [LineCategory.FOUR_OF_A_KIND]: 6,
  [LineCategory.FULL_HOUSE]: 8,
  [LineCategory.TWO_PAIRS]: 3,
  [LineCategory.THREE_OF_A_KIND]: 3,
  [LineCategory.ONE_PAIR]: 1,
  [LineCategory.STRAIGHT_WITH_SEVEN]: 8,
  [LineCategory.STRAIGHT_NO_SEVEN]: 12,
  [LineCategory.NONE]: 0,
};
