import type { LineCategory } from './constants';

// =============================================================================
// GRID
// =============================================================================

/** Row-major 5×5 matrix; 0 marks an empty cell. */
export type Grid = number[][];

export type ReadonlyGrid = ReadonlyArray<ReadonlyArray<number>>;

/** Flat cell index in [0, 24]: row = floor(index / 5), col = index % 5. */
export type CellIndex = number;

export interface CellCoordinates {
  row: number;
  col: number;
}

export type LineKind = 'row' | 'column' | 'main_diagonal' | 'anti_diagonal';

/**
 * Scoring result for one of the twelve scored lines.
 */
export interface LineScore {
  kind: LineKind;
  /** Row or column number for rows/columns; always 0 for diagonals. */
  index: number;
  values: number[];
  category: LineCategory;
  /** Points for the category before the diagonal multiplier. */
  baseScore: number;
  multiplier: number;
  score: number;
}

// =============================================================================
// DICE
// =============================================================================

/**
 * Uniform random source in [0, 1). `Math.random` satisfies it; seeded
 * generators make games reproducible.
 */
export type DiceRng = () => number;

export interface DiceRoll {
  faces: [number, number];
  total: number;
}

// =============================================================================
// GAME STATE
// =============================================================================

export interface PlacementRecord {
  /** 1-based placement number within the current game. */
  turn: number;
  position: CellIndex;
  row: number;
  col: number;
  value: number;
  reward: number;
  totalAfter: number;
}

/**
 * Data carried by a successful placement.
 */
export interface PlacementResult {
  position: CellIndex;
  row: number;
  col: number;
  value: number;
  reward: number;
  totalReward: number;
  finished: boolean;
}

export interface KnisterGameSnapshot {
  grid: Grid;
  currentRoll: number | undefined;
  availableActions: CellIndex[];
  finished: boolean;
  lastReward: number;
  totalReward: number;
  /** Number of successful placements so far in this game. */
  turn: number;
}

export interface KnisterGameOptions {
  /** Random source for dice rolls. Defaults to Math.random. */
  rng?: DiceRng;
}

// =============================================================================
// VALIDATION OUTCOME
// =============================================================================

/**
 * Machine-readable codes for rejected actions and rejected user input.
 *
 * - GENERAL_* / PLACEMENT_*: rule failures raised by the game
 * - INPUT_*: cell notation typed by a human that could not be used
 */
export enum ValidationErrorCode {
  GENERAL_GAME_FINISHED = 'GENERAL_GAME_FINISHED',
  PLACEMENT_INVALID_ACTION = 'PLACEMENT_INVALID_ACTION',
  PLACEMENT_NO_DICE = 'PLACEMENT_NO_DICE',

  INPUT_MALFORMED = 'INPUT_MALFORMED',
  INPUT_OUT_OF_RANGE = 'INPUT_OUT_OF_RANGE',
  INPUT_CELL_UNAVAILABLE = 'INPUT_CELL_UNAVAILABLE',
}

/**
 * Result of validating (and possibly applying) an operation.
 *
 * @example
 * ```typescript
 * const failure: ValidationOutcome<PlacementResult> = {
 *   valid: false,
 *   code: ValidationErrorCode.PLACEMENT_INVALID_ACTION,
 *   reason: 'Invalid action: 7',
 *   context: { position: 7 }
 * };
 * ```
 */
export type ValidationOutcome<T = void> =
  | { valid: true; data: T }
  | { valid: false; code: ValidationErrorCode; reason: string; context?: Record<string, unknown> };

export type ActionOutcome = ValidationOutcome<PlacementResult>;

/**
 * Type guard to check if a ValidationOutcome is successful.
 */
export function isValidOutcome<T>(
  outcome: ValidationOutcome<T>
): outcome is { valid: true; data: T } {
  return outcome.valid === true;
}

export function validOutcome<T>(data: T): ValidationOutcome<T> {
  return { valid: true, data };
}

export function invalidOutcome<T = void>(
  code: ValidationErrorCode,
  reason: string,
  context?: Record<string, unknown>
): ValidationOutcome<T> {
  return { valid: false, code, reason, context };
}
