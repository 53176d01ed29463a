// =============================================================================
// KNISTER RULES ENGINE - PUBLIC API
// =============================================================================
// Hosts (console harness, tests, anything embedding the game) should only
// import from this file.
//
// - PURE: scoring and notation helpers never touch I/O
// - STATEFUL: KnisterGame is the only mutable object
// =============================================================================

export {
  CELL_COUNT,
  DIAGONAL_MULTIPLIER,
  DIE_FACES,
  EMPTY_CELL,
  GRID_SIZE,
  LINE_CATEGORY_POINTS,
  LineCategory,
  STRAIGHT_PENALTY_VALUE,
} from './constants';

export type {
  ActionOutcome,
  CellCoordinates,
  CellIndex,
  DiceRng,
  DiceRoll,
  Grid,
  KnisterGameOptions,
  KnisterGameSnapshot,
  LineKind,
  LineScore,
  PlacementRecord,
  PlacementResult,
  ReadonlyGrid,
  ValidationOutcome,
} from './types';
export { ValidationErrorCode, invalidOutcome, isValidOutcome, validOutcome } from './types';

export {
  EngineError,
  EngineErrorCode,
  ERROR_CATEGORY_DESCRIPTIONS,
  GameFinished,
  InvalidAction,
  NoDice,
  RulesViolation,
  errorFromOutcome,
  isEngineError,
  isGameFinished,
  isInvalidAction,
  isNoDice,
  isRulesViolation,
} from './errors';
export type { EngineErrorJSON, FailedOutcome } from './errors';

export {
  allCellIndices,
  cellToIndex,
  cloneGrid,
  countFilledCells,
  createEmptyGrid,
  enumerateLines,
  getAntiDiagonal,
  getColumn,
  getMainDiagonal,
  getRow,
  indexToCell,
  isCellIndex,
} from './grid';
export type { GridLine } from './grid';

export { calculateScore, calculateScoreBreakdown, classifyLine, scoreLine } from './scoring';

export { createSeededRng, defaultDiceRng, rollDie, rollTwoDice } from './dice';

export { formatCell, formatGrid, parseCellInput } from './notation';

export { KnisterGame } from './KnisterGame';
