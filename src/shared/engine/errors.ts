/**
 * Engine Domain Errors - Structured error types for the Knister rules engine
 *
 * Rule failures are normally returned as ValidationOutcome values (see
 * `KnisterGame.chooseAction`). These classes exist for callers that prefer
 * exceptions (`KnisterGame.chooseActionOrThrow`) and for hosts that need to
 * log or serialise a failure.
 *
 * Error Categories:
 * - **RulesViolation**: a placement the rules do not allow
 *   - **GameFinished**: placement attempted after the grid is full
 *   - **InvalidAction**: target cell occupied or outside the grid
 *   - **NoDice**: no pending roll to place
 *
 * Usage:
 * ```typescript
 * import { errorFromOutcome } from './errors';
 *
 * const outcome = game.chooseAction(12);
 * if (!outcome.valid) {
 *   throw errorFromOutcome(outcome);
 * }
 * ```
 *
 * @module EngineErrors
 */

import { ValidationErrorCode } from './types';

// =============================================================================
// ERROR CODES
// =============================================================================

/**
 * Enumeration of all engine domain error codes.
 *
 * - RULES_*: placement rule violations
 * - INTERNAL_*: should never happen in correct code
 */
export enum EngineErrorCode {
  /** Placement attempted after the game has finished */
  RULES_GAME_FINISHED = 'RULES_GAME_FINISHED',
  /** Target cell is occupied or not on the grid */
  RULES_INVALID_ACTION = 'RULES_INVALID_ACTION',
  /** No current dice roll to place */
  RULES_NO_DICE = 'RULES_NO_DICE',

  /** A failed outcome carried a code with no matching error class */
  INTERNAL_UNEXPECTED_OUTCOME = 'INTERNAL_UNEXPECTED_OUTCOME',
}

/**
 * Maps error code prefixes to human-readable category descriptions.
 */
export const ERROR_CATEGORY_DESCRIPTIONS: Record<string, string> = {
  RULES_: 'Placement rule violation',
  INTERNAL_: 'Internal engine error (bug)',
};

// =============================================================================
// BASE ERROR CLASS
// =============================================================================

/**
 * Base class for all engine domain errors.
 */
export class EngineError extends Error {
  /** Error code for programmatic handling */
  readonly code: EngineErrorCode;

  /** Additional context for debugging */
  readonly context: Record<string, unknown>;

  /** Domain that generated the error (e.g. 'KnisterGame') */
  readonly domain: string;

  readonly timestamp: Date;

  constructor(
    code: EngineErrorCode,
    message: string,
    context: Record<string, unknown> = {},
    domain: string = 'Engine'
  ) {
    super(message);
    this.name = 'EngineError';
    this.code = code;
    this.context = context;
    this.domain = domain;
    this.timestamp = new Date();

    Object.setPrototypeOf(this, EngineError.prototype);
  }

  /** Get error category from code prefix */
  get category(): string {
    const prefix = this.code.split('_')[0] + '_';
    return ERROR_CATEGORY_DESCRIPTIONS[prefix] ?? 'Unknown error category';
  }

  /** Serialize to a JSON-safe object for logging */
  toJSON(): EngineErrorJSON {
    return {
      error: true,
      type: this.name,
      code: this.code,
      message: this.message,
      domain: this.domain,
      context: this.context,
      category: this.category,
      timestamp: this.timestamp.toISOString(),
    };
  }
}

/**
 * JSON representation of an EngineError.
 */
export interface EngineErrorJSON {
  error: true;
  type: string;
  code: string;
  message: string;
  domain: string;
  context: Record<string, unknown>;
  category: string;
  timestamp: string;
}

// =============================================================================
// SPECIFIC ERROR CLASSES
// =============================================================================

/**
 * Error for placements the rules do not allow. Raised only at the caller's
 * request; the engine state is unchanged when one is produced.
 */
export class RulesViolation extends EngineError {
  constructor(
    code: EngineErrorCode,
    message: string,
    context: Record<string, unknown> = {},
    domain: string = 'Rules'
  ) {
    super(code, message, context, domain);
    this.name = 'RulesViolation';
    Object.setPrototypeOf(this, RulesViolation.prototype);
  }
}

export class GameFinished extends RulesViolation {
  constructor(message: string = 'Game has already finished', context: Record<string, unknown> = {}) {
    super(EngineErrorCode.RULES_GAME_FINISHED, message, context, 'KnisterGame');
    this.name = 'GameFinished';
    Object.setPrototypeOf(this, GameFinished.prototype);
  }
}

export class InvalidAction extends RulesViolation {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(EngineErrorCode.RULES_INVALID_ACTION, message, context, 'KnisterGame');
    this.name = 'InvalidAction';
    Object.setPrototypeOf(this, InvalidAction.prototype);
  }
}

export class NoDice extends RulesViolation {
  constructor(
    message: string = 'Current roll is not set. Call rollDice() or setCurrentRoll().',
    context: Record<string, unknown> = {}
  ) {
    super(EngineErrorCode.RULES_NO_DICE, message, context, 'KnisterGame');
    this.name = 'NoDice';
    Object.setPrototypeOf(this, NoDice.prototype);
  }
}

// =============================================================================
// TYPE GUARDS
// =============================================================================

export function isEngineError(error: unknown): error is EngineError {
  return error instanceof EngineError;
}

export function isRulesViolation(error: unknown): error is RulesViolation {
  return error instanceof RulesViolation;
}

export function isGameFinished(error: unknown): error is GameFinished {
  return error instanceof GameFinished;
}

export function isInvalidAction(error: unknown): error is InvalidAction {
  return error instanceof InvalidAction;
}

export function isNoDice(error: unknown): error is NoDice {
  return error instanceof NoDice;
}

// =============================================================================
// UTILITIES
// =============================================================================

export interface FailedOutcome {
  valid: false;
  code: ValidationErrorCode;
  reason: string;
  context?: Record<string, unknown>;
}

/**
 * Convert a rejected ValidationOutcome into the matching error class.
 */
export function errorFromOutcome(outcome: FailedOutcome): EngineError {
  const context = outcome.context ?? {};

  switch (outcome.code) {
    case ValidationErrorCode.GENERAL_GAME_FINISHED:
      return new GameFinished(outcome.reason, context);
    case ValidationErrorCode.PLACEMENT_INVALID_ACTION:
      return new InvalidAction(outcome.reason, context);
    case ValidationErrorCode.PLACEMENT_NO_DICE:
      return new NoDice(outcome.reason, context);
    default:
      return new EngineError(
        EngineErrorCode.INTERNAL_UNEXPECTED_OUTCOME,
        outcome.reason,
        { ...context, outcomeCode: outcome.code },
        'KnisterGame'
      );
  }
}
