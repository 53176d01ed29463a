import { defaultDiceRng, rollTwoDice } from './dice';
import { errorFromOutcome } from './errors';
import { allCellIndices, cloneGrid, createEmptyGrid, indexToCell } from './grid';
import { calculateScore, calculateScoreBreakdown } from './scoring';
import {
  ActionOutcome,
  CellIndex,
  DiceRng,
  Grid,
  KnisterGameOptions,
  KnisterGameSnapshot,
  LineScore,
  PlacementRecord,
  PlacementResult,
  ValidationErrorCode,
  invalidOutcome,
  validOutcome,
} from './types';

/**
 * Single-player Knister game.
 *
 * Holds the grid, the free cells, the pending dice total and the score
 * snapshots for one game at a time. `newGame()` must be called before the
 * first placement; it also draws the first roll.
 *
 * Instances are not safe for concurrent use; hosts must serialise calls.
 */
export class KnisterGame {
  private readonly rng: DiceRng;

  private grid: Grid = createEmptyGrid();
  private availablePositions: CellIndex[] = allCellIndices();
  private currentRoll: number | undefined = undefined;
  private finished = false;
  private lastReward = 0;
  private previousTotal = 0;
  private history: PlacementRecord[] = [];

  constructor(options: KnisterGameOptions = {}) {
    this.rng = options.rng ?? defaultDiceRng;
  }

  /**
   * Reset every field to its start state and roll the first dice total.
   */
  public newGame(): void {
    this.grid = createEmptyGrid();
    this.availablePositions = allCellIndices();
    this.currentRoll = undefined;
    this.finished = false;
    this.lastReward = 0;
    this.previousTotal = 0;
    this.history = [];
    this.rollDice();
  }

  /** Roll two dice and store their sum, replacing any pending roll. */
  public rollDice(): void {
    this.currentRoll = rollTwoDice(this.rng).total;
  }

  /**
   * Store an explicit dice total. The value is not range-checked: external
   * dice sources and tests may supply anything, and it is scored as given.
   */
  public setCurrentRoll(value: number): void {
    this.currentRoll = value;
  }

  public getCurrentRoll(): number | undefined {
    return this.currentRoll;
  }

  public getGrid(): Grid {
    return cloneGrid(this.grid);
  }

  public getAvailableActions(): CellIndex[] {
    return [...this.availablePositions];
  }

  public hasFinished(): boolean {
    return this.finished;
  }

  /** Score change caused by the most recent placement (0 before any). */
  public getLastReward(): number {
    return this.lastReward;
  }

  /** Total score, recomputed from the grid. */
  public getTotalReward(): number {
    return calculateScore(this.grid);
  }

  public getScoreBreakdown(): LineScore[] {
    return calculateScoreBreakdown(this.grid);
  }

  public getHistory(): PlacementRecord[] {
    return this.history.map((record) => ({ ...record }));
  }

  public getState(): KnisterGameSnapshot {
    return {
      grid: this.getGrid(),
      currentRoll: this.currentRoll,
      availableActions: this.getAvailableActions(),
      finished: this.finished,
      lastReward: this.lastReward,
      totalReward: this.getTotalReward(),
      turn: this.history.length,
    };
  }

  /**
   * Place the current dice total in the selected cell.
   *
   * Rejections leave the game untouched. Checks run in order: finished game,
   * unavailable cell, missing roll.
   */
  public chooseAction(position: CellIndex): ActionOutcome {
    if (this.finished) {
      return invalidOutcome(
        ValidationErrorCode.GENERAL_GAME_FINISHED,
        'Game has already finished',
        { position }
      );
    }

    if (!this.availablePositions.includes(position)) {
      return invalidOutcome(
        ValidationErrorCode.PLACEMENT_INVALID_ACTION,
        `Invalid action: ${position}`,
        { position }
      );
    }

    const value = this.currentRoll;
    if (value === undefined) {
      return invalidOutcome(
        ValidationErrorCode.PLACEMENT_NO_DICE,
        'Current roll is not set. Call rollDice() or setCurrentRoll().',
        { position }
      );
    }

    const { row, col } = indexToCell(position);

    // Place before scoring; roll only after the finished check.
    this.grid[row][col] = value;
    this.availablePositions = this.availablePositions.filter((p) => p !== position);

    const totalReward = calculateScore(this.grid);
    this.lastReward = totalReward - this.previousTotal;
    this.previousTotal = totalReward;

    this.history.push({
      turn: this.history.length + 1,
      position,
      row,
      col,
      value,
      reward: this.lastReward,
      totalAfter: totalReward,
    });

    if (this.availablePositions.length === 0) {
      this.finished = true;
    } else {
      this.rollDice();
    }

    return validOutcome<PlacementResult>({
      position,
      row,
      col,
      value,
      reward: this.lastReward,
      totalReward,
      finished: this.finished,
    });
  }

  /**
   * Same as chooseAction, but throws GameFinished, InvalidAction or NoDice
   * instead of returning a rejected outcome.
   */
  public chooseActionOrThrow(position: CellIndex): PlacementResult {
    const outcome = this.chooseAction(position);
    if (!outcome.valid) {
      throw errorFromOutcome(outcome);
    }
    return outcome.data;
  }
}
