/**
 * Test Fixtures and Utilities
 * Common test data and helper functions for Knister tests
 */

import { DiceRng, Grid, KnisterGame, cellToIndex, createEmptyGrid } from '../../src/shared/engine';

/**
 * Cell helper - flat index from 0-based row/col
 */
export function cell(row: number, col: number): number {
  return cellToIndex(row, col);
}

/**
 * Creates a grid with the given cells filled; everything else empty.
 */
export function createTestGrid(filled: Array<[row: number, col: number, value: number]> = []): Grid {
  const grid = createEmptyGrid();
  for (const [row, col, value] of filled) {
    grid[row][col] = value;
  }
  return grid;
}

/**
 * Returns an RNG whose successive dice show the given faces, cycling.
 * A face f is produced by any draw in [(f-1)/6, f/6).
 */
export function rngForFaces(faces: number[]): DiceRng {
  let i = 0;
  return () => {
    const face = faces[i % faces.length];
    i++;
    return (face - 0.5) / 6;
  };
}

/**
 * Starts a game whose dice always show the given faces, cycling.
 */
export function createTestGame(faces: number[] = [3, 4]): KnisterGame {
  const game = new KnisterGame({ rng: rngForFaces(faces) });
  game.newGame();
  return game;
}

/**
 * Fills every cell in index order, setting each roll explicitly first.
 * Returns the number of successful placements.
 */
export function fillInOrder(game: KnisterGame, rollFor: (turn: number) => number): number {
  let placements = 0;
  while (!game.hasFinished()) {
    const [first] = game.getAvailableActions();
    game.setCurrentRoll(rollFor(placements));
    const outcome = game.chooseAction(first);
    if (!outcome.valid) {
      throw new Error(`Unexpected rejection: ${outcome.reason}`);
    }
    placements++;
  }
  return placements;
}
