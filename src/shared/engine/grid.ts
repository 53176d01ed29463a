import { CELL_COUNT, EMPTY_CELL, GRID_SIZE } from './constants';
import type { CellCoordinates, CellIndex, Grid, LineKind, ReadonlyGrid } from './types';

/**
 * Grid geometry helpers shared by the scorer, the game and the console
 * notation. All helpers treat the grid as row-major and never mutate their
 * input.
 */

export function createEmptyGrid(): Grid {
  return Array.from({ length: GRID_SIZE }, () => new Array<number>(GRID_SIZE).fill(EMPTY_CELL));
}

export function cloneGrid(grid: ReadonlyGrid): Grid {
  return grid.map((row) => [...row]);
}

export function allCellIndices(): CellIndex[] {
  return Array.from({ length: CELL_COUNT }, (_, index) => index);
}

export function isCellIndex(value: number): boolean {
  return Number.isInteger(value) && value >= 0 && value < CELL_COUNT;
}

export function indexToCell(index: CellIndex): CellCoordinates {
  return { row: Math.floor(index / GRID_SIZE), col: index % GRID_SIZE };
}

export function cellToIndex(row: number, col: number): CellIndex {
  return row * GRID_SIZE + col;
}

export function countFilledCells(grid: ReadonlyGrid): number {
  let filled = 0;
  for (const row of grid) {
    for (const value of row) {
      if (value !== EMPTY_CELL) filled++;
    }
  }
  return filled;
}

export function getRow(grid: ReadonlyGrid, row: number): number[] {
  return [...(grid[row] ?? [])];
}

export function getColumn(grid: ReadonlyGrid, col: number): number[] {
  return grid.map((row) => row[col] ?? EMPTY_CELL);
}

/** Cells (0,0), (1,1) … (4,4). */
export function getMainDiagonal(grid: ReadonlyGrid): number[] {
  return grid.map((row, i) => row[i] ?? EMPTY_CELL);
}

/** Cells (0,4), (1,3) … (4,0): the main diagonal of the mirrored grid. */
export function getAntiDiagonal(grid: ReadonlyGrid): number[] {
  return grid.map((row, i) => row[GRID_SIZE - 1 - i] ?? EMPTY_CELL);
}

export interface GridLine {
  kind: LineKind;
  index: number;
  values: number[];
}

/**
 * Enumerate the twelve scored lines: rows 0-4, columns 0-4, then the main
 * and anti diagonals.
 */
export function enumerateLines(grid: ReadonlyGrid): GridLine[] {
  const lines: GridLine[] = [];

  for (let i = 0; i < GRID_SIZE; i++) {
    lines.push({ kind: 'row', index: i, values: getRow(grid, i) });
  }
  for (let i = 0; i < GRID_SIZE; i++) {
    lines.push({ kind: 'column', index: i, values: getColumn(grid, i) });
  }
  lines.push({ kind: 'main_diagonal', index: 0, values: getMainDiagonal(grid) });
  lines.push({ kind: 'anti_diagonal', index: 0, values: getAntiDiagonal(grid) });

  return lines;
}
