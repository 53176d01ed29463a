import { EMPTY_CELL, GRID_SIZE } from './constants';
import { cellToIndex } from './grid';
import {
  CellIndex,
  ReadonlyGrid,
  ValidationErrorCode,
  ValidationOutcome,
  invalidOutcome,
  validOutcome,
} from './types';

/**
 * Human-facing cell notation.
 *
 * Players type either a flat index ("0".."24") or a 1-based "row,col" pair
 * ("2,3" is row 2, column 3, i.e. index 7). Grids are rendered with the same
 * 1-based labels so the two line up.
 */

const INTEGER_PATTERN = /^[+-]?\d+$/;

function parseInteger(raw: string): number | undefined {
  const trimmed = raw.trim();
  return INTEGER_PATTERN.test(trimmed) ? Number.parseInt(trimmed, 10) : undefined;
}

/**
 * Parse a typed cell into a flat index that is currently available.
 */
export function parseCellInput(
  input: string,
  available: readonly CellIndex[]
): ValidationOutcome<CellIndex> {
  const text = input.trim();

  if (text.includes(',')) {
    const parts = text.split(',');
    const row = parts.length === 2 ? parseInteger(parts[0] ?? '') : undefined;
    const col = parts.length === 2 ? parseInteger(parts[1] ?? '') : undefined;

    if (row === undefined || col === undefined) {
      return invalidOutcome(
        ValidationErrorCode.INPUT_MALFORMED,
        'Invalid format, try again (example: 2,3).',
        { input }
      );
    }
    if (row < 1 || row > GRID_SIZE || col < 1 || col > GRID_SIZE) {
      return invalidOutcome(
        ValidationErrorCode.INPUT_OUT_OF_RANGE,
        `Row/column out of range (1-${GRID_SIZE}), try again.`,
        { row, col }
      );
    }

    const index = cellToIndex(row - 1, col - 1);
    if (!available.includes(index)) {
      return invalidOutcome(
        ValidationErrorCode.INPUT_CELL_UNAVAILABLE,
        'That cell is already taken, try again.',
        { index }
      );
    }
    return validOutcome(index);
  }

  const index = parseInteger(text);
  if (index === undefined) {
    return invalidOutcome(ValidationErrorCode.INPUT_MALFORMED, 'Invalid input, try again.', {
      input,
    });
  }
  if (!available.includes(index)) {
    return invalidOutcome(
      ValidationErrorCode.INPUT_CELL_UNAVAILABLE,
      'Invalid index or cell already taken, try again.',
      { index }
    );
  }
  return validOutcome(index);
}

/** Format a flat index as a 1-based "row,col" pair. */
export function formatCell(index: CellIndex): string {
  return `${Math.floor(index / GRID_SIZE) + 1},${(index % GRID_SIZE) + 1}`;
}

/**
 * Render the grid as text lines:
 *
 * ```
 *     1   2   3   4   5
 *   +---+---+---+---+---+
 * 1 |12 |   | 3 |   |   |
 *   +---+---+---+---+---+
 * ```
 */
export function formatGrid(grid: ReadonlyGrid): string[] {
  const border = '  ' + '+---'.repeat(GRID_SIZE) + '+';
  const header = '  ' + Array.from({ length: GRID_SIZE }, (_, c) => `  ${c + 1} `).join('').trimEnd();

  const lines = [header, border];
  grid.forEach((row, r) => {
    const cells = row.map((value) => (value === EMPTY_CELL ? '  ' : String(value).padStart(2, ' ')));
    lines.push(`${r + 1} |${cells.join(' |')} |`);
    lines.push(border);
  });
  return lines;
}
