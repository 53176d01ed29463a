import {
  CellIndex,
  KnisterGame,
  formatCell,
  formatGrid,
  isValidOutcome,
  parseCellInput,
} from '../shared/engine';
import { LogMeta, logger } from './utils/logger';

/**
 * Minimal line-oriented terminal surface. The entry script backs it with
 * readline; tests back it with scripted answers.
 */
export interface ConsoleIO {
  prompt(question: string): Promise<string>;
  print(line: string): void;
}

export const CELL_PROMPT = "Choose a cell (index 0-24 or 'r,c' with row and column 1-5): ";

function printGrid(game: KnisterGame, io: ConsoleIO): void {
  io.print('');
  io.print('Current grid:');
  for (const line of formatGrid(game.getGrid())) {
    io.print(line);
  }
  io.print('');
}

function printRewards(game: KnisterGame, io: ConsoleIO): void {
  io.print(`Last move reward: ${game.getLastReward()}`);
  io.print(`Current total score: ${game.getTotalReward()}`);
  io.print('');
}

/**
 * Ask until the player names a free cell; returns its flat index.
 */
export async function promptForAction(game: KnisterGame, io: ConsoleIO): Promise<CellIndex> {
  const available = game.getAvailableActions();

  io.print(`Current dice value: ${game.getCurrentRoll() ?? '-'}`);
  io.print(`Free cells left: ${available.length}`);

  for (;;) {
    const answer = await io.prompt(CELL_PROMPT);
    const parsed = parseCellInput(answer, available);
    if (isValidOutcome(parsed)) {
      return parsed.data;
    }
    logger.debug('Rejected cell input', { code: parsed.code, input: answer });
    io.print(parsed.reason);
  }
}

/**
 * Play one full game interactively. Returns the final score.
 */
export async function runConsoleSession(game: KnisterGame, io: ConsoleIO): Promise<number> {
  game.newGame();
  logger.info('Knister session started', { firstRoll: game.getCurrentRoll() });

  io.print('Welcome to Knister!');
  io.print('Fill the 5x5 grid by placing the dice total in the free cells.');
  io.print('');

  while (!game.hasFinished()) {
    printGrid(game, io);
    printRewards(game, io);

    const position = await promptForAction(game, io);
    const outcome = game.chooseAction(position);
    if (!outcome.valid) {
      // Only reachable if the game changed between prompt and placement.
      logger.warn('Placement rejected', { code: outcome.code, position });
      io.print(outcome.reason);
      continue;
    }

    const meta: LogMeta = {
      position,
      cell: formatCell(position),
      value: outcome.data.value,
      reward: outcome.data.reward,
      total: outcome.data.totalReward,
    };
    logger.debug('Placement applied', meta);
  }

  const finalScore = game.getTotalReward();

  printRewards(game, io);
  io.print('Game over!');
  printGrid(game, io);
  io.print(`Final score: ${finalScore}`);

  logger.info('Knister session finished', { finalScore, placements: game.getHistory().length });
  return finalScore;
}
