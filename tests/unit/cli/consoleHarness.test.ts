/**
 * Test suite for src/cli/consoleHarness.ts
 *
 * Drives the harness through a scripted ConsoleIO; nothing touches the real
 * terminal.
 */

import {
  CELL_PROMPT,
  ConsoleIO,
  promptForAction,
  runConsoleSession,
} from '../../../src/cli/consoleHarness';
import { KnisterGame } from '../../../src/shared/engine';
import { createTestGame, rngForFaces } from '../../utils/fixtures';

interface ScriptedIO extends ConsoleIO {
  printed: string[];
  prompts: string[];
}

function scriptedIO(answers: string[]): ScriptedIO {
  const queue = [...answers];
  const io: ScriptedIO = {
    printed: [],
    prompts: [],
    prompt: async (question) => {
      io.prompts.push(question);
      const next = queue.shift();
      if (next === undefined) {
        throw new Error('No scripted answer left');
      }
      return next;
    },
    print: (line) => {
      io.printed.push(line);
    },
  };
  return io;
}

describe('consoleHarness', () => {
  describe('promptForAction', () => {
    it('re-asks until a free cell is named', async () => {
      const game = createTestGame([3, 3]);
      game.setCurrentRoll(4);
      game.chooseAction(0);
      const io = scriptedIO(['abc', '6,1', '1,1', '0', '2,3']);

      const position = await promptForAction(game, io);

      expect(position).toBe(7);
      expect(io.prompts).toEqual([CELL_PROMPT, CELL_PROMPT, CELL_PROMPT, CELL_PROMPT, CELL_PROMPT]);
      expect(io.printed).toEqual([
        'Current dice value: 6',
        'Free cells left: 24',
        'Invalid input, try again.',
        'Row/column out of range (1-5), try again.',
        'That cell is already taken, try again.',
        'Invalid index or cell already taken, try again.',
      ]);
    });

    it('accepts a flat index on the first try', async () => {
      const game = createTestGame();
      const io = scriptedIO(['24']);

      await expect(promptForAction(game, io)).resolves.toBe(24);
      expect(io.prompts).toHaveLength(1);
    });
  });

  describe('runConsoleSession', () => {
    it('plays a full game and returns the final score', async () => {
      // every roll is 3 + 3
      const game = new KnisterGame({ rng: rngForFaces([3]) });
      const answers = Array.from({ length: 25 }, (_, i) =>
        i % 2 === 0 ? String(i) : `${Math.floor(i / 5) + 1},${(i % 5) + 1}`
      );
      const io = scriptedIO(answers);

      const finalScore = await runConsoleSession(game, io);

      // all 6s: 5 rows×10 + 5 columns×10 + 2 diagonals×10×2
      expect(finalScore).toBe(140);
      expect(game.hasFinished()).toBe(true);
      expect(io.prompts).toHaveLength(25);
      expect(io.printed.slice(0, 2)).toEqual([
        'Welcome to Knister!',
        'Fill the 5x5 grid by placing the dice total in the free cells.',
      ]);
      expect(io.printed).toContain('Game over!');
      expect(io.printed).toContain('Last move reward: 16');
      expect(io.printed[io.printed.length - 1]).toBe('Final score: 140');
    });

    it('starts a fresh game even when handed a finished one', async () => {
      const game = createTestGame([3]);
      while (!game.hasFinished()) {
        game.chooseAction(game.getAvailableActions()[0]);
      }
      const io = scriptedIO(Array.from({ length: 25 }, (_, i) => String(24 - i)));

      await expect(runConsoleSession(game, io)).resolves.toBe(140);
      expect(game.getHistory()[0].position).toBe(24);
    });

    it('propagates a failing prompt', async () => {
      const game = createTestGame();
      const io = scriptedIO([]);

      await expect(runConsoleSession(game, io)).rejects.toThrow('No scripted answer left');
    });

    it('rejects mid-game when input closes and the pending prompt is aborted', async () => {
      const game = createTestGame();
      const answers = ['0', '1'];
      const io = scriptedIO([]);
      io.prompt = async (question) => {
        io.prompts.push(question);
        const next = answers.shift();
        if (next === undefined) {
          throw Object.assign(new Error('The operation was aborted'), { name: 'AbortError' });
        }
        return next;
      };

      await expect(runConsoleSession(game, io)).rejects.toMatchObject({ name: 'AbortError' });
      expect(io.prompts).toHaveLength(3);
      expect(game.getHistory()).toHaveLength(2);
      expect(game.hasFinished()).toBe(false);
      expect(io.printed).not.toContain('Game over!');
    });
  });
});
