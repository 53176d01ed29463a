#!/usr/bin/env ts-node
/**
 * play-knister.ts
 * ===============
 *
 * Play a game of Knister by hand in the terminal. Intended for debugging and
 * manual verification of the rules engine.
 *
 * Usage (from repo root):
 *
 *   npm run play
 *   KNISTER_DICE_SEED=42 npm run play     # reproducible dice
 *
 * Exit code:
 *   0  – game finished
 *   1  – input closed or unexpected failure
 */

import * as readline from 'readline/promises';

import { config } from '../src/cli/config';
import { runConsoleSession } from '../src/cli/consoleHarness';
import { logger } from '../src/cli/utils/logger';
import { KnisterGame, createSeededRng } from '../src/shared/engine';

async function main(): Promise<void> {
  const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
  // A pending question() never settles on EOF; abort it so the session rejects.
  const inputClosed = new AbortController();
  rl.on('close', () => inputClosed.abort());
  const seed = config.dice.seed;
  const game = new KnisterGame(seed === undefined ? {} : { rng: createSeededRng(seed) });

  logger.debug('Starting console harness', { version: config.app.version, seed });

  try {
    await runConsoleSession(game, {
      prompt: (question) => rl.question(question, { signal: inputClosed.signal }),
      print: (line) => console.log(line),
    });
  } finally {
    rl.close();
  }
}

main().catch((err: unknown) => {
  logger.error('Console session failed', { error: err });
  process.exit(1);
});
