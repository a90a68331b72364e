import type { Writable } from 'node:stream';
import { pathToFileURL } from 'node:url';
import { renderFrame } from '../src/render.ts';
import { createRng, hashSeed } from '../src/rng.ts';
import { parseConfig, type CliConfig } from './config.ts';
import { parseKey } from './input.ts';
import { createLogger, type Logger } from './logger.ts';
import { GameSession } from './session.ts';
import { TerminalScreen, attachKeyboard, type KeyboardInput } from './terminal.ts';

/** Streams and logger the game runs against. */
export interface GameIo {
  input: KeyboardInput;
  output: Writable;
  logger: Logger;
}

export interface RunningGame {
  session: GameSession;
  /** Seed the food placement was derived from. */
  seed: number;
  /** Resolves with the exit code once the game has shut down. */
  done: Promise<number>;
  close: (code?: number) => void;
}

/**
 * Wire a session to a screen and keyboard and start ticking.
 * @param config - Normalized CLI configuration.
 * @param io - Terminal streams and logger.
 * @returns Handle for shutting the game down.
 */
export function startGame(config: CliConfig, io: GameIo): RunningGame {
  const seed = config.seed ?? Math.floor(Math.random() * 0x100000000);
  const rng = createRng(hashSeed(seed, config.width, config.height));
  io.logger.forModule('cli').debug(`seed ${seed}`);

  const screen = new TerminalScreen(io.output);
  let closed = false;
  let detach = () => {};
  let resolveDone: (code: number) => void = () => {};
  const done = new Promise<number>((resolve) => {
    resolveDone = resolve;
  });

  const session = new GameSession({
    game: config,
    tickRateHz: config.tickRateHz,
    rng,
    logger: io.logger,
    onFrame: (frame) =>
      screen.draw(renderFrame(frame.snapshot, { phase: frame.phase, color: config.color })),
    onQuit: () => close(0)
  });

  const close = (code = 0) => {
    if (closed) return;
    closed = true;
    session.stop();
    detach();
    screen.close();
    resolveDone(code);
  };

  screen.open();
  detach = attachKeyboard(io.input, (key) => {
    const command = parseKey(key);
    if (command) session.handleInput(command);
  });
  session.start();

  return { session, seed, done, close };
}

export async function main(): Promise<void> {
  const config = parseConfig(process.argv.slice(2), process.env);
  const logger = createLogger(config.logLevel);
  const game = startGame(config, {
    input: process.stdin,
    output: process.stdout,
    logger
  });

  const shutdown = () => game.close(0);
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
  process.once('uncaughtException', (err) => {
    logger.forModule('cli').error(err);
    game.close(1);
  });

  const code = await game.done;
  process.exit(code);
}

if (import.meta.url === pathToFileURL(process.argv[1] ?? '').href) {
  main().catch((err) => {
    console.error(err);
    process.exit(1);
  });
}
