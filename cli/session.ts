import { performance } from 'node:perf_hooks';
import type { GameOptions } from '../src/config.ts';
import type { Direction } from '../src/direction.ts';
import { createGame, resetGame, snapshotGame, step, type GameSnapshot, type GameState } from '../src/game.ts';
import type { RenderPhase } from '../src/render.ts';
import type { RandomSource } from '../src/rng.ts';
import type { InputCommand } from './input.ts';
import type { Logger, ModuleLogger } from './logger.ts';

/** Session lifecycle as seen by the screen. */
export type SessionPhase = RenderPhase;

/** Frame payload emitted after every tick and every input that changes the screen. */
export interface SessionFrame {
  snapshot: GameSnapshot;
  phase: SessionPhase;
  tickId: number;
}

export interface GameSessionOptions {
  game: GameOptions;
  tickRateHz: number;
  rng?: RandomSource;
  logger?: Logger;
  /** Millisecond clock driving the tick schedule. */
  now?: () => number;
  onFrame?: (frame: SessionFrame) => void;
  onQuit?: () => void;
}

/** Fixed-rate game loop fed by keyboard commands. */
export class GameSession {
  /** Live game state; replaced on restart. */
  private state: GameState;
  /** Random source shared by every game in this session. */
  private rng: RandomSource;
  /** Tick rate in hertz. */
  private tickRateHz: number;
  /** Latest direction asked for since the previous tick. */
  private pending: Direction | null = null;
  /** Current screen phase. */
  private phase: SessionPhase = 'waiting';
  /** Loop tick counter, including ticks that did not move the snake. */
  private tickId = 0;
  /** Whether the main loop is running. */
  private running = false;
  /** Active timer id for scheduled ticks. */
  private timer: ReturnType<typeof setTimeout> | null = null;
  /** Target time for the next tick in ms. */
  private nextTickAt = 0;
  private now: () => number;
  private log: ModuleLogger | null;
  private onFrame: ((frame: SessionFrame) => void) | null;
  private onQuit: (() => void) | null;

  /**
   * Create a session with a fresh game waiting for its first key.
   * @param options - Board layout, tick rate and callbacks.
   */
  constructor(options: GameSessionOptions) {
    this.rng = options.rng ?? Math.random;
    this.tickRateHz = Math.max(1, options.tickRateHz);
    this.now = options.now ?? (() => performance.now());
    this.log = options.logger?.forModule('session') ?? null;
    this.onFrame = options.onFrame ?? null;
    this.onQuit = options.onQuit ?? null;
    this.state = createGame(options.game, this.rng);
  }

  /** Start the tick loop and draw the first frame. */
  start(): void {
    if (this.running) return;
    this.running = true;
    this.nextTickAt = this.now();
    this.log?.info(
      `started ${this.state.grid.width}x${this.state.grid.height} at ${this.tickRateHz} Hz`
    );
    this.emit();
    this.loop();
  }

  /** Stop the tick loop. */
  stop(): void {
    this.running = false;
    if (this.timer) clearTimeout(this.timer);
    this.timer = null;
  }

  isRunning(): boolean {
    return this.running;
  }

  getPhase(): SessionPhase {
    return this.phase;
  }

  getTickId(): number {
    return this.tickId;
  }

  getSnapshot(): GameSnapshot {
    return snapshotGame(this.state);
  }

  /**
   * Apply a keyboard command.
   * @param command - Parsed command.
   */
  handleInput(command: InputCommand): void {
    switch (command.type) {
      case 'direction':
        if (this.phase === 'over') return;
        this.pending = command.direction;
        if (this.phase === 'waiting') {
          this.phase = 'playing';
          this.emit();
        }
        return;
      case 'pause':
        if (this.phase === 'playing') {
          this.phase = 'paused';
        } else if (this.phase === 'paused') {
          this.phase = 'playing';
        } else {
          return;
        }
        this.emit();
        return;
      case 'restart':
        if (this.phase !== 'over') return;
        this.state = resetGame(this.state, this.rng);
        this.pending = null;
        this.phase = 'waiting';
        this.log?.info('restarted');
        this.emit();
        return;
      case 'quit':
        this.log?.info(`quit with score ${this.state.score}`);
        this.stop();
        this.onQuit?.();
        return;
    }
  }

  /** Run a single tick and emit the resulting frame. */
  tickOnce(): void {
    this.tickId += 1;
    if (this.phase === 'playing') {
      const requested = this.pending ?? this.state.heading;
      this.pending = null;
      const scoreBefore = this.state.score;
      step(this.state, requested, this.rng);
      if (this.state.score !== scoreBefore) {
        this.log?.debug(
          `ate food; score ${this.state.score}, length ${this.state.snake.length}`
        );
      }
      if (!this.state.alive) {
        this.phase = 'over';
        this.log?.info(`game over; score ${this.state.score}, moves ${this.state.ticks}`);
      } else if (this.state.won) {
        this.phase = 'over';
        this.log?.info(`board filled; score ${this.state.score}`);
      }
    }
    this.emit();
  }

  private loop(): void {
    if (!this.running) return;
    const now = this.now();
    if (now >= this.nextTickAt) {
      this.tickOnce();
      const interval = 1000 / this.tickRateHz;
      this.nextTickAt += interval;
      // Behind by a whole interval after a stall: skip the missed ticks.
      if (this.nextTickAt <= now) this.nextTickAt = now + interval;
    }
    // tickOnce may have quit the session through a callback.
    if (!this.running) return;
    const delay = Math.max(0, this.nextTickAt - now);
    this.timer = setTimeout(() => this.loop(), delay);
  }

  private emit(): void {
    this.onFrame?.({ snapshot: this.getSnapshot(), phase: this.phase, tickId: this.tickId });
  }
}
