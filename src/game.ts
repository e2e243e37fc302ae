// Game — state machine, fixed-step loop, orchestration

import type { Ball, Drawable, EventSource, FrameClock, GamePhase, Paddle, Score, Surface } from './types.js';
import { COLOR_TEXT, SCORE_PLAYER_Y_FRAC, SCORE_COMPUTER_Y_FRAC, SCORE_TEXT_HEIGHT } from './constants.js';
import type { GameConfig } from './config.js';
import { centeredRect } from './entity.js';
import { makeBall, updateBall } from './physics.js';
import { makePaddle, clampToArena } from './paddle.js';
import { type ControlStrategy, createControl } from './control.js';
import { AIController } from './ai.js';
import { Scorekeeper } from './scorekeeper.js';
import { InputManager } from './input.js';
import { type Logger, createModuleLogger } from './logger.js';

export interface GameDeps {
  config: GameConfig;
  surface: Surface;
  events: EventSource;
  clock: FrameClock;
  logger: Logger;
}

export class Game {
  private phase: GamePhase = 'RUNNING';

  private readonly config: GameConfig;
  private readonly surface: Surface;
  private readonly events: EventSource;
  private readonly clock: FrameClock;
  private readonly log: Logger;

  private readonly ball: Ball;
  private readonly player: Paddle;
  private readonly computer: Paddle;
  private readonly input = new InputManager();
  private readonly control: ControlStrategy;
  private readonly ai: AIController;
  private readonly scorekeeper: Scorekeeper;

  private ticks = 0;

  constructor(deps: GameDeps) {
    this.config = deps.config;
    this.surface = deps.surface;
    this.events = deps.events;
    this.clock = deps.clock;
    this.log = createModuleLogger(deps.logger, 'game');

    const { arena } = this.config;

    this.ball = makeBall(this.config);
    this.player = makePaddle(this.config, 'player');
    this.computer = makePaddle(this.config, 'computer');
    this.control = createControl(this.config);
    this.ai = new AIController(this.computer, this.ball, arena);
    this.scorekeeper = new Scorekeeper(this.ball, arena, this.config.serveAxis);
  }

  // ─── Main Loop ─────────────────────────────────────────────────────────

  /**
   * Runs ticks at config.fps until a quit event or stop().
   * Resolves once the loop has exited; the caller owns surface.close().
   */
  async run(): Promise<void> {
    this.log.info(
      { arena: this.config.arena, control: this.config.control, serveAxis: this.config.serveAxis, fps: this.config.fps },
      'game started',
    );

    while (this.tick()) {
      await this.clock.wait();
    }

    this.log.info({ ticks: this.ticks, score: this.scorekeeper.score() }, 'game over');
  }

  /** Ends the loop after the current tick. */
  stop(): void {
    this.phase = 'TERMINATED';
  }

  // ─── Tick ──────────────────────────────────────────────────────────────

  /**
   * One fixed step:
   *   1. drain input (quit ends the game here, nothing else runs)
   *   2. human paddle
   *   3. ball advance + collisions
   *   4. AI paddle
   *   5. scoring
   *   6. draw
   *
   * Returns false once the game has terminated.
   */
  tick(): boolean {
    if (this.phase !== 'RUNNING') return false;

    this.input.apply(this.events.poll());
    if (this.input.quit()) {
      this.log.info('quit requested');
      this.phase = 'TERMINATED';
      return false;
    }

    this.ticks++;
    const { arena } = this.config;

    // Human paddle
    this.player.rect.y = this.control.computeNextY(this.player, this.input);
    clampToArena(this.player, arena);

    // Ball
    const physics = updateBall(this.ball, arena, [this.player, this.computer]);
    if (physics.hitPaddle !== null) {
      this.log.debug({ tick: this.ticks, paddle: physics.hitPaddle }, 'paddle hit');
    } else if (physics.hitWall !== null) {
      this.log.debug({ tick: this.ticks, wall: physics.hitWall }, 'wall bounce');
    }

    // Computer paddle
    this.ai.update();

    // Scoring
    const scorer = this.scorekeeper.update(physics);
    if (scorer !== null) {
      this.log.info({ tick: this.ticks, scorer, score: this.scorekeeper.score() }, 'point scored');
    }

    this.surface.drawFrame(this.drawables());
    this.input.flush();
    return true;
  }

  // ─── Render ────────────────────────────────────────────────────────────

  /** Ball, paddles, then score text on top. */
  drawables(): Drawable[] {
    const { width, height } = this.config.arena;
    const score = this.scorekeeper.score();

    return [
      { rect: { ...this.ball.rect }, color: this.ball.color },
      { rect: { ...this.player.rect }, color: this.player.color },
      { rect: { ...this.computer.rect }, color: this.computer.color },
      {
        rect: centeredRect(width / 2, height * SCORE_PLAYER_Y_FRAC, width, SCORE_TEXT_HEIGHT),
        color: COLOR_TEXT,
        text: `Player: ${score.player}`,
      },
      {
        rect: centeredRect(width / 2, height * SCORE_COMPUTER_Y_FRAC, width, SCORE_TEXT_HEIGHT),
        color: COLOR_TEXT,
        text: `Computer: ${score.computer}`,
      },
    ];
  }

  // ─── Read-only views ───────────────────────────────────────────────────

  getPhase(): GamePhase {
    return this.phase;
  }

  getScore(): Readonly<Score> {
    return this.scorekeeper.score();
  }

  getBall(): Readonly<Ball> {
    return this.ball;
  }

  getPaddle(side: 'player' | 'computer'): Readonly<Paddle> {
    return side === 'player' ? this.player : this.computer;
  }

  getTickCount(): number {
    return this.ticks;
  }
}
