import { GAME_CONFIG, groundLine } from "../config/game-config";
import { GameStateMachine } from "../core/state";
import type { Drawable, GameConfig, GameState, InputEvent, SessionSnapshot, Vec2 } from "../types";
import { randInt, type RandomFn } from "../util/random";
import { BirdController } from "./bird-controller";
import { checkCollisions } from "./collision-system";
import { DeathParticleSet } from "./particles";
import { PipeStream } from "./pipe-stream";
import { ScoringSystem } from "./scoring-system";

export interface SessionEvents {
  onStateChange?: (nextState: GameState, prevState: GameState) => void;
  onCollision?: (kind: "pipe" | "ground") => void;
  onScore?: (score: number) => void;
}

export interface SessionOptions {
  config?: Readonly<GameConfig>;
  random?: RandomFn;
  events?: SessionEvents;
}

export interface SessionTickResult {
  gameOver: boolean;
  quit: boolean;
}

export class GameSession {
  readonly config: Readonly<GameConfig>;
  readonly bird: BirdController;
  readonly pipes: PipeStream;
  readonly scoring: ScoringSystem;
  readonly debris: DeathParticleSet;

  private readonly machine = new GameStateMachine();
  private readonly random: RandomFn;
  private readonly events: SessionEvents;
  private shakeTicks = 0;
  private shakeOffset: Vec2 = { x: 0, y: 0 };
  private tickCount = 0;

  constructor(options: SessionOptions = {}) {
    this.config = options.config ?? GAME_CONFIG;
    this.random = options.random ?? Math.random;
    this.events = options.events ?? {};
    this.bird = new BirdController(this.config, this.random);
    this.pipes = new PipeStream(this.config, this.random);
    this.scoring = new ScoringSystem();
    this.debris = new DeathParticleSet(this.random);
    this.machine.onChange((next, prev) => this.events.onStateChange?.(next, prev));
  }

  get state(): GameState {
    return this.machine.current;
  }

  get score(): number {
    return this.scoring.score;
  }

  get shakeRemaining(): number {
    return this.shakeTicks;
  }

  get ticks(): number {
    return this.tickCount;
  }

  reset(): void {
    this.bird.reset();
    this.pipes.reset();
    this.scoring.reset();
    this.debris.clear();
    this.shakeTicks = 0;
    this.shakeOffset = { x: 0, y: 0 };
    this.tickCount = 0;
    if (this.machine.is("gameover")) {
      this.machine.transition("playing");
    }
  }

  /**
   * Applies one input event to the current state. Events that make no sense
   * in the current state are dropped and reported as not applied. `quit` is
   * never applied here; the host owns process shutdown.
   */
  handleInput(event: InputEvent): boolean {
    if (event === "jump" && this.machine.is("playing")) {
      this.bird.jump();
      return true;
    }
    if (event === "restart" && this.machine.is("gameover")) {
      this.reset();
      return true;
    }
    return false;
  }

  /** Drains one tick's worth of input in arrival order, then advances one step. */
  step(events: readonly InputEvent[], dtTicks = 1): SessionTickResult {
    for (const event of events) {
      if (event === "quit") {
        return { gameOver: false, quit: true };
      }
      this.handleInput(event);
    }
    return { gameOver: this.update(dtTicks), quit: false };
  }

  // Returns true on the tick that ends the run.
  update(dtTicks = 1): boolean {
    this.tickCount += 1;
    let gameOver = false;
    if (this.machine.is("playing")) {
      gameOver = this.updatePlaying(dtTicks);
    } else {
      this.debris.update(dtTicks);
    }
    this.updateShake();
    return gameOver;
  }

  getSnapshot(): SessionSnapshot {
    const playing = this.machine.is("playing");
    const drawables: Drawable[] = [];

    for (const pair of this.pipes.snapshot()) {
      drawables.push({ kind: "pipe", pairId: pair.id, half: "top", rect: pair.top, passed: pair.passed });
      drawables.push({ kind: "pipe", pairId: pair.id, half: "bottom", rect: pair.bottom, passed: pair.passed });
    }

    if (playing) {
      for (const particle of this.bird.trailSnapshot()) {
        drawables.push({
          kind: "trail",
          position: particle.position,
          radius: particle.radius,
          color: particle.color
        });
      }
      const bird = this.bird.snapshot();
      drawables.push({
        kind: "bird",
        rect: bird.rect,
        velocity: bird.velocity,
        pose: bird.velocity < 0 ? "rising" : "falling"
      });
    }

    for (const particle of this.debris.snapshot()) {
      drawables.push({
        kind: "debris",
        rect: { x: particle.position.x, y: particle.position.y, width: particle.size, height: particle.size },
        color: particle.color
      });
    }

    const line = groundLine(this.config);
    return {
      state: this.machine.current,
      score: this.scoring.score,
      tick: this.tickCount,
      drawables,
      ground: { x: 0, y: line, width: this.config.screenWidth, height: this.config.groundHeight },
      shakeOffset: { ...this.shakeOffset },
      livePipes: this.pipes.pairs.length
    };
  }

  private updatePlaying(dtTicks: number): boolean {
    this.bird.update(dtTicks);
    this.pipes.maybeSpawn(dtTicks);
    this.pipes.update(dtTicks);

    const line = groundLine(this.config);
    const collision = checkCollisions(this.bird.rect, this.pipes.pairs, line);
    // A pipe hit bursts from where the bird struck, before any ground clamp.
    const impact = this.bird.center;
    if (collision.ground) {
      this.bird.landOn(line);
    }

    if (this.scoring.scorePassedPipes(this.bird.center.x, this.pipes.pairs) > 0) {
      this.events.onScore?.(this.scoring.score);
    }
    this.pipes.retireOffscreen();

    if (collision.pipe) {
      this.endGame("pipe", impact);
      return true;
    }
    if (collision.ground) {
      this.endGame("ground", this.bird.center);
      return true;
    }
    return false;
  }

  private endGame(kind: "pipe" | "ground", origin: Vec2): void {
    this.machine.transition("gameover");
    this.shakeTicks = this.config.shakeDurationTicks;
    this.debris.burst(origin);
    this.events.onCollision?.(kind);
  }

  private updateShake(): void {
    if (this.shakeTicks <= 0) {
      this.shakeOffset = { x: 0, y: 0 };
      return;
    }
    const magnitude = this.config.shakeMagnitude;
    this.shakeOffset = {
      x: randInt(this.random, -magnitude, magnitude),
      y: randInt(this.random, -magnitude, magnitude)
    };
    this.shakeTicks -= 1;
  }
}
