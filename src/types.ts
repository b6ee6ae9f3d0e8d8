export type GameState = "playing" | "gameover";
export type Language = "en" | "ru";
export type InputEvent = "jump" | "restart" | "quit";
export type PipeHalf = "top" | "bottom";

export interface Vec2 {
  x: number;
  y: number;
}

export interface Rect {
  x: number;
  y: number;
  width: number;
  height: number;
}

export interface GameConfig {
  screenWidth: number;
  screenHeight: number;
  tickRate: number;
  gravity: number;
  jumpStrength: number;
  pipeSpeed: number;
  pipeGap: number;
  pipeWidth: number;
  pipeSpawnIntervalMs: number;
  pipeSpawnMargin: number;
  gapMargin: number;
  groundHeight: number;
  birdWidth: number;
  birdHeight: number;
  birdStartX: number;
  shakeDurationTicks: number;
  shakeMagnitude: number;
}

/** Common shape of everything the session advances once per tick. */
export interface Entity<TSnapshot> {
  update(dtTicks: number): void;
  snapshot(): TSnapshot;
}

export interface TrailParticle {
  position: Vec2;
  radius: number;
  lifetime: number;
  color: string;
}

export interface DeathParticle {
  position: Vec2;
  velocity: Vec2;
  size: number;
  color: string;
}

export interface BirdState {
  rect: Rect;
  velocity: number;
}

export interface PipePairState {
  id: number;
  x: number;
  gapCenter: number;
  passed: boolean;
  top: Rect;
  bottom: Rect;
}

export type Drawable =
  | { kind: "pipe"; pairId: number; half: PipeHalf; rect: Rect; passed: boolean }
  | { kind: "trail"; position: Vec2; radius: number; color: string }
  | { kind: "bird"; rect: Rect; velocity: number; pose: "rising" | "falling" }
  | { kind: "debris"; rect: Rect; color: string };

export interface SessionSnapshot {
  state: GameState;
  score: number;
  tick: number;
  drawables: Drawable[];
  ground: Rect;
  shakeOffset: Vec2;
  livePipes: number;
}
