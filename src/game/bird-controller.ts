import type { BirdState, Entity, GameConfig, Rect, TrailParticle, Vec2 } from "../types";
import { cloneRect, rectBottom, rectCenter } from "../util/math";
import type { RandomFn } from "../util/random";
import { TrailParticleSet } from "./particles";

export class BirdController implements Entity<BirdState> {
  readonly trail: TrailParticleSet;
  private readonly box: Rect;
  private velocityY = 0;
  private readonly config: GameConfig;

  constructor(config: GameConfig, random: RandomFn) {
    this.config = config;
    this.trail = new TrailParticleSet(random);
    this.box = { x: 0, y: 0, width: config.birdWidth, height: config.birdHeight };
    this.reset();
  }

  get rect(): Readonly<Rect> {
    return this.box;
  }

  get velocity(): number {
    return this.velocityY;
  }

  get center(): Vec2 {
    return rectCenter(this.rect);
  }

  get bottom(): number {
    return rectBottom(this.rect);
  }

  reset(): void {
    this.box.x = this.config.birdStartX - Math.floor(this.config.birdWidth / 2);
    this.box.y = this.config.screenHeight / 2 - Math.floor(this.config.birdHeight / 2);
    this.velocityY = 0;
    this.trail.clear();
  }

  update(dtTicks: number): void {
    this.velocityY += this.config.gravity * dtTicks;
    this.box.y += Math.trunc(this.velocityY);

    if (this.box.y < 0) {
      this.box.y = 0;
      this.velocityY = 0;
    }

    this.trail.emit({ x: this.box.x, y: this.center.y });
    this.trail.update(dtTicks);
  }

  jump(): void {
    this.velocityY = this.config.jumpStrength;
  }

  // Moves the bird up so its bottom edge rests on lineY.
  landOn(lineY: number): void {
    this.box.y = lineY - this.box.height;
  }

  // Top edge never goes above the screen.
  placeAt(y: number): void {
    this.box.y = Math.max(0, y);
  }

  trailSnapshot(): TrailParticle[] {
    return this.trail.snapshot();
  }

  snapshot(): BirdState {
    return {
      rect: cloneRect(this.box),
      velocity: this.velocityY
    };
  }
}
