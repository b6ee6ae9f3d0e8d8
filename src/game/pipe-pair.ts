import type { Entity, GameConfig, PipePairState, Rect } from "../types";

export class PipePair implements Entity<PipePairState> {
  readonly id: number;
  readonly gapCenter: number;
  readonly width: number;
  private posX: number;
  private passedFlag = false;
  private readonly config: GameConfig;

  constructor(id: number, x: number, gapCenter: number, config: GameConfig) {
    this.id = id;
    this.posX = x;
    this.gapCenter = gapCenter;
    this.width = config.pipeWidth;
    this.config = config;
  }

  get x(): number {
    return this.posX;
  }

  get centerX(): number {
    return this.posX + Math.floor(this.width / 2);
  }

  get right(): number {
    return this.posX + this.width;
  }

  get passed(): boolean {
    return this.passedFlag;
  }

  get isOffscreen(): boolean {
    return this.right < 0;
  }

  get top(): Rect {
    const height = this.gapCenter - this.halfGap;
    return { x: this.posX, y: 0, width: this.width, height };
  }

  get bottom(): Rect {
    const y = this.gapCenter + this.halfGap;
    return { x: this.posX, y, width: this.width, height: this.config.screenHeight - y };
  }

  markPassed(): void {
    this.passedFlag = true;
  }

  update(dtTicks: number): void {
    this.posX += this.config.pipeSpeed * dtTicks;
  }

  snapshot(): PipePairState {
    return {
      id: this.id,
      x: this.posX,
      gapCenter: this.gapCenter,
      passed: this.passedFlag,
      top: this.top,
      bottom: this.bottom
    };
  }

  private get halfGap(): number {
    return Math.floor(this.config.pipeGap / 2);
  }
}
