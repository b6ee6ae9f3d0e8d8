import { spawnIntervalTicks } from "../config/game-config";
import type { Entity, GameConfig, PipePairState } from "../types";
import { randInt, type RandomFn } from "../util/random";
import { PipePair } from "./pipe-pair";

export class PipeStream implements Entity<PipePairState[]> {
  private readonly config: GameConfig;
  private readonly random: RandomFn;
  private readonly intervalTicks: number;
  private nextId = 1;
  private elapsedTicks = 0;

  // Spawn order, which is also left-to-right on screen.
  readonly pairs: PipePair[] = [];

  constructor(config: GameConfig, random: RandomFn) {
    this.config = config;
    this.random = random;
    this.intervalTicks = spawnIntervalTicks(config);
  }

  get spawnIntervalTicks(): number {
    return this.intervalTicks;
  }

  reset(): void {
    this.nextId = 1;
    this.elapsedTicks = 0;
    this.pairs.length = 0;
  }

  maybeSpawn(dtTicks: number): PipePair | null {
    this.elapsedTicks += dtTicks;
    if (this.elapsedTicks < this.intervalTicks) {
      return null;
    }
    this.elapsedTicks = 0;
    return this.spawn();
  }

  spawn(): PipePair {
    const gapCenter = randInt(
      this.random,
      this.config.gapMargin,
      this.config.screenHeight - this.config.gapMargin
    );
    const pair = new PipePair(
      this.nextId++,
      this.config.screenWidth + this.config.pipeSpawnMargin,
      gapCenter,
      this.config
    );
    this.pairs.push(pair);
    return pair;
  }

  update(dtTicks: number): void {
    for (const pair of this.pairs) {
      pair.update(dtTicks);
    }
  }

  retireOffscreen(): number {
    let removed = 0;
    for (let i = this.pairs.length - 1; i >= 0; i -= 1) {
      if (this.pairs[i].isOffscreen) {
        this.pairs.splice(i, 1);
        removed += 1;
      }
    }
    return removed;
  }

  snapshot(): PipePairState[] {
    return this.pairs.map((pair) => pair.snapshot());
  }
}
