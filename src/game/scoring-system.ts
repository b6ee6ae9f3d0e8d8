import type { PipePair } from "./pipe-pair";

export class ScoringSystem {
  private scoreValue = 0;

  get score(): number {
    return this.scoreValue;
  }

  reset(): void {
    this.scoreValue = 0;
  }

  // One point per pair whose center has moved left of the bird's center.
  scorePassedPipes(birdCenterX: number, pairs: readonly PipePair[]): number {
    let gained = 0;
    for (const pair of pairs) {
      if (pair.passed || pair.centerX >= birdCenterX) {
        continue;
      }
      pair.markPassed();
      gained += 1;
    }
    this.scoreValue += gained;
    return gained;
  }
}
