import { describe, expect, it } from "vitest";
import { GAME_CONFIG } from "../config/game-config";
import { PipePair } from "./pipe-pair";
import { ScoringSystem } from "./scoring-system";

describe("scoring-system", () => {
  it("scores each pair exactly once after its center passes the bird", () => {
    const scoring = new ScoringSystem();
    const pair = new PipePair(1, 110, 300, GAME_CONFIG);

    expect(scoring.scorePassedPipes(150, [pair])).toBe(0);
    expect(pair.passed).toBe(false);

    pair.update(1);
    expect(scoring.scorePassedPipes(150, [pair])).toBe(1);
    expect(pair.passed).toBe(true);

    for (let i = 0; i < 10; i += 1) {
      pair.update(1);
      scoring.scorePassedPipes(150, [pair]);
    }
    expect(scoring.score).toBe(1);
  });

  it("counts several pairs crossed on the same tick", () => {
    const scoring = new ScoringSystem();
    const pairs = [new PipePair(1, 0, 250, GAME_CONFIG), new PipePair(2, 50, 320, GAME_CONFIG)];
    expect(scoring.scorePassedPipes(150, pairs)).toBe(2);
    scoring.reset();
    expect(scoring.score).toBe(0);
  });
});
