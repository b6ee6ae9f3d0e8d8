import { describe, expect, it } from "vitest";
import { GAME_CONFIG } from "../config/game-config";
import { checkCollisions, checkGroundCollision, checkPipeCollision } from "./collision-system";
import { PipePair } from "./pipe-pair";

describe("collision-system", () => {
  const birdAt = (x: number, y: number) => ({ x, y, width: 45, height: 35 });

  it("detects overlap with the top and bottom halves", () => {
    const pair = new PipePair(1, 120, 300, GAME_CONFIG);
    expect(checkPipeCollision(birdAt(128, 190), [pair])).toEqual({ pair, half: "top" });
    expect(checkPipeCollision(birdAt(128, 380), [pair])).toEqual({ pair, half: "bottom" });
    expect(checkPipeCollision(birdAt(128, 283), [pair])).toBeNull();
  });

  it("does not count touching edges as a hit", () => {
    const pair = new PipePair(1, 173, 300, GAME_CONFIG);
    expect(checkPipeCollision(birdAt(128, 100), [pair])).toBeNull();
    const below = new PipePair(2, 120, 300, GAME_CONFIG);
    expect(checkPipeCollision(birdAt(128, 210), [below])).toBeNull();
    expect(checkPipeCollision(birdAt(128, 209), [below])?.half).toBe("top");
  });

  it("flags ground contact at the ground line", () => {
    expect(checkGroundCollision(birdAt(128, 464), 500)).toBe(false);
    expect(checkGroundCollision(birdAt(128, 465), 500)).toBe(true);
  });

  it("reports both checks independently", () => {
    const pair = new PipePair(1, 120, 300, GAME_CONFIG);
    const result = checkCollisions(birdAt(128, 480), [pair], 500);
    expect(result.ground).toBe(true);
    expect(result.pipe?.half).toBe("bottom");
  });
});
