import type { PipeHalf, Rect } from "../types";
import { rectBottom, rectsOverlap } from "../util/math";
import type { PipePair } from "./pipe-pair";

export interface PipeHit {
  pair: PipePair;
  half: PipeHalf;
}

export interface CollisionResult {
  pipe: PipeHit | null;
  ground: boolean;
}

export function checkPipeCollision(bird: Readonly<Rect>, pairs: readonly PipePair[]): PipeHit | null {
  for (const pair of pairs) {
    if (rectsOverlap(bird, pair.top)) {
      return { pair, half: "top" };
    }
    if (rectsOverlap(bird, pair.bottom)) {
      return { pair, half: "bottom" };
    }
  }
  return null;
}

export function checkGroundCollision(bird: Readonly<Rect>, groundLineY: number): boolean {
  return rectBottom(bird) >= groundLineY;
}

export function checkCollisions(bird: Readonly<Rect>, pairs: readonly PipePair[], groundLineY: number): CollisionResult {
  return {
    pipe: checkPipeCollision(bird, pairs),
    ground: checkGroundCollision(bird, groundLineY)
  };
}
