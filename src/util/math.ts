import type { Rect, Vec2 } from "../types";

export function rectCenter(rect: Readonly<Rect>): Vec2 {
  return {
    x: rect.x + Math.floor(rect.width / 2),
    y: rect.y + Math.floor(rect.height / 2)
  };
}

export function rectRight(rect: Readonly<Rect>): number {
  return rect.x + rect.width;
}

export function rectBottom(rect: Readonly<Rect>): number {
  return rect.y + rect.height;
}

// Touching edges do not count as overlap.
export function rectsOverlap(a: Readonly<Rect>, b: Readonly<Rect>): boolean {
  return a.x < rectRight(b) && rectRight(a) > b.x && a.y < rectBottom(b) && rectBottom(a) > b.y;
}

export function cloneRect(rect: Readonly<Rect>): Rect {
  return { x: rect.x, y: rect.y, width: rect.width, height: rect.height };
}
