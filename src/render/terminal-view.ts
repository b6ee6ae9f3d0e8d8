import type { Rect, SessionSnapshot, Vec2 } from "../types";
import type { HudLayout } from "../ui/hud";

export interface TerminalViewOptions {
  columns: number;
  rows: number;
  screenWidth: number;
  screenHeight: number;
}

const GLYPHS = {
  sky: " ",
  ground: "=",
  pipe: "#",
  bird: "@",
  trail: ".",
  debris: "*"
} as const;

export class TerminalView {
  private readonly columns: number;
  private readonly rows: number;
  private readonly cellWidth: number;
  private readonly cellHeight: number;
  private grid: string[][] = [];

  constructor(options: TerminalViewOptions) {
    this.columns = options.columns;
    this.rows = options.rows;
    this.cellWidth = options.screenWidth / options.columns;
    this.cellHeight = options.screenHeight / options.rows;
  }

  render(snapshot: SessionSnapshot, hud: HudLayout): string {
    this.grid = Array.from({ length: this.rows }, () => Array<string>(this.columns).fill(GLYPHS.sky));
    const offset = snapshot.shakeOffset;

    for (const drawable of snapshot.drawables) {
      switch (drawable.kind) {
        case "pipe":
          this.fillRect(drawable.rect, GLYPHS.pipe, offset);
          break;
        case "trail":
          if (drawable.radius > 0) {
            this.plot(drawable.position, GLYPHS.trail, offset);
          }
          break;
        case "bird":
          this.fillRect(drawable.rect, GLYPHS.bird, offset);
          break;
        case "debris":
          this.fillRect(drawable.rect, GLYPHS.debris, offset);
          break;
      }
    }
    this.fillRect(snapshot.ground, GLYPHS.ground, offset);

    hud.header.forEach((line, index) => this.writeCentered(index, line));
    const overlayTop = Math.floor((this.rows - hud.overlay.length) / 2);
    hud.overlay.forEach((line, index) => this.writeCentered(overlayTop + index, line));

    return this.grid.map((row) => row.join("")).join("\n");
  }

  private fillRect(rect: Rect, glyph: string, offset: Vec2): void {
    if (rect.width <= 0 || rect.height <= 0) {
      return;
    }
    const left = Math.max(0, Math.floor((rect.x + offset.x) / this.cellWidth));
    const right = Math.min(this.columns - 1, Math.ceil((rect.x + offset.x + rect.width) / this.cellWidth) - 1);
    const top = Math.max(0, Math.floor((rect.y + offset.y) / this.cellHeight));
    const bottom = Math.min(this.rows - 1, Math.ceil((rect.y + offset.y + rect.height) / this.cellHeight) - 1);
    for (let row = top; row <= bottom; row += 1) {
      for (let col = left; col <= right; col += 1) {
        this.grid[row][col] = glyph;
      }
    }
  }

  private plot(point: Vec2, glyph: string, offset: Vec2): void {
    const col = Math.floor((point.x + offset.x) / this.cellWidth);
    const row = Math.floor((point.y + offset.y) / this.cellHeight);
    if (col < 0 || col >= this.columns || row < 0 || row >= this.rows) {
      return;
    }
    this.grid[row][col] = glyph;
  }

  private writeCentered(row: number, text: string): void {
    if (row < 0 || row >= this.rows) {
      return;
    }
    const chars = Array.from(text).slice(0, this.columns);
    const start = Math.floor((this.columns - chars.length) / 2);
    chars.forEach((char, index) => {
      this.grid[row][start + index] = char;
    });
  }
}
