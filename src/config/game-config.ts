import { z } from "zod";
import type { GameConfig, InputEvent } from "../types";

export const GAME_CONFIG: Readonly<GameConfig> = Object.freeze({
  screenWidth: 800,
  screenHeight: 600,
  tickRate: 60,
  gravity: 0.4,
  jumpStrength: -9,
  pipeSpeed: -4,
  pipeGap: 180,
  pipeWidth: 80,
  pipeSpawnIntervalMs: 1400,
  pipeSpawnMargin: 50,
  gapMargin: 200,
  groundHeight: 100,
  birdWidth: 45,
  birdHeight: 35,
  birdStartX: 150,
  shakeDurationTicks: 20,
  shakeMagnitude: 5
});

export const TRAIL_RULES = {
  offsetX: -5,
  jitterY: 5,
  minRadius: 2,
  maxRadius: 4,
  minLifetime: 10,
  maxLifetime: 20,
  driftX: -2,
  shrink: 0.1
} as const;

export const DEATH_BURST_RULES = {
  count: 30,
  minVelocityX: -4,
  maxVelocityX: 4,
  minVelocityY: -6,
  maxVelocityY: 2,
  minSize: 5,
  maxSize: 10,
  gravity: 0.3,
  shrink: 0.2
} as const;

export const PALETTE = {
  trail: "#ffffe0",
  birdLight: "#fff064",
  birdDark: "#f5be28",
  ember: "#ff6464"
} as const;

export const DEATH_COLORS: readonly string[] = [PALETTE.birdLight, PALETTE.birdDark, PALETTE.ember];

export const KEY_BINDINGS: Readonly<Record<string, InputEvent>> = {
  space: "jump",
  up: "jump",
  w: "jump",
  r: "restart",
  return: "restart",
  enter: "restart",
  q: "quit",
  escape: "quit"
};

const GameConfigSchema = z
  .object({
    screenWidth: z.number().int().positive(),
    screenHeight: z.number().int().positive(),
    tickRate: z.number().positive(),
    gravity: z.number().nonnegative(),
    jumpStrength: z.number().negative(),
    pipeSpeed: z.number().negative(),
    pipeGap: z.number().int().positive(),
    pipeWidth: z.number().int().positive(),
    pipeSpawnIntervalMs: z.number().positive(),
    pipeSpawnMargin: z.number().int().nonnegative(),
    gapMargin: z.number().int().nonnegative(),
    groundHeight: z.number().int().nonnegative(),
    birdWidth: z.number().int().positive(),
    birdHeight: z.number().int().positive(),
    birdStartX: z.number().nonnegative(),
    shakeDurationTicks: z.number().int().nonnegative(),
    shakeMagnitude: z.number().int().nonnegative()
  })
  .strict()
  .refine((config) => config.gapMargin * 2 <= config.screenHeight, {
    message: "gapMargin leaves no room for the gap center",
    path: ["gapMargin"]
  })
  .refine((config) => config.groundHeight < config.screenHeight, {
    message: "groundHeight must be smaller than screenHeight",
    path: ["groundHeight"]
  });

export function resolveGameConfig(overrides: Partial<GameConfig> = {}): Readonly<GameConfig> {
  const result = GameConfigSchema.safeParse({ ...GAME_CONFIG, ...overrides });
  if (!result.success) {
    const detail = result.error.issues
      .map((issue) => `${issue.path.join(".") || "config"}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid game config: ${detail}`);
  }
  return Object.freeze(result.data);
}

export function spawnIntervalTicks(config: GameConfig): number {
  return Math.max(1, Math.round((config.pipeSpawnIntervalMs * config.tickRate) / 1000));
}

export function groundLine(config: GameConfig): number {
  return config.screenHeight - config.groundHeight;
}

export const GAME_VERSION = "0.1.0";
