import { emitKeypressEvents } from "node:readline";
import { parseCliOptions } from "./config/cli-options";
import { GAME_CONFIG, GAME_VERSION } from "./config/game-config";
import { GameLoop, TickRateCounter } from "./core/game-loop";
import { GameSession } from "./game/game-session";
import { getCurrentLanguage, initI18n } from "./i18n";
import { InputManager } from "./input/input-manager";
import { TerminalView } from "./render/terminal-view";
import type { SessionSnapshot } from "./types";
import { buildHud } from "./ui/hud";
import { createSeededRandom } from "./util/random";

const LOG_PREFIX = "[flappy]";
const CURSOR_HOME = "\x1b[H";
const CLEAR_SCREEN = "\x1b[2J";
const HIDE_CURSOR = "\x1b[?25l";
const SHOW_CURSOR = "\x1b[?25h";

function getErrorDetail(error: unknown): string {
  return error instanceof Error ? error.message : "unknown_error";
}

function restoreTerminal(): void {
  if (process.stdin.isTTY) {
    process.stdin.setRawMode(false);
  }
  process.stdout.write(`${SHOW_CURSOR}\n`);
}

async function bootstrap(): Promise<void> {
  const options = parseCliOptions(process.argv.slice(2));
  await initI18n(options.language);

  const debugLog = (message: string): void => {
    if (options.debug) {
      console.warn(`${LOG_PREFIX} ${message}`);
    }
  };

  const random = options.seed === null ? Math.random : createSeededRandom(options.seed);
  const session = new GameSession({
    config: GAME_CONFIG,
    random,
    events: {
      onStateChange: (next, prev) => debugLog(`state ${prev} -> ${next} at tick ${session.ticks}`),
      onCollision: (kind) => debugLog(`collision with ${kind}, score ${session.score}`),
      onScore: (score) => debugLog(`score ${score}`)
    }
  });

  const view = new TerminalView({
    columns: 80,
    rows: 30,
    screenWidth: GAME_CONFIG.screenWidth,
    screenHeight: GAME_CONFIG.screenHeight
  });

  emitKeypressEvents(process.stdin);
  if (process.stdin.isTTY) {
    process.stdin.setRawMode(true);
  }
  const input = new InputManager(process.stdin);
  process.once("exit", restoreTerminal);

  let lastSnapshot: SessionSnapshot = session.getSnapshot();
  const tickRate = new TickRateCounter();

  const shutdown = (): void => {
    loop.stop();
    input.dispose();
    process.stdin.pause();
    debugLog(`quit with score ${session.score}`);
  };

  const loop = new GameLoop(
    {
      update: () => {
        const result = session.step(input.drain());
        if (result.quit) {
          shutdown();
          return;
        }
        tickRate.countTick();
        lastSnapshot = session.getSnapshot();
      },
      render: (_alpha, frameDeltaSec) => {
        tickRate.advance(frameDeltaSec);
        const hud = buildHud({
          state: lastSnapshot.state,
          score: lastSnapshot.score,
          debug: options.debug
            ? {
                tick: lastSnapshot.tick,
                rate: tickRate.perSecond,
                pipes: lastSnapshot.livePipes,
                shake: session.shakeRemaining
              }
            : null
        });
        process.stdout.write(`${CURSOR_HOME}${view.render(lastSnapshot, hud)}`);
      }
    },
    1 / GAME_CONFIG.tickRate
  );

  debugLog(`v${GAME_VERSION} seed=${options.seed ?? "random"} lang=${getCurrentLanguage()}`);
  process.stdout.write(`${CLEAR_SCREEN}${HIDE_CURSOR}`);
  loop.start();
}

bootstrap().catch((error: unknown) => {
  console.error(`${LOG_PREFIX} ${getErrorDetail(error)}`);
  process.exitCode = 1;
});
