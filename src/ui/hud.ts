import { t } from "../i18n";
import type { GameState } from "../types";

export interface HudModel {
  state: GameState;
  score: number;
  debug: { tick: number; rate: number; pipes: number; shake: number } | null;
}

export interface HudLayout {
  header: string[];
  overlay: string[];
}

export function buildHud(model: HudModel): HudLayout {
  const header = [`${t("score")}: ${model.score}`];
  if (model.state === "playing" && model.score === 0) {
    header.push(t("controlsHint"));
  }
  if (model.debug) {
    header.push(t("debugLine", model.debug));
  }

  const overlay =
    model.state === "gameover"
      ? [t("gameOver"), t("finalScore", { score: model.score }), t("restartHint")]
      : [];

  return { header, overlay };
}
