import { describe, expect, it } from "vitest";
import { GameStateMachine } from "./state";

describe("game-state-machine", () => {
  it("starts in playing and alternates with gameover", () => {
    const machine = new GameStateMachine();
    expect(machine.current).toBe("playing");
    expect(machine.transition("playing")).toBe(false);
    expect(machine.transition("gameover")).toBe(true);
    expect(machine.is("gameover")).toBe(true);
    expect(machine.transition("gameover")).toBe(false);
    expect(machine.transition("playing")).toBe(true);
  });

  it("notifies listeners until they unsubscribe", () => {
    const machine = new GameStateMachine();
    const seen: string[] = [];
    const off = machine.onChange((next, prev) => seen.push(`${prev}->${next}`));
    machine.transition("gameover");
    off();
    machine.transition("playing");
    expect(seen).toEqual(["playing->gameover"]);
  });
});
