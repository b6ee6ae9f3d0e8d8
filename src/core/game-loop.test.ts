import { describe, expect, it } from "vitest";
import { GameLoop, TickRateCounter, type FrameScheduler } from "./game-loop";

function manualScheduler() {
  let nowMs = 0;
  let pending: (() => void) | null = null;
  const scheduler: FrameScheduler = {
    now: () => nowMs,
    request: (callback) => {
      pending = callback;
      return () => {
        if (pending === callback) {
          pending = null;
        }
      };
    }
  };
  return {
    scheduler,
    advance(ms: number): void {
      nowMs += ms;
      const callback = pending;
      pending = null;
      callback?.();
    },
    hasPending: () => pending !== null
  };
}

describe("game-loop", () => {
  it("runs whole fixed steps and carries the remainder", () => {
    const clock = manualScheduler();
    const updates: number[] = [];
    const alphas: number[] = [];
    const loop = new GameLoop(
      {
        update: (dt) => updates.push(dt),
        render: (alpha) => alphas.push(alpha)
      },
      1 / 16,
      clock.scheduler
    );

    loop.start();
    clock.advance(125);
    expect(updates).toEqual([1 / 16, 1 / 16]);
    expect(alphas).toEqual([0]);

    clock.advance(31.25);
    expect(updates).toHaveLength(2);
    expect(alphas[1]).toBe(0.5);

    clock.advance(31.25);
    expect(updates).toHaveLength(3);
    expect(alphas[2]).toBe(0);
  });

  it("clamps long frames", () => {
    const clock = manualScheduler();
    let updates = 0;
    const loop = new GameLoop({ update: () => (updates += 1), render: () => undefined }, 1 / 16, clock.scheduler);
    loop.start();
    clock.advance(5000);
    expect(updates).toBe(4);
  });

  it("stops scheduling frames once stopped from an update", () => {
    const clock = manualScheduler();
    let updates = 0;
    let renders = 0;
    const loop = new GameLoop(
      {
        update: () => {
          updates += 1;
          loop.stop();
        },
        render: () => (renders += 1)
      },
      1 / 16,
      clock.scheduler
    );
    loop.start();
    clock.advance(250);
    expect(updates).toBe(1);
    expect(renders).toBe(0);
    expect(loop.isRunning).toBe(false);
    expect(clock.hasPending()).toBe(false);
  });

  it("reports ticks per second once a full window has passed", () => {
    const counter = new TickRateCounter();
    for (let i = 0; i < 30; i += 1) {
      counter.countTick();
    }
    counter.advance(0.5);
    expect(counter.perSecond).toBe(0);

    for (let i = 0; i < 30; i += 1) {
      counter.countTick();
    }
    counter.advance(0.5);
    expect(counter.perSecond).toBe(60);

    for (let i = 0; i < 25; i += 1) {
      counter.countTick();
    }
    counter.advance(0.25);
    expect(counter.perSecond).toBe(60);
    counter.advance(1);
    expect(counter.perSecond).toBe(20);
  });
});
