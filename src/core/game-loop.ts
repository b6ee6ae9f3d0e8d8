export interface LoopCallbacks {
  update: (fixedDeltaSec: number) => void;
  render: (alpha: number, frameDeltaSec: number) => void;
}

export interface FrameScheduler {
  now(): number;
  request(callback: () => void): () => void;
}

export function createTimerScheduler(frameIntervalMs: number): FrameScheduler {
  return {
    now: () => performance.now(),
    request: (callback) => {
      const handle = setTimeout(callback, frameIntervalMs);
      return () => clearTimeout(handle);
    }
  };
}

const MAX_FRAME_DELTA_SEC = 0.25;

// Fixed steps per second, averaged over windows of at least one second of frame time.
export class TickRateCounter {
  private ticks = 0;
  private windowSec = 0;
  private rate = 0;

  get perSecond(): number {
    return this.rate;
  }

  countTick(): void {
    this.ticks += 1;
  }

  advance(frameDeltaSec: number): void {
    this.windowSec += frameDeltaSec;
    if (this.windowSec >= 1) {
      this.rate = Math.round(this.ticks / this.windowSec);
      this.ticks = 0;
      this.windowSec = 0;
    }
  }
}

export class GameLoop {
  private readonly fixedStepSec: number;
  private readonly callbacks: LoopCallbacks;
  private readonly scheduler: FrameScheduler;
  private cancelFrame: (() => void) | null = null;
  private lastTimeMs = 0;
  private accumulatorSec = 0;
  private running = false;

  constructor(callbacks: LoopCallbacks, fixedStepSec = 1 / 60, scheduler?: FrameScheduler) {
    this.callbacks = callbacks;
    this.fixedStepSec = fixedStepSec;
    this.scheduler = scheduler ?? createTimerScheduler(fixedStepSec * 1000);
  }

  get isRunning(): boolean {
    return this.running;
  }

  start(): void {
    if (this.running) {
      return;
    }
    this.running = true;
    this.accumulatorSec = 0;
    this.lastTimeMs = this.scheduler.now();
    this.cancelFrame = this.scheduler.request(this.frame);
  }

  stop(): void {
    if (!this.running) {
      return;
    }
    this.running = false;
    this.cancelFrame?.();
    this.cancelFrame = null;
  }

  private frame = (): void => {
    if (!this.running) {
      return;
    }

    const nowMs = this.scheduler.now();
    const rawDeltaSec = (nowMs - this.lastTimeMs) / 1000;
    this.lastTimeMs = nowMs;
    const frameDeltaSec = Math.min(MAX_FRAME_DELTA_SEC, rawDeltaSec);

    this.accumulatorSec += frameDeltaSec;
    while (this.running && this.accumulatorSec >= this.fixedStepSec) {
      this.callbacks.update(this.fixedStepSec);
      this.accumulatorSec -= this.fixedStepSec;
    }
    if (!this.running) {
      return;
    }

    const alpha = this.accumulatorSec / this.fixedStepSec;
    this.callbacks.render(alpha, frameDeltaSec);
    this.cancelFrame = this.scheduler.request(this.frame);
  };
}
