import { KEY_BINDINGS } from "../config/game-config";
import type { InputEvent } from "../types";

export interface KeyInfo {
  name?: string;
  ctrl?: boolean;
}

type KeypressListener = (sequence: string | undefined, key: KeyInfo | undefined) => void;

/** Anything that emits readline-style "keypress" events, such as process.stdin. */
export interface KeypressSource {
  on(event: "keypress", listener: KeypressListener): unknown;
  off(event: "keypress", listener: KeypressListener): unknown;
}

export class InputManager {
  private readonly queue: InputEvent[] = [];
  private readonly source: KeypressSource;
  private readonly bindings: Readonly<Record<string, InputEvent>>;

  constructor(source: KeypressSource, bindings: Readonly<Record<string, InputEvent>> = KEY_BINDINGS) {
    this.source = source;
    this.bindings = bindings;
    this.source.on("keypress", this.onKeypress);
  }

  get pending(): number {
    return this.queue.length;
  }

  push(event: InputEvent): void {
    this.queue.push(event);
  }

  // Everything queued since the last drain, oldest first.
  drain(): InputEvent[] {
    return this.queue.splice(0, this.queue.length);
  }

  dispose(): void {
    this.source.off("keypress", this.onKeypress);
    this.queue.length = 0;
  }

  private onKeypress = (sequence: string | undefined, key: KeyInfo | undefined): void => {
    if (key?.ctrl && key.name === "c") {
      this.push("quit");
      return;
    }
    const name = key?.name ?? sequence?.toLowerCase();
    if (!name || !Object.hasOwn(this.bindings, name)) {
      return;
    }
    this.push(this.bindings[name]);
  };
}
