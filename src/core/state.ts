import type { GameState } from "../types";

type Listener = (nextState: GameState, prevState: GameState) => void;

const TRANSITIONS: Record<GameState, readonly GameState[]> = {
  playing: ["gameover"],
  gameover: ["playing"]
};

export class GameStateMachine {
  private state: GameState = "playing";
  private readonly listeners = new Set<Listener>();

  get current(): GameState {
    return this.state;
  }

  is(state: GameState): boolean {
    return this.state === state;
  }

  canTransition(nextState: GameState): boolean {
    return TRANSITIONS[this.state].includes(nextState);
  }

  // Returns false and leaves the state alone when the move is not allowed.
  transition(nextState: GameState): boolean {
    if (!this.canTransition(nextState)) {
      return false;
    }
    const previous = this.state;
    this.state = nextState;
    this.listeners.forEach((listener) => listener(nextState, previous));
    return true;
  }

  onChange(listener: Listener): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }
}
