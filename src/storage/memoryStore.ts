import { createGame, type GameState } from "../logic/game";
import { fromSnapshot, toSnapshot, type GameSnapshot } from "./snapshot";
import type { GameStore } from "./types";

// Guarda o snapshot serializado, como os outros stores, para que load() sempre
// devolva uma cópia validada.
export class MemoryGameStore implements GameStore {
  private snapshot: GameSnapshot | null = null;
  saves = 0;

  constructor(initial?: GameState) {
    if (initial) this.snapshot = toSnapshot(initial);
  }

  async load(): Promise<GameState> {
    if (!this.snapshot) return createGame();
    return fromSnapshot(JSON.parse(JSON.stringify(this.snapshot)));
  }

  async save(state: GameState): Promise<void> {
    this.snapshot = toSnapshot(state);
    this.saves++;
  }

  async reset(): Promise<boolean> {
    const existed = this.snapshot !== null;
    this.snapshot = null;
    return existed;
  }

  async close(): Promise<void> {}
}
