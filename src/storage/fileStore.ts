import { promises as fs } from "fs";
import { PersistenceError, describeError } from "../errors";
import { createGame, type GameState } from "../logic/game";
import { fromSnapshot, toSnapshot } from "./snapshot";
import type { GameStore } from "./types";

function isMissingFile(err: unknown): boolean {
  // erros do fs podem vir de outro realm (jest): não depende de instanceof
  return typeof err === "object" && err !== null && "code" in err && err.code === "ENOENT";
}

/** Snapshot único em JSON (gamestate.json por padrão) */
export class FileGameStore implements GameStore {
  constructor(readonly path: string) {}

  async load(): Promise<GameState> {
    let text: string;
    try {
      text = await fs.readFile(this.path, "utf8");
    } catch (err) {
      if (isMissingFile(err)) return createGame();
      throw new PersistenceError(`failed to read game state file ${this.path}: ${describeError(err)}`, { cause: err });
    }

    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (err) {
      throw new PersistenceError(`failed to parse game state file ${this.path}: ${describeError(err)}`, { cause: err });
    }
    return fromSnapshot(raw);
  }

  async save(state: GameState): Promise<void> {
    const data = JSON.stringify(toSnapshot(state), null, 2);
    try {
      await fs.writeFile(this.path, data + "\n", "utf8");
    } catch (err) {
      throw new PersistenceError(`failed to write game state file ${this.path}: ${describeError(err)}`, { cause: err });
    }
  }

  async reset(): Promise<boolean> {
    try {
      await fs.unlink(this.path);
      return true;
    } catch (err) {
      if (isMissingFile(err)) return false;
      throw new PersistenceError(`failed to delete game state file ${this.path}: ${describeError(err)}`, { cause: err });
    }
  }

  async close(): Promise<void> {}
}
