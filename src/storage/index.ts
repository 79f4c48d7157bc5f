import type { AppConfig } from "../config";
import { FileGameStore } from "./fileStore";
import { MongoGameStore } from "./mongoStore";
import type { GameStore } from "./types";

export function createStore(config: AppConfig): GameStore {
  const { store } = config;
  if (store.kind === "mongo") return new MongoGameStore(store.uri, store.sessionId);
  return new FileGameStore(store.stateFile);
}

export type { GameStore } from "./types";
export { FileGameStore } from "./fileStore";
export { MongoGameStore } from "./mongoStore";
export { MemoryGameStore } from "./memoryStore";
