import { PersistenceError, describeError } from "../errors";
import { createGame, type GameState } from "../logic/game";
import { connectMongo, disconnectMongo } from "../db";
import GameSnapshotModel from "../models/GameSnapshot";
import { fromSnapshot, toSnapshot, type GameSnapshot } from "./snapshot";
import type { GameStore } from "./types";

type StoredSnapshot = GameSnapshot & { session_id?: string };

/** Remove os campos do mongoose antes de passar pelo mesmo validador do arquivo */
export function documentToSnapshot(doc: StoredSnapshot): GameSnapshot {
  const snapshot: GameSnapshot = {
    board: doc.board,
    moves: doc.moves.map((m) => ({ move_num: m.move_num, player: m.player, position: m.position, piece: m.piece })),
    current_turn: doc.current_turn,
    game_over: doc.game_over,
    winner: doc.winner ?? null,
  };
  if (doc.current_board_hash) snapshot.current_board_hash = doc.current_board_hash;
  if (doc.analysis !== undefined && doc.analysis_hash !== undefined) {
    snapshot.analysis = doc.analysis;
    snapshot.analysis_hash = doc.analysis_hash;
  }
  return snapshot;
}

/** Um documento por sessão, identificado por session_id */
export class MongoGameStore implements GameStore {
  private connected = false;

  constructor(private readonly uri: string, readonly sessionId: string) {}

  private async ensureConnected(): Promise<void> {
    if (this.connected) return;
    await connectMongo(this.uri);
    this.connected = true;
  }

  async load(): Promise<GameState> {
    await this.ensureConnected();
    let doc: StoredSnapshot | null;
    try {
      doc = await GameSnapshotModel.findOne({ session_id: this.sessionId }).lean<StoredSnapshot>();
    } catch (err) {
      throw new PersistenceError(`failed to load session ${this.sessionId}: ${describeError(err)}`, { cause: err });
    }
    if (!doc) return createGame();
    return fromSnapshot(documentToSnapshot(doc));
  }

  async save(state: GameState): Promise<void> {
    await this.ensureConnected();
    const snapshot = toSnapshot(state);
    const unset: Record<string, 1> = {};
    if (snapshot.analysis === undefined) {
      unset.analysis = 1;
      unset.analysis_hash = 1;
    }
    try {
      await GameSnapshotModel.findOneAndUpdate(
        { session_id: this.sessionId },
        { $set: { ...snapshot, session_id: this.sessionId }, $unset: unset },
        { upsert: true, new: true, runValidators: true, setDefaultsOnInsert: true }
      );
    } catch (err) {
      throw new PersistenceError(`failed to save session ${this.sessionId}: ${describeError(err)}`, { cause: err });
    }
  }

  async reset(): Promise<boolean> {
    await this.ensureConnected();
    try {
      const res = await GameSnapshotModel.deleteOne({ session_id: this.sessionId });
      return res.deletedCount > 0;
    } catch (err) {
      throw new PersistenceError(`failed to delete session ${this.sessionId}: ${describeError(err)}`, { cause: err });
    }
  }

  async close(): Promise<void> {
    if (!this.connected) return;
    await disconnectMongo();
    this.connected = false;
  }
}
