import mongoose, { Schema, Document, Model } from "mongoose";
import type { Color, Piece } from "../utils/helpers";

export interface IMoveEntry {
  move_num: number;
  player: Color;
  position: string; // "H-08"
  piece: Piece;
}

/** Documento de uma sessão: o mesmo layout do gamestate.json + session_id */
export interface IGameSnapshot extends Document {
  session_id: string;
  board: string[]; // sempre 15 linhas de 15 casas
  moves: IMoveEntry[];
  current_turn: Color;
  game_over: boolean;
  winner: Color | null;
  current_board_hash?: string;
  analysis?: string;
  analysis_hash?: string;
  createdAt: Date;
  updatedAt: Date;
}

const rowValidator = (v: unknown): v is string => typeof v === "string" && /^[+XO]{15}$/.test(v);

const boardValidator = (arr: unknown): arr is string[] =>
  Array.isArray(arr) && arr.length === 15 && arr.every(rowValidator);

const MoveEntrySchema = new Schema<IMoveEntry>(
  {
    move_num: { type: Number, required: true, min: 1 },
    player: { type: String, required: true, enum: ["BLACK", "WHITE"] },
    position: { type: String, required: true, match: /^[A-O]-\d{2}$/ },
    piece: { type: String, required: true, enum: ["X", "O"] },
  },
  { _id: false }
);

const GameSnapshotSchema = new Schema<IGameSnapshot>(
  {
    session_id: {
      type: String,
      required: true,
      unique: true,
      trim: true,
      match: /^[A-Za-z0-9_-]{1,64}$/,
    },
    board: {
      type: [String],
      required: true,
      validate: {
        validator: boardValidator,
        message: "board deve ter 15 linhas de 15 casas contendo '+', 'X' ou 'O'.",
      },
      default: () => Array(15).fill("+".repeat(15)),
    },
    moves: { type: [MoveEntrySchema], default: [] },
    current_turn: {
      type: String,
      required: true,
      enum: ["BLACK", "WHITE"],
      default: "WHITE", // branco começa
    },
    game_over: { type: Boolean, required: true, default: false },
    winner: { type: String, enum: ["BLACK", "WHITE", null], default: null },
    current_board_hash: { type: String },
    analysis: { type: String },
    analysis_hash: { type: String },
  },
  { timestamps: true }
);

// vencedor só existe com o jogo encerrado
GameSnapshotSchema.pre("validate", function (next) {
  if (this.winner && !this.game_over) {
    this.invalidate("winner", "winner exige game_over=true");
  }
  next();
});

export const GameSnapshotModel: Model<IGameSnapshot> =
  mongoose.models.GameSnapshot || mongoose.model<IGameSnapshot>("GameSnapshot", GameSnapshotSchema);
export default GameSnapshotModel;
