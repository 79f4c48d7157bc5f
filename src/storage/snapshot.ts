import { z } from "zod";
import { PersistenceError } from "../errors";
import { colorFor, nextTurn, pieceFor } from "../utils/helpers";
import { boardFromRows, boardHash, boardToRows, cellAt, countStones, isBoardFull } from "../logic/board";
import { formatPosition, parsePosition } from "../logic/coordinates";
import { findFiveInRow, hasFiveInRow } from "../logic/detectWinner";
import type { GameState, MoveRecord, Outcome } from "../logic/game";

const ColorSchema = z.enum(["BLACK", "WHITE"]);
const PieceSchema = z.enum(["X", "O"]);

export const MoveSnapshotSchema = z.object({
  move_num: z.number().int().positive(),
  player: ColorSchema,
  position: z.string().regex(/^[A-O]-\d{2}$/),
  piece: PieceSchema,
});

/** Layout persistido (snake_case, um único registro) */
export const GameSnapshotSchema = z.object({
  board: z.array(z.string().regex(/^[+XO]{15}$/)).length(15),
  moves: z.array(MoveSnapshotSchema),
  current_turn: ColorSchema,
  game_over: z.boolean(),
  winner: ColorSchema.nullable(),
  current_board_hash: z.string().optional(),
  analysis: z.string().optional(),
  analysis_hash: z.string().optional(),
});

export type GameSnapshot = z.infer<typeof GameSnapshotSchema>;

export function toSnapshot(state: GameState): GameSnapshot {
  const { outcome } = state;
  const snapshot: GameSnapshot = {
    board: boardToRows(state.board),
    moves: state.moves.map((m) => ({
      move_num: m.moveNumber,
      player: m.player,
      position: formatPosition(m.position),
      piece: m.piece,
    })),
    current_turn: state.currentTurn,
    game_over: outcome.status !== "in_progress",
    winner: outcome.status === "won" ? outcome.winner : null,
    current_board_hash: state.boardHash,
  };
  if (state.analysis) {
    snapshot.analysis = state.analysis.value;
    snapshot.analysis_hash = state.analysis.boardHash;
  }
  return snapshot;
}

function inconsistent(detail: string): PersistenceError {
  return new PersistenceError(`inconsistent game snapshot: ${detail}`);
}

/**
 * Valida o layout e refaz a checagem de todas as invariantes. Um snapshot
 * incompatível falha; não existe migração.
 */
export function fromSnapshot(raw: unknown): GameState {
  const parsed = GameSnapshotSchema.safeParse(raw);
  if (!parsed.success) {
    const first = parsed.error.issues[0];
    const where = first ? `${first.path.join(".") || "root"}: ${first.message}` : "unknown";
    throw new PersistenceError(`incompatible game snapshot (${where})`, { cause: parsed.error });
  }
  const snap = parsed.data;

  const board = boardFromRows(snap.board);
  if (!board) throw inconsistent("board is not 15x15");

  const moves: MoveRecord[] = [];
  for (const [i, m] of snap.moves.entries()) {
    if (m.move_num !== i + 1) throw inconsistent(`move ${i + 1} numbered ${m.move_num}`);
    if (colorFor(m.piece) !== m.player) throw inconsistent(`move ${m.move_num} piece does not match player`);
    // branco abre, depois alterna
    const mover = i % 2 === 0 ? "WHITE" : "BLACK";
    if (m.player !== mover) throw inconsistent(`move ${m.move_num} should be played by ${mover}`);
    const pos = parsePosition(m.position);
    if (!pos.ok) throw inconsistent(`move ${m.move_num}: ${pos.message}`);
    if (cellAt(board, pos.value) !== m.piece) throw inconsistent(`move ${m.move_num} not on board`);
    moves.push({ moveNumber: m.move_num, player: m.player, position: pos.value, piece: m.piece });
  }
  if (countStones(board) !== moves.length) {
    throw inconsistent(`${countStones(board)} stones for ${moves.length} moves`);
  }

  const last: MoveRecord | undefined = moves[moves.length - 1];
  let outcome: Outcome;
  if (snap.winner !== null) {
    if (!snap.game_over) throw inconsistent("winner set on a game in progress");
    if (!last || last.player !== snap.winner || !hasFiveInRow(board, last.position, pieceFor(snap.winner))) {
      throw inconsistent(`${snap.winner} has no five in a row through the last move`);
    }
    if (snap.current_turn !== snap.winner) throw inconsistent(`current turn should stay ${snap.winner}`);
    outcome = { status: "won", winner: snap.winner };
  } else if (snap.game_over) {
    if (!isBoardFull(board) || findFiveInRow(board, "X") || findFiveInRow(board, "O")) {
      throw inconsistent("draw recorded on a board that is not a draw");
    }
    if (last && snap.current_turn !== last.player) throw inconsistent(`current turn should stay ${last.player}`);
    outcome = { status: "draw" };
  } else {
    if (findFiveInRow(board, "X") || findFiveInRow(board, "O")) {
      throw inconsistent("five in a row on a game in progress");
    }
    const expected = last ? nextTurn(last.player) : "WHITE";
    if (snap.current_turn !== expected) throw inconsistent(`current turn should be ${expected}`);
    outcome = { status: "in_progress" };
  }

  // o hash gravado nunca é confiado: recalcula a partir do tabuleiro
  const state: GameState = {
    board,
    moves,
    currentTurn: snap.current_turn,
    outcome,
    boardHash: boardHash(board),
  };
  if (snap.analysis !== undefined && snap.analysis_hash !== undefined) {
    return { ...state, analysis: { value: snap.analysis, boardHash: snap.analysis_hash } };
  }
  return state;
}
