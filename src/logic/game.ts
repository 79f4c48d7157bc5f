import { colorFor, nextTurn, type Color, type Piece } from "../utils/helpers";
import type { IllegalMoveReason } from "../errors";
import { boardHash, cellAt, createBoard, EMPTY, isBoardFull, renderAscii, withCell, type Board } from "./board";
import { formatPosition, isInBounds, parseMove, type Position } from "./coordinates";
import { hasFiveInRow } from "./detectWinner";
import type { HashTagged } from "./cacheGate";

export interface MoveRecord {
  /** 1 + quantidade de jogadas anteriores */
  readonly moveNumber: number;
  readonly player: Color;
  readonly position: Position;
  readonly piece: Piece;
}

export type Outcome =
  | { status: "in_progress" }
  | { status: "draw" }
  | { status: "won"; winner: Color };

export interface GameState {
  readonly board: Board;
  readonly moves: readonly MoveRecord[];
  /** Sem significado (congelado) quando o jogo terminou */
  readonly currentTurn: Color;
  readonly outcome: Outcome;
  readonly boardHash: string;
  readonly analysis?: HashTagged<string>;
}

export type RejectionReason = "MALFORMED_MOVE" | IllegalMoveReason;

export type MoveResult =
  | { ok: true; state: GameState; move: MoveRecord }
  | { ok: false; reason: RejectionReason; message: string; offending?: string };

// Branco começa
export function createGame(): GameState {
  const board = createBoard();
  return {
    board,
    moves: [],
    currentTurn: "WHITE",
    outcome: { status: "in_progress" },
    boardHash: boardHash(board),
  };
}

export function isTerminal(state: GameState): boolean {
  return state.outcome.status !== "in_progress";
}

export function currentHash(state: GameState): string {
  return boardHash(state.board);
}

function reject(reason: RejectionReason, message: string, offending?: string): MoveResult {
  return offending === undefined ? { ok: false, reason, message } : { ok: false, reason, message, offending };
}

/**
 * Valida e aplica uma jogada "H-08-X". Não altera `state`: em caso de sucesso
 * devolve um estado novo; em caso de recusa nada muda.
 *
 * Ordem das recusas: jogo encerrado, formato, vez, limites, casa ocupada.
 */
export function applyMove(state: GameState, moveText: string): MoveResult {
  const { outcome } = state;
  if (outcome.status === "won") {
    return reject("GAME_OVER", `game is over, ${outcome.winner} has won`);
  }
  if (outcome.status === "draw") {
    return reject("GAME_OVER", "game is over (draw)");
  }

  const parsed = parseMove(moveText);
  if (!parsed.ok) {
    return reject("MALFORMED_MOVE", parsed.message, parsed.offending);
  }
  const { position, piece, coordinate } = parsed.value;

  const player = colorFor(piece);
  if (player !== state.currentTurn) {
    return reject("WRONG_TURN", `it's ${state.currentTurn}'s turn, not ${player}'s turn`);
  }

  if (!isInBounds(position)) {
    return reject("OUT_OF_BOUNDS", `position ${coordinate} is out of bounds`);
  }
  if (cellAt(state.board, position) !== EMPTY) {
    return reject("SQUARE_OCCUPIED", `position ${coordinate} is already occupied`);
  }

  const board = withCell(state.board, position, piece);
  const move: MoveRecord = { moveNumber: state.moves.length + 1, player, position, piece };

  let nextOutcome: Outcome = { status: "in_progress" };
  let turn = state.currentTurn;
  if (hasFiveInRow(board, position, piece)) {
    nextOutcome = { status: "won", winner: player };
  } else if (isBoardFull(board)) {
    nextOutcome = { status: "draw" };
  } else {
    turn = nextTurn(state.currentTurn);
  }

  // hash sempre recalculado; a análise em cache fica velha por construção
  const next: GameState = {
    board,
    moves: [...state.moves, move],
    currentTurn: turn,
    outcome: nextOutcome,
    boardHash: boardHash(board),
  };
  return { ok: true, state: next, move };
}

export function gameStatus(state: GameState): string {
  const { outcome } = state;
  if (outcome.status === "won") return `Game Over - ${outcome.winner} wins!`;
  if (outcome.status === "draw") return "Game Over - Draw!";
  return `${state.currentTurn} to move`;
}

export function formatMove(move: MoveRecord): string {
  return `${move.moveNumber}. ${formatPosition(move.position)}-${move.piece} (${move.player})`;
}

export function moveHistory(state: GameState): string[] {
  return state.moves.map(formatMove);
}

export function lastMove(state: GameState): MoveRecord | undefined {
  return state.moves[state.moves.length - 1];
}

export function boardAscii(state: GameState): string {
  return renderAscii(state.board);
}
