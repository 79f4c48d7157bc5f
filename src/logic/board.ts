import { createHash } from "crypto";
import type { Piece } from "../utils/helpers";
import { BOARD_SIZE, type Position } from "./coordinates";

export const EMPTY = "+";
export type Cell = typeof EMPTY | Piece;

/** Sempre 15×15; linhas indexadas por `row`, colunas por `column` */
export type Board = readonly (readonly Cell[])[];

export function isCell(v: unknown): v is Cell {
  return v === EMPTY || v === "X" || v === "O";
}

export function createBoard(): Board {
  return Array.from({ length: BOARD_SIZE }, () => Array<Cell>(BOARD_SIZE).fill(EMPTY));
}

export function cellAt(board: Board, pos: Position): Cell {
  return board[pos.row][pos.column];
}

/** Devolve um tabuleiro novo com uma única casa alterada */
export function withCell(board: Board, pos: Position, cell: Cell): Board {
  return board.map((line, r) =>
    r === pos.row ? line.map((c, col) => (col === pos.column ? cell : c)) : line
  );
}

export function countStones(board: Board): number {
  let n = 0;
  for (const line of board) {
    for (const c of line) if (c !== EMPTY) n++;
  }
  return n;
}

export function isBoardFull(board: Board): boolean {
  return board.every((line) => line.every((c) => c !== EMPTY));
}

// "+++X+++O+++++++" por linha; também é o formato persistido
export function boardToRows(board: Board): string[] {
  return board.map((line) => line.join(""));
}

export function boardFromRows(rows: readonly string[]): Board | null {
  if (rows.length !== BOARD_SIZE) return null;
  const board: Cell[][] = [];
  for (const row of rows) {
    const cells = row.split("");
    if (cells.length !== BOARD_SIZE) return null;
    const line: Cell[] = [];
    for (const c of cells) {
      if (!isCell(c)) return null;
      line.push(c);
    }
    board.push(line);
  }
  return board;
}

/**
 * Digest do conteúdo do tabuleiro (linha a linha). Não depende de histórico
 * nem de vez; serve só para validar caches, não para identidade/segurança.
 */
export function boardHash(board: Board): string {
  return createHash("md5").update(boardToRows(board).join("")).digest("hex");
}

/** Tabuleiro em texto com rótulos A..O e 01..15 */
export function renderAscii(board: Board): string {
  let out = "   ";
  for (let col = 0; col < BOARD_SIZE; col++) {
    out += ` ${String.fromCharCode(65 + col)}`;
  }
  out += "\n";
  board.forEach((line, row) => {
    out += String(row + 1).padStart(2, "0") + " ";
    for (const c of line) out += ` ${c}`;
    out += "\n";
  });
  return out;
}
