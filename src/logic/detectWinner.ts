import type { Piece } from "../utils/helpers";
import { BOARD_SIZE, type Position } from "./coordinates";
import type { Board } from "./board";

export const WIN_LENGTH = 5;

// horizontal, vertical, diagonal \, diagonal /
const AXES: readonly [number, number][] = [
  [0, 1],
  [1, 0],
  [1, 1],
  [1, -1],
];

function countOneWay(board: Board, pos: Position, piece: Piece, dRow: number, dCol: number): number {
  let count = 0;
  let row = pos.row + dRow;
  let col = pos.column + dCol;
  while (row >= 0 && row < BOARD_SIZE && col >= 0 && col < BOARD_SIZE && board[row][col] === piece) {
    count++;
    row += dRow;
    col += dCol;
  }
  return count;
}

/** Tamanho da sequência através de `pos` num eixo (a própria pedra conta 1) */
export function runLength(board: Board, pos: Position, piece: Piece, axis: readonly [number, number]): number {
  const [dRow, dCol] = axis;
  return 1 + countOneWay(board, pos, piece, dRow, dCol) + countOneWay(board, pos, piece, -dRow, -dCol);
}

/**
 * Chamado logo depois de colocar `piece` em `pos`.
 * Cinco ou mais num único eixo vence (overline também conta); eixos não se somam.
 */
export function hasFiveInRow(board: Board, pos: Position, piece: Piece): boolean {
  return AXES.some((axis) => runLength(board, pos, piece, axis) >= WIN_LENGTH);
}

/**
 * Varredura do tabuleiro inteiro; usada para conferir snapshots carregados.
 * Retorna a primeira posição de uma sequência ≥5 da peça, ou null.
 */
export function findFiveInRow(board: Board, piece: Piece): Position | null {
  for (let row = 0; row < BOARD_SIZE; row++) {
    for (let column = 0; column < BOARD_SIZE; column++) {
      if (board[row][column] !== piece) continue;
      const pos = { row, column };
      if (hasFiveInRow(board, pos, piece)) return pos;
    }
  }
  return null;
}
