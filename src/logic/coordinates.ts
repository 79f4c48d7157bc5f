import { isPiece, type Piece } from "../utils/helpers";

export const BOARD_SIZE = 15;

const COLUMN_LETTERS = "ABCDEFGHIJKLMNO";

export interface Position {
  readonly row: number;
  readonly column: number;
}

export interface InvalidFormat {
  ok: false;
  /** trecho exato que foi recusado */
  offending: string;
  message: string;
}

export type Parsed<T> = { ok: true; value: T } | InvalidFormat;

export interface ParsedMove {
  position: Position;
  piece: Piece;
  /** "H-08", sem a peça */
  coordinate: string;
}

function invalid(offending: string, message: string): InvalidFormat {
  return { ok: false, offending, message };
}

export function isInBounds(pos: Position): boolean {
  return (
    Number.isInteger(pos.row) &&
    Number.isInteger(pos.column) &&
    pos.row >= 0 &&
    pos.row < BOARD_SIZE &&
    pos.column >= 0 &&
    pos.column < BOARD_SIZE
  );
}

/**
 * "H-08" → { row: 7, column: 7 }
 * Coluna: uma letra maiúscula A..O. Linha: dois dígitos 01..15.
 */
export function parsePosition(text: string): Parsed<Position> {
  const parts = text.split("-");
  if (parts.length !== 2) {
    return invalid(text, `invalid position format: ${text}`);
  }
  const [colStr, rowStr] = parts;

  const column = colStr.length === 1 ? COLUMN_LETTERS.indexOf(colStr) : -1;
  if (column < 0) {
    return invalid(colStr, `invalid column: ${colStr}`);
  }

  if (!/^\d{2}$/.test(rowStr)) {
    return invalid(rowStr, `invalid row format: ${rowStr}`);
  }
  const row = Number(rowStr);
  if (row < 1 || row > BOARD_SIZE) {
    return invalid(rowStr, `row out of range: ${rowStr}`);
  }

  return { ok: true, value: { row: row - 1, column } };
}

/** { row: 7, column: 7 } → "H-08" */
export function formatPosition(pos: Position): string {
  const row = String(pos.row + 1).padStart(2, "0");
  return `${COLUMN_LETTERS.charAt(pos.column)}-${row}`;
}

/**
 * "H-08-X" → posição + peça. A peça é validada antes da coordenada.
 */
export function parseMove(text: string): Parsed<ParsedMove> {
  const parts = text.split("-");
  if (parts.length !== 3) {
    return invalid(text, `invalid move format: expected COL-ROW-PIECE, got ${text}`);
  }

  const pieceStr = parts[2];
  if (!isPiece(pieceStr)) {
    return invalid(pieceStr, `invalid piece: ${pieceStr} (must be X or O)`);
  }

  const coordinate = `${parts[0]}-${parts[1]}`;
  const pos = parsePosition(coordinate);
  if (!pos.ok) {
    return invalid(pos.offending, `invalid position: ${pos.message}`);
  }

  return { ok: true, value: { position: pos.value, piece: pieceStr, coordinate } };
}
