export type Color = "BLACK" | "WHITE";
export type Piece = "X" | "O";

export function nextTurn(color: Color): Color {
  return color === "BLACK" ? "WHITE" : "BLACK";
}

export function pieceFor(color: Color): Piece {
  return color === "BLACK" ? "X" : "O";
}

export function colorFor(piece: Piece): Color {
  return piece === "X" ? "BLACK" : "WHITE";
}

export function isPiece(v: unknown): v is Piece {
  return v === "X" || v === "O";
}

/** Normaliza uma lista "a, b ,c" em itens sem espaços nem vazios */
export function splitList(raw?: string): string[] {
  if (!raw) return [];
  return raw
    .split(",")
    .map((s) => s.trim())
    .filter(Boolean);
}

// minúsculas, sem barra final (comparação de origens CORS)
export function normalizeOrigin(origin?: string): string | undefined {
  return origin ? origin.toLowerCase().replace(/\/$/, "") : origin;
}
