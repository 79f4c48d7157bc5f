import { promises as fs } from "fs";
import sharp from "sharp";
import { CollaboratorUnavailableError, describeError } from "../errors";
import { EMPTY, type Board } from "../logic/board";
import { BOARD_SIZE } from "../logic/coordinates";
import { gameStatus, isTerminal, lastMove, type GameState } from "../logic/game";

export const CELL_SIZE = 40;
const LEFT_MARGIN = 15; // rótulos 01..15
const TOP_MARGIN = 15; // rótulos A..O
const RIGHT_MARGIN = 8;
const BOTTOM_MARGIN = 15;
const STATUS_SPACE = 25; // só quando o jogo acabou
const STONE_RADIUS = 15;

export interface DisplayArea {
  minRow: number;
  maxRow: number;
  minCol: number;
  maxCol: number;
  size: number;
}

/**
 * Recorte quadrado do tabuleiro que contém todas as pedras.
 * Sem pedras: 7×7 no centro. Área ocupada menor que 4×4 ganha 3 casas de
 * margem, senão 1. Entre as posições possíveis escolhe a mais simétrica.
 */
export function computeDisplayArea(board: Board): DisplayArea {
  let minRow = BOARD_SIZE;
  let maxRow = -1;
  let minCol = BOARD_SIZE;
  let maxCol = -1;
  board.forEach((line, row) =>
    line.forEach((cell, col) => {
      if (cell === EMPTY) return;
      minRow = Math.min(minRow, row);
      maxRow = Math.max(maxRow, row);
      minCol = Math.min(minCol, col);
      maxCol = Math.max(maxCol, col);
    })
  );

  if (maxRow === -1) {
    const center = Math.floor(BOARD_SIZE / 2);
    return { minRow: center - 3, maxRow: center + 3, minCol: center - 3, maxCol: center + 3, size: 7 };
  }

  const occupiedRows = maxRow - minRow + 1;
  const occupiedCols = maxCol - minCol + 1;
  const padding = occupiedRows < 4 && occupiedCols < 4 ? 3 : 1;
  const size = Math.min(Math.max(occupiedRows, occupiedCols) + 2 * padding, BOARD_SIZE);

  let bestScore = -Infinity;
  let startRow = minRow;
  let startCol = minCol;
  for (let r = 0; r <= BOARD_SIZE - size; r++) {
    for (let c = 0; c <= BOARD_SIZE - size; c++) {
      const endRow = r + size - 1;
      const endCol = c + size - 1;
      if (r > minRow || endRow < maxRow || c > minCol || endCol < maxCol) continue;

      const top = minRow - r;
      const bottom = endRow - maxRow;
      const left = minCol - c;
      const right = endCol - maxCol;
      const symmetry = -(Math.abs(top - bottom) + Math.abs(left - right));
      const avgPadding = Math.floor((top + bottom + left + right) / 4);
      const score = symmetry * 10 - Math.abs(avgPadding - padding);
      if (score > bestScore) {
        bestScore = score;
        startRow = r;
        startCol = c;
      }
    }
  }

  return { minRow: startRow, maxRow: startRow + size - 1, minCol: startCol, maxCol: startCol + size - 1, size };
}

function escapeXml(text: string): string {
  return text.replace(/&/g, "&amp;").replace(/</g, "&lt;").replace(/>/g, "&gt;");
}

const center = (i: number, margin: number) => margin + i * CELL_SIZE + CELL_SIZE / 2;

export function renderBoardSvg(state: GameState): string {
  const area = computeDisplayArea(state.board);
  const width = area.size * CELL_SIZE + LEFT_MARGIN + RIGHT_MARGIN;
  const height = area.size * CELL_SIZE + TOP_MARGIN + BOTTOM_MARGIN + (isTerminal(state) ? STATUS_SPACE : 0);
  const first = CELL_SIZE / 2;
  const last = (area.size - 1) * CELL_SIZE + CELL_SIZE / 2;

  const parts: string[] = [
    `<svg xmlns="http://www.w3.org/2000/svg" width="${width}" height="${height}" viewBox="0 0 ${width} ${height}">`,
    `<rect width="100%" height="100%" fill="#dbc7a1"/>`,
    `<g stroke="#000" stroke-width="0.5">`,
  ];
  for (let i = 0; i < area.size; i++) {
    const x = center(i, LEFT_MARGIN);
    const y = center(i, TOP_MARGIN);
    parts.push(`<line x1="${x}" y1="${TOP_MARGIN + first}" x2="${x}" y2="${TOP_MARGIN + last}"/>`);
    parts.push(`<line x1="${LEFT_MARGIN + first}" y1="${y}" x2="${LEFT_MARGIN + last}" y2="${y}"/>`);
  }
  parts.push(`</g>`);

  parts.push(`<g font-family="sans-serif" font-size="12" text-anchor="middle" dominant-baseline="middle">`);
  for (let i = 0; i < area.size; i++) {
    const colLabel = String.fromCharCode(65 + area.minCol + i);
    const rowLabel = String(area.minRow + i + 1).padStart(2, "0");
    parts.push(`<text x="${center(i, LEFT_MARGIN)}" y="${TOP_MARGIN - 8}">${colLabel}</text>`);
    parts.push(`<text x="${LEFT_MARGIN - 8}" y="${center(i, TOP_MARGIN)}">${rowLabel}</text>`);
  }
  parts.push(`</g>`);

  const recent = lastMove(state);
  for (let row = area.minRow; row <= area.maxRow; row++) {
    for (let col = area.minCol; col <= area.maxCol; col++) {
      const cell = state.board[row][col];
      if (cell === EMPTY) continue;
      const cx = center(col - area.minCol, LEFT_MARGIN);
      const cy = center(row - area.minRow, TOP_MARGIN);
      const fill = cell === "X" ? "#000" : "#fff";
      parts.push(`<circle class="stone" cx="${cx}" cy="${cy}" r="${STONE_RADIUS}" fill="${fill}" stroke="#000"/>`);

      if (recent && recent.position.row === row && recent.position.column === col) {
        const ring = cell === "X" ? "#e63333" : "#3366e6";
        parts.push(`<circle class="last-move" cx="${cx}" cy="${cy}" r="${STONE_RADIUS + 5}" fill="none" stroke="${ring}" stroke-width="3"/>`);
        parts.push(`<circle cx="${cx}" cy="${cy}" r="3" fill="#cccc33"/>`);
      }
    }
  }

  if (isTerminal(state)) {
    const y = TOP_MARGIN + area.size * CELL_SIZE + 10;
    parts.push(
      `<text class="status" x="${LEFT_MARGIN}" y="${y}" font-family="sans-serif" font-size="10" fill="#cc0000" dominant-baseline="middle">${escapeXml(gameStatus(state))}</text>`
    );
  }

  parts.push(`</svg>`);
  return parts.join("\n");
}

export type PngRenderer = (state: GameState) => Promise<Buffer>;

export const renderBoardPng: PngRenderer = async (state) => {
  try {
    return await sharp(Buffer.from(renderBoardSvg(state))).png().toBuffer();
  } catch (err) {
    throw new CollaboratorUnavailableError("rendering", `failed to render board image: ${describeError(err)}`, {
      cause: err,
    });
  }
};

export async function writeBoardImage(state: GameState, file: string, render: PngRenderer = renderBoardPng): Promise<void> {
  const png = await render(state);
  try {
    await fs.writeFile(file, png);
  } catch (err) {
    throw new CollaboratorUnavailableError("rendering", `failed to write ${file}: ${describeError(err)}`, { cause: err });
  }
}
