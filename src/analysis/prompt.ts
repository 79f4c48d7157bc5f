import { formatPosition } from "../logic/coordinates";
import { boardAscii, gameStatus, isTerminal, type GameState } from "../logic/game";

export const SYSTEM_PROMPT = [
  "You are a professional Gomoku (Five in a Row) analyst and commentator.",
  "Give strategic insight like a sports commentator: the current position, each player's",
  "strengths and weaknesses, and the tactical opportunities. Be clear and educational.",
].join("\n");

/** Instrução fixa enviada junto com o snapshot do jogo */
export function buildAnalysisPrompt(state: GameState): string {
  const lines: string[] = [
    "You are analyzing a Gomoku (Five in a Row) board. Read the board carefully.",
    "",
    "**BOARD SYMBOLS:**",
    "- '+' = empty intersection",
    "- 'O' = WHITE stone",
    "- 'X' = BLACK stone",
    "",
    "**COORDINATES:**",
    "- Columns: A-O (left to right)",
    "- Rows: 01-15 (top to bottom)",
    "- Example: H-08 is column H, row 8",
    "",
    "**CURRENT BOARD POSITION:**",
    boardAscii(state),
    "**MOVE HISTORY FOR VERIFICATION:**",
  ];

  if (state.moves.length === 0) {
    lines.push("No moves played yet - empty board");
  } else {
    for (const m of state.moves) {
      lines.push(`${m.moveNumber}. ${formatPosition(m.position)} = ${m.piece} (${m.player} player)`);
    }
  }

  lines.push(
    "",
    `**GAME STATUS:** ${gameStatus(state)}`,
    `**TOTAL MOVES:** ${state.moves.length}`,
    "",
    "**STEP 1: BOARD VERIFICATION**",
    "List every WHITE (O) and BLACK (X) stone with its coordinates and cross-check them",
    "against the move history. Point out any discrepancy.",
    "",
    "**STEP 2: STRATEGIC ANALYSIS**",
    "1. **Position Summary**: stone formations and patterns",
    "2. **BLACK's Position**: advantages, threats, opportunities",
    "3. **WHITE's Position**: advantages, threats, opportunities",
    "4. **Tactical Assessment**: immediate threats and key intersections",
    "5. **Strategic Outlook**: who stands better and why"
  );
  if (!isTerminal(state)) {
    lines.push(`6. **Recommended Move**: best next move for ${state.currentTurn}, with reasoning`);
  }

  lines.push(
    "",
    "**REMINDERS:**",
    "- 'O' = WHITE, 'X' = BLACK",
    "- Stone counts must match the move history",
    "- Columns A-O, rows 01-15"
  );
  return lines.join("\n");
}
