import { boardAscii, createGame } from "../logic/game";
import { buildAnalysisPrompt } from "../analysis/prompt";
import { play, WHITE_WINS_ROW_01 } from "./helpers/gameFixtures";

describe("buildAnalysisPrompt", () => {
  test("jogo vazio", () => {
    const state = createGame();
    const lines = buildAnalysisPrompt(state).split("\n");
    expect(lines).toContain("No moves played yet - empty board");
    expect(lines).toContain("**GAME STATUS:** WHITE to move");
    expect(lines).toContain("**TOTAL MOVES:** 0");
    expect(lines).toContain("6. **Recommended Move**: best next move for WHITE, with reasoning");
  });

  test("inclui tabuleiro e histórico", () => {
    const state = play(["H-08-O", "I-08-X", "J-09-O"]);
    const prompt = buildAnalysisPrompt(state);
    const lines = prompt.split("\n");

    expect(prompt).toContain(boardAscii(state));
    expect(lines).toEqual(
      expect.arrayContaining(["1. H-08 = O (WHITE player)", "2. I-08 = X (BLACK player)", "3. J-09 = O (WHITE player)"])
    );
    expect(lines).toContain("**TOTAL MOVES:** 3");
    expect(lines).toContain("6. **Recommended Move**: best next move for BLACK, with reasoning");
    expect(lines).not.toContain("No moves played yet - empty board");
  });

  test("jogo encerrado não pede recomendação", () => {
    const prompt = buildAnalysisPrompt(play(WHITE_WINS_ROW_01));
    expect(prompt).toContain("**GAME STATUS:** Game Over - WHITE wins!");
    expect(prompt).not.toContain("Recommended Move");
  });
});
