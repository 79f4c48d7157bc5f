import { CollaboratorUnavailableError } from "../errors";
import { resolveGated } from "../logic/cacheGate";
import type { GameState } from "../logic/game";
import { buildAnalysisPrompt, SYSTEM_PROMPT } from "./prompt";
import type { AnalysisProvider } from "./providers";

export interface AnalysisOutcome {
  /** estado com a análise marcada pelo hash atual */
  state: GameState;
  text: string;
  cached: boolean;
}

/**
 * Aplica o gate de cache em volta do provider: análise com o hash atual é
 * devolvida sem chamada; caso contrário chama uma vez e guarda o resultado.
 */
export async function analyzePosition(
  state: GameState,
  provider: AnalysisProvider | undefined,
  unavailableMessage = "AI analysis not available"
): Promise<AnalysisOutcome> {
  const { entry, reused } = await resolveGated(state.analysis, state.boardHash, () => {
    if (!provider) {
      throw new CollaboratorUnavailableError("analysis", unavailableMessage);
    }
    return provider.generate(buildAnalysisPrompt(state), SYSTEM_PROMPT);
  });

  return {
    state: reused ? state : { ...state, analysis: entry },
    text: entry.value,
    cached: reused,
  };
}
