import type { GameState } from "../logic/game";

/**
 * Colaborador de persistência: carrega e grava o snapshot inteiro, nunca
 * campos soltos. `load` devolve um jogo novo quando não há nada salvo.
 */
export interface GameStore {
  load(): Promise<GameState>;
  save(state: GameState): Promise<void>;
  /** Apaga o snapshot; `false` quando já não existia */
  reset(): Promise<boolean>;
  /** Libera conexões (no-op para arquivo/memória) */
  close(): Promise<void>;
}
