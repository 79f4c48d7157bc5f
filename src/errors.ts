export type ErrorCode =
  | "MALFORMED_INPUT"
  | "ILLEGAL_MOVE"
  | "PERSISTENCE_FAILURE"
  | "COLLABORATOR_UNAVAILABLE"
  | "USAGE";

export type IllegalMoveReason = "GAME_OVER" | "WRONG_TURN" | "OUT_OF_BOUNDS" | "SQUARE_OCCUPIED";

/** Base de todos os erros reportados pelo jogo; `code` é estável e vai para a saída */
export class GomokuError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Sintaxe de coordenada/peça inválida. Nunca altera o estado. */
export class MalformedInputError extends GomokuError {
  constructor(message: string, readonly offending: string) {
    super("MALFORMED_INPUT", message);
  }
}

/** Jogada bem formada mas proibida (vez errada, casa ocupada, jogo encerrado). */
export class IllegalMoveError extends GomokuError {
  constructor(readonly reason: IllegalMoveReason, message: string) {
    super("ILLEGAL_MOVE", message);
  }
}

/**
 * Falha ao carregar/salvar o snapshot. Depois de um save com falha o objeto em
 * memória não é confiável.
 */
export class PersistenceError extends GomokuError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("PERSISTENCE_FAILURE", message, options);
  }
}

/** Análise ou renderização indisponível; o estado persistido não é afetado */
export class CollaboratorUnavailableError extends GomokuError {
  constructor(readonly collaborator: "analysis" | "rendering", message: string, options?: { cause?: unknown }) {
    super("COLLABORATOR_UNAVAILABLE", message, options);
  }
}

export class UsageError extends GomokuError {
  constructor(message: string) {
    super("USAGE", message);
  }
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  // erro de outro realm (ex.: fs dentro do jest) não passa no instanceof
  if (typeof err === "object" && err !== null && "message" in err && typeof err.message === "string") {
    return err.message;
  }
  return String(err);
}
