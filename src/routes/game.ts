import { Router, type Request, type Response } from "express";
import { GomokuError, PersistenceError } from "../errors";
import { boardToRows } from "../logic/board";
import { formatPosition } from "../logic/coordinates";
import { HashMemo } from "../logic/cacheGate";
import { gameStatus, lastMove, type GameState } from "../logic/game";
import type { PngRenderer } from "../render/boardImage";
import type { GameStore } from "../storage/types";

/** Serializador padrão para não vazar detalhes internos do estado */
export function serializeGame(state: GameState) {
  const { outcome } = state;
  return {
    board: boardToRows(state.board),
    status: outcome.status,
    winner: outcome.status === "won" ? outcome.winner : null,
    current_turn: outcome.status === "in_progress" ? state.currentTurn : null,
    summary: gameStatus(state),
    move_count: state.moves.length,
    board_hash: state.boardHash,
  };
}

/**
 * A imagem destaca a última jogada, então o hash do tabuleiro sozinho não
 * identifica o PNG: as mesmas pedras em outra ordem mudam o destaque.
 */
export function imageKey(state: GameState): string {
  const last = lastMove(state);
  return last ? `${state.boardHash}-${formatPosition(last.position)}` : state.boardHash;
}

function sendError(res: Response, route: string, err: unknown) {
  // eslint-disable-next-line no-console
  console.error(`GET ${route} error:`, err);
  if (err instanceof PersistenceError) {
    return res.status(503).json({ error: err.code });
  }
  return res.status(500).json({ error: err instanceof GomokuError ? err.code : "INTERNAL_ERROR" });
}

/**
 * Rotas somente leitura sobre o snapshot atual. Nenhuma rota aceita jogadas.
 */
export function createGameRouter(store: GameStore, renderPng: PngRenderer, images = new HashMemo<Buffer>(8)) {
  const router = Router();

  /**
   * GET /api/game
   * Snapshot do tabuleiro + status
   */
  router.get("/game", async (_req: Request, res: Response) => {
    try {
      const state = await store.load();
      return res.json(serializeGame(state));
    } catch (err) {
      return sendError(res, "/game", err);
    }
  });

  /**
   * GET /api/game/history
   * Lista de jogadas em ordem
   */
  router.get("/game/history", async (_req: Request, res: Response) => {
    try {
      const state = await store.load();
      const items = state.moves.map((m) => ({
        move_num: m.moveNumber,
        player: m.player,
        position: formatPosition(m.position),
        piece: m.piece,
      }));
      return res.json({ items });
    } catch (err) {
      return sendError(res, "/game/history", err);
    }
  });

  /**
   * GET /api/game/board.png
   * PNG memorizado por hash do tabuleiro + última jogada (ETag = essa chave)
   */
  router.get("/game/board.png", async (req: Request, res: Response) => {
    try {
      const state = await store.load();
      const key = imageKey(state);
      res.setHeader("ETag", `"${key}"`);
      // If-None-Match com validador fraco ou lista também vale
      if (req.fresh) {
        return res.status(304).end();
      }
      const { entry } = await images.getOrCompute(key, () => renderPng(state));
      return res.type("png").send(entry.value);
    } catch (err) {
      res.removeHeader("ETag");
      return sendError(res, "/game/board.png", err);
    }
  });

  return router;
}
