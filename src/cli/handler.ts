import type { AppConfig } from "../config";
import {
  GomokuError,
  IllegalMoveError,
  MalformedInputError,
  UsageError,
  describeError,
} from "../errors";
import { analyzePosition } from "../analysis/analyzer";
import type { AnalysisProvider } from "../analysis/providers";
import { applyMove, boardAscii, formatMove, gameStatus, lastMove, moveHistory } from "../logic/game";
import { writeBoardImage, renderBoardPng, type PngRenderer } from "../render/boardImage";
import type { GameStore } from "../storage/types";

export interface Output {
  log(message?: string): void;
  error(message?: string): void;
}

export interface HandlerDeps {
  store: GameStore;
  config: AppConfig;
  analyzer?: AnalysisProvider;
  /** mensagem usada quando não há provider e a análise precisa ser gerada */
  analyzerUnavailable?: string;
  renderPng?: PngRenderer;
  /** sobe o visualizador HTTP (comando serve) */
  serve?: () => Promise<void>;
  out?: Output;
}

export const FORMAT_GUIDE = [
  "Correct format: <Column>-<Row>-<Piece>",
  "Examples:",
  "  H-08-X  (Black stone at center)",
  "  A-01-O  (White stone at top-left)",
  "  O-15-X  (Black stone at bottom-right)",
  "",
  "Rules:",
  "  Columns: A-O (A=left, O=right)",
  "  Rows: 01-15 (01=top, 15=bottom)",
  "  Pieces: X=Black, O=White",
].join("\n");

export const USAGE = [
  "Gomoku Game Simulator",
  "",
  "Usage:",
  "  gomoku move <position>   Make a move (e.g., gomoku move H-08-X)",
  "  gomoku status            Show current game status and turn",
  "  gomoku history           Show complete move history",
  "  gomoku analyze           AI strategic analysis of the current position",
  "  gomoku reset             Delete the saved game and start over",
  "  gomoku serve             Start the read-only HTTP viewer",
  "",
  "Move Format:",
  "  <Column>-<Row>-<Piece>",
  "  Column: A-O (A=leftmost, O=rightmost)",
  "  Row: 01-15 (01=top, 15=bottom)",
  "  Piece: X=Black, O=White",
  "  Example: H-08-X (Black stone at center)",
  "",
  "Notes:",
  "  - Game auto-initializes on first move",
  "  - Board visualization is updated after every move",
  "  - White moves first",
].join("\n");

const RULE = "-".repeat(40);
const FRAME = "=".repeat(80);

/**
 * Cada comando é um ciclo carregar → (alterar?) → (salvar?) → colaborador → relatório.
 */
export class CommandHandler {
  private readonly out: Output;
  private readonly renderPng: PngRenderer;

  constructor(private readonly deps: HandlerDeps) {
    this.out = deps.out ?? console;
    this.renderPng = deps.renderPng ?? renderBoardPng;
  }

  /** Executa e devolve o exit code; erros viram "Error: ..." na saída de erro */
  async run(args: string[]): Promise<number> {
    try {
      await this.handle(args);
      return 0;
    } catch (err) {
      if (!(err instanceof GomokuError)) {
        console.error("unexpected error:", err);
      }
      this.out.error(`Error: ${describeError(err)}`);
      return 1;
    }
  }

  async handle(args: string[]): Promise<void> {
    if (args.length === 0) {
      this.out.log(USAGE);
      return;
    }

    const command = args[0].toLowerCase();
    switch (command) {
      case "move":
        if (args.length !== 2) {
          throw new UsageError("usage: gomoku move <position> (e.g., gomoku move H-08-X)");
        }
        return this.move(args[1]);
      case "status":
        return this.status();
      case "history":
        return this.history();
      case "analyze":
        return this.analyze();
      case "reset":
        return this.reset();
      case "serve":
        return this.serve();
      case "help":
      case "--help":
      case "-h":
        this.out.log(USAGE);
        return;
      default:
        throw new UsageError(`unknown command: ${args[0]}`);
    }
  }

  private async move(moveText: string): Promise<void> {
    const { store, config } = this.deps;
    const state = await store.load();

    const result = applyMove(state, moveText);
    if (!result.ok) {
      const message = `invalid move: ${result.message}\n\n${FORMAT_GUIDE}`;
      if (result.reason === "MALFORMED_MOVE") {
        throw new MalformedInputError(message, result.offending ?? moveText);
      }
      throw new IllegalMoveError(result.reason, message);
    }

    await store.save(result.state);

    this.out.log(`Move ${moveText} successful!`);
    this.out.log(`Status: ${gameStatus(result.state)}`);

    // o estado já está salvo; falha de imagem é só um aviso
    try {
      await writeBoardImage(result.state, config.imageFile, this.renderPng);
      this.out.log(`Board visualization updated: ${config.imageFile}`);
    } catch (err) {
      this.out.error(`Warning: board image not updated: ${describeError(err)}`);
    }
  }

  private async status(): Promise<void> {
    const state = await this.deps.store.load();
    this.out.log(`Game Status: ${gameStatus(state)}`);
    this.out.log(`Total Moves: ${state.moves.length}`);
    const last = lastMove(state);
    if (last) {
      this.out.log(`Last Move: ${formatMove(last)}`);
    }
    this.out.log("");
    this.out.log("Current Board:");
    this.out.log(boardAscii(state));
  }

  private async history(): Promise<void> {
    const state = await this.deps.store.load();
    if (state.moves.length === 0) {
      this.out.log("No moves have been made yet.");
      return;
    }
    this.out.log(`Move History (${state.moves.length} moves):`);
    this.out.log(RULE);
    for (const line of moveHistory(state)) this.out.log(line);
    this.out.log(RULE);
    this.out.log(`Current Status: ${gameStatus(state)}`);
  }

  private async analyze(): Promise<void> {
    const { store, analyzer, analyzerUnavailable } = this.deps;
    const state = await store.load();

    this.out.log("Analyzing current position...");
    const outcome = await analyzePosition(state, analyzer, analyzerUnavailable);
    if (!outcome.cached) {
      await store.save(outcome.state);
    }

    this.out.log(FRAME);
    this.out.log(outcome.cached ? `[CACHED ANALYSIS]\n${outcome.text}` : outcome.text);
    this.out.log(FRAME);
  }

  private async reset(): Promise<void> {
    const existed = await this.deps.store.reset();
    this.out.log(existed ? "Game reset. WHITE moves first in the next game." : "No saved game to reset.");
  }

  private async serve(): Promise<void> {
    if (!this.deps.serve) {
      throw new UsageError("serve is not available in this context");
    }
    await this.deps.serve();
  }
}
