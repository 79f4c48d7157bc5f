import express from "express";
import cors, { CorsOptions } from "cors";
import helmet from "helmet";
import rateLimit from "express-rate-limit";
import { createServer, type Server } from "http";
import type { AppConfig } from "./config";
import { normalizeOrigin, splitList } from "./utils/helpers";
import { renderBoardPng, type PngRenderer } from "./render/boardImage";
import type { GameStore } from "./storage/types";
import { createGameRouter } from "./routes/game";

const defaultDevOrigins = ["http://localhost:5173", "http://127.0.0.1:5173"];

/**
 * Se FRONTEND_ORIGIN faltar:
 *  - em DEV: libera localhost:5173 e 127.0.0.1:5173
 *  - em PROD: não libera nada (a menos que ALLOW_ALL_ORIGINS=true)
 */
export function allowedOrigins(config: AppConfig): Set<string> {
  const configured = splitList(config.http.frontendOrigin);
  const raw = configured.length ? configured : !config.isProd ? defaultDevOrigins : [];
  return new Set(raw.map((o) => normalizeOrigin(o) ?? o));
}

export function buildCorsOptions(config: AppConfig): CorsOptions {
  const allowedSet = allowedOrigins(config);
  return {
    origin(origin, callback) {
      if (config.http.allowAllOrigins) return callback(null, true);
      // sem Origin (cURL/healthcheck): permite em dev, bloqueia em prod
      if (!origin) return callback(null, !config.isProd);
      const norm = normalizeOrigin(origin);
      // aceita equivalência localhost <-> 127.0.0.1
      const candidates = new Set<string>();
      if (norm) {
        candidates.add(norm);
        candidates.add(norm.replace("127.0.0.1", "localhost"));
        candidates.add(norm.replace("localhost", "127.0.0.1"));
      }
      const ok = [...candidates].some((v) => allowedSet.has(v));
      // não lança erro (evita 500); só omite os headers se não ok
      return callback(null, ok);
    },
    methods: ["GET", "OPTIONS"],
    optionsSuccessStatus: 204,
  };
}

export interface AppDeps {
  store: GameStore;
  config: AppConfig;
  renderPng?: PngRenderer;
}

export function createApp({ store, config, renderPng = renderBoardPng }: AppDeps) {
  const app = express();

  // atrás de proxy, usa o IP real do cliente no rate limit
  app.set("trust proxy", 1);

  app.use(cors(buildCorsOptions(config)));
  app.use(helmet());
  app.use(
    rateLimit({
      windowMs: config.http.rateWindowMs,
      max: config.http.rateMax,
      standardHeaders: true,
      legacyHeaders: false,
      message: { error: "Too many requests, please try again later." },
    })
  );

  app.get("/healthz", (_req, res) => {
    res.status(200).json({ status: "ok" });
  });

  app.use("/api", createGameRouter(store, renderPng));

  return app;
}

/** Sobe o visualizador; resolve quando a porta está ouvindo */
export function startServer(deps: AppDeps): Promise<Server> {
  const httpServer = createServer(createApp(deps));
  const { port } = deps.config.http;

  return new Promise((resolve, reject) => {
    httpServer.once("error", reject);
    httpServer.listen(port, () => {
      console.log(`Gomoku viewer listening on http://localhost:${port}`);
      if (deps.config.http.allowAllOrigins) {
        console.warn("CORS: ALLOW_ALL_ORIGINS=true (everything allowed) - use only for testing!");
      } else {
        const list = [...allowedOrigins(deps.config)];
        if (list.length) console.log("CORS allowed for:", list.join(", "));
        else console.warn("CORS: FRONTEND_ORIGIN not set in production - no browser origin allowed.");
      }
      resolve(httpServer);
    });
  });
}
