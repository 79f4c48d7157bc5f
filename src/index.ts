#!/usr/bin/env node
import "dotenv/config";
import { loadConfig, type AppConfig } from "./config";
import { describeError } from "./errors";
import { createStore } from "./storage";
import { createAnalysisProvider, unavailableReason } from "./analysis/providers";
import { CommandHandler } from "./cli/handler";
import { startServer } from "./server";

async function main(args: string[]): Promise<number> {
  let config: AppConfig;
  try {
    config = loadConfig();
  } catch (err) {
    console.error(`Error initializing application: ${describeError(err)}`);
    return 1;
  }

  const store = createStore(config);
  let serving = false;

  const handler = new CommandHandler({
    store,
    config,
    analyzer: createAnalysisProvider(config.analysis),
    analyzerUnavailable: unavailableReason(config.analysis),
    serve: async () => {
      const httpServer = await startServer({ store, config });
      serving = true;
      process.on("SIGINT", () => {
        console.log("Shutting down (SIGINT)...");
        httpServer.close();
        store.close().then(
          () => process.exit(0),
          (err: unknown) => {
            console.error("failed to close store:", err);
            process.exit(1);
          }
        );
      });
    },
  });

  const code = await handler.run(args);
  if (!serving) await store.close();
  return code;
}

main(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    console.error("Falha inesperada:", err);
    process.exitCode = 1;
  }
);
