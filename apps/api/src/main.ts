import "dotenv/config";
import type { Server } from "node:http";
import { parseEnv } from "@ragsync/config";
import { createLogger } from "@ragsync/logger";
import { createApp } from "./app.js";
import { buildContext } from "./context.js";

async function main(): Promise<void> {
  const config = parseEnv();
  const logger = createLogger({ level: config.logLevel, service: "ragsync-api" });
  const ctx = buildContext(config, logger);

  await ctx.vectorStore.ensureIndex(config.indexing.embedDim);

  const app = createApp(ctx);
  const server: Server = app.listen(config.port, () => {
    logger.info(
      {
        port: config.port,
        vectorStore: ctx.vectorStore.name,
        embeddingProvider: ctx.embeddingProvider.name,
        embedDim: config.indexing.embedDim,
      },
      "API listening",
    );
  });

  const shutdown = (signal: string): void => {
    logger.info({ signal }, "Shutting down");
    server.close((err) => {
      if (err) {
        logger.error({ err }, "Error while closing server");
        process.exit(1);
      }
      process.exit(0);
    });
  };

  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
}

main().catch((err: unknown) => {
  console.error("[api] Fatal error:", err);
  process.exit(1);
});
