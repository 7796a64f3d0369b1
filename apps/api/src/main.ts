import { parseEnv } from "@gapscout/config";
import { createLogger } from "@gapscout/logger";
import { createApp } from "./app.js";
import { appOptionsFrom, createServices } from "./container.js";

async function main(): Promise<void> {
  const config = parseEnv();
  const logger = createLogger({ level: config.logLevel, service: "gapscout-api" });
  const services = createServices(config, logger);
  const app = createApp(services, appOptionsFrom(config));

  const server = app.listen(config.port, () => {
    logger.info(
      {
        port: config.port,
        vectorStore: config.vectorStore.type,
        collection: config.vectorStore.collectionName,
        embeddings: services.embeddingProvider.name,
        model: services.generator.model,
      },
      "API listening",
    );
  });

  let shuttingDown = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info({ signal }, "Shutting down");

    await new Promise<void>((resolve, reject) => {
      server.close((err) => {
        if (err) reject(err);
        else resolve();
      });
    });
    await services.ocr.terminate();
    logger.info("Shutdown complete");
    process.exit(0);
  };

  const onSignal = (signal: string): void => {
    shutdown(signal).catch((err: unknown) => {
      logger.error({ err }, "Shutdown failed");
      process.exit(1);
    });
  };

  process.on("SIGTERM", () => onSignal("SIGTERM"));
  process.on("SIGINT", () => onSignal("SIGINT"));
}

main().catch((err: unknown) => {
  console.error("[api] Fatal error:", err);
  process.exit(1);
});
