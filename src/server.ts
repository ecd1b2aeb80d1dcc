import { createApp } from "./app";
import { loadEnv } from "./config/env";
import { errorMessage } from "./shared/errors";

async function bootstrap(): Promise<void> {
  const env = loadEnv();
  const { app, logger, elasticsearchClient } = createApp(env);

  if (elasticsearchClient) {
    try {
      await elasticsearchClient.waitUntilAvailable(
        env.elasticsearchStartupRetries,
        env.elasticsearchStartupDelayMs,
      );
    } catch (error) {
      // Requests will answer 503 until the index comes up.
      logger.error("Elasticsearch is unavailable at startup", { error: errorMessage(error) });
    }
  }

  app.listen(env.port, () => {
    logger.info("Server started", {
      port: env.port,
      nodeEnv: env.nodeEnv,
      mockSearchIndex: env.mockSearchIndex,
      jobsIndex: env.jobsIndex,
      candidatesIndex: env.candidatesIndex,
    });
  });
}

bootstrap().catch((error: unknown) => {
  process.stderr.write(`Failed to start server: ${errorMessage(error)}\n`);
  process.exit(1);
});
