import { createApp } from "./app";
import { loadEnv } from "./config/env";

async function bootstrap(): Promise<void> {
  const env = loadEnv();
  const { app, logger, provider } = createApp(env);

  app.listen(env.port, () => {
    logger.info("Server started", { port: env.port });
    logger.info("LLM provider", {
      provider: provider.name,
      modelName: provider.getModelName(),
      timeoutMs: env.llmTimeoutMs,
    });
  });
}

void bootstrap();
