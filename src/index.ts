import type { FastifyInstance } from "fastify";
import { AppBuilder } from "./app-builder";

async function start(): Promise<FastifyInstance> {
  const appBuilder = new AppBuilder();
  const app = await appBuilder.build();
  const appConfig = app.diContainer.resolve("appConfig");
  await app.listen({
    host: "0.0.0.0",
    port: appConfig.PORT,
  });
  app.log.info(`📝 Environment: ${appConfig.NODE_ENV}`);
  app.log.info(`💾 Storage: ${appConfig.STORAGE_DRIVER}`);
  return app;
}

start()
  .then((app) => {
    const shutdown = (signal: NodeJS.Signals) => {
      app.log.info(`👋 ${signal} received, gracefully shutting down...`);
      app
        .close()
        .then(() => process.exit(0))
        .catch((error: unknown) => {
          app.log.error({ error }, "Error while shutting down");
          process.exit(1);
        });
    };
    process.once("SIGINT", shutdown);
    process.once("SIGTERM", shutdown);
  })
  .catch((error: unknown) => {
    console.error("❌ Error starting server:", error);
    process.exit(1);
  });
