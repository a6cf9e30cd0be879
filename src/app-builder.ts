import { fastify, type FastifyServerOptions } from "fastify";
import {
  serializerCompiler,
  validatorCompiler,
  type ZodTypeProvider,
} from "fastify-type-provider-zod";
import configPlugin from "./plugins/config-plugin";
import drizzlePlugin from "./plugins/drizzle-plugin";
import diContainerPlugin from "./plugins/di-container-plugin";
import routes from "./routes";

export class AppBuilder {
  async build() {
    const app = fastify({
      logger: this.getLoggerConfig(),
    });
    app.withTypeProvider<ZodTypeProvider>();
    app.setValidatorCompiler(validatorCompiler);
    app.setSerializerCompiler(serializerCompiler);
    await app.register(configPlugin);
    if (app.appConfig.STORAGE_DRIVER === "postgres") {
      await app.register(drizzlePlugin);
    }
    await app.register(diContainerPlugin);
    await app.register(routes);
    app.setErrorHandler((error, request, reply) => {
      request.log.error(error);
      reply.status(500).send({
        error: "Internal Server Error",
        message: error instanceof Error ? error.message : String(error),
      });
    });
    app.setNotFoundHandler((request, reply) => {
      reply.status(404).send({
        error: "Not Found",
        message: `Route ${request.method}:${request.url} not found`,
      });
    });
    return app;
  }

  private getLoggerConfig(): FastifyServerOptions["logger"] {
    if (process.env["DISABLE_LOG"] === "true") {
      return false;
    }
    if (
      process.env["NODE_ENV"] === "development" ||
      process.env["NODE_ENV"] === "test"
    ) {
      return {
        level: process.env["LOG_LEVEL"] || "info",
        transport: {
          target: "pino-pretty",
          options: {
            colorize: true,
            translateTime: "HH:MM:ss Z",
            ignore: "pid,hostname",
            messageFormat: "{msg}",
            singleLine: false,
            hideObject: false,
          },
        },
      };
    }
    return {
      level: process.env["LOG_LEVEL"] || "info",
      messageKey: "message",
    };
  }
}
