import type { FastifyPluginCallback } from "fastify";
import fp from "fastify-plugin";
import type { ZodTypeProvider } from "fastify-type-provider-zod";
import { z } from "zod";

const routes: FastifyPluginCallback = (fastify, _options, done) => {
  fastify.withTypeProvider<ZodTypeProvider>().route({
    method: "GET",
    url: "/health",
    schema: {
      response: {
        200: z.object({
          status: z.literal("healthy"),
          timestamp: z.string(),
          uptime: z.number(),
          storage: z.enum(["postgres", "memory"]),
        }),
      },
    },
    handler: async function (_request, reply) {
      return reply.status(200).send({
        status: "healthy",
        timestamp: new Date().toISOString(),
        uptime: process.uptime(),
        storage: fastify.appConfig.STORAGE_DRIVER,
      });
    },
  });

  done();
};

export default fp(routes, {
  name: "routes",
  dependencies: ["config-plugin"],
});
