import Fastify, { type FastifyInstance } from "fastify";
import type { Services } from "../services.js";
import { registerAgentRoutes } from "./routes/agent.js";
import { registerSessionRoutes } from "./routes/sessions.js";
import { registerSoftwareHouseRoutes } from "./routes/software-house.js";
import { registerTemplateRoutes } from "./routes/templates.js";

export interface BuildServerOptions {
  logger?: boolean | undefined;
}

export async function buildServer(
  services: Services,
  options: BuildServerOptions = {},
): Promise<FastifyInstance> {
  const app = Fastify({
    logger: options.logger === false ? false : { level: services.config.logLevel },
  });

  app.addHook("onRequest", async (request, reply) => {
    reply.header("access-control-allow-origin", "*");
    reply.header("access-control-allow-methods", "GET,POST,OPTIONS");
    reply.header("access-control-allow-headers", "content-type,authorization");

    if (request.method === "OPTIONS") {
      reply.code(204).send();
      return;
    }
  });

  app.get("/health", async () => ({
    ok: true,
    at: new Date().toISOString(),
    provider: services.modelPolicy.provider,
    model: services.modelPolicy.model,
    providers: services.providerStatus,
  }));

  await registerTemplateRoutes(app, services);
  await registerAgentRoutes(app, services);
  await registerSoftwareHouseRoutes(app, services);
  await registerSessionRoutes(app, services);

  return app;
}
