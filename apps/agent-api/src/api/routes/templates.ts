import type { FastifyInstance } from "fastify";
import { RenderTemplateRequestSchema } from "@promptsmith/contracts";
import type { Services } from "../../services.js";
import { sendError, sendInvalidRequest } from "../http.js";

interface TemplateRoute {
  Params: { name: string };
}

export async function registerTemplateRoutes(
  app: FastifyInstance,
  services: Services,
): Promise<void> {
  app.get("/templates", async () => ({
    templates: services.catalog.list().map((template) => ({
      name: template.name,
      description: template.description,
      slots: template.slots,
    })),
  }));

  app.post<TemplateRoute>("/templates/:name/render", async (request, reply) => {
    const payload = RenderTemplateRequestSchema.safeParse(request.body ?? {});
    if (!payload.success) {
      return sendInvalidRequest(reply, payload.error.issues);
    }

    try {
      const prompt = services.client.render(request.params.name, payload.data.slots);
      return reply.send({ prompt });
    } catch (error) {
      return sendError(reply, error);
    }
  });

  app.post<TemplateRoute>("/templates/:name/complete", async (request, reply) => {
    const payload = RenderTemplateRequestSchema.safeParse(request.body ?? {});
    if (!payload.success) {
      return sendInvalidRequest(reply, payload.error.issues);
    }

    try {
      const prompt = services.client.render(request.params.name, payload.data.slots);
      const response = await services.client.complete(prompt);
      return reply.send({ prompt, response });
    } catch (error) {
      return sendError(reply, error);
    }
  });
}
