import type { FastifyInstance } from "fastify";
import {
  PromptOptionsRequestSchema,
  RunSessionRequestSchema,
} from "@promptsmith/contracts";
import { writeSessionOutput } from "../../application/output-writer.js";
import { runCategorySession } from "../../application/run-session.js";
import type { Services } from "../../services.js";
import { jsonHandler, sendError, sendInvalidRequest } from "../http.js";

export async function registerSessionRoutes(
  app: FastifyInstance,
  services: Services,
): Promise<void> {
  app.get("/categories", async () => ({
    categories: services.categories.list().map((category) => ({
      id: category.id,
      label: category.label,
      fields: category.fields,
    })),
  }));

  app.post<{ Params: { id: string } }>("/categories/:id/options", async (request, reply) => {
    const payload = PromptOptionsRequestSchema.safeParse(request.body ?? {});
    if (!payload.success) {
      return sendInvalidRequest(reply, payload.error.issues);
    }

    try {
      const options = services.categories.buildPromptOptions(
        request.params.id,
        payload.data.details,
      );
      return reply.send({ options });
    } catch (error) {
      return sendError(reply, error);
    }
  });

  app.post(
    "/sessions",
    jsonHandler(RunSessionRequestSchema, async (body) => {
      const output = await runCategorySession(body, services);
      const file = await writeSessionOutput(services.config.outputDir, output);
      return { ...output, file };
    }),
  );
}
