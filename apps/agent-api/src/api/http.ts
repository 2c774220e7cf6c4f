import type { FastifyReply, FastifyRequest } from "fastify";
import type { ZodIssue, ZodType, ZodTypeDef } from "zod";
import { PromptsmithError, type PromptsmithErrorCode } from "../errors.js";

const STATUS_BY_CODE: Record<PromptsmithErrorCode, number> = {
  UNKNOWN_TEMPLATE: 404,
  UNKNOWN_CATEGORY: 404,
  INVALID_TEMPLATE: 500,
  MODEL_UNAVAILABLE: 502,
  PROVIDER_NOT_CONFIGURED: 503,
  CONFIG_INVALID: 500,
};

export function sendInvalidRequest(reply: FastifyReply, issues: ZodIssue[]): FastifyReply {
  return reply.status(400).send({ error: "INVALID_REQUEST", details: issues });
}

export function sendError(reply: FastifyReply, error: unknown): FastifyReply {
  if (error instanceof PromptsmithError) {
    const status = STATUS_BY_CODE[error.code];
    if (status >= 500) {
      reply.log.error({ err: error }, error.message);
    }
    return reply.status(status).send({ error: error.code, message: error.message });
  }

  reply.log.error({ err: error }, "unhandled error");
  return reply.status(500).send({
    error: "INTERNAL_ERROR",
    message: error instanceof Error ? error.message : String(error),
  });
}

/**
 * Route handler that validates the JSON body with `schema` and sends whatever `run` returns.
 */
export function jsonHandler<TBody, TResult>(
  schema: ZodType<TBody, ZodTypeDef, unknown>,
  run: (body: TBody) => Promise<TResult>,
): (request: FastifyRequest, reply: FastifyReply) => Promise<FastifyReply> {
  return async (request, reply) => {
    const payload = schema.safeParse(request.body ?? {});
    if (!payload.success) {
      return sendInvalidRequest(reply, payload.error.issues);
    }

    try {
      return reply.send(await run(payload.data));
    } catch (error) {
      return sendError(reply, error);
    }
  };
}
