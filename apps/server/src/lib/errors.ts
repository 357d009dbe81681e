// ---------------------------------------------------------------------------
// Shared HTTP error helpers
// ---------------------------------------------------------------------------

import type { FastifyReply } from "fastify";
import type { ZodError } from "zod";

export class AppError extends Error {
  constructor(
    public statusCode: number,
    message: string,
  ) {
    super(message);
    this.name = "AppError";
  }
}

/** Not-found codes map to 404; invariant violations are the caller's fault */
export function statusForDomainCode(code: string): number {
  return code === "invariant_violation" ? 400 : 404;
}

export function sendZodError(reply: FastifyReply, error: ZodError) {
  return reply.status(400).send({
    error: "Validation failed",
    details: error.issues.map((i) => ({
      path: i.path.join("."),
      message: i.message,
    })),
  });
}
