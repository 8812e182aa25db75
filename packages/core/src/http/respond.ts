import { ZodError } from "zod";
import { LensLinkError } from "../internal/errors.js";
import type { ResponseLike } from "./http-server.js";

export interface ErrorEnvelope {
  status: "error";
  code: string;
  message: string;
  details?: unknown;
}

export function toErrorEnvelope(err: unknown): { status: number; body: ErrorEnvelope } {
  if (err instanceof LensLinkError) {
    return {
      status: err.status,
      body: {
        status: "error",
        code: err.code,
        message: err.message,
        ...(err.details === undefined ? {} : { details: err.details }),
      },
    };
  }
  if (err instanceof ZodError) {
    return {
      status: 400,
      body: {
        status: "error",
        code: "VALIDATION",
        message: "Request validation failed",
        details: err.issues.map((i) => ({ path: i.path.join("."), message: i.message })),
      },
    };
  }
  return {
    status: 500,
    body: { status: "error", code: "INTERNAL", message: "Internal Server Error" },
  };
}

export function sendError(res: ResponseLike, err: unknown) {
  const { status, body } = toErrorEnvelope(err);
  res.status(status).json(body);
}
