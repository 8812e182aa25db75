import { LensLinkError, errorMessage, type UploadFailureCode } from "../internal/errors.js";

export type ProviderOp = "upload" | "delete";

export interface ProviderCallContext {
  op: ProviderOp;
  provider: string;
  timeoutMs: number;
}

export function providerFailure(
  op: ProviderOp,
  code: UploadFailureCode,
  message: string,
  cause?: unknown,
  details?: unknown,
): LensLinkError {
  return op === "upload"
    ? LensLinkError.upload(code, message, cause, details)
    : LensLinkError.delete(code, message, cause, details);
}

/** fetch with a hard deadline; transport failures become provider errors. */
export async function providerFetch(
  url: string,
  init: RequestInit,
  ctx: ProviderCallContext,
): Promise<Response> {
  try {
    return await fetch(url, { ...init, signal: AbortSignal.timeout(ctx.timeoutMs) });
  } catch (err) {
    if (err instanceof Error && (err.name === "TimeoutError" || err.name === "AbortError")) {
      throw providerFailure(
        ctx.op,
        "TIMEOUT",
        `${ctx.provider} did not respond within ${ctx.timeoutMs}ms`,
        err,
      );
    }
    throw providerFailure(ctx.op, "NETWORK", `${ctx.provider} request failed: ${errorMessage(err)}`, err);
  }
}

export async function readBody(res: Response): Promise<unknown> {
  const text = await res.text();
  if (!text) return null;
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
}
