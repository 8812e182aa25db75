import { z } from "zod";
import type { HttpServer, RequestLike, ResponseLike } from "../http/http-server.js";
import { wantsJson } from "../http/http-server.js";
import type { LinkRegistry } from "../links/link-registry.js";
import type { CaptureIngestion } from "../captures/ingestion.js";
import type { CaptureOutcome } from "../captures/capture-store.js";
import { issueCaptureTicket, verifyCaptureTicket } from "../auth/capture-ticket.js";
import { isWellFormedLinkToken } from "../auth/tokens.js";
import { renderCapturePage, renderNotFoundPage } from "../pages/capture-page.js";
import { LensLinkError, isLensLinkError } from "../internal/errors.js";
import { createCaptureLogger, tokenRef } from "../observability/logger.js";

export interface CaptureRouteDeps {
  links: LinkRegistry;
  pipeline: CaptureIngestion;
  secretKey: string;
  ticketTtlSeconds: number;
  now?: () => Date;
}

const TokenParams = z.object({ token: z.string().min(1) });
const CaptureForm = z.object({ ticket: z.string().optional() }).passthrough();

function findLink(links: LinkRegistry, token: string) {
  return isWellFormedLinkToken(token) ? links.get(token) : null;
}

function notFound(req: RequestLike, res: ResponseLike) {
  if (wantsJson(req)) {
    res.status(404).json({ status: "error", code: "LINK_NOT_FOUND", message: "Link not found" });
    return;
  }
  res.status(404).text(renderNotFoundPage());
}

export function registerCaptureRoutes(server: HttpServer, deps: CaptureRouteDeps) {
  const log = createCaptureLogger();
  const now = deps.now ?? (() => new Date());

  // GET /p/:token : consent page with the upload form
  server.get("/p/:token", (req, res) => {
    const { token } = TokenParams.parse(req.params);
    const link = findLink(deps.links, token);
    if (!link) {
      notFound(req, res);
      return;
    }
    res
      .status(200)
      .header("Cache-Control", "no-store")
      .html(
        renderCapturePage({
          token,
          ticket: issueCaptureTicket(deps.secretKey, token, now()),
          destinationUrl: link.destinationUrl,
          label: link.label,
        }),
      );
  });

  // POST /p/:token/capture : multipart `photo` + `ticket`; always ends in the destination
  server.post("/p/:token/capture", async (req, res) => {
    const { token } = TokenParams.parse(req.params);
    const link = findLink(deps.links, token);
    if (!link) {
      notFound(req, res);
      return;
    }

    const form = CaptureForm.safeParse(req.body ?? {});
    const check = verifyCaptureTicket(
      deps.secretKey,
      token,
      form.success ? form.data.ticket : undefined,
      deps.ticketTtlSeconds,
      now(),
    );
    if (!check.ok) {
      throw LensLinkError.validation("INVALID_TICKET", "Capture ticket is missing or expired", {
        reason: check.reason,
      });
    }

    const photo = req.file;
    if (!photo || photo.size === 0) {
      throw LensLinkError.validation("VALIDATION", "photo is required");
    }
    if (!photo.mimetype.toLowerCase().startsWith("image/")) {
      throw LensLinkError.validation("VALIDATION", "photo must be an image", {
        contentType: photo.mimetype,
      });
    }

    let outcome: CaptureOutcome;
    let redirectTo = link.destinationUrl;
    try {
      const result = await deps.pipeline.ingest(token, {
        bytes: photo.buffer,
        contentType: photo.mimetype.toLowerCase(),
      });
      outcome = result.record.outcome;
      redirectTo = result.redirectTo;
    } catch (err) {
      // The link may have been deleted between the lookup and the upload.
      if (isLensLinkError(err, "NOT_FOUND")) throw err;
      log.error({ err, token: tokenRef(token) }, "Capture pipeline failed; redirecting anyway");
      outcome = "failed";
    }

    if (wantsJson(req)) {
      res.status(200).json({ status: "ok", outcome, redirectTo });
      return;
    }
    res.redirect(redirectTo, 303);
  });
}
