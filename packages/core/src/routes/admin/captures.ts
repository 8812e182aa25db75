import { z } from "zod";
import type { HttpServer } from "../../http/http-server.js";
import type { CaptureRecord, CaptureStore } from "../../captures/capture-store.js";
import type { CaptureIngestion } from "../../captures/ingestion.js";

const IdParams = z.object({ id: z.string().min(1) });

const toCaptureDto = (c: CaptureRecord) => ({
  id: c.id,
  linkToken: c.linkToken,
  capturedAt: c.capturedAt.toISOString(),
  outcome: c.outcome,
  providerKind: c.providerKind,
  remoteId: c.remoteId,
  remoteUrl: c.remoteUrl,
  filename: c.filename,
  contentType: c.contentType,
  byteSize: c.byteSize,
  errorMessage: c.errorMessage,
});

export function registerCaptureAdminRoutes(
  server: HttpServer,
  deps: { captures: CaptureStore; pipeline: CaptureIngestion },
) {
  // GET /gallery : newest first
  server.get("/gallery", (_req, res) => {
    res.status(200).json({ items: deps.captures.list().map(toCaptureDto) });
  });

  // DELETE /captures/:id
  server.delete("/captures/:id", async (req, res) => {
    const { id } = IdParams.parse(req.params);
    const result = await deps.pipeline.deleteCapture(id);
    res.status(200).json({ status: "ok", ...result });
  });
}
