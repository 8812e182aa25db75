import { z } from "zod";
import type { HttpServer } from "../../http/http-server.js";
import type { LinkRecord, LinkRegistry } from "../../links/link-registry.js";
import type { CaptureIngestion } from "../../captures/ingestion.js";
import { capturePath } from "../../pages/capture-page.js";

const TokenParams = z.object({ token: z.string().min(1) });

export function registerLinkRoutes(
  server: HttpServer,
  deps: { links: LinkRegistry; pipeline: CaptureIngestion; publicBaseUrl?: string },
) {
  const { links, pipeline } = deps;
  const base = (deps.publicBaseUrl ?? "").replace(/\/+$/, "");

  const toLinkDto = (link: LinkRecord) => ({
    token: link.token,
    label: link.label,
    destinationUrl: link.destinationUrl,
    configId: link.configId,
    captureUrl: `${base}${capturePath(link.token)}`,
  });

  // GET /links : newest first
  server.get("/links", (_req, res) => {
    const items = links.list().map((l) => ({
      ...toLinkDto(l),
      createdAt: l.createdAt.toISOString(),
      captureCount: l.captureCount,
    }));
    res.status(200).json({ items });
  });

  // POST /links : { destinationUrl, configId?, label? }
  server.post("/links", (req, res) => {
    const link = links.create(req.body ?? {});
    res.status(201).json(toLinkDto(link));
  });

  // DELETE /links/:token : removes every capture first, remote copies included
  server.delete("/links/:token", async (req, res) => {
    const { token } = TokenParams.parse(req.params);
    const result = await pipeline.deleteLink(token);
    res.status(200).json({ status: "ok", ...result });
  });
}
