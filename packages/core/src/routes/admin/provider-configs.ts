import { z } from "zod";
import type { HttpServer } from "../../http/http-server.js";
import type { ProviderConfigRegistry } from "../../providers/provider-config-registry.js";

const IdParams = z.object({ id: z.coerce.number().int().positive() });

export function registerProviderConfigRoutes(
  server: HttpServer,
  deps: { configs: ProviderConfigRegistry },
) {
  const { configs } = deps;

  // GET /config_drive : summaries only, credentials never leave the registry
  server.get("/config_drive", (_req, res) => {
    const items = configs.list().map((c) => configs.describe(c));
    res.status(200).json({ items });
  });

  // POST /config_drive : { label, kind, credentials, folder? }
  server.post("/config_drive", (req, res) => {
    const id = configs.create(req.body ?? {});
    res.status(201).json({ id });
  });

  // DELETE /config_drive/:id
  server.delete("/config_drive/:id", (req, res) => {
    const { id } = IdParams.parse(req.params);
    configs.remove(id);
    res.status(200).json({ status: "ok", id });
  });
}
