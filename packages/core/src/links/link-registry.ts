import { z, ZodError } from "zod";
import type { Db } from "@lenslink/db";
import { makeLinkToken } from "../auth/tokens.js";
import type { ProviderConfigRegistry } from "../providers/provider-config-registry.js";
import { LensLinkError } from "../internal/errors.js";
import { createLinkLogger, tokenRef } from "../observability/logger.js";

export const DEFAULT_LINK_LABEL = "Untitled link";
const MAX_TOKEN_RETRIES = 3;

export interface LinkRecord {
  token: string;
  label: string;
  destinationUrl: string;
  configId: number | null;
  createdAt: Date;
}

export interface LinkListing extends LinkRecord {
  captureCount: number;
}

export interface ResolvedLink {
  destinationUrl: string;
  configId: number | null;
}

interface LinkRow {
  token: string;
  label: string;
  destination_url: string;
  config_id: number | null;
  created_at: string;
}

const blankToNull = (v: unknown) => (v === "" || v === undefined ? null : v);

export function isHttpUrl(value: string): boolean {
  try {
    const url = new URL(value);
    return (url.protocol === "http:" || url.protocol === "https:") && url.hostname !== "";
  } catch {
    return false;
  }
}

export const LinkInputSchema = z.object({
  destinationUrl: z
    .string()
    .trim()
    .refine(isHttpUrl, "destinationUrl must be an absolute http(s) URL"),
  configId: z.preprocess(blankToNull, z.coerce.number().int().positive().nullable()),
  label: z.preprocess(blankToNull, z.string().trim().max(200).nullable()),
});

export interface LinkRegistry {
  /** Accepts `{ destinationUrl, configId?, label? }`; form fields may be blank strings. */
  create(input: unknown): LinkRecord;
  /** Throws NOT_FOUND for an unknown token. */
  resolve(token: string): ResolvedLink;
  get(token: string): LinkRecord | null;
  list(): LinkListing[];
  remove(token: string): void;
}

export interface LinkRegistryOptions {
  configs: Pick<ProviderConfigRegistry, "find">;
  generateToken?: () => string;
  now?: () => Date;
}

function isPrimaryKeyCollision(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "SQLITE_CONSTRAINT_PRIMARYKEY";
}

function toRecord(row: LinkRow): LinkRecord {
  return {
    token: row.token,
    label: row.label,
    destinationUrl: row.destination_url,
    configId: row.config_id,
    createdAt: new Date(row.created_at),
  };
}

export class SqliteLinkRegistry implements LinkRegistry {
  private readonly log = createLinkLogger();
  private readonly generateToken: () => string;
  private readonly now: () => Date;

  constructor(
    private readonly db: Db,
    private readonly opts: LinkRegistryOptions,
  ) {
    this.generateToken = opts.generateToken ?? makeLinkToken;
    this.now = opts.now ?? (() => new Date());
  }

  create(input: unknown): LinkRecord {
    let data: z.output<typeof LinkInputSchema>;
    try {
      data = LinkInputSchema.parse(input);
    } catch (err) {
      if (err instanceof ZodError) {
        throw LensLinkError.validation(
          "VALIDATION",
          err.issues[0]?.message ?? "Invalid link",
          err.issues.map((i) => ({ path: i.path.join("."), message: i.message })),
        );
      }
      throw err;
    }
    if (data.configId !== null && !this.opts.configs.find(data.configId)) {
      throw LensLinkError.invalidReference(
        "UNKNOWN_CONFIG",
        `Provider configuration ${data.configId} does not exist`,
      );
    }

    const record: Omit<LinkRecord, "token"> = {
      label: data.label || DEFAULT_LINK_LABEL,
      destinationUrl: data.destinationUrl,
      configId: data.configId,
      createdAt: this.now(),
    };
    const insert = this.db.prepare<[string, string, string, number | null, string]>(
      "INSERT INTO links (token, label, destination_url, config_id, created_at) VALUES (?, ?, ?, ?, ?)",
    );
    for (let attempt = 0; ; attempt++) {
      const token = this.generateToken();
      try {
        insert.run(
          token,
          record.label,
          record.destinationUrl,
          record.configId,
          record.createdAt.toISOString(),
        );
        this.log.info({ token: tokenRef(token), configId: record.configId }, "Link created");
        return { token, ...record };
      } catch (err) {
        if (!isPrimaryKeyCollision(err) || attempt >= MAX_TOKEN_RETRIES) throw err;
        this.log.warn({ attempt: attempt + 1 }, "Link token collision, retrying");
      }
    }
  }

  resolve(token: string): ResolvedLink {
    const link = this.get(token);
    if (!link) throw LensLinkError.notFound("LINK_NOT_FOUND", "Link not found");
    return { destinationUrl: link.destinationUrl, configId: link.configId };
  }

  get(token: string): LinkRecord | null {
    const row = this.db
      .prepare<[string], LinkRow>("SELECT * FROM links WHERE token = ?")
      .get(token);
    return row ? toRecord(row) : null;
  }

  list(): LinkListing[] {
    return this.db
      .prepare<[], LinkRow & { capture_count: number }>(
        `SELECT l.*, COUNT(c.id) AS capture_count
         FROM links l LEFT JOIN captures c ON c.link_token = l.token
         GROUP BY l.token
         ORDER BY l.created_at DESC, l.rowid DESC`,
      )
      .all()
      .map((row) => ({ ...toRecord(row), captureCount: row.capture_count }));
  }

  remove(token: string): void {
    const info = this.db.prepare<[string]>("DELETE FROM links WHERE token = ?").run(token);
    if (info.changes === 0) throw LensLinkError.notFound("LINK_NOT_FOUND", "Link not found");
    this.log.info({ token: tokenRef(token) }, "Link removed");
  }
}
