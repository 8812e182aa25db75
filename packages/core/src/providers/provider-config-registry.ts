import { z, ZodError } from "zod";
import type { Db } from "@lenslink/db";
import {
  CdnMediaCredentialsSchema,
  ServiceAccountCredentialsSchema,
  type ProviderConfiguration,
  type ProviderConfigSummary,
} from "./types.js";
import {
  openCredentials,
  sealCredentials,
  type CredentialEncryptionOptions,
} from "../crypto/credential-encryption.js";
import { LensLinkError } from "../internal/errors.js";
import { createConfigLogger } from "../observability/logger.js";

interface ProviderConfigRow {
  id: number;
  label: string;
  kind: string;
  credentials: string;
  folder: string | null;
  created_at: string;
}

// A service-account key file is often pasted as text rather than posted as an object.
function parseJsonDocument(value: unknown, ctx: z.RefinementCtx): unknown {
  if (typeof value !== "string") return value;
  try {
    return JSON.parse(value);
  } catch {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: "credentials must be a JSON document",
      fatal: true,
    });
    return z.NEVER;
  }
}

const LabelSchema = z.string().trim().min(1, "label is required").max(200);
const FolderSchema = z
  .string()
  .trim()
  .max(1024)
  .nullish()
  .transform((v) => (v ? v : null));

export const ProviderConfigInputSchema = z.discriminatedUnion("kind", [
  z.object({
    label: LabelSchema,
    kind: z.literal("service-account-store"),
    credentials: z.preprocess(parseJsonDocument, ServiceAccountCredentialsSchema),
    folder: FolderSchema,
  }),
  z.object({
    label: LabelSchema,
    kind: z.literal("cdn-media-store"),
    credentials: CdnMediaCredentialsSchema,
    folder: FolderSchema,
  }),
]);

export interface ProviderConfigRegistry {
  create(input: unknown): number;
  /** Throws NOT_FOUND when the id is unknown. */
  get(id: number): ProviderConfiguration;
  find(id: number): ProviderConfiguration | null;
  list(): ProviderConfiguration[];
  remove(id: number): void;
  describe(config: ProviderConfiguration): ProviderConfigSummary;
}

export interface ProviderConfigRegistryOptions {
  encryption: CredentialEncryptionOptions;
  now?: () => Date;
}

export class SqliteProviderConfigRegistry implements ProviderConfigRegistry {
  private readonly log = createConfigLogger();
  private readonly now: () => Date;

  constructor(
    private readonly db: Db,
    private readonly opts: ProviderConfigRegistryOptions,
  ) {
    this.now = opts.now ?? (() => new Date());
  }

  create(input: unknown): number {
    let data: z.output<typeof ProviderConfigInputSchema>;
    try {
      data = ProviderConfigInputSchema.parse(input);
    } catch (err) {
      if (err instanceof ZodError) {
        throw LensLinkError.validation(
          "VALIDATION",
          "Invalid provider configuration",
          err.issues.map((i) => ({ path: i.path.join("."), message: i.message })),
        );
      }
      throw err;
    }
    const info = this.db
      .prepare<[string, string, string, string | null, string]>(
        "INSERT INTO provider_configs (label, kind, credentials, folder, created_at) VALUES (?, ?, ?, ?, ?)",
      )
      .run(
        data.label,
        data.kind,
        sealCredentials(data.credentials, this.opts.encryption),
        data.folder,
        this.now().toISOString(),
      );
    const id = Number(info.lastInsertRowid);
    this.log.info({ configId: id, kind: data.kind }, "Provider configuration created");
    return id;
  }

  get(id: number): ProviderConfiguration {
    const config = this.find(id);
    if (!config) {
      throw LensLinkError.notFound("CONFIG_NOT_FOUND", `Provider configuration ${id} not found`);
    }
    return config;
  }

  find(id: number): ProviderConfiguration | null {
    const row = this.db
      .prepare<[number], ProviderConfigRow>("SELECT * FROM provider_configs WHERE id = ?")
      .get(id);
    return row ? this.hydrate(row) : null;
  }

  list(): ProviderConfiguration[] {
    return this.db
      .prepare<[], ProviderConfigRow>("SELECT * FROM provider_configs ORDER BY created_at, id")
      .all()
      .map((row) => this.hydrate(row));
  }

  remove(id: number): void {
    const info = this.db.prepare<[number]>("DELETE FROM provider_configs WHERE id = ?").run(id);
    if (info.changes === 0) {
      throw LensLinkError.notFound("CONFIG_NOT_FOUND", `Provider configuration ${id} not found`);
    }
    this.log.info({ configId: id }, "Provider configuration removed");
  }

  describe(config: ProviderConfiguration): ProviderConfigSummary {
    const account =
      config.kind === "service-account-store"
        ? config.credentials.client_email
        : `${config.credentials.cloudName} (key …${config.credentials.apiKey.slice(-4)})`;
    return {
      id: config.id,
      label: config.label,
      kind: config.kind,
      folder: config.folder,
      createdAt: config.createdAt.toISOString(),
      account,
    };
  }

  private hydrate(row: ProviderConfigRow): ProviderConfiguration {
    const base = {
      id: row.id,
      label: row.label,
      folder: row.folder,
      createdAt: new Date(row.created_at),
    };
    const raw = openCredentials(row.credentials, this.opts.encryption);
    switch (row.kind) {
      case "service-account-store": {
        const credentials = ServiceAccountCredentialsSchema.safeParse(raw);
        if (!credentials.success) throw unreadable(row.id);
        return { ...base, kind: "service-account-store", credentials: credentials.data };
      }
      case "cdn-media-store": {
        const credentials = CdnMediaCredentialsSchema.safeParse(raw);
        if (!credentials.success) throw unreadable(row.id);
        return { ...base, kind: "cdn-media-store", credentials: credentials.data };
      }
      default:
        throw new Error(`Provider configuration ${row.id} has unknown kind ${row.kind}`);
    }
  }
}

function unreadable(id: number): Error {
  return new Error(`Stored credentials for provider configuration ${id} are invalid`);
}
