import { z } from "zod";

const intFromEnv = (fallback: number) =>
  z
    .string()
    .optional()
    .transform((v) => (v == null || v === "" ? fallback : Number(v)))
    .pipe(z.number().int().positive());

const EnvSchema = z.object({
  DATABASE_URL: z.string().min(1, "DATABASE_URL is required"),
  SECRET_KEY: z
    .string({ required_error: "SECRET_KEY is required" })
    .min(16, "SECRET_KEY must be at least 16 characters"),
  PORT: intFromEnv(3001),
  PUBLIC_BASE_URL: z
    .string()
    .url()
    .optional()
    .transform((v) => (v ? v.replace(/\/+$/, "") : undefined)),

  // Capture intake
  UPLOAD_MAX_BYTES: intFromEnv(10 * 1024 * 1024),
  CAPTURE_TICKET_TTL_SEC: intFromEnv(600),

  // Outbound storage provider calls
  PROVIDER_TIMEOUT_MS: intFromEnv(15_000),

  // Credential bundles at rest
  ENCRYPTION_MODE: z.enum(["none", "aes-gcm"]).default("none"),
  ENCRYPTION_MASTER_KEY_B64: z.string().optional(),

  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).optional(),
  LOG_PRETTY: z
    .enum(["true", "false"])
    .optional()
    .transform((v) => (v === undefined ? undefined : v === "true")),
});

export type AppConfig = z.infer<typeof EnvSchema>;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const msg = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join(", ");
    throw new Error(`Invalid environment: ${msg}`);
  }
  const cfg = parsed.data;
  if (cfg.ENCRYPTION_MODE === "aes-gcm" && !cfg.ENCRYPTION_MASTER_KEY_B64) {
    throw new Error("Invalid environment: ENCRYPTION_MASTER_KEY_B64 is required for aes-gcm");
  }
  return cfg;
}
