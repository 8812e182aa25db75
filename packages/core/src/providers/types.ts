import { z } from "zod";

export const PROVIDER_KINDS = ["service-account-store", "cdn-media-store"] as const;

export type ProviderKind = (typeof PROVIDER_KINDS)[number];

export function isProviderKind(value: unknown): value is ProviderKind {
  return typeof value === "string" && (PROVIDER_KINDS as readonly string[]).includes(value);
}

// Google service-account key document; extra fields (project_id, token_uri, ...) are kept.
export const ServiceAccountCredentialsSchema = z
  .object({
    type: z.literal("service_account").optional(),
    client_email: z.string().email(),
    private_key: z.string().min(1),
  })
  .passthrough();

export const CdnMediaCredentialsSchema = z
  .object({
    cloudName: z.string().trim().min(1),
    apiKey: z.string().trim().min(1),
    apiSecret: z.string().trim().min(1),
  })
  .strict();

export type ServiceAccountCredentials = z.infer<typeof ServiceAccountCredentialsSchema>;
export type CdnMediaCredentials = z.infer<typeof CdnMediaCredentialsSchema>;

/** Credential payload per provider kind. */
export interface CredentialsByKind {
  "service-account-store": ServiceAccountCredentials;
  "cdn-media-store": CdnMediaCredentials;
}

type ConfigurationOf<K extends ProviderKind> = {
  id: number;
  label: string;
  kind: K;
  credentials: CredentialsByKind[K];
  folder: string | null;
  createdAt: Date;
};

export type ProviderConfiguration = {
  [K in ProviderKind]: ConfigurationOf<K>;
}[ProviderKind];

export type ProviderConfigOf<K extends ProviderKind> = Extract<ProviderConfiguration, { kind: K }>;

export interface ProviderConfigSummary {
  id: number;
  label: string;
  kind: ProviderKind;
  folder: string | null;
  createdAt: string;
  account: string;
}
