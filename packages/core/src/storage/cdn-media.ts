import { createHash } from "node:crypto";
import { z } from "zod";
import type { AdapterOptions, StorageAdapter, UploadResult } from "./types.js";
import { providerFailure, providerFetch, readBody } from "./provider-http.js";
import { stripExtension } from "./naming.js";
import type { UploadFailureCode } from "../internal/errors.js";
import { createStorageLogger } from "../observability/logger.js";

export const CDN_API_BASE = "https://api.cloudinary.com/v1_1";

const PROVIDER = "CDN media store";

const UploadResponseSchema = z.object({
  public_id: z.string().min(1),
  secure_url: z.string().optional(),
  existing: z.boolean().optional(),
});

const DestroyResponseSchema = z.object({ result: z.string() });

const ErrorResponseSchema = z.object({ error: z.object({ message: z.string() }) });

export interface CdnMediaAdapterOptions extends AdapterOptions {
  /** Clock for request signing. */
  now?: () => Date;
}

/**
 * Request signature: params sorted by key, joined as `k=v&k=v`, with the API
 * secret appended, hashed with SHA-1. Empty values are not signed.
 */
export function signParams(params: Record<string, string>, apiSecret: string): string {
  const payload = Object.keys(params)
    .filter((k) => params[k] !== "")
    .sort()
    .map((k) => `${k}=${params[k]}`)
    .join("&");
  return createHash("sha1").update(payload + apiSecret).digest("hex");
}

function failureCode(status: number): UploadFailureCode {
  return status === 401 || status === 403 ? "AUTH_REJECTED" : "PROVIDER_REJECTED";
}

function failureMessage(status: number, body: unknown): string {
  const parsed = ErrorResponseSchema.safeParse(body);
  if (parsed.success) return parsed.data.error.message;
  return typeof body === "string" && body ? body.slice(0, 200) : `HTTP ${status}`;
}

export function createCdnMediaAdapter(opts: CdnMediaAdapterOptions): StorageAdapter<"cdn-media-store"> {
  const log = createStorageLogger("cdn-media-store");
  const now = opts.now ?? (() => new Date());
  const timestamp = () => String(Math.floor(now().getTime() / 1000));

  return {
    kind: "cdn-media-store",

    async upload(input, config): Promise<UploadResult> {
      const { cloudName, apiKey, apiSecret } = config.credentials;
      // public_id is deterministic; never replace an asset another capture owns
      const signed: Record<string, string> = {
        overwrite: "false",
        public_id: stripExtension(input.filename),
        timestamp: timestamp(),
      };
      if (config.folder) signed.folder = config.folder;

      const form = new FormData();
      form.append("file", new Blob([new Uint8Array(input.bytes)], { type: input.contentType }), input.filename);
      for (const [k, v] of Object.entries(signed)) form.append(k, v);
      form.append("api_key", apiKey);
      form.append("signature", signParams(signed, apiSecret));

      const res = await providerFetch(
        `${CDN_API_BASE}/${encodeURIComponent(cloudName)}/image/upload`,
        { method: "POST", body: form },
        { op: "upload", provider: PROVIDER, timeoutMs: opts.timeoutMs },
      );
      const payload = await readBody(res);
      if (!res.ok) {
        throw providerFailure("upload", failureCode(res.status), failureMessage(res.status, payload), undefined, {
          status: res.status,
        });
      }
      const uploaded = UploadResponseSchema.safeParse(payload);
      if (!uploaded.success) {
        throw providerFailure("upload", "PROVIDER_REJECTED", "Upload response did not include a public_id");
      }
      if (uploaded.data.existing) {
        throw providerFailure(
          "upload",
          "PROVIDER_REJECTED",
          `Asset ${uploaded.data.public_id} already exists`,
          undefined,
          { publicId: uploaded.data.public_id },
        );
      }
      log.info({ publicId: uploaded.data.public_id, cloudName }, "Uploaded capture to CDN media store");
      return {
        remoteId: uploaded.data.public_id,
        remoteUrl: uploaded.data.secure_url ?? null,
      };
    },

    async delete(remoteId, config): Promise<void> {
      const { cloudName, apiKey, apiSecret } = config.credentials;
      const signed: Record<string, string> = {
        invalidate: "true",
        public_id: remoteId,
        timestamp: timestamp(),
      };
      const form = new FormData();
      for (const [k, v] of Object.entries(signed)) form.append(k, v);
      form.append("api_key", apiKey);
      form.append("signature", signParams(signed, apiSecret));

      const res = await providerFetch(
        `${CDN_API_BASE}/${encodeURIComponent(cloudName)}/image/destroy`,
        { method: "POST", body: form },
        { op: "delete", provider: PROVIDER, timeoutMs: opts.timeoutMs },
      );
      const payload = await readBody(res);
      if (!res.ok) {
        throw providerFailure("delete", failureCode(res.status), failureMessage(res.status, payload), undefined, {
          status: res.status,
        });
      }
      const destroyed = DestroyResponseSchema.safeParse(payload);
      const result = destroyed.success ? destroyed.data.result : undefined;
      if (result === "ok" || result === "not found") {
        if (result === "not found") log.info({ publicId: remoteId }, "CDN asset already gone");
        return;
      }
      throw providerFailure("delete", "PROVIDER_REJECTED", `Unexpected destroy result: ${result ?? "none"}`);
    },
  };
}
