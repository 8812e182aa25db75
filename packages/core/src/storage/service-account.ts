import { randomUUID } from "node:crypto";
import { JWT } from "google-auth-library";
import { z } from "zod";
import type { ProviderConfigOf } from "../providers/types.js";
import type { AdapterOptions, StorageAdapter, UploadInput, UploadResult } from "./types.js";
import { providerFailure, providerFetch, readBody, type ProviderOp } from "./provider-http.js";
import { errorMessage, type UploadFailureCode } from "../internal/errors.js";
import { createStorageLogger } from "../observability/logger.js";

type ServiceAccountConfig = ProviderConfigOf<"service-account-store">;

export const DRIVE_SCOPE = "https://www.googleapis.com/auth/drive.file";
export const DRIVE_UPLOAD_URL = "https://www.googleapis.com/upload/drive/v3/files";
export const DRIVE_FILES_URL = "https://www.googleapis.com/drive/v3/files";

const PROVIDER = "Google Drive";

const DriveFileSchema = z.object({
  id: z.string().min(1),
  webViewLink: z.string().optional(),
});

const DriveErrorSchema = z.object({
  error: z.object({
    message: z.string().optional(),
    errors: z.array(z.object({ reason: z.string().optional() })).optional(),
  }),
});

const QUOTA_REASONS = new Set(["storageQuotaExceeded", "quotaExceeded"]);

export function driveViewUrl(fileId: string): string {
  return `https://drive.google.com/file/d/${encodeURIComponent(fileId)}/view`;
}

// Consumer accounts reject files owned by a service account unless the parent
// folder belongs to a human; Drive reports that as a storage quota failure.
export function classifyDriveFailure(
  status: number,
  body: unknown,
): { code: UploadFailureCode; message: string; reasons: string[] } {
  const parsed = DriveErrorSchema.safeParse(body);
  const message = parsed.success
    ? (parsed.data.error.message ?? `HTTP ${status}`)
    : typeof body === "string" && body
      ? body.slice(0, 200)
      : `HTTP ${status}`;
  const reasons = parsed.success
    ? (parsed.data.error.errors ?? []).flatMap((e) => (e.reason ? [e.reason] : []))
    : [];
  if (status === 401) return { code: "AUTH_REJECTED", message, reasons };
  if (
    status === 403 &&
    (reasons.some((r) => QUOTA_REASONS.has(r)) || /storage quota/i.test(message))
  ) {
    return { code: "QUOTA_OR_OWNERSHIP", message, reasons };
  }
  return { code: "PROVIDER_REJECTED", message, reasons };
}

function multipartBody(input: UploadInput, folder: string | null) {
  const boundary = `lenslink-${randomUUID()}`;
  const metadata = {
    name: input.filename,
    mimeType: input.contentType,
    ...(folder ? { parents: [folder] } : {}),
  };
  const head =
    `--${boundary}\r\n` +
    "Content-Type: application/json; charset=UTF-8\r\n\r\n" +
    `${JSON.stringify(metadata)}\r\n` +
    `--${boundary}\r\n` +
    `Content-Type: ${input.contentType}\r\n\r\n`;
  const body = Buffer.concat([Buffer.from(head), input.bytes, Buffer.from(`\r\n--${boundary}--\r\n`)]);
  return { body, contentType: `multipart/related; boundary=${boundary}` };
}

export function createServiceAccountAdapter(
  opts: AdapterOptions,
): StorageAdapter<"service-account-store"> {
  const log = createStorageLogger("service-account-store");

  async function accessToken(config: ServiceAccountConfig, op: ProviderOp): Promise<string> {
    const client = new JWT({
      email: config.credentials.client_email,
      key: config.credentials.private_key,
      scopes: [DRIVE_SCOPE],
    });
    let token: string | null | undefined;
    try {
      ({ token } = await client.getAccessToken());
    } catch (err) {
      throw providerFailure(
        op,
        "AUTH_REJECTED",
        `Service account authentication failed: ${errorMessage(err)}`,
        err,
      );
    }
    if (!token) {
      throw providerFailure(op, "AUTH_REJECTED", "Service account returned no access token");
    }
    return token;
  }

  return {
    kind: "service-account-store",

    async upload(input, config): Promise<UploadResult> {
      const token = await accessToken(config, "upload");
      const { body, contentType } = multipartBody(input, config.folder);
      const url = `${DRIVE_UPLOAD_URL}?uploadType=multipart&supportsAllDrives=true&fields=id,name,webViewLink`;
      const res = await providerFetch(
        url,
        {
          method: "POST",
          headers: { Authorization: `Bearer ${token}`, "Content-Type": contentType },
          body,
        },
        { op: "upload", provider: PROVIDER, timeoutMs: opts.timeoutMs },
      );
      const payload = await readBody(res);
      if (!res.ok) {
        const failure = classifyDriveFailure(res.status, payload);
        throw providerFailure("upload", failure.code, failure.message, undefined, {
          status: res.status,
          reasons: failure.reasons,
        });
      }
      const file = DriveFileSchema.safeParse(payload);
      if (!file.success) {
        throw providerFailure("upload", "PROVIDER_REJECTED", "Drive response did not include a file id");
      }
      log.info({ fileId: file.data.id, folder: config.folder }, "Uploaded capture to Drive");
      return {
        remoteId: file.data.id,
        remoteUrl: file.data.webViewLink ?? driveViewUrl(file.data.id),
      };
    },

    async delete(remoteId, config): Promise<void> {
      const token = await accessToken(config, "delete");
      const res = await providerFetch(
        `${DRIVE_FILES_URL}/${encodeURIComponent(remoteId)}?supportsAllDrives=true`,
        { method: "DELETE", headers: { Authorization: `Bearer ${token}` } },
        { op: "delete", provider: PROVIDER, timeoutMs: opts.timeoutMs },
      );
      if (res.ok || res.status === 404) {
        if (res.status === 404) log.info({ fileId: remoteId }, "Drive file already gone");
        return;
      }
      const failure = classifyDriveFailure(res.status, await readBody(res));
      throw providerFailure("delete", failure.code, failure.message, undefined, {
        status: res.status,
        reasons: failure.reasons,
      });
    },
  };
}
