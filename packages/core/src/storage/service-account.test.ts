import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";

const { getAccessToken, jwtOptions } = vi.hoisted(() => ({
  getAccessToken: vi.fn(),
  jwtOptions: [] as unknown[],
}));

vi.mock("google-auth-library", () => ({
  JWT: vi.fn().mockImplementation(function (opts: unknown) {
    jwtOptions.push(opts);
    return { getAccessToken };
  }),
}));

import { createServiceAccountAdapter, classifyDriveFailure, DRIVE_SCOPE } from "./service-account.js";
import type { ProviderConfigOf } from "../providers/types.js";
import { LensLinkError } from "../internal/errors.js";

const config: ProviderConfigOf<"service-account-store"> = {
  id: 1,
  label: "Drive",
  kind: "service-account-store",
  credentials: { client_email: "bot@example.iam.gserviceaccount.com", private_key: "test-key" },
  folder: "folder-123",
  createdAt: new Date("2024-01-01T00:00:00Z"),
};

const input = {
  bytes: Buffer.from("image-bytes"),
  filename: "20240102_030405_abcdefgh_capture.jpg",
  contentType: "image/jpeg",
};

function jsonResponse(body: unknown, status = 200) {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

describe("service account adapter", () => {
  const fetchMock = vi.fn();

  beforeEach(() => {
    fetchMock.mockReset();
    getAccessToken.mockReset();
    jwtOptions.length = 0;
    getAccessToken.mockResolvedValue({ token: "access-token" });
    vi.stubGlobal("fetch", fetchMock);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("uploads multipart with folder parent and returns the view link", async () => {
    fetchMock.mockResolvedValue(
      jsonResponse({ id: "file-1", name: input.filename, webViewLink: "https://drive.example/view/file-1" }),
    );
    const adapter = createServiceAccountAdapter({ timeoutMs: 1000 });

    const result = await adapter.upload(input, config);

    expect(result).toEqual({ remoteId: "file-1", remoteUrl: "https://drive.example/view/file-1" });
    expect(jwtOptions[0]).toEqual({
      email: "bot@example.iam.gserviceaccount.com",
      key: "test-key",
      scopes: [DRIVE_SCOPE],
    });
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe(
      "https://www.googleapis.com/upload/drive/v3/files?uploadType=multipart&supportsAllDrives=true&fields=id,name,webViewLink",
    );
    expect(init.method).toBe("POST");
    expect(init.headers.Authorization).toBe("Bearer access-token");
    expect(init.headers["Content-Type"]).toMatch(/^multipart\/related; boundary=lenslink-/);
    const body = init.body.toString();
    expect(body).toContain(
      JSON.stringify({ name: input.filename, mimeType: "image/jpeg", parents: ["folder-123"] }),
    );
    expect(body).toContain("image-bytes");
  });

  it("omits parents without a folder and falls back to a constructed view url", async () => {
    fetchMock.mockResolvedValue(jsonResponse({ id: "file-2" }));
    const adapter = createServiceAccountAdapter({ timeoutMs: 1000 });

    const result = await adapter.upload(input, { ...config, folder: null });

    expect(result.remoteUrl).toBe("https://drive.google.com/file/d/file-2/view");
    const body = fetchMock.mock.calls[0][1].body.toString();
    expect(body).toContain(JSON.stringify({ name: input.filename, mimeType: "image/jpeg" }));
  });

  it("maps storage quota rejection to QUOTA_OR_OWNERSHIP", async () => {
    fetchMock.mockResolvedValue(
      jsonResponse(
        {
          error: {
            code: 403,
            message: "Service Accounts do not have storage quota.",
            errors: [{ reason: "storageQuotaExceeded" }],
          },
        },
        403,
      ),
    );
    const adapter = createServiceAccountAdapter({ timeoutMs: 1000 });

    const err = await adapter.upload(input, config).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(LensLinkError);
    expect(err).toMatchObject({ kind: "UPLOAD", code: "QUOTA_OR_OWNERSHIP", status: 502 });
  });

  it("reports token failures as AUTH_REJECTED without calling Drive", async () => {
    getAccessToken.mockRejectedValue(new Error("invalid_grant"));
    const adapter = createServiceAccountAdapter({ timeoutMs: 1000 });

    await expect(adapter.upload(input, config)).rejects.toMatchObject({
      kind: "UPLOAD",
      code: "AUTH_REJECTED",
      message: "Service account authentication failed: invalid_grant",
    });
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it("maps a fetch timeout to TIMEOUT", async () => {
    fetchMock.mockRejectedValue(Object.assign(new Error("aborted"), { name: "TimeoutError" }));
    const adapter = createServiceAccountAdapter({ timeoutMs: 50 });

    await expect(adapter.upload(input, config)).rejects.toMatchObject({
      code: "TIMEOUT",
      message: "Google Drive did not respond within 50ms",
    });
  });

  it("deletes by file id and treats 404 as already deleted", async () => {
    fetchMock.mockResolvedValueOnce(new Response(null, { status: 204 }));
    fetchMock.mockResolvedValueOnce(jsonResponse({ error: { message: "File not found" } }, 404));
    const adapter = createServiceAccountAdapter({ timeoutMs: 1000 });

    await expect(adapter.delete("file-1", config)).resolves.toBeUndefined();
    await expect(adapter.delete("file-1", config)).resolves.toBeUndefined();
    expect(fetchMock.mock.calls[0][0]).toBe(
      "https://www.googleapis.com/drive/v3/files/file-1?supportsAllDrives=true",
    );
    expect(fetchMock.mock.calls[0][1].method).toBe("DELETE");
  });

  it("surfaces other delete failures with kind DELETE", async () => {
    fetchMock.mockResolvedValue(jsonResponse({ error: { message: "Insufficient permissions" } }, 403));
    const adapter = createServiceAccountAdapter({ timeoutMs: 1000 });

    await expect(adapter.delete("file-1", config)).rejects.toMatchObject({
      kind: "DELETE",
      code: "PROVIDER_REJECTED",
      message: "Insufficient permissions",
    });
  });
});

describe("classifyDriveFailure", () => {
  it("detects quota wording without a reason list", () => {
    expect(classifyDriveFailure(403, { error: { message: "The user's storage quota has been exceeded." } }).code).toBe(
      "QUOTA_OR_OWNERSHIP",
    );
  });

  it("treats 401 as auth rejection and plain text bodies as messages", () => {
    expect(classifyDriveFailure(401, "Unauthorized")).toEqual({
      code: "AUTH_REJECTED",
      message: "Unauthorized",
      reasons: [],
    });
    expect(classifyDriveFailure(500, null).message).toBe("HTTP 500");
  });
});
