import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { createHash } from "node:crypto";
import { createCdnMediaAdapter, signParams } from "./cdn-media.js";
import type { ProviderConfigOf } from "../providers/types.js";

const config: ProviderConfigOf<"cdn-media-store"> = {
  id: 2,
  label: "Media",
  kind: "cdn-media-store",
  credentials: { cloudName: "demo-cloud", apiKey: "test-key", apiSecret: "test-secret" },
  folder: "captures",
  createdAt: new Date("2024-01-01T00:00:00Z"),
};

const input = {
  bytes: Buffer.from("png-bytes"),
  filename: "20240102_030405_abcdefgh_capture.png",
  contentType: "image/png",
};

const fixedNow = () => new Date("2024-01-02T03:04:05Z");
const TS = "1704164645";

function jsonResponse(body: unknown, status = 200) {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

describe("signParams", () => {
  it("hashes sorted params followed by the secret", () => {
    const expected = createHash("sha1").update("a=1&b=2test-secret").digest("hex");
    expect(signParams({ b: "2", a: "1" }, "test-secret")).toBe(expected);
  });

  it("skips empty values", () => {
    expect(signParams({ a: "1", folder: "" }, "s")).toBe(signParams({ a: "1" }, "s"));
  });
});

describe("cdn media adapter", () => {
  const fetchMock = vi.fn();

  beforeEach(() => {
    fetchMock.mockReset();
    vi.stubGlobal("fetch", fetchMock);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("uploads a signed form with public_id derived from the filename", async () => {
    fetchMock.mockResolvedValue(
      jsonResponse({
        public_id: "captures/20240102_030405_abcdefgh_capture",
        secure_url: "https://cdn.example/captures/20240102_030405_abcdefgh_capture.png",
      }),
    );
    const adapter = createCdnMediaAdapter({ timeoutMs: 1000, now: fixedNow });

    const result = await adapter.upload(input, config);

    expect(result).toEqual({
      remoteId: "captures/20240102_030405_abcdefgh_capture",
      remoteUrl: "https://cdn.example/captures/20240102_030405_abcdefgh_capture.png",
    });
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe("https://api.cloudinary.com/v1_1/demo-cloud/image/upload");
    const form: FormData = init.body;
    expect(form.get("public_id")).toBe("20240102_030405_abcdefgh_capture");
    expect(form.get("overwrite")).toBe("false");
    expect(form.get("folder")).toBe("captures");
    expect(form.get("timestamp")).toBe(TS);
    expect(form.get("api_key")).toBe("test-key");
    expect(form.get("signature")).toBe(
      signParams(
        {
          overwrite: "false",
          public_id: "20240102_030405_abcdefgh_capture",
          timestamp: TS,
          folder: "captures",
        },
        "test-secret",
      ),
    );
    const file = form.get("file");
    expect(file).toBeInstanceOf(Blob);
  });

  it("does not send a folder when none is configured", async () => {
    fetchMock.mockResolvedValue(jsonResponse({ public_id: "x" }));
    const adapter = createCdnMediaAdapter({ timeoutMs: 1000, now: fixedNow });

    const result = await adapter.upload(input, { ...config, folder: null });

    expect(result.remoteUrl).toBeNull();
    expect(fetchMock.mock.calls[0][1].body.has("folder")).toBe(false);
  });

  it("refuses to reuse an asset that already exists under the same public_id", async () => {
    fetchMock.mockResolvedValue(
      jsonResponse({
        public_id: "captures/20240102_030405_abcdefgh_capture",
        secure_url: "https://cdn.example/captures/20240102_030405_abcdefgh_capture.png",
        existing: true,
      }),
    );
    const adapter = createCdnMediaAdapter({ timeoutMs: 1000, now: fixedNow });

    await expect(adapter.upload(input, config)).rejects.toMatchObject({
      kind: "UPLOAD",
      code: "PROVIDER_REJECTED",
      message: "Asset captures/20240102_030405_abcdefgh_capture already exists",
      details: { publicId: "captures/20240102_030405_abcdefgh_capture" },
    });
  });

  it("maps a rejected key to AUTH_REJECTED with the provider message", async () => {
    fetchMock.mockResolvedValue(jsonResponse({ error: { message: "Invalid Signature" } }, 401));
    const adapter = createCdnMediaAdapter({ timeoutMs: 1000, now: fixedNow });

    await expect(adapter.upload(input, config)).rejects.toMatchObject({
      kind: "UPLOAD",
      code: "AUTH_REJECTED",
      message: "Invalid Signature",
    });
  });

  it("maps a network failure to NETWORK", async () => {
    fetchMock.mockRejectedValue(new TypeError("fetch failed"));
    const adapter = createCdnMediaAdapter({ timeoutMs: 1000, now: fixedNow });

    await expect(adapter.upload(input, config)).rejects.toMatchObject({
      code: "NETWORK",
      message: "CDN media store request failed: fetch failed",
    });
  });

  it("destroys by public id, accepting ok and not found", async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ result: "ok" }));
    fetchMock.mockResolvedValueOnce(jsonResponse({ result: "not found" }));
    const adapter = createCdnMediaAdapter({ timeoutMs: 1000, now: fixedNow });

    await adapter.delete("captures/pic", config);
    await adapter.delete("captures/pic", config);

    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe("https://api.cloudinary.com/v1_1/demo-cloud/image/destroy");
    expect(init.body.get("public_id")).toBe("captures/pic");
    expect(init.body.get("invalidate")).toBe("true");
    expect(init.body.get("signature")).toBe(
      signParams({ invalidate: "true", public_id: "captures/pic", timestamp: TS }, "test-secret"),
    );
  });

  it("rejects an unexpected destroy result", async () => {
    fetchMock.mockResolvedValue(jsonResponse({ result: "error" }));
    const adapter = createCdnMediaAdapter({ timeoutMs: 1000, now: fixedNow });

    await expect(adapter.delete("captures/pic", config)).rejects.toMatchObject({
      kind: "DELETE",
      code: "PROVIDER_REJECTED",
      message: "Unexpected destroy result: error",
    });
  });
});
