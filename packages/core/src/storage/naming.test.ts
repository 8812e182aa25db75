import { describe, it, expect } from "vitest";
import { captureBaseName, captureFileName, extensionFor, stripExtension } from "./naming.js";

describe("capture naming", () => {
  const at = new Date("2024-11-05T09:08:07.654Z");

  it("formats UTC timestamp, token fragment and suffix", () => {
    expect(captureBaseName("AbCdEfGhIjKlMnOp", at)).toBe("20241105_090807_AbCdEfGh_capture");
  });

  it("derives the extension from the content type", () => {
    expect(captureFileName("AbCdEfGhIjKlMnOp", at, "image/png")).toBe("20241105_090807_AbCdEfGh_capture.png");
    expect(extensionFor("IMAGE/JPEG")).toBe(".jpg");
    expect(extensionFor("image/heif")).toBe(".heic");
    expect(extensionFor("image/gif")).toBe(".bin");
  });

  it("strips only the final extension", () => {
    expect(stripExtension("20241105_090807_AbCdEfGh_capture.jpg")).toBe("20241105_090807_AbCdEfGh_capture");
    expect(stripExtension("folder.v2/name")).toBe("folder.v2/name");
  });
});
