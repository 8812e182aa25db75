const EXTENSIONS: Record<string, string> = {
  "image/jpeg": ".jpg",
  "image/jpg": ".jpg",
  "image/png": ".png",
  "image/webp": ".webp",
  "image/heic": ".heic",
  "image/heif": ".heic",
};

export const CAPTURE_SUFFIX = "capture";

export function extensionFor(contentType: string): string {
  return EXTENSIONS[contentType.toLowerCase()] ?? ".bin";
}

/** `yyyyMMdd_HHmmss_<first 8 token chars>_capture`, in UTC. */
export function captureBaseName(token: string, at: Date): string {
  const iso = at.toISOString();
  const date = iso.slice(0, 10).replace(/-/g, "");
  const time = iso.slice(11, 19).replace(/:/g, "");
  return `${date}_${time}_${token.slice(0, 8)}_${CAPTURE_SUFFIX}`;
}

export function captureFileName(token: string, at: Date, contentType: string): string {
  return `${captureBaseName(token, at)}${extensionFor(contentType)}`;
}

export function stripExtension(filename: string): string {
  return filename.replace(/\.[^./]+$/, "");
}
