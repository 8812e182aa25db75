import { createHmac, randomBytes, timingSafeEqual } from "node:crypto";

// 18 bytes = 144 bits, encoding to 24 base64url characters without padding
export const LINK_TOKEN_BYTES = 18;
export const LINK_TOKEN_PATTERN = /^[A-Za-z0-9_-]{16,64}$/;

export function randomToken(len = 32): string {
  // URL-safe base64 without padding
  const buf = randomBytes(len);
  return buf.toString("base64").replace(/\+/g, "-").replace(/\//g, "_").replace(/=+$/g, "");
}

export function makeLinkToken(): string {
  return randomToken(LINK_TOKEN_BYTES);
}

export function isWellFormedLinkToken(token: string): boolean {
  return LINK_TOKEN_PATTERN.test(token);
}

export function hmacBase64Url(secret: string, payload: string): string {
  return createHmac("sha256", secret).update(payload).digest("base64url");
}

export function safeEqual(a: string, b: string): boolean {
  const left = Buffer.from(a);
  const right = Buffer.from(b);
  return left.length === right.length && timingSafeEqual(left, right);
}
