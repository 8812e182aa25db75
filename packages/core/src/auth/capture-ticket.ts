import { hmacBase64Url, safeEqual } from "./tokens.js";

/**
 * Capture tickets bind an upload to a prior visit of the capture page.
 * Format: `<issuedAtMs>.<HMAC-SHA256(secret, token + "." + issuedAtMs)>`.
 */
export function issueCaptureTicket(secret: string, token: string, now: Date = new Date()): string {
  const issuedAt = String(now.getTime());
  return `${issuedAt}.${hmacBase64Url(secret, `${token}.${issuedAt}`)}`;
}

export type TicketCheck = { ok: true } | { ok: false; reason: "MALFORMED" | "BAD_SIGNATURE" | "EXPIRED" };

export function verifyCaptureTicket(
  secret: string,
  token: string,
  ticket: string | undefined,
  ttlSeconds: number,
  now: Date = new Date(),
): TicketCheck {
  if (!ticket) return { ok: false, reason: "MALFORMED" };
  const dot = ticket.indexOf(".");
  if (dot <= 0) return { ok: false, reason: "MALFORMED" };
  const issuedAt = ticket.slice(0, dot);
  const signature = ticket.slice(dot + 1);
  if (!/^\d+$/.test(issuedAt)) return { ok: false, reason: "MALFORMED" };
  if (!safeEqual(signature, hmacBase64Url(secret, `${token}.${issuedAt}`))) {
    return { ok: false, reason: "BAD_SIGNATURE" };
  }
  const age = now.getTime() - Number(issuedAt);
  // Small allowance for clock skew between instances
  if (age < -30_000 || age > ttlSeconds * 1000) return { ok: false, reason: "EXPIRED" };
  return { ok: true };
}
