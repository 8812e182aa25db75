import { describe, it, expect } from "vitest";
import { makeLinkToken, isWellFormedLinkToken, randomToken, safeEqual } from "./tokens.js";
import { issueCaptureTicket, verifyCaptureTicket } from "./capture-ticket.js";

describe("link tokens", () => {
  it("are 24 url-safe characters carrying 144 bits", () => {
    const token = makeLinkToken();
    expect(token).toMatch(/^[A-Za-z0-9_-]{24}$/);
    expect(isWellFormedLinkToken(token)).toBe(true);
  });

  it("do not repeat across many draws", () => {
    const seen = new Set(Array.from({ length: 2000 }, () => makeLinkToken()));
    expect(seen.size).toBe(2000);
  });

  it("rejects malformed tokens", () => {
    expect(isWellFormedLinkToken("short")).toBe(false);
    expect(isWellFormedLinkToken("has/slash-and-more-chars")).toBe(false);
    expect(isWellFormedLinkToken("")).toBe(false);
  });

  it("randomToken honours the requested byte length", () => {
    expect(randomToken(3)).toHaveLength(4);
  });

  it("safeEqual compares in constant time and handles length mismatch", () => {
    expect(safeEqual("abc", "abc")).toBe(true);
    expect(safeEqual("abc", "abd")).toBe(false);
    expect(safeEqual("abc", "abcd")).toBe(false);
  });
});

describe("capture tickets", () => {
  const secret = "test-secret-key-0123";
  const token = "AAAAAAAAAAAAAAAAAAAAAAAA";
  const issued = new Date("2024-05-01T10:00:00.000Z");

  it("verifies a fresh ticket for the same token", () => {
    const ticket = issueCaptureTicket(secret, token, issued);
    expect(ticket.startsWith(`${issued.getTime()}.`)).toBe(true);
    expect(verifyCaptureTicket(secret, token, ticket, 600, new Date(issued.getTime() + 1000))).toEqual({
      ok: true,
    });
  });

  it("rejects tickets for another token or secret", () => {
    const ticket = issueCaptureTicket(secret, token, issued);
    expect(verifyCaptureTicket(secret, "BBBBBBBBBBBBBBBBBBBBBBBB", ticket, 600, issued)).toEqual({
      ok: false,
      reason: "BAD_SIGNATURE",
    });
    expect(verifyCaptureTicket("other-secret-key-999", token, ticket, 600, issued)).toEqual({
      ok: false,
      reason: "BAD_SIGNATURE",
    });
  });

  it("expires tickets after the ttl", () => {
    const ticket = issueCaptureTicket(secret, token, issued);
    const later = new Date(issued.getTime() + 601_000);
    expect(verifyCaptureTicket(secret, token, ticket, 600, later)).toEqual({
      ok: false,
      reason: "EXPIRED",
    });
  });

  it("treats missing or garbled tickets as malformed", () => {
    expect(verifyCaptureTicket(secret, token, undefined, 600)).toEqual({
      ok: false,
      reason: "MALFORMED",
    });
    expect(verifyCaptureTicket(secret, token, "no-dot", 600)).toEqual({
      ok: false,
      reason: "MALFORMED",
    });
    expect(verifyCaptureTicket(secret, token, "abc.def", 600)).toEqual({
      ok: false,
      reason: "MALFORMED",
    });
  });
});
