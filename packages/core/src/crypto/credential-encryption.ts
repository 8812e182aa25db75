import { encryptValue, decryptValue, type EncMode } from "./encryption.js";
import type { AppConfig } from "../config/config.js";

const ENCRYPTED_MARKER = "__ll_encrypted";

export interface CredentialEncryptionOptions {
  mode: EncMode;
  masterKey?: Buffer;
}

export function resolveCredentialEncryption(
  config: Pick<AppConfig, "ENCRYPTION_MODE" | "ENCRYPTION_MASTER_KEY_B64">,
): CredentialEncryptionOptions {
  if (config.ENCRYPTION_MODE === "aes-gcm" && config.ENCRYPTION_MASTER_KEY_B64) {
    const masterKey = Buffer.from(config.ENCRYPTION_MASTER_KEY_B64, "base64");
    if (masterKey.length !== 32) {
      throw new Error("ENCRYPTION_MASTER_KEY_B64 must decode to 32 bytes for aes-gcm");
    }
    return { mode: "aes-gcm", masterKey };
  }
  return { mode: "none" };
}

/** Serializes a credential bundle for the `credentials` column. */
export function sealCredentials(value: unknown, opts: CredentialEncryptionOptions): string {
  const serialized = JSON.stringify(value);
  if (opts.mode !== "aes-gcm" || !opts.masterKey) return serialized;
  return JSON.stringify({ [ENCRYPTED_MARKER]: true, value: encryptValue(serialized, opts.masterKey) });
}

export function openCredentials(stored: string, opts: CredentialEncryptionOptions): unknown {
  const parsed: unknown = JSON.parse(stored);
  if (!isSealedCredentials(parsed)) return parsed;
  if (opts.mode !== "aes-gcm" || !opts.masterKey) {
    throw new Error("Credentials are encrypted but no master key is configured");
  }
  return JSON.parse(decryptValue(parsed.value, opts.masterKey));
}

export function isSealedCredentials(value: unknown): value is { value: string } {
  return (
    typeof value === "object" &&
    value !== null &&
    ENCRYPTED_MARKER in value &&
    "value" in value &&
    typeof value.value === "string"
  );
}
