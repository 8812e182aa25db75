import type { ProviderConfiguration } from "../providers/types.js";
import type { StorageAdapters, UploadInput, UploadResult } from "./types.js";
import { createServiceAccountAdapter } from "./service-account.js";
import { createCdnMediaAdapter } from "./cdn-media.js";

export function createStorageAdapters(opts: { timeoutMs: number }): StorageAdapters {
  return {
    "service-account-store": createServiceAccountAdapter(opts),
    "cdn-media-store": createCdnMediaAdapter(opts),
  };
}

// The switch narrows `config` so each adapter only sees its own credential shape.
export function uploadWith(
  adapters: StorageAdapters,
  config: ProviderConfiguration,
  input: UploadInput,
): Promise<UploadResult> {
  switch (config.kind) {
    case "service-account-store":
      return adapters[config.kind].upload(input, config);
    case "cdn-media-store":
      return adapters[config.kind].upload(input, config);
  }
}

export function deleteWith(
  adapters: StorageAdapters,
  config: ProviderConfiguration,
  remoteId: string,
): Promise<void> {
  switch (config.kind) {
    case "service-account-store":
      return adapters[config.kind].delete(remoteId, config);
    case "cdn-media-store":
      return adapters[config.kind].delete(remoteId, config);
  }
}
