import type { ProviderConfigOf, ProviderKind } from "../providers/types.js";

export interface UploadInput {
  bytes: Buffer;
  filename: string;
  contentType: string;
}

export interface UploadResult {
  remoteId: string;
  remoteUrl: string | null;
}

/**
 * Uniform contract over one storage back-end.
 *
 * `upload` creates a new remote object on every call and must not be retried
 * blindly. `delete` is idempotent: a missing remote object resolves normally.
 * Failures reject with a `LensLinkError` of kind UPLOAD or DELETE.
 */
export interface StorageAdapter<K extends ProviderKind> {
  readonly kind: K;
  upload(input: UploadInput, config: ProviderConfigOf<K>): Promise<UploadResult>;
  delete(remoteId: string, config: ProviderConfigOf<K>): Promise<void>;
}

export type StorageAdapters = { [K in ProviderKind]: StorageAdapter<K> };

export interface AdapterOptions {
  /** Per-call deadline for outbound provider requests. */
  timeoutMs: number;
}
