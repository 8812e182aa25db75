import { randomUUID } from "node:crypto";
import type { LinkRegistry } from "../links/link-registry.js";
import type { ProviderConfigRegistry } from "../providers/provider-config-registry.js";
import type { ProviderConfiguration } from "../providers/types.js";
import type { StorageAdapters } from "../storage/types.js";
import { deleteWith, uploadWith } from "../storage/dispatch.js";
import { captureFileName } from "../storage/naming.js";
import type { CaptureRecord, CaptureStore, CaptureOutcome } from "./capture-store.js";
import { LensLinkError, errorMessage } from "../internal/errors.js";
import { createCaptureLogger, tokenRef } from "../observability/logger.js";

export type PipelineState =
  | "Received"
  | "Resolving"
  | "ConfigMissing"
  | "Uploading"
  | "Uploaded"
  | "UploadFailed"
  | "Recorded";

export interface CaptureImage {
  bytes: Buffer;
  contentType: string;
}

export interface IngestResult {
  record: CaptureRecord;
  redirectTo: string;
  /** States visited, in order. */
  trail: PipelineState[];
}

export type RemoteDeleteStatus = "deleted" | "skipped" | "failed";

export interface CaptureDeleteResult {
  id: string;
  remote: RemoteDeleteStatus;
}

export interface LinkDeleteResult {
  token: string;
  captures: CaptureDeleteResult[];
}

export interface CaptureIngestionDeps {
  links: LinkRegistry;
  configs: Pick<ProviderConfigRegistry, "find">;
  captures: CaptureStore;
  adapters: StorageAdapters;
  now?: () => Date;
  newId?: () => string;
}

type ConfigLookup =
  | { status: "found"; config: ProviderConfiguration }
  | { status: "missing" }
  | { status: "error"; error: unknown };

export class CaptureIngestion {
  private readonly log = createCaptureLogger();
  private readonly now: () => Date;
  private readonly newId: () => string;

  constructor(private readonly deps: CaptureIngestionDeps) {
    this.now = deps.now ?? (() => new Date());
    this.newId = deps.newId ?? randomUUID;
  }

  /**
   * Stores one captured image for a link. Only an unknown token rejects;
   * every other failure is recorded and the destination is still returned.
   */
  async ingest(token: string, image: CaptureImage): Promise<IngestResult> {
    const trail: PipelineState[] = ["Received"];
    const link = this.deps.links.resolve(token);
    trail.push("Resolving");

    const capturedAt = this.now();
    const filename = captureFileName(token, capturedAt, image.contentType);
    let outcome: CaptureOutcome;
    let providerKind: ProviderConfiguration["kind"] | null = null;
    let remoteId: string | null = null;
    let remoteUrl: string | null = null;
    let failure: string | null = null;
    let uploadedWith: ProviderConfiguration | null = null;

    const lookup = this.lookupConfig(link.configId);
    if (lookup.status === "missing") {
      trail.push("ConfigMissing");
      outcome = "skipped";
      this.log.info({ token: tokenRef(token), configId: link.configId }, "No provider configuration; capture not uploaded");
    } else if (lookup.status === "error") {
      trail.push("UploadFailed");
      outcome = "failed";
      failure = errorMessage(lookup.error);
      this.log.error({ err: lookup.error, token: tokenRef(token), configId: link.configId }, "Provider configuration unreadable");
    } else {
      const { config } = lookup;
      providerKind = config.kind;
      trail.push("Uploading");
      try {
        const uploaded = await uploadWith(this.deps.adapters, config, {
          bytes: image.bytes,
          filename,
          contentType: image.contentType,
        });
        remoteId = uploaded.remoteId;
        remoteUrl = uploaded.remoteUrl;
        uploadedWith = config;
        outcome = "succeeded";
        trail.push("Uploaded");
      } catch (err) {
        outcome = "failed";
        failure = errorMessage(err);
        trail.push("UploadFailed");
        this.log.warn(
          {
            err,
            token: tokenRef(token),
            configId: config.id,
            kind: config.kind,
            code: err instanceof LensLinkError ? err.code : undefined,
          },
          "Capture upload failed",
        );
      }
    }

    const record: CaptureRecord = {
      id: this.newId(),
      linkToken: token,
      capturedAt,
      outcome,
      providerKind,
      remoteId,
      remoteUrl,
      filename,
      contentType: image.contentType,
      byteSize: image.bytes.length,
      errorMessage: failure,
    };
    try {
      this.deps.captures.insert(record);
    } catch (err) {
      if (uploadedWith && remoteId) await this.discardUnrecorded(uploadedWith, remoteId, record.id);
      throw err;
    }
    trail.push("Recorded");
    this.log.info({ captureId: record.id, token: tokenRef(token), outcome }, "Capture recorded");
    return { record, redirectTo: link.destinationUrl, trail };
  }

  /**
   * Removes a capture record. The remote object is deleted through the link's
   * current configuration when it still matches the provider that stored it.
   */
  async deleteCapture(id: string): Promise<CaptureDeleteResult> {
    const record = this.deps.captures.get(id);
    if (!record) throw LensLinkError.notFound("CAPTURE_NOT_FOUND", `Capture ${id} not found`);
    const remote = await this.deleteRemote(record);
    this.deps.captures.delete(id);
    this.log.info({ captureId: id, remote }, "Capture deleted");
    return { id, remote };
  }

  async deleteLink(token: string): Promise<LinkDeleteResult> {
    if (!this.deps.links.get(token)) throw LensLinkError.notFound("LINK_NOT_FOUND", "Link not found");
    const captures: CaptureDeleteResult[] = [];
    for (const record of this.deps.captures.listByLink(token)) {
      captures.push(await this.deleteCapture(record.id));
    }
    this.deps.links.remove(token);
    return { token, captures };
  }

  // Every uploaded object must stay reachable through a capture record.
  private async discardUnrecorded(config: ProviderConfiguration, remoteId: string, captureId: string) {
    this.log.error({ captureId, remoteId, kind: config.kind }, "Capture record not stored; removing uploaded object");
    try {
      await deleteWith(this.deps.adapters, config, remoteId);
    } catch (err) {
      this.log.error({ err, captureId, remoteId, kind: config.kind }, "Uploaded object left without a capture record");
    }
  }

  private lookupConfig(configId: number | null): ConfigLookup {
    if (configId === null) return { status: "missing" };
    try {
      const config = this.deps.configs.find(configId);
      return config ? { status: "found", config } : { status: "missing" };
    } catch (error) {
      return { status: "error", error };
    }
  }

  private async deleteRemote(record: CaptureRecord): Promise<RemoteDeleteStatus> {
    if (!record.remoteId || !record.providerKind) return "skipped";
    const link = this.deps.links.get(record.linkToken);
    const lookup = this.lookupConfig(link?.configId ?? null);
    if (lookup.status === "error") {
      this.log.error({ err: lookup.error, captureId: record.id }, "Provider configuration unreadable");
      return "failed";
    }
    if (lookup.status === "missing" || lookup.config.kind !== record.providerKind) {
      this.log.info(
        { captureId: record.id, kind: record.providerKind },
        "Current configuration does not match the stored provider; remote delete skipped",
      );
      return "skipped";
    }
    try {
      await deleteWith(this.deps.adapters, lookup.config, record.remoteId);
      return "deleted";
    } catch (err) {
      this.log.warn({ err, captureId: record.id, remoteId: record.remoteId }, "Remote delete failed");
      return "failed";
    }
  }
}
