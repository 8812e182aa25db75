import type { Db } from "@lenslink/db";
import { isProviderKind, type ProviderKind } from "../providers/types.js";

export const CAPTURE_OUTCOMES = ["succeeded", "failed", "skipped"] as const;
export type CaptureOutcome = (typeof CAPTURE_OUTCOMES)[number];

export interface CaptureRecord {
  id: string;
  linkToken: string;
  capturedAt: Date;
  outcome: CaptureOutcome;
  /** Null when the link had no usable configuration. */
  providerKind: ProviderKind | null;
  remoteId: string | null;
  remoteUrl: string | null;
  filename: string;
  contentType: string | null;
  byteSize: number | null;
  errorMessage: string | null;
}

export interface CaptureStore {
  insert(record: CaptureRecord): void;
  get(id: string): CaptureRecord | null;
  /** Every capture, newest first. */
  list(): CaptureRecord[];
  listByLink(token: string): CaptureRecord[];
  delete(id: string): boolean;
}

interface CaptureRow {
  id: string;
  link_token: string;
  captured_at: string;
  outcome: string;
  provider_kind: string | null;
  remote_id: string | null;
  remote_url: string | null;
  filename: string;
  content_type: string | null;
  byte_size: number | null;
  error_message: string | null;
}

function toOutcome(value: string): CaptureOutcome {
  const match = CAPTURE_OUTCOMES.find((o) => o === value);
  if (!match) throw new Error(`Unknown capture outcome ${value}`);
  return match;
}

function toRecord(row: CaptureRow): CaptureRecord {
  return {
    id: row.id,
    linkToken: row.link_token,
    capturedAt: new Date(row.captured_at),
    outcome: toOutcome(row.outcome),
    providerKind: isProviderKind(row.provider_kind) ? row.provider_kind : null,
    remoteId: row.remote_id,
    remoteUrl: row.remote_url,
    filename: row.filename,
    contentType: row.content_type,
    byteSize: row.byte_size,
    errorMessage: row.error_message,
  };
}

export class SqliteCaptureStore implements CaptureStore {
  constructor(private readonly db: Db) {}

  insert(record: CaptureRecord): void {
    this.db
      .prepare<CaptureRow>(
        `INSERT INTO captures
           (id, link_token, captured_at, outcome, provider_kind, remote_id, remote_url,
            filename, content_type, byte_size, error_message)
         VALUES
           (@id, @link_token, @captured_at, @outcome, @provider_kind, @remote_id, @remote_url,
            @filename, @content_type, @byte_size, @error_message)`,
      )
      .run({
        id: record.id,
        link_token: record.linkToken,
        captured_at: record.capturedAt.toISOString(),
        outcome: record.outcome,
        provider_kind: record.providerKind,
        remote_id: record.remoteId,
        remote_url: record.remoteUrl,
        filename: record.filename,
        content_type: record.contentType,
        byte_size: record.byteSize,
        error_message: record.errorMessage,
      });
  }

  get(id: string): CaptureRecord | null {
    const row = this.db
      .prepare<[string], CaptureRow>("SELECT * FROM captures WHERE id = ?")
      .get(id);
    return row ? toRecord(row) : null;
  }

  list(): CaptureRecord[] {
    return this.db
      .prepare<[], CaptureRow>("SELECT * FROM captures ORDER BY captured_at DESC, rowid DESC")
      .all()
      .map(toRecord);
  }

  listByLink(token: string): CaptureRecord[] {
    return this.db
      .prepare<[string], CaptureRow>(
        "SELECT * FROM captures WHERE link_token = ? ORDER BY captured_at DESC, rowid DESC",
      )
      .all(token)
      .map(toRecord);
  }

  delete(id: string): boolean {
    return this.db.prepare<[string]>("DELETE FROM captures WHERE id = ?").run(id).changes > 0;
  }
}
