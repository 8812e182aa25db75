export type LensLinkErrorKind =
  | "NOT_FOUND"
  | "VALIDATION"
  | "INVALID_REFERENCE"
  | "UPLOAD"
  | "DELETE";

export interface LensLinkErrorOptions {
  kind: LensLinkErrorKind;
  code: string;
  message?: string;
  status?: number;
  details?: unknown;
  cause?: unknown;
}

const DEFAULT_STATUS: Record<LensLinkErrorKind, number> = {
  NOT_FOUND: 404,
  VALIDATION: 400,
  INVALID_REFERENCE: 400,
  UPLOAD: 502,
  DELETE: 502,
};

export class LensLinkError extends Error {
  readonly kind: LensLinkErrorKind;
  readonly code: string;
  readonly status: number;
  readonly details?: unknown;

  constructor(opts: LensLinkErrorOptions) {
    super(opts.message ?? opts.code, opts.cause === undefined ? undefined : { cause: opts.cause });
    this.name = "LensLinkError";
    this.kind = opts.kind;
    this.code = opts.code;
    this.status = opts.status ?? DEFAULT_STATUS[opts.kind];
    this.details = opts.details;
  }

  static notFound(code: string, message?: string, details?: unknown) {
    return new LensLinkError({ kind: "NOT_FOUND", code, message, details });
  }

  static validation(code: string, message?: string, details?: unknown) {
    return new LensLinkError({ kind: "VALIDATION", code, message, details });
  }

  static invalidReference(code: string, message?: string, details?: unknown) {
    return new LensLinkError({ kind: "INVALID_REFERENCE", code, message, details });
  }

  /** Provider-side upload failure. Never retried by the caller. */
  static upload(code: UploadFailureCode, message?: string, cause?: unknown, details?: unknown) {
    return new LensLinkError({ kind: "UPLOAD", code, message, cause, details });
  }

  static delete(code: UploadFailureCode, message?: string, cause?: unknown, details?: unknown) {
    return new LensLinkError({ kind: "DELETE", code, message, cause, details });
  }
}

export type UploadFailureCode =
  | "AUTH_REJECTED"
  | "QUOTA_OR_OWNERSHIP"
  | "PROVIDER_REJECTED"
  | "NETWORK"
  | "TIMEOUT";

export function isLensLinkError(err: unknown, kind?: LensLinkErrorKind): err is LensLinkError {
  return err instanceof LensLinkError && (kind === undefined || err.kind === kind);
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
