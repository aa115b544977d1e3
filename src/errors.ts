export type ErrorKind =
  | "TransientIO"
  | "AuthExpired"
  | "SignatureMismatch"
  | "RemoteConflict"
  | "RemoteResourceMissing"
  | "ConfigInvalid"
  | "Cancelled"
  | "Fatal";

interface ErrorOptions {
  details?: Record<string, unknown>;
  cause?: unknown;
}

/** Base error for everything the pipeline raises on purpose. */
export class PatchPilotError extends Error {
  readonly code: string;
  readonly kind: ErrorKind;
  readonly details?: Record<string, unknown>;

  constructor(code: string, kind: ErrorKind, message: string, options?: ErrorOptions) {
    super(message, { cause: options?.cause });
    this.name = "PatchPilotError";
    this.code = code;
    this.kind = kind;
    this.details = options?.details;
  }
}

export class TransientIOError extends PatchPilotError {
  constructor(message: string, options?: ErrorOptions & { code?: string }) {
    super(options?.code ?? "TRANSIENT_IO", "TransientIO", message, options);
    this.name = "TransientIOError";
  }
}

/**
 * Non-2xx HTTP response. The kind is derived from the status so callers can
 * classify without re-inspecting it.
 */
export class HttpError extends PatchPilotError {
  readonly status: number;
  readonly url: string;

  constructor(status: number, url: string, message: string, options?: ErrorOptions) {
    super(`HTTP_${status}`, kindForStatus(status), message, options);
    this.name = "HttpError";
    this.status = status;
    this.url = url;
  }
}

export class AuthExpiredError extends PatchPilotError {
  constructor(message: string, options?: ErrorOptions) {
    super("AUTH_EXPIRED", "AuthExpired", message, options);
    this.name = "AuthExpiredError";
  }
}

export type SignatureFailure =
  | "unreadable_container"
  | "bundle_missing"
  | "metadata_missing"
  | "identity_mismatch"
  | "identifier_mismatch"
  | "seal_broken";

export class SignatureMismatchError extends PatchPilotError {
  readonly reason: SignatureFailure;

  constructor(reason: SignatureFailure, message: string, options?: ErrorOptions) {
    super("SIGNATURE_MISMATCH", "SignatureMismatch", message, options);
    this.name = "SignatureMismatchError";
    this.reason = reason;
  }
}

export class RemoteConflictError extends PatchPilotError {
  constructor(message: string, options?: ErrorOptions) {
    super("REMOTE_CONFLICT", "RemoteConflict", message, options);
    this.name = "RemoteConflictError";
  }
}

export class RemoteResourceMissingError extends PatchPilotError {
  readonly resource: string;
  readonly identifier: string;

  constructor(resource: string, identifier: string, options?: ErrorOptions) {
    super(`${resource.toUpperCase().replace(/\W+/g, "_")}_MISSING`, "RemoteResourceMissing", `${resource} not found: ${identifier}`, options);
    this.name = "RemoteResourceMissingError";
    this.resource = resource;
    this.identifier = identifier;
  }
}

export class ConfigInvalidError extends PatchPilotError {
  readonly problems: string[];

  constructor(problems: string[], options?: ErrorOptions) {
    super("CONFIG_INVALID", "ConfigInvalid", `Invalid configuration:\n  - ${problems.join("\n  - ")}`, options);
    this.name = "ConfigInvalidError";
    this.problems = problems;
  }
}

export class CancelledError extends PatchPilotError {
  constructor(message = "Run cancelled") {
    super("CANCELLED", "Cancelled", message);
    this.name = "CancelledError";
  }
}

export class FatalError extends PatchPilotError {
  constructor(code: string, message: string, options?: ErrorOptions) {
    super(code, "Fatal", message, options);
    this.name = "FatalError";
  }
}

export function kindForStatus(status: number): ErrorKind {
  if (status === 401) return "AuthExpired";
  if (status === 404) return "RemoteResourceMissing";
  if (status === 409) return "RemoteConflict";
  if (status === 408 || status === 429 || status >= 500) return "TransientIO";
  return "Fatal";
}

/**
 * Wrap anything thrown into a PatchPilotError. Errors from fetch itself
 * (DNS, reset sockets, aborted timers) surface as TypeError/DOMException and
 * are transient; other unknown errors are fatal.
 */
export function toPatchPilotError(err: unknown): PatchPilotError {
  if (err instanceof PatchPilotError) {
    return err;
  }
  if (err instanceof Error) {
    if (err.name === "TimeoutError" || err.name === "AbortError") {
      return new TransientIOError(`Request timed out: ${err.message}`, { code: "TIMEOUT", cause: err });
    }
    if (err instanceof TypeError && err.message === "fetch failed") {
      return new TransientIOError(describeFetchFailure(err), { code: "NETWORK", cause: err });
    }
    const code = errnoCode(err);
    if (code !== undefined && TRANSIENT_ERRNO.has(code)) {
      return new TransientIOError(err.message, { code, cause: err });
    }
    return new FatalError("INTERNAL", err.message, { cause: err });
  }
  return new FatalError("INTERNAL", String(err));
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

const TRANSIENT_ERRNO = new Set(["ECONNRESET", "ECONNREFUSED", "ETIMEDOUT", "EPIPE", "EAI_AGAIN", "ENOTFOUND"]);

function errnoCode(err: Error): string | undefined {
  if ("code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}

function describeFetchFailure(err: TypeError): string {
  const cause = err.cause;
  if (cause instanceof Error) {
    return `Network failure: ${cause.message}`;
  }
  return "Network failure";
}

/** A retryable error that used up its attempts; always fatal. */
export class RetryExhaustedError extends PatchPilotError {
  readonly attempts: number;
  readonly lastError: PatchPilotError;

  constructor(lastError: PatchPilotError, attempts: number) {
    super(lastError.code, "Fatal", `${lastError.message} (gave up after ${attempts} attempts)`, {
      cause: lastError,
      details: { attempts, lastKind: lastError.kind }
    });
    this.name = "RetryExhaustedError";
    this.attempts = attempts;
    this.lastError = lastError;
  }
}
