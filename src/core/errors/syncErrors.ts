export type SyncErrorCode =
  | "config_invalid"
  | "vendor_transient"
  | "vendor_rejected"
  | "job_failed"
  | "poll_timeout"
  | "authorization_failed"
  | "transfer_failed";

export type SyncErrorContext = Partial<{
  chunkKey: string;
  jobId: string;
  status: number;
  poiId: string;
  key: string;
  field: string;
}>;

type SyncErrorArgs = {
  message: string;
  context?: SyncErrorContext;
  cause?: unknown;
};

export abstract class SyncError extends Error {
  abstract readonly code: SyncErrorCode;
  abstract readonly retryable: boolean;
  readonly context: SyncErrorContext;
  readonly cause?: unknown;

  protected constructor(args: SyncErrorArgs) {
    super(args.message);
    this.name = new.target.name;
    this.context = args.context ?? {};
    this.cause = args.cause;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** Malformed AOI, empty input, bad date range, rejected credentials. Never retried. */
export class ConfigError extends SyncError {
  readonly code = "config_invalid";
  readonly retryable = false;

  constructor(message: string, context?: SyncErrorContext) {
    super({ message, context });
  }
}

/** Network failure, timeout, 429 or 5xx from the vendor API. */
export class TransientApiError extends SyncError {
  readonly code = "vendor_transient";
  readonly retryable = true;

  constructor(args: SyncErrorArgs) {
    super(args);
  }
}

/** The vendor refused the request itself (non-auth 4xx); resubmitting the same payload would fail again. */
export class VendorRequestError extends SyncError {
  readonly code = "vendor_rejected";
  readonly retryable = false;

  constructor(args: SyncErrorArgs) {
    super(args);
  }
}

export type FailedJobStatus = "FAILED" | "CANCELLED";

export class JobFailedError extends SyncError {
  readonly code: "job_failed" | "poll_timeout" = "job_failed";
  readonly retryable = true;
  readonly jobStatus: FailedJobStatus;

  constructor(args: SyncErrorArgs & { jobStatus: FailedJobStatus }) {
    super(args);
    this.jobStatus = args.jobStatus;
  }
}

/** A job still not terminal after the maximum number of polls; retried like a failed job. */
export class PollTimeoutError extends JobFailedError {
  override readonly code = "poll_timeout";
  readonly polls: number;

  constructor(args: { jobId: string; polls: number; chunkKey?: string }) {
    super({
      message: `Job ${args.jobId} not finished after ${args.polls} polls`,
      context: { jobId: args.jobId, chunkKey: args.chunkKey },
      jobStatus: "FAILED"
    });
    this.polls = args.polls;
  }
}

/** Expired or rejected credentials while touching the object store. */
export class AuthorizationError extends SyncError {
  readonly code = "authorization_failed";
  readonly retryable = true;

  constructor(args: SyncErrorArgs) {
    super(args);
  }
}

export class TransferError extends SyncError {
  readonly code = "transfer_failed";
  readonly retryable: boolean;

  constructor(args: SyncErrorArgs & { retryable: boolean }) {
    super(args);
    this.retryable = args.retryable;
  }
}

export const isSyncError = (value: unknown): value is SyncError => value instanceof SyncError;
