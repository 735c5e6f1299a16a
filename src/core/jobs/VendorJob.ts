export type VendorJobStatus = "SUBMITTED" | "RUNNING" | "SUCCESS" | "FAILED" | "CANCELLED";

export type TerminalJobStatus = Extract<VendorJobStatus, "SUCCESS" | "FAILED" | "CANCELLED">;

export type VendorJob = {
  jobId: string;
  status: VendorJobStatus;
  polls: number;
  outputLocation?: string;
  errorMessage?: string;
};

export type JobStatusReport = {
  status: VendorJobStatus;
  outputLocation?: string;
  errorMessage?: string;
};

const allowedTransitions: Record<VendorJobStatus, readonly VendorJobStatus[]> = {
  SUBMITTED: ["SUBMITTED", "RUNNING", "SUCCESS", "FAILED", "CANCELLED"],
  RUNNING: ["RUNNING", "SUCCESS", "FAILED", "CANCELLED"],
  SUCCESS: [],
  FAILED: [],
  CANCELLED: []
};

export const isTerminal = (status: VendorJobStatus): status is TerminalJobStatus =>
  status === "SUCCESS" || status === "FAILED" || status === "CANCELLED";

export class InvalidJobTransitionError extends Error {
  constructor(readonly from: VendorJobStatus, readonly to: VendorJobStatus) {
    super(`Invalid job transition ${from} -> ${to}`);
    this.name = "InvalidJobTransitionError";
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export const submittedJob = (jobId: string): VendorJob => ({ jobId, status: "SUBMITTED", polls: 0 });

/**
 * Applies one poll result. A job only moves forward; RUNNING never goes back to
 * SUBMITTED and terminal states are final.
 */
export const applyPollResult = (job: VendorJob, report: JobStatusReport): VendorJob => {
  // a RUNNING job reported as queued again is still running
  const next = job.status === "RUNNING" && report.status === "SUBMITTED" ? "RUNNING" : report.status;
  if (!allowedTransitions[job.status].includes(next)) {
    throw new InvalidJobTransitionError(job.status, next);
  }

  return {
    ...job,
    status: next,
    polls: job.polls + 1,
    outputLocation: report.outputLocation ?? job.outputLocation,
    errorMessage: report.errorMessage ?? job.errorMessage
  };
};

const vendorStatusMap: Record<string, VendorJobStatus> = {
  QUEUED: "SUBMITTED",
  SCHEDULED: "SUBMITTED",
  SUBMITTED: "SUBMITTED",
  PENDING: "SUBMITTED",
  RUNNING: "RUNNING",
  IN_PROGRESS: "RUNNING",
  SUCCESS: "SUCCESS",
  SUCCEEDED: "SUCCESS",
  FAILED: "FAILED",
  CANCELLED: "CANCELLED",
  CANCELED: "CANCELLED"
};

export const mapVendorStatus = (raw: string): VendorJobStatus | undefined => vendorStatusMap[raw.trim().toUpperCase()];
