import type { Chunk } from "../../core/chunks/chunk.types";
import { JobFailedError, PollTimeoutError, TransientApiError } from "../../core/errors/syncErrors";
import { encodeChunkGeometries } from "../../core/geometry/encodeGeometry";
import { applyPollResult, submittedJob, type JobStatusReport, type VendorJob } from "../../core/jobs/VendorJob";
import type { SubmitJobRequest, VendorJobApi } from "../../ports/VendorJobApi";
import { errorMessage, logInfo, logWarn } from "../../shared/logging/log";
import type { Clock } from "../../shared/time/clock";

export type VendorJobRunnerOptions = {
  pollIntervalMs: number;
  maxPolls: number;
  maxConsecutivePollErrors: number;
};

export type VendorJobHooks = {
  onSubmitted?: (job: VendorJob) => Promise<void> | void;
};

export const buildSubmitRequest = (chunk: Chunk): SubmitJobRequest => ({
  endpoint: chunk.target.endpoint,
  payload: {
    date_range: { from_date: chunk.window.from, to_date: chunk.window.to },
    schema_type: chunk.target.schema,
    ...encodeChunkGeometries(chunk.aois)
  }
});

/**
 * Submits the chunk's job and polls it until it is terminal.
 *
 * Resolves with the SUCCESS job (output location set). Rejects with
 * JobFailedError on FAILED/CANCELLED, PollTimeoutError once `maxPolls` polls
 * have seen no terminal status, and TransientApiError when the status endpoint
 * keeps failing `maxConsecutivePollErrors` times in a row.
 */
export const runVendorJob = async (
  deps: { api: VendorJobApi; clock: Clock },
  chunk: Chunk,
  options: VendorJobRunnerOptions,
  hooks: VendorJobHooks = {}
): Promise<VendorJob> => {
  const request = buildSubmitRequest(chunk);
  const submitted = await deps.api.submitJob(request);
  let job = submittedJob(submitted.jobId);
  logInfo("job.submitted", {
    chunkKey: chunk.key,
    jobId: job.jobId,
    requestId: submitted.requestId ?? null,
    aois: chunk.aois.length,
    from: chunk.window.from,
    to: chunk.window.to
  });
  await hooks.onSubmitted?.(job);

  let consecutiveErrors = 0;
  for (let poll = 1; poll <= options.maxPolls; poll += 1) {
    await deps.clock.sleep(options.pollIntervalMs);

    let report: JobStatusReport;
    try {
      report = await deps.api.getJobStatus(job.jobId);
    } catch (err) {
      if (!(err instanceof TransientApiError)) throw err;
      consecutiveErrors += 1;
      logWarn("job.poll_failed", {
        chunkKey: chunk.key,
        jobId: job.jobId,
        poll,
        consecutiveErrors,
        reason: errorMessage(err)
      });
      if (consecutiveErrors >= options.maxConsecutivePollErrors) throw err;
      continue;
    }

    consecutiveErrors = 0;
    const previous = job.status;
    job = applyPollResult(job, report);
    if (job.status !== previous) {
      logInfo("job.status_changed", { chunkKey: chunk.key, jobId: job.jobId, from: previous, to: job.status, poll });
    }

    if (job.status === "SUCCESS") {
      if (!job.outputLocation) {
        throw new JobFailedError({
          message: `Job ${job.jobId} succeeded without an output location`,
          context: { chunkKey: chunk.key, jobId: job.jobId },
          jobStatus: "FAILED"
        });
      }
      return job;
    }
    if (job.status === "FAILED" || job.status === "CANCELLED") {
      throw new JobFailedError({
        message: `Job ${job.jobId} ${job.status}: ${job.errorMessage ?? "no reason given"}`,
        context: { chunkKey: chunk.key, jobId: job.jobId },
        jobStatus: job.status
      });
    }
  }

  throw new PollTimeoutError({ jobId: job.jobId, polls: options.maxPolls, chunkKey: chunk.key });
};
