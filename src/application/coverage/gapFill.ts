import type { Aoi } from "../../core/aoi/aoi.types";
import type { DateRange, SyncTarget } from "../../core/chunks/chunk.types";
import { logError, logInfo } from "../../shared/logging/log";
import type { SyncConfigInput } from "../sync-run/sync.config";
import type { RunStatus, RunSummary } from "../sync-run/sync.error-handler";
import { runSync, type SyncRunDeps } from "../sync-run/syncRun.usecase";
import type { CoverageReport } from "./coverageReport";

export type GapFillRun = {
  runId: string;
  bucket: string;
  range: DateRange;
  aois: Aoi[];
  targets: SyncTarget[];
};

export type GapFillSummary = {
  status: RunStatus;
  planned: number;
  runs: RunSummary[];
  notStarted: string[]; // run ids left after an aborted run
};

const compareText = (a: string, b: string) => (a < b ? -1 : a > b ? 1 : 0);

export const gapFillRunId = (bucket: string, range: DateRange): string =>
  `fill-${bucket}-${range.from}-${range.to}`;

/**
 * One sync run per (bucket, missing range), holding every AOI missing exactly
 * that range in that bucket and only the targets writing to it.
 */
export const planGapFill = (
  report: Pick<CoverageReport, "entries">,
  aois: readonly Aoi[],
  targets: readonly SyncTarget[]
): GapFillRun[] => {
  const aoiById = new Map(aois.map((aoi) => [aoi.poiId, aoi]));
  const runs = new Map<string, GapFillRun>();

  for (const entry of report.entries) {
    const aoi = aoiById.get(entry.poiId);
    const bucketTargets = targets.filter((target) => target.bucket === entry.bucket);
    if (!aoi || bucketTargets.length === 0) continue;

    for (const range of entry.missingRanges) {
      const runId = gapFillRunId(entry.bucket, range);
      const run = runs.get(runId);
      if (run) {
        run.aois.push(aoi);
      } else {
        runs.set(runId, { runId, bucket: entry.bucket, range, aois: [aoi], targets: bucketTargets });
      }
    }
  }

  return Array.from(runs.values()).sort(
    (a, b) =>
      compareText(a.bucket, b.bucket) ||
      compareText(a.range.from, b.range.from) ||
      compareText(a.range.to, b.range.to)
  );
};

/**
 * Syncs exactly the missing ranges of a coverage report, one run at a time.
 * Run ids are deterministic, so repeating the fill resumes it. An aborted run
 * stops the fill: the same configuration error would end every later run.
 */
export const fillCoverageGaps = async (
  deps: SyncRunDeps,
  input: {
    report: Pick<CoverageReport, "entries">;
    aois: readonly Aoi[];
    targets: readonly SyncTarget[];
    config: SyncConfigInput;
  }
): Promise<GapFillSummary> => {
  const plan = planGapFill(input.report, input.aois, input.targets);
  logInfo("fill.started", { runs: plan.length, runIds: plan.map((run) => run.runId) });

  const runs: RunSummary[] = [];
  let aborted = false;
  for (const run of plan) {
    const summary = await runSync(deps, {
      runId: run.runId,
      aois: run.aois,
      range: run.range,
      targets: run.targets,
      config: input.config
    });
    runs.push(summary);
    if (summary.status === "ABORTED") {
      aborted = true;
      break;
    }
  }

  const notStarted = plan.slice(runs.length).map((run) => run.runId);
  const status: RunStatus = aborted
    ? "ABORTED"
    : runs.every((summary) => summary.status === "SUCCESS")
      ? "SUCCESS"
      : "PARTIAL_FAILURE";

  const log = status === "SUCCESS" ? logInfo : logError;
  log("fill.completed", {
    status,
    planned: plan.length,
    completed: runs.filter((summary) => summary.status === "SUCCESS").length,
    incomplete: runs.filter((summary) => summary.status !== "SUCCESS").length,
    notStarted: notStarted.length
  });

  return { status, planned: plan.length, runs, notStarted };
};
