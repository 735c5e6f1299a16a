#!/usr/bin/env node
import { Command, CommanderError } from "commander";
import { formatRange, type CoverageReport } from "../application/coverage/coverageReport";
import type { SyncTarget } from "../core/chunks/chunk.types";
import { fillCoverageGapsFromEnv, runCoverageFromEnv } from "../composition/root";
import { logInfo, logWarn } from "../shared/logging/log";
import { reportCliFailure } from "./errorEnvelope";
import { collectTargets, parseDateOption, parsePositiveInt, resolveRange } from "./options";
import { exitCodeFor } from "./sync";

type CoverageCliOptions = {
  from?: string;
  to?: string;
  backfillDays?: number;
  target: SyncTarget[];
  fill?: boolean;
};

export const buildCoverageProgram = (): Command =>
  new Command()
    .name("mobility-coverage")
    .description("Report missing date partitions per AOI in the target buckets")
    .option("--from <date>", "first day to check (YYYY-MM-DD)", parseDateOption)
    .option("--to <date>", "last day to check (YYYY-MM-DD, default: yesterday UTC)", parseDateOption)
    .option("--backfill-days <n>", "check the n days ending at --to", parsePositiveInt)
    .option("--target <endpoint|SCHEMA|bucket>", "target, repeatable (overrides SYNC_TARGETS)", collectTargets, [])
    .option("--fill", "sync the missing ranges after reporting them")
    .exitOverride();

const logReport = (report: CoverageReport) => {
  for (const entry of report.entries) {
    if (entry.missingDates.length === 0) continue;
    logWarn("coverage.missing", {
      bucket: entry.bucket,
      poiId: entry.poiId,
      prefix: entry.prefix,
      missing: entry.missingDates.length,
      ranges: entry.missingRanges.map(formatRange)
    });
  }
  logInfo("coverage.completed", {
    from: report.range.from,
    to: report.range.to,
    expectedDays: report.expectedDays,
    complete: report.complete,
    incomplete: report.incomplete
  });
};

/**
 * Exit code 0 when every AOI is complete, 2 when any date is missing. With
 * `--fill` the code follows the gap-fill runs instead.
 */
export const executeCoverageCli = async (argv: string[] = process.argv, nowMs: number = Date.now()): Promise<number> => {
  try {
    const program = buildCoverageProgram();
    program.parse(argv);
    const options = program.opts<CoverageCliOptions>();
    const range = resolveRange(options, nowMs);

    if (options.fill) {
      const { report, fill } = await fillCoverageGapsFromEnv({ range, targets: options.target });
      logReport(report);
      return exitCodeFor(fill.status);
    }

    const report = await runCoverageFromEnv({ range, targets: options.target });
    logReport(report);
    return report.incomplete === 0 ? 0 : 2;
  } catch (err) {
    if (err instanceof CommanderError) return err.exitCode;
    reportCliFailure("coverage.failed", err);
    return 1;
  }
};

if (require.main === module) {
  void executeCoverageCli().then((code) => {
    process.exitCode = code;
  });
}
