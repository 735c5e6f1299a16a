#!/usr/bin/env node
import { Command, CommanderError } from "commander";
import type { RunStatus } from "../application/sync-run/sync.error-handler";
import type { SyncTarget } from "../core/chunks/chunk.types";
import { planSyncFromEnv, runSyncFromEnv } from "../composition/root";
import { logInfo } from "../shared/logging/log";
import { reportCliFailure } from "./errorEnvelope";
import { collectTargets, defaultRunId, parseDateOption, parsePositiveInt, resolveRange } from "./options";

export type SyncCliOptions = {
  from?: string;
  to?: string;
  backfillDays?: number;
  runId?: string;
  target: SyncTarget[];
  dryRun?: boolean;
};

export const EXIT_SUCCESS = 0;
export const EXIT_FATAL = 1;
export const EXIT_INCOMPLETE = 2;

export const exitCodeFor = (status: RunStatus): number => (status === "SUCCESS" ? EXIT_SUCCESS : EXIT_INCOMPLETE);

export const buildSyncProgram = (): Command =>
  new Command()
    .name("mobility-sync")
    .description("Pull vendor mobility data for every AOI and copy it into the target buckets")
    .option("--from <date>", "first day to sync (YYYY-MM-DD)", parseDateOption)
    .option("--to <date>", "last day to sync (YYYY-MM-DD, default: yesterday UTC)", parseDateOption)
    .option("--backfill-days <n>", "sync the n days ending at --to", parsePositiveInt)
    .option("--run-id <id>", "progress key; re-running with the same id resumes (default: sync-<from>-<to>)")
    .option("--target <endpoint|SCHEMA|bucket>", "sync target, repeatable (overrides SYNC_TARGETS)", collectTargets, [])
    .option("--dry-run", "print the chunk plan without contacting the vendor")
    .exitOverride();

export const executeSyncCli = async (argv: string[] = process.argv, nowMs: number = Date.now()): Promise<number> => {
  try {
    const program = buildSyncProgram();
    program.parse(argv);
    const options = program.opts<SyncCliOptions>();
    const range = resolveRange(options, nowMs);

    if (options.dryRun) {
      const plan = await planSyncFromEnv({ range, targets: options.target });
      logInfo("sync.plan", { from: range.from, to: range.to, aois: plan.aois, days: plan.days, chunks: plan.chunks.length });
      for (const chunk of plan.chunks) {
        logInfo("sync.plan.chunk", {
          chunkKey: chunk.key,
          bucket: chunk.target.bucket,
          aois: chunk.aois.length,
          from: chunk.window.from,
          to: chunk.window.to
        });
      }
      return EXIT_SUCCESS;
    }

    const summary = await runSyncFromEnv({
      range,
      runId: options.runId ?? defaultRunId(range),
      targets: options.target
    });
    return exitCodeFor(summary.status);
  } catch (err) {
    if (err instanceof CommanderError) return err.exitCode;
    reportCliFailure("sync.failed", err);
    return EXIT_FATAL;
  }
};

if (require.main === module) {
  void executeSyncCli().then((code) => {
    process.exitCode = code;
  });
}
