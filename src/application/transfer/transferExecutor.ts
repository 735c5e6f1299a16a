import type { Aoi } from "../../core/aoi/aoi.types";
import type { Chunk, TransferCounters } from "../../core/chunks/chunk.types";
import { AuthorizationError, TransferError } from "../../core/errors/syncErrors";
import {
  aoiPrefix,
  datePartitionPrefix,
  normalizeSourcePrefix,
  parseVendorObjectPath
} from "../../core/layout/destinationLayout";
import type { ObjectStore, SourceStoreFactory, StoredObject } from "../../ports/ObjectStore";
import type { Credentials } from "../../ports/RoleAssumer";
import { createLimiter } from "../../shared/concurrency/limiter";
import { logInfo, logWarn } from "../../shared/logging/log";
import { retry } from "../../shared/retry/retry";
import type { Clock } from "../../shared/time/clock";
import type { CredentialBroker } from "../credentials/credentialBroker";

export type CredentialSource = Pick<CredentialBroker, "getCredentials" | "refreshAfterAuthFailure">;

export type TransferDeps = {
  credentials: CredentialSource;
  openSourceStore: SourceStoreFactory;
  destinationStore: ObjectStore;
  clock: Clock;
};

export type TransferOptions = {
  sourceBucket: string;
  contentSuffix: string;
  transferConcurrency: number;
  objectRetries?: number;
  objectRetryDelayMs?: number;
};

export type PlannedCopy = {
  source: StoredObject;
  destinationKey: string;
  destinationPrefix: string;
  date: string;
  poiId: string;
};

export type TransferPlan = {
  copies: PlannedCopy[];
  listed: number;
  matched: number;
  ignored: number;
};

export type TransferResult = TransferCounters & {
  destinationPrefixes: string[];
};

const SAMPLE_SIZE = 5;

const resolveAoi = (chunk: Chunk, poiId: string | undefined, key: string): Aoi => {
  if (poiId != null) {
    const match = chunk.aois.find((aoi) => aoi.poiId === poiId);
    if (!match) {
      throw new TransferError({
        message: `Output object ${key} belongs to unknown poi_id ${poiId}`,
        context: { chunkKey: chunk.key, key, poiId },
        retryable: false
      });
    }
    return match;
  }

  const only = chunk.aois.length === 1 ? chunk.aois[0] : undefined;
  if (!only) {
    throw new TransferError({
      message: `Output object ${key} has no poi_id partition and the chunk holds ${chunk.aois.length} AOIs`,
      context: { chunkKey: chunk.key, key },
      retryable: false
    });
  }
  return only;
};

/**
 * Maps the vendor's output objects onto the canonical destination layout.
 * Pure: the listing is passed in so the mapping can be checked on its own.
 */
export const planTransfer = (
  chunk: Chunk,
  outputLocation: string,
  sourceObjects: readonly StoredObject[],
  contentSuffix: string
): TransferPlan => {
  const prefix = normalizeSourcePrefix(outputLocation);
  const copies: PlannedCopy[] = [];
  const destinations = new Map<string, string>();
  let matched = 0;
  let ignored = 0;

  for (const object of sourceObjects) {
    if (!object.key.endsWith(contentSuffix)) continue;
    matched += 1;

    const relative = object.key.startsWith(prefix) ? object.key.slice(prefix.length) : object.key;
    const path = parseVendorObjectPath(relative);
    if (path.date == null || path.rest === "") {
      ignored += 1;
      continue;
    }

    const aoi = resolveAoi(chunk, path.poiId, object.key);
    const destinationKey = `${datePartitionPrefix(aoi, path.date)}${path.rest}`;
    const previous = destinations.get(destinationKey);
    if (previous != null) {
      throw new TransferError({
        message: `Output objects ${previous} and ${object.key} map to the same destination ${destinationKey}`,
        context: { chunkKey: chunk.key, key: destinationKey },
        retryable: false
      });
    }
    destinations.set(destinationKey, object.key);
    copies.push({
      source: object,
      destinationKey,
      destinationPrefix: aoiPrefix(aoi),
      date: path.date,
      poiId: aoi.poiId
    });
  }

  return { copies, listed: sourceObjects.length, matched, ignored };
};

const isMultipartEtag = (etag: string) => etag.includes("-");

/** Same object as the source: equal size and ETag (multipart copies only compare size). */
export const isUpToDate = (source: StoredObject, destination: StoredObject | null): boolean => {
  if (!destination || destination.size !== source.size) return false;
  return destination.etag === source.etag || isMultipartEtag(source.etag);
};

const sampleKeys = (keys: string[]): { first: string[]; last: string[]; omitted: number } =>
  keys.length <= SAMPLE_SIZE * 2
    ? { first: keys, last: [], omitted: 0 }
    : { first: keys.slice(0, SAMPLE_SIZE), last: keys.slice(-SAMPLE_SIZE), omitted: keys.length - SAMPLE_SIZE * 2 };

/**
 * Copies one chunk's job output into the target bucket and verifies every
 * written key before reporting success. Re-running it for the same output
 * rewrites the same keys, or skips them when they are already identical.
 */
export const transferChunkOutput = async (
  deps: TransferDeps,
  chunk: Chunk,
  outputLocation: string,
  options: TransferOptions
): Promise<TransferResult> => {
  const destinationBucket = chunk.target.bucket;
  const storesByCredentials = new WeakMap<Credentials, ObjectStore>();
  const storeFor = (credentials: Credentials): ObjectStore => {
    const cached = storesByCredentials.get(credentials);
    if (cached) return cached;
    const store = deps.openSourceStore(credentials);
    storesByCredentials.set(credentials, store);
    return store;
  };

  const withSourceStore = async <T>(op: (store: ObjectStore) => Promise<T>): Promise<T> => {
    const credentials = await deps.credentials.getCredentials();
    try {
      return await op(storeFor(credentials));
    } catch (err) {
      if (!(err instanceof AuthorizationError)) throw err;
      logWarn("transfer.authorization_failed", { chunkKey: chunk.key, reason: err.message });
      const refreshed = await deps.credentials.refreshAfterAuthFailure(credentials);
      return op(storeFor(refreshed));
    }
  };

  const withRetry = <T>(label: string, op: () => Promise<T>): Promise<T> =>
    retry(op, {
      retries: options.objectRetries ?? 2,
      minDelayMs: options.objectRetryDelayMs ?? 1000,
      maxDelayMs: (options.objectRetryDelayMs ?? 1000) * 8,
      sleepFn: (ms) => deps.clock.sleep(ms),
      shouldRetry: (err) => err instanceof TransferError && err.retryable,
      onRetry: ({ attempt, maxAttempts, delayMs }) => {
        logWarn("transfer.retry", { chunkKey: chunk.key, op: label, attempt, maxAttempts, delayMs });
      }
    });

  const sourcePrefix = normalizeSourcePrefix(outputLocation);
  const listing = await withRetry("list", () =>
    withSourceStore((store) => store.listObjects(options.sourceBucket, sourcePrefix))
  );
  const plan = planTransfer(chunk, outputLocation, listing, options.contentSuffix);

  if (plan.matched === 0) {
    logWarn("transfer.empty", {
      chunkKey: chunk.key,
      source: `s3://${options.sourceBucket}/${sourcePrefix}`,
      contentSuffix: options.contentSuffix
    });
  }

  const limit = createLimiter(options.transferConcurrency);
  const copiedKeys: string[] = [];
  let skipped = 0;
  let bytesCopied = 0;

  const copyResults = await Promise.allSettled(
    plan.copies.map((copy) =>
      limit(async () => {
        const existing = await withRetry("head", () =>
          deps.destinationStore.headObject(destinationBucket, copy.destinationKey)
        );
        if (isUpToDate(copy.source, existing)) {
          skipped += 1;
          return;
        }

        await withRetry("copy", () =>
          withSourceStore((store) =>
            store.copyObject({
              sourceBucket: options.sourceBucket,
              sourceKey: copy.source.key,
              destinationBucket,
              destinationKey: copy.destinationKey,
              size: copy.source.size
            })
          )
        );
        copiedKeys.push(copy.destinationKey);
        bytesCopied += copy.source.size;
      })
    )
  );
  const copyFailure = copyResults.find((r): r is PromiseRejectedResult => r.status === "rejected");
  if (copyFailure) throw copyFailure.reason;

  // Verify what is actually in the bucket rather than trusting the copy responses.
  const mismatches: string[] = [];
  const verifyResults = await Promise.allSettled(
    plan.copies.map((copy) =>
      limit(async () => {
        const written = await withRetry("verify", () =>
          deps.destinationStore.headObject(destinationBucket, copy.destinationKey)
        );
        if (!written || written.size !== copy.source.size) mismatches.push(copy.destinationKey);
      })
    )
  );
  const verifyFailure = verifyResults.find((r): r is PromiseRejectedResult => r.status === "rejected");
  if (verifyFailure) throw verifyFailure.reason;

  if (mismatches.length > 0) {
    mismatches.sort();
    throw new TransferError({
      message: `Verification failed for ${mismatches.length} of ${plan.copies.length} objects (first: ${mismatches[0]})`,
      context: { chunkKey: chunk.key, key: mismatches[0] },
      retryable: true
    });
  }

  copiedKeys.sort();
  const destinationPrefixes = Array.from(new Set(plan.copies.map((copy) => copy.destinationPrefix))).sort();

  const result: TransferResult = {
    listed: plan.listed,
    matched: plan.matched,
    ignored: plan.ignored,
    copied: copiedKeys.length,
    skipped,
    verified: plan.copies.length,
    bytesCopied,
    destinationPrefixes
  };

  logInfo("transfer.completed", {
    chunkKey: chunk.key,
    bucket: destinationBucket,
    listed: result.listed,
    matched: result.matched,
    ignored: result.ignored,
    copied: result.copied,
    skipped: result.skipped,
    verified: result.verified,
    bytesCopied: result.bytesCopied,
    copiedSample: sampleKeys(copiedKeys)
  });

  return result;
};
