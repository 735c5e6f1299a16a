import type { Aoi } from "../aoi/aoi.types";

export const SCHEMA_TYPES = ["BASIC", "FULL", "TRIPS"] as const;
export type SchemaType = (typeof SCHEMA_TYPES)[number];

export const isSchemaType = (value: string): value is SchemaType =>
  SCHEMA_TYPES.some((schema) => schema === value);

export type DateRange = {
  from: string; // YYYY-MM-DD, inclusive
  to: string;   // YYYY-MM-DD, inclusive
};

export type SyncTarget = {
  endpoint: string; // vendor job path, e.g. "movement/job/pings"
  schema: SchemaType;
  bucket: string;
};

export type Chunk = {
  key: string;
  batchIndex: number;
  windowIndex: number;
  aois: readonly Aoi[];
  window: DateRange;
  target: SyncTarget;
};

export const chunkKeyOf = (target: Pick<SyncTarget, "endpoint" | "schema">, batchIndex: number, windowIndex: number) =>
  `${target.endpoint}:${target.schema}:b${batchIndex}:w${windowIndex}`;

/**
 * Identifies what a chunk requests rather than where it sits in the plan:
 * the window plus the sorted poi_ids. A chunk key recorded under another
 * fingerprint belonged to a different AOI set.
 */
export const chunkFingerprint = (chunk: Pick<Chunk, "aois" | "window">): string => {
  const poiIds = chunk.aois.map((aoi) => aoi.poiId).sort();
  return `${chunk.window.from}..${chunk.window.to}|${poiIds.join(",")}`;
};

export type ChunkOutcome = "SUCCEEDED" | "FAILED";

export type ChunkError = {
  code: string;
  message: string;
  at: Date;
};

export type TransferCounters = {
  listed: number;
  matched: number;
  ignored: number;
  copied: number;
  skipped: number;
  verified: number;
  bytesCopied: number;
};

export type ChunkProgress = {
  runId: string;
  chunkKey: string;
  fingerprint?: string;
  attempts: number;
  outcome?: ChunkOutcome;
  lastError?: ChunkError;
  jobId?: string;
  outputLocation?: string;
  transfer?: TransferCounters;
  updatedAt: Date;
};
