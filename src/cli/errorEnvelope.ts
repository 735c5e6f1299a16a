type ErrorContext = Partial<{
  chunkKey: string;
  jobId: string;
  poiId: string;
  key: string;
  field: string;
  status: number;
}>;

export type CliErrorEnvelope = {
  event: string;
  name: string;
  message: string;
  code?: string;
  context?: ErrorContext;
  stack?: string;
};

const stringContextKeys = ["chunkKey", "jobId", "poiId", "key", "field"] as const;

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null;

const extractContext = (value: unknown): ErrorContext | undefined => {
  if (!isRecord(value)) return undefined;

  const sanitizedContext: ErrorContext = {};
  for (const key of stringContextKeys) {
    const raw = value[key];
    if (typeof raw === "string" && raw !== "") {
      sanitizedContext[key] = raw;
    }
  }
  if (typeof value.status === "number" && Number.isFinite(value.status)) {
    sanitizedContext.status = value.status;
  }

  return Object.keys(sanitizedContext).length > 0 ? sanitizedContext : undefined;
};

export const isDebugMode = (env: NodeJS.ProcessEnv = process.env): boolean => {
  const debug = env.DEBUG?.toLowerCase();
  return debug === "1" || debug === "true";
};

/** Only whitelisted context fields reach the output; causes and bodies never do. */
export const buildCliErrorEnvelope = (event: string, err: unknown, includeStack: boolean): CliErrorEnvelope => {
  const error = err instanceof Error ? err : new Error(String(err));
  const errorRecord = isRecord(err) ? err : {};

  const envelope: CliErrorEnvelope = {
    event,
    name: error.name || "Error",
    message: error.message
  };

  if (typeof errorRecord.code === "string") {
    envelope.code = errorRecord.code;
  }

  const context = extractContext(errorRecord.context);
  if (context) {
    envelope.context = context;
  }

  if (includeStack && typeof error.stack === "string") {
    envelope.stack = error.stack;
  }

  return envelope;
};

export const reportCliFailure = (event: string, err: unknown): void => {
  const envelope = buildCliErrorEnvelope(event, err, isDebugMode());
  // eslint-disable-next-line no-console
  console.error(JSON.stringify(envelope));
};
