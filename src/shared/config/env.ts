import { ConfigError } from "../../core/errors/syncErrors";

export type AoiSource = "mongo" | "file";
export type ProgressStoreKind = "mongo" | "file";

export type Env = {
  MONGO_URI: string;
  VENDOR_API_KEY: string;
  VENDOR_BASE_URL: string;
  AWS_REGION: string;
  VENDOR_SOURCE_BUCKET: string;
  VENDOR_ROLE_ARN: string;
  SNS_TOPIC_ARN?: string;
  AOI_SOURCE: AoiSource;
  AOI_FILE: string;
  PROGRESS_STORE: ProgressStoreKind;
  PROGRESS_DIR: string;
};

const validateHttpUrl = (name: string, value: string): string => {
  let parsed: URL;
  try {
    parsed = new URL(value);
  } catch {
    throw new ConfigError(`${name} must be a valid absolute http/https URL. Received: ${value}`, { field: name });
  }

  if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
    throw new ConfigError(`${name} must use http or https scheme. Received: ${value}`, { field: name });
  }

  return value;
};

const parseChoice = <T extends string>(name: string, raw: string | undefined, choices: readonly T[], fallback: T): T => {
  const value = raw?.trim();
  if (!value) return fallback;
  const match = choices.find((choice) => choice === value);
  if (!match) {
    throw new ConfigError(`${name} must be one of ${choices.join(", ")}. Received: ${value}`, { field: name });
  }
  return match;
};

/** Connection settings. Values a command does not use may stay empty; see `requireSetting`. */
export const loadEnv = (env: NodeJS.ProcessEnv = process.env): Env => {
  const baseUrl = env.VENDOR_BASE_URL?.trim() ?? "";
  const snsTopic = env.SNS_TOPIC_ARN?.trim();

  const loaded: Env = {
    MONGO_URI: env.MONGO_URI ?? "mongodb://localhost:27017/mobility_sync",
    VENDOR_API_KEY: env.VENDOR_API_KEY ?? "",
    VENDOR_BASE_URL: baseUrl === "" ? "" : validateHttpUrl("VENDOR_BASE_URL", baseUrl),
    AWS_REGION: env.AWS_REGION?.trim() || "us-west-2",
    VENDOR_SOURCE_BUCKET: env.VENDOR_SOURCE_BUCKET?.trim() ?? "",
    VENDOR_ROLE_ARN: env.VENDOR_ROLE_ARN?.trim() ?? "",
    AOI_SOURCE: parseChoice("AOI_SOURCE", env.AOI_SOURCE, ["mongo", "file"], "file"),
    AOI_FILE: env.AOI_FILE?.trim() || "cities.json",
    PROGRESS_STORE: parseChoice("PROGRESS_STORE", env.PROGRESS_STORE, ["mongo", "file"], "file"),
    PROGRESS_DIR: env.PROGRESS_DIR?.trim() || ".sync-progress"
  };
  if (snsTopic) loaded.SNS_TOPIC_ARN = snsTopic;
  return loaded;
};

type RequiredSetting = "VENDOR_API_KEY" | "VENDOR_BASE_URL" | "VENDOR_SOURCE_BUCKET" | "VENDOR_ROLE_ARN";

export const requireSetting = (env: Env, name: RequiredSetting): string => {
  const value = env[name];
  if (value === "") {
    throw new ConfigError(`${name} is required`, { field: name });
  }
  return value;
};
