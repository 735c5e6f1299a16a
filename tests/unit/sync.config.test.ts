import { defaultSyncConfig, resolveSyncConfig } from "../../src/application/sync-run/sync.config";
import { ConfigError } from "../../src/core/errors/syncErrors";

const identity = { sourceBucket: " vendor-bucket ", roleArn: "arn:aws:iam::000000000000:role/test-role" };

describe("resolveSyncConfig", () => {
  it("fills defaults and trims the identity settings", () => {
    expect(resolveSyncConfig(identity)).toEqual({
      ...defaultSyncConfig,
      sourceBucket: "vendor-bucket",
      roleArn: "arn:aws:iam::000000000000:role/test-role"
    });
  });

  it("uses the vendor limits and three attempts by default", () => {
    const config = resolveSyncConfig(identity);
    expect(config.maxAoisPerChunk).toBe(200);
    expect(config.maxDaysPerChunk).toBe(31);
    expect(config.maxAttempts).toBe(3);
    expect(config.notifyOn).toBe("failure");
  });

  it.each([
    { patch: { concurrency: 0 }, message: "concurrency=0 is out of allowed range [1..50]" },
    { patch: { maxAttempts: 11 }, message: "maxAttempts=11 is out of allowed range [1..10]" },
    { patch: { maxAoisPerChunk: 201 }, message: "maxAoisPerChunk=201 is out of allowed range [1..200]" },
    { patch: { maxDaysPerChunk: 32 }, message: "maxDaysPerChunk=32 is out of allowed range [1..31]" },
    { patch: { pollIntervalMs: 1.5 }, message: "pollIntervalMs=1.5 is out of allowed range [1..3600000]" },
    {
      patch: { retryBaseDelayMs: 5000, retryMaxDelayMs: 1000 },
      message: "retryMaxDelayMs=1000 must be >= retryBaseDelayMs=5000"
    },
    { patch: { roleSessionName: " " }, message: "roleSessionName must not be empty" }
  ])("rejects $message", ({ patch, message }) => {
    expect(() => resolveSyncConfig({ ...identity, ...patch })).toThrow(message);
  });

  it("requires the source bucket and role", () => {
    expect(() => resolveSyncConfig({ ...identity, sourceBucket: "" })).toThrow(ConfigError);
    expect(() => resolveSyncConfig({ ...identity, roleArn: "  " })).toThrow("roleArn must not be empty");
  });
});
