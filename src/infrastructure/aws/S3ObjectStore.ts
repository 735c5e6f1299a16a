import {
  AbortMultipartUploadCommand,
  CompleteMultipartUploadCommand,
  CopyObjectCommand,
  CreateMultipartUploadCommand,
  HeadObjectCommand,
  ListObjectsV2Command,
  S3Client,
  UploadPartCopyCommand,
  type AbortMultipartUploadCommandInput,
  type AbortMultipartUploadCommandOutput,
  type CompleteMultipartUploadCommandInput,
  type CompleteMultipartUploadCommandOutput,
  type CompletedPart,
  type CopyObjectCommandInput,
  type CopyObjectCommandOutput,
  type CreateMultipartUploadCommandInput,
  type CreateMultipartUploadCommandOutput,
  type HeadObjectCommandInput,
  type HeadObjectCommandOutput,
  type ListObjectsV2CommandInput,
  type ListObjectsV2CommandOutput,
  type UploadPartCopyCommandInput,
  type UploadPartCopyCommandOutput
} from "@aws-sdk/client-s3";
import { AuthorizationError, TransferError } from "../../core/errors/syncErrors";
import type { CopyObjectParams, ObjectStore, SourceStoreFactory, StoredObject } from "../../ports/ObjectStore";
import type { Credentials } from "../../ports/RoleAssumer";
import { errorMessage, logWarn } from "../../shared/logging/log";

/** The S3 calls the engine makes; narrow enough to fake in tests. */
export type S3Operations = {
  listObjectsV2(input: ListObjectsV2CommandInput): Promise<ListObjectsV2CommandOutput>;
  headObject(input: HeadObjectCommandInput): Promise<HeadObjectCommandOutput>;
  copyObject(input: CopyObjectCommandInput): Promise<CopyObjectCommandOutput>;
  createMultipartUpload(input: CreateMultipartUploadCommandInput): Promise<CreateMultipartUploadCommandOutput>;
  uploadPartCopy(input: UploadPartCopyCommandInput): Promise<UploadPartCopyCommandOutput>;
  completeMultipartUpload(input: CompleteMultipartUploadCommandInput): Promise<CompleteMultipartUploadCommandOutput>;
  abortMultipartUpload(input: AbortMultipartUploadCommandInput): Promise<AbortMultipartUploadCommandOutput>;
};

export const s3Operations = (client: S3Client): S3Operations => ({
  listObjectsV2: (input) => client.send(new ListObjectsV2Command(input)),
  headObject: (input) => client.send(new HeadObjectCommand(input)),
  copyObject: (input) => client.send(new CopyObjectCommand(input)),
  createMultipartUpload: (input) => client.send(new CreateMultipartUploadCommand(input)),
  uploadPartCopy: (input) => client.send(new UploadPartCopyCommand(input)),
  completeMultipartUpload: (input) => client.send(new CompleteMultipartUploadCommand(input)),
  abortMultipartUpload: (input) => client.send(new AbortMultipartUploadCommand(input))
});

const MiB = 1024 * 1024;

/** Largest object a single CopyObject call accepts. */
export const MAX_SINGLE_COPY_BYTES = 5 * 1024 * MiB;
const MIN_COPY_PART_BYTES = 512 * MiB;
const MAX_PARTS = 10_000;

/** Inclusive byte ranges for UploadPartCopy, as few parts as the part floor allows. */
export const copyPartRanges = (size: number, minPartBytes = MIN_COPY_PART_BYTES): string[] => {
  const partSize = Math.max(minPartBytes, Math.ceil(size / MAX_PARTS));
  const ranges: string[] = [];
  for (let start = 0; start < size; start += partSize) {
    ranges.push(`bytes=${start}-${Math.min(size, start + partSize) - 1}`);
  }
  return ranges;
};

const AUTH_ERROR_NAMES = new Set([
  "AccessDenied",
  "ExpiredToken",
  "ExpiredTokenException",
  "InvalidAccessKeyId",
  "InvalidToken",
  "SignatureDoesNotMatch",
  "TokenRefreshRequired"
]);

const THROTTLE_ERROR_NAMES = new Set(["SlowDown", "Throttling", "ThrottlingException", "RequestTimeout", "TimeoutError"]);

const httpStatusOf = (err: unknown): number | undefined => {
  if (typeof err !== "object" || err == null || !("$metadata" in err)) return undefined;
  const metadata = err.$metadata;
  if (typeof metadata !== "object" || metadata == null || !("httpStatusCode" in metadata)) return undefined;
  return typeof metadata.httpStatusCode === "number" ? metadata.httpStatusCode : undefined;
};

const errorNameOf = (err: unknown): string => (err instanceof Error ? err.name : "");

export const isNotFound = (err: unknown): boolean => {
  const name = errorNameOf(err);
  return name === "NotFound" || name === "NoSuchKey" || httpStatusOf(err) === 404;
};

/**
 * Maps an SDK failure onto the engine's taxonomy: rejected or expired
 * credentials become AuthorizationError, throttling, 5xx and network failures
 * a retryable TransferError, anything else a permanent one.
 */
export const mapS3Error = (err: unknown, op: string, bucket: string, key?: string): Error => {
  const name = errorNameOf(err);
  const status = httpStatusOf(err);
  const where = key != null ? `s3://${bucket}/${key}` : `s3://${bucket}`;
  const message = `S3 ${op} ${where} failed: ${name || "Error"}${status != null ? ` (${status})` : ""}`;
  const context = key != null ? { key, ...(status != null ? { status } : {}) } : status != null ? { status } : {};

  if (AUTH_ERROR_NAMES.has(name) || status === 403) {
    return new AuthorizationError({ message, context, cause: err });
  }
  if (THROTTLE_ERROR_NAMES.has(name) || status === 429 || (status != null && status >= 500)) {
    return new TransferError({ message, context, cause: err, retryable: true });
  }
  // No HTTP status at all: the request never got a response.
  if (status == null) {
    return new TransferError({ message, context, cause: err, retryable: true });
  }
  return new TransferError({ message, context, cause: err, retryable: false });
};

const unquote = (etag: string | undefined) => (etag ?? "").replace(/"/g, "");

const encodeCopySource = (bucket: string, key: string) =>
  `${bucket}/${key.split("/").map(encodeURIComponent).join("/")}`;

export class S3ObjectStore implements ObjectStore {
  constructor(private readonly s3: S3Operations) {}

  async listObjects(bucket: string, prefix: string): Promise<StoredObject[]> {
    const objects: StoredObject[] = [];
    let continuationToken: string | undefined;
    do {
      let out: ListObjectsV2CommandOutput;
      try {
        out = await this.s3.listObjectsV2({
          Bucket: bucket,
          Prefix: prefix || undefined,
          ContinuationToken: continuationToken
        });
      } catch (err) {
        throw mapS3Error(err, "list", bucket, prefix);
      }
      for (const obj of out.Contents ?? []) {
        if (!obj.Key || obj.Key.endsWith("/")) continue;
        objects.push({ key: obj.Key, size: obj.Size ?? 0, etag: unquote(obj.ETag) });
      }
      continuationToken = out.IsTruncated ? out.NextContinuationToken : undefined;
    } while (continuationToken);
    return objects;
  }

  async listCommonPrefixes(bucket: string, prefix: string): Promise<string[]> {
    const prefixes: string[] = [];
    let continuationToken: string | undefined;
    do {
      let out: ListObjectsV2CommandOutput;
      try {
        out = await this.s3.listObjectsV2({
          Bucket: bucket,
          Prefix: prefix || undefined,
          Delimiter: "/",
          ContinuationToken: continuationToken
        });
      } catch (err) {
        throw mapS3Error(err, "list", bucket, prefix);
      }
      for (const entry of out.CommonPrefixes ?? []) {
        if (entry.Prefix) prefixes.push(entry.Prefix);
      }
      continuationToken = out.IsTruncated ? out.NextContinuationToken : undefined;
    } while (continuationToken);
    return prefixes;
  }

  async headObject(bucket: string, key: string): Promise<StoredObject | null> {
    try {
      const out = await this.s3.headObject({ Bucket: bucket, Key: key });
      return { key, size: out.ContentLength ?? 0, etag: unquote(out.ETag) };
    } catch (err) {
      if (isNotFound(err)) return null;
      throw mapS3Error(err, "head", bucket, key);
    }
  }

  /**
   * Server-side copy. Objects above 5 GiB, when the caller knows the size, go
   * through a multipart copy that is aborted if any part fails.
   */
  async copyObject(params: CopyObjectParams): Promise<void> {
    const copySource = encodeCopySource(params.sourceBucket, params.sourceKey);
    if (params.size != null && params.size > MAX_SINGLE_COPY_BYTES) {
      await this.multipartCopy(params, copySource, params.size);
      return;
    }
    try {
      await this.s3.copyObject({
        Bucket: params.destinationBucket,
        Key: params.destinationKey,
        CopySource: copySource,
        MetadataDirective: "COPY"
      });
    } catch (err) {
      throw mapS3Error(err, "copy", params.sourceBucket, params.sourceKey);
    }
  }

  private async multipartCopy(params: CopyObjectParams, copySource: string, size: number): Promise<void> {
    const target = { Bucket: params.destinationBucket, Key: params.destinationKey };
    let uploadId: string | undefined;
    try {
      uploadId = (await this.s3.createMultipartUpload(target)).UploadId;
    } catch (err) {
      throw mapS3Error(err, "copy", params.sourceBucket, params.sourceKey);
    }
    if (!uploadId) {
      throw new TransferError({
        message: `S3 copy s3://${params.sourceBucket}/${params.sourceKey} failed: no upload id returned`,
        context: { key: params.sourceKey },
        retryable: true
      });
    }

    try {
      const parts: CompletedPart[] = [];
      for (const [index, range] of copyPartRanges(size).entries()) {
        const out = await this.s3.uploadPartCopy({
          ...target,
          UploadId: uploadId,
          PartNumber: index + 1,
          CopySource: copySource,
          CopySourceRange: range
        });
        parts.push({ PartNumber: index + 1, ETag: out.CopyPartResult?.ETag });
      }
      await this.s3.completeMultipartUpload({ ...target, UploadId: uploadId, MultipartUpload: { Parts: parts } });
    } catch (err) {
      try {
        await this.s3.abortMultipartUpload({ ...target, UploadId: uploadId });
      } catch (abortErr) {
        logWarn("s3.multipart_abort_failed", { key: params.destinationKey, reason: errorMessage(abortErr) });
      }
      throw mapS3Error(err, "copy", params.sourceBucket, params.sourceKey);
    }
  }
}

export const createS3ObjectStore = (region: string, credentials?: Credentials): S3ObjectStore =>
  new S3ObjectStore(
    s3Operations(
      new S3Client({
        region,
        ...(credentials
          ? {
              credentials: {
                accessKeyId: credentials.accessKeyId,
                secretAccessKey: credentials.secretAccessKey,
                sessionToken: credentials.sessionToken,
                expiration: new Date(credentials.expiresAt)
              }
            }
          : {})
      })
    )
  );

export const s3SourceStoreFactory =
  (region: string): SourceStoreFactory =>
  (credentials) =>
    createS3ObjectStore(region, credentials);
