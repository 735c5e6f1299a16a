import type { Credentials } from "./RoleAssumer";

export type StoredObject = {
  key: string;
  size: number;
  etag: string; // without surrounding quotes
};

export type CopyObjectParams = {
  sourceBucket: string;
  sourceKey: string;
  destinationBucket: string;
  destinationKey: string;
  size?: number; // source size in bytes, when known
};

/**
 * Write-only from the engine's point of view: nothing here deletes.
 * Implementations raise AuthorizationError for expired/denied credentials and
 * TransferError (retryable for throttling and network failures) otherwise.
 */
export interface ObjectStore {
  listObjects(bucket: string, prefix: string): Promise<StoredObject[]>;
  listCommonPrefixes(bucket: string, prefix: string): Promise<string[]>;
  headObject(bucket: string, key: string): Promise<StoredObject | null>;
  copyObject(params: CopyObjectParams): Promise<void>;
}

/** Builds a store that reads the vendor bucket with brokered credentials. */
export type SourceStoreFactory = (credentials: Credentials) => ObjectStore;
