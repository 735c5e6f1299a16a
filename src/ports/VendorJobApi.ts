import type { EncodedGeometries } from "../core/geometry/encodeGeometry";
import type { JobStatusReport } from "../core/jobs/VendorJob";
import type { SchemaType } from "../core/chunks/chunk.types";

export type SubmitJobRequest = {
  endpoint: string; // vendor path, e.g. "movement/job/pings"
  payload: {
    date_range: { from_date: string; to_date: string };
    schema_type: SchemaType;
  } & EncodedGeometries;
};

export type SubmittedJob = {
  jobId: string;
  requestId?: string;
};

export interface VendorJobApi {
  submitJob(request: SubmitJobRequest): Promise<SubmittedJob>;
  getJobStatus(jobId: string): Promise<JobStatusReport>;
}
