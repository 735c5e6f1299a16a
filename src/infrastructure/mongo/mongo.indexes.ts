/**
 * Index plan, applied lazily by the repositories:
 * - chunk_progress: unique { runId, chunkKey }, the resume lookup key
 * - aois: unique { poi_id } (sparse, records may derive it)
 */
export const mongoIndexes = {
  chunkProgressCollection: [
    { keys: { runId: 1, chunkKey: 1 }, options: { unique: true } }
  ],
  aoiCollection: [
    { keys: { poi_id: 1 }, options: { unique: true, sparse: true } }
  ]
};
