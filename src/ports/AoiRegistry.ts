import type { Aoi } from "../core/aoi/aoi.types";

/** Read-only snapshot of the operator's city list, taken once per run. */
export interface AoiRegistry {
  loadSnapshot(): Promise<Aoi[]>;
}
