import type { Aoi } from "../aoi/aoi.types";

/** Each space becomes one underscore, so "Port  Hope" keeps both. */
export const normalizePathSegment = (value: string): string => value.trim().toLowerCase().replace(/ /g, "_");

/**
 * `data/{country}/{state}/{city}/` with the state segment dropped when the AOI has none.
 */
export const aoiPrefix = (aoi: Pick<Aoi, "country" | "stateProvince" | "city">): string => {
  const country = normalizePathSegment(aoi.country);
  const state = normalizePathSegment(aoi.stateProvince ?? "");
  const city = normalizePathSegment(aoi.city);
  return state ? `data/${country}/${state}/${city}/` : `data/${country}/${city}/`;
};

export const datePartitionPrefix = (aoi: Pick<Aoi, "country" | "stateProvince" | "city">, date: string): string =>
  `${aoiPrefix(aoi)}date=${date}/`;

const DATE_SEGMENT = /^date=(\d{4}-\d{2}-\d{2})$/;
const POI_SEGMENT = /^poi_id=(.+)$/;

export type VendorObjectPath = {
  date?: string;
  poiId?: string;
  rest: string; // path after the date partition, poi_id segments removed
};

/**
 * Reads `date=` and `poi_id=` partitions out of a key relative to the job output prefix.
 */
export const parseVendorObjectPath = (relativeKey: string): VendorObjectPath => {
  const segments = relativeKey.split("/").filter((segment) => segment !== "");
  let date: string | undefined;
  let poiId: string | undefined;
  let dateIndex = -1;

  segments.forEach((segment, index) => {
    const dateMatch = DATE_SEGMENT.exec(segment);
    if (dateMatch && date == null) {
      date = dateMatch[1];
      dateIndex = index;
      return;
    }
    const poiMatch = POI_SEGMENT.exec(segment);
    if (poiMatch && poiId == null) {
      poiId = poiMatch[1];
    }
  });

  const rest = segments
    .slice(dateIndex + 1)
    .filter((segment) => !POI_SEGMENT.test(segment))
    .join("/");

  return { date, poiId, rest };
};

/** Normalises a vendor `folder_path` into a bucket-relative prefix ending in `/`. */
export const normalizeSourcePrefix = (folderPath: string): string => {
  const trimmed = folderPath.replace(/^s3:\/\/[^/]+\//, "").replace(/^\/+/, "");
  if (trimmed === "") return "";
  return trimmed.endsWith("/") ? trimmed : `${trimmed}/`;
};
