import { ConfigError } from "../errors/syncErrors";
import { normalizePathSegment } from "../layout/destinationLayout";
import { errorMessage } from "../../shared/logging/log";
import type { Aoi, AoiRecord, LonLat } from "./aoi.types";

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const sameVertex = (a: LonLat, b: LonLat): boolean => a[0] === b[0] && a[1] === b[1];

/**
 * Checks the invariants every AOI must hold before it is batched or encoded.
 */
export const validateAoi = (aoi: Aoi): Aoi => {
  const ctx = { poiId: aoi.poiId };
  if (typeof aoi.poiId !== "string" || aoi.poiId.trim() === "") {
    throw new ConfigError("Invalid AOI: poi_id is required", ctx);
  }
  if (aoi.country.trim() === "" || aoi.city.trim() === "") {
    throw new ConfigError(`Invalid AOI ${aoi.poiId}: country and city are required`, ctx);
  }
  if (!Number.isFinite(aoi.latitude) || aoi.latitude < -90 || aoi.latitude > 90) {
    throw new ConfigError(`Invalid AOI ${aoi.poiId}: latitude must be within [-90..90]`, { ...ctx, field: "latitude" });
  }
  if (!Number.isFinite(aoi.longitude) || aoi.longitude < -180 || aoi.longitude > 180) {
    throw new ConfigError(`Invalid AOI ${aoi.poiId}: longitude must be within [-180..180]`, { ...ctx, field: "longitude" });
  }

  const geometry = aoi.geometry;
  if (geometry.kind === "radius") {
    if (!Number.isFinite(geometry.radiusMeters) || geometry.radiusMeters <= 0) {
      throw new ConfigError(`Invalid AOI ${aoi.poiId}: radius must be a positive number of meters`, {
        ...ctx,
        field: "radius_meters"
      });
    }
    return aoi;
  }

  const ring = geometry.ring;
  if (ring.length === 0) {
    throw new ConfigError(`Invalid AOI ${aoi.poiId}: polygon ring is empty`, { ...ctx, field: "polygon" });
  }
  for (const vertex of ring) {
    const [lon, lat] = vertex;
    if (!Number.isFinite(lon) || !Number.isFinite(lat) || lon < -180 || lon > 180 || lat < -90 || lat > 90) {
      throw new ConfigError(`Invalid AOI ${aoi.poiId}: polygon vertex out of range`, { ...ctx, field: "polygon" });
    }
  }
  // a closed ring needs three distinct vertices plus the closing one
  if (ring.length < 4) {
    throw new ConfigError(`Invalid AOI ${aoi.poiId}: polygon ring needs at least 4 positions`, {
      ...ctx,
      field: "polygon"
    });
  }
  const first = ring[0];
  const last = ring[ring.length - 1];
  if (first == null || last == null || !sameVertex(first, last)) {
    throw new ConfigError(`Invalid AOI ${aoi.poiId}: polygon ring is not closed`, { ...ctx, field: "polygon" });
  }
  return aoi;
};

const readString = (record: Record<string, unknown>, ...names: string[]): string | undefined => {
  for (const name of names) {
    const value = record[name];
    if (typeof value === "string" && value.trim() !== "") return value.trim();
  }
  return undefined;
};

const readNumber = (record: Record<string, unknown>, name: string): number | undefined => {
  const value = record[name];
  if (typeof value === "number") return value;
  if (typeof value === "string" && value.trim() !== "") {
    const parsed = Number(value);
    return Number.isNaN(parsed) ? undefined : parsed;
  }
  return undefined;
};

const parseRing = (polygon: unknown, label: string): LonLat[] => {
  const geometry = isRecord(polygon) && isRecord(polygon.geometry) ? polygon.geometry : polygon;
  if (!isRecord(geometry) || geometry.type !== "Polygon" || !Array.isArray(geometry.coordinates)) {
    throw new ConfigError(`Invalid AOI ${label}: polygon_geojson must be a GeoJSON Polygon`, { field: "polygon_geojson" });
  }

  const outer: unknown = geometry.coordinates[0];
  if (!Array.isArray(outer)) {
    throw new ConfigError(`Invalid AOI ${label}: polygon ring is empty`, { field: "polygon_geojson" });
  }

  return outer.map((position: unknown): LonLat => {
    if (!Array.isArray(position) || typeof position[0] !== "number" || typeof position[1] !== "number") {
      throw new ConfigError(`Invalid AOI ${label}: polygon positions must be [lon, lat] pairs`, {
        field: "polygon_geojson"
      });
    }
    return [position[0], position[1]];
  });
};

/**
 * Turns a registry record into a validated AOI. When the record carries no
 * `poi_id`, one is derived from the city name and the geometry kind.
 */
export const parseAoiRecord = (record: AoiRecord): Aoi => {
  if (!isRecord(record)) {
    throw new ConfigError("Invalid AOI: record is not an object");
  }

  const city = readString(record, "city", "city_name");
  const country = readString(record, "country");
  const label = readString(record, "poi_id", "city_id") ?? city ?? "<unknown>";
  if (!city || !country) {
    throw new ConfigError(`Invalid AOI ${label}: country and city are required`, { field: "city" });
  }

  const latitude = readNumber(record, "latitude");
  const longitude = readNumber(record, "longitude");
  if (latitude == null || longitude == null) {
    throw new ConfigError(`Invalid AOI ${label}: missing coordinates`, { field: "latitude" });
  }

  const hasRadius = record.radius_meters != null && record.radius_meters !== "";
  const hasPolygon = record.polygon_geojson != null;
  if (hasRadius === hasPolygon) {
    throw new ConfigError(`Invalid AOI ${label}: exactly one of radius_meters or polygon_geojson is required`, {
      field: "geometry"
    });
  }

  const geometry: Aoi["geometry"] = hasRadius
    ? { kind: "radius", radiusMeters: readNumber(record, "radius_meters") ?? Number.NaN }
    : { kind: "polygon", ring: parseRing(record.polygon_geojson, label) };

  const suffix = geometry.kind === "radius" ? "center" : "polygon";
  const poiId = readString(record, "poi_id") ?? `${normalizePathSegment(city)}_${suffix}`;

  return validateAoi({
    poiId,
    country,
    stateProvince: readString(record, "state_province", "state"),
    city,
    latitude,
    longitude,
    geometry
  });
};

/** Parses registry records; the first invalid one fails the snapshot. */
export const parseAoiRecords = (records: readonly AoiRecord[], source: string): Aoi[] =>
  records.map((record, index) => {
    try {
      return parseAoiRecord(record);
    } catch (err) {
      const id = typeof record.poi_id === "string" ? record.poi_id : typeof record.city_id === "string" ? record.city_id : `#${index}`;
      throw new ConfigError(`Invalid AOI record ${id} in ${source}: ${errorMessage(err)}`, { field: id });
    }
  });
