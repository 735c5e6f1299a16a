import type { Aoi, LonLat } from "../aoi/aoi.types";
import { ConfigError } from "../errors/syncErrors";

export type RadiusDescriptor = {
  poi_id: string;
  latitude: number;
  longitude: number;
  distance_in_meters: number;
};

export type PolygonDescriptor = {
  poi_id: string;
  geo_json: {
    type: "Polygon";
    coordinates: LonLat[][];
  };
};

export type GeoDescriptor =
  | { kind: "radius"; descriptor: RadiusDescriptor }
  | { kind: "polygon"; descriptor: PolygonDescriptor };

export type EncodedGeometries = {
  geo_radius?: RadiusDescriptor[];
  geo_json?: PolygonDescriptor[];
};

export const encodeGeometry = (aoi: Aoi): GeoDescriptor => {
  const geometry = aoi.geometry;
  if (geometry.kind === "radius") {
    return {
      kind: "radius",
      descriptor: {
        poi_id: aoi.poiId,
        latitude: aoi.latitude,
        longitude: aoi.longitude,
        distance_in_meters: geometry.radiusMeters
      }
    };
  }

  return {
    kind: "polygon",
    descriptor: {
      poi_id: aoi.poiId,
      geo_json: {
        type: "Polygon",
        coordinates: [geometry.ring.map(([lon, lat]): LonLat => [lon, lat])]
      }
    }
  };
};

/**
 * Encodes a chunk's AOIs into the vendor's `geo_radius` / `geo_json` arrays.
 * An array is only present when at least one AOI of that kind exists.
 */
export const encodeChunkGeometries = (aois: readonly Aoi[]): EncodedGeometries => {
  const seen = new Set<string>();
  const radius: RadiusDescriptor[] = [];
  const polygons: PolygonDescriptor[] = [];

  for (const aoi of aois) {
    if (seen.has(aoi.poiId)) {
      throw new ConfigError(`Duplicate poi_id in chunk: ${aoi.poiId}`, { poiId: aoi.poiId });
    }
    seen.add(aoi.poiId);

    const encoded = encodeGeometry(aoi);
    if (encoded.kind === "radius") radius.push(encoded.descriptor);
    else polygons.push(encoded.descriptor);
  }

  const out: EncodedGeometries = {};
  if (radius.length > 0) out.geo_radius = radius;
  if (polygons.length > 0) out.geo_json = polygons;
  return out;
};
