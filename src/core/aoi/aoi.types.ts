export type LonLat = [number, number];

export type RadiusGeometry = {
  kind: "radius";
  radiusMeters: number;
};

export type PolygonGeometry = {
  kind: "polygon";
  ring: LonLat[]; // closed: first vertex repeated last
};

export type AoiGeometry = RadiusGeometry | PolygonGeometry;

export type Aoi = {
  poiId: string;
  country: string;
  stateProvince?: string;
  city: string;
  latitude: number;
  longitude: number;
  geometry: AoiGeometry;
};

/** Shape stored by the city registry (JSON file or `aois` collection). */
export type AoiRecord = Record<string, unknown>;
