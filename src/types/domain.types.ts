// Domain types - clean models isolated from external file formats

export type Axis = 'latitude' | 'longitude';

export type Hemisphere = 'N' | 'S' | 'E' | 'W';

/** Longitude-first pair, the order shape documents expect */
export type LonLat = [longitude: number, latitude: number];

export interface GeoLocation {
  latitude: number;
  longitude: number;
}

/** One coordinate sampled from a rendered shape; evidence, not a validated shape */
export interface GeoSample {
  longitude: number;
  latitude: number;
  altitude: number;
}

export type ShapeHint = 'polygon' | 'line';

export interface ZoneDescriptor {
  name: string;
  coordinateText: string;
  altitudeRange: string;
  altitudeLimit: string;
  schedule: string;
}

export interface CircleDefinition {
  center: GeoLocation;
  radiusMeters: number;
}

/**
 * Geometry extracted from a zone's coordinate definition.
 * `unparseable` carries an empty ring so callers can count the failure.
 */
export type ZoneGeometry =
  | { readonly kind: 'polygon'; readonly ring: LonLat[] }
  | { readonly kind: 'circle'; readonly ring: LonLat[]; readonly circle: CircleDefinition }
  | { readonly kind: 'unparseable'; readonly ring: [] };

export interface ZonePlacemark {
  name: string;
  description: string;
  ring: LonLat[];
}

/** Placemark read back from a shape document */
export interface ShapeSource {
  name: string;
  hint?: ShapeHint;
  samples: GeoSample[];
}

export type ClassifiedShape =
  | { readonly type: 'point'; readonly points: GeoSample[] }
  | { readonly type: 'circle'; readonly circle: CircleDefinition }
  | { readonly type: 'rectangle'; readonly points: GeoSample[] }
  | { readonly type: 'polygon'; readonly points: GeoSample[] }
  | { readonly type: 'complex_polygon'; readonly points: GeoSample[] }
  | { readonly type: 'path'; readonly points: GeoSample[] };

export type ShapeType = ClassifiedShape['type'];
