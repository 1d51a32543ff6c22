import { GeoLocation, LonLat } from '../types/domain.types';

export const EARTH_RADIUS_METERS = 6378137; // equatorial
export const DEFAULT_CIRCLE_VERTEX_COUNT = 36;

/**
 * Approximates a circle as a closed ring of `vertexCount + 1` vertices.
 *
 * Planar approximation: the longitude delta is widened by 1/cos(latitude),
 * so the error grows with the radius and towards the poles.
 */
export function synthesizeCircle(
  center: GeoLocation,
  radiusMeters: number,
  vertexCount: number = DEFAULT_CIRCLE_VERTEX_COUNT
): LonLat[] {
  const deltaLat = (radiusMeters / EARTH_RADIUS_METERS) * (180 / Math.PI);
  const deltaLon = deltaLat / Math.cos(center.latitude * Math.PI / 180);

  const count = Math.max(3, Math.floor(vertexCount));

  const ring: LonLat[] = [];
  for (let i = 0; i < count; i++) {
    const angle = (2 * Math.PI * i) / count;
    ring.push([
      center.longitude + deltaLon * Math.cos(angle),
      center.latitude + deltaLat * Math.sin(angle)
    ]);
  }

  // Angle 2π lands on the first vertex; reuse it so the ring closes exactly
  ring.push([ring[0][0], ring[0][1]]);
  return ring;
}
