// Whitespace-separated "lon,lat[,alt]" tuples, as shape documents store them

import { GeoSample, LonLat } from '../types/domain.types';

function toNumber(value: string | undefined): number | null {
  if (value === undefined || value.trim() === '') {
    return null;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : null;
}

/**
 * Tokens with fewer than two parts or a non-numeric longitude/latitude are dropped.
 */
export function parseCoordinateList(text: string): GeoSample[] {
  const samples: GeoSample[] = [];

  for (const token of text.trim().split(/\s+/)) {
    const parts = token.split(',');
    if (parts.length < 2) {
      continue;
    }

    const longitude = toNumber(parts[0]);
    const latitude = toNumber(parts[1]);
    if (longitude === null || latitude === null) {
      continue;
    }

    samples.push({ longitude, latitude, altitude: toNumber(parts[2]) ?? 0 });
  }

  return samples;
}

export function formatCoordinateList(ring: LonLat[]): string {
  return ring.map(([longitude, latitude]) => `${longitude},${latitude},0`).join(' ');
}
