import { inject, injectable } from 'tsyringe';
import { GeoLocation, LonLat, ZoneGeometry } from '../types/domain.types';
import { DEFAULT_CIRCLE_VERTEX_COUNT, synthesizeCircle } from '../utils/circle.util';
import { decodeDms } from '../utils/dms.util';
import { ExtractorOptions, ICoordinateExtractor } from './coordinate-extractor.interface';

export const DEFAULT_EXTRACTOR_OPTIONS: ExtractorOptions = {
  defaultRadiusMeters: 5000,
  circleVertexCount: DEFAULT_CIRCLE_VERTEX_COUNT
};

// Cyrillic letters that source tables use in place of Latin hemisphere letters
const LOOKALIKE_LETTERS: Record<string, string> = {
  'Е': 'E'
};

// A marker without digits still makes the zone a circle of the default radius
const CIRCLE_MARKER_PATTERN = /R[=-]/;
const RADIUS_PATTERN = /R[=-](\d+)/;

// 460755N 0805610E
const REVERSED_PAIR_PATTERN = /(\d{6})([NS])[ -]?(\d{7})([EW])/g;

// N433604 E0765618, N433604-E0765618, N433604, E0765618
const STANDARD_PAIR_PATTERN = /([NS])[ -]?(\d{6})[ \-,]*([EW])[ -]?(\d{7})/g;

interface DmsPair {
  latitude: string;   // e.g. N433604
  longitude: string;  // e.g. E0765618
}

@injectable()
export class CoordinateExtractorService implements ICoordinateExtractor {
  constructor(
    @inject('ExtractorOptions') private readonly options: ExtractorOptions = DEFAULT_EXTRACTOR_OPTIONS
  ) {}

  extract(coordinateText: string): ZoneGeometry {
    const text = this.normalize(coordinateText);
    const radiusMeters = this.findRadius(text);
    const pairs = this.findPairs(text);

    if (pairs.length === 0) {
      return { kind: 'unparseable', ring: [] };
    }

    if (radiusMeters !== null) {
      // Only the first pair is a circle center; anything after it is ignored
      const center = this.toLocation(pairs[0]);
      return {
        kind: 'circle',
        ring: synthesizeCircle(center, radiusMeters, this.options.circleVertexCount),
        circle: { center, radiusMeters }
      };
    }

    const ring: LonLat[] = pairs.map(pair => {
      const location = this.toLocation(pair);
      return [location.longitude, location.latitude];
    });

    const first = ring[0];
    const last = ring[ring.length - 1];
    if (first[0] !== last[0] || first[1] !== last[1]) {
      ring.push([first[0], first[1]]);
    }

    return { kind: 'polygon', ring };
  }

  private normalize(coordinateText: string): string {
    let text = coordinateText;
    for (const [lookalike, latin] of Object.entries(LOOKALIKE_LETTERS)) {
      text = text.split(lookalike).join(latin);
    }
    return text.replace(/\s+/g, ' ').trim();
  }

  /**
   * @returns radius in meters when the text defines a circle, otherwise null
   */
  private findRadius(text: string): number | null {
    if (!CIRCLE_MARKER_PATTERN.test(text)) {
      return null;
    }
    const match = RADIUS_PATTERN.exec(text);
    return match ? Number(match[1]) : this.options.defaultRadiusMeters;
  }

  /**
   * Layouts are never merged: the reversed layout wins whenever it matches at all.
   */
  private findPairs(text: string): DmsPair[] {
    const reversed = Array.from(text.matchAll(REVERSED_PAIR_PATTERN), match => ({
      latitude: `${match[2]}${match[1]}`,
      longitude: `${match[4]}${match[3]}`
    }));
    if (reversed.length > 0) {
      return reversed;
    }

    return Array.from(text.matchAll(STANDARD_PAIR_PATTERN), match => ({
      latitude: `${match[1]}${match[2]}`,
      longitude: `${match[3]}${match[4]}`
    }));
  }

  private toLocation(pair: DmsPair): GeoLocation {
    return {
      latitude: decodeDms(pair.latitude),
      longitude: decodeDms(pair.longitude)
    };
  }
}
