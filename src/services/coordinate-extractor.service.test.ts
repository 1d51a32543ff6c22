import 'reflect-metadata';
import { CoordinateExtractorService, DEFAULT_EXTRACTOR_OPTIONS } from './coordinate-extractor.service';

describe('CoordinateExtractorService', () => {
  let extractor: CoordinateExtractorService;

  beforeEach(() => {
    extractor = new CoordinateExtractorService(DEFAULT_EXTRACTOR_OPTIONS);
  });

  describe('standard layout', () => {
    // Test: N/S + 6 digits followed by E/W + 7 digits
    it('should decode a single pair into a longitude-first vertex', () => {
      const geometry = extractor.extract('N433604 E0765618');

      expect(geometry.kind).toBe('polygon');
      expect(geometry.ring).toHaveLength(1);
      expect(geometry.ring[0][0]).toBeCloseTo(76.9383, 4);
      expect(geometry.ring[0][1]).toBeCloseTo(43.6011, 4);
    });

    it('should accept spaces, dashes and commas between tokens', () => {
      const geometry = extractor.extract('N 433604, E 0765618 - N-433900 E-0770200');

      expect(geometry.kind).toBe('polygon');
      expect(geometry.ring).toHaveLength(3);
      expect(geometry.ring[1][1]).toBeCloseTo(43.65, 4);
      expect(geometry.ring[1][0]).toBeCloseTo(77.0333, 4);
    });

    // Test: Open rings get the first vertex appended
    it('should close the ring when the last vertex differs from the first', () => {
      const geometry = extractor.extract('N433604 E0765618 N433900 E0770200 N433500 E0770500');

      expect(geometry.ring).toHaveLength(4);
      expect(geometry.ring[3]).toEqual(geometry.ring[0]);
    });

    it('should not duplicate the closing vertex of an already closed ring', () => {
      const geometry = extractor.extract(
        'N433604 E0765618 N433900 E0770200 N433500 E0770500 N433604 E0765618'
      );

      expect(geometry.ring).toHaveLength(4);
      expect(geometry.ring[3]).toEqual(geometry.ring[0]);
    });
  });

  describe('reversed layout', () => {
    // Test: 6 digits + N/S followed by 7 digits + E/W
    it('should decode digits-first pairs', () => {
      const geometry = extractor.extract('460755N 0805610E');

      expect(geometry.kind).toBe('polygon');
      expect(geometry.ring).toHaveLength(1);
      expect(geometry.ring[0][0]).toBeCloseTo(80.9361, 4);
      expect(geometry.ring[0][1]).toBeCloseTo(46.1319, 4);
    });

    it('should accept a dash or no separator between latitude and longitude', () => {
      const geometry = extractor.extract('460755N-0805610E 461000N0810000E');

      expect(geometry.ring).toHaveLength(3);
      expect(geometry.ring[1]).toEqual([81, 46 + 10 / 60]);
    });

    // Test: Layouts are mutually exclusive; reversed wins when it matches
    it('should ignore standard-layout pairs when reversed-layout pairs are present', () => {
      const geometry = extractor.extract('460755N 0805610E N433604 E0765618');

      expect(geometry.ring).toHaveLength(1);
      expect(geometry.ring[0][0]).toBeCloseTo(80.9361, 4);
    });
  });

  describe('normalization', () => {
    it('should read a Cyrillic look-alike E as a Latin hemisphere letter', () => {
      const geometry = extractor.extract('N433604 Е0765618');

      expect(geometry.kind).toBe('polygon');
      expect(geometry.ring[0][0]).toBeCloseTo(76.9383, 4);
    });

    it('should collapse irregular whitespace before matching', () => {
      const geometry = extractor.extract('  N433604\n\t E0765618  ');

      expect(geometry.kind).toBe('polygon');
      expect(geometry.ring).toHaveLength(1);
    });
  });

  describe('circles', () => {
    // Test: Radius marker switches to circle mode around the first pair
    it('should synthesize a closed 37-point ring around the parsed center', () => {
      const geometry = extractor.extract('N433604 E0765618 R=5000');

      expect(geometry.kind).toBe('circle');
      if (geometry.kind !== 'circle') return;

      expect(geometry.circle.radiusMeters).toBe(5000);
      expect(geometry.circle.center.latitude).toBeCloseTo(43.6011, 4);
      expect(geometry.circle.center.longitude).toBeCloseTo(76.9383, 4);
      expect(geometry.ring).toHaveLength(37);
      expect(geometry.ring[36]).toEqual(geometry.ring[0]);

      const centroidLon = geometry.ring.reduce((sum, [lon]) => sum + lon, 0) / geometry.ring.length;
      const centroidLat = geometry.ring.reduce((sum, [, lat]) => sum + lat, 0) / geometry.ring.length;
      expect(centroidLon).toBeCloseTo(geometry.circle.center.longitude, 2);
      expect(centroidLat).toBeCloseTo(geometry.circle.center.latitude, 2);
    });

    it('should accept a dash as the radius marker', () => {
      const geometry = extractor.extract('Круг R-3000 м, центр 460755N 0805610Е');

      expect(geometry.kind).toBe('circle');
      if (geometry.kind !== 'circle') return;
      expect(geometry.circle.radiusMeters).toBe(3000);
      expect(geometry.circle.center.longitude).toBeCloseTo(80.9361, 4);
    });

    it('should use only the first pair as the center', () => {
      const geometry = extractor.extract('R=1000 N433604 E0765618 N440000 E0770000');

      expect(geometry.kind).toBe('circle');
      if (geometry.kind !== 'circle') return;
      expect(geometry.circle.center.latitude).toBeCloseTo(43.6011, 4);
    });

    it('should keep a zero radius as written', () => {
      const geometry = extractor.extract('N433604 E0765618 R=0');

      expect(geometry.kind).toBe('circle');
      if (geometry.kind !== 'circle') return;
      expect(geometry.circle.radiusMeters).toBe(0);
      expect(geometry.ring).toHaveLength(37);
    });

    // Test: Marker present but digits not adjacent to it
    it('should use the configured radius and vertex count when the marker has no digits', () => {
      extractor = new CoordinateExtractorService({ defaultRadiusMeters: 2500, circleVertexCount: 12 });

      const geometry = extractor.extract('N433604 E0765618 R= 3000 m');

      expect(geometry.kind).toBe('circle');
      if (geometry.kind !== 'circle') return;
      expect(geometry.circle.radiusMeters).toBe(2500);
      expect(geometry.circle.center.latitude).toBeCloseTo(43.6011, 4);
      expect(geometry.ring).toHaveLength(13);
    });

    it('should default to 5000 meters for a bare dash marker', () => {
      const geometry = extractor.extract('460755N 0805610E R-');

      expect(geometry.kind).toBe('circle');
      if (geometry.kind !== 'circle') return;
      expect(geometry.circle.radiusMeters).toBe(5000);
      expect(geometry.ring).toHaveLength(37);
    });
  });

  describe('unparseable input', () => {
    it('should return an empty unparseable result instead of throwing', () => {
      expect(extractor.extract('see attached chart')).toEqual({ kind: 'unparseable', ring: [] });
      expect(extractor.extract('')).toEqual({ kind: 'unparseable', ring: [] });
    });

    // Test: Radius without a center is still unparseable
    it('should report a radius without coordinates as unparseable', () => {
      expect(extractor.extract('R=5000').kind).toBe('unparseable');
    });
  });
});
