import { formatCoordinateList, parseCoordinateList } from './coordinate-list.util';

describe('coordinate-list.util', () => {
  describe('parseCoordinateList', () => {
    it('should read lon,lat,alt tuples separated by any whitespace', () => {
      const samples = parseCoordinateList('\n  76.9,43.6,120 77,43.5\n\t77.1,43.4,0  ');

      expect(samples).toEqual([
        { longitude: 76.9, latitude: 43.6, altitude: 120 },
        { longitude: 77, latitude: 43.5, altitude: 0 },
        { longitude: 77.1, latitude: 43.4, altitude: 0 }
      ]);
    });

    // Test: Altitude defaults to 0 when empty or missing
    it('should default a missing altitude to zero', () => {
      expect(parseCoordinateList('10,20,')).toEqual([{ longitude: 10, latitude: 20, altitude: 0 }]);
    });

    it('should drop tokens without a usable longitude and latitude', () => {
      const samples = parseCoordinateList('10 abc,20 10,north 11,21');

      expect(samples).toEqual([{ longitude: 11, latitude: 21, altitude: 0 }]);
    });

    it('should return an empty list for blank text', () => {
      expect(parseCoordinateList('   ')).toEqual([]);
    });
  });

  describe('formatCoordinateList', () => {
    it('should write lon,lat,0 tuples separated by spaces', () => {
      expect(formatCoordinateList([[76.5, 43.5], [77, 43]])).toBe('76.5,43.5,0 77,43,0');
    });
  });
});
