import { decodeDms, encodeDms, toDmsPair } from './dms.util';

describe('dms.util', () => {
  describe('decodeDms', () => {
    // Test: Latitude token uses DD MM SS grouping
    it('should decode a latitude token to decimal degrees', () => {
      expect(decodeDms('N433604')).toBeCloseTo(43.6011, 4);
    });

    // Test: Longitude token uses DDD MM SS grouping
    it('should decode a longitude token to decimal degrees', () => {
      expect(decodeDms('E0713936')).toBeCloseTo(71.66, 4);
    });

    it('should negate southern and western hemispheres', () => {
      expect(decodeDms('S433604')).toBe(-decodeDms('N433604'));
      expect(decodeDms('W0713936')).toBe(-decodeDms('E0713936'));
    });

    // Test: Truncated source data is padded on the left, not rejected
    it('should left-pad short digit strings with zeros', () => {
      expect(() => decodeDms('N4336')).not.toThrow();
      expect(decodeDms('N4336')).toBe(decodeDms('N004336'));
      expect(decodeDms('N4336')).toBeCloseTo(0.726667, 6);
    });

    it('should decode a token without digits to zero', () => {
      expect(decodeDms('N')).toBe(0);
    });

    it('should accept lowercase hemisphere letters', () => {
      expect(decodeDms('s433604')).toBe(-decodeDms('N433604'));
    });

    it('should ignore separators inside the digit string', () => {
      expect(decodeDms('N43-36-04')).toBe(decodeDms('N433604'));
    });

    // Test: Unknown direction letter falls back to the digit count
    it('should infer the axis from digit count when the letter is not a hemisphere', () => {
      expect(decodeDms('X0713936')).toBeCloseTo(71.66, 4);
      expect(decodeDms('X433604')).toBeCloseTo(43.6011, 4);
    });

    it('should read leading groups of an over-long digit string', () => {
      expect(decodeDms('N4336041')).toBe(decodeDms('N433604'));
    });
  });

  describe('encodeDms', () => {
    // Test: Decoded tokens re-encode to the same text
    it('should round-trip literal tokens', () => {
      expect(encodeDms(decodeDms('N433604'), 'latitude')).toBe('N433604');
      expect(encodeDms(decodeDms('E0713936'), 'longitude')).toBe('E0713936');
      expect(encodeDms(decodeDms('E0765618'), 'longitude')).toBe('E0765618');
      expect(encodeDms(decodeDms('S001559'), 'latitude')).toBe('S001559');
    });

    it('should pick the hemisphere letter from the sign and axis', () => {
      expect(encodeDms(-43.6012, 'latitude')).toBe('S433604');
      expect(encodeDms(-71.66, 'longitude')).toBe('W0713936');
      expect(encodeDms(0, 'latitude')).toBe('N000000');
      expect(encodeDms(0, 'longitude')).toBe('E0000000');
    });

    // Test: Seconds are truncated, so 04.68" stays 04"
    it('should truncate seconds instead of rounding', () => {
      expect(encodeDms(43.6013, 'latitude')).toBe('N433604');
    });

    it('should zero-pad degrees, minutes and seconds', () => {
      expect(encodeDms(5.5, 'longitude')).toBe('E0053000');
      expect(encodeDms(5.5, 'latitude')).toBe('N053000');
    });
  });

  describe('toDmsPair', () => {
    it('should render latitude and longitude tokens', () => {
      const pair = toDmsPair(decodeDms('N433604'), decodeDms('E0765618'));

      expect(pair).toEqual({ latitude: 'N433604', longitude: 'E0765618' });
    });
  });
});
