import { ZoneDescriptor, ZonePlacemark } from '../types/domain.types';
import { ZoneProcessingError } from '../types/result.types';

export interface ZoneConversionResult {
  placemarks: ZonePlacemark[];
  errors: ZoneProcessingError[];
  succeeded: number;
  failed: number;
}

export interface IZoneConverter {
  convertZones(zones: ZoneDescriptor[]): ZoneConversionResult;
}
