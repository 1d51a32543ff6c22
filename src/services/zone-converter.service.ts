import { inject, injectable } from 'tsyringe';
import { ZoneDescriptor, ZonePlacemark } from '../types/domain.types';
import { ZoneErrorType, ZoneProcessingError } from '../types/result.types';
import { ICoordinateExtractor } from './coordinate-extractor.interface';
import { IZoneConverter, ZoneConversionResult } from './zone-converter.interface';

/**
 * Turns zone records into renderable placemarks.
 * A zone that cannot be parsed is counted and reported; the batch always completes.
 */
@injectable()
export class ZoneConverterService implements IZoneConverter {
  constructor(
    @inject('ICoordinateExtractor') private readonly extractor: ICoordinateExtractor,
    @inject('BatchSize') private readonly batchSize: number
  ) {}

  convertZones(zones: ZoneDescriptor[]): ZoneConversionResult {
    const placemarks: ZonePlacemark[] = [];
    const errors: ZoneProcessingError[] = [];

    const chunks = this.chunkArray(zones, this.batchSize);
    let processed = 0;

    for (const chunk of chunks) {
      for (const zone of chunk) {
        const outcome = this.convertZone(zone);
        if ('placemark' in outcome) {
          placemarks.push(outcome.placemark);
        } else {
          errors.push(outcome.error);
        }
      }

      processed += chunk.length;
      if (chunks.length > 1) {
        console.log(`[Zone Converter] Processed ${processed}/${zones.length} zones`);
      }
    }

    return {
      placemarks,
      errors,
      succeeded: placemarks.length,
      failed: errors.length
    };
  }

  private convertZone(zone: ZoneDescriptor): { placemark: ZonePlacemark } | { error: ZoneProcessingError } {
    try {
      const geometry = this.extractor.extract(zone.coordinateText);

      if (geometry.kind === 'unparseable') {
        console.warn(`[Zone Converter] Failed to parse coordinates for zone ${zone.name}: ${zone.coordinateText}`);
        return {
          error: {
            zoneName: zone.name,
            errorType: ZoneErrorType.COORDINATES_UNPARSEABLE,
            message: `No coordinate pairs found in "${zone.coordinateText}"`
          }
        };
      }

      return {
        placemark: {
          name: zone.name,
          description: this.describe(zone),
          ring: geometry.ring
        }
      };
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : String(error);
      console.error(`[Zone Converter] Zone ${zone.name} failed: ${errorMessage}`);
      return {
        error: {
          zoneName: zone.name,
          errorType: ZoneErrorType.ZONE_PROCESSING_ERROR,
          message: errorMessage
        }
      };
    }
  }

  private describe(zone: ZoneDescriptor): string {
    return `Altitude: ${zone.altitudeRange}\nLimit: ${zone.altitudeLimit}\nSchedule: ${zone.schedule}`;
  }

  private chunkArray<T>(array: T[], size: number): T[][] {
    const chunks: T[][] = [];
    for (let i = 0; i < array.length; i += size) {
      chunks.push(array.slice(i, i + size));
    }
    return chunks;
  }
}
