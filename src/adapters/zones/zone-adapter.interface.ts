import { ZoneDescriptor } from '../../types/domain.types';
import { Result } from '../../types/result.types';

export interface ZoneLoadResult {
  zones: ZoneDescriptor[];
  /** excluded, or missing a name or coordinate definition */
  skipped: number;
  /** rejected by validation */
  invalid: number;
}

/**
 * Adapter for reading zone records exported from source tables.
 */
export interface IZoneRecordAdapter {
  /**
   * @returns Result with success=true and data when the table was read, success=false when it could not be read at all
   */
  loadZones(): Promise<Result<ZoneLoadResult>>;
}
