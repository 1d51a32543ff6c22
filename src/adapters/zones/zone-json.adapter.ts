import { readFile } from 'fs/promises';
import { inject, injectable } from 'tsyringe';
import { Result } from '../../types/result.types';
import { IZoneRecordAdapter, ZoneLoadResult } from './zone-adapter.interface';
import { mapZoneRecords } from './zone-record.mapper';

@injectable()
export class ZoneJsonAdapter implements IZoneRecordAdapter {
  constructor(
    @inject('ZonesDataPath') private readonly dataPath: string,
    @inject('ZoneExclusionMarker') private readonly exclusionMarker: string
  ) {}

  async loadZones(): Promise<Result<ZoneLoadResult>> {
    try {
      const fileContent = await readFile(this.dataPath, 'utf-8');
      const rows: unknown = JSON.parse(fileContent);

      if (!Array.isArray(rows)) {
        return {
          success: false,
          message: `Failed to load zone records: ${this.dataPath} does not contain a JSON array`
        };
      }

      const data = mapZoneRecords(rows, this.exclusionMarker, 'Zone JSON Adapter');
      return {
        success: true,
        data,
        message: data.invalid > 0
          ? `Zone records loaded with ${data.invalid} invalid record(s) skipped`
          : 'Zone records loaded successfully'
      };
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : String(error);
      return {
        success: false,
        message: `Failed to load zone records: ${errorMessage}`
      };
    }
  }
}
