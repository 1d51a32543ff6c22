import { readFile } from 'fs/promises';
import { parse } from 'csv-parse';
import { inject, injectable } from 'tsyringe';
import { Result } from '../../types/result.types';
import { IZoneRecordAdapter, ZoneLoadResult } from './zone-adapter.interface';
import { mapZoneRecords } from './zone-record.mapper';

@injectable()
export class ZoneCsvAdapter implements IZoneRecordAdapter {
  constructor(
    @inject('ZonesDataPath') private readonly dataPath: string,
    @inject('ZoneExclusionMarker') private readonly exclusionMarker: string
  ) {}

  async loadZones(): Promise<Result<ZoneLoadResult>> {
    try {
      const fileContent = await readFile(this.dataPath, 'utf-8');
      const rows = await this.parseRows(fileContent);

      const data = mapZoneRecords(rows, this.exclusionMarker, 'Zone CSV Adapter');
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

  private parseRows(content: string): Promise<unknown[]> {
    return new Promise((resolve, reject) => {
      parse(
        content,
        { columns: true, skip_empty_lines: true, bom: true, trim: true, relax_column_count: true },
        (error, records: unknown[] | undefined) => {
          if (error) {
            reject(error);
            return;
          }
          resolve(records ?? []);
        }
      );
    });
  }
}
