import { writeFile } from 'fs/promises';
import { stringify } from 'csv-stringify';
import { injectable } from 'tsyringe';
import { hasCoordinateRows, isCircleEntry, ZoneReportEntry } from '../types/result.types';
import { IReportWriter, ReportRow } from './report-writer.interface';

const REPORT_COLUMNS: Array<keyof ReportRow> = [
  'zone',
  'shapeType',
  'index',
  'latitude',
  'longitude',
  'radiusMeters'
];

@injectable()
export class ReportWriterService implements IReportWriter {
  buildRows(entries: ZoneReportEntry[]): ReportRow[] {
    return entries.flatMap((entry): ReportRow[] => {
      if (isCircleEntry(entry)) {
        return [{
          zone: entry.zoneName,
          shapeType: entry.shapeType,
          latitude: entry.center.latitude,
          longitude: entry.center.longitude,
          radiusMeters: entry.radiusMeters
        }];
      }

      if (hasCoordinateRows(entry)) {
        return entry.rows.map(row => ({
          zone: entry.zoneName,
          shapeType: entry.shapeType,
          index: row.index,
          latitude: row.latitude,
          longitude: row.longitude
        }));
      }

      return [{ zone: entry.zoneName, shapeType: entry.shapeType }];
    });
  }

  async renderCsv(entries: ZoneReportEntry[]): Promise<string> {
    const rows = this.buildRows(entries);

    return new Promise((resolve, reject) => {
      stringify(rows, { header: true, columns: REPORT_COLUMNS }, (err, output) => {
        if (err) {
          reject(err);
          return;
        }
        resolve(output);
      });
    });
  }

  async writeReport(outputPath: string, entries: ZoneReportEntry[]): Promise<void> {
    const output = await this.renderCsv(entries);
    await writeFile(outputPath, output, 'utf-8');
  }
}
