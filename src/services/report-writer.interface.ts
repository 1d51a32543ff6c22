import { ZoneReportEntry } from '../types/result.types';

export interface ReportRow {
  zone: string;
  shapeType: string;
  index?: number;
  latitude?: string;
  longitude?: string;
  radiusMeters?: number;
}

export interface IReportWriter {
  buildRows(entries: ZoneReportEntry[]): ReportRow[];
  renderCsv(entries: ZoneReportEntry[]): Promise<string>;
  writeReport(outputPath: string, entries: ZoneReportEntry[]): Promise<void>;
}
