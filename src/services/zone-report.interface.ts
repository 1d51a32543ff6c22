import { ShapeSource } from '../types/domain.types';
import { ZoneReportResult } from '../types/result.types';

export interface IZoneReportService {
  buildReport(shapes: ShapeSource[]): ZoneReportResult;
}
