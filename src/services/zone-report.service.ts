import { inject, injectable } from 'tsyringe';
import { ClassifiedShape, ShapeSource } from '../types/domain.types';
import { ZoneErrorType, ZoneProcessingError, ZoneReportEntry, ZoneReportResult } from '../types/result.types';
import { toDmsPair } from '../utils/dms.util';
import { IShapeClassifier } from './shape-classifier.interface';
import { IZoneReportService } from './zone-report.interface';

@injectable()
export class ZoneReportService implements IZoneReportService {
  constructor(@inject('IShapeClassifier') private readonly classifier: IShapeClassifier) {}

  buildReport(shapes: ShapeSource[]): ZoneReportResult {
    const entries: ZoneReportEntry[] = [];
    const errors: ZoneProcessingError[] = [];

    for (const shape of shapes) {
      if (shape.samples.length === 0) {
        errors.push({
          zoneName: shape.name,
          errorType: ZoneErrorType.COORDINATES_MISSING,
          message: 'Placemark has no polygon or line coordinates'
        });
        entries.push({ zoneName: shape.name, shapeType: 'none' });
        continue;
      }

      const classified = this.classifier.classify(shape.samples, shape.hint);
      console.log(`[Zone Report] Zone: ${shape.name}, type: ${classified.type}, points: ${shape.samples.length}`);

      entries.push(this.toEntry(shape.name, classified));
    }

    return { entries, errors };
  }

  private toEntry(zoneName: string, shape: ClassifiedShape): ZoneReportEntry {
    if (shape.type === 'circle') {
      const { center, radiusMeters } = shape.circle;
      return {
        zoneName,
        shapeType: 'circle',
        center: toDmsPair(center.latitude, center.longitude),
        radiusMeters: Math.round(radiusMeters)
      };
    }

    return {
      zoneName,
      shapeType: shape.type,
      rows: shape.points.map((point, i) => ({
        index: i + 1,
        ...toDmsPair(point.latitude, point.longitude)
      }))
    };
  }
}
