import 'reflect-metadata';
import * as path from 'path';
import { container } from 'tsyringe';
import { IShapeDocumentReader, IShapeDocumentWriter } from '../adapters/kml/kml-adapter.interface';
import { KmlReaderAdapter } from '../adapters/kml/kml-reader.adapter';
import { KmlWriterAdapter } from '../adapters/kml/kml-writer.adapter';
import { IZoneRecordAdapter } from '../adapters/zones/zone-adapter.interface';
import { ZoneCsvAdapter } from '../adapters/zones/zone-csv.adapter';
import { ZoneJsonAdapter } from '../adapters/zones/zone-json.adapter';
import { ICoordinateExtractor } from '../services/coordinate-extractor.interface';
import { CoordinateExtractorService } from '../services/coordinate-extractor.service';
import { IReportWriter } from '../services/report-writer.interface';
import { ReportWriterService } from '../services/report-writer.service';
import { IShapeClassifier } from '../services/shape-classifier.interface';
import { ShapeClassifierService } from '../services/shape-classifier.service';
import { IZoneConverter } from '../services/zone-converter.interface';
import { ZoneConverterService } from '../services/zone-converter.service';
import { IZoneReportService } from '../services/zone-report.interface';
import { ZoneReportService } from '../services/zone-report.service';
import { AppConfig } from './app.config';

export function setupDI(config: AppConfig): void {
  // Register configuration values
  container.register('AppConfig', { useValue: config });
  container.register('ZonesDataPath', { useValue: config.data.zonesPath });
  container.register('ZoneExclusionMarker', { useValue: config.zones.exclusionMarker });
  container.register('ExtractorOptions', {
    useValue: {
      defaultRadiusMeters: config.zones.defaultRadiusMeters,
      circleVertexCount: config.zones.circleVertexCount
    }
  });
  container.register('ClassifierThresholds', { useValue: config.classifier });
  container.register('BatchSize', { useValue: config.batchSize });

  // Register adapters
  const zoneAdapter = path.extname(config.data.zonesPath).toLowerCase() === '.csv'
    ? ZoneCsvAdapter
    : ZoneJsonAdapter;
  container.register<IZoneRecordAdapter>('IZoneRecordAdapter', {
    useClass: zoneAdapter
  });

  container.register<IShapeDocumentWriter>('IShapeDocumentWriter', {
    useClass: KmlWriterAdapter
  });

  container.register<IShapeDocumentReader>('IShapeDocumentReader', {
    useClass: KmlReaderAdapter
  });

  // Register services
  container.register<ICoordinateExtractor>('ICoordinateExtractor', {
    useClass: CoordinateExtractorService
  });

  container.register<IShapeClassifier>('IShapeClassifier', {
    useClass: ShapeClassifierService
  });

  container.register<IZoneConverter>('IZoneConverter', {
    useClass: ZoneConverterService
  });

  container.register<IZoneReportService>('IZoneReportService', {
    useClass: ZoneReportService
  });

  container.register<IReportWriter>('IReportWriter', {
    useClass: ReportWriterService
  });
}
