import 'dotenv/config';
import { ExtractorOptions } from '../services/coordinate-extractor.interface';
import { ClassifierThresholds } from '../services/shape-classifier.interface';

export interface AppConfig {
  data: {
    zonesPath: string;
    kmlOutputPath: string;
    reportInputPath: string;
    reportOutputPath: string;
  };
  zones: ExtractorOptions & {
    exclusionMarker: string;
  };
  classifier: ClassifierThresholds;
  batchSize: number;
  apiPort: number;
}

function readNumber(name: string, fallback: number, min: number, max: number): number {
  const raw = process.env[name];
  const value = raw === undefined || raw.trim() === '' ? fallback : Number(raw);
  if (!Number.isFinite(value) || value < min || value > max) {
    throw new Error(`${name} must be a number between ${min} and ${max}`);
  }
  return value;
}

function readInteger(name: string, fallback: number, min: number, max: number): number {
  const value = readNumber(name, fallback, min, max);
  if (!Number.isInteger(value)) {
    throw new Error(`${name} must be an integer`);
  }
  return value;
}

function readBoolean(name: string, fallback: boolean): boolean {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  return !['false', '0', 'no', 'off'].includes(raw.trim().toLowerCase());
}

export function loadConfig(): AppConfig {
  return {
    data: {
      zonesPath: process.env.ZONES_INPUT_PATH || './data/zones.json',
      kmlOutputPath: process.env.KML_OUTPUT_PATH || './data/zones.kml',
      reportInputPath: process.env.REPORT_INPUT_PATH || './data/zones.kml',
      reportOutputPath: process.env.REPORT_OUTPUT_PATH || './data/zones-coordinates.csv'
    },
    zones: {
      exclusionMarker: process.env.ZONE_EXCLUSION_MARKER || 'Исключена приказом',
      defaultRadiusMeters: readNumber('DEFAULT_RADIUS_METERS', 5000, 1, 1_000_000),
      circleVertexCount: readInteger('CIRCLE_VERTEX_COUNT', 36, 3, 3600)
    },
    classifier: {
      relativeVariance: readNumber('CLASSIFIER_RELATIVE_VARIANCE', 0.005, 0, 1),
      closureTolerance: readNumber('CLASSIFIER_CLOSURE_TOLERANCE', 1e-4, 0, 1),
      parallelTolerance: readNumber('CLASSIFIER_PARALLEL_TOLERANCE', 1e-5, 0, 1),
      metersPerDegree: readNumber('CLASSIFIER_METERS_PER_DEGREE', 111000, 1, 200000),
      denseLineMinSamples: readInteger('CLASSIFIER_DENSE_LINE_MIN_SAMPLES', 50, 0, 100000),
      denseLineCircles: readBoolean('CLASSIFIER_DENSE_LINE_CIRCLES', true),
      downsampleTarget: readInteger('CLASSIFIER_DOWNSAMPLE_TARGET', 10, 1, 1000)
    },
    batchSize: readInteger('BATCH_SIZE', 50, 1, 10000),
    apiPort: readInteger('API_PORT', 3001, 1, 65535)
  };
}
