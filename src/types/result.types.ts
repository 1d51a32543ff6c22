// Result types for adapter and service responses

import { ShapeType } from './domain.types';

/**
 * Represents the outcome of an operation that may succeed or fail.
 * Discriminated union prevents invalid states.
 */
export type Result<T> =
  | { readonly success: true; readonly data: T; readonly message: string }        // Success with data
  | { readonly success: true; readonly message: string }                          // Success without data (not found)
  | { readonly success: false; readonly message: string };                        // Failure

export enum ZoneErrorType {
  COORDINATES_UNPARSEABLE = 'COORDINATES_UNPARSEABLE',
  COORDINATES_MISSING = 'COORDINATES_MISSING',
  ZONE_PROCESSING_ERROR = 'ZONE_PROCESSING_ERROR'
}

export interface ZoneProcessingError {
  zoneName: string;
  errorType: ZoneErrorType;
  message: string;
}

export interface CoordinateRow {
  index: number;
  latitude: string;    // DMS token, e.g. N433604
  longitude: string;   // DMS token, e.g. E0765618
}

/**
 * One zone of the coordinate report.
 * Circles carry a center and radius, every other shape carries numbered rows.
 */
export type ZoneReportEntry =
  | {
      readonly zoneName: string;
      readonly shapeType: 'circle';
      readonly center: { latitude: string; longitude: string };
      readonly radiusMeters: number;
    }
  | {
      readonly zoneName: string;
      readonly shapeType: Exclude<ShapeType, 'circle'>;
      readonly rows: CoordinateRow[];
    }
  | {
      readonly zoneName: string;
      readonly shapeType: 'none';
    };

export interface ZoneReportResult {
  entries: ZoneReportEntry[];
  errors: ZoneProcessingError[];
}

// ============================================================================
// Type Guards - Shared utility functions for type narrowing
// ============================================================================

/**
 * Type guard to check if Result has data (success with data case).
 * Narrows type to { readonly success: true; readonly data: T; readonly message: string }
 */
export function isSuccess<T>(result: Result<T>): result is { readonly success: true; readonly data: T; readonly message: string } {
  return result.success && 'data' in result;
}

/**
 * Type guard to check if Result is not found (success without data case).
 */
export function isNotFound<T>(result: Result<T>): result is { readonly success: true; readonly message: string } {
  return result.success && !('data' in result);
}

export function isCircleEntry(entry: ZoneReportEntry): entry is Extract<ZoneReportEntry, { shapeType: 'circle' }> {
  return entry.shapeType === 'circle';
}

export function hasCoordinateRows(entry: ZoneReportEntry): entry is Extract<ZoneReportEntry, { rows: CoordinateRow[] }> {
  return 'rows' in entry;
}
