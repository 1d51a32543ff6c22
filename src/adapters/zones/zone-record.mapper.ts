import { z } from 'zod';
import { ZoneDescriptor } from '../../types/domain.types';
import { ZoneLoadResult } from './zone-adapter.interface';

// Source tables are exported with positional column names
const ZONE_COLUMNS = {
  name: '1',
  coordinates: '2',
  altitudeRange: '3',
  altitudeLimit: '4',
  schedule: '5'
} as const;

// Spreadsheet exports leave numbers as numbers and empty cells as null
const CellSchema = z.union([z.string(), z.number(), z.null()]).optional();

const ZoneRecordSchema = z.object({
  [ZONE_COLUMNS.name]: CellSchema,
  [ZONE_COLUMNS.coordinates]: CellSchema,
  [ZONE_COLUMNS.altitudeRange]: CellSchema,
  [ZONE_COLUMNS.altitudeLimit]: CellSchema,
  [ZONE_COLUMNS.schedule]: CellSchema
});

type ZoneRecord = z.infer<typeof ZoneRecordSchema>;

function cellText(value: ZoneRecord[keyof ZoneRecord]): string {
  return value === null || value === undefined ? '' : String(value).trim();
}

/**
 * Validates raw rows and maps them to zone descriptors.
 * Invalid rows are counted and skipped, never thrown.
 */
export function mapZoneRecords(rows: unknown[], exclusionMarker: string, source: string): ZoneLoadResult {
  const zones: ZoneDescriptor[] = [];
  let skipped = 0;
  let invalid = 0;

  rows.forEach((row, index) => {
    const validationResult = ZoneRecordSchema.safeParse(row);
    if (!validationResult.success) {
      const errors = validationResult.error.issues
        .map(issue => `${issue.path.join('.')}: ${issue.message}`)
        .join(', ');
      console.warn(`[${source}] Skipping invalid zone record #${index + 1}: ${errors}`);
      invalid++;
      return;
    }

    const record = validationResult.data;
    const name = cellText(record[ZONE_COLUMNS.name]);
    const coordinateText = cellText(record[ZONE_COLUMNS.coordinates]);

    if (exclusionMarker && name.includes(exclusionMarker)) {
      skipped++;
      return;
    }
    if (!name || !coordinateText) {
      skipped++;
      return;
    }

    zones.push({
      name,
      coordinateText,
      altitudeRange: cellText(record[ZONE_COLUMNS.altitudeRange]),
      altitudeLimit: cellText(record[ZONE_COLUMNS.altitudeLimit]),
      schedule: cellText(record[ZONE_COLUMNS.schedule])
    });
  });

  return { zones, skipped, invalid };
}
