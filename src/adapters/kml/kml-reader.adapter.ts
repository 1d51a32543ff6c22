import { readFile } from 'fs/promises';
import { XMLParser } from 'fast-xml-parser';
import { injectable } from 'tsyringe';
import { GeoSample, ShapeHint, ShapeSource } from '../../types/domain.types';
import { Result } from '../../types/result.types';
import { parseCoordinateList } from '../../utils/coordinate-list.util';
import { IShapeDocumentReader } from './kml-adapter.interface';

type XmlNode = Record<string, unknown>;

function isNode(value: unknown): value is XmlNode {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function asArray(value: unknown): unknown[] {
  if (value === undefined || value === null) {
    return [];
  }
  return Array.isArray(value) ? value : [value];
}

function textOf(value: unknown): string {
  if (typeof value === 'string' || typeof value === 'number') {
    return String(value).trim();
  }
  // Elements with attributes keep their text under #text
  if (isNode(value)) {
    return textOf(value['#text']);
  }
  return '';
}

/** First value stored under `key` anywhere below `node`, depth first */
function findDescendant(node: unknown, key: string): unknown {
  for (const item of asArray(node)) {
    if (!isNode(item)) {
      continue;
    }
    if (key in item) {
      return asArray(item[key])[0];
    }
    for (const child of Object.values(item)) {
      const found = findDescendant(child, key);
      if (found !== undefined) {
        return found;
      }
    }
  }
  return undefined;
}

function collectPlacemarks(node: unknown, into: XmlNode[]): XmlNode[] {
  for (const item of asArray(node)) {
    if (!isNode(item)) {
      continue;
    }
    for (const [key, child] of Object.entries(item)) {
      if (key === 'Placemark') {
        into.push(...asArray(child).filter(isNode));
      } else {
        collectPlacemarks(child, into);
      }
    }
  }
  return into;
}

@injectable()
export class KmlReaderAdapter implements IShapeDocumentReader {
  private readonly parser = new XMLParser({
    ignoreAttributes: true,
    removeNSPrefix: true,
    parseTagValue: false,
    isArray: (name) => ['Folder', 'Document', 'Placemark'].includes(name)
  });

  async readShapes(inputPath: string): Promise<Result<ShapeSource[]>> {
    try {
      const content = await readFile(inputPath, 'utf-8');
      const shapes = this.parseShapes(content);
      if (shapes.length === 0) {
        return { success: true, message: `No placemarks found in ${inputPath}` };
      }
      return {
        success: true,
        data: shapes,
        message: `Read ${shapes.length} placemark(s) from ${inputPath}`
      };
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : String(error);
      return {
        success: false,
        message: `Failed to read shape document: ${errorMessage}`
      };
    }
  }

  parseShapes(content: string): ShapeSource[] {
    const parsed: unknown = this.parser.parse(content);

    // Zones live in the first folder when there is one, otherwise anywhere in the document
    const scope = findDescendant(parsed, 'Folder') ?? parsed;

    const shapes: ShapeSource[] = [];
    for (const placemark of collectPlacemarks(scope, [])) {
      const name = textOf(findDescendant(placemark, 'name'));
      if (!name) {
        continue;
      }
      shapes.push({ name, ...this.readGeometry(placemark, name) });
    }
    return shapes;
  }

  private readGeometry(placemark: XmlNode, name: string): { hint?: ShapeHint; samples: GeoSample[] } {
    const polygon = findDescendant(placemark, 'Polygon');
    const ring = findDescendant(findDescendant(polygon, 'outerBoundaryIs'), 'LinearRing');
    const ringCoordinates = findDescendant(ring, 'coordinates');
    if (ringCoordinates !== undefined) {
      return { hint: 'polygon', samples: parseCoordinateList(textOf(ringCoordinates)) };
    }

    const lineCoordinates = findDescendant(findDescendant(placemark, 'LineString'), 'coordinates');
    if (lineCoordinates !== undefined) {
      return { hint: 'line', samples: parseCoordinateList(textOf(lineCoordinates)) };
    }

    console.warn(`[KML Reader] No polygon or line coordinates in placemark ${name}`);
    return { samples: [] };
  }
}
