import { writeFile } from 'fs/promises';
import * as path from 'path';
import { XMLBuilder } from 'fast-xml-parser';
import { injectable } from 'tsyringe';
import { ZonePlacemark } from '../../types/domain.types';
import { formatCoordinateList } from '../../utils/coordinate-list.util';
import { IShapeDocumentWriter } from './kml-adapter.interface';

const KML_NAMESPACE = 'http://www.opengis.net/kml/2.2';
const XML_DECLARATION = '<?xml version="1.0" encoding="UTF-8"?>\n';

const ZONE_STYLE_ID = 'zone-style';

// KML colours are aabbggrr: opaque red outline, red fill at alpha 50
const ZONE_LINE_COLOR = 'ff0000ff';
const ZONE_FILL_COLOR = '320000ff';
const ZONE_LINE_WIDTH = 1;

@injectable()
export class KmlWriterAdapter implements IShapeDocumentWriter {
  private readonly builder = new XMLBuilder({
    ignoreAttributes: false,
    attributeNamePrefix: '@_',
    format: true,
    suppressEmptyNode: true
  });

  renderDocument(placemarks: ZonePlacemark[], documentName: string): string {
    const document = {
      kml: {
        '@_xmlns': KML_NAMESPACE,
        Document: {
          name: documentName,
          Style: {
            '@_id': ZONE_STYLE_ID,
            LineStyle: { color: ZONE_LINE_COLOR, width: ZONE_LINE_WIDTH },
            PolyStyle: { color: ZONE_FILL_COLOR }
          },
          Placemark: placemarks.map(placemark => ({
            name: placemark.name,
            description: placemark.description,
            styleUrl: `#${ZONE_STYLE_ID}`,
            Polygon: {
              outerBoundaryIs: {
                LinearRing: {
                  coordinates: formatCoordinateList(placemark.ring)
                }
              }
            }
          }))
        }
      }
    };

    return XML_DECLARATION + this.builder.build(document);
  }

  async writeDocument(outputPath: string, placemarks: ZonePlacemark[]): Promise<void> {
    const documentName = path.basename(outputPath, path.extname(outputPath));
    await writeFile(outputPath, this.renderDocument(placemarks, documentName), 'utf-8');
  }
}
