import { ShapeSource, ZonePlacemark } from '../../types/domain.types';
import { Result } from '../../types/result.types';

/**
 * Writes zone placemarks as a shape document.
 */
export interface IShapeDocumentWriter {
  renderDocument(placemarks: ZonePlacemark[], documentName: string): string;
  writeDocument(outputPath: string, placemarks: ZonePlacemark[]): Promise<void>;
}

/**
 * Reads placemarks and their sampled coordinates back from a shape document.
 */
export interface IShapeDocumentReader {
  /**
   * @returns Result with data when placemarks were found, success without data for a document with none, failure when the file cannot be read or parsed
   */
  readShapes(inputPath: string): Promise<Result<ShapeSource[]>>;
  parseShapes(content: string): ShapeSource[];
}
