import { ZoneGeometry } from '../types/domain.types';

export interface ExtractorOptions {
  defaultRadiusMeters: number;
  circleVertexCount: number;
}

/**
 * Turns a free-text zone coordinate definition into geometry.
 */
export interface ICoordinateExtractor {
  /**
   * @returns polygon ring, synthesized circle, or `unparseable` with an empty ring when no pair matched
   */
  extract(coordinateText: string): ZoneGeometry;
}
