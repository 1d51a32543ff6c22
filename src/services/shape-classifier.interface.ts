import { ClassifiedShape, GeoSample, ShapeHint } from '../types/domain.types';

/**
 * Empirically tuned limits of the shape heuristic.
 * Recalibrate here rather than in the decision logic.
 */
export interface ClassifierThresholds {
  /** distance-from-centroid variance over squared mean distance below which a ring is a circle */
  relativeVariance: number;
  /** first/last sample distance (degrees) under which a sample set is closed */
  closureTolerance: number;
  /** 2D cross-product magnitude under which two edges are parallel */
  parallelTolerance: number;
  /** rough meters per degree used to turn the mean angular radius into meters */
  metersPerDegree: number;
  /** closed line-hinted samples denser than this are circles without the variance test */
  denseLineMinSamples: number;
  denseLineCircles: boolean;
  /** sample count the downsampled display set aims for */
  downsampleTarget: number;
}

export interface IShapeClassifier {
  classify(samples: GeoSample[], hint?: ShapeHint): ClassifiedShape;
}
