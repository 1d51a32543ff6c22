import { inject, injectable } from 'tsyringe';
import { ClassifiedShape, GeoLocation, GeoSample, ShapeHint } from '../types/domain.types';
import { ClassifierThresholds, IShapeClassifier } from './shape-classifier.interface';

export const DEFAULT_CLASSIFIER_THRESHOLDS: ClassifierThresholds = {
  relativeVariance: 0.005,
  closureTolerance: 1e-4,
  parallelTolerance: 1e-5,
  metersPerDegree: 111000,
  denseLineMinSamples: 50,
  denseLineCircles: true,
  downsampleTarget: 10
};

interface SpreadStatistics {
  center: GeoLocation;
  meanDistance: number;
  relativeVariance: number;
}

/**
 * Infers the original geometry behind a sampled shape.
 *
 * Each rule is terminal and the order is load-bearing: moving a rule changes
 * the outcome for ambiguous input such as a sparse, nearly round polygon.
 */
@injectable()
export class ShapeClassifierService implements IShapeClassifier {
  private static readonly MIN_RING_SAMPLES = 4;
  private static readonly SPARSE_SAMPLE_LIMIT = 10;
  private static readonly RECTANGLE_SAMPLES = 5;

  constructor(
    @inject('ClassifierThresholds')
    private readonly thresholds: ClassifierThresholds = DEFAULT_CLASSIFIER_THRESHOLDS
  ) {}

  classify(samples: GeoSample[], hint?: ShapeHint): ClassifiedShape {
    const count = samples.length;

    if (count < ShapeClassifierService.MIN_RING_SAMPLES) {
      return { type: 'point', points: samples.slice() };
    }

    const closed = this.isClosed(samples);
    const spread = this.measureSpread(samples);

    // Dense closed strokes are circles in the source data, whatever their spread
    if (
      this.thresholds.denseLineCircles &&
      hint === 'line' &&
      count > this.thresholds.denseLineMinSamples &&
      closed
    ) {
      return this.toCircle(spread);
    }

    if ((closed && count > ShapeClassifierService.SPARSE_SAMPLE_LIMIT) || hint === 'polygon') {
      if (spread.relativeVariance < this.thresholds.relativeVariance) {
        return this.toCircle(spread);
      }
    }

    if (
      count === ShapeClassifierService.RECTANGLE_SAMPLES &&
      closed &&
      this.hasParallelOppositeSides(samples)
    ) {
      return { type: 'rectangle', points: samples.slice(0, 4) };
    }

    if (count < ShapeClassifierService.SPARSE_SAMPLE_LIMIT) {
      return { type: 'polygon', points: samples.slice() };
    }

    if (count > ShapeClassifierService.SPARSE_SAMPLE_LIMIT) {
      const points = this.downsample(samples, closed);
      return closed
        ? { type: 'complex_polygon', points }
        : { type: 'path', points };
    }

    return closed
      ? { type: 'polygon', points: samples.slice() }
      : { type: 'path', points: samples.slice() };
  }

  private isClosed(samples: GeoSample[]): boolean {
    const first = samples[0];
    const last = samples[samples.length - 1];
    const gap = Math.hypot(first.longitude - last.longitude, first.latitude - last.latitude);
    return gap < this.thresholds.closureTolerance;
  }

  private measureSpread(samples: GeoSample[]): SpreadStatistics {
    const center: GeoLocation = {
      longitude: samples.reduce((sum, s) => sum + s.longitude, 0) / samples.length,
      latitude: samples.reduce((sum, s) => sum + s.latitude, 0) / samples.length
    };

    const distances = samples.map(s =>
      Math.hypot(s.longitude - center.longitude, s.latitude - center.latitude)
    );
    const meanDistance = distances.reduce((sum, d) => sum + d, 0) / distances.length;
    const variance = distances.reduce((sum, d) => sum + (d - meanDistance) ** 2, 0) / distances.length;

    return {
      center,
      meanDistance,
      relativeVariance: meanDistance > 0 ? variance / meanDistance ** 2 : Number.POSITIVE_INFINITY
    };
  }

  private toCircle(spread: SpreadStatistics): ClassifiedShape {
    return {
      type: 'circle',
      circle: {
        center: spread.center,
        radiusMeters: spread.meanDistance * this.thresholds.metersPerDegree
      }
    };
  }

  // Edges of the first four corners; opposite pairs must have a near-zero cross product
  private hasParallelOppositeSides(samples: GeoSample[]): boolean {
    const sides = [0, 1, 2, 3].map(i => {
      const from = samples[i];
      const to = samples[(i + 1) % 4];
      return { dx: to.longitude - from.longitude, dy: to.latitude - from.latitude };
    });

    const cross = (a: { dx: number; dy: number }, b: { dx: number; dy: number }) =>
      Math.abs(a.dx * b.dy - a.dy * b.dx);

    return (
      cross(sides[0], sides[2]) < this.thresholds.parallelTolerance &&
      cross(sides[1], sides[3]) < this.thresholds.parallelTolerance
    );
  }

  private downsample(samples: GeoSample[], closed: boolean): GeoSample[] {
    const stride = Math.max(1, Math.floor(samples.length / this.thresholds.downsampleTarget));
    const reduced = samples.filter((_, index) => index % stride === 0);

    const last = samples[samples.length - 1];
    const reducedLast = reduced[reduced.length - 1];
    if (closed && !sameSample(reducedLast, last)) {
      reduced.push(last);
    }

    return reduced;
  }
}

function sameSample(a: GeoSample, b: GeoSample): boolean {
  return a.longitude === b.longitude && a.latitude === b.latitude && a.altitude === b.altitude;
}
