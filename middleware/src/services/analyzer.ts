import type { AnalysisResult, ShelfGeometry } from '../../../types';
import type { ShelfGeometryResolver } from './shelfGeometry';

export const EMPTY: Readonly<AnalysisResult> = Object.freeze({ occupied: false, fillPercent: 0 });

const empty = (): AnalysisResult => ({ ...EMPTY });

export const isValidDistance = (distanceCm: number): boolean =>
  Number.isFinite(distanceCm) && distanceCm >= 0;

/**
 * Occupancy decision for one reading against a known geometry.
 *
 * The beam reaching the back wall means nothing is on the shelf. Anything
 * shorter is occluded by stock. With a bound product the occlusion has to be
 * at least one unit long, otherwise it has to exceed the noise threshold.
 * Missing or degenerate geometry reads as empty.
 */
export function computeOccupancy(
  geometry: ShelfGeometry | null,
  distanceCm: number,
  occupiedThresholdCm: number,
): AnalysisResult {
  if (!geometry) return empty();

  const { maxDistance, productLength } = geometry;
  if (!(maxDistance > 0)) return empty();

  if (distanceCm >= maxDistance) return empty();

  const occupiedLength = maxDistance - distanceCm;

  if (productLength !== null && productLength > 0) {
    if (occupiedLength < productLength) return empty();
  } else if (!(occupiedLength > occupiedThresholdCm)) {
    return empty();
  }

  const fillPercent = (occupiedLength / maxDistance) * 100;

  return {
    occupied: true,
    fillPercent: Math.max(0, Math.min(100, fillPercent)),
  };
}

export function estimateCount(distanceCm: number, productLength: number, maxDistance: number): number {
  if (productLength <= 0) return 0;

  const occupiedSpace = maxDistance - distanceCm;
  if (occupiedSpace < productLength) return 0;

  return Math.max(0, Math.floor(occupiedSpace / productLength));
}

export function formatUptime(uptimeMs: number): string {
  const totalSeconds = Math.floor(uptimeMs / 1000);
  const hours = Math.floor(totalSeconds / 3600);
  const minutes = Math.floor((totalSeconds % 3600) / 60);
  const seconds = totalSeconds % 60;

  const pad = (n: number) => String(n).padStart(2, '0');
  return `${pad(hours)}:${pad(minutes)}:${pad(seconds)}`;
}

/** An analysis together with the geometry it was computed against. */
export interface Assessment extends AnalysisResult {
  geometry: ShelfGeometry | null;
  estimatedCount: number | null; // null unless the product length is known
}

export function assessReading(
  geometry: ShelfGeometry | null,
  distanceCm: number,
  occupiedThresholdCm: number,
): Assessment {
  const result = computeOccupancy(geometry, distanceCm, occupiedThresholdCm);
  const estimatedCount =
    geometry && geometry.productLength !== null && geometry.productLength > 0
      ? estimateCount(distanceCm, geometry.productLength, geometry.maxDistance)
      : null;

  return { ...result, geometry, estimatedCount };
}

export interface OccupancyAnalyzer {
  analyze(shelfId: string, distanceCm: number): AnalysisResult;
  assess(shelfId: string, distanceCm: number): Assessment;
  geometryOf(shelfId: string): ShelfGeometry | null;
}

export function createAnalyzer(resolver: ShelfGeometryResolver, occupiedThresholdCm: number): OccupancyAnalyzer {
  return {
    analyze: (shelfId, distanceCm) => computeOccupancy(resolver.resolve(shelfId), distanceCm, occupiedThresholdCm),
    assess: (shelfId, distanceCm) => assessReading(resolver.resolve(shelfId), distanceCm, occupiedThresholdCm),
    geometryOf: (shelfId) => resolver.resolve(shelfId),
  };
}
