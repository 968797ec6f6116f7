/**
 * Coverage Estimator
 *
 * Sizes a single-plane constellation for continuous single-layer coverage.
 * The default model is a coarse heuristic: each satellite is credited with a
 * FOV-sized share of a disc whose radius is the orbit radius. It ignores
 * overlap and orbital-plane geometry, and it is kept exactly as is so counts
 * stay comparable with earlier runs.
 *
 * Inclination does not enter either model.
 */

import { InvalidParameterError } from './errors';
import { orbitRadiusKm } from './orbit_geometry';
import type { CoverageEstimate, CoverageModel, OrbitalParameters } from './types';

export interface CoverageOptions {
  model?: CoverageModel;
}

function requireFieldOfView(fieldOfViewDegrees: number): void {
  if (!Number.isFinite(fieldOfViewDegrees) || fieldOfViewDegrees <= 0 || fieldOfViewDegrees > 360) {
    throw new InvalidParameterError('fieldOfViewDegrees', fieldOfViewDegrees, 'must be in (0, 360]');
  }
}

/**
 * Surface area of the covered body
 * A = 4πR²
 */
export function bodySurfaceArea(bodyRadiusKm: number): number {
  return 4 * Math.PI * bodyRadiusKm ** 2;
}

/**
 * Area credited to one satellite under the reference model
 * A_sat = (FOV / 360) × π × r_orbit²
 */
export function flatFractionCoverageArea(orbitRadius: number, fieldOfViewDegrees: number): number {
  return (fieldOfViewDegrees / 360) * Math.PI * orbitRadius ** 2;
}

/**
 * Area of a spherical cap on the body with half-angle FOV/2
 * A_cap = 2πR² × (1 - cos(FOV/2)) = 4πR² × sin²(FOV/4)
 *
 * The half-angle form keeps precision for tiny fields of view, where
 * 1 - cos rounds to zero.
 */
export function sphericalCapCoverageArea(bodyRadiusKm: number, fieldOfViewDegrees: number): number {
  const halfAngleRad = (fieldOfViewDegrees / 2) * (Math.PI / 180);
  return 4 * Math.PI * bodyRadiusKm ** 2 * Math.sin(halfAngleRad / 2) ** 2;
}

/**
 * Minimum satellite count for the reference model.
 * Always an integer >= 1.
 */
export function estimateSatelliteCount(
  bodyRadiusKm: number,
  altitudeKm: number,
  fieldOfViewDegrees: number
): number {
  return estimateCoverage({ bodyRadiusKm, altitudeKm, fieldOfViewDegrees }).satelliteCount;
}

/**
 * Full coverage record, with the model selectable.
 */
export function estimateCoverage(
  params: OrbitalParameters,
  options: CoverageOptions = {}
): CoverageEstimate {
  const { bodyRadiusKm, altitudeKm, fieldOfViewDegrees } = params;
  const model = options.model ?? 'FLAT_FRACTION';

  const orbitRadius = orbitRadiusKm(bodyRadiusKm, altitudeKm);
  requireFieldOfView(fieldOfViewDegrees);

  const totalSurfaceAreaKm2 = bodySurfaceArea(bodyRadiusKm);
  const coverageAreaPerSatelliteKm2 = model === 'SPHERICAL_CAP'
    ? sphericalCapCoverageArea(bodyRadiusKm, fieldOfViewDegrees)
    : flatFractionCoverageArea(orbitRadius, fieldOfViewDegrees);

  const ratio = totalSurfaceAreaKm2 / coverageAreaPerSatelliteKm2;
  if (!Number.isFinite(ratio)) {
    throw new InvalidParameterError('fieldOfViewDegrees', fieldOfViewDegrees, 'coverage area per satellite is zero');
  }

  return {
    model,
    satelliteCount: Math.max(1, Math.ceil(ratio)),
    orbitRadiusKm: orbitRadius,
    totalSurfaceAreaKm2,
    coverageAreaPerSatelliteKm2,
  };
}
