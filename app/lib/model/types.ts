/**
 * Constellation Coverage Types
 *
 * Value types shared by the coverage estimator, the orbit geometry and the
 * presentation layers. Everything here is immutable data.
 */

export interface OrbitalParameters {
  bodyRadiusKm: number;       // radius of the covered body
  altitudeKm: number;         // orbit altitude above the surface
  fieldOfViewDegrees: number; // (0, 360]
}

/**
 * FLAT_FRACTION is the reference sizing heuristic (FOV share of a disc of orbit radius).
 * SPHERICAL_CAP is the alternate corrected mode: true cap area on the body surface.
 */
export type CoverageModel = 'FLAT_FRACTION' | 'SPHERICAL_CAP';

export interface CoverageEstimate {
  model: CoverageModel;
  satelliteCount: number;
  orbitRadiusKm: number;
  totalSurfaceAreaKm2: number;
  coverageAreaPerSatelliteKm2: number;
}

export interface SatellitePosition {
  x: number; // km
  y: number; // km
  z: number; // km
}

export interface PositionOptions {
  // Presentation lift applied to z after the orbital math
  verticalOffsetKm?: number;
}

export interface ValidationResult {
  valid: boolean;
  errors: string[];
  warnings: string[];
}
