/**
 * Input validation for the coverage model.
 *
 * Returns ValidationResult for user-facing checks (errors block the run,
 * warnings are printed and ignored). parse/assert helpers throw instead.
 */

import { InvalidParameterError } from './errors';
import type { OrbitalParameters, SatellitePosition, ValidationResult } from './types';

const INCLINATION_RANGE_DEG: [min: number, max: number] = [0, 180];

export function validateInclination(inclinationDegrees: number): ValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];

  if (!Number.isFinite(inclinationDegrees)) {
    errors.push(`Inclination must be a finite number of degrees, got ${inclinationDegrees}`);
  } else if (inclinationDegrees < INCLINATION_RANGE_DEG[0] || inclinationDegrees > INCLINATION_RANGE_DEG[1]) {
    warnings.push(
      `Inclination ${inclinationDegrees}° is outside [${INCLINATION_RANGE_DEG[0]}, ${INCLINATION_RANGE_DEG[1]}]°`
    );
  }

  return { valid: errors.length === 0, errors, warnings };
}

/**
 * Parse inclination text from a prompt or flag
 */
export function parseInclination(raw: string): number {
  const trimmed = raw.trim();
  const value = trimmed === '' ? Number.NaN : Number(trimmed);
  if (!Number.isFinite(value)) {
    throw new InvalidParameterError('inclinationDegrees', raw, 'expected a number of degrees');
  }
  return value;
}

export function validateOrbitalParameters(params: OrbitalParameters): ValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];
  const { bodyRadiusKm, altitudeKm, fieldOfViewDegrees } = params;

  if (!Number.isFinite(bodyRadiusKm) || bodyRadiusKm <= 0) {
    errors.push(`Body radius must be > 0 km, got ${bodyRadiusKm}`);
  }
  if (!Number.isFinite(altitudeKm) || altitudeKm < 0) {
    errors.push(`Altitude must be >= 0 km, got ${altitudeKm}`);
  } else if (altitudeKm === 0) {
    warnings.push('Altitude is 0 km: the orbit grazes the surface');
  }
  if (!Number.isFinite(fieldOfViewDegrees) || fieldOfViewDegrees <= 0 || fieldOfViewDegrees > 360) {
    errors.push(`Field of view must be in (0, 360] degrees, got ${fieldOfViewDegrees}`);
  }

  return { valid: errors.length === 0, errors, warnings };
}

/**
 * NaN or Infinity in a position is an input/programming error, never a result
 */
export function assertFinitePosition(position: SatellitePosition): SatellitePosition {
  for (const axis of ['x', 'y', 'z'] as const) {
    if (!Number.isFinite(position[axis])) {
      throw new InvalidParameterError(`position.${axis}`, position[axis], 'coordinate is not finite');
    }
  }
  return position;
}
