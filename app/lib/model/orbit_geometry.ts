/**
 * Orbit Geometry
 *
 * Positions of satellites sharing one inclined circular orbit. Satellites are
 * phase-locked: each sits at a fixed baseline angle 2π·i/n and the whole ring
 * rotates as the phase offset grows.
 *
 * x = r × cos(φ)
 * y = r × sin(φ) × cos(θ)
 * z = r × sin(φ) × sin(θ) + verticalOffset
 *
 * θ is the inclination, φ the orbital angle. verticalOffset is a scene lift
 * with no orbital meaning; it defaults to 0 here.
 */

import { InvalidParameterError } from './errors';
import type { PositionOptions, SatellitePosition } from './types';

const TWO_PI = 2 * Math.PI;

function requireFinite(name: string, value: number): void {
  if (!Number.isFinite(value)) {
    throw new InvalidParameterError(name, value, 'must be a finite number');
  }
}

function requireOrbitRadius(orbitRadius: number): void {
  if (!Number.isFinite(orbitRadius) || orbitRadius <= 0) {
    throw new InvalidParameterError('orbitRadius', orbitRadius, 'must be a finite number > 0');
  }
}

function requireSatelliteCount(totalSatellites: number): void {
  if (!Number.isInteger(totalSatellites) || totalSatellites < 1) {
    throw new InvalidParameterError('totalSatellites', totalSatellites, 'must be an integer >= 1');
  }
}

function verticalOffsetOf(options: PositionOptions): number {
  const offset = options.verticalOffsetKm ?? 0;
  requireFinite('verticalOffsetKm', offset);
  return offset;
}

export function degToRad(degrees: number): number {
  return degrees * (Math.PI / 180);
}

/**
 * Wrap any finite angle into [0, 2π)
 */
export function normalizePhase(phaseRadians: number): number {
  requireFinite('phaseRadians', phaseRadians);
  const wrapped = phaseRadians % TWO_PI;
  return wrapped < 0 ? wrapped + TWO_PI : wrapped;
}

/**
 * Orbit radius from body radius and altitude.
 * Body radius must be > 0 and altitude >= 0: the orbit never sits inside the body.
 */
export function orbitRadiusKm(bodyRadiusKm: number, altitudeKm: number): number {
  if (!Number.isFinite(bodyRadiusKm) || bodyRadiusKm <= 0) {
    throw new InvalidParameterError('bodyRadiusKm', bodyRadiusKm, 'must be a finite number > 0');
  }
  if (!Number.isFinite(altitudeKm) || altitudeKm < 0) {
    throw new InvalidParameterError('altitudeKm', altitudeKm, 'must be a finite number >= 0');
  }
  const radius = bodyRadiusKm + altitudeKm;
  requireOrbitRadius(radius);
  return radius;
}

/**
 * Point on the inclined circle at orbital angle phi.
 * Shared by satellite positions and the sampled orbit path.
 */
function pointOnOrbit(
  thetaRad: number,
  orbitRadius: number,
  phi: number,
  verticalOffset: number
): SatellitePosition {
  return {
    x: orbitRadius * Math.cos(phi),
    y: orbitRadius * Math.sin(phi) * Math.cos(thetaRad),
    z: orbitRadius * Math.sin(phi) * Math.sin(thetaRad) + verticalOffset,
  };
}

/**
 * Position of one satellite at a given phase offset.
 * Returns a fresh object on every call.
 */
export function satellitePosition(
  inclinationDegrees: number,
  orbitRadius: number,
  satelliteIndex: number,
  totalSatellites: number,
  phaseOffsetRadians: number,
  options: PositionOptions = {}
): SatellitePosition {
  requireFinite('inclinationDegrees', inclinationDegrees);
  requireOrbitRadius(orbitRadius);
  requireSatelliteCount(totalSatellites);
  if (!Number.isInteger(satelliteIndex) || satelliteIndex < 0 || satelliteIndex >= totalSatellites) {
    throw new InvalidParameterError(
      'satelliteIndex',
      satelliteIndex,
      `must be an integer in [0, ${totalSatellites})`
    );
  }
  requireFinite('phaseOffsetRadians', phaseOffsetRadians);
  const verticalOffset = verticalOffsetOf(options);

  const theta = degToRad(inclinationDegrees);
  const phiBase = (TWO_PI * satelliteIndex) / totalSatellites;
  const phi = phiBase + phaseOffsetRadians;

  return pointOnOrbit(theta, orbitRadius, phi, verticalOffset);
}

/**
 * Every satellite of the ring at one phase, in index order
 */
export function constellationPositions(
  inclinationDegrees: number,
  orbitRadius: number,
  totalSatellites: number,
  phaseOffsetRadians: number,
  options: PositionOptions = {}
): SatellitePosition[] {
  requireSatelliteCount(totalSatellites);
  const positions: SatellitePosition[] = [];
  for (let i = 0; i < totalSatellites; i++) {
    positions.push(
      satellitePosition(inclinationDegrees, orbitRadius, i, totalSatellites, phaseOffsetRadians, options)
    );
  }
  return positions;
}

/**
 * Inverse of satellitePosition: recover the orbital angle φ in [0, 2π).
 * Undo the lift, rotate about x by -θ so the orbit lies in the x/y' plane,
 * then y' = y·cos(θ) + z·sin(θ) = r·sin(φ).
 */
export function orbitalAngle(
  position: SatellitePosition,
  inclinationDegrees: number,
  options: PositionOptions = {}
): number {
  requireFinite('inclinationDegrees', inclinationDegrees);
  const theta = degToRad(inclinationDegrees);
  const z = position.z - verticalOffsetOf(options);
  const yPrime = position.y * Math.cos(theta) + z * Math.sin(theta);
  return normalizePhase(Math.atan2(yPrime, position.x));
}

/**
 * Closed orbit trace: sampleCount points over [0, 2π], both ends included
 */
export function sampleOrbitPath(
  inclinationDegrees: number,
  orbitRadius: number,
  sampleCount: number,
  options: PositionOptions = {}
): SatellitePosition[] {
  requireFinite('inclinationDegrees', inclinationDegrees);
  requireOrbitRadius(orbitRadius);
  if (!Number.isInteger(sampleCount) || sampleCount < 2) {
    throw new InvalidParameterError('sampleCount', sampleCount, 'must be an integer >= 2');
  }
  const verticalOffset = verticalOffsetOf(options);
  const theta = degToRad(inclinationDegrees);

  const points: SatellitePosition[] = [];
  for (let i = 0; i < sampleCount; i++) {
    const phi = (TWO_PI * i) / (sampleCount - 1);
    points.push(pointOnOrbit(theta, orbitRadius, phi, verticalOffset));
  }
  return points;
}
