/**
 * Constellation Simulation
 *
 * Binds one inclination to a resolved config. The satellite count is computed
 * once; positions are recomputed on every request and never cached.
 */

import type { SimulationConfig } from '../config/simulationConfig';
import { estimateCoverage } from '../model/coverage_estimator';
import { InvalidParameterError } from '../model/errors';
import { constellationPositions, sampleOrbitPath } from '../model/orbit_geometry';
import type { CoverageEstimate, SatellitePosition } from '../model/types';
import { assertFinitePosition, validateInclination } from '../model/validation';
import { phaseForFrame } from './animationDriver';

export interface ConstellationSimulation {
  config: SimulationConfig;
  inclinationDegrees: number;
  estimate: CoverageEstimate;
  satelliteCount: number;
  orbitRadiusKm: number;
  verticalOffsetKm: number;
  warnings: string[];
  title: string;
  positionsAt: (phaseRadians: number) => SatellitePosition[];
  orbitPath: () => SatellitePosition[];
  framePhases: () => number[];
}

export function simulationTitle(bodyName: string, inclinationDegrees: number): string {
  const bodyLabel = bodyName === 'Moon' ? 'Lunar' : bodyName;
  return `3D ${bodyLabel} Satellite Orbit at ${inclinationDegrees}° Inclination`;
}

export function createConstellationSimulation(
  config: SimulationConfig,
  inclinationDegrees: number
): ConstellationSimulation {
  const inclinationCheck = validateInclination(inclinationDegrees);
  if (!inclinationCheck.valid) {
    throw new InvalidParameterError('inclinationDegrees', inclinationDegrees, inclinationCheck.errors[0]);
  }

  const estimate = estimateCoverage(
    {
      bodyRadiusKm: config.bodyRadiusKm,
      altitudeKm: config.altitudeKm,
      fieldOfViewDegrees: config.fieldOfViewDegrees,
    },
    { model: config.coverageModel }
  );

  const warnings = [...inclinationCheck.warnings];
  if (config.coverageModel === 'SPHERICAL_CAP') {
    warnings.push('Using the spherical-cap coverage model; counts differ from the reference heuristic');
  }

  const { satelliteCount, orbitRadiusKm } = estimate;
  const positionOptions = { verticalOffsetKm: config.scene.verticalOffsetKm };

  return {
    config,
    inclinationDegrees,
    estimate,
    satelliteCount,
    orbitRadiusKm,
    verticalOffsetKm: config.scene.verticalOffsetKm,
    warnings,
    title: simulationTitle(config.bodyName, inclinationDegrees),

    positionsAt: (phaseRadians: number) =>
      constellationPositions(inclinationDegrees, orbitRadiusKm, satelliteCount, phaseRadians, positionOptions)
        .map(assertFinitePosition),

    orbitPath: () =>
      sampleOrbitPath(inclinationDegrees, orbitRadiusKm, config.scene.orbitPathSamples, positionOptions),

    framePhases: () => {
      const { frameCount } = config.animation;
      return Array.from({ length: frameCount }, (_, frame) => phaseForFrame(frame, frameCount));
    },
  };
}
