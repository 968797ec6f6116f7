/**
 * Simulation Configuration
 * Physical inputs plus the scene and animation settings consumed by the renderer
 */

import { InvalidParameterError } from '../model/errors';
import type { CoverageModel } from '../model/types';
import { validateOrbitalParameters } from '../model/validation';

export interface SceneConfig {
  verticalOffsetKm: number;                           // lifts the whole system off the origin
  surfaceSegments: { width: number; height: number }; // body sphere mesh resolution
  orbitPathSamples: number;
  equatorSamples: number;
  satelliteMarkerRadiusKm: number;
}

export interface AnimationConfig {
  frameCount: number;      // steps per revolution
  frameDurationMs: number; // playback interval
}

export interface SimulationConfig {
  bodyName: string;
  bodyRadiusKm: number;
  altitudeKm: number;
  fieldOfViewDegrees: number;
  coverageModel: CoverageModel;
  scene: SceneConfig;
  animation: AnimationConfig;
}

export type SimulationConfigOverrides = Partial<Omit<SimulationConfig, 'scene' | 'animation'>> & {
  scene?: Partial<SceneConfig>;
  animation?: Partial<AnimationConfig>;
};

export const DEFAULT_SIMULATION_CONFIG: SimulationConfig = {
  bodyName: 'Moon',
  bodyRadiusKm: 1737.4,     // lunar mean radius
  altitudeKm: 2000,
  fieldOfViewDegrees: 90,
  coverageModel: 'FLAT_FRACTION',
  scene: {
    verticalOffsetKm: 500,
    surfaceSegments: { width: 200, height: 100 },
    orbitPathSamples: 200,
    equatorSamples: 200,
    satelliteMarkerRadiusKm: 80,
  },
  animation: {
    frameCount: 100,
    frameDurationMs: 100,
  },
};

/**
 * Merge overrides onto the defaults and fail fast on unusable values
 */
export function resolveSimulationConfig(
  overrides: SimulationConfigOverrides = {},
  base: SimulationConfig = DEFAULT_SIMULATION_CONFIG
): SimulationConfig {
  const config: SimulationConfig = {
    ...base,
    ...overrides,
    scene: { ...base.scene, ...overrides.scene },
    animation: { ...base.animation, ...overrides.animation },
  };

  const validation = validateOrbitalParameters(config);
  if (!validation.valid) {
    throw new InvalidParameterError('config', JSON.stringify(overrides), validation.errors[0]);
  }

  const { frameCount, frameDurationMs } = config.animation;
  if (!Number.isInteger(frameCount) || frameCount < 1) {
    throw new InvalidParameterError('animation.frameCount', frameCount, 'must be an integer >= 1');
  }
  if (!Number.isFinite(frameDurationMs) || frameDurationMs <= 0) {
    throw new InvalidParameterError('animation.frameDurationMs', frameDurationMs, 'must be > 0 ms');
  }
  validateSceneConfig(config.scene);

  return config;
}

function requireIntegerAtLeast(name: string, value: number, min: number): void {
  if (!Number.isInteger(value) || value < min) {
    throw new InvalidParameterError(name, value, `must be an integer >= ${min}`);
  }
}

// Minimums are the smallest meshes and lines that still draw a sphere, a path or a loop
function validateSceneConfig(scene: SceneConfig): void {
  if (!Number.isFinite(scene.verticalOffsetKm)) {
    throw new InvalidParameterError('scene.verticalOffsetKm', scene.verticalOffsetKm, 'must be finite');
  }
  requireIntegerAtLeast('scene.surfaceSegments.width', scene.surfaceSegments.width, 3);
  requireIntegerAtLeast('scene.surfaceSegments.height', scene.surfaceSegments.height, 2);
  requireIntegerAtLeast('scene.orbitPathSamples', scene.orbitPathSamples, 2);
  requireIntegerAtLeast('scene.equatorSamples', scene.equatorSamples, 3);
  if (!Number.isFinite(scene.satelliteMarkerRadiusKm) || scene.satelliteMarkerRadiusKm <= 0) {
    throw new InvalidParameterError('scene.satelliteMarkerRadiusKm', scene.satelliteMarkerRadiusKm, 'must be > 0 km');
  }
}
