export * from "./lib/model/types";
export { InvalidParameterError } from "./lib/model/errors";
export {
  estimateSatelliteCount,
  estimateCoverage,
  bodySurfaceArea,
  flatFractionCoverageArea,
  sphericalCapCoverageArea,
  type CoverageOptions,
} from "./lib/model/coverage_estimator";
export {
  satellitePosition,
  constellationPositions,
  orbitalAngle,
  sampleOrbitPath,
  normalizePhase,
  orbitRadiusKm,
  degToRad,
} from "./lib/model/orbit_geometry";
export {
  validateInclination,
  validateOrbitalParameters,
  parseInclination,
  assertFinitePosition,
} from "./lib/model/validation";
export {
  DEFAULT_SIMULATION_CONFIG,
  resolveSimulationConfig,
  type SimulationConfig,
  type SimulationConfigOverrides,
  type SceneConfig,
  type AnimationConfig,
} from "./lib/config/simulationConfig";
export {
  createConstellationSimulation,
  simulationTitle,
  type ConstellationSimulation,
} from "./lib/sim/constellationSimulation";
export * from "./lib/sim/animationDriver";
export * from "./store/animationStore";
export * from "./lib/three/orbitScene";
export * from "./lib/export/viewerExport";
