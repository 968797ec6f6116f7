import {
  AmbientLight,
  BufferGeometry,
  DirectionalLight,
  Line,
  LineBasicMaterial,
  LineLoop,
  Mesh,
  MeshBasicMaterial,
  MeshStandardMaterial,
  Scene,
  SphereGeometry,
  Vector3,
} from "three";
import { InvalidParameterError } from "../model/errors";
import type { SatellitePosition } from "../model/types";
import type { ConstellationSimulation } from "../sim/constellationSimulation";
import type { AnimationStoreApi } from "../../store/animationStore";

/**
 * Orbit scene
 * Scene units are km, Z is up (matches the orbit geometry, not Three.js' default Y-up)
 */

export const SCENE_COLORS = {
  body: 0x808080,
  equator: 0xffff00,
  orbit: 0xff0000,
  satellite: 0x0000ff,
};

// One mesh per satellite, and one position per satellite per frame in the viewer
export const MAX_RENDERED_SATELLITES = 1000;

export interface OrbitSceneHandle {
  scene: Scene;
  body: Mesh;
  equator: LineLoop;
  orbitPath: Line;
  satellites: Mesh[];
}

function toVector3(position: SatellitePosition): Vector3 {
  return new Vector3(position.x, position.y, position.z);
}

function createBody(simulation: ConstellationSimulation): Mesh {
  const { bodyRadiusKm, bodyName, scene } = simulation.config;
  const geometry = new SphereGeometry(
    bodyRadiusKm,
    scene.surfaceSegments.width,
    scene.surfaceSegments.height
  );
  const material = new MeshStandardMaterial({
    color: SCENE_COLORS.body,
    transparent: true,
    opacity: 0.6,
  });
  const body = new Mesh(geometry, material);
  body.name = bodyName;
  // SphereGeometry poles sit on Y; turn them onto Z
  body.rotation.x = Math.PI / 2;
  body.position.set(0, 0, simulation.verticalOffsetKm);
  return body;
}

function createEquator(simulation: ConstellationSimulation): LineLoop {
  const { bodyRadiusKm, scene } = simulation.config;
  const points: Vector3[] = [];
  for (let i = 0; i < scene.equatorSamples; i++) {
    const u = (2 * Math.PI * i) / scene.equatorSamples;
    points.push(new Vector3(
      bodyRadiusKm * Math.cos(u),
      bodyRadiusKm * Math.sin(u),
      simulation.verticalOffsetKm
    ));
  }
  const equator = new LineLoop(
    new BufferGeometry().setFromPoints(points),
    new LineBasicMaterial({ color: SCENE_COLORS.equator, transparent: true, opacity: 0.3 })
  );
  equator.name = "Equator";
  return equator;
}

function createOrbitPath(simulation: ConstellationSimulation): Line {
  const path = new Line(
    new BufferGeometry().setFromPoints(simulation.orbitPath().map(toVector3)),
    new LineBasicMaterial({ color: SCENE_COLORS.orbit })
  );
  path.name = `Inclination ${simulation.inclinationDegrees}° Orbit`;
  return path;
}

function createSatelliteMarkers(simulation: ConstellationSimulation): Mesh[] {
  // One geometry/material pair shared by every marker
  const geometry = new SphereGeometry(simulation.config.scene.satelliteMarkerRadiusKm, 12, 8);
  const material = new MeshBasicMaterial({ color: SCENE_COLORS.satellite });
  const markers: Mesh[] = [];
  for (let i = 0; i < simulation.satelliteCount; i++) {
    const marker = new Mesh(geometry, material);
    marker.name = `Satellite ${i + 1}`;
    markers.push(marker);
  }
  return markers;
}

/**
 * Build the full scene with satellites at phase 0
 */
export function buildOrbitScene(simulation: ConstellationSimulation): OrbitSceneHandle {
  if (simulation.satelliteCount > MAX_RENDERED_SATELLITES) {
    throw new InvalidParameterError(
      "satelliteCount",
      simulation.satelliteCount,
      `exceeds the render limit of ${MAX_RENDERED_SATELLITES}`
    );
  }

  const scene = new Scene();
  scene.name = simulation.title;

  const body = createBody(simulation);
  const equator = createEquator(simulation);
  const orbitPath = createOrbitPath(simulation);
  const satellites = createSatelliteMarkers(simulation);

  const sun = new DirectionalLight(0xffffff, 1.2);
  sun.position.set(1, 1, 1).multiplyScalar(simulation.orbitRadiusKm * 3);

  scene.add(new AmbientLight(0xffffff, 0.5), sun, body, equator, orbitPath, ...satellites);

  const handle: OrbitSceneHandle = { scene, body, equator, orbitPath, satellites };
  applySatellitePositions(handle, simulation.positionsAt(0));
  return handle;
}

export function applySatellitePositions(handle: OrbitSceneHandle, positions: SatellitePosition[]): void {
  if (positions.length !== handle.satellites.length) {
    throw new InvalidParameterError(
      "positions",
      positions.length,
      `expected ${handle.satellites.length} satellite positions`
    );
  }
  positions.forEach((position, i) => {
    handle.satellites[i].position.set(position.x, position.y, position.z);
  });
}

/**
 * Keep satellite markers in sync with the animation store.
 * Applies the current frame immediately; returns the unsubscribe function.
 */
export function bindSceneToAnimation(
  handle: OrbitSceneHandle,
  simulation: ConstellationSimulation,
  store: AnimationStoreApi
): () => void {
  applySatellitePositions(handle, simulation.positionsAt(store.getState().state.phaseRadians));
  return store.subscribe((current, previous) => {
    if (current.state.phaseRadians !== previous.state.phaseRadians) {
      applySatellitePositions(handle, simulation.positionsAt(current.state.phaseRadians));
    }
  });
}
