/**
 * Standalone HTML viewer export
 *
 * The scene goes out as Three.js JSON (ObjectLoader format) together with the
 * precomputed satellite positions for every frame of one revolution. The page
 * itself only replays frames; no model code runs in the browser.
 */

import fs from "fs";
import path from "path";
import type { SatellitePosition } from "../model/types";
import type { ConstellationSimulation } from "../sim/constellationSimulation";
import type { OrbitSceneHandle } from "../three/orbitScene";
import { bindSceneToAnimation } from "../three/orbitScene";
import type { AnimationStoreApi } from "../../store/animationStore";
import { runRevolution } from "../../store/animationStore";

export const VIEWER_TEMPLATE_PATH = path.resolve(__dirname, "../../templates/orbitViewer.html");
const DOCUMENT_PLACEHOLDER = "__VIEWER_DOCUMENT__";
const TITLE_PLACEHOLDER = "__VIEWER_TITLE__";

export interface ViewerDocument {
  title: string;
  bodyName: string;
  satelliteCount: number;
  inclinationDegrees: number;
  orbitRadiusKm: number;
  verticalOffsetKm: number;
  frameDurationMs: number;
  axes: { x: string; y: string; z: string };
  scene: unknown; // Scene.toJSON() output
  frames: SatellitePosition[][];
}

/**
 * Drive the store through one revolution with the scene bound to it,
 * recording marker positions per frame. The scene is left at frame 0.
 */
export function buildViewerDocument(
  simulation: ConstellationSimulation,
  handle: OrbitSceneHandle,
  store: AnimationStoreApi
): ViewerDocument {
  const frames: SatellitePosition[][] = [];
  const unbind = bindSceneToAnimation(handle, simulation, store);
  try {
    runRevolution(store, () => {
      frames.push(handle.satellites.map(({ position }) => ({
        x: position.x,
        y: position.y,
        z: position.z,
      })));
    });
  } finally {
    unbind();
  }

  return {
    title: simulation.title,
    bodyName: simulation.config.bodyName,
    satelliteCount: simulation.satelliteCount,
    inclinationDegrees: simulation.inclinationDegrees,
    orbitRadiusKm: simulation.orbitRadiusKm,
    verticalOffsetKm: simulation.verticalOffsetKm,
    frameDurationMs: simulation.config.animation.frameDurationMs,
    axes: { x: "X (km)", y: "Y (km)", z: "Z (km)" },
    scene: handle.scene.toJSON(),
    frames,
  };
}

function escapeHtml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;");
}

/**
 * JSON that is safe inside a <script> element
 */
export function serializeForScript(value: unknown): string {
  return JSON.stringify(value)
    .replace(/</g, "\\u003c")
    .replace(/\u2028/g, "\\u2028")
    .replace(/\u2029/g, "\\u2029");
}

export function renderViewerHtml(
  viewerDocument: ViewerDocument,
  template: string = fs.readFileSync(VIEWER_TEMPLATE_PATH, "utf8")
): string {
  if (!template.includes(DOCUMENT_PLACEHOLDER)) {
    throw new Error(`Viewer template is missing the ${DOCUMENT_PLACEHOLDER} placeholder`);
  }
  // Function replacers: the payload may contain `$` sequences
  return template
    .split(TITLE_PLACEHOLDER).join(escapeHtml(viewerDocument.title))
    .replace(DOCUMENT_PLACEHOLDER, () => serializeForScript(viewerDocument));
}

export function writeViewerHtml(outPath: string, html: string): string {
  const resolved = path.resolve(outPath);
  fs.mkdirSync(path.dirname(resolved), { recursive: true });
  fs.writeFileSync(resolved, html, "utf8");
  return resolved;
}
