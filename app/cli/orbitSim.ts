#!/usr/bin/env node
import { createInterface } from "node:readline/promises";
import {
  DEFAULT_SIMULATION_CONFIG,
  resolveSimulationConfig,
  type SimulationConfigOverrides,
} from "../lib/config/simulationConfig";
import { buildViewerDocument, renderViewerHtml, writeViewerHtml } from "../lib/export/viewerExport";
import { InvalidParameterError } from "../lib/model/errors";
import type { CoverageModel } from "../lib/model/types";
import { parseInclination } from "../lib/model/validation";
import {
  createConstellationSimulation,
  type ConstellationSimulation,
} from "../lib/sim/constellationSimulation";
import { buildOrbitScene, MAX_RENDERED_SATELLITES } from "../lib/three/orbitScene";
import { formatDecimal, formatPosition, formatSigFigs } from "../lib/utils/formatNumber";
import {
  createAnimationStore,
  startPlayback,
  type AnimationStoreApi,
} from "../store/animationStore";

const TAG = "[orbit-cli]";
const INCLINATION_PROMPT = "Enter the inclination angle (in degrees): ";

export interface CliOptions {
  inclination?: string;
  overrides: SimulationConfigOverrides;
  out: string;
  animate: boolean;
  help: boolean;
}

const USAGE = `Usage: orbit-sim [options]

  --inclination <deg>          orbital inclination (prompted when omitted)
  --altitude <km>              orbit altitude (default ${DEFAULT_SIMULATION_CONFIG.altitudeKm})
  --radius <km>                body radius (default ${DEFAULT_SIMULATION_CONFIG.bodyRadiusKm})
  --body <name>                body name used in titles (default ${DEFAULT_SIMULATION_CONFIG.bodyName})
  --fov <deg>                  per-satellite field of view (default ${DEFAULT_SIMULATION_CONFIG.fieldOfViewDegrees})
  --frames <n>                 animation frames per revolution (default ${DEFAULT_SIMULATION_CONFIG.animation.frameCount})
  --frame-ms <ms>              playback interval (default ${DEFAULT_SIMULATION_CONFIG.animation.frameDurationMs})
  --coverage-model flat|cap    coverage heuristic (default flat)
  --out <file.html>            viewer output path (default orbit.html)
  --animate                    play one revolution on the console instead of writing the viewer
  --help                       show this message`;

function parseNumberFlag(flag: string, raw: string | undefined): number {
  const value = raw === undefined || raw.trim() === "" ? Number.NaN : Number(raw);
  if (!Number.isFinite(value)) {
    throw new InvalidParameterError(flag, raw, "expected a number");
  }
  return value;
}

function parseCoverageModel(raw: string | undefined): CoverageModel {
  if (raw === "flat") return "FLAT_FRACTION";
  if (raw === "cap") return "SPHERICAL_CAP";
  throw new InvalidParameterError("--coverage-model", raw, "expected 'flat' or 'cap'");
}

export function parseArgs(argv: string[]): CliOptions {
  const options: CliOptions = { overrides: {}, out: "orbit.html", animate: false, help: false };
  const animation: NonNullable<SimulationConfigOverrides["animation"]> = {};

  for (let i = 0; i < argv.length; i += 1) {
    const token = argv[i];
    const next = (): string | undefined => {
      i += 1;
      return argv[i];
    };

    switch (token) {
      case "--inclination": {
        const raw = next();
        if (raw === undefined) {
          throw new InvalidParameterError(token, raw, "expected a number of degrees");
        }
        options.inclination = raw;
        break;
      }
      case "--altitude":
        options.overrides.altitudeKm = parseNumberFlag(token, next());
        break;
      case "--radius":
        options.overrides.bodyRadiusKm = parseNumberFlag(token, next());
        break;
      case "--body": {
        const raw = next();
        if (raw === undefined || raw.trim() === "") {
          throw new InvalidParameterError(token, raw, "expected a body name");
        }
        options.overrides.bodyName = raw;
        break;
      }
      case "--fov":
        options.overrides.fieldOfViewDegrees = parseNumberFlag(token, next());
        break;
      case "--frames":
        animation.frameCount = parseNumberFlag(token, next());
        break;
      case "--frame-ms":
        animation.frameDurationMs = parseNumberFlag(token, next());
        break;
      case "--coverage-model":
        options.overrides.coverageModel = parseCoverageModel(next());
        break;
      case "--out": {
        const raw = next();
        if (raw === undefined || raw.trim() === "") {
          throw new InvalidParameterError(token, raw, "expected an output path");
        }
        options.out = raw;
        break;
      }
      case "--animate":
        options.animate = true;
        break;
      case "--help":
      case "-h":
        options.help = true;
        break;
      default:
        throw new InvalidParameterError("argument", token, "unknown option");
    }
  }

  if (Object.keys(animation).length > 0) {
    options.overrides.animation = animation;
  }
  return options;
}

async function promptInclination(): Promise<string> {
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  try {
    return await rl.question(INCLINATION_PROMPT);
  } finally {
    rl.close();
  }
}

/**
 * Play one revolution, printing every satellite each frame.
 * Resolves with the number of frames shown once the ring is back at phase 0.
 */
export function animateRevolution(
  simulation: ConstellationSimulation,
  store: AnimationStoreApi
): Promise<number> {
  const printFrame = (frameIndex: number, phaseRadians: number): void => {
    const positions = simulation.positionsAt(phaseRadians);
    console.log(`${TAG} frame ${frameIndex + 1}/${simulation.config.animation.frameCount}`);
    positions.forEach((position, i) => {
      console.log(`  Satellite ${i + 1}: ${formatPosition(position)}`);
    });
  };

  return new Promise((resolve) => {
    let shown = 0;
    store.getState().seek(0);
    printFrame(0, 0);
    shown += 1;
    if (store.getState().state.frameCount === 1) {
      resolve(shown);
      return;
    }

    // Assigned before the first tick can fire
    let stop: () => void = () => undefined;
    const unsubscribe = store.subscribe((current, previous) => {
      if (current.state.frameIndex === previous.state.frameIndex) return;
      if (current.state.frameIndex === 0) {
        unsubscribe();
        stop();
        resolve(shown);
        return;
      }
      printFrame(current.state.frameIndex, current.state.phaseRadians);
      shown += 1;
    });
    stop = startPlayback(store, simulation.config.animation.frameDurationMs);
  });
}

export async function runCli(
  argv: string[],
  ask: () => Promise<string> = promptInclination
): Promise<number> {
  const options = parseArgs(argv);
  if (options.help) {
    console.log(USAGE);
    return 0;
  }

  const config = resolveSimulationConfig(options.overrides);
  const inclination = parseInclination(options.inclination ?? (await ask()));
  const simulation = createConstellationSimulation(config, inclination);

  for (const warning of simulation.warnings) {
    console.warn(`${TAG} ${warning}`);
  }

  const { estimate } = simulation;
  console.log(`Number of Satellites Needed for Inclination ${inclination}°: ${simulation.satelliteCount}`);
  console.log(
    `${TAG} orbit radius ${formatDecimal(estimate.orbitRadiusKm)} km, ` +
    `surface ${formatSigFigs(estimate.totalSurfaceAreaKm2)} km², ` +
    `${formatSigFigs(estimate.coverageAreaPerSatelliteKm2)} km² per satellite (${estimate.model})`
  );

  if (simulation.satelliteCount > MAX_RENDERED_SATELLITES) {
    console.warn(
      `${TAG} ${simulation.satelliteCount} satellites exceed the render limit of ${MAX_RENDERED_SATELLITES}; ` +
      `nothing rendered`
    );
    return 0;
  }

  const store = createAnimationStore(config.animation.frameCount);

  if (options.animate) {
    const frames = await animateRevolution(simulation, store);
    console.log(`${TAG} played ${frames} frames`);
    return 0;
  }

  const handle = buildOrbitScene(simulation);
  const viewer = buildViewerDocument(simulation, handle, store);
  const written = writeViewerHtml(options.out, renderViewerHtml(viewer));
  console.log(`${TAG} wrote ${viewer.frames.length}-frame viewer to ${written}`);
  return 0;
}

if (require.main === module) {
  runCli(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      const message = error instanceof Error ? error.message : String(error);
      console.error(`${TAG} ${message}`);
      process.exitCode = 1;
    });
}
