import { describe, it, expect, beforeEach, afterEach, afterAll, jest } from '@jest/globals';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { animateRevolution, parseArgs, runCli } from '../orbitSim';
import { InvalidParameterError } from '../../lib/model/errors';
import { resolveSimulationConfig } from '../../lib/config/simulationConfig';
import { createConstellationSimulation } from '../../lib/sim/constellationSimulation';
import { createAnimationStore } from '../../store/animationStore';

const tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'orbit-cli-'));
const SMALL_SCENE = ['--frames', '6'];

afterAll(() => {
  fs.rmSync(tmpDir, { recursive: true, force: true });
});

describe('parseArgs', () => {
  it('defaults to writing orbit.html with no overrides', () => {
    expect(parseArgs([])).toEqual({ overrides: {}, out: 'orbit.html', animate: false, help: false });
  });

  it('maps flags onto config overrides', () => {
    const options = parseArgs([
      '--inclination', '51.6',
      '--altitude', '550',
      '--radius', '6371',
      '--body', 'Earth',
      '--fov', '40',
      '--frames', '24',
      '--frame-ms', '40',
      '--coverage-model', 'cap',
      '--out', 'out/earth.html',
      '--animate',
    ]);

    expect(options).toEqual({
      inclination: '51.6',
      overrides: {
        altitudeKm: 550,
        bodyRadiusKm: 6371,
        bodyName: 'Earth',
        fieldOfViewDegrees: 40,
        coverageModel: 'SPHERICAL_CAP',
        animation: { frameCount: 24, frameDurationMs: 40 },
      },
      out: 'out/earth.html',
      animate: true,
      help: false,
    });
  });

  it('rejects unknown options, missing values and bad numbers', () => {
    expect(() => parseArgs(['--verbose'])).toThrow(InvalidParameterError);
    expect(() => parseArgs(['--inclination'])).toThrow(/--inclination/);
    expect(() => parseArgs(['--altitude', 'high'])).toThrow(/--altitude/);
    expect(() => parseArgs(['--fov'])).toThrow(/--fov/);
    expect(() => parseArgs(['--coverage-model', 'walker'])).toThrow(/flat' or 'cap/);
    expect(() => parseArgs(['--out', ''])).toThrow(/--out/);
  });
});

describe('runCli', () => {
  const logSpy = jest.spyOn(console, 'log').mockImplementation(() => undefined);
  const warnSpy = jest.spyOn(console, 'warn').mockImplementation(() => undefined);

  afterEach(() => {
    logSpy.mockClear();
    warnSpy.mockClear();
  });

  afterAll(() => {
    logSpy.mockRestore();
    warnSpy.mockRestore();
  });

  it('prints the count and writes the viewer', async () => {
    const out = path.join(tmpDir, 'lunar.html');
    const code = await runCli(['--inclination', '45', '--out', out, ...SMALL_SCENE]);

    expect(code).toBe(0);
    expect(logSpy).toHaveBeenCalledWith('Number of Satellites Needed for Inclination 45°: 4');
    expect(logSpy).toHaveBeenCalledWith(
      '[orbit-cli] orbit radius 3737.4 km, surface 37.93M km², 10.97M km² per satellite (FLAT_FRACTION)'
    );
    expect(logSpy).toHaveBeenCalledWith(`[orbit-cli] wrote 6-frame viewer to ${path.resolve(out)}`);
    expect(fs.readFileSync(out, 'utf8')).toContain('<title>3D Lunar Satellite Orbit at 45° Inclination</title>');
  });

  it('asks for the inclination when the flag is missing', async () => {
    const ask = jest.fn(async () => '30');
    await runCli(['--out', path.join(tmpDir, 'prompted.html'), ...SMALL_SCENE], ask);

    expect(ask).toHaveBeenCalledTimes(1);
    expect(logSpy).toHaveBeenCalledWith('Number of Satellites Needed for Inclination 30°: 4');
  });

  it('rejects a non-numeric answer', async () => {
    await expect(runCli(['--out', path.join(tmpDir, 'never.html')], async () => 'steep')).rejects.toThrow(
      InvalidParameterError
    );
  });

  it('prints validation warnings', async () => {
    await runCli(['--inclination', '190', '--out', path.join(tmpDir, 'retro.html'), ...SMALL_SCENE]);
    expect(warnSpy).toHaveBeenCalledWith('[orbit-cli] Inclination 190° is outside [0, 180]°');
  });

  it('reports the count but renders nothing above the marker limit', async () => {
    const out = path.join(tmpDir, 'crowded.html');
    const code = await runCli(['--inclination', '45', '--fov', '0.1', '--out', out, ...SMALL_SCENE]);

    expect(code).toBe(0);
    expect(logSpy).toHaveBeenCalledWith('Number of Satellites Needed for Inclination 45°: 3112');
    expect(warnSpy).toHaveBeenCalledWith(
      '[orbit-cli] 3112 satellites exceed the render limit of 1000; nothing rendered'
    );
    expect(fs.existsSync(out)).toBe(false);
  });

  it('prints usage for --help without prompting', async () => {
    const ask = jest.fn(async () => '0');
    expect(await runCli(['--help'], ask)).toBe(0);
    expect(ask).not.toHaveBeenCalled();
    expect(logSpy.mock.calls[0][0]).toMatch(/^Usage: orbit-sim/);
  });

  describe('--animate', () => {
    beforeEach(() => {
      jest.useFakeTimers();
    });

    afterEach(() => {
      jest.useRealTimers();
    });

    it('plays one revolution at the frame interval', async () => {
      const run = runCli(['--inclination', '45', '--animate', '--frames', '4', '--frame-ms', '50']);
      await jest.advanceTimersByTimeAsync(200);

      expect(await run).toBe(0);
      expect(logSpy).toHaveBeenCalledWith('[orbit-cli] frame 1/4');
      expect(logSpy).toHaveBeenCalledWith('  Satellite 1: (3737.4, 0.0, 500.0)');
      expect(logSpy).toHaveBeenCalledWith('[orbit-cli] frame 4/4');
      expect(logSpy).toHaveBeenCalledWith('[orbit-cli] played 4 frames');
      expect(jest.getTimerCount()).toBe(0);
    });

    it('finishes immediately with a single frame', async () => {
      const simulation = createConstellationSimulation(
        resolveSimulationConfig({ animation: { frameCount: 1 } }),
        45
      );
      await expect(animateRevolution(simulation, createAnimationStore(1))).resolves.toBe(1);
    });
  });
});
