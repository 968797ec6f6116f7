/**
 * Public entry point: the reference scenario using only exported names
 */

import { describe, it, expect } from '@jest/globals';
import {
  DEFAULT_SIMULATION_CONFIG,
  InvalidParameterError,
  createConstellationSimulation,
  estimateSatelliteCount,
  satellitePosition,
} from '../index';

describe('package entry point', () => {
  it('runs the 45° lunar scenario end to end', () => {
    const count = estimateSatelliteCount(1737.4, 2000, 90);
    const simulation = createConstellationSimulation(DEFAULT_SIMULATION_CONFIG, 45);

    expect(count).toBe(4);
    expect(simulation.satelliteCount).toBe(count);
    expect(simulation.positionsAt(0)[0]).toEqual({ x: 3737.4, y: 0, z: 500 });
    expect(satellitePosition(45, simulation.orbitRadiusKm, 0, count, 0, { verticalOffsetKm: 500 })).toEqual(
      simulation.positionsAt(0)[0]
    );
  });

  it('fails with InvalidParameterError instead of returning Infinity or NaN', () => {
    expect(() => estimateSatelliteCount(1737.4, 2000, 0)).toThrow(InvalidParameterError);
    expect(() => satellitePosition(45, 3737.4, 0, 0, 0)).toThrow(InvalidParameterError);
  });
});
