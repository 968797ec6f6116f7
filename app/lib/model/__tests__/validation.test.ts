import {
  assertFinitePosition,
  parseInclination,
  validateInclination,
  validateOrbitalParameters,
} from '../validation';
import { InvalidParameterError } from '../errors';

describe('Inclination validation', () => {
  it('accepts physically meaningful inclinations without warnings', () => {
    for (const value of [0, 45, 97.6, 180]) {
      expect(validateInclination(value)).toEqual({ valid: true, errors: [], warnings: [] });
    }
  });

  it('warns but does not block outside [0, 180]', () => {
    expect(validateInclination(200)).toEqual({
      valid: true,
      errors: [],
      warnings: ['Inclination 200° is outside [0, 180]°'],
    });
    expect(validateInclination(-10).warnings).toHaveLength(1);
  });

  it('rejects NaN and Infinity', () => {
    expect(validateInclination(Number.NaN).valid).toBe(false);
    expect(validateInclination(Number.POSITIVE_INFINITY).errors).toEqual([
      'Inclination must be a finite number of degrees, got Infinity',
    ]);
  });

  it('parses prompt text', () => {
    expect(parseInclination(' 45 ')).toBe(45);
    expect(parseInclination('97.5')).toBe(97.5);
    expect(parseInclination('-3')).toBe(-3);
  });

  it('throws on text that is not a finite number', () => {
    for (const raw of ['', '   ', 'abc', '45deg', 'Infinity', 'NaN']) {
      expect(() => parseInclination(raw)).toThrow(InvalidParameterError);
    }
  });
});

describe('Orbital parameter validation', () => {
  it('passes the lunar defaults', () => {
    expect(validateOrbitalParameters({ bodyRadiusKm: 1737.4, altitudeKm: 2000, fieldOfViewDegrees: 90 }).valid).toBe(true);
  });

  it('collects every error at once', () => {
    const result = validateOrbitalParameters({ bodyRadiusKm: 0, altitudeKm: -1, fieldOfViewDegrees: 0 });
    expect(result.valid).toBe(false);
    expect(result.errors).toEqual([
      'Body radius must be > 0 km, got 0',
      'Altitude must be >= 0 km, got -1',
      'Field of view must be in (0, 360] degrees, got 0',
    ]);
  });

  it('warns on a surface-grazing orbit', () => {
    const result = validateOrbitalParameters({ bodyRadiusKm: 1737.4, altitudeKm: 0, fieldOfViewDegrees: 90 });
    expect(result.valid).toBe(true);
    expect(result.warnings).toEqual(['Altitude is 0 km: the orbit grazes the surface']);
  });
});

describe('assertFinitePosition', () => {
  it('passes finite positions through unchanged', () => {
    const position = { x: 1, y: -2, z: 3 };
    expect(assertFinitePosition(position)).toBe(position);
  });

  it('throws on NaN or Infinity coordinates', () => {
    expect(() => assertFinitePosition({ x: 0, y: Number.NaN, z: 0 })).toThrow(/position\.y/);
    expect(() => assertFinitePosition({ x: 0, y: 0, z: Number.NEGATIVE_INFINITY })).toThrow(/position\.z/);
  });
});
