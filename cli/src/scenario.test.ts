import { describe, expect, it } from 'vitest';
import { ConfigurationError } from '../../src/math/odesolvers';
import { LONG_RUN_STEPS, buildModel, parseScenario, resolveTableau, validateScenario } from './scenario';
import type { ScenarioConfig } from './types';

function pair(overrides: Partial<ScenarioConfig> = {}): ScenarioConfig {
  return {
    name: 'pair',
    gravitationalConstant: 1,
    bodies: [
      { name: 'a', mass: 1, position: [1, 0], momentum: [0, 0.5] },
      { name: 'b', mass: 1, position: [-1, 0], momentum: [0, -0.5] },
    ],
    t0: 0,
    tf: 1,
    h: 0.1,
    method: 'rk4',
    sampleEvery: 1,
    ...overrides,
  };
}

describe('parseScenario', () => {
  it('fills in defaults for optional fields', () => {
    const config = parseScenario({
      name: 'pair',
      bodies: pair().bodies,
      tf: 1,
      h: 0.1,
    });

    expect(config).toEqual({
      name: 'pair',
      gravitationalConstant: 1,
      bodies: pair().bodies,
      t0: 0,
      tf: 1,
      h: 0.1,
      method: 'twoThirds',
      sampleEvery: 1,
    });
    expect('description' in config).toBe(false);
  });

  it('keeps a custom tableau and the description', () => {
    const config = parseScenario({
      ...pair(),
      description: 'custom midpoint',
      method: 'custom',
      tableau: { stages: 2, a: [[0, 0], [0.5, 0]], b: [0, 1] },
    });

    expect(config.description).toBe('custom midpoint');
    expect(config.tableau).toEqual({ stages: 2, a: [[0, 0], [0.5, 0]], b: [0, 1] });
    expect(resolveTableau(config).c).toEqual([0, 0.5]);
  });

  it('rejects malformed scenarios', () => {
    expect(() => parseScenario([])).toThrow('Scenario must be a JSON object.');
    expect(() => parseScenario({ name: 'x', bodies: [], h: 0.1 })).toThrow('Scenario field "tf" must be a number.');
    expect(() => parseScenario({ ...pair(), method: 'leapfrog' })).toThrow('Unknown method "leapfrog".');
    expect(() => parseScenario({ ...pair(), method: 'custom' })).toThrow(
      'A custom method needs a "tableau" object with stages, a and b.'
    );
    expect(() => parseScenario({ ...pair(), bodies: [{ name: 'a', mass: '1' }] })).toThrow(ConfigurationError);
  });
});

describe('validateScenario', () => {
  it('accepts a well formed scenario without warnings', () => {
    expect(validateScenario(pair())).toEqual({ valid: true, errors: {}, warnings: [] });
  });

  it('reports time errors', () => {
    expect(validateScenario(pair({ h: 0 })).errors.time).toBe('Step size must be positive.');
    expect(validateScenario(pair({ tf: 0 })).errors.time).toBe('Final instant must be after the initial instant.');
    expect(validateScenario(pair({ tf: NaN })).errors.time).toBe(
      'Initial instant, final instant and step size must be numbers.'
    );
  });

  it('reports name, body and sampling errors', () => {
    const body = pair().bodies[0];
    const result = validateScenario(pair({ name: 'bad name', bodies: [body, body], sampleEvery: 0 }));

    expect(result.valid).toBe(false);
    expect(result.errors).toEqual({
      name: 'Name must contain only alphanumeric characters and underscores (no spaces).',
      bodies: 'Duplicate body name "a".',
      sampleEvery: 'Sampling interval must be a positive whole number.',
    });
  });

  it('warns about overshoot, long runs and inconsistent weights', () => {
    expect(validateScenario(pair({ h: 0.3 })).warnings).toEqual([
      '(tf - t0) / h = 3.333 is not a whole number; the last record will overshoot tf.',
    ]);
    expect(validateScenario(pair({ tf: LONG_RUN_STEPS + 1, h: 1 })).warnings).toEqual([
      'This run takes 1000001 steps and may be slow.',
    ]);

    const inconsistent = validateScenario(
      pair({ method: 'custom', tableau: { stages: 2, a: [[0, 0], [1, 0]], b: [0.5, 0.4] } })
    );
    expect(inconsistent.valid).toBe(true);
    expect(inconsistent.warnings).toEqual(['Tableau weights sum to 0.9, not 1; the method is inconsistent.']);
  });

  it('reports an invalid custom tableau as a method error', () => {
    const result = validateScenario(pair({ method: 'custom', tableau: { stages: 2, a: [[0, 1], [1, 0]], b: [0.5, 0.5] } }));

    expect(result.errors.method).toBe(
      'a[0][1] = 1 is not allowed: explicit methods need a strictly lower-triangular a.'
    );
  });
});

describe('buildModel', () => {
  it('carries bodies and the gravitational constant into the model', () => {
    const model = buildModel(pair({ gravitationalConstant: 2 }));

    expect(model.gravitationalConstant).toBe(2);
    expect(model.initialState()).toEqual([1, 0, 0, 0.5, -1, 0, 0, -0.5]);
  });
});
