import { createGravityModel } from '../../src/math/nbody';
import type { Body, GravityModel } from '../../src/math/nbody';
import { ConfigurationError, getTableau, isTableauName, Tableau } from '../../src/math/odesolvers';
import type { TableauSpec } from '../../src/math/odesolvers';
import { isValidName } from './naming';
import type { MethodChoice, ScenarioConfig } from './types';

// Runs longer than this still work but get a warning before they start.
export const LONG_RUN_STEPS = 1_000_000;

export type ScenarioValidation = {
  valid: boolean;
  errors: {
    name?: string;
    bodies?: string;
    time?: string;
    method?: string;
    sampleEvery?: string;
  };
  warnings: string[];
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isNumberArray(value: unknown): value is number[] {
  return Array.isArray(value) && value.every(item => typeof item === 'number');
}

function readNumber(source: Record<string, unknown>, key: string, fallback?: number): number {
  const value = source[key];
  if (value === undefined && fallback !== undefined) return fallback;
  if (typeof value !== 'number') {
    throw new ConfigurationError(`Scenario field "${key}" must be a number.`);
  }
  return value;
}

function readBody(raw: unknown, index: number): Body {
  if (!isRecord(raw)) {
    throw new ConfigurationError(`Body ${index} must be an object.`);
  }
  const { name, mass, position, momentum } = raw;
  if (typeof name !== 'string') {
    throw new ConfigurationError(`Body ${index} needs a string name.`);
  }
  if (typeof mass !== 'number') {
    throw new ConfigurationError(`Body ${name} needs a numeric mass.`);
  }
  if (!isNumberArray(position) || !isNumberArray(momentum)) {
    throw new ConfigurationError(`Body ${name} needs numeric position and momentum arrays.`);
  }
  return { name, mass, position: [...position], momentum: [...momentum] };
}

function readTableau(raw: unknown): TableauSpec {
  if (!isRecord(raw)) {
    throw new ConfigurationError('A custom method needs a "tableau" object with stages, a and b.');
  }
  const { stages, a, b } = raw;
  if (typeof stages !== 'number' || !Array.isArray(a) || !a.every(isNumberArray) || !isNumberArray(b)) {
    throw new ConfigurationError('Tableau must have a numeric "stages", a matrix "a" and a vector "b".');
  }
  return { stages, a: a.map(row => [...row]), b: [...b] };
}

function readMethod(raw: unknown): MethodChoice {
  if (raw === 'custom') return 'custom';
  if (typeof raw === 'string' && isTableauName(raw)) return raw;
  throw new ConfigurationError(`Unknown method ${JSON.stringify(raw)}.`);
}

/**
 * Reads a scenario from parsed JSON, checking its shape. Value checks that
 * users can fix from the menus live in validateScenario.
 */
export function parseScenario(raw: unknown): ScenarioConfig {
  if (!isRecord(raw)) {
    throw new ConfigurationError('Scenario must be a JSON object.');
  }
  if (typeof raw.name !== 'string') {
    throw new ConfigurationError('Scenario field "name" must be a string.');
  }
  if (!Array.isArray(raw.bodies)) {
    throw new ConfigurationError('Scenario field "bodies" must be an array.');
  }

  const method = readMethod(raw.method ?? 'twoThirds');
  const config: ScenarioConfig = {
    name: raw.name,
    gravitationalConstant: readNumber(raw, 'gravitationalConstant', 1),
    bodies: raw.bodies.map(readBody),
    t0: readNumber(raw, 't0', 0),
    tf: readNumber(raw, 'tf'),
    h: readNumber(raw, 'h'),
    method,
    sampleEvery: readNumber(raw, 'sampleEvery', 1),
  };
  if (typeof raw.description === 'string') {
    config.description = raw.description;
  }
  if (method === 'custom') {
    config.tableau = readTableau(raw.tableau);
  }
  return config;
}

export function resolveTableau(config: ScenarioConfig): Tableau {
  if (config.method === 'custom') {
    if (!config.tableau) {
      throw new ConfigurationError('Custom method selected but no tableau was given.');
    }
    return new Tableau(config.tableau);
  }
  return getTableau(config.method);
}

export function buildModel(config: ScenarioConfig): GravityModel {
  return createGravityModel({
    bodies: config.bodies,
    gravitationalConstant: config.gravitationalConstant,
  });
}

export const validateScenario = (config: ScenarioConfig): ScenarioValidation => {
  const errors: ScenarioValidation['errors'] = {};
  const warnings: string[] = [];

  const nameCheck = isValidName(config.name);
  if (nameCheck !== true) {
    errors.name = nameCheck;
  }

  try {
    buildModel(config);
  } catch (err) {
    errors.bodies = err instanceof Error ? err.message : String(err);
  }

  if (![config.t0, config.tf, config.h].every(Number.isFinite)) {
    errors.time = 'Initial instant, final instant and step size must be numbers.';
  } else if (config.h <= 0) {
    errors.time = 'Step size must be positive.';
  } else if (config.tf <= config.t0) {
    errors.time = 'Final instant must be after the initial instant.';
  } else {
    const steps = (config.tf - config.t0) / config.h;
    if (Math.abs(steps - Math.round(steps)) > 1e-9) {
      warnings.push(
        `(tf - t0) / h = ${steps.toFixed(3)} is not a whole number; the last record will overshoot tf.`
      );
    }
    if (steps > LONG_RUN_STEPS) {
      warnings.push(`This run takes ${Math.ceil(steps)} steps and may be slow.`);
    }
  }

  try {
    const tableau = resolveTableau(config);
    if (!tableau.isConsistent()) {
      warnings.push(`Tableau weights sum to ${tableau.weightSum}, not 1; the method is inconsistent.`);
    }
  } catch (err) {
    errors.method = err instanceof Error ? err.message : String(err);
  }

  if (!Number.isInteger(config.sampleEvery) || config.sampleEvery < 1) {
    errors.sampleEvery = 'Sampling interval must be a positive whole number.';
  }

  return {
    valid: Object.keys(errors).length === 0,
    errors,
    warnings,
  };
};
