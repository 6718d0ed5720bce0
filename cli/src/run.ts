import { performance } from 'perf_hooks';
import { conservationReport, sampleTrajectory, trajectoryRows } from '../../src/math/nbody';
import type { GravityModel } from '../../src/math/nbody';
import { ConfigurationError, Integrator } from '../../src/math/odesolvers';
import type { Trajectory } from '../../src/math/odesolvers';
import {
  formatDuration,
  formatNum,
  formatRow,
  formatVector,
  printBlank,
  printDivider,
  printField,
  printFieldRow,
  printHeader,
  printWarning
} from './format';
import { integrateWithProgress } from './progress';
import { buildModel, resolveTableau, validateScenario } from './scenario';
import type { RunObject, ScenarioConfig } from './types';

export type RunOptions = {
  runName: string;
  // Defaults to a plain integration without a progress bar.
  integrate?: typeof integrateWithProgress;
  now?: () => string;
};

export type RunResult = {
  run: RunObject;
  model: GravityModel;
  trajectory: Trajectory;
};

const plainIntegrate: typeof integrateWithProgress = (options, tf) => new Integrator(options).integrate(tf);

/**
 * Integrates a scenario and packages the sampled trajectory with timing and
 * conservation diagnostics. Invalid scenarios throw before any step is taken.
 */
export function executeScenario(config: ScenarioConfig, options: RunOptions): RunResult {
  const validation = validateScenario(config);
  if (!validation.valid) {
    const messages = Object.values(validation.errors).filter(Boolean).join(' ');
    throw new ConfigurationError(`Scenario "${config.name}" is invalid. ${messages}`);
  }

  const model = buildModel(config);
  const tableau = resolveTableau(config);
  const integrate = options.integrate ?? plainIntegrate;

  const started = performance.now();
  const trajectory = integrate(
    { equations: model.equations(), t0: config.t0, y0: model.initialState(), h: config.h, tableau },
    config.tf,
    `Integrating ${config.name}`
  );
  const elapsedMs = performance.now() - started;

  const sampled = sampleTrajectory(trajectory, config.sampleEvery);
  const run: RunObject = {
    type: 'run',
    name: options.runName,
    scenarioName: config.name,
    method: config.method,
    t0: config.t0,
    tf: config.tf,
    h: config.h,
    sampleEvery: config.sampleEvery,
    steps: trajectory.length - 1,
    elapsedMs,
    conservation: conservationReport(model, trajectory.map(record => record.y)),
    data: trajectoryRows(sampled),
    final: trajectoryRows(trajectory.slice(-1))[0],
    timestamp: (options.now ?? (() => new Date().toISOString()))(),
  };

  return { run, model, trajectory };
}

export function printRunSummary(run: RunObject, model: GravityModel): void {
  printHeader(run.name, `run of ${run.scenarioName}`);
  printFieldRow([
    { label: 'Method', value: run.method },
    { label: 'h', value: run.h },
    { label: 'Steps', value: run.steps }
  ]);
  printField('Elapsed', formatDuration(run.elapsedMs));
  printField('Frames', `${run.data.length} (every ${run.sampleEvery} steps)`);

  printDivider();
  printField('Final instant', formatNum(run.final[0]));
  const y = run.final.slice(1);
  model.bodies.forEach((body, b) => {
    printField(
      body.name,
      `q = ${formatVector(model.layout.position(y, b))}  p = ${formatVector(model.layout.momentum(y, b))}`
    );
  });

  printDivider();
  const { momentumDrift, energyDrift, relativeEnergyDrift } = run.conservation;
  printField('Momentum drift', formatNum(momentumDrift));
  printField('Energy drift', `${formatNum(energyDrift)} (relative ${formatNum(relativeEnergyDrift)})`, {
    color: relativeEnergyDrift > 0.01 ? 'yellow' : 'green'
  });
  if (relativeEnergyDrift > 0.01) {
    printWarning('Energy drifted by more than 1%; try a smaller step or a higher-order method.');
  }
  printBlank();
}

export function printRunRows(run: RunObject, count: number = 5): void {
  const head = run.data.slice(0, count);
  head.forEach(row => console.log(`  ${formatRow(row)}`));
  if (run.data.length > count * 2) {
    console.log('  ...');
  }
  if (run.data.length > count) {
    run.data.slice(Math.max(count, run.data.length - count)).forEach(row => console.log(`  ${formatRow(row)}`));
  }
}
