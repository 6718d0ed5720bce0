import { Integrator } from '../../src/math/odesolvers';
import type { IntegratorOptions, StepProgress, Trajectory } from '../../src/math/odesolvers';
import { printBlank, printProgress, printProgressComplete } from './format';

const DEFAULT_PROGRESS_UPDATES = 50;

export function computeBatchSize(maxSteps: number): number {
  if (!Number.isFinite(maxSteps) || maxSteps <= 0) {
    return 1;
  }
  return Math.max(1, Math.ceil(maxSteps / DEFAULT_PROGRESS_UPDATES));
}

/**
 * Step observer that redraws the bar about DEFAULT_PROGRESS_UPDATES times
 * per run instead of on every step.
 */
export function createProgressReporter(label: string): (progress: StepProgress) => void {
  let batchSize = 0;
  return ({ step, maxSteps }) => {
    if (batchSize === 0) {
      batchSize = computeBatchSize(maxSteps);
    }
    if (step % batchSize === 0 || step >= maxSteps) {
      printProgress(step, maxSteps, label);
    }
  };
}

export function integrateWithProgress(
  options: Omit<IntegratorOptions, 'onStep'>,
  tf: number,
  label: string
): Trajectory {
  const integrator = new Integrator({ ...options, onStep: createProgressReporter(label) });
  printProgress(0, integrator.stepCount(tf), label);

  try {
    const trajectory = integrator.integrate(tf);
    printProgressComplete(label);
    return trajectory;
  } catch (err) {
    // Leave the partial bar on its own line before the error is printed.
    printBlank();
    throw err;
  }
}
