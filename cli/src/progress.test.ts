import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import chalk from 'chalk';
import { EvaluationError, getTableau } from '../../src/math/odesolvers';
import { PROGRESS_BAR_WIDTH } from './format';
import { computeBatchSize, createProgressReporter, integrateWithProgress } from './progress';

function bar(filled: number): string {
  return '█'.repeat(filled) + '░'.repeat(PROGRESS_BAR_WIDTH - filled);
}

describe('computeBatchSize', () => {
  it('spreads about fifty updates over a run', () => {
    expect(computeBatchSize(10)).toBe(1);
    expect(computeBatchSize(100)).toBe(2);
    expect(computeBatchSize(1001)).toBe(21);
  });

  it('falls back to one for empty or unknown totals', () => {
    expect(computeBatchSize(0)).toBe(1);
    expect(computeBatchSize(NaN)).toBe(1);
  });
});

describe('progress output', () => {
  let level: typeof chalk.level;

  beforeEach(() => {
    level = chalk.level;
    chalk.level = 0;
  });

  afterEach(() => {
    chalk.level = level;
    vi.restoreAllMocks();
  });

  it('redraws the bar once per batch and on the last step', () => {
    const write = vi.spyOn(process.stdout, 'write').mockImplementation(() => true);
    const report = createProgressReporter('Load');

    for (let step = 1; step <= 101; step++) {
      report({ step, maxSteps: 101, t: step });
    }

    // Batches of three: steps 3, 6, ..., 99 and then 101.
    expect(write).toHaveBeenCalledTimes(34);
    expect(write.mock.calls[33][0]).toBe(`\rLoad [${bar(PROGRESS_BAR_WIDTH)}] 100%`);
  });

  it('integrates with a bar from zero to done', () => {
    const write = vi.spyOn(process.stdout, 'write').mockImplementation(() => true);
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});

    const trajectory = integrateWithProgress(
      { equations: [(_, y) => -y[0]], t0: 0, y0: [1], h: 0.25, tableau: getTableau('euler') },
      1,
      'decay'
    );

    expect(trajectory[trajectory.length - 1].y).toEqual([0.31640625]);
    expect(write.mock.calls.map(args => args[0])).toEqual([
      `\rdecay [${bar(0)}] 0%`,
      `\rdecay [${bar(5)}] 25%`,
      `\rdecay [${bar(10)}] 50%`,
      `\rdecay [${bar(15)}] 75%`,
      `\rdecay [${bar(20)}] 100%`,
    ]);
    expect(log.mock.calls).toEqual([[`\rdecay [${'█'.repeat(PROGRESS_BAR_WIDTH)}] Done!`]]);
  });

  it('ends the bar line and rethrows when a derivative fails', () => {
    vi.spyOn(process.stdout, 'write').mockImplementation(() => true);
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    const failing = () => {
      throw new Error('boom');
    };

    expect(() =>
      integrateWithProgress(
        { equations: [failing], t0: 0, y0: [1], h: 0.5, tableau: getTableau('rk4') },
        1,
        'fail'
      )
    ).toThrow(EvaluationError);
    expect(log.mock.calls).toEqual([['']]);
  });
});
