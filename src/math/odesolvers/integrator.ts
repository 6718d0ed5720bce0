import { round } from 'mathjs'

import { ConfigurationError } from './errors'
import { StepAdvancer } from './step'
import { Tableau } from './tableau'
import type { TableauSpec } from './tableau'
import type { EquationVector, StepProgress, Trajectory } from './types'

// Instants are rounded to this many decimals before comparing with tf.
export const TIME_ROUNDING_DECIMALS = 10

/**
 * Steps needed to go from t0 to tf; a partial last step counts as one.
 */
export function countSteps(t0: number, tf: number, h: number): number {
  return Math.max(1, Math.ceil(round((tf - t0) / h, TIME_ROUNDING_DECIMALS)))
}

export type IntegratorOptions = {
  equations: EquationVector
  t0: number
  y0: readonly number[]
  h: number
  tableau: Tableau | TableauSpec
  onStep?: (progress: StepProgress) => void
}

/**
 * Fixed-step explicit Runge-Kutta integrator.
 *
 * `integrate(tf)` starts from (t0, y0) and steps by h until the instant,
 * rounded to TIME_ROUNDING_DECIMALS places, reaches tf. The last record may
 * overshoot tf by less than one step when tf is not a multiple of h.
 */
export class Integrator {
  readonly t0: number
  readonly h: number
  readonly tableau: Tableau
  private readonly y0: readonly number[]
  private readonly advancer: StepAdvancer
  private readonly onStep?: (progress: StepProgress) => void

  constructor({ equations, t0, y0, h, tableau, onStep }: IntegratorOptions) {
    if (equations.length === 0) {
      throw new ConfigurationError('At least one equation is required.')
    }
    if (equations.length !== y0.length) {
      throw new ConfigurationError(
        `Got ${equations.length} equations but ${y0.length} initial values.`
      )
    }
    const badIndex = y0.findIndex(value => !Number.isFinite(value))
    if (badIndex >= 0) {
      throw new ConfigurationError(`Initial value y0[${badIndex}] is not a finite number.`)
    }
    if (!Number.isFinite(t0)) {
      throw new ConfigurationError('Initial instant t0 must be a finite number.')
    }
    if (!Number.isFinite(h) || h <= 0) {
      throw new ConfigurationError(`Step size must be a positive finite number, got ${h}.`)
    }
    if (t0 + h === t0) {
      throw new ConfigurationError(`Step size ${h} is too small to advance from t = ${t0}.`)
    }

    this.t0 = t0
    this.h = h
    this.tableau = tableau instanceof Tableau ? tableau : new Tableau(tableau)
    this.y0 = Object.freeze([...y0])
    this.advancer = new StepAdvancer(equations, this.tableau, h)
    this.onStep = onStep
  }

  get dimension(): number {
    return this.y0.length
  }

  stepCount(tf: number): number {
    this.assertReachable(tf)
    return countSteps(this.t0, tf, this.h)
  }

  integrate(tf: number): Trajectory {
    const planned = this.stepCount(tf)
    // One extra step of headroom for rounding drift in the accumulated instant.
    const limit = planned + 1
    const trajectory: Trajectory = [{ t: this.t0, y: [...this.y0] }]

    let t = this.t0
    let y: readonly number[] = this.y0

    for (let step = 1; step <= limit; step++) {
      const next = this.advancer.advance(t, y)
      trajectory.push(next)
      t = next.t
      y = next.y

      this.onStep?.({ step, maxSteps: Math.max(planned, step), t })
      if (round(t, TIME_ROUNDING_DECIMALS) >= tf) break
    }

    // The instant stops moving once h falls below half an ulp of t.
    if (round(t, TIME_ROUNDING_DECIMALS) < tf) {
      throw new ConfigurationError(`Step size ${this.h} is too small to advance from t = ${t}.`)
    }
    return trajectory
  }

  private assertReachable(tf: number) {
    if (!Number.isFinite(tf)) {
      throw new ConfigurationError('Final instant tf must be a finite number.')
    }
    if (tf <= this.t0) {
      throw new ConfigurationError(`Final instant ${tf} must be after t0 = ${this.t0}.`)
    }
  }
}
