import { ConfigurationError, EvaluationError } from './errors'
import type { Tableau } from './tableau'
import type { EquationVector } from './types'

/**
 * Computes the stage derivatives k[r][i] of one explicit Runge-Kutta step.
 *
 * Stage r of equation i is f_i evaluated at t + h c[r] and at the shifted
 * state y + h * sum_{s < r} a[r][s] k[s], so every stage needs all equations'
 * earlier stages. They are therefore computed jointly, one stage row at a
 * time, into a buffer that is reused across steps.
 */
export class StageEvaluator {
  private readonly equations: EquationVector
  private readonly tableau: Tableau
  private readonly h: number
  private readonly k: number[][]
  private readonly shifted: number[]

  constructor(equations: EquationVector, tableau: Tableau, h: number) {
    this.equations = equations
    this.tableau = tableau
    this.h = h
    this.k = Array.from({ length: tableau.stages }, () => new Array<number>(equations.length).fill(0))
    this.shifted = new Array<number>(equations.length).fill(0)
  }

  get dimension(): number {
    return this.equations.length
  }

  /**
   * Stage r of equation i at the snapshot (t, y).
   */
  stage(i: number, t: number, y: readonly number[], r: number): number {
    if (!Number.isInteger(i) || i < 0 || i >= this.equations.length) {
      throw new RangeError(`Equation index ${i} is outside [0, ${this.equations.length}).`)
    }
    if (!Number.isInteger(r) || r < 0 || r >= this.tableau.stages) {
      throw new RangeError(`Stage index ${r} is outside [0, ${this.tableau.stages}).`)
    }
    this.fill(t, y, r)
    return this.k[r][i]
  }

  /**
   * All stages for all equations. The returned rows are the evaluator's own
   * buffer and are overwritten by the next call.
   */
  evaluateStages(t: number, y: readonly number[]): readonly (readonly number[])[] {
    this.fill(t, y, this.tableau.stages - 1)
    return this.k
  }

  private fill(t: number, y: readonly number[], lastStage: number) {
    const { a, c } = this.tableau
    const n = this.equations.length
    if (y.length !== n) {
      throw new ConfigurationError(`State has ${y.length} components but the system has ${n} equations.`)
    }

    for (let r = 0; r <= lastStage; r++) {
      let state: readonly number[] = y
      if (r > 0) {
        for (let j = 0; j < n; j++) {
          let increment = 0
          for (let s = 0; s < r; s++) {
            increment += a[r][s] * this.k[s][j]
          }
          this.shifted[j] = y[j] + this.h * increment
        }
        state = this.shifted
      }

      const stageTime = t + this.h * c[r]
      const row = this.k[r]
      for (let i = 0; i < n; i++) {
        row[i] = this.evaluate(i, r, t, stageTime, state)
      }
    }
  }

  private evaluate(i: number, r: number, t: number, stageTime: number, state: readonly number[]): number {
    let value: number
    try {
      value = this.equations[i](stageTime, state)
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err)
      throw new EvaluationError(
        `Equation ${i} failed at stage ${r} of the step from t = ${t}: ${reason}`,
        { equation: i, stage: r, t },
        { cause: err }
      )
    }
    if (!Number.isFinite(value)) {
      throw new EvaluationError(
        `Equation ${i} returned ${value} at stage ${r} of the step from t = ${t}.`,
        { equation: i, stage: r, t }
      )
    }
    return value
  }
}
