import { StageEvaluator } from './stages'
import type { Tableau } from './tableau'
import type { EquationVector, TrajectoryRecord } from './types'

/**
 * One explicit Runge-Kutta step: y_next[i] = y[i] + h * sum_r b[r] k[r][i].
 */
export class StepAdvancer {
  readonly h: number
  private readonly tableau: Tableau
  private readonly stages: StageEvaluator

  constructor(equations: EquationVector, tableau: Tableau, h: number) {
    this.h = h
    this.tableau = tableau
    this.stages = new StageEvaluator(equations, tableau, h)
  }

  // Never mutates y; the next state is a fresh array.
  advance(t: number, y: readonly number[]): TrajectoryRecord {
    const k = this.stages.evaluateStages(t, y)
    const { b } = this.tableau

    const next = y.map((value, i) => {
      let phi = 0
      for (let r = 0; r < b.length; r++) {
        phi += b[r] * k[r][i]
      }
      return value + this.h * phi
    })

    return { t: t + this.h, y: next }
  }
}
