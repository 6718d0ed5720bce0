import { sum } from 'mathjs'

import { ConfigurationError } from './errors'

const CONSISTENCY_TOLERANCE = 1e-12

export type TableauSpec = {
  stages: number
  a: readonly (readonly number[])[]
  b: readonly number[]
}

/**
 * Butcher tableau of an explicit Runge-Kutta method.
 *
 * The coupling matrix must be strictly lower triangular: stage r may only
 * read stages s < r, which is what lets the stages be computed in order.
 */
export class Tableau {
  readonly stages: number
  readonly a: readonly (readonly number[])[]
  readonly b: readonly number[]
  readonly c: readonly number[]

  constructor({ stages, a, b }: TableauSpec) {
    if (!Number.isInteger(stages) || stages < 1) {
      throw new ConfigurationError(`Stage count must be a positive integer, got ${stages}.`)
    }
    if (b.length !== stages) {
      throw new ConfigurationError(`Expected ${stages} weights in b, got ${b.length}.`)
    }
    if (a.length !== stages) {
      throw new ConfigurationError(`Expected ${stages} rows in a, got ${a.length}.`)
    }

    a.forEach((row, r) => {
      if (row.length !== stages) {
        throw new ConfigurationError(`Row ${r} of a has ${row.length} entries, expected ${stages}.`)
      }
      row.forEach((value, s) => {
        if (!Number.isFinite(value)) {
          throw new ConfigurationError(`a[${r}][${s}] is not a finite number.`)
        }
        if (s >= r && value !== 0) {
          throw new ConfigurationError(
            `a[${r}][${s}] = ${value} is not allowed: explicit methods need a strictly lower-triangular a.`
          )
        }
      })
    })
    b.forEach((value, r) => {
      if (!Number.isFinite(value)) {
        throw new ConfigurationError(`b[${r}] is not a finite number.`)
      }
    })

    this.stages = stages
    this.a = Object.freeze(a.map(row => Object.freeze([...row])))
    this.b = Object.freeze([...b])
    this.c = Object.freeze(this.a.map(row => sum(...row)))
  }

  // Stage count under its usual symbol.
  get R(): number {
    return this.stages
  }

  get weightSum(): number {
    return sum(...this.b)
  }

  // First-order consistency; not enforced.
  isConsistent(): boolean {
    return Math.abs(this.weightSum - 1) <= CONSISTENCY_TOLERANCE
  }

  toSpec(): TableauSpec {
    return {
      stages: this.stages,
      a: this.a.map(row => [...row]),
      b: [...this.b],
    }
  }
}
