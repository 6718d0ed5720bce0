import { ConfigurationError } from '../odesolvers/errors'

export type Dimension = 2 | 3

export const AXIS_NAMES = ['x', 'y', 'z'] as const

export interface Body {
  name: string
  mass: number
  position: number[]
  momentum: number[]
}

export type BodyState = {
  position: number[]
  momentum: number[]
}

/**
 * Maps bodies and axes to offsets in the flat state vector.
 *
 * Each body owns 2 * dimension consecutive slots, interleaving position and
 * momentum per axis: [x, px, y, py(, z, pz)].
 */
export class StateLayout {
  readonly bodyCount: number
  readonly dimension: Dimension
  readonly size: number

  constructor(bodyCount: number, dimension: Dimension) {
    if (!Number.isInteger(bodyCount) || bodyCount < 1) {
      throw new ConfigurationError(`Body count must be a positive integer, got ${bodyCount}.`)
    }
    this.bodyCount = bodyCount
    this.dimension = dimension
    this.size = bodyCount * 2 * dimension
  }

  positionOffset(body: number, axis: number): number {
    this.check(body, axis)
    return body * 2 * this.dimension + 2 * axis
  }

  momentumOffset(body: number, axis: number): number {
    return this.positionOffset(body, axis) + 1
  }

  // Label of the state component at a flat offset, e.g. "py" of body "sun".
  describeOffset(offset: number): { body: number; quantity: string } {
    if (!Number.isInteger(offset) || offset < 0 || offset >= this.size) {
      throw new RangeError(`Offset ${offset} is outside [0, ${this.size}).`)
    }
    const body = Math.floor(offset / (2 * this.dimension))
    const local = offset % (2 * this.dimension)
    const axis = AXIS_NAMES[Math.floor(local / 2)]
    return { body, quantity: local % 2 === 0 ? axis : `p${axis}` }
  }

  pack(bodies: readonly BodyState[]): number[] {
    if (bodies.length !== this.bodyCount) {
      throw new ConfigurationError(`Expected ${this.bodyCount} bodies, got ${bodies.length}.`)
    }
    const y = new Array<number>(this.size).fill(0)
    bodies.forEach((body, b) => {
      for (let k = 0; k < this.dimension; k++) {
        y[this.positionOffset(b, k)] = body.position[k]
        y[this.momentumOffset(b, k)] = body.momentum[k]
      }
    })
    return y
  }

  position(y: readonly number[], body: number): number[] {
    return Array.from({ length: this.dimension }, (_, k) => y[this.positionOffset(body, k)])
  }

  momentum(y: readonly number[], body: number): number[] {
    return Array.from({ length: this.dimension }, (_, k) => y[this.momentumOffset(body, k)])
  }

  unpack(y: readonly number[]): BodyState[] {
    if (y.length !== this.size) {
      throw new ConfigurationError(`Expected a state of ${this.size} components, got ${y.length}.`)
    }
    return Array.from({ length: this.bodyCount }, (_, b) => ({
      position: this.position(y, b),
      momentum: this.momentum(y, b),
    }))
  }

  private check(body: number, axis: number) {
    if (!Number.isInteger(body) || body < 0 || body >= this.bodyCount) {
      throw new RangeError(`Body index ${body} is outside [0, ${this.bodyCount}).`)
    }
    if (!Number.isInteger(axis) || axis < 0 || axis >= this.dimension) {
      throw new RangeError(`Axis ${axis} is outside [0, ${this.dimension}).`)
    }
  }
}
