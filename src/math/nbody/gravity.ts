import { ConfigurationError } from '../odesolvers/errors'
import type { Derivative, EquationVector } from '../odesolvers/types'
import { StateLayout } from './layout'
import type { Body, Dimension } from './layout'

export interface GravityModelOptions {
  bodies: Body[]
  gravitationalConstant?: number
}

export interface GravityModel {
  readonly bodies: readonly Readonly<Body>[]
  readonly masses: readonly number[]
  readonly gravitationalConstant: number
  readonly layout: StateLayout
  initialState(): number[]
  equations(): EquationVector
}

function isDimension(value: number): value is Dimension {
  return value === 2 || value === 3
}

function validateBodies(bodies: Body[]): Dimension {
  if (bodies.length < 2) {
    throw new ConfigurationError('A gravitational system needs at least two bodies.')
  }
  const dimension = bodies[0].position.length
  if (!isDimension(dimension)) {
    throw new ConfigurationError(`Bodies must live in 2 or 3 dimensions, got ${dimension}.`)
  }

  const names = new Set<string>()
  for (const body of bodies) {
    if (!body.name.trim()) {
      throw new ConfigurationError('Body names cannot be empty.')
    }
    if (names.has(body.name)) {
      throw new ConfigurationError(`Duplicate body name "${body.name}".`)
    }
    names.add(body.name)

    if (!Number.isFinite(body.mass) || body.mass <= 0) {
      throw new ConfigurationError(`Body ${body.name} must have a positive finite mass.`)
    }
    if (body.position.length !== dimension || body.momentum.length !== dimension) {
      throw new ConfigurationError(
        `Body ${body.name} must have ${dimension} position and momentum components.`
      )
    }
    if (![...body.position, ...body.momentum].every(Number.isFinite)) {
      throw new ConfigurationError(`Body ${body.name} has a non-finite coordinate.`)
    }
  }
  return dimension
}

/**
 * Newtonian point masses in Hamiltonian form:
 *
 *   dq/dt = p / m
 *   dp_a/dt = G m_a * sum_{b != a} m_b (q_b - q_a) / |q_b - q_a|^3
 *
 * The model is frozen; its derivative functions only close over it.
 */
export function createGravityModel({ bodies, gravitationalConstant = 1 }: GravityModelOptions): GravityModel {
  const dimension = validateBodies(bodies)
  if (!Number.isFinite(gravitationalConstant) || gravitationalConstant <= 0) {
    throw new ConfigurationError('The gravitational constant must be a positive finite number.')
  }

  const frozen = Object.freeze(
    bodies.map(body =>
      Object.freeze({
        name: body.name,
        mass: body.mass,
        position: [...body.position],
        momentum: [...body.momentum],
      })
    )
  )
  const masses = Object.freeze(frozen.map(body => body.mass))
  const layout = new StateLayout(frozen.length, dimension)
  const G = gravitationalConstant

  // Offsets are resolved once here rather than inside the derivatives.
  const positionOffsets = frozen.map((_, b) =>
    Array.from({ length: dimension }, (_, k) => layout.positionOffset(b, k))
  )

  const distance = (y: readonly number[], a: number, b: number) => {
    let squared = 0
    for (let k = 0; k < dimension; k++) {
      const delta = y[positionOffsets[b][k]] - y[positionOffsets[a][k]]
      squared += delta * delta
    }
    return Math.sqrt(squared)
  }

  const velocity = (a: number, k: number): Derivative => {
    const offset = layout.momentumOffset(a, k)
    return (_, y) => y[offset] / masses[a]
  }

  const force = (a: number, k: number): Derivative => (_, y) => {
    let total = 0
    for (let b = 0; b < masses.length; b++) {
      if (b === a) continue
      const r = distance(y, a, b)
      total += (masses[b] * (y[positionOffsets[b][k]] - y[positionOffsets[a][k]])) / r ** 3
    }
    return G * masses[a] * total
  }

  const equations: Derivative[] = new Array<Derivative>(layout.size)
  for (let a = 0; a < frozen.length; a++) {
    for (let k = 0; k < dimension; k++) {
      equations[layout.positionOffset(a, k)] = velocity(a, k)
      equations[layout.momentumOffset(a, k)] = force(a, k)
    }
  }
  const equationVector = Object.freeze(equations)

  return Object.freeze({
    bodies: frozen,
    masses,
    gravitationalConstant: G,
    layout,
    initialState: () => layout.pack(frozen),
    equations: () => equationVector,
  })
}
