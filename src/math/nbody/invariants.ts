import type { GravityModel } from './gravity'
import { StateLayout } from './layout'

// Conserved quantities used to sanity check a finished run.

export function totalMomentum(layout: StateLayout, y: readonly number[]): number[] {
  const total = new Array<number>(layout.dimension).fill(0)
  for (let b = 0; b < layout.bodyCount; b++) {
    layout.momentum(y, b).forEach((p, k) => {
      total[k] += p
    })
  }
  return total
}

export function centerOfMass(model: GravityModel, y: readonly number[]): number[] {
  const { layout, masses } = model
  const weighted = new Array<number>(layout.dimension).fill(0)
  let totalMass = 0
  masses.forEach((m, b) => {
    totalMass += m
    layout.position(y, b).forEach((q, k) => {
      weighted[k] += m * q
    })
  })
  return weighted.map(value => value / totalMass)
}

export function kineticEnergy(model: GravityModel, y: readonly number[]): number {
  return model.masses.reduce((sum, m, b) => {
    const p = model.layout.momentum(y, b)
    return sum + p.reduce((acc, component) => acc + component * component, 0) / (2 * m)
  }, 0)
}

export function potentialEnergy(model: GravityModel, y: readonly number[]): number {
  const { layout, masses, gravitationalConstant } = model
  let energy = 0
  for (let a = 0; a < masses.length; a++) {
    const qa = layout.position(y, a)
    for (let b = a + 1; b < masses.length; b++) {
      const qb = layout.position(y, b)
      const r = Math.sqrt(qa.reduce((acc, q, k) => acc + (qb[k] - q) ** 2, 0))
      energy -= (gravitationalConstant * masses[a] * masses[b]) / r
    }
  }
  return energy
}

export function totalEnergy(model: GravityModel, y: readonly number[]): number {
  return kineticEnergy(model, y) + potentialEnergy(model, y)
}

export type ConservationReport = {
  momentumDrift: number
  energyDrift: number
  relativeEnergyDrift: number
}

/**
 * Largest deviation of total momentum (Euclidean norm) and total energy from
 * their values in the first state, over every given state.
 */
export function conservationReport(model: GravityModel, states: readonly (readonly number[])[]): ConservationReport {
  if (states.length === 0) {
    return { momentumDrift: 0, energyDrift: 0, relativeEnergyDrift: 0 }
  }
  const p0 = totalMomentum(model.layout, states[0])
  const e0 = totalEnergy(model, states[0])

  let momentumDrift = 0
  let energyDrift = 0
  for (const y of states) {
    const p = totalMomentum(model.layout, y)
    const delta = Math.sqrt(p.reduce((acc, value, k) => acc + (value - p0[k]) ** 2, 0))
    momentumDrift = Math.max(momentumDrift, delta)
    energyDrift = Math.max(energyDrift, Math.abs(totalEnergy(model, y) - e0))
  }

  return {
    momentumDrift,
    energyDrift,
    relativeEnergyDrift: e0 === 0 ? energyDrift : energyDrift / Math.abs(e0),
  }
}
