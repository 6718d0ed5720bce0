import { ConfigurationError } from '../odesolvers/errors'
import type { Trajectory } from '../odesolvers/types'
import type { GravityModel } from './gravity'

export type BodyTrack = {
  name: string
  times: number[]
  positions: number[][]
}

/**
 * Keeps every `every`-th record, starting with the first.
 */
export function sampleTrajectory(trajectory: Trajectory, every: number): Trajectory {
  if (!Number.isInteger(every) || every < 1) {
    throw new ConfigurationError(`Sampling interval must be a positive integer, got ${every}.`)
  }
  return trajectory.filter((_, index) => index % every === 0)
}

export function bodyTracks(model: GravityModel, trajectory: Trajectory): BodyTrack[] {
  const times = trajectory.map(record => record.t)
  return model.bodies.map((body, b) => ({
    name: body.name,
    times,
    positions: trajectory.map(record => model.layout.position(record.y, b)),
  }))
}

// Flat [t, ...y] rows, the on-disk shape of a stored run.
export function trajectoryRows(trajectory: Trajectory): number[][] {
  return trajectory.map(record => [record.t, ...record.y])
}

export function rowsToTrajectory(rows: readonly (readonly number[])[]): Trajectory {
  return rows.map(row => ({ t: row[0], y: row.slice(1) }))
}
