import { describe, expect, it } from 'vitest'
import type { Trajectory } from '../odesolvers/types'
import { createGravityModel } from './gravity'
import { bodyTracks, rowsToTrajectory, sampleTrajectory, trajectoryRows } from './trajectory'

const model = createGravityModel({
  bodies: [
    { name: 'sun', mass: 10, position: [0, 0], momentum: [0, 0] },
    { name: 'moon', mass: 1, position: [3, 4], momentum: [1, 0] },
  ],
})

const trajectory: Trajectory = [0, 1, 2, 3, 4].map(t => ({
  t,
  y: [t, 0, -t, 0, 3 + t, 1, 4, 0],
}))

describe('trajectory helpers', () => {
  it('keeps every k-th record starting with the first', () => {
    expect(sampleTrajectory(trajectory, 2).map(record => record.t)).toEqual([0, 2, 4])
    expect(sampleTrajectory(trajectory, 10).map(record => record.t)).toEqual([0])
    expect(sampleTrajectory(trajectory, 1)).toEqual(trajectory)
  })

  it('rejects non-positive sampling intervals', () => {
    expect(() => sampleTrajectory(trajectory, 0)).toThrow(
      'Sampling interval must be a positive integer, got 0.'
    )
    expect(() => sampleTrajectory(trajectory, 1.5)).toThrow()
  })

  it('splits a run into per-body tracks', () => {
    const [sun, moon] = bodyTracks(model, trajectory)

    expect(sun.name).toBe('sun')
    expect(sun.positions[2]).toEqual([2, -2])
    expect(moon.name).toBe('moon')
    expect(moon.times).toEqual([0, 1, 2, 3, 4])
    expect(moon.positions[4]).toEqual([7, 4])
  })

  it('flattens records into [t, ...y] rows and back', () => {
    const rows = trajectoryRows(trajectory.slice(0, 1))

    expect(rows).toEqual([[0, 0, 0, -0, 0, 3, 1, 4, 0]])
    expect(rowsToTrajectory(rows)).toEqual(trajectory.slice(0, 1))
  })
})
