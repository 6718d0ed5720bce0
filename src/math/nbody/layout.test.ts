import { describe, expect, it } from 'vitest'
import { ConfigurationError } from '../odesolvers/errors'
import { StateLayout } from './layout'

describe('StateLayout', () => {
  it('interleaves position and momentum per axis', () => {
    const layout = new StateLayout(2, 2)

    expect(layout.size).toBe(8)
    expect(layout.positionOffset(0, 0)).toBe(0)
    expect(layout.momentumOffset(0, 0)).toBe(1)
    expect(layout.positionOffset(0, 1)).toBe(2)
    expect(layout.momentumOffset(0, 1)).toBe(3)
    expect(layout.positionOffset(1, 0)).toBe(4)
    expect(layout.momentumOffset(1, 1)).toBe(7)
  })

  it('packs bodies in the same order', () => {
    const layout = new StateLayout(2, 2)

    const y = layout.pack([
      { position: [20, 20], momentum: [-2, 2] },
      { position: [-20, -20], momentum: [0, 0] },
    ])

    expect(y).toEqual([20, -2, 20, 2, -20, 0, -20, 0])
    expect(layout.unpack(y)).toEqual([
      { position: [20, 20], momentum: [-2, 2] },
      { position: [-20, -20], momentum: [0, 0] },
    ])
  })

  it('handles three-dimensional bodies', () => {
    const layout = new StateLayout(1, 3)
    const y = layout.pack([{ position: [1, 2, 3], momentum: [4, 5, 6] }])

    expect(y).toEqual([1, 4, 2, 5, 3, 6])
    expect(layout.position(y, 0)).toEqual([1, 2, 3])
    expect(layout.momentum(y, 0)).toEqual([4, 5, 6])
  })

  it('names the quantity behind a flat offset', () => {
    const layout = new StateLayout(3, 2)

    expect(layout.describeOffset(0)).toEqual({ body: 0, quantity: 'x' })
    expect(layout.describeOffset(7)).toEqual({ body: 1, quantity: 'py' })
    expect(layout.describeOffset(9)).toEqual({ body: 2, quantity: 'px' })
    expect(() => layout.describeOffset(12)).toThrow(RangeError)
  })

  it('rejects out of range bodies and axes', () => {
    const layout = new StateLayout(2, 2)

    expect(() => layout.positionOffset(2, 0)).toThrow(RangeError)
    expect(() => layout.momentumOffset(0, 2)).toThrow(RangeError)
  })

  it('rejects states and body lists of the wrong size', () => {
    const layout = new StateLayout(2, 2)

    expect(() => layout.unpack([1, 2, 3])).toThrow(ConfigurationError)
    expect(() => layout.pack([{ position: [0, 0], momentum: [0, 0] }])).toThrow(
      'Expected 2 bodies, got 1.'
    )
    expect(() => new StateLayout(0, 2)).toThrow(ConfigurationError)
  })
})
