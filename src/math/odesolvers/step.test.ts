import { describe, expect, it } from 'vitest'
import { StepAdvancer } from './step'
import { getTableau } from './tableaus'

describe('StepAdvancer', () => {
  it('advances exponential growth by 1 + h + h^2/2 with a second-order scheme', () => {
    const advancer = new StepAdvancer([(_, y) => y[0]], getTableau('twoThirds'), 0.1)

    const next = advancer.advance(0, [1])

    expect(next.t).toBe(0.1)
    expect(next.y[0]).toBeCloseTo(1.105, 14)
  })

  it('updates every component from the same snapshot', () => {
    // Harmonic oscillator with explicit Euler: [1, 0] -> [1, -0.1].
    const advancer = new StepAdvancer([(_, y) => y[1], (_, y) => -y[0]], getTableau('euler'), 0.1)

    expect(advancer.advance(2, [1, 0])).toEqual({ t: 2.1, y: [1, -0.1] })
  })

  it('returns a fresh state and never mutates its input', () => {
    const advancer = new StepAdvancer([(_, y) => y[0]], getTableau('rk4'), 0.1)
    const y = [1]

    const next = advancer.advance(0, y)

    expect(next.y).not.toBe(y)
    expect(y).toEqual([1])
  })
})
