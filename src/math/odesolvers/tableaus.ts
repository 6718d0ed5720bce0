import { ConfigurationError } from './errors'
import { Tableau } from './tableau'

export const TABLEAU_NAMES = [
  'euler',
  'midpoint',
  'heun',
  'ralston',
  'twoThirds',
  'kutta3',
  'rk4',
  'threeEighths',
] as const

export type TableauName = (typeof TABLEAU_NAMES)[number]

const PRESETS: Record<TableauName, { label: string; order: number; tableau: Tableau }> = {
  euler: {
    label: 'Explicit Euler',
    order: 1,
    tableau: new Tableau({ stages: 1, a: [[0]], b: [1] }),
  },
  midpoint: {
    label: 'Explicit midpoint',
    order: 2,
    tableau: new Tableau({ stages: 2, a: [[0, 0], [1 / 2, 0]], b: [0, 1] }),
  },
  heun: {
    label: 'Heun',
    order: 2,
    tableau: new Tableau({ stages: 2, a: [[0, 0], [1, 0]], b: [1 / 2, 1 / 2] }),
  },
  ralston: {
    label: 'Ralston',
    order: 2,
    tableau: new Tableau({ stages: 2, a: [[0, 0], [3 / 4, 0]], b: [1 / 3, 2 / 3] }),
  },
  // The two-stage scheme the bundled N-body scenarios were tuned with.
  twoThirds: {
    label: 'Two-stage (c2 = 2/3)',
    order: 2,
    tableau: new Tableau({ stages: 2, a: [[0, 0], [2 / 3, 0]], b: [1 / 4, 3 / 4] }),
  },
  kutta3: {
    label: "Kutta's third order",
    order: 3,
    tableau: new Tableau({
      stages: 3,
      a: [
        [0, 0, 0],
        [1 / 2, 0, 0],
        [-1, 2, 0],
      ],
      b: [1 / 6, 2 / 3, 1 / 6],
    }),
  },
  rk4: {
    label: 'Classic RK4',
    order: 4,
    tableau: new Tableau({
      stages: 4,
      a: [
        [0, 0, 0, 0],
        [1 / 2, 0, 0, 0],
        [0, 1 / 2, 0, 0],
        [0, 0, 1, 0],
      ],
      b: [1 / 6, 1 / 3, 1 / 3, 1 / 6],
    }),
  },
  threeEighths: {
    label: '3/8 rule',
    order: 4,
    tableau: new Tableau({
      stages: 4,
      a: [
        [0, 0, 0, 0],
        [1 / 3, 0, 0, 0],
        [-1 / 3, 1, 0, 0],
        [1, -1, 1, 0],
      ],
      b: [1 / 8, 3 / 8, 3 / 8, 1 / 8],
    }),
  },
}

export function isTableauName(name: string): name is TableauName {
  return TABLEAU_NAMES.some(preset => preset === name)
}

export function getTableau(name: string): Tableau {
  if (!isTableauName(name)) {
    throw new ConfigurationError(
      `Unknown method "${name}". Available: ${TABLEAU_NAMES.join(', ')}.`
    )
  }
  return PRESETS[name].tableau
}

export function describeTableau(name: TableauName): { label: string; order: number } {
  const { label, order } = PRESETS[name]
  return { label, order }
}
