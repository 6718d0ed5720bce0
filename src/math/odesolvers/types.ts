/**
 * dy_i/dt for one component of the system, given the instant and the whole
 * state vector.
 */
export type Derivative = (t: number, y: readonly number[]) => number

export type EquationVector = readonly Derivative[]

export type TrajectoryRecord = {
  t: number
  y: number[]
}

export type Trajectory = TrajectoryRecord[]

export type StepProgress = {
  step: number
  maxSteps: number
  t: number
}
