export { ConfigurationError, EvaluationError } from './errors'
export type { EvaluationContext } from './errors'
export { compileEquations } from './expressions'
export type { Equation, Parameter } from './expressions'
export { Integrator, TIME_ROUNDING_DECIMALS, countSteps } from './integrator'
export type { IntegratorOptions } from './integrator'
export { StageEvaluator } from './stages'
export { StepAdvancer } from './step'
export { Tableau } from './tableau'
export type { TableauSpec } from './tableau'
export { TABLEAU_NAMES, describeTableau, getTableau, isTableauName } from './tableaus'
export type { TableauName } from './tableaus'
export type { Derivative, EquationVector, StepProgress, Trajectory, TrajectoryRecord } from './types'
