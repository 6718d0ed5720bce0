/**
 * Raised while building a solver: malformed tableau, mismatched equation and
 * state lengths, or a step size / final instant the loop could never reach.
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'ConfigurationError'
  }
}

export type EvaluationContext = {
  equation: number
  stage: number
  t: number
}

/**
 * Raised when a derivative function throws or yields a non-finite value.
 * The run is aborted and no partial trajectory is returned.
 */
export class EvaluationError extends Error {
  readonly equation: number
  readonly stage: number
  readonly t: number

  constructor(message: string, context: EvaluationContext, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'EvaluationError'
    this.equation = context.equation
    this.stage = context.stage
    this.t = context.t
  }
}
