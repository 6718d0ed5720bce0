import { compile } from 'mathjs'
import type { EvalFunction } from 'mathjs'

import { ConfigurationError } from './errors'
import type { Derivative, EquationVector } from './types'

export interface Equation {
  variable: string
  expression: string
}

export interface Parameter {
  name: string
  value: number
}

const IDENTIFIER_REGEX = /^[a-zA-Z_][a-zA-Z0-9_]*$/
const TIME_SYMBOL = 't'

function checkNames(equations: Equation[], parameters: Parameter[]) {
  const seen = new Set<string>()
  const names = [
    ...equations.map(eq => ({ kind: 'Variable', name: eq.variable.trim() })),
    ...parameters.map(param => ({ kind: 'Parameter', name: param.name.trim() })),
  ]
  for (const { kind, name } of names) {
    if (!IDENTIFIER_REGEX.test(name)) {
      throw new ConfigurationError(`${kind} name "${name}" is not a valid identifier.`)
    }
    if (name === TIME_SYMBOL) {
      throw new ConfigurationError(`"${TIME_SYMBOL}" is reserved for the independent variable.`)
    }
    if (seen.has(name)) {
      throw new ConfigurationError(`Duplicate name "${name}".`)
    }
    seen.add(name)
  }
  for (const param of parameters) {
    if (!Number.isFinite(param.value)) {
      throw new ConfigurationError(`Parameter ${param.name} must be a finite number.`)
    }
  }
}

/**
 * Builds an equation vector from textual right-hand sides such as
 * `sigma * (y - x)`. Each expression sees `t`, every variable (bound to the
 * matching state component) and every parameter.
 */
export function compileEquations(equations: Equation[], parameters: Parameter[] = []): EquationVector {
  if (equations.length === 0) {
    throw new ConfigurationError('At least one equation is required.')
  }
  checkNames(equations, parameters)

  const variables = equations.map(eq => eq.variable.trim())
  const baseScope: Record<string, number> = { [TIME_SYMBOL]: 0 }
  parameters.forEach(param => {
    baseScope[param.name.trim()] = param.value
  })

  const compiled: EvalFunction[] = equations.map(eq => {
    if (!eq.expression.trim()) {
      throw new ConfigurationError(`Equation for ${eq.variable} is empty.`)
    }
    try {
      return compile(eq.expression)
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err)
      throw new ConfigurationError(`Cannot parse d${eq.variable}/dt = ${eq.expression}: ${reason}`)
    }
  })

  // Probe once so that unknown symbols fail at build time rather than mid-run.
  const probe: Record<string, number> = { ...baseScope }
  variables.forEach(name => {
    probe[name] = 0
  })
  compiled.forEach((fn, i) => {
    try {
      fn.evaluate({ ...probe })
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err)
      throw new ConfigurationError(`Cannot evaluate d${variables[i]}/dt = ${equations[i].expression}: ${reason}`)
    }
  })

  return compiled.map((fn, i): Derivative => (t, y) => {
    const scope: Record<string, number> = { ...baseScope, [TIME_SYMBOL]: t }
    variables.forEach((name, j) => {
      scope[name] = y[j]
    })
    const value: unknown = fn.evaluate(scope)
    if (typeof value !== 'number') {
      throw new Error(`d${variables[i]}/dt = ${equations[i].expression} did not evaluate to a real number.`)
    }
    return value
  })
}
