/**
 * Boundary validation for the nozzle relations.
 *
 * Inputs are parsed once into NDArrays (zod schema), then checked against
 * their physical domains in a fixed order. Nothing is computed until every
 * check has passed.
 */

import { z } from 'zod'
import { NDArray, inferShape } from './ndarray.ts'
import type { NestedNumbers } from './ndarray.ts'
import { InputDomainError, InputTypeError } from './errors.ts'

// ─── Numeric inputs ──────────────────────────────────────────────────────────

export type NumericInput = NestedNumbers | NDArray
export type NumericResult = number | NDArray

const NestedNumbersSchema: z.ZodType<NestedNumbers> = z.lazy(() =>
  z.union([z.number(), z.array(NestedNumbersSchema)])
)

/** Scalar, nested array or NDArray. NaN, booleans and strings are rejected. */
export const NumericInputSchema = z.union([z.instanceof(NDArray), NestedNumbersSchema])

/**
 * Parse one argument into an NDArray.
 * Throws InputTypeError naming `argument` on any non-numeric element.
 */
export function toNDArray(argument: string, value: unknown): NDArray {
  const parsed = NumericInputSchema.safeParse(value)
  if (!parsed.success) throw new InputTypeError(argument)

  const input = parsed.data
  if (input instanceof NDArray) {
    if (input.data.some(Number.isNaN)) throw new InputTypeError(argument)
    return input
  }
  if (inferShape(input) === undefined) {
    throw new InputTypeError(argument, `${argument} must be a rectangular numeric array`)
  }
  return NDArray.fromNested(input)
}

// ─── Domain constraints ──────────────────────────────────────────────────────

export interface DomainConstraint {
  argument: string
  message: string
  holds: (x: number) => boolean
}

export const GAMMA: DomainConstraint = {
  argument: 'gamma',
  message: 'gamma must be > 1 and < 1.8',
  holds: x => x > 1 && x < 1.8,
}

export const SPECIFIC_GAS_CONSTANT: DomainConstraint = {
  argument: 'Rs',
  message: 'Specific gas constant must be > 0',
  holds: x => x > 0,
}

export const STAGNATION_TEMPERATURE: DomainConstraint = {
  argument: 'T0',
  message: 'Stagnation temperature must be > 0',
  holds: x => x > 0,
}

/** Static pressure over stagnation pressure, in [0, 1). */
export function pressureRatio(argument: string): DomainConstraint {
  return {
    argument,
    message: `${argument} must be in [0, 1)`,
    holds: x => x >= 0 && x < 1,
  }
}

export const AREA_RATIO: DomainConstraint = {
  argument: 'ratio_Ae_Astar',
  message: 'ratio_Ae_Astar must be >= 1',
  holds: x => x >= 1,
}

/** Whole-array check: the first violating element aborts. */
export function assertDomain(values: NDArray, constraint: DomainConstraint): void {
  for (const x of values.data) {
    if (!constraint.holds(x)) throw new InputDomainError(constraint.argument, constraint.message)
  }
}

export interface CheckedArgument {
  value: unknown
  constraint: DomainConstraint
}

/**
 * Type-check every argument in order, then apply each argument's domain
 * constraint in the same order. Returns the parsed arrays.
 */
export function validateInputs(args: readonly CheckedArgument[]): NDArray[] {
  const arrays = args.map(arg => toNDArray(arg.constraint.argument, arg.value))
  args.forEach((arg, i) => assertDomain(arrays[i], arg.constraint))
  return arrays
}

/** 0-d results come back as plain numbers. */
export function toResult(values: NDArray): NumericResult {
  return values.ndim === 0 ? values.data[0] : values
}
