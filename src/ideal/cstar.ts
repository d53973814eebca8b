/**
 * Characteristic velocity c* of an ideal, choked rocket nozzle.
 *
 *   c* = √( (1/γ) · ((γ+1)/2)^((γ+1)/(γ-1)) · Rs · T0 )
 *
 * Depends only on the gas (γ, Rs) and chamber temperature, not on nozzle
 * geometry. SI inputs give m/s.
 *
 * This module is UI-independent.
 */

import { broadcastMap } from './ndarray.ts'
import {
  GAMMA, SPECIFIC_GAS_CONSTANT, STAGNATION_TEMPERATURE,
  validateInputs, toResult,
} from './validation.ts'
import type { NumericInput, NumericResult } from './validation.ts'

/** Per-element kernel. Inputs must already be in domain. */
export function characteristicVelocity(gamma: number, Rs: number, T0: number): number {
  const exponent = (gamma + 1) / (gamma - 1)
  return Math.sqrt((1 / gamma) * Math.pow((gamma + 1) / 2, exponent) * Rs * T0)
}

/**
 * Characteristic velocity for scalars or broadcast-compatible arrays.
 *
 * @param gamma  Ratio of specific heats, 1 < γ < 1.8
 * @param Rs     Specific gas constant [J/(kg·K)], > 0
 * @param T0     Stagnation temperature [K], > 0
 * @returns c* [m/s]; a number when every input is scalar
 * @throws InputTypeError, InputDomainError, BroadcastShapeError
 */
export function solveCstar(gamma: number, Rs: number, T0: number): number
export function solveCstar(gamma: NumericInput, Rs: NumericInput, T0: NumericInput): NumericResult
export function solveCstar(gamma: NumericInput, Rs: NumericInput, T0: NumericInput): NumericResult {
  const operands = validateInputs([
    { value: gamma, constraint: GAMMA },
    { value: Rs, constraint: SPECIFIC_GAS_CONSTANT },
    { value: T0, constraint: STAGNATION_TEMPERATURE },
  ])
  return toResult(broadcastMap(operands, ([g, r, t]) => characteristicVelocity(g, r, t)))
}
