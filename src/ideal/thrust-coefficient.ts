/**
 * Ideal thrust coefficient C_f = F / (p0 · A*) of a choked nozzle.
 *
 *   C_f = √( 2γ²/(γ-1) · (2/(γ+1))^((γ+1)/(γ-1)) · (1 - (pe/p0)^((γ-1)/γ)) )
 *         + (pe/p0 - pa/p0) · Ae/A*
 *
 * The square root is the momentum thrust; the second term is the pressure
 * thrust at the exit plane. The radicand is positive whenever pe/p0 < 1, so
 * in-domain inputs never give NaN. C_f can go negative for a strongly
 * over-expanded nozzle and is returned as is.
 *
 * This module is UI-independent.
 */

import { broadcastMap } from './ndarray.ts'
import {
  GAMMA, AREA_RATIO, pressureRatio,
  validateInputs, toResult,
} from './validation.ts'
import type { NumericInput, NumericResult } from './validation.ts'

const EXIT_PRESSURE_RATIO = pressureRatio('ratio_pe_p0')
const AMBIENT_PRESSURE_RATIO = pressureRatio('ratio_pa_p0')

/** Momentum part of C_f (fully expanded, no pressure thrust). */
export function momentumThrustCoefficient(gamma: number, ratio_pe_p0: number): number {
  const choke = Math.pow(2 / (gamma + 1), (gamma + 1) / (gamma - 1))
  const expansion = 1 - Math.pow(ratio_pe_p0, (gamma - 1) / gamma)
  return Math.sqrt((2 * gamma * gamma / (gamma - 1)) * choke * expansion)
}

/** Per-element kernel. Inputs must already be in domain. */
export function thrustCoefficient(
  gamma: number,
  ratio_pe_p0: number,
  ratio_pa_p0: number,
  ratio_Ae_Astar: number
): number {
  return momentumThrustCoefficient(gamma, ratio_pe_p0) + (ratio_pe_p0 - ratio_pa_p0) * ratio_Ae_Astar
}

/**
 * Thrust coefficient for scalars or broadcast-compatible arrays.
 *
 * @param gamma           Ratio of specific heats, 1 < γ < 1.8
 * @param ratio_pe_p0     Exit / stagnation pressure, in [0, 1)
 * @param ratio_pa_p0     Ambient / stagnation pressure, in [0, 1)
 * @param ratio_Ae_Astar  Exit / throat area, ≥ 1
 * @returns C_f (dimensionless); a number when every input is scalar
 * @throws InputTypeError, InputDomainError, BroadcastShapeError
 */
export function solveCf(gamma: number, ratio_pe_p0: number, ratio_pa_p0: number, ratio_Ae_Astar: number): number
export function solveCf(
  gamma: NumericInput,
  ratio_pe_p0: NumericInput,
  ratio_pa_p0: NumericInput,
  ratio_Ae_Astar: NumericInput
): NumericResult
export function solveCf(
  gamma: NumericInput,
  ratio_pe_p0: NumericInput,
  ratio_pa_p0: NumericInput,
  ratio_Ae_Astar: NumericInput
): NumericResult {
  const operands = validateInputs([
    { value: gamma, constraint: GAMMA },
    { value: ratio_pe_p0, constraint: EXIT_PRESSURE_RATIO },
    { value: ratio_pa_p0, constraint: AMBIENT_PRESSURE_RATIO },
    { value: ratio_Ae_Astar, constraint: AREA_RATIO },
  ])
  return toResult(broadcastMap(operands, ([g, pe, pa, ae]) => thrustCoefficient(g, pe, pa, ae)))
}
