/**
 * Ideal rocket nozzle relations — public API.
 *
 * Barrel export for the c* and C_f evaluators and the array and
 * validation helpers they share. Everything here is pure and synchronous.
 */

export { solveCstar, characteristicVelocity } from './cstar.ts'
export { solveCf, thrustCoefficient, momentumThrustCoefficient } from './thrust-coefficient.ts'
export { NDArray, inferShape, shapeSize, sameShape, broadcastShapes, broadcastMap } from './ndarray.ts'
export type { Shape, NestedNumbers } from './ndarray.ts'
export {
  NumericInputSchema, toNDArray, toResult, validateInputs, assertDomain,
  GAMMA, SPECIFIC_GAS_CONSTANT, STAGNATION_TEMPERATURE, AREA_RATIO, pressureRatio,
} from './validation.ts'
export type { NumericInput, NumericResult, DomainConstraint, CheckedArgument } from './validation.ts'
export { NozzleInputError, InputTypeError, InputDomainError, BroadcastShapeError, formatShape } from './errors.ts'
export type { NozzleInputErrorKind } from './errors.ts'
