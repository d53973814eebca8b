/**
 * Input errors raised by the nozzle relations.
 *
 * Every failure is synchronous and aborts the whole call. Callers switch on
 * `kind` (or use instanceof) and read `argument` to build diagnostics.
 */

export type NozzleInputErrorKind = 'type' | 'domain' | 'shape'

export class NozzleInputError extends Error {
  readonly kind: NozzleInputErrorKind
  /** Name of the offending argument, when a single one is to blame. */
  readonly argument: string | undefined

  constructor(kind: NozzleInputErrorKind, message: string, argument?: string) {
    super(message)
    this.kind = kind
    this.argument = argument
    this.name = 'NozzleInputError'
  }
}

/** An element is not a number, or nesting is ragged. */
export class InputTypeError extends NozzleInputError {
  constructor(argument: string, message: string = `${argument} must be numeric`) {
    super('type', message, argument)
    this.name = 'InputTypeError'
  }
}

/** An element lies outside its physical domain. */
export class InputDomainError extends NozzleInputError {
  constructor(argument: string, message: string) {
    super('domain', message, argument)
    this.name = 'InputDomainError'
  }
}

export class BroadcastShapeError extends NozzleInputError {
  readonly shapes: readonly (readonly number[])[]

  constructor(shapes: readonly (readonly number[])[]) {
    super('shape', `operands could not be broadcast together with shapes ${shapes.map(formatShape).join(' ')}`)
    this.shapes = shapes
    this.name = 'BroadcastShapeError'
  }
}

/**
 * Tuple notation for a shape: [] → "()", [2] → "(2,)", [2, 3] → "(2,3)"
 */
export function formatShape(shape: readonly number[]): string {
  if (shape.length === 1) return `(${shape[0]},)`
  return `(${shape.join(',')})`
}
