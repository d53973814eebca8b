/**
 * NDArray — minimal row-major Float64 array with broadcasting.
 *
 * Only what the nozzle relations need: shape inference from nested JS
 * arrays, the usual broadcasting rules (trailing dimensions aligned,
 * size-1 dimensions stretched) and an element-wise map.
 *
 * This module is UI-independent.
 */

import { BroadcastShapeError } from './errors.ts'

// ─── Types ───────────────────────────────────────────────────────────────────

export type Shape = readonly number[]

/** Plain scalar or (rectangular) nested array of scalars. */
export type NestedNumbers = number | readonly NestedNumbers[]

// ─── Shape helpers ───────────────────────────────────────────────────────────

export function shapeSize(shape: Shape): number {
  let size = 1
  for (const dim of shape) size *= dim
  return size
}

export function sameShape(a: Shape, b: Shape): boolean {
  if (a.length !== b.length) return false
  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) return false
  }
  return true
}

/**
 * Shape of a nested array, or undefined when sibling sub-arrays disagree.
 * A bare number is 0-d; an empty array has shape [0].
 */
export function inferShape(value: NestedNumbers): Shape | undefined {
  if (typeof value === 'number') return []
  if (value.length === 0) return [0]

  const inner = inferShape(value[0])
  if (inner === undefined) return undefined
  for (let i = 1; i < value.length; i++) {
    const sibling = inferShape(value[i])
    if (sibling === undefined || !sameShape(sibling, inner)) return undefined
  }
  return [value.length, ...inner]
}

function flattenInto(value: NestedNumbers, out: number[]): void {
  if (typeof value === 'number') {
    out.push(value)
    return
  }
  for (const item of value) flattenInto(item, out)
}

// ─── NDArray ─────────────────────────────────────────────────────────────────

export class NDArray {
  readonly shape: Shape
  readonly data: Float64Array

  constructor(shape: Shape, data: Float64Array) {
    for (const dim of shape) {
      if (!Number.isInteger(dim) || dim < 0) {
        throw new RangeError(`Invalid dimension ${dim} in shape [${shape.join(', ')}]`)
      }
    }
    if (shapeSize(shape) !== data.length) {
      throw new RangeError(`Shape [${shape.join(', ')}] does not match ${data.length} elements`)
    }
    this.shape = [...shape]
    this.data = data
  }

  static scalar(value: number): NDArray {
    return new NDArray([], Float64Array.of(value))
  }

  static fromNested(value: NestedNumbers): NDArray {
    const shape = inferShape(value)
    if (shape === undefined) throw new RangeError('Nested array is ragged')
    const flat: number[] = []
    flattenInto(value, flat)
    return new NDArray(shape, Float64Array.from(flat))
  }

  get size(): number {
    return this.data.length
  }

  get ndim(): number {
    return this.shape.length
  }

  /** Element at a full multi-index (row-major). */
  get(...index: number[]): number {
    if (index.length !== this.shape.length) {
      throw new RangeError(`Expected ${this.shape.length} indices, got ${index.length}`)
    }
    let offset = 0
    for (let d = 0; d < index.length; d++) {
      const i = index[d]
      const dim = this.shape[d]
      if (!Number.isInteger(i) || i < 0 || i >= dim) {
        throw new RangeError(`Index ${i} out of bounds for axis ${d} with size ${dim}`)
      }
      offset = offset * dim + i
    }
    return this.data[offset]
  }

  /** Back to plain JS: a number for 0-d, nested arrays otherwise. */
  toNested(): NestedNumbers {
    if (this.shape.length === 0) return this.data[0]
    return nest(this.data, this.shape, 0, 0)
  }
}

function nest(data: Float64Array, shape: Shape, axis: number, offset: number): NestedNumbers[] {
  const dim = shape[axis]
  const out: NestedNumbers[] = []
  if (axis === shape.length - 1) {
    for (let i = 0; i < dim; i++) out.push(data[offset + i])
    return out
  }
  const stride = shapeSize(shape.slice(axis + 1))
  for (let i = 0; i < dim; i++) out.push(nest(data, shape, axis + 1, offset + i * stride))
  return out
}

// ─── Broadcasting ────────────────────────────────────────────────────────────

/**
 * Common shape of all operands.
 * Dimensions are compared right to left; each must be equal or 1.
 */
export function broadcastShapes(shapes: readonly Shape[]): Shape {
  let ndim = 0
  for (const s of shapes) ndim = Math.max(ndim, s.length)

  const out: number[] = new Array<number>(ndim).fill(1)
  for (let d = 0; d < ndim; d++) {
    let target = 1
    for (const s of shapes) {
      const j = d - (ndim - s.length)
      if (j < 0) continue
      const dim = s[j]
      if (dim === 1 || dim === target) continue
      if (target !== 1) throw new BroadcastShapeError(shapes)
      target = dim
    }
    out[d] = target
  }
  return out
}

/**
 * Per-axis strides of `shape` read against the broadcast shape `target`.
 * Stretched and missing axes get stride 0.
 */
function broadcastStrides(shape: Shape, target: Shape): number[] {
  const strides = new Array<number>(target.length).fill(0)
  let stride = 1
  for (let j = shape.length - 1; j >= 0; j--) {
    const d = j + (target.length - shape.length)
    strides[d] = shape[j] === 1 ? 0 : stride
    stride *= shape[j]
  }
  return strides
}

/**
 * Evaluate `fn` element-wise over the broadcast of all operands.
 * `fn` receives one value per operand, in operand order.
 */
export function broadcastMap(
  operands: readonly NDArray[],
  fn: (values: readonly number[]) => number
): NDArray {
  const shape = broadcastShapes(operands.map(op => op.shape))
  const strides = operands.map(op => broadcastStrides(op.shape, shape))
  const size = shapeSize(shape)
  const out = new Float64Array(size)
  const values = new Array<number>(operands.length).fill(0)

  for (let i = 0; i < size; i++) {
    let rem = i
    const offsets = new Array<number>(operands.length).fill(0)
    for (let d = shape.length - 1; d >= 0; d--) {
      const coord = rem % shape[d]
      rem = (rem - coord) / shape[d]
      for (let k = 0; k < operands.length; k++) offsets[k] += coord * strides[k][d]
    }
    for (let k = 0; k < operands.length; k++) values[k] = operands[k].data[offsets[k]]
    out[i] = fn(values)
  }

  return new NDArray(shape, out)
}
