/**
 * NDArray and broadcasting tests.
 *
 * Covers shape inference from nested arrays, the NDArray container,
 * broadcastShapes and the element-wise broadcastMap.
 */

import { describe, it, expect } from 'vitest'
import {
  NDArray, inferShape, shapeSize, broadcastShapes, broadcastMap,
} from '../ideal/ndarray.ts'
import { BroadcastShapeError, formatShape } from '../ideal/errors.ts'

// ─── inferShape ──────────────────────────────────────────────────────────────

describe('inferShape', () => {
  it('scalar is 0-d', () => {
    expect(inferShape(3.5)).toEqual([])
  })

  it('empty array has one zero-length axis', () => {
    expect(inferShape([])).toEqual([0])
  })

  it('rectangular nesting', () => {
    expect(inferShape([1, 2, 3])).toEqual([3])
    expect(inferShape([[1, 2, 3], [4, 5, 6]])).toEqual([2, 3])
    expect(inferShape([[[1], [2]]])).toEqual([1, 2, 1])
  })

  it('ragged nesting → undefined', () => {
    expect(inferShape([[1, 2], [3]])).toBeUndefined()
    expect(inferShape([[1], 2])).toBeUndefined()
  })
})

// ─── NDArray ─────────────────────────────────────────────────────────────────

describe('NDArray', () => {
  it('fromNested stores row-major data', () => {
    const a = NDArray.fromNested([[1, 2, 3], [4, 5, 6]])
    expect(a.shape).toEqual([2, 3])
    expect(a.ndim).toBe(2)
    expect(a.size).toBe(6)
    expect(Array.from(a.data)).toEqual([1, 2, 3, 4, 5, 6])
    expect(a.get(1, 0)).toBe(4)
    expect(a.get(0, 2)).toBe(3)
  })

  it('toNested round-trips', () => {
    const nested = [[[1, 2]], [[3, 4]], [[5, 6]]]
    expect(NDArray.fromNested(nested).toNested()).toEqual(nested)
  })

  it('scalar is 0-d and unwraps to a number', () => {
    const s = NDArray.scalar(7)
    expect(s.shape).toEqual([])
    expect(s.size).toBe(1)
    expect(s.get()).toBe(7)
    expect(s.toNested()).toBe(7)
  })

  it('rejects data that does not fill the shape', () => {
    expect(() => new NDArray([2, 2], new Float64Array(3))).toThrow(RangeError)
    expect(() => new NDArray([-1], new Float64Array(0))).toThrow(RangeError)
  })

  it('rejects ragged nesting', () => {
    expect(() => NDArray.fromNested([[1, 2], [3]])).toThrow('Nested array is ragged')
  })

  it('get is bounds-checked', () => {
    const a = NDArray.fromNested([1, 2])
    expect(() => a.get(2)).toThrow(RangeError)
    expect(() => a.get(0, 0)).toThrow(RangeError)
  })

  it('keeps its own copy of the shape', () => {
    const shape = [2]
    const a = new NDArray(shape, Float64Array.of(1, 2))
    shape[0] = 5
    expect(a.shape).toEqual([2])
  })
})

// ─── broadcastShapes ─────────────────────────────────────────────────────────

describe('broadcastShapes', () => {
  it('scalars broadcast to 0-d', () => {
    expect(broadcastShapes([[], [], []])).toEqual([])
  })

  it('scalar stretches to the array shape', () => {
    expect(broadcastShapes([[2], [], []])).toEqual([2])
  })

  it('size-1 axes stretch, missing leading axes are added', () => {
    expect(broadcastShapes([[2, 1], [3]])).toEqual([2, 3])
    expect(broadcastShapes([[4, 1, 5], [3, 1]])).toEqual([4, 3, 5])
  })

  it('zero-length axis wins over 1', () => {
    expect(broadcastShapes([[0], [1]])).toEqual([0])
    expect(shapeSize([0, 3])).toBe(0)
  })

  it('mismatched axes throw BroadcastShapeError', () => {
    expect(() => broadcastShapes([[2], [3]])).toThrow(BroadcastShapeError)
    expect(() => broadcastShapes([[2], [3], []])).toThrow(
      'operands could not be broadcast together with shapes (2,) (3,) ()'
    )
  })

  it('shape error has kind "shape" and no argument', () => {
    try {
      broadcastShapes([[2, 3], [4]])
      expect.unreachable()
    } catch (err) {
      expect(err).toBeInstanceOf(BroadcastShapeError)
      expect(err).toMatchObject({ kind: 'shape', argument: undefined, shapes: [[2, 3], [4]] })
    }
  })
})

describe('formatShape', () => {
  it('tuple notation', () => {
    expect(formatShape([])).toBe('()')
    expect(formatShape([2])).toBe('(2,)')
    expect(formatShape([2, 3])).toBe('(2,3)')
  })
})

// ─── broadcastMap ────────────────────────────────────────────────────────────

describe('broadcastMap', () => {
  it('column × row → outer sum', () => {
    const col = NDArray.fromNested([[10], [20]])
    const row = NDArray.fromNested([1, 2, 3])
    const out = broadcastMap([col, row], ([a, b]) => a + b)
    expect(out.shape).toEqual([2, 3])
    expect(out.toNested()).toEqual([[11, 12, 13], [21, 22, 23]])
  })

  it('scalar operands give a 0-d result', () => {
    const out = broadcastMap([NDArray.scalar(2), NDArray.scalar(5)], ([a, b]) => a * b)
    expect(out.shape).toEqual([])
    expect(out.data[0]).toBe(10)
  })

  it('values arrive in operand order', () => {
    const out = broadcastMap(
      [NDArray.scalar(8), NDArray.fromNested([2, 4])],
      ([a, b]) => a / b
    )
    expect(Array.from(out.data)).toEqual([4, 2])
  })

  it('zero-size broadcast never calls fn', () => {
    let calls = 0
    const out = broadcastMap([NDArray.fromNested([]), NDArray.scalar(1)], () => {
      calls++
      return 0
    })
    expect(out.shape).toEqual([0])
    expect(calls).toBe(0)
  })
})
