import { describe, expect, it } from 'vitest'
import { CategoryAccumulator } from '../accumulate/categoryAccumulator'
import { CategoryMismatchError, InvalidBoxError, ResolutionMismatchError } from '../errors'
import { createBoxRecord, type BoxRecord } from '../schema/boxRecord'

function box(
  xMin: number,
  yMin: number,
  xMax: number,
  yMax: number,
  extra: { category?: string; layoutId?: string } = {}
): BoxRecord {
  return createBoxRecord({
    category: extra.category ?? 'title',
    xMin,
    yMin,
    xMax,
    yMax,
    canvasWidth: 100,
    canvasHeight: 100,
    layoutId: extra.layoutId,
  })
}

describe('CategoryAccumulator', () => {
  it('adds areal weights and counts samples and layouts', () => {
    const acc = new CategoryAccumulator('title', 2, 2)
    acc.absorb(box(0, 0, 50, 50, { layoutId: 'p1' }))
    acc.absorb(box(0, 0, 100, 50, { layoutId: 'p1' }))
    acc.absorb(box(50, 50, 100, 100, { layoutId: 'p2' }))

    const grid = acc.finalize()
    expect(grid.cells).toEqual([1.5, 0.5, 0, 1])
    expect(grid.sampleCount).toBe(3)
    expect(grid.layoutCount).toBe(2)
    expect(acc.layouts()).toEqual(['p1', 'p2'])
  })

  it('rejects boxes of another category', () => {
    const acc = new CategoryAccumulator('title', 2, 2)
    expect(() => acc.absorb(box(0, 0, 50, 50, { category: 'date' }))).toThrow(CategoryMismatchError)
  })

  it('leaves the grid untouched when a box fails to map', () => {
    const acc = new CategoryAccumulator('title', 2, 2)
    expect(() => acc.absorb(box(150, 150, 200, 200))).toThrow(InvalidBoxError)
    expect(acc.sampleCount).toBe(0)
    expect(acc.finalize().cells).toEqual([0, 0, 0, 0])
  })

  it('returns a snapshot that later absorbs do not change', () => {
    const acc = new CategoryAccumulator('title', 2, 2)
    acc.absorb(box(0, 0, 50, 50))
    const before = acc.finalize()
    acc.absorb(box(0, 0, 50, 50))
    expect(before.cells).toEqual([1, 0, 0, 0])
    expect(acc.finalize().cells).toEqual([2, 0, 0, 0])
  })

  it('gives the same grid for any absorption order', () => {
    const boxes = [box(5, 10, 70, 35), box(30, 40, 95, 90), box(12, 60, 48, 99), box(0, 0, 33, 33)]
    const forward = new CategoryAccumulator('title', 7, 5)
    const shuffled = new CategoryAccumulator('title', 7, 5)
    for (const b of boxes) forward.absorb(b)
    for (const i of [2, 0, 3, 1]) shuffled.absorb(boxes[i] as BoxRecord)

    const a = forward.finalize().cells
    const b = shuffled.finalize().cells
    a.forEach((value, i) => expect(b[i]).toBeCloseTo(value, 12))
  })

  it('merges another accumulator cell by cell', () => {
    const left = new CategoryAccumulator('title', 2, 2)
    const right = new CategoryAccumulator('title', 2, 2)
    left.absorb(box(0, 0, 50, 50, { layoutId: 'p1' }))
    right.absorb(box(50, 0, 100, 50, { layoutId: 'p1' }))
    right.absorb(box(50, 50, 100, 100, { layoutId: 'p2' }))

    left.merge(right)
    const grid = left.finalize()
    expect(grid.cells).toEqual([1, 1, 0, 1])
    expect(grid.sampleCount).toBe(3)
    expect(grid.layoutCount).toBe(2)
  })

  it('refuses to merge grids of different resolution', () => {
    const left = new CategoryAccumulator('title', 2, 2)
    const right = new CategoryAccumulator('title', 3, 3)
    expect(() => left.merge(right)).toThrow(ResolutionMismatchError)
  })
})
