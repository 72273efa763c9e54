import {
  adaptiveParameters,
  applyLanes,
  applySimd,
  laneLayout,
  lseAdd,
  pack,
  simdLayout,
  unpack,
  LseConfigError,
  SIMD_MODE,
} from '../index'
import type { LaneLayout } from '../index'

const LAYOUTS: Array<[number, number]> = [
  [24, 1],
  [12, 2],
  [6, 4],
]

/** Deterministic lane contents spread over the lane range. */
function laneSeries(laneWidth: number, laneCount: number, offset: number): number[] {
  const span = 2 ** laneWidth
  const lanes: number[] = []
  for (let i = 0; i < laneCount; i++) {
    lanes.push((offset + i * 0x2b7 + i * i * 13) % span)
  }
  return lanes
}

describe('laneLayout()', () => {
  test('24 bits into 6-bit lanes', () => {
    expect(laneLayout(24, 6)).toEqual({ totalWidth: 24, laneWidth: 6, laneCount: 4 })
  })

  test('[EDGE] lane width must divide the total width', () => {
    expect(() => laneLayout(24, 5)).toThrow(LseConfigError)
    expect(() => laneLayout(24, 5)).toThrow('Invalid laneWidth: 5. Must divide the total width 24.')
  })

  test('[EDGE] zero and negative widths are rejected', () => {
    expect(() => laneLayout(0, 6)).toThrow(LseConfigError)
    expect(() => laneLayout(24, 0)).toThrow(LseConfigError)
    expect(() => laneLayout(24, -6)).toThrow(LseConfigError)
  })
})

describe('simdLayout()', () => {
  test('modes map to 1×24, 2×12, 4×6', () => {
    expect(simdLayout(SIMD_MODE.FULL_24).laneCount).toBe(1)
    expect(simdLayout(SIMD_MODE.DUAL_12).laneCount).toBe(2)
    expect(simdLayout(SIMD_MODE.QUAD_6).laneCount).toBe(4)
  })

  test('[EDGE] reserved mode 0b11 is rejected', () => {
    expect(() => simdLayout(3)).toThrow('Invalid mode: 3.')
  })
})

describe('pack() / unpack()', () => {
  test('two 12-bit lanes → 0x200101', () => {
    expect(pack([0x101, 0x200], 12)).toBe(0x200101)
  })

  test('0x041044 → four 6-bit lanes', () => {
    expect(unpack(0x041044, 6, 4)).toEqual([0x04, 0x01, 0x01, 0x01])
  })

  test('lanes are truncated to the lane width', () => {
    expect(pack([0x1fff, 0x0], 12)).toBe(0xfff)
  })

  test('[EDGE] bits above the last lane are ignored', () => {
    expect(unpack(0x1fff, 12, 1)).toEqual([0xfff])
  })

  test('[EDGE] empty lane list packs to 0', () => {
    expect(pack([], 6)).toBe(0)
  })

  test.each(LAYOUTS)('round-trips %i-bit × %i lanes', (laneWidth, laneCount) => {
    for (let offset = 0; offset < 2 ** laneWidth; offset += Math.max(1, 2 ** (laneWidth - 5))) {
      const lanes = laneSeries(laneWidth, laneCount, offset)
      expect(unpack(pack(lanes, laneWidth), laneWidth, laneCount)).toEqual(lanes)
    }
  })

  test('round-trips 32-bit lanes without sign issues', () => {
    const lanes = [0xffffffff, 0x80000000]
    expect(unpack(pack([0xffffffff], 32), 32, 1)).toEqual([0xffffffff])
    expect(() => pack(lanes, 32)).toThrow(LseConfigError) // 64 bits exceeds the word limit
  })

  test('[EDGE] negative lane is rejected', () => {
    expect(() => pack([1, -1], 12)).toThrow('Invalid lanes[1]: -1.')
  })
})

describe('applySimd()', () => {
  test('mode 0: 24-bit word', () => {
    expect(applySimd(0x100050, 0x100050, SIMD_MODE.FULL_24)).toBe(0x100053)
  })

  test('mode 1: two 12-bit lanes', () => {
    // lane0: 0x100 ⊕ 0x050 → 0x101; lane1: diff == -256 → 0x200
    expect(applySimd(0x200100, 0x100050, SIMD_MODE.DUAL_12)).toBe(0x200101)
  })

  test('mode 2: four 6-bit lanes have no correction quantum', () => {
    expect(applySimd(0x041044, 0x041044, SIMD_MODE.QUAD_6)).toBe(0x041044)
  })

  test('sentinel in one lane does not leak into its neighbour', () => {
    const a = pack([0x100, 0x800], 12)
    const b = pack([0x050, 0x200], 12)
    expect(applySimd(a, b, SIMD_MODE.DUAL_12)).toBe(0x200101)
  })

  test('saturation in one lane does not carry into the next', () => {
    const a = pack([0xfff, 0x000], 12)
    const b = pack([0xfff, 0x000], 12)
    expect(unpack(applySimd(a, b, SIMD_MODE.DUAL_12), 12, 2)).toEqual([0xfff, 0x001])
  })
})

describe('lane independence', () => {
  test.each(LAYOUTS)('%i-bit × %i: mutating one lane leaves the others', (laneWidth, laneCount) => {
    const layout: LaneLayout = laneLayout(laneWidth * laneCount, laneWidth)
    const lanesA = laneSeries(laneWidth, laneCount, 11)
    const lanesB = laneSeries(laneWidth, laneCount, 5)
    const wordB = pack(lanesB, laneWidth)
    const baseline = unpack(applyLanes(pack(lanesA, laneWidth), wordB, layout), laneWidth, laneCount)
    const maxVal = 2 ** laneWidth - 1

    for (let target = 0; target < laneCount; target++) {
      for (const replacement of [0, 1, 2 ** (laneWidth - 1), maxVal]) {
        const mutated = lanesA.slice()
        mutated[target] = replacement
        const result = unpack(applyLanes(pack(mutated, laneWidth), wordB, layout), laneWidth, laneCount)
        for (let other = 0; other < laneCount; other++) {
          if (other !== target) expect(result[other]).toBe(baseline[other])
        }
      }
    }
  })

  test.each(LAYOUTS)('%i-bit × %i: lane order does not matter', (laneWidth, laneCount) => {
    const layout = laneLayout(laneWidth * laneCount, laneWidth)
    const params = adaptiveParameters(laneWidth)
    const lanesA = laneSeries(laneWidth, laneCount, 3)
    const lanesB = laneSeries(laneWidth, laneCount, 40)

    const reversed: number[] = new Array<number>(laneCount)
    for (let i = laneCount - 1; i >= 0; i--) {
      reversed[i] = lseAdd(lanesA[i], lanesB[i], params)
    }

    expect(applyLanes(pack(lanesA, laneWidth), pack(lanesB, laneWidth), layout)).toBe(pack(reversed, laneWidth))
  })
})
