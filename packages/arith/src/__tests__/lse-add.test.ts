// =============================================================================
// LSE-PE - Adaptive LSE Adder Tests
// =============================================================================

import {
  adaptiveParameters,
  decodeCode,
  encodeValue,
  lseAdd,
  lseAddAdaptive,
  lseAddTraced,
  lseReduce,
  asFixedPointCode,
  ERROR,
  LseConfigError,
} from '../index'

const WIDTHS = [1, 2, 4, 6, 8, 12, 16, 24, 32]

describe('adaptiveParameters()', () => {
  test('12-bit constants', () => {
    expect(adaptiveParameters(12)).toEqual({
      width: 12,
      smallCorrection: 1,
      diffThreshold: -256,
      maxVal: 0xfff,
      negInf: 0x800,
    })
  })

  test('24-bit constants', () => {
    const p = adaptiveParameters(24)
    expect(p.smallCorrection).toBe(3)
    expect(p.diffThreshold).toBe(-(1 << 20))
    expect(p.maxVal).toBe(0xffffff)
    expect(p.negInf).toBe(0x800000)
  })

  test('6-bit constants have no correction quantum', () => {
    const p = adaptiveParameters(6)
    expect(p.smallCorrection).toBe(0)
    expect(p.diffThreshold).toBe(-4)
    expect(p.negInf).toBe(0x20)
  })

  test('[EDGE] threshold is fractional below 4 bits', () => {
    expect(adaptiveParameters(2).diffThreshold).toBe(-0.25)
  })

  test('32-bit codes stay unsigned', () => {
    const p = adaptiveParameters(32)
    expect(p.maxVal).toBe(0xffffffff)
    expect(p.negInf).toBe(0x80000000)
  })

  test.each([0, -3, 33, 1.5, NaN])('rejects width %p', (width) => {
    expect(() => adaptiveParameters(width)).toThrow(LseConfigError)
    try {
      adaptiveParameters(width)
    } catch (err) {
      expect(err).toBeInstanceOf(LseConfigError)
      if (err instanceof LseConfigError) {
        expect(err.code).toBe(ERROR.INVALID_CONFIGURATION)
        expect(err.parameter).toBe('width')
      }
    }
  })

  test('parameters are frozen', () => {
    expect(Object.isFrozen(adaptiveParameters(8))).toBe(true)
  })
})

describe('lseAdd()', () => {
  test('0x100 ⊕ 0x050 at 12 bits → 0x101', () => {
    const trace = lseAddTraced(0x100, 0x050, adaptiveParameters(12))
    expect(trace).toEqual({ result: 0x101, branch: 'correct', diff: -0xb0 })
    expect(lseAddAdaptive(0x100, 0x050, 12)).toBe(0x101)
  })

  describe('sentinel identity', () => {
    test.each(WIDTHS)('width %i', (width) => {
      const p = adaptiveParameters(width)
      expect(lseAdd(p.negInf, p.negInf, p)).toBe(p.negInf)

      const candidates = [0, 1, p.negInf - 1, p.negInf + 1, p.maxVal]
        .filter((x) => x !== p.negInf && x >= 0 && x <= p.maxVal)
      for (const x of candidates) {
        expect(lseAdd(p.negInf, x, p)).toBe(x)
        expect(lseAdd(x, p.negInf, p)).toBe(x)
        expect(lseAddTraced(x, p.negInf, p).branch).toBe('identity')
      }
    })
  })

  test('commutative over every 6-bit pair', () => {
    const p = adaptiveParameters(6)
    for (let a = 0; a <= p.maxVal; a++) {
      for (let b = 0; b <= p.maxVal; b++) {
        expect(lseAdd(a, b, p)).toBe(lseAdd(b, a, p))
      }
    }
  })

  test('commutative across a 12-bit grid', () => {
    const p = adaptiveParameters(12)
    for (let a = 0; a <= p.maxVal; a += 61) {
      for (let b = 0; b <= p.maxVal; b += 97) {
        expect(lseAdd(a, b, p)).toBe(lseAdd(b, a, p))
      }
    }
  })

  describe('saturation', () => {
    test('0xFFF ⊕ 0x001 at 12 bits does not wrap', () => {
      expect(lseAddAdaptive(0xfff, 0x001, 12)).toBe(0xfff)
    })

    test('0xFFF ⊕ 0xFFF saturates at 12 bits', () => {
      expect(lseAddTraced(0xfff, 0xfff, adaptiveParameters(12))).toEqual({
        result: 0xfff,
        branch: 'saturate',
        diff: 0,
      })
    })

    test('24-bit operands above MAX_VAL - SMALL_CORRECTION saturate', () => {
      const trace = lseAddTraced(0xfffffe, 0xfffffd, adaptiveParameters(24))
      expect(trace.branch).toBe('saturate')
      expect(trace.result).toBe(0xffffff)
    })

    test('[EDGE] larger == MAX_VAL - SMALL_CORRECTION still corrects', () => {
      const trace = lseAddTraced(0xfffffc, 0xfffffc, adaptiveParameters(24))
      expect(trace.branch).toBe('correct')
      expect(trace.result).toBe(0xffffff)
    })

    test('32-bit saturation', () => {
      expect(lseAddAdaptive(0xffffffff, 0xffffffff, 32)).toBe(0xffffffff)
      expect(lseAddAdaptive(0x10, 0x10, 32)).toBe(0x14)
    })
  })

  describe('threshold edge', () => {
    test('6 bits: diff == -4 passes through, diff == -3 corrects', () => {
      const p = adaptiveParameters(6)
      expect(lseAddTraced(10, 6, p)).toEqual({ result: 10, branch: 'passthrough', diff: -4 })
      expect(lseAddTraced(10, 7, p)).toEqual({ result: 10, branch: 'correct', diff: -3 })
    })

    test('12 bits: diff == -256 passes through, diff == -255 corrects', () => {
      expect(lseAddAdaptive(0x100, 0x001, 12)).toBe(0x101)
      expect(lseAddAdaptive(0x101, 0x001, 12)).toBe(0x101)
      expect(lseAddTraced(0x101, 0x001, adaptiveParameters(12)).branch).toBe('passthrough')
    })

    test('[EDGE] 2 bits: only equal operands correct', () => {
      const p = adaptiveParameters(2)
      expect(lseAddTraced(1, 1, p).branch).toBe('correct')
      expect(lseAddTraced(3, 1, p).branch).toBe('passthrough')
    })
  })

  test('operands are truncated to the operand width', () => {
    expect(lseAddAdaptive(0x1100, 0x050, 12)).toBe(0x101)
  })

  test.each([-1, 1.5, Number.POSITIVE_INFINITY])('rejects operand %p', (bad) => {
    expect(() => lseAddAdaptive(bad, 0, 12)).toThrow(/Invalid a/)
    try {
      lseAddAdaptive(0, bad, 12)
    } catch (err) {
      expect(err instanceof LseConfigError && err.code).toBe(ERROR.INVALID_OPERAND)
    }
  })
})

describe('decodeCode() / encodeValue()', () => {
  const p = adaptiveParameters(12)

  test('sentinel decodes to neg-inf', () => {
    expect(decodeCode(0x800, p)).toEqual({ kind: 'neg-inf' })
    expect(encodeValue({ kind: 'neg-inf' }, p)).toBe(0x800)
  })

  test('finite codes keep their bit pattern', () => {
    expect(decodeCode(0x123, p)).toEqual({ kind: 'finite', code: 0x123 })
    expect(encodeValue({ kind: 'finite', code: asFixedPointCode(0x123) }, p)).toBe(0x123)
  })
})

describe('lseReduce()', () => {
  const p = adaptiveParameters(12)

  test('empty sequence is -inf', () => {
    expect(lseReduce([], p)).toBe(0x800)
  })

  test('single operand is returned unchanged', () => {
    expect(lseReduce([0x100], p)).toBe(0x100)
  })

  test('accumulates left to right', () => {
    expect(lseReduce([0x100, 0x050], p)).toBe(0x101)
    expect(lseReduce([0x100, 0x100, 0x100], p)).toBe(0x102)
  })

  test('sentinels inside the sequence are skipped', () => {
    expect(lseReduce([0x800, 0x100, 0x800], p)).toBe(0x100)
  })
})
