import { describe, expect, it } from "vitest"
import { AppError } from "../../src/lib/errors.js"
import { cosineSimilarity } from "./similarity.js"

describe("cosineSimilarity", () => {
  it("is 1 for a vector with itself", () => {
    const v = [0.3, -1.2, 4.5, 0.01]
    expect(cosineSimilarity(v, v)).toBeCloseTo(1, 12)
  })

  it("is symmetric", () => {
    const pairs: Array<[number[], number[]]> = [
      [[1, 2, 3], [4, 5, 6]],
      [[0.5, -0.5], [-1, 0.25]],
      [[10, 0, 0.1], [0.2, 7, -3]],
    ]
    for (const [a, b] of pairs) {
      expect(cosineSimilarity(a, b)).toBe(cosineSimilarity(b, a))
    }
  })

  it("computes the exact ratio", () => {
    expect(cosineSimilarity([3, 4], [1, 0])).toBe(0.6)
    expect(cosineSimilarity([1, 0], [0, 1])).toBe(0)
    expect(cosineSimilarity([1, 0], [-2, 0])).toBe(-1)
  })

  it("returns 0 when either side is a zero vector", () => {
    expect(cosineSimilarity([0, 0, 0], [1, 2, 3])).toBe(0)
    expect(cosineSimilarity([1, 2, 3], [0, 0, 0])).toBe(0)
  })

  it("refuses vectors of different length", () => {
    expect(() => cosineSimilarity([1, 2], [1, 2, 3])).toThrow(AppError)
    expect(() => cosineSimilarity([1, 2], [1, 2, 3])).toThrow("Embedding dimensions differ (2 vs 3)")
  })
})
