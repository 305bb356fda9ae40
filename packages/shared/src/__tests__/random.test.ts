import { describe, expect, it } from "vitest"

import { createSeededRandom, pickOne, randomInt, shuffle, type RandomSource } from "../random/index.js"

function sequence(random: RandomSource, n: number): number[] {
  return Array.from({ length: n }, () => random.next())
}

describe("createSeededRandom", () => {
  it("replays the same sequence for the same seed", () => {
    expect(sequence(createSeededRandom(42), 20)).toEqual(sequence(createSeededRandom(42), 20))
  })

  it("diverges for different seeds", () => {
    expect(sequence(createSeededRandom(1), 5)).not.toEqual(sequence(createSeededRandom(2), 5))
  })

  it("stays within [0, 1)", () => {
    for (const value of sequence(createSeededRandom(7), 1000)) {
      expect(value).toBeGreaterThanOrEqual(0)
      expect(value).toBeLessThan(1)
    }
  })
})

describe("randomInt", () => {
  it("covers every value of the range and nothing outside it", () => {
    const random = createSeededRandom(3)
    const seen = new Set<number>()
    for (let i = 0; i < 500; i++) seen.add(randomInt(random, 4))
    expect([...seen].sort()).toEqual([0, 1, 2, 3])
  })
})

describe("pickOne", () => {
  it("uses the source to index into the list", () => {
    expect(pickOne({ next: () => 0.99 }, ["a", "b", "c"])).toBe("c")
    expect(pickOne({ next: () => 0 }, ["a", "b", "c"])).toBe("a")
  })

  it("throws on an empty list", () => {
    expect(() => pickOne(createSeededRandom(1), [])).toThrow("Cannot pick from an empty list")
  })
})

describe("shuffle", () => {
  it("returns a permutation and leaves the input alone", () => {
    const input = [1, 2, 3, 4, 5, 6]
    const out = shuffle(createSeededRandom(9), input)
    expect(input).toEqual([1, 2, 3, 4, 5, 6])
    expect([...out].sort()).toEqual(input)
  })

  it("is deterministic for a constant source", () => {
    // j = 0 at every step: [a,b,c] -> [c,b,a] -> [b,c,a]
    expect(shuffle({ next: () => 0 }, ["a", "b", "c"])).toEqual(["b", "c", "a"])
  })
})
