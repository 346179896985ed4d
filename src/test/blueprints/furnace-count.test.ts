// Copyright (c) 2022-2025 GlassBricks
// SPDX-FileCopyrightText: 2025 GlassBricks
//
// SPDX-License-Identifier: LGPL-3.0-or-later

import {
  calculateFurnaceCount,
  clampLength,
  furnacesPerFullBelt,
  MAX_FURNACE_COUNT,
  MIN_FURNACE_COUNT,
} from "../../blueprints/furnace-count"
import { beltNames, furnaceNames } from "../../entity/prototype-info"
import { UnknownIdentifierError, ValidationError } from "../../lib"

const allPairs = furnaceNames.flatMap((furnace) => beltNames.map((belt) => [furnace, belt] as const))

describe("furnacesPerFullBelt()", () => {
  test.each(allPairs)("%s with %s is positive", (furnace, belt) => {
    expect(furnacesPerFullBelt(furnace, belt)).toBeGreaterThan(0)
  })

  test("stone furnaces on a yellow belt", () => {
    expect(furnacesPerFullBelt("stone-furnace", "transport-belt")).toBeCloseTo(48, 10)
  })
})

describe("calculateFurnaceCount()", () => {
  test.each<[string, string, number]>([
    ["stone-furnace", "transport-belt", 48],
    ["stone-furnace", "fast-transport-belt", 96],
    ["stone-furnace", "express-transport-belt", 144],
    ["steel-furnace", "transport-belt", 24],
    ["steel-furnace", "fast-transport-belt", 48],
    ["steel-furnace", "express-transport-belt", 72],
    ["electric-furnace", "transport-belt", 24],
    ["electric-furnace", "express-transport-belt", 72],
  ])("%s with %s needs %s furnaces", (furnace, belt, expected) => {
    expect(calculateFurnaceCount({ furnace, belt })).toBe(expected)
  })

  test.each(allPairs)("%s with %s is within range", (furnace, belt) => {
    const count = calculateFurnaceCount({ furnace, belt })
    expect(count).toBeGreaterThanOrEqual(MIN_FURNACE_COUNT)
    expect(count).toBeLessThanOrEqual(MAX_FURNACE_COUNT)
  })

  test.each<[number, number]>([
    [5, 5],
    [1, 1],
    [200, 200],
    [0, 1],
    [-3, 1],
    [201, 200],
    [10000, 200],
  ])("explicit length %s gives %s", (length, expected) => {
    for (const [furnace, belt] of allPairs) {
      expect(calculateFurnaceCount({ furnace, belt, length })).toBe(expected)
    }
  })

  test("explicit length does not look up the furnace or belt", () => {
    expect(calculateFurnaceCount({ furnace: "wood-furnace", belt: "conveyor", length: 7 })).toBe(7)
  })

  test("non-integer length is rejected", () => {
    expect(() => calculateFurnaceCount({ furnace: "stone-furnace", belt: "transport-belt", length: 2.5 })).toThrow(
      ValidationError,
    )
    expect(() => calculateFurnaceCount({ furnace: "stone-furnace", belt: "transport-belt", length: NaN })).toThrow(
      ValidationError,
    )
  })

  test("unknown names are lookup errors", () => {
    expect(() => calculateFurnaceCount({ furnace: "wood-furnace", belt: "transport-belt" })).toThrow(
      UnknownIdentifierError,
    )
    expect(() => calculateFurnaceCount({ furnace: "stone-furnace", belt: "conveyor" })).toThrow(UnknownIdentifierError)
  })
})

test("clampLength()", () => {
  expect(clampLength(-1)).toBe(1)
  expect(clampLength(50)).toBe(50)
  expect(clampLength(201)).toBe(200)
})
