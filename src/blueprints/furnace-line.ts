// Copyright (c) 2022-2025 GlassBricks
// SPDX-FileCopyrightText: 2025 GlassBricks
//
// SPDX-License-Identifier: LGPL-3.0-or-later

import { attachEntityNumbers, PlacedEntity, placeEntity, rotateEntities } from "../entity/blueprint-entity"
import { BeltName, FurnaceName, INSERTER_NAME, isBeltName, isFurnaceName } from "../entity/prototype-info"
import { UnknownIdentifierError, ValidationError } from "../lib"
import {
  assertSide,
  Direction,
  oppositeDirection,
  oppositeSide,
  rotationStepsForSide,
  Side,
  sideToDirection,
} from "../lib/geometry"
import { BlueprintDocument } from "./blueprint"
import { calculateFurnaceCount } from "./furnace-count"

export interface FurnaceLineConfig {
  readonly furnace: FurnaceName
  readonly belt: BeltName
  readonly length?: number
  readonly inputSide: Side
  readonly outputSide: Side
  readonly label: string
  /** Only place the furnace row, without belts, inserters or the coal feed. */
  readonly furnacesOnly?: boolean
}

/** Unvalidated caller input; names are checked by {@link createFurnaceLineConfig}. */
export interface FurnaceLineOptions {
  readonly furnace?: string
  readonly belt?: string
  readonly length?: number
  readonly inputSide?: string
  readonly outputSide?: string
  readonly label?: string
  readonly furnacesOnly?: boolean
}

export const defaultFurnaceLineConfig: FurnaceLineConfig = {
  furnace: "stone-furnace",
  belt: "transport-belt",
  inputSide: "north",
  outputSide: "south",
  label: "Furnace line",
}

export function createFurnaceLineConfig(options: FurnaceLineOptions = {}): FurnaceLineConfig {
  const furnace = options.furnace ?? defaultFurnaceLineConfig.furnace
  const belt = options.belt ?? defaultFurnaceLineConfig.belt
  if (!isFurnaceName(furnace)) throw new UnknownIdentifierError("furnace", furnace)
  if (!isBeltName(belt)) throw new UnknownIdentifierError("belt", belt)
  return {
    furnace,
    belt,
    length: options.length,
    inputSide: assertSide(options.inputSide ?? defaultFurnaceLineConfig.inputSide),
    outputSide: assertSide(options.outputSide ?? defaultFurnaceLineConfig.outputSide),
    label: options.label ?? defaultFurnaceLineConfig.label,
    furnacesOnly: options.furnacesOnly ?? false,
  }
}

export function validateSides(inputSide: string, outputSide: string): void {
  const input = assertSide(inputSide)
  const output = assertSide(outputSide)
  if (oppositeSide(input) != output) {
    throw new ValidationError("Output side must be opposite the input side for the furnace line layout.")
  }
}

// Canonical layout: input from the north, output to the south, furnaces along +x.
const CANONICAL_INPUT_SIDE: Side = "north"
const FURNACE_DIRECTION = sideToDirection(CANONICAL_INPUT_SIDE)
// inserters carry items away from the input side
const INSERTER_DIRECTION = oppositeDirection(FURNACE_DIRECTION)
const INPUT_BELT_Y = -3
const OUTPUT_BELT_Y = 3
const INPUT_INSERTER_Y = -2
const OUTPUT_INSERTER_Y = 2
const FURNACE_SPACING = 2

export function buildFurnaceEntities(count: number, furnace: string): PlacedEntity[] {
  const entities: PlacedEntity[] = []
  for (let i = 0; i < count; i++) {
    entities.push(placeEntity(furnace, i * FURNACE_SPACING, 0, FURNACE_DIRECTION))
  }
  return entities
}

/** One belt per tile under the whole furnace row. */
export function buildBeltEntities(count: number, belt: string, y: number): PlacedEntity[] {
  const entities: PlacedEntity[] = []
  for (let i = 0; i < count * FURNACE_SPACING; i++) {
    entities.push(placeEntity(belt, i, y, Direction.east))
  }
  return entities
}

export function buildInserterEntities(count: number, y: number): PlacedEntity[] {
  const entities: PlacedEntity[] = []
  for (let i = 0; i < count; i++) {
    entities.push(placeEntity(INSERTER_NAME, i * FURNACE_SPACING, y, INSERTER_DIRECTION))
  }
  return entities
}

/** Short lane turning a fuel belt coming from the north onto the start of the input belt. */
export function buildCoalMergeEntities(belt: string): PlacedEntity[] {
  return [
    placeEntity(belt, -1, -5, Direction.north),
    placeEntity(belt, -1, -4, Direction.north),
    placeEntity(belt, -1, INPUT_BELT_Y, Direction.east),
  ]
}

function buildCanonicalLayout(config: FurnaceLineConfig, count: number): PlacedEntity[] {
  const furnaces = buildFurnaceEntities(count, config.furnace)
  if (config.furnacesOnly) return furnaces
  return [
    ...furnaces,
    ...buildBeltEntities(count, config.belt, INPUT_BELT_Y),
    ...buildBeltEntities(count, config.belt, OUTPUT_BELT_Y),
    ...buildInserterEntities(count, INPUT_INSERTER_Y),
    ...buildInserterEntities(count, OUTPUT_INSERTER_Y),
    ...buildCoalMergeEntities(config.belt),
  ]
}

export function generateFurnaceLineBlueprint(config: FurnaceLineConfig): BlueprintDocument {
  validateSides(config.inputSide, config.outputSide)
  const count = calculateFurnaceCount(config)

  const entities = rotateEntities(buildCanonicalLayout(config, count), rotationStepsForSide(config.inputSide))

  return {
    blueprint: {
      label: config.label,
      item: "blueprint",
      version: 0,
      entities: attachEntityNumbers(entities),
      icons: [{ signal: { type: "item", name: config.furnace }, index: 1 }],
      metadata: {
        input_side: config.inputSide,
        output_side: config.outputSide,
        belt: config.belt,
        furnace_count: count,
      },
    },
  }
}
