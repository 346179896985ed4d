// Copyright (c) 2022-2025 GlassBricks
// SPDX-FileCopyrightText: 2025 GlassBricks
//
// SPDX-License-Identifier: LGPL-3.0-or-later

import { Direction, Pos, Position, rotateDirection } from "../lib/geometry"

/** An entity placed in a layout, before it is given an entity number. */
export interface PlacedEntity {
  readonly name: string
  readonly position: Position
  readonly direction?: Direction
}

export interface BlueprintEntity extends PlacedEntity {
  readonly entity_number: number
}

export function placeEntity(name: string, x: number, y: number, direction?: Direction): PlacedEntity {
  const position = Pos(x, y)
  return direction === undefined ? { name, position } : { name, position, direction }
}

/** Rotates position about the origin, and direction if the entity has one. */
export function rotateEntity<E extends PlacedEntity>(entity: E, steps: number): E {
  const position = Pos.rotate(entity.position, steps)
  if (entity.direction === undefined) return { ...entity, position }
  return { ...entity, position, direction: rotateDirection(entity.direction, steps) }
}

export function rotateEntities<E extends PlacedEntity>(entities: readonly E[], steps: number): E[] {
  return entities.map((entity) => rotateEntity(entity, steps))
}

/** Numbers entities 1..N in the given order. */
export function attachEntityNumbers(entities: readonly PlacedEntity[]): BlueprintEntity[] {
  return entities.map(({ name, position, direction }, index) =>
    direction === undefined
      ? { name, position, entity_number: index + 1 }
      : { name, position, direction, entity_number: index + 1 },
  )
}
