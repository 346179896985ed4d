// Copyright (c) 2022-2025 GlassBricks
// SPDX-FileCopyrightText: 2025 GlassBricks
//
// SPDX-License-Identifier: LGPL-3.0-or-later

import { BlueprintEntity } from "../entity/blueprint-entity"
import { Side } from "../lib/geometry"

export interface SignalID {
  readonly type: "item"
  readonly name: string
}

export interface BlueprintSignalIcon {
  readonly signal: SignalID
  readonly index: number
}

/** Not read by the game; echoes the resolved settings so a document can be traced back to its configuration. */
export interface FurnaceLineMetadata {
  readonly input_side: Side
  readonly output_side: Side
  readonly belt: string
  readonly furnace_count: number
}

export interface Blueprint {
  readonly label: string
  readonly item: "blueprint"
  readonly version: 0
  readonly entities: readonly BlueprintEntity[]
  readonly icons: readonly BlueprintSignalIcon[]
  readonly metadata: FurnaceLineMetadata
}

export interface BlueprintDocument {
  readonly blueprint: Blueprint
}
