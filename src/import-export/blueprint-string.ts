// Copyright (c) 2024 GlassBricks
// SPDX-FileCopyrightText: 2025 GlassBricks
//
// SPDX-License-Identifier: LGPL-3.0-or-later

import { constants, deflateSync } from "zlib"
import { BlueprintDocument } from "../blueprints/blueprint"

/** Leading character of every blueprint string. */
export const BLUEPRINT_STRING_VERSION = "0"

/** Compact JSON with keys in declaration order. */
export function blueprintToJson(document: BlueprintDocument): string {
  return JSON.stringify(document)
}

/**
 * Encodes to the string the game accepts on import: the version character, then base64 of the zlib-deflated JSON.
 *
 * The stream is valid for any inflater, but is not guaranteed to be byte-identical to what other encoders produce at
 * the same level.
 */
export function encodeBlueprintString(document: BlueprintDocument): string {
  const json = Buffer.from(blueprintToJson(document), "utf8")
  const compressed = deflateSync(json, { level: constants.Z_BEST_COMPRESSION })
  return BLUEPRINT_STRING_VERSION + compressed.toString("base64")
}
