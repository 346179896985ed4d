// Copyright (c) 2022-2025 GlassBricks
// SPDX-FileCopyrightText: 2025 GlassBricks
//
// SPDX-License-Identifier: LGPL-3.0-or-later

/** Input values are individually known, but do not form a valid combination. */
export class ValidationError extends Error {
  override name = "ValidationError"
}

export type IdentifierKind = "furnace" | "belt" | "side"

/** A furnace, belt or side name that is not in the supported set. */
export class UnknownIdentifierError extends Error {
  override name = "UnknownIdentifierError"

  constructor(
    readonly kind: IdentifierKind,
    readonly identifier: string,
  ) {
    super(`Unknown ${kind}: "${identifier}"`)
  }
}
