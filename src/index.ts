// Copyright (c) 2022-2025 GlassBricks
// SPDX-FileCopyrightText: 2025 GlassBricks
//
// SPDX-License-Identifier: LGPL-3.0-or-later

export * from "./blueprints/blueprint"
export * from "./blueprints/furnace-count"
export * from "./blueprints/furnace-line"
export * from "./entity/blueprint-entity"
export * from "./entity/prototype-info"
export * from "./import-export/blueprint-string"
export * from "./lib"
export * from "./lib/geometry"
