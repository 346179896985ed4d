#!/usr/bin/env node
// Copyright (c) 2022-2025 GlassBricks
// SPDX-FileCopyrightText: 2025 GlassBricks
//
// SPDX-License-Identifier: LGPL-3.0-or-later

import * as prettier from "prettier"
import { parseArgs } from "util"
import { BlueprintDocument } from "./blueprints/blueprint"
import {
  createFurnaceLineConfig,
  defaultFurnaceLineConfig,
  FurnaceLineConfig,
  generateFurnaceLineBlueprint,
} from "./blueprints/furnace-line"
import { beltNames, furnaceNames } from "./entity/prototype-info"
import { encodeBlueprintString } from "./import-export/blueprint-string"
import { UnknownIdentifierError, ValidationError } from "./lib"
import { sides } from "./lib/geometry"

export const PROGRAM_NAME = "furnace-line"

export interface CliIO {
  out(text: string): void
  err(text: string): void
}

const consoleIO: CliIO = {
  out: (text) => console.log(text),
  err: (text) => console.error(text),
}

export type CliArgs =
  | { readonly help: true }
  | { readonly help: false; readonly config: FurnaceLineConfig; readonly json: boolean }

/** Bad command line; reported with the usage line. */
export class UsageError extends Error {
  override name = "UsageError"
}

function formatChoices(choices: readonly string[]): string {
  return `{${choices.join(",")}}`
}

export const usage =
  `usage: ${PROGRAM_NAME} [--furnace ${formatChoices(furnaceNames)}] [--belt ${formatChoices(beltNames)}]` +
  ` [--length N] [--input-side ${formatChoices(sides)}] [--output-side ${formatChoices(sides)}]` +
  ` [--label TEXT] [--furnaces-only] [--json] [--help]`

const helpText = `${usage}

Generate a furnace line blueprint string.

options:
  --furnace NAME      furnace type (default: ${defaultFurnaceLineConfig.furnace})
  --belt NAME         belt type (default: ${defaultFurnaceLineConfig.belt})
  --length N          number of furnaces; default is enough to fill one belt
  --input-side SIDE   side the input belt enters from (default: ${defaultFurnaceLineConfig.inputSide})
  --output-side SIDE  side the output belt leaves to (default: ${defaultFurnaceLineConfig.outputSide})
  --label TEXT        blueprint label (default: ${defaultFurnaceLineConfig.label})
  --furnaces-only     only place furnaces
  --json              output raw blueprint JSON instead of encoded string
  --help              show this help message and exit`

const options = {
  furnace: { type: "string" },
  belt: { type: "string" },
  length: { type: "string" },
  "input-side": { type: "string" },
  "output-side": { type: "string" },
  label: { type: "string" },
  "furnaces-only": { type: "boolean" },
  json: { type: "boolean" },
  help: { type: "boolean", short: "h" },
} as const

function checkChoice(option: string, value: string | undefined, choices: readonly string[]): string | undefined {
  if (value !== undefined && !choices.includes(value)) {
    const quoted = choices.map((choice) => `'${choice}'`).join(", ")
    throw new UsageError(`argument --${option}: invalid choice: '${value}' (choose from ${quoted})`)
  }
  return value
}

function parseLength(value: string | undefined): number | undefined {
  if (value === undefined) return undefined
  if (!/^\s*[+-]?\d+\s*$/.test(value)) throw new UsageError(`argument --length: invalid int value: '${value}'`)
  return Number.parseInt(value, 10)
}

interface ParseArgsError {
  readonly code: string
  readonly message: string
}

// Matched by shape: parseArgs throws Node's own TypeError, which is not the TypeError of a vm context.
function isParseArgsError(error: unknown): error is ParseArgsError {
  return (
    typeof error == "object" &&
    error !== null &&
    "code" in error &&
    typeof error.code == "string" &&
    error.code.startsWith("ERR_PARSE_ARGS") &&
    "message" in error &&
    typeof error.message == "string"
  )
}

function parseRawArgs(argv: readonly string[]) {
  try {
    return parseArgs({ args: [...argv], options, strict: true, allowPositionals: false })
  } catch (error) {
    if (isParseArgsError(error)) throw new UsageError(error.message)
    throw error
  }
}

export function parseCliArgs(argv: readonly string[]): CliArgs {
  const { values } = parseRawArgs(argv)
  // Other option values are not checked when help is asked for.
  if (values.help) return { help: true }
  const config = createFurnaceLineConfig({
    furnace: checkChoice("furnace", values.furnace, furnaceNames),
    belt: checkChoice("belt", values.belt, beltNames),
    length: parseLength(values.length),
    inputSide: checkChoice("input-side", values["input-side"], sides),
    outputSide: checkChoice("output-side", values["output-side"], sides),
    label: values.label,
    furnacesOnly: values["furnaces-only"] ?? false,
  })
  return { help: false, config, json: values.json ?? false }
}

export function formatBlueprintJson(document: BlueprintDocument): string {
  return prettier.format(JSON.stringify(document, null, 2), { parser: "json" }).trimEnd()
}

/** Returns the process exit status. */
export function main(argv: readonly string[], io: CliIO = consoleIO): number {
  try {
    const args = parseCliArgs(argv)
    if (args.help) {
      io.out(helpText)
      return 0
    }
    const document = generateFurnaceLineBlueprint(args.config)
    io.out(args.json ? formatBlueprintJson(document) : encodeBlueprintString(document))
    return 0
  } catch (error) {
    if (error instanceof UsageError || error instanceof ValidationError || error instanceof UnknownIdentifierError) {
      io.err(usage)
      io.err(`${PROGRAM_NAME}: error: ${error.message}`)
      return 2
    }
    throw error
  }
}

if (require.main === module) {
  process.exitCode = main(process.argv.slice(2))
}
