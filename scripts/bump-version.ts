// Copyright (c) 2022-2025 GlassBricks
// SPDX-FileCopyrightText: 2025 GlassBricks
//
// SPDX-License-Identifier: LGPL-3.0-or-later

import * as child_process from "child_process"
import * as fs from "fs"
import * as path from "path"
import * as prettier from "prettier"
import { bumpVersion, isBumpType, releaseTypes, updateChangelogVersion } from "./version-util"

interface PackageJson {
  version: string
  [key: string]: unknown
}

function main(): void {
  const arg = process.argv[2]
  if (!isBumpType(arg)) {
    console.log(`Usage: bump-version.ts <${releaseTypes.join("|")}>`)
    process.exit(0)
  }

  const packageJsonPath = path.join(__dirname, "..", "package.json")
  const packageJson: PackageJson = JSON.parse(fs.readFileSync(packageJsonPath, "utf8"))
  const oldVersion = packageJson.version
  const newVersion = bumpVersion(oldVersion, arg)

  const changelogPath = path.join(__dirname, "..", "changelog.txt")
  const changelog = updateChangelogVersion(fs.readFileSync(changelogPath, "utf8").split("\n"), oldVersion, newVersion)

  packageJson.version = newVersion
  fs.writeFileSync(packageJsonPath, prettier.format(JSON.stringify(packageJson, null, 2), { parser: "json" }))
  fs.writeFileSync(changelogPath, changelog.join("\n"))

  child_process.execSync(`git add ${packageJsonPath} ${changelogPath}`)
  child_process.execSync(`git commit -m "moved to version ${newVersion}"`)

  console.log(`Bumped version to ${newVersion}`)
}

main()
