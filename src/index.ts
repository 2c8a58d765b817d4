#!/usr/bin/env node
import { readFileSync } from "fs"
import { Session } from "./compiler.js"
import { printModule } from "./ir_printer.js"

const filePath = process.argv[2]
if (filePath === "--help" || filePath === "-h") {
  console.log("Usage: kal [source.kal]   (reads standard input when no file is given)")
  process.exit(0)
}

const source = readFileSync(filePath ?? 0, "utf-8")

const session = new Session(source)

let failed = false
let outcome = session.next()
while (outcome !== null) {
  switch (outcome.kind) {
    case "definition":
      console.error(`Read function definition:\n${outcome.ir}\n`)
      break
    case "extern":
      console.error(`Read extern:\n${outcome.ir}\n`)
      break
    case "expression":
      console.error(`Read top-level expression:\n${outcome.ir}\n`)
      if (outcome.value !== null) {
        console.log(`Evaluated to ${outcome.value}`)
      }
      break
    case "error":
      failed = true
      console.error(`  [${outcome.error.line}:${outcome.error.column}] ${outcome.error.message}`)
      break
  }
  outcome = session.next()
}

console.error("\nModule")
console.error("===================")
console.error(printModule(session.module))

process.exit(failed ? 1 : 0)
