import { OperatorTable, defaultOperators } from "./operators.js"

type CompilerOptions = {
  /** Name printed in the module header */
  moduleName: string
  /** Run the verifier over every function after it is lowered */
  verify: boolean
  /** Evaluate top-level expressions as they are compiled */
  evaluate: boolean
  /** Deepest call chain the evaluator follows before giving up */
  maxCallDepth: number
  /** Binary operator table handed to the parser */
  operators: OperatorTable
  /** Where putchard/printd output goes */
  write: (text: string) => void
}

function envFlag(name: string, fallback: boolean): boolean {
  const value = process.env[name]
  if (value === undefined || value === "") return fallback
  return value !== "0" && value.toLowerCase() !== "false"
}

function envInt(name: string, fallback: number): number {
  const value = Number.parseInt(process.env[name] ?? "", 10)
  return Number.isFinite(value) && value > 0 ? value : fallback
}

function defaultCompilerOptions(): CompilerOptions {
  return {
    moduleName: "kal",
    verify: envFlag("KAL_VERIFY", true),
    evaluate: envFlag("KAL_EVAL", true),
    maxCallDepth: envInt("KAL_MAX_CALL_DEPTH", 10_000),
    operators: defaultOperators(),
    write: (text) => {
      process.stdout.write(text)
    },
  }
}

function resolveOptions(options: Partial<CompilerOptions> = {}): CompilerOptions {
  return { ...defaultCompilerOptions(), ...options }
}

export { defaultCompilerOptions, resolveOptions, envFlag, envInt }
export type { CompilerOptions }
