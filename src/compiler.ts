import { IRGenerator } from "./codegen.js"
import { resolveOptions, type CompilerOptions } from "./config.js"
import { EvaluationError, type CompileError, type KalError } from "./errors.js"
import { IREvaluator } from "./evaluator.js"
import { IRModule, type IRFunction } from "./ir.js"
import { printFunction, printModule } from "./ir_printer.js"
import { Lexer } from "./lexer.js"
import { Parser } from "./parser.js"
import { isErr } from "./result.js"
import type { CharSource } from "./source.js"

type TopLevelOutcome =
  | { kind: "definition"; fn: IRFunction; ir: string }
  | { kind: "extern"; fn: IRFunction; ir: string }
  | { kind: "expression"; ir: string; value: number | null }
  | { kind: "error"; error: CompileError }

export interface CompiledProgram {
  /** The final module, after every construct was handled */
  ir: string
  outcomes: TopLevelOutcome[]
  /** Values of the evaluated top-level expressions, in order */
  results: number[]
  errors: CompileError[]
}

function failure(error: KalError): TopLevelOutcome {
  return { kind: "error", error: error.toCompileError() }
}

/**
 * One compilation session: a token stream, the function table built from it
 * and the loop that handles one top-level construct at a time.
 *
 * A construct that fails to parse costs one extra token, skipped so the next
 * attempt starts somewhere new. A construct that fails to lower has already
 * been consumed and skips nothing.
 */
export class Session {
  readonly parser: Parser
  readonly generator: IRGenerator
  readonly module: IRModule
  private evaluator: IREvaluator
  private opts: CompilerOptions

  constructor(source: CharSource | string, options: Partial<CompilerOptions> = {}) {
    this.opts = resolveOptions(options)
    this.parser = new Parser(new Lexer(source), this.opts.operators)
    this.module = new IRModule(this.opts.moduleName)
    this.generator = new IRGenerator(this.module, { verify: this.opts.verify })
    this.evaluator = new IREvaluator(this.module, {
      maxCallDepth: this.opts.maxCallDepth,
      write: this.opts.write,
    })
  }

  /** Handles the next top-level construct; null at end of input. */
  next(): TopLevelOutcome | null {
    while (true) {
      const token = this.parser.current
      switch (token.type) {
        case "eof":
          return null
        case "def":
          return this.handleDefinition()
        case "extern":
          return this.handleExtern()
        case "CHAR":
          // top-level semicolons are ignored
          if (token.value === ";") {
            this.parser.advance()
            continue
          }
          return this.handleTopLevelExpression()
        default:
          return this.handleTopLevelExpression()
      }
    }
  }

  run(): TopLevelOutcome[] {
    const outcomes: TopLevelOutcome[] = []
    let outcome = this.next()
    while (outcome !== null) {
      outcomes.push(outcome)
      outcome = this.next()
    }
    return outcomes
  }

  private handleDefinition(): TopLevelOutcome {
    const parsed = this.parser.parseDefinition()
    if (isErr(parsed)) {
      this.parser.advance()
      return failure(parsed.error)
    }

    const lowered = this.generator.lowerFunction(parsed.v)
    if (isErr(lowered)) {
      return failure(lowered.error)
    }
    return { kind: "definition", fn: lowered.v, ir: printFunction(lowered.v) }
  }

  private handleExtern(): TopLevelOutcome {
    const parsed = this.parser.parseExtern()
    if (isErr(parsed)) {
      this.parser.advance()
      return failure(parsed.error)
    }

    const lowered = this.generator.lowerPrototype(parsed.v)
    if (isErr(lowered)) {
      return failure(lowered.error)
    }
    return { kind: "extern", fn: lowered.v, ir: printFunction(lowered.v) }
  }

  private handleTopLevelExpression(): TopLevelOutcome {
    const parsed = this.parser.parseTopLevelExpression()
    if (isErr(parsed)) {
      this.parser.advance()
      return failure(parsed.error)
    }

    const lowered = this.generator.lowerFunction(parsed.v)
    if (isErr(lowered)) {
      return failure(lowered.error)
    }

    // the anonymous function only lives long enough to be printed and run
    const fn = lowered.v
    const ir = printFunction(fn)
    try {
      const value = this.opts.evaluate ? this.evaluator.call(fn.name) : null
      return { kind: "expression", ir, value }
    } catch (error: unknown) {
      if (error instanceof EvaluationError) {
        return failure(error)
      }
      throw error
    } finally {
      this.module.removeFunction(fn.name)
    }
  }
}

export function compile(source: CharSource | string, options: Partial<CompilerOptions> = {}): CompiledProgram {
  const session = new Session(source, options)
  const outcomes = session.run()

  const results: number[] = []
  const errors: CompileError[] = []
  for (const outcome of outcomes) {
    if (outcome.kind === "expression" && outcome.value !== null) {
      results.push(outcome.value)
    } else if (outcome.kind === "error") {
      errors.push(outcome.error)
    }
  }

  return { ir: printModule(session.module), outcomes, results, errors }
}

export type { TopLevelOutcome }
