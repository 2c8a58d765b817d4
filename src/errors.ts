import type { Span } from "./source.js"

type ErrorKind = "syntax" | "semantic" | "verification" | "evaluation"

type SemanticErrorCode =
  | "unknown-variable"
  | "unknown-function"
  | "arity-mismatch"
  | "invalid-operator"
  | "redefinition"
  | "signature-mismatch"

/** What the driver reports for one failed top-level construct. */
interface CompileError {
  kind: ErrorKind
  message: string
  line: number
  column: number
}

abstract class KalError extends Error {
  abstract readonly kind: ErrorKind
  readonly position: Span | null

  constructor(message: string, position: Span | null = null) {
    super(message)
    this.name = new.target.name
    this.position = position
  }

  toCompileError(): CompileError {
    return {
      kind: this.kind,
      message: this.message,
      line: this.position?.start.line ?? 0,
      column: this.position?.start.column ?? 0,
    }
  }
}

class ParseError extends KalError {
  readonly kind = "syntax"
}

class SemanticError extends KalError {
  readonly kind = "semantic"
  readonly code: SemanticErrorCode

  constructor(code: SemanticErrorCode, message: string, position: Span | null = null) {
    super(message, position)
    this.code = code
  }
}

class VerificationError extends KalError {
  readonly kind = "verification"
  readonly problems: string[]

  constructor(functionName: string, problems: string[]) {
    super(`Function '${functionName}' failed verification: ${problems.join("; ")}`)
    this.problems = problems
  }
}

class EvaluationError extends KalError {
  readonly kind = "evaluation"
}

export { KalError, ParseError, SemanticError, VerificationError, EvaluationError }
export type { CompileError, ErrorKind, SemanticErrorCode }
