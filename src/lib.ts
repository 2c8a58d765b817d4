export { Lexer, tokenize, parseNumber } from "./lexer.js"
export type { Token, TokenType } from "./lexer.js"
export { StringSource } from "./source.js"
export type { CharSource, Position, Span } from "./source.js"
export type * from "./ast.js"
export { OperatorTable, defaultOperators } from "./operators.js"
export { Parser } from "./parser.js"
export type { ParseResult } from "./parser.js"
export { IRGenerator, ANONYMOUS_FUNCTION_NAME } from "./codegen.js"
export type { LowerResult, LoweringError } from "./codegen.js"
export { IRModule, isDeclaration } from "./ir.js"
export type { IRFunction, IRInstruction, IROperand, IRType } from "./ir.js"
export { printModule, printFunction, formatDouble } from "./ir_printer.js"
export { verifyFunction } from "./verifier.js"
export { IREvaluator } from "./evaluator.js"
export { Session, compile } from "./compiler.js"
export type { CompiledProgram, TopLevelOutcome } from "./compiler.js"
export { resolveOptions } from "./config.js"
export type { CompilerOptions } from "./config.js"
export { KalError, ParseError, SemanticError, VerificationError, EvaluationError } from "./errors.js"
export type { CompileError, SemanticErrorCode } from "./errors.js"
export { ok, err, isOk, isErr, andThen, match } from "./result.js"
export type { Result } from "./result.js"
