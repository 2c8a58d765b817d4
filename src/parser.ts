import { Lexer } from "./lexer.js"
import type { Token } from "./lexer.js"
import type { ExpressionNode, FunctionNode, PrototypeNode } from "./ast.js"
import type { Position, Span } from "./source.js"
import { ParseError } from "./errors.js"
import { defaultOperators, OperatorTable } from "./operators.js"
import { err, ok, type Result } from "./result.js"

type ParseResult<T> = Result<T, ParseError>

/**
 * Recursive-descent parser with precedence climbing for binary expressions.
 *
 * The parser looks at exactly one token, `current`. Each entry point parses a
 * single top-level construct and stops; skipping past a bad token is up to
 * the caller (see `Session` in compiler.ts).
 */
class Parser {
  private lexer: Lexer
  private operators: OperatorTable
  private token: Token
  private previousEnd: Position

  constructor(input: Lexer | string, operators: OperatorTable = defaultOperators()) {
    this.lexer = typeof input === "string" ? new Lexer(input) : input
    this.operators = operators
    this.token = this.lexer.nextToken()
    this.previousEnd = this.token.position.start
  }

  get current(): Token {
    return this.token
  }

  advance(): Token {
    this.previousEnd = this.token.position.end
    this.token = this.lexer.nextToken()
    return this.token
  }

  /** definition := 'def' prototype expression */
  parseDefinition(): ParseResult<FunctionNode> {
    return this.attempt(() => {
      const start = this.expectKeyword("def")
      const prototype = this.prototype()
      const body = this.expression()
      return { type: "Function", prototype, body, position: this.spanFrom(start) }
    })
  }

  /** external := 'extern' prototype */
  parseExtern(): ParseResult<PrototypeNode> {
    return this.attempt(() => {
      this.expectKeyword("extern")
      return this.prototype()
    })
  }

  /** toplevelexpr := expression, wrapped in a nameless zero-parameter function */
  parseTopLevelExpression(): ParseResult<FunctionNode> {
    return this.attempt(() => {
      const body = this.expression()
      return {
        type: "Function",
        prototype: { type: "Prototype", name: "", params: [], position: body.position },
        body,
        position: body.position,
      }
    })
  }

  private attempt<T>(rule: () => T): ParseResult<T> {
    try {
      return ok(rule())
    } catch (error: unknown) {
      if (error instanceof ParseError) {
        return err(error)
      }
      throw error
    }
  }

  private fail(message: string): never {
    throw new ParseError(message, this.token.position)
  }

  private spanFrom(start: Position): Span {
    return { start, end: this.previousEnd }
  }

  private isChar(value: string): boolean {
    return this.token.type === "CHAR" && this.token.value === value
  }

  private expectKeyword(keyword: "def" | "extern"): Position {
    if (this.token.type !== keyword) {
      this.fail(`Expected '${keyword}'`)
    }
    const start = this.token.position.start
    this.advance()
    return start
  }

  /** expression := primary binoprhs */
  private expression(): ExpressionNode {
    const left = this.primary()
    return this.binaryOpRHS(0, left)
  }

  /**
   * primary
   *   := identifierexpr
   *   := numberexpr
   *   := parenexpr
   */
  private primary(): ExpressionNode {
    const token = this.token
    switch (token.type) {
      case "IDENTIFIER":
        return this.identifierExpression(token.value)
      case "NUMBER":
        this.advance()
        return { type: "NumberLiteral", value: token.value, position: token.position }
      case "CHAR":
        if (token.value === "(") {
          return this.parenExpression()
        }
        break
    }
    return this.fail("Unknown token when expecting an expression")
  }

  /** parenexpr := '(' expression ')' */
  private parenExpression(): ExpressionNode {
    this.advance() // eat (
    const inner = this.expression()
    if (!this.isChar(")")) {
      this.fail("Expected ')'")
    }
    this.advance() // eat )
    return inner
  }

  /**
   * identifierexpr
   *   := identifier
   *   := identifier '(' (expression (',' expression)*)? ')'
   */
  private identifierExpression(name: string): ExpressionNode {
    const start = this.token.position.start
    this.advance() // eat identifier

    if (!this.isChar("(")) {
      return { type: "Variable", name, position: this.spanFrom(start) }
    }

    this.advance() // eat (
    const args: ExpressionNode[] = []
    if (!this.isChar(")")) {
      while (true) {
        args.push(this.expression())

        if (this.isChar(")")) break

        if (!this.isChar(",")) {
          this.fail("Expected ')' or ',' in argument list")
        }
        this.advance() // eat ,
      }
    }
    this.advance() // eat )

    return { type: "CallExpression", callee: name, args, position: this.spanFrom(start) }
  }

  private tokenPrecedence(): number {
    if (this.token.type !== "CHAR") return -1
    return this.operators.precedenceOf(this.token.value)
  }

  /**
   * binoprhs := (operator primary)*
   *
   * Consumes operators binding at least as tightly as `minPrecedence`. A
   * tighter operator after the right operand is folded into that operand
   * first; so is an equal one when the operator is right-associative.
   */
  private binaryOpRHS(minPrecedence: number, left: ExpressionNode): ExpressionNode {
    while (true) {
      const precedence = this.tokenPrecedence()
      if (precedence < minPrecedence) {
        return left
      }

      const operatorToken = this.token
      if (operatorToken.type !== "CHAR") {
        return left
      }
      const operator = operatorToken.value
      this.advance() // eat operator

      let right = this.primary()

      const nextPrecedence = this.tokenPrecedence()
      if (precedence < nextPrecedence) {
        right = this.binaryOpRHS(precedence + 1, right)
      } else if (precedence === nextPrecedence && this.operators.isRightAssociative(operator)) {
        right = this.binaryOpRHS(precedence, right)
      }

      left = {
        type: "BinaryExpression",
        operator,
        left,
        right,
        position: { start: left.position.start, end: right.position.end },
      }
    }
  }

  /** prototype := identifier '(' identifier* ')' */
  private prototype(): PrototypeNode {
    const nameToken = this.token
    if (nameToken.type !== "IDENTIFIER") {
      return this.fail("Expected function name in prototype")
    }
    this.advance()

    if (!this.isChar("(")) {
      this.fail("Expected '(' in prototype")
    }

    const params: string[] = []
    let token = this.advance()
    while (token.type === "IDENTIFIER") {
      params.push(token.value)
      token = this.advance()
    }

    if (!this.isChar(")")) {
      this.fail("Expected ')' in prototype")
    }
    this.advance() // eat )

    return { type: "Prototype", name: nameToken.value, params, position: this.spanFrom(nameToken.position.start) }
  }
}

export { Parser }
export type { ParseResult }
