import { describe, test, expect } from "vitest"
import { Parser } from "./parser.js"
import type { ParseResult } from "./parser.js"
import { defaultOperators } from "./operators.js"
import type { OperatorTable } from "./operators.js"
import type { ExpressionNode, FunctionNode, PrototypeNode } from "./ast.js"
import { isOk } from "./result.js"

// Compact s-expression view of an expression, positions dropped
function shape(expr: ExpressionNode): string {
  switch (expr.type) {
    case "NumberLiteral":
      return String(expr.value)
    case "Variable":
      return expr.name
    case "BinaryExpression":
      return `(${expr.operator} ${shape(expr.left)} ${shape(expr.right)})`
    case "CallExpression":
      return `(call ${[expr.callee, ...expr.args.map(shape)].join(" ")})`
  }
}

function expression(source: string, operators?: OperatorTable): string {
  const result = new Parser(source, operators).parseTopLevelExpression()
  if (!isOk(result)) throw new Error(result.error.message)
  return shape(result.v.body)
}

function definition(source: string): FunctionNode {
  const result = new Parser(source).parseDefinition()
  if (!isOk(result)) throw new Error(result.error.message)
  return result.v
}

function extern(source: string): PrototypeNode {
  const result = new Parser(source).parseExtern()
  if (!isOk(result)) throw new Error(result.error.message)
  return result.v
}

function syntaxError(source: string, rule: "definition" | "extern" | "expression" = "expression"): string {
  const parser = new Parser(source)
  const result: ParseResult<FunctionNode | PrototypeNode> =
    rule === "definition" ? parser.parseDefinition() : rule === "extern" ? parser.parseExtern() : parser.parseTopLevelExpression()
  if (isOk(result)) throw new Error(`expected "${source}" to fail`)
  return result.error.message
}

describe("parser primaries", () => {
  test("number literal", () => {
    expect(expression("42")).toBe("42")
  })

  test("variable reference", () => {
    expect(expression("x")).toBe("x")
  })

  test("parentheses group without leaving a node", () => {
    expect(expression("((x))")).toBe("x")
  })

  test("call with arguments in order", () => {
    expect(expression("foo(1, x+2, bar())")).toBe("(call foo 1 (+ x 2) (call bar))")
  })

  test("call without arguments", () => {
    expect(expression("now()")).toBe("(call now)")
  })
})

describe("parser precedence", () => {
  test("multiplication binds tighter than addition", () => {
    expect(expression("3+4*5")).toBe("(+ 3 (* 4 5))")
  })

  test("parentheses override precedence", () => {
    expect(expression("(3+4)*5")).toBe("(* (+ 3 4) 5)")
  })

  test("equal precedence associates left", () => {
    expect(expression("1-2-3")).toBe("(- (- 1 2) 3)")
    expect(expression("1+2-3")).toBe("(- (+ 1 2) 3)")
  })

  test("comparison binds loosest", () => {
    expect(expression("a<b+c")).toBe("(< a (+ b c))")
    expect(expression("a+b<c*d")).toBe("(< (+ a b) (* c d))")
  })

  test("tighter operators on both sides", () => {
    expect(expression("a*b+c*d")).toBe("(+ (* a b) (* c d))")
  })

  test("an unknown operator ends the expression", () => {
    const parser = new Parser("a/b")
    const result = parser.parseTopLevelExpression()
    expect(isOk(result) && shape(result.v.body)).toBe("a")
    expect(parser.current).toMatchObject({ type: "CHAR", value: "/" })
  })

  test("operators added to the table", () => {
    const operators = defaultOperators().define("/", 40)
    expect(expression("a/b/c", operators)).toBe("(/ (/ a b) c)")
    expect(expression("a+b/c", operators)).toBe("(+ a (/ b c))")
  })

  test("right-associative operator", () => {
    const operators = defaultOperators().define("^", 50, "right")
    expect(expression("a^b^c", operators)).toBe("(^ a (^ b c))")
    expect(expression("a^b*c", operators)).toBe("(* (^ a b) c)")
    expect(expression("a*b^c^d", operators)).toBe("(* a (^ b (^ c d)))")
  })

  test("non-positive precedence is not an operator", () => {
    const operators = defaultOperators().define("%", 0)
    expect(expression("a%b", operators)).toBe("a")
  })

  test("binary node spans both operands", () => {
    const result = new Parser("3+4*5").parseTopLevelExpression()
    expect(isOk(result) && result.v.body.position).toEqual({
      start: { line: 1, column: 1, index: 0 },
      end: { line: 1, column: 6, index: 5 },
    })
  })
})

describe("parser top-level constructs", () => {
  test("definition", () => {
    const fn = definition("def foo(a b) a+b")
    expect(fn.prototype.name).toBe("foo")
    expect(fn.prototype.params).toEqual(["a", "b"])
    expect(shape(fn.body)).toBe("(+ a b)")
  })

  test("definition span runs from def to the end of the body", () => {
    expect(definition("def foo(a) a").position).toEqual({
      start: { line: 1, column: 1, index: 0 },
      end: { line: 1, column: 13, index: 12 },
    })
  })

  test("definition without parameters", () => {
    const fn = definition("def one() 1")
    expect(fn.prototype.params).toEqual([])
    expect(shape(fn.body)).toBe("1")
  })

  test("repeated parameter names are kept", () => {
    expect(definition("def f(a a) a").prototype.params).toEqual(["a", "a"])
  })

  test("extern", () => {
    const proto = extern("extern sin(x)")
    expect(proto.type).toBe("Prototype")
    expect(proto.name).toBe("sin")
    expect(proto.params).toEqual(["x"])
  })

  test("top-level expression is wrapped in an anonymous function", () => {
    const result = new Parser("1+2").parseTopLevelExpression()
    expect(isOk(result) && result.v.prototype).toMatchObject({ type: "Prototype", name: "", params: [] })
  })

  test("parses one construct and stops", () => {
    const parser = new Parser("def f() 1 def g() 2")
    const first = parser.parseDefinition()
    expect(isOk(first) && first.v.prototype.name).toBe("f")
    expect(parser.current.type).toBe("def")
    const second = parser.parseDefinition()
    expect(isOk(second) && second.v.prototype.name).toBe("g")
    expect(parser.current.type).toBe("eof")
  })
})

describe("parser errors", () => {
  test("missing closing parenthesis", () => {
    expect(syntaxError("(1+2")).toBe("Expected ')'")
  })

  test("error carries the offending position", () => {
    const result = new Parser("(1+2").parseTopLevelExpression()
    expect(!isOk(result) && result.error.position?.start).toEqual({ line: 1, column: 5, index: 4 })
    expect(!isOk(result) && result.error.kind).toBe("syntax")
  })

  test("missing comma in argument list", () => {
    expect(syntaxError("foo(1 2)")).toBe("Expected ')' or ',' in argument list")
  })

  test("token that cannot start an expression", () => {
    expect(syntaxError(")")).toBe("Unknown token when expecting an expression")
    expect(syntaxError("")).toBe("Unknown token when expecting an expression")
  })

  test("operator without right operand", () => {
    expect(syntaxError("1+")).toBe("Unknown token when expecting an expression")
  })

  test("prototype without a name", () => {
    expect(syntaxError("def 1(a) a", "definition")).toBe("Expected function name in prototype")
    expect(syntaxError("extern", "extern")).toBe("Expected function name in prototype")
  })

  test("prototype without parameter list", () => {
    expect(syntaxError("def foo a", "definition")).toBe("Expected '(' in prototype")
  })

  test("parameters are not comma separated", () => {
    expect(syntaxError("def foo(a, b) a", "definition")).toBe("Expected ')' in prototype")
  })

  test("definition without body", () => {
    expect(syntaxError("def foo(a)", "definition")).toBe("Unknown token when expecting an expression")
  })

  test("entry point called on the wrong token", () => {
    expect(syntaxError("x", "definition")).toBe("Expected 'def'")
    expect(syntaxError("x", "extern")).toBe("Expected 'extern'")
  })
})
