import { describe, test, expect } from "vitest"
import { verifyFunction } from "./verifier.js"
import { IRModule, constant } from "./ir.js"
import type { IRFunction, IRInstruction, RegisterOperand } from "./ir.js"

// --- IR helpers ---

function reg(name: string, type: "double" | "i1" = "double"): RegisterOperand {
  return { kind: "reg", type, name }
}

function fn(body: IRInstruction[] | null, params: string[] = []): IRFunction {
  return { name: "f", params: params.map((name) => ({ name, type: "double" })), returnType: "double", body }
}

function moduleWith(...functions: IRFunction[]): IRModule {
  const module = new IRModule()
  for (const f of functions) module.addFunction(f)
  return module
}

describe("verifyFunction", () => {
  test("well-formed function has no problems", () => {
    const f = fn(
      [
        { op: "fcmp", predicate: "olt", result: reg("cmptmp", "i1"), lhs: { kind: "param", type: "double", index: 0, name: "a" }, rhs: constant(2) },
        { op: "uitofp", result: reg("booltmp"), value: reg("cmptmp", "i1") },
        { op: "ret", value: reg("booltmp") },
      ],
      ["a"],
    )
    expect(verifyFunction(f, moduleWith(f))).toEqual([])
  })

  test("declarations are not checked", () => {
    expect(verifyFunction(fn(null), new IRModule())).toEqual([])
  })

  test("empty body", () => {
    expect(verifyFunction(fn([]), new IRModule())).toEqual(["entry block is empty"])
  })

  test("missing ret", () => {
    const f = fn([{ op: "fadd", result: reg("t"), lhs: constant(1), rhs: constant(2) }])
    expect(verifyFunction(f, new IRModule())).toEqual(["entry block does not end with ret"])
  })

  test("instructions after ret", () => {
    const f = fn([
      { op: "ret", value: constant(1) },
      { op: "ret", value: constant(2) },
    ])
    expect(verifyFunction(f, new IRModule())).toEqual(["ret #0: instructions after ret"])
  })

  test("register used before definition", () => {
    expect(verifyFunction(fn([{ op: "ret", value: reg("x") }]), new IRModule())).toEqual([
      "ret #0: %x used before definition",
    ])
  })

  test("register defined twice", () => {
    const f = fn([
      { op: "fadd", result: reg("t"), lhs: constant(1), rhs: constant(2) },
      { op: "fadd", result: reg("t"), lhs: constant(1), rhs: constant(2) },
      { op: "ret", value: reg("t") },
    ])
    expect(verifyFunction(f, new IRModule())).toEqual(["fadd #1: %t defined twice"])
  })

  test("widening needs an i1", () => {
    const f = fn([
      { op: "uitofp", result: reg("b"), value: constant(1) },
      { op: "ret", value: reg("b") },
    ])
    expect(verifyFunction(f, new IRModule())).toEqual(["uitofp #0: 1 is double, expected i1"])
  })

  test("returning an i1", () => {
    const f = fn([
      { op: "fcmp", predicate: "olt", result: reg("c", "i1"), lhs: constant(1), rhs: constant(2) },
      { op: "ret", value: reg("c", "i1") },
    ])
    expect(verifyFunction(f, new IRModule())).toEqual(["ret #1: %c is i1, expected double"])
  })

  test("parameter out of range", () => {
    const f = fn([{ op: "ret", value: { kind: "param", type: "double", index: 1, name: "b" } }], ["a"])
    expect(verifyFunction(f, new IRModule())).toEqual(["ret #0: no parameter %b at index 1"])
  })

  test("call to an undeclared function", () => {
    const f = fn([
      { op: "call", result: reg("calltmp"), callee: "g", args: [] },
      { op: "ret", value: reg("calltmp") },
    ])
    expect(verifyFunction(f, new IRModule())).toEqual(["call #0: call to undeclared function @g"])
  })

  test("call with the wrong number of arguments", () => {
    const g: IRFunction = { name: "g", params: [{ name: "x", type: "double" }], returnType: "double", body: null }
    const f = fn([
      { op: "call", result: reg("calltmp"), callee: "g", args: [] },
      { op: "ret", value: reg("calltmp") },
    ])
    expect(verifyFunction(f, moduleWith(g))).toEqual(["call #0: @g takes 1 arguments, got 0"])
  })
})
