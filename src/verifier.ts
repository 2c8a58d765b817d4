import type { IRFunction, IRModule, IROperand, IRType, RegisterOperand } from "./ir.js"

function operandText(operand: IROperand): string {
  switch (operand.kind) {
    case "const":
      return String(operand.value)
    case "param":
    case "reg":
      return `%${operand.name}`
  }
}

/**
 * Structural checks on a defined function. Returns the problems found, empty
 * when the function is well formed. Declarations have nothing to check.
 */
export function verifyFunction(fn: IRFunction, module: IRModule): string[] {
  const body = fn.body
  if (body === null) return []

  const problems: string[] = []
  const registers = new Map<string, IRType>()
  const paramNames = new Set(fn.params.map((p) => p.name))

  const use = (operand: IROperand, expected: IRType, where: string): void => {
    if (operand.type !== expected) {
      problems.push(`${where}: ${operandText(operand)} is ${operand.type}, expected ${expected}`)
    }
    if (operand.kind === "param") {
      const param = fn.params[operand.index]
      if (!param || param.name !== operand.name) {
        problems.push(`${where}: no parameter %${operand.name} at index ${operand.index}`)
      }
    } else if (operand.kind === "reg") {
      const defined = registers.get(operand.name)
      if (defined === undefined) {
        problems.push(`${where}: %${operand.name} used before definition`)
      } else if (defined !== operand.type) {
        problems.push(`${where}: %${operand.name} defined as ${defined}, used as ${operand.type}`)
      }
    }
  }

  const define = (result: RegisterOperand, expected: IRType, where: string): void => {
    if (result.type !== expected) {
      problems.push(`${where}: result %${result.name} is ${result.type}, expected ${expected}`)
    }
    if (registers.has(result.name) || paramNames.has(result.name)) {
      problems.push(`${where}: %${result.name} defined twice`)
    }
    registers.set(result.name, result.type)
  }

  if (body.length === 0) {
    problems.push("entry block is empty")
    return problems
  }

  body.forEach((inst, i) => {
    const where = `${inst.op} #${i}`
    switch (inst.op) {
      case "fadd":
      case "fsub":
      case "fmul":
        use(inst.lhs, "double", where)
        use(inst.rhs, "double", where)
        define(inst.result, "double", where)
        break
      case "fcmp":
        use(inst.lhs, "double", where)
        use(inst.rhs, "double", where)
        define(inst.result, "i1", where)
        break
      case "uitofp":
        use(inst.value, "i1", where)
        define(inst.result, "double", where)
        break
      case "call": {
        const callee = module.getFunction(inst.callee)
        if (!callee) {
          problems.push(`${where}: call to undeclared function @${inst.callee}`)
        } else if (callee.params.length !== inst.args.length) {
          problems.push(`${where}: @${inst.callee} takes ${callee.params.length} arguments, got ${inst.args.length}`)
        }
        for (const arg of inst.args) {
          use(arg, "double", where)
        }
        define(inst.result, "double", where)
        break
      }
      case "ret":
        use(inst.value, fn.returnType, where)
        if (i !== body.length - 1) {
          problems.push(`${where}: instructions after ret`)
        }
        break
    }
  })

  if (body[body.length - 1]?.op !== "ret") {
    problems.push("entry block does not end with ret")
  }

  return problems
}
