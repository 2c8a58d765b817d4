import { isDeclaration } from "./ir.js"
import type { IRFunction, IRInstruction, IRModule, IROperand } from "./ir.js"

/**
 * LLVM's rendering of a double constant: `%e` notation with six digits when
 * that reads back as the same value, the raw IEEE 754 bits otherwise.
 */
export function formatDouble(value: number): string {
  if (Object.is(value, -0)) return "-0.000000e+00"
  if (Number.isFinite(value)) {
    const [mantissa, exponent] = value.toExponential(6).split("e")
    const sign = exponent.startsWith("-") ? "-" : "+"
    const digits = exponent.replace(/^[+-]/, "").padStart(2, "0")
    const text = `${mantissa}e${sign}${digits}`
    if (parseFloat(text) === value) return text
  }
  const buffer = new ArrayBuffer(8)
  new DataView(buffer).setFloat64(0, value, false)
  const bits = new DataView(buffer).getBigUint64(0, false)
  return `0x${bits.toString(16).toUpperCase().padStart(16, "0")}`
}

function operand(value: IROperand): string {
  switch (value.kind) {
    case "const":
      return formatDouble(value.value)
    case "param":
    case "reg":
      return `%${value.name}`
  }
}

function typed(value: IROperand): string {
  return `${value.type} ${operand(value)}`
}

export function printInstruction(inst: IRInstruction): string {
  switch (inst.op) {
    case "fadd":
    case "fsub":
    case "fmul":
      return `%${inst.result.name} = ${inst.op} double ${operand(inst.lhs)}, ${operand(inst.rhs)}`
    case "fcmp":
      return `%${inst.result.name} = fcmp ${inst.predicate} double ${operand(inst.lhs)}, ${operand(inst.rhs)}`
    case "uitofp":
      return `%${inst.result.name} = uitofp ${typed(inst.value)} to double`
    case "call":
      return `%${inst.result.name} = call double @${inst.callee}(${inst.args.map(typed).join(", ")})`
    case "ret":
      return `ret ${typed(inst.value)}`
  }
}

export function printFunction(fn: IRFunction): string {
  const params = fn.params.map((p) => `${p.type} %${p.name}`).join(", ")
  const signature = `${fn.returnType} @${fn.name}(${params})`

  if (isDeclaration(fn)) {
    return `declare ${signature}`
  }

  const lines = [`define ${signature} {`, "entry:"]
  for (const inst of fn.body ?? []) {
    lines.push(`  ${printInstruction(inst)}`)
  }
  lines.push("}")
  return lines.join("\n")
}

export function printModule(module: IRModule): string {
  const lines = [`; ModuleID = '${module.name}'`, `source_filename = "${module.name}"`]
  for (const fn of module.functions()) {
    lines.push("", printFunction(fn))
  }
  return lines.join("\n") + "\n"
}
