type IRType = "double" | "i1"

interface ConstantOperand {
  kind: "const"
  type: "double"
  value: number
}

interface ParamOperand {
  kind: "param"
  type: "double"
  index: number
  name: string
}

interface RegisterOperand {
  kind: "reg"
  type: IRType
  name: string
}

type IROperand = ConstantOperand | ParamOperand | RegisterOperand

type ArithmeticOp = "fadd" | "fsub" | "fmul"

interface ArithmeticInstruction {
  op: ArithmeticOp
  result: RegisterOperand
  lhs: IROperand
  rhs: IROperand
}

/** Ordered less-than; yields i1. */
interface CompareInstruction {
  op: "fcmp"
  predicate: "olt"
  result: RegisterOperand
  lhs: IROperand
  rhs: IROperand
}

/** Widens an i1 to a double (0.0 or 1.0). */
interface ConvertInstruction {
  op: "uitofp"
  result: RegisterOperand
  value: IROperand
}

interface CallInstruction {
  op: "call"
  result: RegisterOperand
  callee: string
  args: IROperand[]
}

interface ReturnInstruction {
  op: "ret"
  value: IROperand
}

type IRInstruction = ArithmeticInstruction | CompareInstruction | ConvertInstruction | CallInstruction | ReturnInstruction

interface IRParam {
  name: string
  type: "double"
}

/** `body` is null until the function is defined; such a function is a declaration. */
interface IRFunction {
  name: string
  params: IRParam[]
  returnType: "double"
  body: IRInstruction[] | null
}

function isDeclaration(fn: IRFunction): boolean {
  return fn.body === null
}

const constant = (value: number): ConstantOperand => ({ kind: "const", type: "double", value })

/** The function table; iteration follows insertion order. */
class IRModule {
  readonly name: string
  private table: Map<string, IRFunction> = new Map()

  constructor(name: string = "kal") {
    this.name = name
  }

  getFunction(name: string): IRFunction | undefined {
    return this.table.get(name)
  }

  addFunction(fn: IRFunction): void {
    this.table.set(fn.name, fn)
  }

  removeFunction(name: string): boolean {
    return this.table.delete(name)
  }

  functions(): IRFunction[] {
    return [...this.table.values()]
  }
}

export { IRModule, isDeclaration, constant }
export type {
  IRType,
  IROperand,
  ConstantOperand,
  ParamOperand,
  RegisterOperand,
  ArithmeticOp,
  IRInstruction,
  ArithmeticInstruction,
  CompareInstruction,
  ConvertInstruction,
  CallInstruction,
  ReturnInstruction,
  IRParam,
  IRFunction,
}
