import { EvaluationError } from "./errors.js"
import { isDeclaration } from "./ir.js"
import type { IRFunction, IRInstruction, IRModule, IROperand } from "./ir.js"

type NativeFunction = {
  arity: number
  call: (args: number[], write: (text: string) => void) => number
}

const unary = (f: (x: number) => number): NativeFunction => ({ arity: 1, call: ([x]) => f(x) })

// host functions an `extern` can bind to
const NATIVES = new Map<string, NativeFunction>([
  ["sin", unary(Math.sin)],
  ["cos", unary(Math.cos)],
  ["tan", unary(Math.tan)],
  ["sqrt", unary(Math.sqrt)],
  ["exp", unary(Math.exp)],
  ["log", unary(Math.log)],
  ["fabs", unary(Math.abs)],
  ["floor", unary(Math.floor)],
  ["ceil", unary(Math.ceil)],
  ["pow", { arity: 2, call: ([x, y]) => Math.pow(x, y) }],
  [
    "putchard",
    {
      arity: 1,
      call: ([x], write) => {
        write(String.fromCharCode(Math.trunc(x)))
        return 0
      },
    },
  ],
  [
    "printd",
    {
      arity: 1,
      call: ([x], write) => {
        write(`${x}\n`)
        return 0
      },
    },
  ],
])

type EvaluatorOptions = {
  maxCallDepth: number
  write: (text: string) => void
}

const defaultEvaluatorOptions: EvaluatorOptions = {
  maxCallDepth: 10_000,
  write: (text) => {
    process.stdout.write(text)
  },
}

type Value = number | boolean

interface Frame {
  fn: IRFunction
  body: IRInstruction[]
  args: number[]
  registers: Map<string, Value>
  pc: number
  // register the pending call's result lands in
  waiting: string | null
}

/**
 * Executes lowered functions directly. Values are doubles; i1 results are
 * held as booleans until `uitofp` widens them.
 *
 * Calls between defined functions push a frame onto an explicit stack rather
 * than recursing, so the call depth is bounded by `maxCallDepth` alone.
 */
class IREvaluator {
  private module: IRModule
  private opts: EvaluatorOptions

  constructor(module: IRModule, options: Partial<EvaluatorOptions> = {}) {
    this.module = module
    this.opts = { ...defaultEvaluatorOptions, ...options }
  }

  call(name: string, args: number[] = []): number {
    const fn = this.resolve(name, args, 0)
    if (isDeclaration(fn)) {
      return this.callNative(fn, args)
    }

    const stack: Frame[] = [this.enter(fn, args)]
    while (true) {
      const frame = stack[stack.length - 1]
      if (frame.pc >= frame.body.length) {
        throw new EvaluationError(`Function '${frame.fn.name}' has no ret`)
      }
      const inst = frame.body[frame.pc++]
      const { registers } = frame

      switch (inst.op) {
        case "fadd":
          registers.set(inst.result.name, this.readNumber(frame, inst.lhs) + this.readNumber(frame, inst.rhs))
          break
        case "fsub":
          registers.set(inst.result.name, this.readNumber(frame, inst.lhs) - this.readNumber(frame, inst.rhs))
          break
        case "fmul":
          registers.set(inst.result.name, this.readNumber(frame, inst.lhs) * this.readNumber(frame, inst.rhs))
          break
        case "fcmp":
          // ordered: false when either side is NaN, which `<` already gives
          registers.set(inst.result.name, this.readNumber(frame, inst.lhs) < this.readNumber(frame, inst.rhs))
          break
        case "uitofp":
          registers.set(inst.result.name, this.read(frame, inst.value) === true ? 1 : 0)
          break
        case "call": {
          const callArgs = inst.args.map((arg) => this.readNumber(frame, arg))
          const callee = this.resolve(inst.callee, callArgs, stack.length)
          if (isDeclaration(callee)) {
            registers.set(inst.result.name, this.callNative(callee, callArgs))
          } else {
            frame.waiting = inst.result.name
            stack.push(this.enter(callee, callArgs))
          }
          break
        }
        case "ret": {
          const value = this.readNumber(frame, inst.value)
          stack.pop()
          const caller = stack.at(-1)
          if (caller === undefined) {
            return value
          }
          if (caller.waiting !== null) {
            caller.registers.set(caller.waiting, value)
            caller.waiting = null
          }
          break
        }
      }
    }
  }

  private resolve(name: string, args: number[], depth: number): IRFunction {
    const fn = this.module.getFunction(name)
    if (!fn) {
      throw new EvaluationError(`Unknown function '${name}'`)
    }
    if (fn.params.length !== args.length) {
      throw new EvaluationError(`Function '${name}' expects ${fn.params.length} arguments, got ${args.length}`)
    }
    if (depth >= this.opts.maxCallDepth) {
      throw new EvaluationError(`Maximum call depth of ${this.opts.maxCallDepth} exceeded in '${name}'`)
    }
    return fn
  }

  private enter(fn: IRFunction, args: number[]): Frame {
    return { fn, body: fn.body ?? [], args, registers: new Map(), pc: 0, waiting: null }
  }

  private callNative(fn: IRFunction, args: number[]): number {
    const native = NATIVES.get(fn.name)
    if (!native) {
      throw new EvaluationError(`No definition or native binding for '${fn.name}'`)
    }
    if (native.arity !== args.length) {
      throw new EvaluationError(`Native '${fn.name}' expects ${native.arity} arguments, got ${args.length}`)
    }
    return native.call(args, this.opts.write)
  }

  private read(frame: Frame, value: IROperand): Value {
    switch (value.kind) {
      case "const":
        return value.value
      case "param":
        return frame.args[value.index]
      case "reg": {
        const held = frame.registers.get(value.name)
        if (held === undefined) {
          throw new EvaluationError(`Register %${value.name} read before it was written in '${frame.fn.name}'`)
        }
        return held
      }
    }
  }

  private readNumber(frame: Frame, value: IROperand): number {
    const held = this.read(frame, value)
    if (typeof held !== "number") {
      throw new EvaluationError(`Expected a double in '${frame.fn.name}', got an i1`)
    }
    return held
  }
}

export { IREvaluator }
export type { EvaluatorOptions, NativeFunction }
