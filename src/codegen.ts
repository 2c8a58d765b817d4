import type {
  BinaryExpressionNode,
  CallExpressionNode,
  ExpressionNode,
  FunctionNode,
  PrototypeNode,
  TopLevelNode,
} from "./ast.js"
import { SemanticError, VerificationError } from "./errors.js"
import { IRModule, constant, isDeclaration } from "./ir.js"
import type { ArithmeticOp, IRFunction, IRInstruction, IROperand, IRParam, IRType, ParamOperand, RegisterOperand } from "./ir.js"
import { err, ok, type Result } from "./result.js"
import { verifyFunction } from "./verifier.js"

/** Name a nameless top-level expression is lowered under. */
const ANONYMOUS_FUNCTION_NAME = "__anon_expr"

type LoweringError = SemanticError | VerificationError
type LowerResult = Result<IRFunction, LoweringError>

type GeneratorOptions = {
  /** Verify each function after its body is lowered */
  verify: boolean
}

const defaultGeneratorOptions: GeneratorOptions = {
  verify: true,
}

function functionName(prototype: PrototypeNode): string {
  return prototype.name === "" ? ANONYMOUS_FUNCTION_NAME : prototype.name
}

/**
 * Lowers top-level constructs into functions of an IRModule.
 *
 * The module is the session's function table and outlives every call. The
 * table of local variables is rebuilt for each function body and dropped
 * afterwards, so nothing leaks from one function into the next.
 */
class IRGenerator {
  readonly module: IRModule
  private opts: GeneratorOptions
  private namedValues: Map<string, ParamOperand> = new Map()
  private instructions: IRInstruction[] = []
  // value names in use in the current function, LLVM-style uniquing
  private usedNames: Set<string> = new Set()
  private lastUnique = 0

  constructor(module: IRModule = new IRModule(), options: Partial<GeneratorOptions> = {}) {
    this.module = module
    this.opts = { ...defaultGeneratorOptions, ...options }
  }

  lower(node: TopLevelNode): LowerResult {
    switch (node.type) {
      case "Function":
        return this.lowerFunction(node)
      case "Prototype":
        return this.lowerPrototype(node)
    }
  }

  /** Declares the function, or returns the existing one of the same name and arity. */
  lowerPrototype(prototype: PrototypeNode): LowerResult {
    return this.attempt(() => this.declare(prototype))
  }

  lowerFunction(definition: FunctionNode): LowerResult {
    return this.attempt(() => this.define(definition))
  }

  private attempt(lowering: () => IRFunction): LowerResult {
    try {
      return ok(lowering())
    } catch (error: unknown) {
      if (error instanceof SemanticError || error instanceof VerificationError) {
        return err(error)
      }
      throw error
    }
  }

  private resetFunctionState(params: string[]): void {
    this.namedValues = new Map()
    this.instructions = []
    this.usedNames = new Set()
    this.lastUnique = 0
    for (const name of params) {
      this.usedNames.add(name)
    }
  }

  private uniqueName(base: string, taken: Set<string>): string {
    if (!taken.has(base)) return base
    let candidate = `${base}${++this.lastUnique}`
    while (taken.has(candidate)) {
      candidate = `${base}${++this.lastUnique}`
    }
    return candidate
  }

  // duplicate parameter names get a numeric suffix in the IR
  private paramsFor(prototype: PrototypeNode): IRParam[] {
    const taken = new Set<string>()
    this.lastUnique = 0
    return prototype.params.map((param) => {
      const name = this.uniqueName(param, taken)
      taken.add(name)
      return { name, type: "double" }
    })
  }

  private checkArity(existing: IRFunction, prototype: PrototypeNode): void {
    if (existing.params.length !== prototype.params.length) {
      throw new SemanticError(
        "signature-mismatch",
        `Function '${existing.name}' redeclared with ${prototype.params.length} parameters, previously ${existing.params.length}`,
        prototype.position,
      )
    }
  }

  private declare(prototype: PrototypeNode): IRFunction {
    const name = functionName(prototype)
    const existing = this.module.getFunction(name)
    if (existing) {
      this.checkArity(existing, prototype)
      return existing
    }

    const fn: IRFunction = {
      name,
      params: this.paramsFor(prototype),
      returnType: "double",
      body: null,
    }
    this.module.addFunction(fn)
    return fn
  }

  private define(definition: FunctionNode): IRFunction {
    const { prototype } = definition
    const name = functionName(prototype)

    const existing = this.module.getFunction(name)
    if (existing) {
      if (!isDeclaration(existing)) {
        throw new SemanticError("redefinition", `Function '${name}' cannot be redefined`, prototype.position)
      }
      this.checkArity(existing, prototype)
    }

    // registered before the body is lowered so the body can call it
    const fn = existing ?? this.declare(prototype)
    const declaredParams = fn.params
    fn.params = this.paramsFor(prototype)

    this.resetFunctionState(fn.params.map((p) => p.name))
    prototype.params.forEach((param, index) => {
      // with a repeated name the first parameter wins
      if (!this.namedValues.has(param)) {
        this.namedValues.set(param, { kind: "param", type: "double", index, name: fn.params[index].name })
      }
    })

    try {
      const value = this.generateExpression(definition.body)
      this.instructions.push({ op: "ret", value })
      fn.body = this.instructions

      if (this.opts.verify) {
        const problems = verifyFunction(fn, this.module)
        if (problems.length > 0) {
          throw new VerificationError(name, problems)
        }
      }
      return fn
    } catch (error: unknown) {
      fn.body = null
      if (existing) {
        fn.params = declaredParams
      } else {
        this.module.removeFunction(name)
      }
      throw error
    } finally {
      this.namedValues = new Map()
      this.instructions = []
    }
  }

  private register(type: IRType, base: string): RegisterOperand {
    const name = this.uniqueName(base, this.usedNames)
    this.usedNames.add(name)
    return { kind: "reg", type, name }
  }

  private generateExpression(expr: ExpressionNode): IROperand {
    switch (expr.type) {
      case "NumberLiteral":
        return constant(expr.value)
      case "Variable": {
        const value = this.namedValues.get(expr.name)
        if (!value) {
          throw new SemanticError("unknown-variable", `Unknown variable name '${expr.name}'`, expr.position)
        }
        return value
      }
      case "BinaryExpression":
        return this.generateBinaryExpression(expr)
      case "CallExpression":
        return this.generateCallExpression(expr)
    }
  }

  private emitArithmetic(op: ArithmeticOp, base: string, lhs: IROperand, rhs: IROperand): RegisterOperand {
    const result = this.register("double", base)
    this.instructions.push({ op, result, lhs, rhs })
    return result
  }

  private generateBinaryExpression(expr: BinaryExpressionNode): IROperand {
    const lhs = this.generateExpression(expr.left)
    const rhs = this.generateExpression(expr.right)

    switch (expr.operator) {
      case "+":
        return this.emitArithmetic("fadd", "addtmp", lhs, rhs)
      case "-":
        return this.emitArithmetic("fsub", "subtmp", lhs, rhs)
      case "*":
        return this.emitArithmetic("fmul", "multmp", lhs, rhs)
      case "<": {
        // i1 result, widened to 0.0 or 1.0
        const cmp = this.register("i1", "cmptmp")
        this.instructions.push({ op: "fcmp", predicate: "olt", result: cmp, lhs, rhs })
        const widened = this.register("double", "booltmp")
        this.instructions.push({ op: "uitofp", result: widened, value: cmp })
        return widened
      }
      default:
        throw new SemanticError("invalid-operator", `Invalid binary operator '${expr.operator}'`, expr.position)
    }
  }

  private generateCallExpression(expr: CallExpressionNode): IROperand {
    const callee = this.module.getFunction(expr.callee)
    if (!callee) {
      throw new SemanticError("unknown-function", `Unknown function referenced '${expr.callee}'`, expr.position)
    }

    if (callee.params.length !== expr.args.length) {
      throw new SemanticError(
        "arity-mismatch",
        `Incorrect number of arguments passed to '${expr.callee}': expected ${callee.params.length}, got ${expr.args.length}`,
        expr.position,
      )
    }

    const args = expr.args.map((arg) => this.generateExpression(arg))
    const result = this.register("double", "calltmp")
    this.instructions.push({ op: "call", result, callee: callee.name, args })
    return result
  }
}

export { IRGenerator, ANONYMOUS_FUNCTION_NAME, functionName }
export type { GeneratorOptions, LowerResult, LoweringError }
