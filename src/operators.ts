type Associativity = "left" | "right"

interface OperatorInfo {
  precedence: number
  associativity: Associativity
}

/**
 * Binary operator precedence table. An operator missing from the table, or
 * defined with a precedence of 0 or less, is not an infix operator.
 */
class OperatorTable {
  private operators: Map<string, OperatorInfo> = new Map()

  define(operator: string, precedence: number, associativity: Associativity = "left"): this {
    if ([...operator].length !== 1) {
      throw new Error(`Binary operators are single characters, got '${operator}'`)
    }
    this.operators.set(operator, { precedence, associativity })
    return this
  }

  /** -1 when `operator` is not a known binary operator. */
  precedenceOf(operator: string): number {
    const info = this.operators.get(operator)
    if (!info || info.precedence <= 0) return -1
    return info.precedence
  }

  isRightAssociative(operator: string): boolean {
    return this.operators.get(operator)?.associativity === "right"
  }

  has(operator: string): boolean {
    return this.precedenceOf(operator) > 0
  }
}

/** `<` 10, `+` and `-` 20, `*` 40, all left-associative. */
function defaultOperators(): OperatorTable {
  return new OperatorTable().define("<", 10).define("+", 20).define("-", 20).define("*", 40)
}

export { OperatorTable, defaultOperators }
export type { Associativity, OperatorInfo }
