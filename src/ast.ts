import type { Span } from "./source.js"

interface ASTNode {
  type: string
  position: Span
}

interface NumberLiteralNode extends ASTNode {
  type: "NumberLiteral"
  value: number
}

interface VariableNode extends ASTNode {
  type: "Variable"
  name: string
}

interface BinaryExpressionNode extends ASTNode {
  type: "BinaryExpression"
  operator: string
  left: ExpressionNode
  right: ExpressionNode
}

interface CallExpressionNode extends ASTNode {
  type: "CallExpression"
  callee: string
  args: ExpressionNode[]
}

type ExpressionNode = NumberLiteralNode | VariableNode | BinaryExpressionNode | CallExpressionNode

/** A function's name and parameter names, without a body. */
interface PrototypeNode extends ASTNode {
  type: "Prototype"
  name: string
  params: string[]
}

/** An empty prototype name marks a wrapped top-level expression. */
interface FunctionNode extends ASTNode {
  type: "Function"
  prototype: PrototypeNode
  body: ExpressionNode
}

type TopLevelNode = FunctionNode | PrototypeNode

export type {
  ASTNode,
  NumberLiteralNode,
  VariableNode,
  BinaryExpressionNode,
  CallExpressionNode,
  ExpressionNode,
  PrototypeNode,
  FunctionNode,
  TopLevelNode,
}
