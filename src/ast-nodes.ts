import type { SourceSpan } from './source-location.js';

interface BaseNode {
  readonly span: SourceSpan;
}

// ============================================================
// SCRIPT STRUCTURE
// ============================================================

export interface ScriptNode extends BaseNode {
  readonly type: 'Script';
  readonly statements: StatementNode[];
}

// ============================================================
// STATEMENTS
// ============================================================

export type StatementNode =
  | FunctionDefNode
  | IfNode
  | ReturnNode
  | AssignmentNode
  | PipelineNode;

/**
 * Function definition: function Name($a, $b = 1) { body }
 * Parameters may also be declared with a leading param(...) block.
 */
export interface FunctionDefNode extends BaseNode {
  readonly type: 'FunctionDef';
  readonly name: string;
  readonly params: ParamNode[];
  readonly body: StatementNode[];
}

export interface ParamNode extends BaseNode {
  readonly type: 'Param';
  readonly name: string;
  /** Evaluated in the callee frame when no argument is bound */
  readonly defaultValue: ExpressionNode | null;
}

/**
 * Conditional: if (cond) { } elseif (cond) { } else { }
 * elseif chains are nested IfNodes in elseBody.
 */
export interface IfNode extends BaseNode {
  readonly type: 'If';
  readonly condition: ExpressionNode;
  readonly thenBody: StatementNode[];
  readonly elseBody: StatementNode[] | null;
}

export interface ReturnNode extends BaseNode {
  readonly type: 'Return';
  readonly value: PipelineNode | null;
}

/**
 * Assignment: $name = value, $global:name = value.
 * Compound forms ($x += 1) are desugared by the parser.
 */
export interface AssignmentNode extends BaseNode {
  readonly type: 'Assignment';
  /** Variable name as written, including any scope qualifier */
  readonly target: string;
  readonly value: PipelineNode;
}

/** One or more stages joined by | */
export interface PipelineNode extends BaseNode {
  readonly type: 'Pipeline';
  readonly stages: ExpressionNode[];
}

// ============================================================
// EXPRESSIONS
// ============================================================

export type ExpressionNode =
  | LiteralNode
  | StringInterpolationNode
  | VariableNode
  | BinaryExprNode
  | UnaryExprNode
  | MemberAccessNode
  | IndexAccessNode
  | RecordLiteralNode
  | ListLiteralNode
  | BlockLiteralNode
  | CallNode
  | GroupedNode
  | SubExpressionNode;

export interface LiteralNode extends BaseNode {
  readonly type: 'Literal';
  readonly value: string | number | boolean | null;
}

/** Double-quoted string containing $var or $( ) parts */
export interface StringInterpolationNode extends BaseNode {
  readonly type: 'StringInterpolation';
  readonly parts: (string | InterpolationNode)[];
}

export interface InterpolationNode extends BaseNode {
  readonly type: 'Interpolation';
  readonly expression: ExpressionNode;
}

export interface VariableNode extends BaseNode {
  readonly type: 'Variable';
  /** Name as written, including any scope qualifier */
  readonly name: string;
}

export type ArithmeticOp = '+' | '-' | '*' | '/' | '%';

export type ComparisonOp = '-eq' | '-ne' | '-gt' | '-lt' | '-ge' | '-le';

export type LogicalOp = '-and' | '-or';

export type BinaryOp = ArithmeticOp | ComparisonOp | LogicalOp;

export interface BinaryExprNode extends BaseNode {
  readonly type: 'BinaryExpr';
  readonly op: BinaryOp;
  readonly left: ExpressionNode;
  readonly right: ExpressionNode;
}

export type UnaryOp = '-' | '!';

export interface UnaryExprNode extends BaseNode {
  readonly type: 'UnaryExpr';
  readonly op: UnaryOp;
  readonly operand: ExpressionNode;
}

export interface MemberAccessNode extends BaseNode {
  readonly type: 'MemberAccess';
  readonly object: ExpressionNode;
  readonly member: string;
}

export interface IndexAccessNode extends BaseNode {
  readonly type: 'IndexAccess';
  readonly object: ExpressionNode;
  readonly index: ExpressionNode;
}

/** @{ Key = value; ... } - duplicate keys allowed, last wins */
export interface RecordLiteralNode extends BaseNode {
  readonly type: 'RecordLiteral';
  readonly entries: RecordEntryNode[];
}

export interface RecordEntryNode extends BaseNode {
  readonly type: 'RecordEntry';
  readonly key: string;
  readonly value: ExpressionNode;
}

/** @( a, b, c ) */
export interface ListLiteralNode extends BaseNode {
  readonly type: 'ListLiteral';
  readonly elements: ExpressionNode[];
}

/** { statements } - evaluates to a deferred block, never runs the body */
export interface BlockLiteralNode extends BaseNode {
  readonly type: 'BlockLiteral';
  readonly body: StatementNode[];
}

/**
 * Command-shaped call: Name arg1 arg2 -Param value -Switch
 * Resolved at runtime against user functions, then registered stages.
 */
export interface CallNode extends BaseNode {
  readonly type: 'Call';
  readonly name: string;
  readonly args: ExpressionNode[];
  readonly namedArgs: NamedArgNode[];
}

export interface NamedArgNode extends BaseNode {
  readonly type: 'NamedArg';
  readonly name: string;
  /** null for a bare switch (-Descending) */
  readonly value: ExpressionNode | null;
}

/** ( pipeline ) */
export interface GroupedNode extends BaseNode {
  readonly type: 'Grouped';
  readonly pipeline: PipelineNode;
}

/** $( statements ) */
export interface SubExpressionNode extends BaseNode {
  readonly type: 'SubExpression';
  readonly statements: StatementNode[];
}

// ============================================================
// UTILITY TYPES
// ============================================================

export type ASTNode =
  | ScriptNode
  | StatementNode
  | ExpressionNode
  | ParamNode
  | InterpolationNode
  | RecordEntryNode
  | NamedArgNode;

export type NodeType = ASTNode['type'];
