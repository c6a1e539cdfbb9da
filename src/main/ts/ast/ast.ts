import { Position } from "../common/position.js";
import { DialectConfig } from "../config/dialect.js";

export interface Node {
  pos: Position;
}

export type Expression =
  | LiteralExpr
  | VariableExpr
  | UnaryExpr
  | BinaryExpr
  | LogicalExpr
  | AssignExpr
  | CallExpr
  | MethodCallExpr
  | IndexExpr
  | PropertyExpr
  | ArrayLiteralExpr
  | MapLiteralExpr
  | RangeExpr
  | BlockExpr
  | IfExpr
  | SwitchExpr
  | ClosureExpr;

export type Statement =
  | LetStmt
  | ExpressionStmt
  | WhileStmt
  | DoLoopStmt
  | ForStmt
  | FnDef
  | ReturnStmt
  | BreakStmt
  | ContinueStmt
  | ThrowStmt
  | TryCatchStmt;

export type UnaryOperator = "-" | "+" | "!";

export type BinaryOperator =
  | "+"
  | "-"
  | "*"
  | "/"
  | "%"
  | "**"
  | "=="
  | "!="
  | "<"
  | "<="
  | ">"
  | ">="
  | "&"
  | "|"
  | "^"
  | "<<"
  | ">>"
  | "in";

export type LogicalOperator = "&&" | "||" | "??";

/** Operators that may precede `=` in a compound assignment. */
export type CompoundOperator =
  | "+"
  | "-"
  | "*"
  | "/"
  | "%"
  | "**"
  | "<<"
  | ">>"
  | "&"
  | "|"
  | "^";

export type LiteralValue =
  | { type: "unit" }
  | { type: "bool"; value: boolean }
  | { type: "int"; value: bigint }
  | { type: "float"; value: number }
  | { type: "string"; value: string }
  | { type: "char"; value: string };

// --- Expressions ---

export interface LiteralExpr extends Node {
  kind: "Literal";
  value: LiteralValue;
}

export interface VariableExpr extends Node {
  kind: "Variable";
  name: string;
}

export interface UnaryExpr extends Node {
  kind: "Unary";
  operator: UnaryOperator;
  operand: Expression;
}

export interface BinaryExpr extends Node {
  kind: "Binary";
  operator: BinaryOperator;
  left: Expression;
  right: Expression;
}

/** Short-circuiting operators: the right side may never be evaluated. */
export interface LogicalExpr extends Node {
  kind: "Logical";
  operator: LogicalOperator;
  left: Expression;
  right: Expression;
}

export type AssignTarget = VariableExpr | IndexExpr | PropertyExpr;

/**
 * Example: `a[0].count += 1`
 */
export interface AssignExpr extends Node {
  kind: "Assign";
  target: AssignTarget;
  operator?: CompoundOperator;
  value: Expression;
}

export interface CallExpr extends Node {
  kind: "Call";
  name: string;
  args: Expression[];
}

/**
 * Example: `value.method(a, b)`, dispatched as `method(value, a, b)`.
 * On function values `f.call(x)` invokes `f`.
 */
export interface MethodCallExpr extends Node {
  kind: "MethodCall";
  receiver: Expression;
  method: string;
  args: Expression[];
}

export interface IndexExpr extends Node {
  kind: "Index";
  object: Expression;
  index: Expression;
}

export interface PropertyExpr extends Node {
  kind: "Property";
  object: Expression;
  name: string;
}

export interface ArrayLiteralExpr extends Node {
  kind: "ArrayLiteral";
  elements: Expression[];
}

/**
 * Example: `#{ name: "x", "two words": 2 }`
 */
export interface MapLiteralExpr extends Node {
  kind: "MapLiteral";
  entries: { key: string; value: Expression }[];
}

export interface RangeExpr extends Node {
  kind: "Range";
  start: Expression;
  end: Expression;
  inclusive: boolean;
}

export interface BlockExpr extends Node {
  kind: "Block";
  statements: Statement[];
}

export interface IfExpr extends Node {
  kind: "If";
  condition: Expression;
  thenBranch: BlockExpr;
  elseBranch?: BlockExpr | IfExpr;
}

export interface SwitchCase {
  /** Empty for the `_` default arm. */
  patterns: LiteralExpr[];
  body: Expression;
}

/**
 * Example: `switch x { 1 => "one", 2 | 3 => "few", _ => "many" }`
 */
export interface SwitchExpr extends Node {
  kind: "Switch";
  subject: Expression;
  cases: SwitchCase[];
}

/**
 * Example: `|a, b| a + b`. `captures` lists the free variables the body reads,
 * copied from the enclosing scope when the closure is created.
 */
export interface ClosureExpr extends Node {
  kind: "Closure";
  params: string[];
  body: Expression;
  captures: string[];
}

// --- Statements ---

/**
 * Example: `const LIMIT = 10;`
 */
export interface LetStmt extends Node {
  kind: "Let";
  name: string;
  constant: boolean;
  initializer?: Expression;
}

export interface ExpressionStmt extends Node {
  kind: "ExpressionStmt";
  expression: Expression;
}

/** `while cond { }`; `loop { }` is parsed with a `true` condition. */
export interface WhileStmt extends Node {
  kind: "While";
  condition: Expression;
  body: BlockExpr;
}

/**
 * Example: `do { x += 1; } until x > 10;`
 */
export interface DoLoopStmt extends Node {
  kind: "DoLoop";
  body: BlockExpr;
  condition: Expression;
  until: boolean;
}

/**
 * Example: `for (item, i) in items { }`
 */
export interface ForStmt extends Node {
  kind: "For";
  variable: string;
  indexVariable?: string;
  iterable: Expression;
  body: BlockExpr;
}

export interface FnDef extends Node {
  kind: "FnDef";
  name: string;
  params: string[];
  body: BlockExpr;
}

export interface ReturnStmt extends Node {
  kind: "Return";
  value?: Expression;
}

export interface BreakStmt extends Node {
  kind: "Break";
}

export interface ContinueStmt extends Node {
  kind: "Continue";
}

export interface ThrowStmt extends Node {
  kind: "Throw";
  value?: Expression;
}

export interface TryCatchStmt extends Node {
  kind: "TryCatch";
  body: BlockExpr;
  errorVariable?: string;
  handler: BlockExpr;
}

export interface Script extends Node {
  kind: "Script";
  statements: Statement[];
  /** The dialect the script was compiled under; its limits apply at run time. */
  dialect: DialectConfig;
  sourceName?: string;
}

export function scriptFunctions(script: Script): FnDef[] {
  return script.statements.filter((s): s is FnDef => s.kind === "FnDef");
}

export function isAssignTarget(expr: Expression): expr is AssignTarget {
  return (
    expr.kind === "Variable" ||
    expr.kind === "Index" ||
    expr.kind === "Property"
  );
}

/** A variable, or an element or property path below one. */
export function isPlace(expr: Expression): expr is AssignTarget {
  switch (expr.kind) {
    case "Variable":
      return true;
    case "Index":
    case "Property":
      return isPlace(expr.object);
    default:
      return false;
  }
}
