import {
  AssignTarget,
  BlockExpr,
  Expression,
  FnDef,
  IfExpr,
  LiteralExpr,
  LogicalExpr,
  LiteralValue,
  Script,
  Statement,
  SwitchExpr,
  isPlace,
} from "../ast/ast.js";
import { InternalError, RuntimeError } from "../common/errors.js";
import { Position } from "../common/position.js";
import { OptimizationLevel } from "../config/dialect.js";
import {
  applyBinary,
  applyUnary,
  matchesPattern,
} from "../runtime/operators.js";
import { Value } from "../runtime/values.js";

export interface OptimizeOptions {
  /** Called for every construct the optimizer removes. */
  onNote?: (message: string, pos: Position) => void;
}

/**
 * Constants visible at one nesting level. `null` marks a name rebound by a
 * variable, hiding any outer constant.
 */
type ConstantFrame = Map<string, LiteralValue | null>;

/**
 * Returns a script that evaluates to the same result with less work:
 *
 * - unary and binary operators over literals are folded, unless evaluating
 *   them fails, in which case they are left for run time;
 * - `if` and `switch` on a literal keep only the branch taken, and
 *   `while false` loops are dropped;
 * - literal and empty-block statements that are not the tail of their block
 *   are dropped, and so is everything after `return`, `break`, `continue` or
 *   `throw`;
 * - reads of host constants are replaced by their value, and at `full` so are
 *   reads of script `const`s with literal initializers.
 *
 * Calls are never removed. The input script is not modified.
 */
export function optimize(
  script: Script,
  constants: ReadonlyMap<string, Value> = new Map(),
  level: OptimizationLevel = script.dialect.optimizationLevel,
  options: OptimizeOptions = {}
): Script {
  if (level === "none") return script;

  const host: ConstantFrame = new Map();
  for (const [name, value] of constants) {
    const literal = toLiteral(value);
    if (literal) host.set(name, literal);
  }

  const optimizer = new Optimizer(script, level === "full", options);
  return {
    ...script,
    statements: optimizer.statements(script.statements, [host]),
  };
}

function toLiteral(value: Value): LiteralValue | undefined {
  switch (value.type) {
    case "unit":
      return { type: "unit" };
    case "bool":
    case "int":
    case "float":
    case "string":
    case "char":
      return value;
    default:
      return undefined;
  }
}

function literal(value: LiteralValue, pos: Position): LiteralExpr {
  return { kind: "Literal", value, pos };
}

function isEmptyBlock(expr: Expression): boolean {
  return expr.kind === "Block" && expr.statements.length === 0;
}

class Optimizer {
  constructor(
    private readonly script: Script,
    private readonly propagateScriptConstants: boolean,
    private readonly options: OptimizeOptions
  ) {}

  private note(message: string, pos: Position) {
    this.options.onNote?.(message, pos);
  }

  statements(statements: Statement[], frames: ConstantFrame[]): Statement[] {
    const out: Statement[] = [];
    for (let i = 0; i < statements.length; i++) {
      const tail = i === statements.length - 1;
      const stmt = this.statement(statements[i], frames, tail);
      if (!stmt) continue;
      out.push(stmt);

      if (
        stmt.kind === "Return" ||
        stmt.kind === "Break" ||
        stmt.kind === "Continue" ||
        stmt.kind === "Throw"
      ) {
        const rest = statements.slice(i + 1);
        const unreachable = rest.find((s) => s.kind !== "FnDef");
        if (unreachable) this.note("Unreachable code removed.", unreachable.pos);
        // functions are hoisted; a definition after an exit is still callable
        for (const def of rest) {
          if (def.kind === "FnDef") out.push(this.fnDef(def));
        }
        break;
      }
    }
    return out;
  }

  private statement(
    stmt: Statement,
    frames: ConstantFrame[],
    tail: boolean
  ): Statement | null {
    const top = frames[frames.length - 1];
    switch (stmt.kind) {
      case "Let": {
        const initializer = stmt.initializer
          ? this.expression(stmt.initializer, frames)
          : undefined;
        const constant =
          stmt.constant &&
          this.propagateScriptConstants &&
          initializer?.kind === "Literal"
            ? initializer.value
            : null;
        top.set(stmt.name, constant);
        return { ...stmt, initializer };
      }
      case "ExpressionStmt": {
        const expression = this.expression(stmt.expression, frames);
        if (
          !tail &&
          (expression.kind === "Literal" || isEmptyBlock(expression))
        ) {
          return null;
        }
        return { ...stmt, expression };
      }
      case "While": {
        const condition = this.expression(stmt.condition, frames);
        if (
          condition.kind === "Literal" &&
          condition.value.type === "bool" &&
          !condition.value.value
        ) {
          this.note("Loop that never runs removed.", stmt.pos);
          return tail ? unitStatement(stmt.pos) : null;
        }
        return { ...stmt, condition, body: this.block(stmt.body, frames) };
      }
      case "DoLoop":
        return {
          ...stmt,
          body: this.block(stmt.body, frames),
          condition: this.expression(stmt.condition, frames),
        };
      case "For": {
        const iterable = this.expression(stmt.iterable, frames);
        const loopFrame: ConstantFrame = new Map([[stmt.variable, null]]);
        if (stmt.indexVariable) loopFrame.set(stmt.indexVariable, null);
        return {
          ...stmt,
          iterable,
          body: this.block(stmt.body, [...frames, loopFrame]),
        };
      }
      case "FnDef":
        return this.fnDef(stmt);
      case "Return":
      case "Throw":
        return stmt.value
          ? { ...stmt, value: this.expression(stmt.value, frames) }
          : stmt;
      case "Break":
      case "Continue":
        return stmt;
      case "TryCatch": {
        const handlerFrame: ConstantFrame = new Map();
        if (stmt.errorVariable) handlerFrame.set(stmt.errorVariable, null);
        return {
          ...stmt,
          body: this.block(stmt.body, frames),
          handler: this.block(stmt.handler, [...frames, handlerFrame]),
        };
      }
    }
  }

  // function bodies run in a fresh scope
  private fnDef(def: FnDef): FnDef {
    return { ...def, body: this.block(def.body, []) };
  }

  private block(block: BlockExpr, frames: ConstantFrame[]): BlockExpr {
    return {
      ...block,
      statements: this.statements(block.statements, [...frames, new Map()]),
    };
  }

  private lookup(name: string, frames: ConstantFrame[]): LiteralValue | null {
    for (let i = frames.length - 1; i >= 0; i--) {
      const frame = frames[i];
      if (frame.has(name)) return frame.get(name) ?? null;
    }
    return null;
  }

  private expression(expr: Expression, frames: ConstantFrame[]): Expression {
    switch (expr.kind) {
      case "Literal":
        return expr;
      case "Variable": {
        const value = this.lookup(expr.name, frames);
        return value ? literal(value, expr.pos) : expr;
      }
      case "Unary": {
        const operand = this.expression(expr.operand, frames);
        if (operand.kind === "Literal") {
          const folded = this.fold(() => applyUnary(expr.operator, operand.value));
          if (folded) return literal(folded, expr.pos);
        }
        return { ...expr, operand };
      }
      case "Binary": {
        const left = this.expression(expr.left, frames);
        const right = this.expression(expr.right, frames);
        if (left.kind === "Literal" && right.kind === "Literal") {
          const folded = this.fold(() =>
            applyBinary(expr.operator, left.value, right.value)
          );
          if (folded) return literal(folded, expr.pos);
        }
        return { ...expr, left, right };
      }
      case "Logical":
        return this.logical(expr, frames);
      case "Assign":
        return {
          ...expr,
          target: this.assignTarget(expr.target, frames),
          value: this.expression(expr.value, frames),
        };
      case "Call":
        return {
          ...expr,
          args: expr.args.map((a) => this.expression(a, frames)),
        };
      case "MethodCall":
        return {
          ...expr,
          // a receiver rooted at a variable is passed live, so its root stays
          receiver: isPlace(expr.receiver)
            ? this.assignTarget(expr.receiver, frames)
            : this.expression(expr.receiver, frames),
          args: expr.args.map((a) => this.expression(a, frames)),
        };
      case "Index":
        return {
          ...expr,
          object: this.expression(expr.object, frames),
          index: this.expression(expr.index, frames),
        };
      case "Property":
        return { ...expr, object: this.expression(expr.object, frames) };
      case "ArrayLiteral":
        return {
          ...expr,
          elements: expr.elements.map((e) => this.expression(e, frames)),
        };
      case "MapLiteral":
        return {
          ...expr,
          entries: expr.entries.map((e) => ({
            key: e.key,
            value: this.expression(e.value, frames),
          })),
        };
      case "Range":
        return {
          ...expr,
          start: this.expression(expr.start, frames),
          end: this.expression(expr.end, frames),
        };
      case "Block":
        return this.block(expr, frames);
      case "If":
        return this.ifExpression(expr, frames);
      case "Switch":
        return this.switchExpression(expr, frames);
      case "Closure":
        // closure bodies see only their parameters and captured copies
        return { ...expr, body: this.expression(expr.body, []) };
    }
  }

  /** The variable an assignment writes to is never replaced by a constant. */
  private assignTarget(
    target: AssignTarget,
    frames: ConstantFrame[]
  ): AssignTarget {
    switch (target.kind) {
      case "Variable":
        return target;
      case "Index":
        return {
          ...target,
          object: this.assignObject(target.object, frames),
          index: this.expression(target.index, frames),
        };
      case "Property":
        return { ...target, object: this.assignObject(target.object, frames) };
    }
  }

  private assignObject(object: Expression, frames: ConstantFrame[]): Expression {
    switch (object.kind) {
      case "Variable":
        return object;
      case "Index":
        return {
          ...object,
          object: this.assignObject(object.object, frames),
          index: this.expression(object.index, frames),
        };
      case "Property":
        return { ...object, object: this.assignObject(object.object, frames) };
      default:
        throw new InternalError(
          `Assignment target rooted at a ${object.kind}.`
        );
    }
  }

  /** Evaluates a literal operation; `undefined` leaves it for run time. */
  private fold(apply: () => Value): LiteralValue | undefined {
    let value: Value;
    try {
      value = apply();
    } catch (e) {
      if (e instanceof RuntimeError) return undefined;
      throw e;
    }
    const max = this.script.dialect.maxStringSize;
    if (value.type === "string" && max > 0 && value.value.length > max) {
      return undefined;
    }
    return toLiteral(value);
  }

  private logical(
    expr: LogicalExpr,
    frames: ConstantFrame[]
  ): Expression {
    const left = this.expression(expr.left, frames);
    const right = this.expression(expr.right, frames);
    const rebuilt = { ...expr, left, right };
    if (left.kind !== "Literal") return rebuilt;

    const a = left.value;
    if (expr.operator === "??") {
      return a.type === "unit" ? right : left;
    }
    if (a.type !== "bool") return rebuilt;
    // the right side is never evaluated
    if (expr.operator === "&&" ? !a.value : a.value) {
      return literal(a, expr.pos);
    }
    if (right.kind === "Literal" && right.value.type === "bool") {
      return literal(right.value, expr.pos);
    }
    return rebuilt;
  }

  private ifExpression(expr: IfExpr, frames: ConstantFrame[]): Expression {
    const condition = this.expression(expr.condition, frames);
    if (condition.kind === "Literal" && condition.value.type === "bool") {
      this.note("Branch with a constant condition removed.", expr.pos);
      if (condition.value.value) return this.block(expr.thenBranch, frames);
      return expr.elseBranch
        ? this.expression(expr.elseBranch, frames)
        : literal({ type: "unit" }, expr.pos);
    }

    const thenBranch = this.block(expr.thenBranch, frames);
    if (!expr.elseBranch) return { ...expr, condition, thenBranch };

    const elseBranch = this.expression(expr.elseBranch, frames);
    switch (elseBranch.kind) {
      case "Block":
      case "If":
        return { ...expr, condition, thenBranch, elseBranch };
      case "Literal":
        // an `else if` whose every branch is gone
        if (elseBranch.value.type === "unit") {
          return {
            ...expr,
            condition,
            thenBranch,
            elseBranch: { kind: "Block", statements: [], pos: elseBranch.pos },
          };
        }
        break;
    }
    throw new InternalError(
      `'else' branch optimized into a ${elseBranch.kind}.`
    );
  }

  private switchExpression(
    expr: SwitchExpr,
    frames: ConstantFrame[]
  ): Expression {
    const subject = this.expression(expr.subject, frames);
    if (subject.kind === "Literal") {
      const value = subject.value;
      const arm = expr.cases.find(
        (c) =>
          c.patterns.length === 0 ||
          c.patterns.some((p) => matchesPattern(p.value, value))
      );
      this.note("Switch on a constant reduced to one arm.", expr.pos);
      return arm
        ? this.expression(arm.body, frames)
        : literal({ type: "unit" }, expr.pos);
    }
    return {
      ...expr,
      subject,
      cases: expr.cases.map((c) => ({
        patterns: c.patterns,
        body: this.expression(c.body, frames),
      })),
    };
  }
}

function unitStatement(pos: Position): Statement {
  return {
    kind: "ExpressionStmt",
    expression: literal({ type: "unit" }, pos),
    pos,
  };
}
