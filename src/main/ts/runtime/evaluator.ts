import {
  AssignExpr,
  AssignTarget,
  BinaryOperator,
  BlockExpr,
  CallExpr,
  ClosureExpr,
  Expression,
  FnDef,
  ForStmt,
  IfExpr,
  MethodCallExpr,
  RangeExpr,
  Script,
  Statement,
  SwitchExpr,
  TryCatchStmt,
  UnaryOperator,
  isAssignTarget,
  isPlace,
  scriptFunctions,
} from "../ast/ast.js";
import { InternalError, RuntimeError } from "../common/errors.js";
import { Position } from "../common/position.js";
import { Result, err, ok } from "../common/result.js";
import { BudgetOptions, ExecutionBudget } from "./limits.js";
import { applyBinary, applyUnary, matchesPattern } from "./operators.js";
import {
  CallContext,
  FunctionRegistry,
  NativeFunction,
  RegistryEntry,
} from "./registry.js";
import { Scope } from "./scope.js";
import { Abrupt, Completion, isAbrupt, normal } from "./signals.js";
import {
  FnValue,
  UNIT,
  Value,
  array,
  bool,
  char,
  cloneValue,
  displayValue,
  fnPtr,
  int,
  map,
  range,
  rangeEnd,
  str,
  typeOf,
} from "./values.js";

export type EvaluateOptions = BudgetOptions;

/**
 * Runs a compiled script against `scope`. Top-level declarations stay in the
 * scope afterwards. The result is the value of the last statement evaluated,
 * or of a top-level `return`.
 */
export function evaluate(
  script: Script,
  scope: Scope,
  registry: FunctionRegistry,
  options: EvaluateOptions = {}
): Result<Value, RuntimeError> {
  return guard(() => new Interpreter(script, registry, options).run(scope));
}

export interface CallFunctionOptions extends EvaluateOptions {
  /** Run the script's top-level statements in the scope first. Defaults to `true`. */
  evalTopLevel?: boolean;
  /** Drop the bindings the call added to the scope. Defaults to `true`. */
  rewindScope?: boolean;
}

/**
 * Calls a function from the host: a function value bound to `name` in `scope`,
 * or a function defined by `script` or registered in `registry`.
 */
export function callFunction(
  script: Script,
  scope: Scope,
  registry: FunctionRegistry,
  name: string,
  args: Value[],
  options: CallFunctionOptions = {}
): Result<Value, RuntimeError> {
  const { evalTopLevel = true, rewindScope = true, ...budget } = options;
  const size = scope.size;
  return guard(() => {
    const interpreter = new Interpreter(script, registry, budget);
    try {
      if (evalTopLevel) interpreter.run(scope);
      return interpreter.callFromHost(name, args.map(cloneValue), scope);
    } finally {
      if (rewindScope) scope.rewind(size);
    }
  });
}

/** The result is copied out so the host never holds a live binding. */
function guard(run: () => Value): Result<Value, RuntimeError> {
  try {
    return ok(cloneValue(run()));
  } catch (e) {
    if (e instanceof RuntimeError) return err(e);
    if (e instanceof RangeError && /call stack/i.test(e.message)) {
      return err(
        new RuntimeError("ResourceLimitExceeded", "Call stack exhausted.", {
          cause: e,
        })
      );
    }
    throw e;
  }
}

/** An assignable location: a variable, or an element or property below one. */
interface Place {
  type: "place";
  /** The variable the location is rooted at. */
  root: string;
  constant: boolean;
  get(): Value;
  set(value: Value): void;
}

const CLOSURE_NAME = "<closure>";

class Interpreter {
  private readonly functions: FunctionRegistry;
  private readonly budget: ExecutionBudget;

  constructor(
    private readonly script: Script,
    registry: FunctionRegistry,
    options: EvaluateOptions
  ) {
    this.functions = registry.child();
    for (const def of scriptFunctions(script)) {
      this.functions.register(
        { name: def.name, params: def.params.map(() => "any") },
        { kind: "script", def }
      );
    }
    this.budget = new ExecutionBudget(script.dialect, options);
  }

  run(scope: Scope): Value {
    const completion = this.statements(this.script.statements, scope);
    return this.unwindToBoundary(completion);
  }

  /** What a function or the script produces when `completion` reaches it. */
  private unwindToBoundary(completion: Completion): Value {
    switch (completion.type) {
      case "normal":
      case "return":
        return completion.value;
      case "break":
      case "continue":
        throw new RuntimeError(
          "DanglingLoopControl",
          `'${completion.type}' outside of a loop.`,
          { pos: completion.pos }
        );
    }
  }

  // --- Statements ---

  private statements(statements: Statement[], scope: Scope): Completion {
    let last: Value = UNIT;
    for (const stmt of statements) {
      const completion = this.statement(stmt, scope);
      if (isAbrupt(completion)) return completion;
      last = completion.value;
    }
    return normal(last);
  }

  private statement(stmt: Statement, scope: Scope): Completion {
    this.budget.tick(stmt.pos);
    try {
      return this.executeStatement(stmt, scope);
    } catch (e) {
      if (e instanceof RuntimeError) e.at(stmt.pos);
      throw e;
    }
  }

  private executeStatement(stmt: Statement, scope: Scope): Completion {
    switch (stmt.kind) {
      case "Let": {
        let value: Value = UNIT;
        if (stmt.initializer) {
          const init = this.expression(stmt.initializer, scope);
          if (isAbrupt(init)) return init;
          value = init.value;
        }
        scope.define(stmt.name, value, stmt.constant);
        return normal(UNIT);
      }
      case "ExpressionStmt":
        return this.expression(stmt.expression, scope);
      case "While":
        for (;;) {
          const test = this.condition(stmt.condition, scope, "while");
          if (typeof test !== "boolean") return test;
          if (!test) return normal(UNIT);
          const body = this.block(stmt.body, scope);
          if (body.type === "break") return normal(UNIT);
          if (body.type === "return") return body;
        }
      case "DoLoop":
        for (;;) {
          const body = this.block(stmt.body, scope);
          if (body.type === "break") return normal(UNIT);
          if (body.type === "return") return body;
          const test = this.condition(stmt.condition, scope, "do");
          if (typeof test !== "boolean") return test;
          if (test === stmt.until) return normal(UNIT);
        }
      case "For":
        return this.forLoop(stmt, scope);
      case "FnDef":
        return normal(UNIT);
      case "Return": {
        if (!stmt.value) return { type: "return", value: UNIT, pos: stmt.pos };
        const value = this.expression(stmt.value, scope);
        if (isAbrupt(value)) return value;
        return { type: "return", value: value.value, pos: stmt.pos };
      }
      case "Break":
        return { type: "break", pos: stmt.pos };
      case "Continue":
        return { type: "continue", pos: stmt.pos };
      case "Throw": {
        let thrown: Value = UNIT;
        if (stmt.value) {
          const value = this.expression(stmt.value, scope);
          if (isAbrupt(value)) return value;
          thrown = value.value;
        }
        throw new RuntimeError("Thrown", displayValue(thrown), {
          pos: stmt.pos,
          thrown,
        });
      }
      case "TryCatch":
        return this.tryCatch(stmt, scope);
    }
  }

  private forLoop(stmt: ForStmt, scope: Scope): Completion {
    const iterable = this.expression(stmt.iterable, scope);
    if (isAbrupt(iterable)) return iterable;
    const items = this.iterate(iterable.value, stmt.iterable.pos);

    let index = 0n;
    for (const item of items) {
      this.budget.tick(stmt.body.pos);
      scope.pushBlock();
      let body: Completion;
      try {
        scope.define(stmt.variable, item);
        if (stmt.indexVariable) scope.define(stmt.indexVariable, int(index));
        body = this.statements(stmt.body.statements, scope);
      } finally {
        scope.popBlock();
      }
      if (body.type === "break") break;
      if (body.type === "return") return body;
      index++;
    }
    return normal(UNIT);
  }

  private iterate(value: Value, pos: Position): Iterable<Value> {
    switch (value.type) {
      case "array":
        return [...value.items];
      case "string":
        return [...value.value].map(char);
      case "range":
        return intRange(value.start, rangeEnd(value));
      default:
        throw new RuntimeError(
          "NotIterable",
          `Cannot iterate over a value of type ${typeOf(value)}.`,
          { pos }
        );
    }
  }

  private tryCatch(stmt: TryCatchStmt, scope: Scope): Completion {
    const caught = this.attempt(stmt.body, scope);
    if (!(caught instanceof RuntimeError)) return caught;

    scope.pushBlock();
    try {
      if (stmt.errorVariable) {
        scope.define(stmt.errorVariable, caught.thrown ?? str(caught.message));
      }
      return this.statements(stmt.handler.statements, scope);
    } finally {
      scope.popBlock();
    }
  }

  private attempt(body: BlockExpr, scope: Scope): Completion | RuntimeError {
    try {
      return this.block(body, scope);
    } catch (e) {
      if (e instanceof RuntimeError && e.catchable) return e;
      throw e;
    }
  }

  // --- Expressions ---

  private expression(expr: Expression, scope: Scope): Completion {
    this.budget.tick(expr.pos);
    try {
      return this.evaluateExpression(expr, scope);
    } catch (e) {
      if (e instanceof RuntimeError) e.at(expr.pos);
      throw e;
    }
  }

  private evaluateExpression(expr: Expression, scope: Scope): Completion {
    switch (expr.kind) {
      case "Literal":
        return normal(expr.value);
      case "Variable": {
        const binding = scope.lookup(expr.name);
        if (!binding) throw undefinedVariable(expr.name, expr.pos);
        return normal(binding.value);
      }
      case "Unary": {
        const operand = this.expression(expr.operand, scope);
        if (isAbrupt(operand)) return operand;
        return normal(this.unary(expr.operator, operand.value, expr.pos, scope));
      }
      case "Binary": {
        const left = this.expression(expr.left, scope);
        if (isAbrupt(left)) return left;
        const right = this.expression(expr.right, scope);
        if (isAbrupt(right)) return right;
        const result = this.binary(
          expr.operator,
          left.value,
          right.value,
          expr.pos,
          scope
        );
        return normal(this.budget.checkSize(result, expr.pos));
      }
      case "Logical":
        return this.logical(expr.operator, expr.left, expr.right, scope);
      case "Assign":
        return this.assign(expr, scope);
      case "Call":
        return this.call(expr, scope);
      case "MethodCall":
        return this.methodCall(expr, scope);
      case "Index": {
        const object = this.expression(expr.object, scope);
        if (isAbrupt(object)) return object;
        const index = this.expression(expr.index, scope);
        if (isAbrupt(index)) return index;
        return normal(readIndex(object.value, index.value, expr.pos));
      }
      case "Property": {
        const object = this.expression(expr.object, scope);
        if (isAbrupt(object)) return object;
        return normal(this.property(object.value, expr.name, expr.pos, scope));
      }
      case "ArrayLiteral": {
        const items = this.values(expr.elements, scope);
        if (!Array.isArray(items)) return items;
        return normal(
          this.budget.checkSize(array(items.map(cloneValue)), expr.pos)
        );
      }
      case "MapLiteral": {
        const result = map();
        for (const entry of expr.entries) {
          const value = this.expression(entry.value, scope);
          if (isAbrupt(value)) return value;
          result.entries.set(entry.key, cloneValue(value.value));
        }
        return normal(this.budget.checkSize(result, expr.pos));
      }
      case "Range":
        return this.rangeValue(expr, scope);
      case "Block":
        return this.block(expr, scope);
      case "If":
        return this.ifExpression(expr, scope);
      case "Switch":
        return this.switchExpression(expr, scope);
      case "Closure":
        return normal(this.closure(expr, scope));
    }
  }

  private block(block: BlockExpr, scope: Scope): Completion {
    scope.pushBlock();
    try {
      return this.statements(block.statements, scope);
    } finally {
      scope.popBlock();
    }
  }

  /** Evaluates a condition to a boolean, or passes an abrupt completion on. */
  private condition(
    expr: Expression,
    scope: Scope,
    what: string
  ): boolean | Abrupt {
    const value = this.expression(expr, scope);
    if (isAbrupt(value)) return value;
    if (value.value.type !== "bool") {
      throw new RuntimeError(
        "TypeMismatch",
        `Expected a bool for the '${what}' condition, got ${typeOf(value.value)}.`,
        { pos: expr.pos }
      );
    }
    return value.value.value;
  }

  private values(exprs: Expression[], scope: Scope): Value[] | Abrupt {
    const values: Value[] = [];
    for (const expr of exprs) {
      const value = this.expression(expr, scope);
      if (isAbrupt(value)) return value;
      values.push(value.value);
    }
    return values;
  }

  /** Integer bounds of a range, with the end made exclusive. */
  private rangeValue(expr: RangeExpr, scope: Scope): Completion {
    const start = this.expression(expr.start, scope);
    if (isAbrupt(start)) return start;
    const end = this.expression(expr.end, scope);
    if (isAbrupt(end)) return end;
    if (start.value.type !== "int" || end.value.type !== "int") {
      throw new RuntimeError(
        "TypeMismatch",
        `Range bounds must be int, got ${typeOf(start.value)} and ${typeOf(end.value)}.`,
        { pos: expr.pos }
      );
    }
    return normal(range(start.value.value, end.value.value, expr.inclusive));
  }

  private logical(
    operator: "&&" | "||" | "??",
    leftExpr: Expression,
    rightExpr: Expression,
    scope: Scope
  ): Completion {
    const left = this.expression(leftExpr, scope);
    if (isAbrupt(left)) return left;

    if (operator === "??") {
      return left.value.type === "unit" ? this.expression(rightExpr, scope) : left;
    }

    const a = expectBool(operator, left.value, leftExpr.pos);
    if (operator === "&&" ? !a : a) return normal(bool(a));

    const right = this.expression(rightExpr, scope);
    if (isAbrupt(right)) return right;
    return normal(bool(expectBool(operator, right.value, rightExpr.pos)));
  }

  private ifExpression(expr: IfExpr, scope: Scope): Completion {
    const test = this.condition(expr.condition, scope, "if");
    if (typeof test !== "boolean") return test;
    if (test) return this.block(expr.thenBranch, scope);
    if (expr.elseBranch) return this.expression(expr.elseBranch, scope);
    return normal(UNIT);
  }

  private switchExpression(expr: SwitchExpr, scope: Scope): Completion {
    const subject = this.expression(expr.subject, scope);
    if (isAbrupt(subject)) return subject;

    for (const arm of expr.cases) {
      const matches =
        arm.patterns.length === 0 ||
        arm.patterns.some((p) => matchesPattern(p.value, subject.value));
      if (matches) return this.expression(arm.body, scope);
    }
    return normal(UNIT);
  }

  private closure(expr: ClosureExpr, scope: Scope): FnValue {
    const captured = new Map<string, Value>();
    for (const name of expr.captures) {
      // names that are not variables are function calls
      const binding = scope.lookup(name);
      if (binding) captured.set(name, cloneValue(binding.value));
    }
    return {
      type: "fn",
      name: CLOSURE_NAME,
      closure: { params: expr.params, body: expr.body, captured },
    };
  }

  // --- Operators and properties ---

  // custom values take operators from functions registered under the symbol
  private binary(
    operator: BinaryOperator,
    left: Value,
    right: Value,
    pos: Position,
    scope: Scope
  ): Value {
    if (
      (left.type === "custom" || right.type === "custom") &&
      this.functions.has(operator)
    ) {
      return this.invoke(operator, [left, right], pos, scope, false);
    }
    return applyBinary(operator, left, right);
  }

  private unary(
    operator: UnaryOperator,
    operand: Value,
    pos: Position,
    scope: Scope
  ): Value {
    if (operand.type === "custom" && this.functions.has(operator)) {
      return this.invoke(operator, [operand], pos, scope, false);
    }
    return applyUnary(operator, operand);
  }

  /** A missing key on a map reads as `()`. */
  private property(
    object: Value,
    name: string,
    pos: Position,
    scope: Scope
  ): Value {
    switch (object.type) {
      case "map":
        return object.entries.get(name) ?? UNIT;
      case "custom":
        return this.customProperty("get", object, name, [], pos, scope);
      default:
        throw propertyNotFound(object, name, pos);
    }
  }

  /** Calls the `get$name` or `set$name` function registered for a custom value. */
  private customProperty(
    accessor: "get" | "set",
    object: Value,
    name: string,
    args: Value[],
    pos: Position,
    scope: Scope
  ): Value {
    const fn = `${accessor}$${name}`;
    if (!this.functions.has(fn)) throw propertyNotFound(object, name, pos);
    return this.invoke(fn, [object, ...args], pos, scope, true);
  }

  // --- Assignment ---

  private assign(expr: AssignExpr, scope: Scope): Completion {
    const value = this.expression(expr.value, scope);
    if (isAbrupt(value)) return value;

    const place = this.place(expr.target, scope);
    if (place.type !== "place") return place;

    const next = expr.operator
      ? this.binary(expr.operator, place.get(), value.value, expr.pos, scope)
      : cloneValue(value.value);
    place.set(this.budget.checkSize(next, expr.pos));
    return normal(next);
  }

  private place(target: AssignTarget, scope: Scope): Place | Abrupt {
    switch (target.kind) {
      case "Variable": {
        const binding = scope.lookup(target.name);
        if (!binding) throw undefinedVariable(target.name, target.pos);
        return {
          type: "place",
          root: target.name,
          constant: binding.constant,
          get: () => binding.value,
          set: (value) => {
            assertWritable(binding.constant, target.name, target.pos);
            binding.value = value;
          },
        };
      }
      case "Property": {
        const parent = this.parentPlace(target.object, scope);
        if (parent.type !== "place") return parent;
        return {
          type: "place",
          root: parent.root,
          constant: parent.constant,
          get: () => this.property(parent.get(), target.name, target.pos, scope),
          set: (value) => {
            assertWritable(parent.constant, parent.root, target.pos);
            const object = parent.get();
            if (object.type === "custom") {
              this.customProperty(
                "set",
                object,
                target.name,
                [value],
                target.pos,
                scope
              );
              return;
            }
            if (object.type !== "map") {
              throw propertyNotFound(object, target.name, target.pos);
            }
            object.entries.set(target.name, value);
            this.budget.checkSize(object, target.pos);
          },
        };
      }
      case "Index": {
        const parent = this.parentPlace(target.object, scope);
        if (parent.type !== "place") return parent;
        const index = this.expression(target.index, scope);
        if (isAbrupt(index)) return index;
        return {
          type: "place",
          root: parent.root,
          constant: parent.constant,
          get: () => readIndex(parent.get(), index.value, target.pos),
          set: (value) => {
            assertWritable(parent.constant, parent.root, target.pos);
            this.writeIndex(parent, index.value, value, target.pos);
          },
        };
      }
    }
  }

  private parentPlace(object: Expression, scope: Scope): Place | Abrupt {
    if (!isAssignTarget(object)) {
      throw new InternalError(`Assignment target rooted at a ${object.kind}.`);
    }
    return this.place(object, scope);
  }

  private writeIndex(parent: Place, index: Value, value: Value, pos: Position) {
    const object = parent.get();
    switch (object.type) {
      case "array":
        object.items[arrayIndex(object.items.length, index, pos)] = value;
        return;
      case "map":
        object.entries.set(mapKey(index, pos), value);
        this.budget.checkSize(object, pos);
        return;
      case "string": {
        const chars = [...object.value];
        const i = arrayIndex(chars.length, index, pos);
        if (value.type !== "char") {
          throw new RuntimeError(
            "TypeMismatch",
            `Only a char can be stored in a string, got ${typeOf(value)}.`,
            { pos }
          );
        }
        chars[i] = value.value;
        parent.set(str(chars.join("")));
        return;
      }
      default:
        throw notIndexable(object, pos);
    }
  }

  // --- Calls ---

  private call(expr: CallExpr, scope: Scope): Completion {
    const args = this.values(expr.args, scope);
    if (!Array.isArray(args)) return args;

    const variable = scope.lookup(expr.name);
    if (variable && variable.value.type === "fn") {
      return normal(this.callValue(variable.value, args, expr.pos, scope));
    }

    if (expr.name === "Fn" && args.length === 1) {
      return normal(makeFnPointer(args[0], expr.pos));
    }

    return normal(this.callNamed(expr.name, args, expr.pos, scope));
  }

  private methodCall(expr: MethodCallExpr, scope: Scope): Completion {
    // a receiver stored in a variable is passed live so that native methods
    // can update it in place
    let receiver: Value;
    if (isPlace(expr.receiver)) {
      const place = this.place(expr.receiver, scope);
      if (place.type !== "place") return place;
      this.budget.tick(expr.receiver.pos);
      const live = place.get();
      receiver = place.constant ? cloneValue(live) : live;
    } else {
      const value = this.expression(expr.receiver, scope);
      if (isAbrupt(value)) return value;
      receiver = value.value;
    }

    const args = this.values(expr.args, scope);
    if (!Array.isArray(args)) return args;

    if (expr.method === "call" && receiver.type === "fn") {
      return normal(this.callValue(receiver, args, expr.pos, scope));
    }
    return normal(
      this.invoke(expr.method, [receiver, ...args], expr.pos, scope, true)
    );
  }

  callFromHost(name: string, args: Value[], scope: Scope): Value {
    const bound = scope.lookup(name);
    if (bound && bound.value.type === "fn") {
      return this.callValue(bound.value, args, this.script.pos, scope);
    }
    return this.callNamed(name, args, this.script.pos, scope);
  }

  private callNamed(
    name: string,
    args: Value[],
    pos: Position,
    scope: Scope
  ): Value {
    return this.invoke(name, args, pos, scope, false);
  }

  private invoke(
    name: string,
    args: Value[],
    pos: Position,
    scope: Scope,
    liveReceiver: boolean
  ): Value {
    const entry = this.resolve(name, args, pos);
    switch (entry.callable.kind) {
      case "script":
        return this.callScript(entry.callable.def, args, pos);
      case "native": {
        const passed = args.map((arg, i) =>
          liveReceiver && i === 0 ? arg : cloneValue(arg)
        );
        return this.callNative(name, entry.callable.fn, passed, pos, scope);
      }
    }
  }

  private resolve(name: string, args: Value[], pos: Position): RegistryEntry {
    try {
      return this.functions.resolve(name, args);
    } catch (e) {
      if (e instanceof RuntimeError) e.at(pos);
      throw e;
    }
  }

  private callValue(
    fn: FnValue,
    args: Value[],
    pos: Position,
    scope: Scope
  ): Value {
    if (!fn.closure) return this.callNamed(fn.name, args, pos, scope);

    const { params, body, captured } = fn.closure;
    if (params.length !== args.length) {
      throw new RuntimeError(
        "FunctionNotFound",
        `Closure takes ${params.length} arguments, got ${args.length}.`,
        { pos, identifier: fn.name, arity: args.length }
      );
    }

    return this.budget.enterCall(fn.name, pos, () => {
      const local = new Scope();
      for (const [name, value] of captured) local.define(name, value);
      params.forEach((param, i) => local.define(param, args[i]));
      return this.traced(fn.name, () =>
        this.unwindToBoundary(this.expression(body, local))
      );
    });
  }

  private callScript(def: FnDef, args: Value[], pos: Position): Value {
    return this.budget.enterCall(def.name, pos, () => {
      const local = new Scope();
      def.params.forEach((param, i) => local.define(param, args[i]));
      return this.traced(def.name, () =>
        this.unwindToBoundary(this.block(def.body, local))
      );
    });
  }

  private traced(name: string, body: () => Value): Value {
    try {
      return body();
    } catch (e) {
      if (e instanceof RuntimeError) e.trace.push(name);
      throw e;
    }
  }

  private callNative(
    name: string,
    fn: NativeFunction,
    args: Value[],
    pos: Position,
    scope: Scope
  ): Value {
    const context: CallContext = {
      call: (fn, callArgs) =>
        this.callValue(fn, callArgs.map(cloneValue), pos, scope),
      pos,
    };

    let result: Value | undefined;
    try {
      result = fn(args, context);
    } catch (e) {
      if (e instanceof RuntimeError) throw e.at(pos);
      if (e instanceof InternalError) throw e;
      const reason = e instanceof Error ? e.message : String(e);
      throw new RuntimeError(
        "NativeFailure",
        `Function '${name}' failed: ${reason}`,
        { pos, identifier: name, cause: e }
      );
    }
    return this.budget.checkSize(result ?? UNIT, pos);
  }
}

function* intRange(start: bigint, end: bigint): Generator<Value> {
  for (let i = start; i < end; i++) yield int(i);
}

function expectBool(operator: string, value: Value, pos: Position): boolean {
  if (value.type !== "bool") {
    throw new RuntimeError(
      "TypeMismatch",
      `Operands of '${operator}' must be bool, got ${typeOf(value)}.`,
      { pos }
    );
  }
  return value.value;
}

function makeFnPointer(name: Value, pos: Position): FnValue {
  if (name.type !== "string" || !/^[A-Za-z_][A-Za-z0-9_]*$/.test(name.value)) {
    throw new RuntimeError(
      "TypeMismatch",
      `Fn() expects a function name, got ${displayValue(name)}.`,
      { pos }
    );
  }
  return fnPtr(name.value);
}

function assertWritable(constant: boolean, name: string, pos: Position) {
  if (constant) {
    throw new RuntimeError(
      "AssignmentToConstant",
      `Cannot assign to constant '${name}'.`,
      { pos, identifier: name }
    );
  }
}

function undefinedVariable(name: string, pos: Position): RuntimeError {
  return new RuntimeError("UndefinedVariable", `Undefined variable '${name}'.`, {
    pos,
    identifier: name,
  });
}

function propertyNotFound(object: Value, name: string, pos: Position) {
  return new RuntimeError(
    "PropertyNotFound",
    `Property '${name}' not found on ${typeOf(object)}.`,
    { pos, identifier: name }
  );
}

function notIndexable(object: Value, pos: Position) {
  return new RuntimeError(
    "TypeMismatch",
    `Cannot index into a value of type ${typeOf(object)}.`,
    { pos }
  );
}

/** Negative indices count from the end. */
function arrayIndex(length: number, index: Value, pos: Position): number {
  if (index.type !== "int") {
    throw new RuntimeError(
      "TypeMismatch",
      `Index must be an int, got ${typeOf(index)}.`,
      { pos }
    );
  }
  const i = index.value < 0n ? index.value + BigInt(length) : index.value;
  if (i < 0n || i >= BigInt(length)) {
    throw new RuntimeError(
      "IndexOutOfBounds",
      `Index ${index.value} is out of bounds for length ${length}.`,
      { pos }
    );
  }
  return Number(i);
}

function mapKey(index: Value, pos: Position): string {
  if (index.type === "string" || index.type === "char") return index.value;
  throw new RuntimeError(
    "TypeMismatch",
    `Map keys must be strings, got ${typeOf(index)}.`,
    { pos }
  );
}

function readIndex(object: Value, index: Value, pos: Position): Value {
  switch (object.type) {
    case "array":
      return object.items[arrayIndex(object.items.length, index, pos)];
    case "map":
      return object.entries.get(mapKey(index, pos)) ?? UNIT;
    case "string": {
      const chars = [...object.value];
      return char(chars[arrayIndex(chars.length, index, pos)]);
    }
    default:
      throw notIndexable(object, pos);
  }
}
