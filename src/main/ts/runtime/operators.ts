import { BinaryOperator, LiteralValue, UnaryOperator } from "../ast/ast.js";
import { RuntimeError } from "../common/errors.js";
import {
  INT_MAX,
  INT_MIN,
  Value,
  array,
  bool,
  cloneValue,
  displayValue,
  float,
  int,
  rangeEnd,
  str,
  typeOf,
  valuesEqual,
} from "./values.js";

/**
 * Operator semantics shared by the evaluator and the optimizer's constant
 * folder. Failures are thrown as `RuntimeError` without a position; callers
 * attach one.
 */
export function applyBinary(
  operator: BinaryOperator,
  left: Value,
  right: Value
): Value {
  switch (operator) {
    case "==":
      return bool(valuesEqual(left, right));
    case "!=":
      return bool(!valuesEqual(left, right));
    case "<":
    case "<=":
    case ">":
    case ">=":
      return bool(compare(operator, left, right));
    case "in":
      return bool(contains(right, left));
    case "+":
      return add(left, right);
    case "-":
    case "*":
    case "/":
    case "%":
    case "**":
      return arithmetic(operator, left, right);
    case "&":
    case "|":
    case "^":
      return bitwise(operator, left, right);
    case "<<":
    case ">>":
      return shift(operator, left, right);
  }
}

export function applyUnary(operator: UnaryOperator, operand: Value): Value {
  switch (operator) {
    case "!":
      if (operand.type === "bool") return bool(!operand.value);
      break;
    case "+":
      if (operand.type === "int" || operand.type === "float") return operand;
      break;
    case "-":
      if (operand.type === "int") return checked(-operand.value);
      if (operand.type === "float") return float(-operand.value);
      break;
  }
  throw new RuntimeError(
    "TypeMismatch",
    `Cannot apply '${operator}' to ${typeOf(operand)}.`
  );
}

/** Switch arms match on type and value: `1` does not match `1.0`. */
export function matchesPattern(pattern: LiteralValue, value: Value): boolean {
  switch (pattern.type) {
    case "unit":
      return value.type === "unit";
    case "bool":
      return value.type === "bool" && value.value === pattern.value;
    case "int":
      return value.type === "int" && value.value === pattern.value;
    case "float":
      return value.type === "float" && value.value === pattern.value;
    case "string":
      return value.type === "string" && value.value === pattern.value;
    case "char":
      return value.type === "char" && value.value === pattern.value;
  }
}

function mismatch(operator: string, left: Value, right: Value): RuntimeError {
  return new RuntimeError(
    "TypeMismatch",
    `Cannot apply '${operator}' to ${typeOf(left)} and ${typeOf(right)}.`
  );
}

function checked(value: bigint): Value {
  if (value < INT_MIN || value > INT_MAX) {
    throw new RuntimeError("Overflow", "Integer overflow.");
  }
  return int(value);
}

function finite(value: number): Value {
  if (!Number.isFinite(value)) {
    throw new RuntimeError("Overflow", "Floating-point overflow.");
  }
  return float(value);
}

function asNumber(value: Value): number | undefined {
  if (value.type === "int") return Number(value.value);
  if (value.type === "float") return value.value;
  return undefined;
}

function add(left: Value, right: Value): Value {
  if (left.type === "string" || right.type === "string") {
    return str(displayValue(left) + displayValue(right));
  }
  if (left.type === "char" && right.type === "char") {
    return str(left.value + right.value);
  }
  if (left.type === "array" && right.type === "array") {
    return array([...left.items, ...right.items].map(cloneValue));
  }
  return arithmetic("+", left, right);
}

function arithmetic(
  operator: "+" | "-" | "*" | "/" | "%" | "**",
  left: Value,
  right: Value
): Value {
  if (left.type === "int" && right.type === "int") {
    return integerArithmetic(operator, left.value, right.value);
  }

  const a = asNumber(left);
  const b = asNumber(right);
  if (a === undefined || b === undefined) {
    throw mismatch(operator, left, right);
  }

  switch (operator) {
    case "+":
      return finite(a + b);
    case "-":
      return finite(a - b);
    case "*":
      return finite(a * b);
    case "/":
      if (b === 0) throw new RuntimeError("DivisionByZero", "Division by zero.");
      return finite(a / b);
    case "%":
      if (b === 0) throw new RuntimeError("DivisionByZero", "Division by zero.");
      return finite(a % b);
    case "**": {
      const result = Math.pow(a, b);
      if (Number.isNaN(result)) {
        throw new RuntimeError(
          "Arithmetic",
          `${a} ** ${b} has no real result.`
        );
      }
      return finite(result);
    }
  }
}

function integerArithmetic(
  operator: "+" | "-" | "*" | "/" | "%" | "**",
  a: bigint,
  b: bigint
): Value {
  switch (operator) {
    case "+":
      return checked(a + b);
    case "-":
      return checked(a - b);
    case "*":
      return checked(a * b);
    case "/":
      if (b === 0n) throw new RuntimeError("DivisionByZero", "Division by zero.");
      return checked(a / b);
    case "%":
      if (b === 0n) throw new RuntimeError("DivisionByZero", "Division by zero.");
      return checked(a % b);
    case "**":
      return power(a, b);
  }
}

function power(base: bigint, exponent: bigint): Value {
  if (exponent < 0n) {
    throw new RuntimeError(
      "Arithmetic",
      `Integer raised to a negative power: ${base} ** ${exponent}.`
    );
  }
  if (base === 0n || base === 1n) return int(exponent === 0n ? 1n : base);
  if (base === -1n) return int(exponent % 2n === 0n ? 1n : -1n);
  // any other base overflows well before this
  if (exponent > 64n) throw new RuntimeError("Overflow", "Integer overflow.");
  return checked(base ** exponent);
}

function bitwise(operator: "&" | "|" | "^", left: Value, right: Value): Value {
  if (left.type === "int" && right.type === "int") {
    switch (operator) {
      case "&":
        return int(left.value & right.value);
      case "|":
        return int(left.value | right.value);
      case "^":
        return int(left.value ^ right.value);
    }
  }
  // non-short-circuiting boolean forms
  if (left.type === "bool" && right.type === "bool") {
    switch (operator) {
      case "&":
        return bool(left.value && right.value);
      case "|":
        return bool(left.value || right.value);
      case "^":
        return bool(left.value !== right.value);
    }
  }
  throw mismatch(operator, left, right);
}

function shift(operator: "<<" | ">>", left: Value, right: Value): Value {
  if (left.type !== "int" || right.type !== "int") {
    throw mismatch(operator, left, right);
  }
  const amount = right.value;
  if (amount < 0n || amount > 63n) {
    throw new RuntimeError(
      "Arithmetic",
      `Shift amount ${amount} is outside 0..63.`
    );
  }
  return operator === "<<"
    ? int(BigInt.asIntN(64, left.value << amount))
    : int(left.value >> amount);
}

function compare(
  operator: "<" | "<=" | ">" | ">=",
  left: Value,
  right: Value
): boolean {
  let order: number;
  if (left.type === "int" && right.type === "int") {
    order = left.value < right.value ? -1 : left.value > right.value ? 1 : 0;
  } else if (
    (left.type === "string" && right.type === "string") ||
    (left.type === "char" && right.type === "char")
  ) {
    order = left.value < right.value ? -1 : left.value > right.value ? 1 : 0;
  } else {
    const a = asNumber(left);
    const b = asNumber(right);
    if (a === undefined || b === undefined) {
      throw mismatch(operator, left, right);
    }
    order = a < b ? -1 : a > b ? 1 : 0;
  }

  switch (operator) {
    case "<":
      return order < 0;
    case "<=":
      return order <= 0;
    case ">":
      return order > 0;
    case ">=":
      return order >= 0;
  }
}

function contains(container: Value, item: Value): boolean {
  switch (container.type) {
    case "array":
      return container.items.some((element) => valuesEqual(element, item));
    case "map":
      if (item.type === "string" || item.type === "char") {
        return container.entries.has(item.value);
      }
      break;
    case "string":
      if (item.type === "string" || item.type === "char") {
        return container.value.includes(item.value);
      }
      break;
    case "range":
      if (item.type === "int") {
        return item.value >= container.start && item.value < rangeEnd(container);
      }
      break;
  }
  throw mismatch("in", item, container);
}
