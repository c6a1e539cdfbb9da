import type { Expression } from "../ast/ast.js";
import { RuntimeError } from "../common/errors.js";

export type Value =
  | UnitValue
  | BoolValue
  | IntValue
  | FloatValue
  | StringValue
  | CharValue
  | ArrayValue
  | MapValue
  | RangeValue
  | FnValue
  | CustomValue;

export interface UnitValue {
  type: "unit";
}

export interface BoolValue {
  type: "bool";
  value: boolean;
}

/** A signed 64-bit integer. */
export interface IntValue {
  type: "int";
  value: bigint;
}

/** Always finite. */
export interface FloatValue {
  type: "float";
  value: number;
}

export interface StringValue {
  type: "string";
  value: string;
}

/** A single Unicode code point. */
export interface CharValue {
  type: "char";
  value: string;
}

export interface ArrayValue {
  type: "array";
  items: Value[];
}

export interface MapValue {
  type: "map";
  entries: Map<string, Value>;
}

/** Integers from `start` up to `end`, produced one at a time when iterated. */
export interface RangeValue {
  type: "range";
  start: bigint;
  end: bigint;
  inclusive: boolean;
}

/**
 * A function pointer: the name of a registered or script function, or a
 * closure carrying its own parameters, body and captured bindings.
 */
export interface FnValue {
  type: "fn";
  name: string;
  closure?: ClosureData;
}

export interface ClosureData {
  params: string[];
  body: Expression;
  captured: Map<string, Value>;
}

/**
 * A host object. The engine never copies or inspects `data`; two custom values
 * are equal only when they hold the same object.
 */
export interface CustomValue {
  type: "custom";
  typeName: string;
  data: unknown;
}

export const INT_MIN = -(1n << 63n);
export const INT_MAX = (1n << 63n) - 1n;

export const UNIT: UnitValue = Object.freeze({ type: "unit" });

export function bool(value: boolean): BoolValue {
  return { type: "bool", value };
}

export function int(value: bigint | number): IntValue {
  const n = typeof value === "number" ? BigInt(value) : value;
  if (n < INT_MIN || n > INT_MAX) {
    throw new RuntimeError("Overflow", `Integer ${n} does not fit in 64 bits.`);
  }
  return { type: "int", value: n };
}

export function float(value: number): FloatValue {
  return { type: "float", value };
}

export function str(value: string): StringValue {
  return { type: "string", value };
}

export function char(value: string): CharValue {
  return { type: "char", value };
}

export function array(items: Value[]): ArrayValue {
  return { type: "array", items };
}

export function map(entries: Iterable<[string, Value]> = []): MapValue {
  return { type: "map", entries: new Map(entries) };
}

export function range(start: bigint, end: bigint, inclusive = false): RangeValue {
  return { type: "range", start, end, inclusive };
}

/** The first integer after the range. */
export function rangeEnd(value: RangeValue): bigint {
  return value.inclusive ? value.end + 1n : value.end;
}

export function fnPtr(name: string): FnValue {
  return { type: "fn", name };
}

export function custom(typeName: string, data: unknown): CustomValue {
  return { type: "custom", typeName, data };
}

/** Type name used in signatures and messages; custom values report their own. */
export function typeOf(value: Value): string {
  return value.type === "custom" ? value.typeName : value.type;
}

/**
 * Copy for a new binding. Containers are copied deeply so that writes through
 * one binding are never visible through another.
 */
export function cloneValue(value: Value): Value {
  switch (value.type) {
    case "array":
      return { type: "array", items: value.items.map(cloneValue) };
    case "map":
      return {
        type: "map",
        entries: new Map(
          [...value.entries].map(([k, v]): [string, Value] => [k, cloneValue(v)])
        ),
      };
    case "unit":
    case "bool":
    case "int":
    case "float":
    case "string":
    case "char":
    case "range":
    case "fn":
    case "custom":
      return value;
  }
}

export function valuesEqual(a: Value, b: Value): boolean {
  switch (a.type) {
    case "unit":
      return b.type === "unit";
    case "bool":
      return b.type === "bool" && b.value === a.value;
    case "string":
      return b.type === "string" && b.value === a.value;
    case "char":
      return b.type === "char" && b.value === a.value;
    case "int":
      if (b.type === "int") return a.value === b.value;
      if (b.type === "float") return Number(a.value) === b.value;
      return false;
    case "float":
      if (b.type === "float") return a.value === b.value;
      if (b.type === "int") return a.value === Number(b.value);
      return false;
    case "array":
      return (
        b.type === "array" &&
        a.items.length === b.items.length &&
        a.items.every((item, i) => valuesEqual(item, b.items[i]))
      );
    case "map": {
      if (b.type !== "map" || a.entries.size !== b.entries.size) return false;
      for (const [key, item] of a.entries) {
        const other = b.entries.get(key);
        if (other === undefined || !valuesEqual(item, other)) return false;
      }
      return true;
    }
    case "range":
      return (
        b.type === "range" &&
        a.start === b.start &&
        rangeEnd(a) === rangeEnd(b)
      );
    case "fn":
      return b.type === "fn" && !a.closure && !b.closure && a.name === b.name;
    case "custom":
      return b.type === "custom" && a.data === b.data;
  }
}

export function formatFloat(value: number): string {
  if (Object.is(value, -0)) return "-0.0";
  const text = String(value);
  return /[.eE]/.test(text) ? text : `${text}.0`;
}

/** Text of a value as shown to users and produced by string concatenation. */
export function displayValue(value: Value): string {
  switch (value.type) {
    case "unit":
      return "()";
    case "bool":
      return String(value.value);
    case "int":
      return value.value.toString();
    case "float":
      return formatFloat(value.value);
    case "string":
    case "char":
      return value.value;
    case "array":
      return `[${value.items.map(debugValue).join(", ")}]`;
    case "map":
      return `#{${[...value.entries]
        .map(([k, v]) => `${JSON.stringify(k)}: ${debugValue(v)}`)
        .join(", ")}}`;
    case "range":
      return `${value.start}..${value.inclusive ? "=" : ""}${value.end}`;
    case "fn":
      return value.closure ? "Fn(<closure>)" : `Fn(${value.name})`;
    case "custom":
      return `<${value.typeName}>`;
  }
}

/** Like `displayValue`, with strings and chars quoted. */
export function debugValue(value: Value): string {
  switch (value.type) {
    case "string":
      return JSON.stringify(value.value);
    case "char":
      return `'${value.value}'`;
    default:
      return displayValue(value);
  }
}

export type JsValue =
  | null
  | undefined
  | boolean
  | number
  | bigint
  | string
  | JsValue[]
  | { [key: string]: JsValue };

/**
 * Converts plain host data into a script value. Whole numbers become `int`;
 * other numbers become `float`.
 */
export function fromJs(input: JsValue): Value {
  if (input === null || input === undefined) return UNIT;
  if (typeof input === "boolean") return bool(input);
  if (typeof input === "bigint") return int(input);
  if (typeof input === "string") return str(input);
  if (typeof input === "number") {
    if (Number.isSafeInteger(input)) return int(input);
    if (!Number.isFinite(input)) {
      throw new RuntimeError("Overflow", `${input} is not a finite number.`);
    }
    return float(input);
  }
  if (Array.isArray(input)) return array(input.map(fromJs));
  return map(
    Object.entries(input).map(([k, v]): [string, Value] => [k, fromJs(v)])
  );
}

/**
 * Converts a script value into plain host data. Integers outside the safe
 * range stay `bigint`; function and custom values are returned as-is at the
 * top level and as their display text inside containers. Ranges become their
 * display text.
 */
export function toJs(value: Value): JsValue | FnValue | CustomValue {
  if (value.type === "fn" || value.type === "custom") return value;
  return toPlain(value);
}

function toPlain(value: Value): JsValue {
  switch (value.type) {
    case "unit":
      return null;
    case "bool":
    case "float":
    case "string":
    case "char":
      return value.value;
    case "int":
      return value.value >= BigInt(Number.MIN_SAFE_INTEGER) &&
        value.value <= BigInt(Number.MAX_SAFE_INTEGER)
        ? Number(value.value)
        : value.value;
    case "array":
      return value.items.map(toPlain);
    case "map":
      // a "__proto__" key must stay an own property
      return Object.fromEntries(
        [...value.entries].map(([k, v]): [string, JsValue] => [k, toPlain(v)])
      );
    case "range":
    case "fn":
    case "custom":
      return displayValue(value);
  }
}
