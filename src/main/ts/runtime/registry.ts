import { FnDef } from "../ast/ast.js";
import { ConfigError, RuntimeError } from "../common/errors.js";
import { Position } from "../common/position.js";
import { FnValue, Value, typeOf } from "./values.js";

/** A value type name (`"int"`, `"string"`, a custom type name) or `"any"`. */
export type TypeConstraint = string;

export interface FunctionSignature {
  name: string;
  params: TypeConstraint[];
}

/** What a native function can do with the script that called it. */
export interface CallContext {
  /** Calls a function value (a pointer or a closure) with the given arguments. */
  call(fn: FnValue, args: Value[]): Value;
  readonly pos?: Position;
}

/** Returning `undefined` yields `()`. */
export type NativeFunction = (
  args: Value[],
  context: CallContext
) => Value | undefined;

export type Callable =
  | { kind: "native"; fn: NativeFunction }
  | { kind: "script"; def: FnDef };

export interface RegistryEntry {
  signature: FunctionSignature;
  callable: Callable;
}

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;
const ACCESSOR = /^[gs]et\$[A-Za-z_][A-Za-z0-9_]*$/;
// operators a host can define for its custom types
const OPERATORS = new Set([
  "+", "-", "*", "/", "%", "**", "==", "!=", "<", "<=", ">", ">=",
  "&", "|", "^", "<<", ">>", "!",
]);

function isFunctionName(name: string): boolean {
  return IDENTIFIER.test(name) || ACCESSOR.test(name) || OPERATORS.has(name);
}

function signatureKey(signature: FunctionSignature): string {
  return `${signature.name}(${signature.params.join(",")})`;
}

function typedCount(signature: FunctionSignature): number {
  return signature.params.filter((p) => p !== "any").length;
}

function accepts(signature: FunctionSignature, args: Value[]): boolean {
  return (
    signature.params.length === args.length &&
    signature.params.every((p, i) => p === "any" || p === typeOf(args[i]))
  );
}

/**
 * Functions callable from scripts, keyed by name and parameter types.
 *
 * Resolution picks, among entries of the right name and arity whose typed
 * parameters all match, the one with the most typed parameters. A fully typed
 * match therefore beats any match through `any`. Two best matches of equal
 * rank are `AmbiguousFunction`.
 */
export class FunctionRegistry {
  private readonly entries = new Map<string, RegistryEntry>();

  constructor(private readonly parent?: FunctionRegistry) {}

  /** Adds an entry; an identical signature replaces the previous entry. */
  register(signature: FunctionSignature, callable: Callable): this {
    if (!isFunctionName(signature.name)) {
      throw new ConfigError(
        "signature",
        `'${signature.name}' is not a valid function name`
      );
    }
    if (signature.params.some((p) => p.length === 0)) {
      throw new ConfigError(
        "signature",
        `Empty parameter type in signature of '${signature.name}'`
      );
    }
    const copy = { name: signature.name, params: [...signature.params] };
    this.entries.set(signatureKey(copy), { signature: copy, callable });
    return this;
  }

  /** A layer whose entries hide parent entries with the same signature. */
  child(): FunctionRegistry {
    return new FunctionRegistry(this);
  }

  has(name: string): boolean {
    for (const entry of this.entries.values()) {
      if (entry.signature.name === name) return true;
    }
    return this.parent?.has(name) ?? false;
  }

  /** Visible entries, nearest layer first. */
  list(): RegistryEntry[] {
    const seen = new Map<string, RegistryEntry>();
    this.collect(seen);
    return [...seen.values()];
  }

  private collect(seen: Map<string, RegistryEntry>) {
    for (const [key, entry] of this.entries) {
      if (!seen.has(key)) seen.set(key, entry);
    }
    this.parent?.collect(seen);
  }

  resolve(name: string, args: Value[]): RegistryEntry {
    const candidates = this.list().filter(
      (entry) => entry.signature.name === name && accepts(entry.signature, args)
    );

    if (candidates.length === 0) {
      const types = args.map(typeOf).join(", ");
      throw new RuntimeError(
        "FunctionNotFound",
        `Function not found: ${name}(${types})`,
        { identifier: name, arity: args.length }
      );
    }

    const rank = Math.max(...candidates.map((c) => typedCount(c.signature)));
    const best = candidates.filter((c) => typedCount(c.signature) === rank);
    if (best.length > 1) {
      throw new RuntimeError(
        "AmbiguousFunction",
        `Ambiguous call to '${name}': ${best
          .map((c) => signatureKey(c.signature))
          .join(" and ")} both match.`,
        { identifier: name, arity: args.length }
      );
    }
    return best[0];
  }
}

/** Registers a native function. */
export function registerFunction(
  registry: FunctionRegistry,
  signature: FunctionSignature,
  fn: NativeFunction
): FunctionRegistry {
  return registry.register(signature, { kind: "native", fn });
}
