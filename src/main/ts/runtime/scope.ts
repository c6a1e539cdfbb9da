import { RuntimeError } from "../common/errors.js";
import { Value, cloneValue } from "./values.js";

export interface Binding {
  readonly name: string;
  value: Value;
  readonly constant: boolean;
}

/**
 * Variable bindings in declaration order, split into nested blocks. Lookup
 * runs from the most recent binding backwards, so inner declarations shadow
 * outer ones.
 */
export class Scope {
  private readonly bindings: Binding[] = [];
  private readonly blocks: number[] = [];

  /** Number of open blocks. */
  get depth(): number {
    return this.blocks.length;
  }

  /** Number of live bindings, shadowed ones included. */
  get size(): number {
    return this.bindings.length;
  }

  pushBlock() {
    this.blocks.push(this.bindings.length);
  }

  /** Drops every binding made since the matching `pushBlock`. */
  popBlock() {
    const start = this.blocks.pop();
    if (start === undefined) {
      throw new RangeError("popBlock() without a matching pushBlock()");
    }
    this.bindings.length = start;
  }

  /** Drops every binding made after the scope held `size` of them. */
  rewind(size: number) {
    if (size < this.bindings.length) this.bindings.length = size;
  }

  /** A copy of the innermost value bound to `name`. */
  get(name: string): Value | undefined {
    const binding = this.lookup(name);
    return binding ? cloneValue(binding.value) : undefined;
  }

  has(name: string): boolean {
    return this.lookup(name) !== undefined;
  }

  /**
   * Updates the innermost binding of `name`, or adds one to the current block.
   */
  set(name: string, value: Value): this {
    const binding = this.lookup(name);
    if (!binding) return this.define(name, value);
    if (binding.constant) {
      throw new RuntimeError(
        "AssignmentToConstant",
        `Cannot assign to constant '${name}'.`,
        { identifier: name }
      );
    }
    binding.value = cloneValue(value);
    return this;
  }

  setConstant(name: string, value: Value): this {
    return this.define(name, value, true);
  }

  /** Adds a new binding to the current block, shadowing any earlier one. */
  define(name: string, value: Value, constant = false): this {
    this.bindings.push({ name, value: cloneValue(value), constant });
    return this;
  }

  /** The live binding, for in-place updates by the evaluator. */
  lookup(name: string): Binding | undefined {
    for (let i = this.bindings.length - 1; i >= 0; i--) {
      if (this.bindings[i].name === name) return this.bindings[i];
    }
    return undefined;
  }

  /** Visible bindings, innermost last. */
  *entries(): IterableIterator<[string, Value]> {
    const visible = new Map<string, Value>();
    for (const binding of this.bindings) {
      visible.delete(binding.name);
      visible.set(binding.name, binding.value);
    }
    yield* visible;
  }

  /** Visible constant bindings, as seen by the optimizer. */
  constants(): Map<string, Value> {
    const result = new Map<string, Value>();
    const shadowed = new Set<string>();
    for (let i = this.bindings.length - 1; i >= 0; i--) {
      const { name, value, constant } = this.bindings[i];
      if (shadowed.has(name)) continue;
      shadowed.add(name);
      if (constant) result.set(name, value);
    }
    return result;
  }
}
