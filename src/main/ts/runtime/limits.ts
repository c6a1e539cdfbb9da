import { RuntimeError } from "../common/errors.js";
import { Position } from "../common/position.js";
import { DialectConfig } from "../config/dialect.js";
import { Value } from "./values.js";

/**
 * Called with the number of operations performed so far. Returning `true`
 * stops the run with `ExecutionInterrupted`.
 */
export type ProgressCallback = (operations: number) => boolean | void;

export interface BudgetOptions {
  signal?: AbortSignal;
  onProgress?: ProgressCallback;
}

type Limits = Pick<
  DialectConfig,
  "maxCallDepth" | "maxOperations" | "maxStringSize" | "maxArraySize" | "maxMapSize"
>;

/** Per-run counters checked against the dialect's limits. `0` is unlimited. */
export class ExecutionBudget {
  private operations = 0;
  private callDepth = 0;

  constructor(
    private readonly limits: Limits,
    private readonly options: BudgetOptions = {}
  ) {}

  get operationCount(): number {
    return this.operations;
  }

  get depth(): number {
    return this.callDepth;
  }

  /** Counts one operation and checks for cancellation. */
  tick(pos: Position) {
    this.operations++;
    const max = this.limits.maxOperations;
    if (max > 0 && this.operations > max) {
      throw new RuntimeError(
        "ResourceLimitExceeded",
        `Too many operations (limit ${max}).`,
        { pos }
      );
    }
    if (this.options.signal?.aborted) {
      throw new RuntimeError("ExecutionInterrupted", "Execution aborted.", {
        pos,
        cause: this.options.signal.reason,
      });
    }
    if (this.options.onProgress?.(this.operations) === true) {
      throw new RuntimeError(
        "ExecutionInterrupted",
        "Execution stopped by the host.",
        { pos }
      );
    }
  }

  /** Runs `body` one call level deeper. */
  enterCall<T>(name: string, pos: Position, body: () => T): T {
    const max = this.limits.maxCallDepth;
    if (max > 0 && this.callDepth >= max) {
      throw new RuntimeError(
        "ResourceLimitExceeded",
        `Call to '${name}' exceeds the maximum call depth of ${max}.`,
        { pos, identifier: name }
      );
    }
    this.callDepth++;
    try {
      return body();
    } finally {
      this.callDepth--;
    }
  }

  /** Checks the size of a newly built string, array or map. */
  checkSize(value: Value, pos: Position): Value {
    switch (value.type) {
      case "string":
        this.check("string", value.value.length, this.limits.maxStringSize, pos);
        break;
      case "array":
        this.check("array", value.items.length, this.limits.maxArraySize, pos);
        break;
      case "map":
        this.check("map", value.entries.size, this.limits.maxMapSize, pos);
        break;
    }
    return value;
  }

  private check(what: string, size: number, max: number, pos: Position) {
    if (max > 0 && size > max) {
      throw new RuntimeError(
        "ResourceLimitExceeded",
        `The ${what} is too large: ${size} exceeds the limit of ${max}.`,
        { pos }
      );
    }
  }
}
