import { ConfigError } from "../common/errors.js";

export type OptimizationLevel = "none" | "simple" | "full";

/**
 * The language variant and runtime limits an engine accepts. Limits set to
 * `0` are unlimited.
 */
export interface DialectConfig {
  /** `|a, b| expr` closures. */
  allowClosures: boolean;
  /** Float literals such as `1.5` and `2e10`. */
  allowDecimalLiterals: boolean;
  allowSwitch: boolean;
  /** `while`, `loop`, `do` and `for`. */
  allowLooping: boolean;
  /**
   * Reject `break`/`continue` outside a loop while parsing instead of failing
   * with `DanglingLoopControl` when evaluated.
   */
  strictLoopControl: boolean;
  maxCallDepth: number;
  maxOperations: number;
  maxExpressionDepth: number;
  maxStringSize: number;
  maxArraySize: number;
  maxMapSize: number;
  optimizationLevel: OptimizationLevel;
}

export const DEFAULT_DIALECT: Readonly<DialectConfig> = Object.freeze({
  allowClosures: true,
  allowDecimalLiterals: true,
  allowSwitch: true,
  allowLooping: true,
  strictLoopControl: false,
  maxCallDepth: 64,
  maxOperations: 0,
  maxExpressionDepth: 64,
  maxStringSize: 0,
  maxArraySize: 0,
  maxMapSize: 0,
  optimizationLevel: "simple",
});

const FLAGS = [
  "allowClosures",
  "allowDecimalLiterals",
  "allowSwitch",
  "allowLooping",
  "strictLoopControl",
] as const;

const LIMITS = [
  "maxCallDepth",
  "maxOperations",
  "maxExpressionDepth",
  "maxStringSize",
  "maxArraySize",
  "maxMapSize",
] as const;

const LEVELS: readonly OptimizationLevel[] = ["none", "simple", "full"];

function isOptimizationLevel(value: unknown): value is OptimizationLevel {
  return LEVELS.some((level) => level === value);
}

/**
 * Fills in defaults and checks every option. Throws `ConfigError` on the first
 * invalid value.
 */
export function resolveDialect(
  overrides: Partial<DialectConfig> = {}
): DialectConfig {
  const dialect: DialectConfig = { ...DEFAULT_DIALECT, ...overrides };

  for (const flag of FLAGS) {
    if (typeof dialect[flag] !== "boolean") {
      throw new ConfigError(flag, `'${flag}' must be a boolean`);
    }
  }

  for (const limit of LIMITS) {
    const value = dialect[limit];
    if (!Number.isSafeInteger(value) || value < 0) {
      throw new ConfigError(
        limit,
        `'${limit}' must be a non-negative integer, got ${String(value)}`
      );
    }
  }

  if (!isOptimizationLevel(dialect.optimizationLevel)) {
    throw new ConfigError(
      "optimizationLevel",
      `'optimizationLevel' must be one of ${LEVELS.join(", ")}`
    );
  }

  return dialect;
}
