import { Position } from "../common/position.js";
import { Value } from "./values.js";

/**
 * How evaluating a statement or expression ended. Anything but `normal` unwinds
 * to the construct that consumes it: a loop for `break`/`continue`, a function
 * call or the script for `return`.
 */
export type Completion = Normal | Return | Break | Continue;

export interface Normal {
  type: "normal";
  value: Value;
}

export interface Return {
  type: "return";
  value: Value;
  pos: Position;
}

export interface Break {
  type: "break";
  pos: Position;
}

export interface Continue {
  type: "continue";
  pos: Position;
}

export type Abrupt = Return | Break | Continue;

export function normal(value: Value): Normal {
  return { type: "normal", value };
}

export function isAbrupt(completion: Completion): completion is Abrupt {
  return completion.type !== "normal";
}
