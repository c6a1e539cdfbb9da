import { KEYWORDS } from "../lexer/token.js";
import { formatFloat } from "../runtime/values.js";
import {
  BlockExpr,
  Expression,
  IfExpr,
  LiteralValue,
  Script,
  Statement,
} from "./ast.js";

const INDENT = "  ";

/**
 * Prints a script as source text. Parsing the output yields the same tree,
 * positions aside. Nested operator expressions are always parenthesized.
 */
export function formatScript(script: Script): string {
  return script.statements.map((s) => formatStatement(s, 0)).join("\n");
}

export function formatExpression(expr: Expression): string {
  return expression(expr, 0);
}

export function formatLiteral(value: LiteralValue): string {
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
      return `"${escape(value.value, '"')}"`;
    case "char":
      return `'${escape(value.value, "'")}'`;
  }
}

function escape(text: string, quote: string): string {
  let out = "";
  for (const c of text) {
    switch (c) {
      case "\\":
        out += "\\\\";
        break;
      case "\n":
        out += "\\n";
        break;
      case "\t":
        out += "\\t";
        break;
      case "\r":
        out += "\\r";
        break;
      case "\0":
        out += "\\0";
        break;
      default: {
        const code = c.codePointAt(0) ?? 0;
        if (c === quote) out += `\\${c}`;
        else if (code < 0x20 || code === 0x7f) out += `\\u{${code.toString(16)}}`;
        else out += c;
      }
    }
  }
  return out;
}

function isIdentifier(name: string): boolean {
  return (
    /^[A-Za-z_][A-Za-z0-9_]*$/.test(name) && name !== "_" && !KEYWORDS.has(name)
  );
}

function indent(level: number): string {
  return INDENT.repeat(level);
}

function formatStatement(stmt: Statement, level: number): string {
  return indent(level) + statement(stmt, level);
}

function statement(stmt: Statement, level: number): string {
  switch (stmt.kind) {
    case "Let": {
      const keyword = stmt.constant ? "const" : "let";
      return stmt.initializer
        ? `${keyword} ${stmt.name} = ${expression(stmt.initializer, level)};`
        : `${keyword} ${stmt.name};`;
    }
    case "ExpressionStmt":
      return expressionStatement(stmt.expression, level);
    case "While":
      return `while ${expression(stmt.condition, level)} ${block(stmt.body, level)}`;
    case "DoLoop":
      return `do ${block(stmt.body, level)} ${stmt.until ? "until" : "while"} ${expression(stmt.condition, level)};`;
    case "For": {
      const vars = stmt.indexVariable
        ? `(${stmt.variable}, ${stmt.indexVariable})`
        : stmt.variable;
      return `for ${vars} in ${expression(stmt.iterable, level)} ${block(stmt.body, level)}`;
    }
    case "FnDef":
      return `fn ${stmt.name}(${stmt.params.join(", ")}) ${block(stmt.body, level)}`;
    case "Return":
      return stmt.value ? `return ${expression(stmt.value, level)};` : "return;";
    case "Throw":
      return stmt.value ? `throw ${expression(stmt.value, level)};` : "throw;";
    case "Break":
      return "break;";
    case "Continue":
      return "continue;";
    case "TryCatch": {
      const variable = stmt.errorVariable ? ` (${stmt.errorVariable})` : "";
      return `try ${block(stmt.body, level)} catch${variable} ${block(stmt.handler, level)}`;
    }
  }
}

/**
 * A block, `if` or `switch` at the start of a statement ends the statement, so
 * a longer expression starting with one is wrapped.
 */
function expressionStatement(expr: Expression, level: number): string {
  const text = expression(expr, level);
  if (expr.kind === "Block" || expr.kind === "If" || expr.kind === "Switch") {
    return text;
  }
  const first = leftmost(expr);
  const blockLike =
    first.kind === "Block" || first.kind === "If" || first.kind === "Switch";
  return blockLike ? `(${text});` : `${text};`;
}

function leftmost(expr: Expression): Expression {
  switch (expr.kind) {
    case "Binary":
    case "Logical":
      return leftmost(expr.left);
    case "Range":
      return leftmost(expr.start);
    case "Assign":
      return leftmost(expr.target);
    case "MethodCall":
      return leftmost(expr.receiver);
    case "Index":
    case "Property":
      return leftmost(expr.object);
    default:
      return expr;
  }
}

function block(body: BlockExpr, level: number): string {
  if (body.statements.length === 0) return "{}";
  const lines = body.statements.map((s) => formatStatement(s, level + 1));
  return `{\n${lines.join("\n")}\n${indent(level)}}`;
}

function ifExpression(expr: IfExpr, level: number): string {
  let text = `if ${expression(expr.condition, level)} ${block(expr.thenBranch, level)}`;
  if (expr.elseBranch) {
    text +=
      expr.elseBranch.kind === "If"
        ? ` else ${ifExpression(expr.elseBranch, level)}`
        : ` else ${block(expr.elseBranch, level)}`;
  }
  return text;
}

function isNumber(expr: Expression): boolean {
  return (
    expr.kind === "Literal" &&
    (expr.value.type === "int" || expr.value.type === "float")
  );
}

function isNegativeNumber(expr: Expression): boolean {
  if (expr.kind !== "Literal") return false;
  const { value } = expr;
  return (
    (value.type === "int" && value.value < 0n) ||
    (value.type === "float" && (value.value < 0 || Object.is(value.value, -0)))
  );
}

/** Operands of binary and range operators. */
function operand(expr: Expression, level: number): string {
  switch (expr.kind) {
    case "Binary":
    case "Logical":
    case "Range":
    case "Assign":
    case "Closure":
      return `(${expression(expr, level)})`;
    default:
      return expression(expr, level);
  }
}

/** Receivers of `.`, `[]` and prefix operators. */
function postfixTarget(expr: Expression, level: number): string {
  switch (expr.kind) {
    case "Variable":
    case "Call":
    case "MethodCall":
    case "Index":
    case "Property":
    case "ArrayLiteral":
    case "MapLiteral":
      return expression(expr, level);
    case "Literal":
      return isNegativeNumber(expr)
        ? `(${expression(expr, level)})`
        : expression(expr, level);
    default:
      return `(${expression(expr, level)})`;
  }
}

function args(list: Expression[], level: number): string {
  return list.map((a) => expression(a, level)).join(", ");
}

function expression(expr: Expression, level: number): string {
  switch (expr.kind) {
    case "Literal":
      return formatLiteral(expr.value);
    case "Variable":
      return expr.name;
    case "Unary":
      // `-5` would read back as a negative literal
      return isNumber(expr.operand)
        ? `${expr.operator}(${expression(expr.operand, level)})`
        : `${expr.operator}${postfixTarget(expr.operand, level)}`;
    case "Binary":
    case "Logical":
      return `${operand(expr.left, level)} ${expr.operator} ${operand(expr.right, level)}`;
    case "Range":
      return `${operand(expr.start, level)}${expr.inclusive ? "..=" : ".."}${operand(expr.end, level)}`;
    case "Assign":
      return `${expression(expr.target, level)} ${expr.operator ?? ""}= ${expression(expr.value, level)}`;
    case "Call":
      return `${expr.name}(${args(expr.args, level)})`;
    case "MethodCall":
      return `${postfixTarget(expr.receiver, level)}.${expr.method}(${args(expr.args, level)})`;
    case "Index":
      return `${postfixTarget(expr.object, level)}[${expression(expr.index, level)}]`;
    case "Property":
      return `${postfixTarget(expr.object, level)}.${expr.name}`;
    case "ArrayLiteral":
      return `[${args(expr.elements, level)}]`;
    case "MapLiteral": {
      const entries = expr.entries.map(({ key, value }) => {
        const name = isIdentifier(key) ? key : formatLiteral({ type: "string", value: key });
        return `${name}: ${expression(value, level)}`;
      });
      return `#{${entries.join(", ")}}`;
    }
    case "Block":
      return block(expr, level);
    case "If":
      return ifExpression(expr, level);
    case "Switch": {
      const arms = expr.cases.map((arm) => {
        const patterns =
          arm.patterns.length === 0
            ? "_"
            : arm.patterns.map((p) => formatLiteral(p.value)).join(" | ");
        return `${indent(level + 1)}${patterns} => ${expression(arm.body, level + 1)},`;
      });
      return `switch ${expression(expr.subject, level)} {\n${arms.join("\n")}\n${indent(level)}}`;
    }
    case "Closure":
      return `|${expr.params.join(", ")}| ${expression(expr.body, level)}`;
  }
}
