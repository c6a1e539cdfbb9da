import { BlockExpr, Expression, Statement } from "../ast/ast.js";

/**
 * Names a closure body reads or writes that are not bound inside it, in order
 * of first use.
 */
export function freeVariables(body: Expression, params: string[]): string[] {
  const walker = new FreeVariableWalker(params);
  walker.expression(body);
  return walker.free;
}

class FreeVariableWalker {
  readonly free: string[] = [];
  private readonly scopes: Set<string>[];

  constructor(params: string[]) {
    this.scopes = [new Set(params)];
  }

  private bind(name: string) {
    this.scopes[this.scopes.length - 1].add(name);
  }

  private use(name: string) {
    if (this.scopes.some((s) => s.has(name))) return;
    if (!this.free.includes(name)) this.free.push(name);
  }

  private scoped(fn: () => void, names: string[] = []) {
    this.scopes.push(new Set(names));
    try {
      fn();
    } finally {
      this.scopes.pop();
    }
  }

  private block(block: BlockExpr, names: string[] = []) {
    this.scoped(() => block.statements.forEach((s) => this.statement(s)), names);
  }

  statement(stmt: Statement) {
    switch (stmt.kind) {
      case "Let":
        if (stmt.initializer) this.expression(stmt.initializer);
        this.bind(stmt.name);
        return;
      case "ExpressionStmt":
        return this.expression(stmt.expression);
      case "While":
        this.expression(stmt.condition);
        return this.block(stmt.body);
      case "DoLoop":
        this.block(stmt.body);
        return this.expression(stmt.condition);
      case "For": {
        this.expression(stmt.iterable);
        const names = [stmt.variable];
        if (stmt.indexVariable) names.push(stmt.indexVariable);
        return this.block(stmt.body, names);
      }
      case "Return":
      case "Throw":
        if (stmt.value) this.expression(stmt.value);
        return;
      case "TryCatch":
        this.block(stmt.body);
        return this.block(
          stmt.handler,
          stmt.errorVariable ? [stmt.errorVariable] : []
        );
      case "FnDef":
      case "Break":
      case "Continue":
        return;
    }
  }

  expression(expr: Expression): void {
    switch (expr.kind) {
      case "Literal":
        return;
      case "Variable":
        return this.use(expr.name);
      case "Unary":
        return this.expression(expr.operand);
      case "Binary":
      case "Logical":
        this.expression(expr.left);
        return this.expression(expr.right);
      case "Assign":
        this.expression(expr.value);
        return this.expression(expr.target);
      case "Call":
        // a variable holding a function value can be called by name
        this.use(expr.name);
        return expr.args.forEach((a) => this.expression(a));
      case "MethodCall":
        this.expression(expr.receiver);
        return expr.args.forEach((a) => this.expression(a));
      case "Index":
        this.expression(expr.object);
        return this.expression(expr.index);
      case "Property":
        return this.expression(expr.object);
      case "ArrayLiteral":
        return expr.elements.forEach((e) => this.expression(e));
      case "MapLiteral":
        return expr.entries.forEach((e) => this.expression(e.value));
      case "Range":
        this.expression(expr.start);
        return this.expression(expr.end);
      case "Block":
        return this.block(expr);
      case "If":
        this.expression(expr.condition);
        this.block(expr.thenBranch);
        if (expr.elseBranch) this.expression(expr.elseBranch);
        return;
      case "Switch":
        this.expression(expr.subject);
        return expr.cases.forEach((c) => this.expression(c.body));
      case "Closure":
        return this.scoped(() => this.expression(expr.body), expr.params);
    }
  }
}
