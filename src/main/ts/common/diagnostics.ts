import { Position, formatPosition } from "./position.js";

export enum DiagnosticSeverity {
  Error,
  Warning,
  Info,
  Hint,
}

export interface Diagnostic {
  severity: DiagnosticSeverity;
  message: string;
  pos?: Position;
  sourceName?: string;
}

export class DiagnosticReporter {
  private diagnostics: Diagnostic[] = [];

  report(diagnostic: Diagnostic) {
    this.diagnostics.push(diagnostic);
    this.printDiagnostic(diagnostic);
  }

  private printDiagnostic(diagnostic: Diagnostic) {
    const severityStr = DiagnosticSeverity[diagnostic.severity].toUpperCase();
    let message = `[${severityStr}] ${diagnostic.message}`;

    if (diagnostic.pos) {
      message = `${formatPosition(diagnostic.pos, diagnostic.sourceName)} - ${message}`;
    }

    if (diagnostic.severity === DiagnosticSeverity.Error) {
      console.error(message);
    } else {
      console.log(message);
    }
  }

  hasErrors(): boolean {
    return this.diagnostics.some(
      (d) => d.severity === DiagnosticSeverity.Error
    );
  }

  getDiagnostics(): Diagnostic[] {
    return this.diagnostics;
  }

  clear() {
    this.diagnostics = [];
  }
}

function computeLineStarts(src: string): number[] {
  const starts = [0];
  for (let i = 0; i < src.length; i++) {
    if (src.charCodeAt(i) === 10 /* \n */) starts.push(i + 1);
  }
  return starts;
}

function getLineText(src: string, lineStarts: number[], line: number): string {
  const idx = Math.max(1, line) - 1;
  const start = lineStarts[idx] ?? 0;
  const end = lineStarts[idx + 1] ?? src.length;
  const raw = src.slice(start, end);
  return raw.endsWith("\n") ? raw.slice(0, -1) : raw;
}

function padLeft(s: string, width: number): string {
  if (s.length >= width) return s;
  return " ".repeat(width - s.length) + s;
}

/**
 * Renders the source line at `pos` with a caret under the column:
 *
 * ```
 * 1 | let s = "abc
 *   |         ^
 * ```
 */
export function formatCodeFrame(source: string, pos: Position): string {
  const lineStarts = computeLineStarts(source);
  const lineNo = Math.min(Math.max(1, pos.line), lineStarts.length);
  const width = String(lineNo).length;
  const text = getLineText(source, lineStarts, lineNo);
  const caret = `${" ".repeat(width)} | ${" ".repeat(Math.max(1, pos.column) - 1)}^`;
  return `${padLeft(String(lineNo), width)} | ${text}\n${caret}`;
}
