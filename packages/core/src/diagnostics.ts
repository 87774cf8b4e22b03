/**
 * Talk++ diagnostics: the user-facing rendering of compiler errors.
 */
import type { CompilerError, CompilerErrorKind } from "./errors.js";

export interface Span {
  file: string;
  startLine: number;
  startCol: number;
  endLine: number;
  endCol: number;
}

export interface Diagnostic {
  code: string;
  message: string;
  span?: Span;
  hint?: string;
}

const CODES: Record<CompilerErrorKind, string> = {
  LexicalError: "E_LEX",
  ParseError: "E_PARSE",
  SemanticError: "E_SEMANTIC",
  CodeGenError: "E_CODEGEN",
  UnsupportedFeature: "E_UNSUPPORTED",
  InternalError: "E_INTERNAL",
  ConfigError: "E_CONFIG",
  IoError: "E_IO",
};

export function makeDiag(
  code: string,
  message: string,
  span?: Span,
  hint?: string
): Diagnostic {
  return { code, message, span, hint };
}

export function diagnosticCode(kind: CompilerErrorKind): string {
  return CODES[kind];
}

export function toDiagnostic(error: CompilerError, file: string = "<stdin>"): Diagnostic {
  const d = error.detail;
  switch (d.kind) {
    case "LexicalError":
      return makeDiag(
        diagnosticCode(d.kind),
        d.message,
        { file, startLine: d.line, startCol: d.column, endLine: d.line, endCol: d.column + 1 },
        "Check for invalid characters or unclosed strings."
      );
    case "ParseError":
      return makeDiag(
        diagnosticCode(d.kind),
        d.message,
        { file, startLine: d.line, startCol: d.column, endLine: d.line, endCol: d.column + 1 },
        "Check syntax near this location."
      );
    case "UnsupportedFeature":
      return makeDiag(diagnosticCode(d.kind), `Unsupported feature: ${d.feature}`);
    default:
      return makeDiag(diagnosticCode(d.kind), d.message);
  }
}

export function formatDiagnostic(d: Diagnostic, pretty: boolean): string {
  if (!pretty) {
    return JSON.stringify(d);
  }
  const loc = d.span
    ? `${d.span.file}:${d.span.startLine}:${d.span.startCol}`
    : "<unknown>";
  let out = `error[${d.code}]: ${d.message}\n  --> ${loc}`;
  if (d.hint) {
    out += `\n  hint: ${d.hint}`;
  }
  return out;
}

export function formatDiagnostics(diags: Diagnostic[], pretty: boolean): string {
  if (!pretty) {
    return JSON.stringify(diags);
  }
  return diags.map((d) => formatDiagnostic(d, true)).join("\n\n");
}
