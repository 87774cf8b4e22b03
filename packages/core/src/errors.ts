/**
 * Talk++ compiler error taxonomy.
 *
 * Every stage throws `CompilerError` internally and reports it through a
 * `Result` at its public boundary. The first failure ends the pipeline.
 */

export type CompilerErrorDetail =
  | { kind: "LexicalError"; position: number; line: number; column: number; message: string }
  | { kind: "ParseError"; line: number; column: number; message: string }
  | { kind: "SemanticError"; message: string }
  | { kind: "CodeGenError"; message: string }
  | { kind: "UnsupportedFeature"; feature: string }
  | { kind: "InternalError"; message: string }
  | { kind: "ConfigError"; message: string }
  | { kind: "IoError"; message: string };

export type CompilerErrorKind = CompilerErrorDetail["kind"];

export type Result<T> =
  | { ok: true; value: T }
  | { ok: false; error: CompilerError };

function describe(detail: CompilerErrorDetail): string {
  switch (detail.kind) {
    case "LexicalError":
      return `Lexical error at position ${detail.position}: ${detail.message}`;
    case "ParseError":
      return `Parse error at line ${detail.line}, column ${detail.column}: ${detail.message}`;
    case "SemanticError":
      return `Semantic error: ${detail.message}`;
    case "CodeGenError":
      return `Code generation error: ${detail.message}`;
    case "UnsupportedFeature":
      return `Unsupported feature: ${detail.feature}`;
    case "InternalError":
      return `Internal compiler error: ${detail.message}`;
    case "ConfigError":
      return `Configuration error: ${detail.message}`;
    case "IoError":
      return `IO error: ${detail.message}`;
  }
}

export class CompilerError extends Error {
  readonly detail: CompilerErrorDetail;

  constructor(detail: CompilerErrorDetail) {
    super(describe(detail));
    this.name = "CompilerError";
    this.detail = detail;
  }

  get kind(): CompilerErrorKind {
    return this.detail.kind;
  }

  static lexical(position: number, line: number, column: number, message: string): CompilerError {
    return new CompilerError({ kind: "LexicalError", position, line, column, message });
  }

  static parse(line: number, column: number, message: string): CompilerError {
    return new CompilerError({ kind: "ParseError", line, column, message });
  }

  static semantic(message: string): CompilerError {
    return new CompilerError({ kind: "SemanticError", message });
  }

  static codegen(message: string): CompilerError {
    return new CompilerError({ kind: "CodeGenError", message });
  }

  static unsupported(feature: string): CompilerError {
    return new CompilerError({ kind: "UnsupportedFeature", feature });
  }

  static internal(message: string): CompilerError {
    return new CompilerError({ kind: "InternalError", message });
  }

  static config(message: string): CompilerError {
    return new CompilerError({ kind: "ConfigError", message });
  }

  static io(message: string): CompilerError {
    return new CompilerError({ kind: "IoError", message });
  }
}

export function ok<T>(value: T): Result<T> {
  return { ok: true, value };
}

export function fail<T>(error: CompilerError): Result<T> {
  return { ok: false, error };
}

/**
 * Runs a throwing stage and folds its outcome into a `Result`. Anything that
 * is not a `CompilerError` is an invariant violation and becomes `InternalError`.
 */
export function capture<T>(stage: () => T): Result<T> {
  try {
    return ok(stage());
  } catch (e) {
    if (e instanceof CompilerError) {
      return fail(e);
    }
    const msg = e instanceof Error ? e.message : String(e);
    return fail(CompilerError.internal(msg));
  }
}
