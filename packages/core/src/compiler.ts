/**
 * Talk++ pipeline: tokenize -> parse -> generate, stopping at the first failure.
 */
import type { Program } from "./ast.js";
import { generate } from "./codegen/index.js";
import { DEFAULT_CONFIG, type CompilerConfig } from "./config.js";
import { ok, type Result } from "./errors.js";
import { tokenize } from "./lexer.js";
import { parse } from "./parser.js";

export function parseSource(source: string): Result<Program> {
  const tokens = tokenize(source);
  if (!tokens.ok) return tokens;
  return parse(tokens.value);
}

export function compile(source: string, config: CompilerConfig = DEFAULT_CONFIG): Result<string> {
  const program = parseSource(source);
  if (!program.ok) return program;
  return generate(program.value, config);
}

/** Full pipeline without keeping the output; returns the tree on success. */
export function check(source: string, config: CompilerConfig = DEFAULT_CONFIG): Result<Program> {
  const program = parseSource(source);
  if (!program.ok) return program;
  const code = generate(program.value, config);
  if (!code.ok) return code;
  return ok(program.value);
}
