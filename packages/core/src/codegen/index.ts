/**
 * Talk++ code generator: syntax tree + configuration -> target source text.
 */
import type * as AST from "../ast.js";
import type { CompilerConfig, TargetLanguage } from "../config.js";
import { CompilerError, capture, type Result } from "../errors.js";
import type { Backend } from "./backend.js";
import { bashBackend } from "./bash.js";
import { emitProgram } from "./emit.js";
import { javascriptBackend } from "./javascript.js";
import { pythonBackend } from "./python.js";
import { rustBackend } from "./rust.js";
import { collectServices } from "./services.js";
import { typescriptBackend } from "./typescript.js";

export const BACKENDS: Readonly<Record<TargetLanguage, Backend>> = Object.freeze({
  rust: rustBackend,
  python: pythonBackend,
  javascript: javascriptBackend,
  typescript: typescriptBackend,
  bash: bashBackend,
});

/** Read-only walk; the same program and config always give the same text. */
export function generate(program: AST.Program, config: CompilerConfig): Result<string> {
  return capture(() => {
    const backend: Backend | undefined = BACKENDS[config.targetLanguage];
    if (backend === undefined) {
      throw CompilerError.codegen(`Unknown target language '${String(config.targetLanguage)}'`);
    }
    const body = emitProgram(program, backend);
    return backend.render({ body, stubs: collectServices(program), config });
  });
}

export type { Backend, HandlerContext, AssignedValue } from "./backend.js";
export { SERVICE_REGISTRY, SERVICE_STUBS, lookupService, collectServices } from "./services.js";
export type { ServiceStub } from "./services.js";
export { triggerTag, describeAction } from "./emit.js";
