/**
 * @talkpp/core - Talk++ compiler core
 */
export * from "./ast.js";
export * from "./diagnostics.js";
export * from "./errors.js";
export { tokenize, describeToken } from "./lexer.js";
export type { Token, TokenValue, TokenPosition, Keyword, Verb, Punct } from "./lexer.js";
export { parse } from "./parser.js";
export {
  generate,
  BACKENDS,
  SERVICE_REGISTRY,
  SERVICE_STUBS,
  lookupService,
  collectServices,
  triggerTag,
  describeAction,
} from "./codegen/index.js";
export type { Backend, HandlerContext, AssignedValue, ServiceStub } from "./codegen/index.js";
export {
  compilerConfigSchema,
  parseCompilerConfig,
  DEFAULT_CONFIG,
  TARGET_LANGUAGES,
  OPTIMIZATION_LEVELS,
} from "./config.js";
export type { CompilerConfig, TargetLanguage, OptimizationLevel } from "./config.js";
export { compile, check, parseSource } from "./compiler.js";
export { format } from "./formatter.js";
