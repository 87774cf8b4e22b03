/**
 * Command-line spellings of targets and optimization levels.
 */
import {
  CompilerError,
  OPTIMIZATION_LEVELS,
  fail,
  ok,
  type CompilerConfig,
  type OptimizationLevel,
  type Result,
  type TargetLanguage,
} from "@talkpp/core";

const TARGET_NAMES: ReadonlyMap<string, TargetLanguage> = new Map<string, TargetLanguage>([
  ["rust", "rust"],
  ["python", "python"],
  ["py", "python"],
  ["javascript", "javascript"],
  ["js", "javascript"],
  ["typescript", "typescript"],
  ["ts", "typescript"],
  ["bash", "bash"],
  ["sh", "bash"],
]);

const EXTENSIONS: Readonly<Record<TargetLanguage, string>> = {
  rust: "rs",
  python: "py",
  javascript: "js",
  typescript: "ts",
  bash: "sh",
};

export function parseTargetLanguage(name: string): TargetLanguage | undefined {
  return TARGET_NAMES.get(name.trim().toLowerCase());
}

export function parseOptimizationLevel(name: string): OptimizationLevel | undefined {
  const wanted = name.trim().toLowerCase();
  return OPTIMIZATION_LEVELS.find((level) => level === wanted);
}

export function extensionFor(target: TargetLanguage): string {
  return EXTENSIONS[target];
}

/** Aliases accepted for a target, excluding its own name. */
export function aliasesFor(target: TargetLanguage): string[] {
  return [...TARGET_NAMES].filter(([name, t]) => t === target && name !== target).map(([name]) => name);
}

export interface ConfigOverrides {
  target?: string;
  optimization?: string;
  debug?: boolean;
}

/** Applies command-line flags on top of a resolved configuration. */
export function applyOverrides(config: CompilerConfig, overrides: ConfigOverrides): Result<CompilerConfig> {
  let { targetLanguage, optimizationLevel, debugMode } = config;
  if (overrides.target !== undefined) {
    const parsed = parseTargetLanguage(overrides.target);
    if (parsed === undefined) {
      return fail(CompilerError.config(`Unknown target language '${overrides.target}'`));
    }
    targetLanguage = parsed;
  }
  if (overrides.optimization !== undefined) {
    const parsed = parseOptimizationLevel(overrides.optimization);
    if (parsed === undefined) {
      return fail(CompilerError.config(`Unknown optimization level '${overrides.optimization}'`));
    }
    optimizationLevel = parsed;
  }
  if (overrides.debug !== undefined) {
    debugMode = overrides.debug;
  }
  return ok({ targetLanguage, optimizationLevel, debugMode });
}
