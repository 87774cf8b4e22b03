/**
 * Talk++ compiler configuration.
 */
import { z } from "zod";
import { CompilerError, fail, ok, type Result } from "./errors.js";

export const TARGET_LANGUAGES = ["rust", "python", "javascript", "typescript", "bash"] as const;
export const OPTIMIZATION_LEVELS = ["debug", "release", "size"] as const;

export type TargetLanguage = (typeof TARGET_LANGUAGES)[number];
export type OptimizationLevel = (typeof OPTIMIZATION_LEVELS)[number];

export const compilerConfigSchema = z.object({
  targetLanguage: z.enum(TARGET_LANGUAGES).default("rust"),
  // Passed through to callers; generation does not read it
  optimizationLevel: z.enum(OPTIMIZATION_LEVELS).default("debug"),
  debugMode: z.boolean().default(true),
});

export type CompilerConfig = z.infer<typeof compilerConfigSchema>;

export const DEFAULT_CONFIG: Readonly<CompilerConfig> = Object.freeze(compilerConfigSchema.parse({}));

export function parseCompilerConfig(input: unknown): Result<CompilerConfig> {
  const parsed = compilerConfigSchema.safeParse(input);
  if (parsed.success) {
    return ok(parsed.data);
  }
  const issue = parsed.error.issues[0];
  const where = issue && issue.path.length > 0 ? `'${issue.path.join(".")}': ` : "";
  return fail(CompilerError.config(`${where}${issue?.message ?? "invalid configuration"}`));
}
