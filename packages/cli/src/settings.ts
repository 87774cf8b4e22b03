/**
 * Compiler settings file lookup.
 * Precedence: ./.talkpprc.json > ~/.talkpp/config.json > defaults
 */
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import {
  CompilerError,
  DEFAULT_CONFIG,
  fail,
  ok,
  parseCompilerConfig,
  type CompilerConfig,
  type Result,
} from "@talkpp/core";

export type SettingsSource = "project" | "user" | "default";

export interface ResolvedSettings {
  config: CompilerConfig;
  source: SettingsSource;
  path: string | null;
}

export const PROJECT_FILE = ".talkpprc.json";

export function projectSettingsPath(cwd?: string): string {
  return path.join(cwd ?? process.cwd(), PROJECT_FILE);
}

export function userSettingsPath(homeDir?: string): string {
  return path.join(homeDir ?? os.homedir(), ".talkpp", "config.json");
}

/**
 * The first settings file found wins. A file that exists but does not hold
 * a valid configuration is an error, not a fall-through.
 */
export function resolveSettings(cwd?: string, homeDir?: string): Result<ResolvedSettings> {
  const candidates: [SettingsSource, string][] = [
    ["project", projectSettingsPath(cwd)],
    ["user", userSettingsPath(homeDir)],
  ];

  for (const [source, filePath] of candidates) {
    if (!fs.existsSync(filePath)) continue;
    const loaded = loadSettingsFile(filePath);
    if (!loaded.ok) return loaded;
    return ok({ config: loaded.value, source, path: filePath });
  }

  return ok<ResolvedSettings>({ config: { ...DEFAULT_CONFIG }, source: "default", path: null });
}

function loadSettingsFile(filePath: string): Result<CompilerConfig> {
  let raw: string;
  try {
    raw = fs.readFileSync(filePath, "utf-8");
  } catch (e) {
    const msg = e instanceof Error ? e.message : String(e);
    return fail(CompilerError.io(`Error reading ${filePath}: ${msg}`));
  }

  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (e) {
    const msg = e instanceof Error ? e.message : String(e);
    return fail(CompilerError.config(`${filePath}: ${msg}`));
  }

  const parsed = parseCompilerConfig(data);
  if (!parsed.ok) {
    return fail(CompilerError.config(`${filePath}: ${describeConfigError(parsed.error)}`));
  }
  return parsed;
}

function describeConfigError(error: CompilerError): string {
  return error.detail.kind === "ConfigError" ? error.detail.message : error.message;
}
