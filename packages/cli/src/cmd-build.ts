/**
 * talkppc build - compile a rule file to a target language
 */
import * as fs from "node:fs";
import * as path from "node:path";
import { compile, formatDiagnostic, formatDiagnostics, toDiagnostic } from "@talkpp/core";
import { EXIT_IO, EXIT_OK, exitCodeFor } from "./exit-codes.js";
import { resolveSettings } from "./settings.js";
import { applyOverrides, extensionFor } from "./targets.js";

export interface BuildOptions {
  output?: string;
  target?: string;
  optimization?: string;
  debug?: boolean;
  pretty?: boolean;
  cwd?: string;
  homeDir?: string;
}

/** `rules.talk` -> `rules.py`; a file without an extension gains one. */
export function defaultOutputPath(file: string, extension: string): string {
  const parsed = path.parse(file);
  return path.join(parsed.dir, `${parsed.name}.${extension}`);
}

export async function runBuild(file: string, opts: BuildOptions): Promise<number> {
  const pretty = !!opts.pretty;

  const settings = resolveSettings(opts.cwd, opts.homeDir);
  if (!settings.ok) {
    console.error(formatDiagnostic(toDiagnostic(settings.error), pretty));
    return exitCodeFor(settings.error);
  }
  const config = applyOverrides(settings.value.config, opts);
  if (!config.ok) {
    console.error(formatDiagnostic(toDiagnostic(config.error), pretty));
    return exitCodeFor(config.error);
  }

  let source: string;
  try {
    source = fs.readFileSync(file, "utf-8");
  } catch (e) {
    const msg = e instanceof Error ? e.message : String(e);
    console.error(formatDiagnostic({ code: "E_IO", message: `Error reading file: ${msg}` }, pretty));
    return EXIT_IO;
  }

  const result = compile(source, config.value);
  if (!result.ok) {
    console.error(formatDiagnostics([toDiagnostic(result.error, file)], pretty));
    return exitCodeFor(result.error);
  }

  const target = config.value.targetLanguage;
  const output = opts.output ?? defaultOutputPath(file, extensionFor(target));
  try {
    if (output === "-") {
      process.stdout.write(result.value);
      return EXIT_OK;
    }
    fs.writeFileSync(output, result.value, "utf-8");
  } catch (e) {
    const msg = e instanceof Error ? e.message : String(e);
    console.error(formatDiagnostic({ code: "E_IO", message: `Error writing file: ${msg}` }, pretty));
    return EXIT_IO;
  }

  if (pretty) {
    console.log(`Compiled ${file} -> ${output} (${target})`);
  } else {
    console.log(JSON.stringify({ ok: true, output, target }));
  }
  return EXIT_OK;
}
