/**
 * talkppc check - validate a rule file without writing output
 */
import * as fs from "node:fs";
import { check, formatDiagnostic, formatDiagnostics, toDiagnostic } from "@talkpp/core";
import { EXIT_IO, EXIT_OK, exitCodeFor } from "./exit-codes.js";
import { resolveSettings } from "./settings.js";

export async function runCheck(
  file: string,
  opts: { pretty?: boolean; cwd?: string; homeDir?: string }
): Promise<number> {
  const pretty = !!opts.pretty;

  const settings = resolveSettings(opts.cwd, opts.homeDir);
  if (!settings.ok) {
    console.error(formatDiagnostic(toDiagnostic(settings.error), pretty));
    return exitCodeFor(settings.error);
  }

  let source: string;
  try {
    source = fs.readFileSync(file, "utf-8");
  } catch (e) {
    const msg = e instanceof Error ? e.message : String(e);
    console.error(formatDiagnostic({ code: "E_IO", message: `Error reading file: ${msg}` }, pretty));
    return EXIT_IO;
  }

  const result = check(source, settings.value.config);
  if (!result.ok) {
    console.error(formatDiagnostics([toDiagnostic(result.error, file)], pretty));
    return exitCodeFor(result.error);
  }

  console.log(pretty ? "No errors found." : "[]");
  return EXIT_OK;
}
