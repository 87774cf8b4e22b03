/**
 * talkppc fmt - canonical formatter command
 */
import * as fs from "node:fs";
import { format, formatDiagnostic, formatDiagnostics, parseSource, toDiagnostic } from "@talkpp/core";
import { EXIT_IO, EXIT_OK, exitCodeFor } from "./exit-codes.js";

/** True when the source has a comment outside string literals. */
export function hasComments(source: string): boolean {
  const withoutStrings = source.replace(/"(?:[^"\\]|\\[\s\S])*"|`(?:[^`\\]|\\[\s\S])*`/g, "\"\"");
  return withoutStrings.includes("//") || withoutStrings.includes("/*");
}

export async function runFmt(file: string, opts: { write?: boolean }): Promise<number> {
  let source: string;
  try {
    source = fs.readFileSync(file, "utf-8");
  } catch (e) {
    const msg = e instanceof Error ? e.message : String(e);
    console.error(formatDiagnostic({ code: "E_IO", message: `Error reading file: ${msg}` }, true));
    return EXIT_IO;
  }

  const program = parseSource(source);
  if (!program.ok) {
    console.error(formatDiagnostics([toDiagnostic(program.error, file)], true));
    return exitCodeFor(program.error);
  }

  const formatted = format(program.value);
  if (!formatted.ok) {
    console.error(formatDiagnostics([toDiagnostic(formatted.error, file)], true));
    return exitCodeFor(formatted.error);
  }

  if (hasComments(source)) {
    console.error("warning: formatting will remove comments from the output.");
  }

  try {
    if (opts.write) {
      fs.writeFileSync(file, formatted.value, "utf-8");
    } else {
      process.stdout.write(formatted.value);
    }
  } catch (e) {
    const msg = e instanceof Error ? e.message : String(e);
    console.error(formatDiagnostic({ code: "E_IO", message: `Error writing file: ${msg}` }, true));
    return EXIT_IO;
  }

  return EXIT_OK;
}
