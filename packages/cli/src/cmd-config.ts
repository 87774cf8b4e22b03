/**
 * talkppc config - effective compiler configuration and where it came from
 */
import { formatDiagnostic, toDiagnostic } from "@talkpp/core";
import { EXIT_OK, exitCodeFor } from "./exit-codes.js";
import { resolveSettings } from "./settings.js";

export async function runConfig(
  opts: { json?: boolean; cwd?: string; homeDir?: string }
): Promise<number> {
  const resolved = resolveSettings(opts.cwd, opts.homeDir);
  if (!resolved.ok) {
    console.error(formatDiagnostic(toDiagnostic(resolved.error), !opts.json));
    return exitCodeFor(resolved.error);
  }
  const { config, source, path } = resolved.value;

  if (opts.json) {
    console.log(JSON.stringify({ source, path, config }, null, 2));
    return EXIT_OK;
  }

  console.log("Effective Talk++ configuration");
  console.log(`  Source:             ${source}`);
  console.log(`  Path:               ${path ?? "(none)"}`);
  console.log(`  Target language:    ${config.targetLanguage}`);
  console.log(`  Optimization level: ${config.optimizationLevel}`);
  console.log(`  Debug mode:         ${config.debugMode}`);
  return EXIT_OK;
}
