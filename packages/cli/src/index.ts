/**
 * @talkpp/cli - CLI entry point re-exports
 */
export { runBuild, defaultOutputPath } from "./cmd-build.js";
export type { BuildOptions } from "./cmd-build.js";
export { runCheck } from "./cmd-check.js";
export { runFmt } from "./cmd-fmt.js";
export { runInfo } from "./cmd-info.js";
export { runConfig } from "./cmd-config.js";
export { resolveSettings } from "./settings.js";
export type { ResolvedSettings, SettingsSource } from "./settings.js";
export { applyOverrides, extensionFor, parseTargetLanguage, parseOptimizationLevel } from "./targets.js";
