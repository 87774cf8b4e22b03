#!/usr/bin/env -S node --import tsx
/**
 * talkppc - Talk++ compiler CLI
 */
import { Command } from "commander";
import { runBuild, type BuildOptions } from "./cmd-build.js";
import { runCheck } from "./cmd-check.js";
import { runConfig } from "./cmd-config.js";
import { runFmt } from "./cmd-fmt.js";
import { runInfo } from "./cmd-info.js";
import { VERSION } from "./version.js";

const program = new Command();

program
  .name("talkppc")
  .description("Compile Talk++ rules into serverless handlers")
  .version(VERSION);

program
  .command("build")
  .description("Compile a rule file")
  .argument("<file>", "Talk++ source file")
  .option("-o, --output <path>", "Output file, or - for stdout")
  .option("-t, --target <language>", "rust, python, javascript, typescript or bash")
  .option("--optimization <level>", "debug, release or size")
  .option("--debug", "Include the debug entry point")
  .option("--no-debug", "Leave out the debug entry point")
  .option("--pretty", "Human-readable output", false)
  .action(async (file: string, opts: BuildOptions) => {
    const code = await runBuild(file, opts);
    process.exit(code);
  });

program
  .command("check")
  .description("Validate a rule file without writing output")
  .argument("<file>", "Talk++ source file")
  .option("--pretty", "Human-readable output", false)
  .action(async (file: string, opts: { pretty?: boolean }) => {
    const code = await runCheck(file, opts);
    process.exit(code);
  });

program
  .command("fmt")
  .description("Canonical formatter")
  .argument("<file>", "Talk++ source file")
  .option("--write", "Overwrite file in place", false)
  .action(async (file: string, opts: { write?: boolean }) => {
    const code = await runFmt(file, opts);
    process.exit(code);
  });

program
  .command("info")
  .description("Show version, targets and known services")
  .option("--json", "Output as JSON", false)
  .action(async (opts: { json?: boolean }) => {
    const code = await runInfo(opts);
    process.exit(code);
  });

program
  .command("config")
  .description("Show the effective configuration and its source")
  .option("--json", "Output as JSON", false)
  .action(async (opts: { json?: boolean }) => {
    const code = await runConfig(opts);
    process.exit(code);
  });

// Reject unknown commands before Commander parses (keeps --help from masking the exit code)
const knownCommands = new Set(["build", "check", "fmt", "info", "config", "help"]);
const firstPositional = process.argv.slice(2).find((a) => !a.startsWith("-"));
if (firstPositional && !knownCommands.has(firstPositional)) {
  console.error(`Unknown command: ${firstPositional}`);
  process.exit(1);
}

await program.parseAsync();
