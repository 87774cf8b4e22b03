/**
 * talkppc info - version, targets and known services
 */
import { SERVICE_STUBS, TARGET_LANGUAGES } from "@talkpp/core";
import { EXIT_OK } from "./exit-codes.js";
import { aliasesFor, extensionFor } from "./targets.js";
import { VERSION } from "./version.js";

export async function runInfo(opts: { json?: boolean }): Promise<number> {
  const targets = TARGET_LANGUAGES.map((name) => ({
    name,
    extension: extensionFor(name),
    aliases: aliasesFor(name),
  }));
  const services = SERVICE_STUBS.map((stub) => ({ name: stub.service, channel: stub.channel }));

  if (opts.json) {
    console.log(JSON.stringify({ name: "talkppc", version: VERSION, targets, services }, null, 2));
    return EXIT_OK;
  }

  console.log(`talkppc ${VERSION}`);
  console.log("Targets:");
  for (const t of targets) {
    const aliases = t.aliases.length > 0 ? `  (alias: ${t.aliases.join(", ")})` : "";
    console.log(`  ${t.name.padEnd(12)}.${t.extension}${aliases}`);
  }
  console.log("Services:");
  for (const s of services) {
    console.log(`  ${s.name.padEnd(12)}${s.channel}`);
  }
  return EXIT_OK;
}
