import type { CompilerError } from "@talkpp/core";

export const EXIT_OK = 0;
export const EXIT_USAGE = 1;
export const EXIT_COMPILE = 2;
export const EXIT_IO = 4;

export function exitCodeFor(error: CompilerError): number {
  switch (error.kind) {
    case "ConfigError":
      return EXIT_USAGE;
    case "IoError":
      return EXIT_IO;
    default:
      return EXIT_COMPILE;
  }
}
