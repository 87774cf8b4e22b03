/**
 * JavaScript backend: a CommonJS module exporting an async handler.
 */
import { commentText, header, indent, joinSections, type AssignedValue, type Backend, type Binding, type HandlerContext } from "./backend.js";
import { ecmaScriptSyntax, stubName } from "./ecmascript.js";
import type { ServiceStub } from "./services.js";

const PREAMBLE = [header("javascript", "//"), "\"use strict\";"];

const TYPES = [
  "/**",
  " * @typedef {{ data: Record<string, unknown>, context: Record<string, string> }} Event",
  " * @typedef {{ success: boolean, data: Record<string, unknown>, message: string }} Response",
  " */",
];

const EXPORTS = [
  "if (typeof module !== \"undefined\" && module.exports) {",
  "    module.exports = { handler };",
  "}",
];

function stubDefinition(stub: ServiceStub): string[] {
  return [
    "/** @param {Event} event */",
    `async function ${stubName(stub)}(event) {`,
    `    console.log("${stub.service} stub called with context", event.context);`,
    "}",
  ];
}

export const javascriptBackend: Backend = {
  ...ecmaScriptSyntax,
  target: "javascript",

  assignment(variable: string, value: AssignedValue, { first }: Binding): string {
    const binding = first ? "let " : "";
    if (value.kind === "literal") {
      return `${binding}${variable} = ${value.code};`;
    }
    return `${binding}${variable} = null; // unresolved reference: ${commentText(value.reference)}`;
  },

  render({ body, stubs }: HandlerContext): string {
    const handler = [
      "/**",
      " * @param {Event} event",
      " * @returns {Promise<Response>}",
      " */",
      "async function handler(event) {",
      "    console.log(\"Processing event:\", event);",
      ...(body.length > 0 ? ["", ...indent(body)] : []),
      "",
      "    return { success: true, data: {}, message: \"Function executed successfully\" };",
      "}",
    ];
    return joinSections([PREAMBLE, TYPES, ...stubs.map(stubDefinition), handler, EXPORTS]);
  },
};
