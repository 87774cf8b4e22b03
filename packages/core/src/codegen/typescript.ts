/**
 * TypeScript backend: an ES module exporting a typed async handler.
 */
import {
  commentText,
  header,
  indent,
  joinSections,
  type AssignedValue,
  type Backend,
  type Binding,
  type HandlerContext,
} from "./backend.js";
import { ecmaScriptSyntax, stubName } from "./ecmascript.js";
import type { ServiceStub } from "./services.js";

const TYPES = [
  "export interface Event {",
  "    data: Record<string, unknown>;",
  "    context: Record<string, string>;",
  "}",
  "",
  "export interface Response {",
  "    success: boolean;",
  "    data: Record<string, unknown>;",
  "    message: string;",
  "}",
];

function valueType(value: AssignedValue): string {
  if (value.kind === "unresolved") return "null";
  const { literal } = value;
  switch (literal.kind) {
    case "String":
      return "string";
    case "Integer":
      return literal.value <= BigInt(Number.MAX_SAFE_INTEGER) ? "number" : "bigint";
    case "Float":
      return "number";
    case "Boolean":
      return "boolean";
  }
}

/** Annotation for a variable's first binding; undefined where the initializer's type covers every value. */
function declaredType(values: readonly AssignedValue[]): string | undefined {
  const types = [...new Set(values.map(valueType))];
  if (types.length === 1) {
    return types[0] === "null" ? "unknown" : undefined;
  }
  return types.join(" | ");
}

function stubDefinition(stub: ServiceStub): string[] {
  return [
    `async function ${stubName(stub)}(event: Event): Promise<void> {`,
    `    console.log("${stub.service} stub called with context", event.context);`,
    "}",
  ];
}

export const typescriptBackend: Backend = {
  ...ecmaScriptSyntax,
  target: "typescript",

  assignment(variable: string, value: AssignedValue, { first, values }: Binding): string {
    let binding = variable;
    if (first) {
      const type = declaredType(values);
      binding = type === undefined ? `let ${variable}` : `let ${variable}: ${type}`;
    }
    if (value.kind === "literal") {
      return `${binding} = ${value.code};`;
    }
    return `${binding} = null; // unresolved reference: ${commentText(value.reference)}`;
  },

  render({ body, stubs }: HandlerContext): string {
    const handler = [
      "export async function handler(event: Event): Promise<Response> {",
      "    console.log(\"Processing event:\", event);",
      ...(body.length > 0 ? ["", ...indent(body)] : []),
      "",
      "    return { success: true, data: {}, message: \"Function executed successfully\" };",
      "}",
    ];
    return joinSections([[header("typescript", "//")], TYPES, ...stubs.map(stubDefinition), handler]);
  },
};
