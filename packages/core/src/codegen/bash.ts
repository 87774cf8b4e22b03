/**
 * Bash backend: a `handler` function taking the event as a JSON argument.
 * Bash has no async functions; the handler runs synchronously.
 */
import type * as AST from "../ast.js";
import {
  commentText,
  escapeName,
  formatFloat,
  header,
  indent,
  joinSections,
  reservedNames,
  type AssignedValue,
  type Binding,
  type Backend,
  type HandlerContext,
} from "./backend.js";
import type { ServiceStub } from "./services.js";

const OPERATORS: Record<AST.ComparisonOperator, string> = {
  Equal: "==",
  NotEqual: "!=",
  GreaterThan: "-gt",
  LessThan: "-lt",
  GreaterEqual: "-ge",
  LessEqual: "-le",
};

const RESERVED = reservedNames(undefined, (stub) => stub.functionName, ["_"]);

export function shellQuote(value: string): string {
  return `'${value.replace(/'/g, "'\\''")}'`;
}

function failureJson(message: string): string {
  return shellQuote(JSON.stringify({ success: false, data: {}, message }));
}

const PREAMBLE = [
  "#!/usr/bin/env bash",
  header("bash", "#"),
  "#",
  "# Event:    JSON object {\"data\": {...}, \"context\": {...}}, first argument",
  "# Response: JSON object {\"success\": bool, \"data\": {...}, \"message\": string}, stdout",
  "",
  "set -euo pipefail",
];

const MAIN = [
  "if [[ \"${BASH_SOURCE[0]}\" == \"${0}\" ]]; then",
  "    handler \"${1:-\"{}\"}\"",
  "fi",
];

function stubDefinition(stub: ServiceStub): string[] {
  return [
    `${stub.functionName}() {`,
    `    echo "${stub.service} stub called" >&2`,
    "}",
  ];
}

export const bashBackend: Backend = {
  target: "bash",
  emptyBlock: ":",

  comment(text: string): string {
    return `# ${commentText(text)}`;
  },

  eventCheck(tag: string): string {
    return `[[ "$(jq -r '.data.type // empty' <<< "$event")" == ${shellQuote(tag)} ]]`;
  },

  comparison(left: string, operator: AST.ComparisonOperator, right: string): string {
    return `[[ ${left} ${OPERATORS[operator]} ${right} ]]`;
  },

  // Braces group commands; nested parentheses would read as arithmetic
  logical(left: string, operator: AST.LogicalOperator, right: string): string {
    return `{ ${left}; } ${operator === "And" ? "&&" : "||"} { ${right}; }`;
  },

  ifElse(condition: string, thenBody: readonly string[], elseBody?: readonly string[]): string[] {
    const lines = [`if ${condition}; then`, ...indent(thenBody)];
    if (elseBody) {
      lines.push("else", ...indent(elseBody));
    }
    lines.push("fi");
    return lines;
  },

  variable(name: string): string {
    return escapeName(name, RESERVED);
  },

  reference(name: string): string {
    return `"\${${name}}"`;
  },

  literal(value: AST.Literal): string {
    switch (value.kind) {
      case "String":
        return shellQuote(value.value);
      case "Integer":
        return String(value.value);
      case "Float":
        return formatFloat(value.value);
      case "Boolean":
        return String(value.value);
    }
  },

  assignment(variable: string, value: AssignedValue, { first }: Binding): string {
    const binding = first ? `local ${variable}` : variable;
    if (value.kind === "literal") {
      return `${binding}=${value.code}`;
    }
    return `${binding}=''  # unresolved reference: ${commentText(value.reference)}`;
  },

  serviceCall(stub: ServiceStub, description: string): string[] {
    return [
      `# ${stub.service} ${stub.channel} service call: ${commentText(description)}`,
      `echo "${stub.startMessage}" >&2`,
      `if ! ${stub.functionName} "$event"; then`,
      `    echo "${stub.failureMessage}" >&2`,
      `    echo ${failureJson(stub.failureMessage)}`,
      "    return 1",
      "fi",
    ];
  },

  unknownService(name: string, description: string): string[] {
    return [
      `# WARNING: service '${name}' is not supported, no call generated: ${commentText(description)}`,
      `echo "warning: service ${name} not implemented" >&2`,
    ];
  },

  render({ body, stubs }: HandlerContext): string {
    const handler = [
      "handler() {",
      "    local event=\"$1\"",
      "    echo \"Processing event: $event\" >&2",
      ...(body.length > 0 ? ["", ...indent(body)] : []),
      "",
      `    echo ${shellQuote(JSON.stringify({ success: true, data: {}, message: "Function executed successfully" }))}`,
      "}",
    ];
    return joinSections([PREAMBLE, ...stubs.map(stubDefinition), handler, MAIN]);
  },
};
