/**
 * Python backend: an asyncio handler over dataclass event types.
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
  type Backend,
  type HandlerContext,
} from "./backend.js";
import type { ServiceStub } from "./services.js";

const OPERATORS: Record<AST.ComparisonOperator, string> = {
  Equal: "==",
  NotEqual: "!=",
  GreaterThan: ">",
  LessThan: "<",
  GreaterEqual: ">=",
  LessEqual: "<=",
};

const RESERVED = reservedNames("python", (stub) => stub.functionName, [
  "asdict",
  "asyncio",
  "dataclass",
  "field",
  "json",
  "logger",
  "logging",
]);

const PREAMBLE = [
  "#!/usr/bin/env python3",
  header("python", "#"),
  "import asyncio",
  "import json",
  "import logging",
  "from dataclasses import asdict, dataclass, field",
  "from typing import Any, Dict",
  "",
  "logging.basicConfig(level=logging.INFO)",
  "logger = logging.getLogger(__name__)",
];

const TYPES = [
  "@dataclass",
  "class Event:",
  "    data: Dict[str, Any] = field(default_factory=dict)",
  "    context: Dict[str, str] = field(default_factory=dict)",
  "",
  "",
  "@dataclass",
  "class Response:",
  "    success: bool",
  "    data: Dict[str, Any]",
  "    message: str",
];

const MAIN = [
  "if __name__ == \"__main__\":",
  "    result = asyncio.run(handler(Event()))",
  "    print(json.dumps(asdict(result), indent=2))",
];

function stubDefinition(stub: ServiceStub): string[] {
  return [
    `async def ${stub.functionName}(event: Event) -> None:`,
    `    logger.info("${stub.service} stub called with context %s", event.context)`,
  ];
}

export const pythonBackend: Backend = {
  target: "python",
  emptyBlock: "pass",

  comment(text: string): string {
    return `# ${commentText(text)}`;
  },

  eventCheck(tag: string): string {
    return `event.data.get("type") == ${JSON.stringify(tag)}`;
  },

  comparison(left: string, operator: AST.ComparisonOperator, right: string): string {
    return `${left} ${OPERATORS[operator]} ${right}`;
  },

  logical(left: string, operator: AST.LogicalOperator, right: string): string {
    return `(${left}) ${operator === "And" ? "and" : "or"} (${right})`;
  },

  ifElse(condition: string, thenBody: readonly string[], elseBody?: readonly string[]): string[] {
    const lines = [`if ${condition}:`, ...indent(thenBody)];
    if (elseBody) {
      lines.push("else:", ...indent(elseBody));
    }
    return lines;
  },

  variable(name: string): string {
    return escapeName(name, RESERVED);
  },

  reference(name: string): string {
    return name;
  },

  literal(value: AST.Literal): string {
    switch (value.kind) {
      case "String":
        // JSON string syntax is a valid Python string literal
        return JSON.stringify(value.value);
      case "Integer":
        return String(value.value);
      case "Float":
        return formatFloat(value.value);
      case "Boolean":
        return value.value ? "True" : "False";
    }
  },

  assignment(variable: string, value: AssignedValue): string {
    if (value.kind === "literal") {
      return `${variable} = ${value.code}`;
    }
    return `${variable} = None  # unresolved reference: ${commentText(value.reference)}`;
  },

  serviceCall(stub: ServiceStub, description: string): string[] {
    return [
      `# ${stub.service} ${stub.channel} service call: ${commentText(description)}`,
      `logger.info("${stub.startMessage}")`,
      "try:",
      `    await ${stub.functionName}(event)`,
      "except Exception as e:",
      `    logger.error("${stub.failureMessage}: %s", e)`,
      `    return Response(success=False, data={}, message="${stub.failureMessage}")`,
    ];
  },

  unknownService(name: string, description: string): string[] {
    return [
      `# WARNING: service '${name}' is not supported, no call generated: ${commentText(description)}`,
      `logger.warning("Service ${name} not implemented")`,
    ];
  },

  render({ body, stubs }: HandlerContext): string {
    const handler = [
      "async def handler(event: Event) -> Response:",
      "    logger.info(\"Processing event: %s\", event)",
      ...(body.length > 0 ? ["", ...indent(body)] : []),
      "",
      "    return Response(success=True, data={}, message=\"Function executed successfully\")",
    ];
    return joinSections([PREAMBLE, TYPES, ...stubs.map(stubDefinition), handler, MAIN]);
  },
};
