/**
 * Syntax shared by the JavaScript and TypeScript backends.
 */
import type * as AST from "../ast.js";
import { camelCase, commentText, escapeName, formatFloat, indent, reservedNames, type Backend } from "./backend.js";
import type { ServiceStub } from "./services.js";

const OPERATORS: Record<AST.ComparisonOperator, string> = {
  Equal: "===",
  NotEqual: "!==",
  GreaterThan: ">",
  LessThan: "<",
  GreaterEqual: ">=",
  LessEqual: "<=",
};

export function stubName(stub: ServiceStub): string {
  return camelCase(stub.functionName);
}

const RESERVED = reservedNames("ecmascript", stubName, ["console"]);

type SharedSyntax = Pick<
  Backend,
  | "comment"
  | "eventCheck"
  | "comparison"
  | "logical"
  | "ifElse"
  | "variable"
  | "reference"
  | "literal"
  | "serviceCall"
  | "unknownService"
>;

export const ecmaScriptSyntax: SharedSyntax = {
  comment(text: string): string {
    return `// ${commentText(text)}`;
  },

  eventCheck(tag: string): string {
    return `event.data["type"] === ${JSON.stringify(tag)}`;
  },

  comparison(left: string, operator: AST.ComparisonOperator, right: string): string {
    return `${left} ${OPERATORS[operator]} ${right}`;
  },

  logical(left: string, operator: AST.LogicalOperator, right: string): string {
    return `(${left}) ${operator === "And" ? "&&" : "||"} (${right})`;
  },

  ifElse(condition: string, thenBody: readonly string[], elseBody?: readonly string[]): string[] {
    const lines = [`if (${condition}) {`, ...indent(thenBody)];
    if (elseBody) {
      lines.push("} else {", ...indent(elseBody));
    }
    lines.push("}");
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
        return JSON.stringify(value.value);
      case "Integer": {
        const safe = value.value <= BigInt(Number.MAX_SAFE_INTEGER);
        return safe ? String(value.value) : `${value.value}n`;
      }
      case "Float":
        return formatFloat(value.value);
      case "Boolean":
        return String(value.value);
    }
  },

  serviceCall(stub: ServiceStub, description: string): string[] {
    return [
      `// ${stub.service} ${stub.channel} service call: ${commentText(description)}`,
      `console.log("${stub.startMessage}");`,
      "try {",
      `    await ${stubName(stub)}(event);`,
      "} catch (err) {",
      `    console.error("${stub.failureMessage}:", err);`,
      `    return { success: false, data: {}, message: "${stub.failureMessage}" };`,
      "}",
    ];
  },

  unknownService(name: string, description: string): string[] {
    return [
      `// WARNING: service '${name}' is not supported, no call generated: ${commentText(description)}`,
      `console.warn("Service ${name} not implemented");`,
    ];
  },
};
