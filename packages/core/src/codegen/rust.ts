/**
 * Rust backend: an async handler on tokio with serde event types.
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

export function rustString(value: string): string {
  let out = "";
  for (const ch of value) {
    const code = ch.codePointAt(0) ?? 0;
    if (ch === "\\" || ch === "\"") out += `\\${ch}`;
    else if (ch === "\n") out += "\\n";
    else if (ch === "\r") out += "\\r";
    else if (ch === "\t") out += "\\t";
    else if (code < 0x20 || code === 0x7f) out += `\\u{${code.toString(16)}}`;
    else out += ch;
  }
  return `"${out}"`;
}

const RESERVED = reservedNames("rust", (stub) => stub.functionName, ["main"]);

function rustType(literal: AST.Literal): string {
  switch (literal.kind) {
    case "String":
      return "&str";
    case "Integer":
      return "i64";
    case "Float":
      return "f64";
    case "Boolean":
      return "bool";
  }
}

const PREAMBLE = [
  "use anyhow::Result;",
  "use serde::{Deserialize, Serialize};",
  "use std::collections::HashMap;",
];

const TYPES = [
  "#[derive(Debug, Deserialize)]",
  "pub struct Event {",
  "    pub data: serde_json::Value,",
  "    pub context: HashMap<String, String>,",
  "}",
  "",
  "#[derive(Debug, Serialize)]",
  "pub struct Response {",
  "    pub success: bool,",
  "    pub data: serde_json::Value,",
  "    pub message: String,",
  "}",
  "",
  "impl Response {",
  "    pub fn success(message: impl Into<String>) -> Self {",
  "        Self {",
  "            success: true,",
  "            data: serde_json::json!({}),",
  "            message: message.into(),",
  "        }",
  "    }",
  "",
  "    pub fn error(message: impl Into<String>) -> Self {",
  "        Self {",
  "            success: false,",
  "            data: serde_json::json!({}),",
  "            message: message.into(),",
  "        }",
  "    }",
  "}",
];

const BOOTSTRAP = [
  "#[tokio::main]",
  "async fn main() -> Result<()> {",
  "    tracing_subscriber::fmt::init();",
  "",
  "    let event = Event {",
  "        data: serde_json::json!({}),",
  "        context: HashMap::new(),",
  "    };",
  "",
  "    let response = handler(event).await?;",
  "    println!(\"{}\", serde_json::to_string_pretty(&response)?);",
  "",
  "    Ok(())",
  "}",
];

function stubDefinition(stub: ServiceStub): string[] {
  return [
    `async fn ${stub.functionName}(event: &Event) -> Result<()> {`,
    `    tracing::info!("${stub.service} stub called with context {:?}", event.context);`,
    "    Ok(())",
    "}",
  ];
}

export const rustBackend: Backend = {
  target: "rust",

  comment(text: string): string {
    return `// ${commentText(text)}`;
  },

  eventCheck(tag: string): string {
    return `event.data.get("type").and_then(|v| v.as_str()) == Some(${rustString(tag)})`;
  },

  comparison(left: string, operator: AST.ComparisonOperator, right: string): string {
    return `${left} ${OPERATORS[operator]} ${right}`;
  },

  logical(left: string, operator: AST.LogicalOperator, right: string): string {
    return `(${left}) ${operator === "And" ? "&&" : "||"} (${right})`;
  },

  ifElse(condition: string, thenBody: readonly string[], elseBody?: readonly string[]): string[] {
    const lines = [`if ${condition} {`, ...indent(thenBody)];
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
        return rustString(value.value);
      case "Integer":
        return String(value.value);
      case "Float":
        return formatFloat(value.value);
      case "Boolean":
        return String(value.value);
    }
  },

  // `let` shadows, so every assignment binds afresh
  assignment(variable: string, value: AssignedValue): string {
    if (value.kind === "literal") {
      return `let ${variable}: ${rustType(value.literal)} = ${value.code};`;
    }
    return `let ${variable}: serde_json::Value = serde_json::Value::Null; // unresolved reference: ${commentText(value.reference)}`;
  },

  serviceCall(stub: ServiceStub, description: string): string[] {
    return [
      `// ${stub.service} ${stub.channel} service call: ${commentText(description)}`,
      `tracing::info!("${stub.startMessage}");`,
      `if let Err(e) = ${stub.functionName}(&event).await {`,
      `    tracing::error!("${stub.failureMessage}: {}", e);`,
      `    return Ok(Response::error("${stub.failureMessage}"));`,
      "}",
    ];
  },

  unknownService(name: string, description: string): string[] {
    return [
      `// WARNING: service '${name}' is not supported, no call generated: ${commentText(description)}`,
      `tracing::warn!("Service ${name} not implemented");`,
    ];
  },

  render({ body, stubs, config }: HandlerContext): string {
    const handler = [
      "pub async fn handler(event: Event) -> Result<Response> {",
      "    tracing::info!(\"Processing event: {:?}\", event);",
      ...(body.length > 0 ? ["", ...indent(body)] : []),
      "",
      "    Ok(Response::success(\"Function executed successfully\"))",
      "}",
    ];
    return joinSections([
      [header("rust", "//"), ...PREAMBLE],
      TYPES,
      ...stubs.map(stubDefinition),
      config.debugMode ? BOOTSTRAP : [],
      handler,
    ]);
  },
};
