/**
 * Talk++ canonical formatter (syntax tree back to source).
 * Output is deterministic, and parsing it again yields an equal tree.
 */
import type * as AST from "./ast.js";
import { actionName } from "./ast.js";
import { CompilerError, capture, type Result } from "./errors.js";

export function format(program: AST.Program): Result<string> {
  return capture(() => {
    const lines = program.statements.map(formatStatement);
    return lines.join("\n") + "\n";
  });
}

function formatStatement(s: AST.Statement): string {
  switch (s.kind) {
    case "Conditional":
      return `${formatConditional(s)}.`;
    case "Action":
      return `${formatAction(s)}.`;
    case "Assignment":
      return `${s.variable}: ${formatValue(s.value)}.`;
    case "Comment":
      return `// ${s.text.replace(/\s*\n\s*/g, " ")}`;
  }
}

function formatConditional(s: AST.ConditionalStatement): string {
  let out = `if ${formatCondition(s.condition)} then`;
  if (s.thenActions.length > 0) {
    out += ` ${formatActionList(s.thenActions)}`;
  }
  if (s.elseActions) {
    out += " else";
    if (s.elseActions.length > 0) {
      out += ` ${formatActionList(s.elseActions)}`;
    }
  }
  return out;
}

function formatActionList(actions: readonly AST.ActionStatement[]): string {
  return actions.map(formatAction).join(", ");
}

// Logical conditions fold to the left; there is no grouping syntax
function formatCondition(c: AST.Condition): string {
  switch (c.kind) {
    case "Event": {
      const head = `${c.subject} ${c.action}`;
      return c.context === undefined ? head : `${head} in ${quote(c.context)}`;
    }
    case "Comparison":
      throw CompilerError.unsupported("comparison condition");
    case "Logical":
      if (c.right.kind !== "Event") {
        throw CompilerError.unsupported("nested logical condition");
      }
      return `${formatCondition(c.left)} ${c.operator === "And" ? "and" : "or"} ${formatCondition(c.right)}`;
  }
}

function formatAction(s: AST.ActionStatement): string {
  const parts = [actionName(s.action)];
  if (s.target) {
    parts.push(formatOperand(s.target));
  }
  if (s.service) {
    if (s.service.method !== undefined) {
      throw CompilerError.unsupported(`service method '${s.service.method}'`);
    }
    parts.push("using", s.service.name);
  }
  for (const [preposition, value] of Object.entries(s.parameters)) {
    parts.push(preposition, formatOperand(value));
  }
  return parts.join(" ");
}

/** Targets and clause values: a string or a run of words. */
function formatOperand(expr: AST.Expression): string {
  switch (expr.kind) {
    case "String":
      return quote(expr.value);
    case "Identifier":
      return expr.name;
    default:
      throw CompilerError.unsupported(`${expr.kind.toLowerCase()} operand`);
  }
}

function formatValue(expr: AST.Expression): string {
  switch (expr.kind) {
    case "Identifier":
      return expr.name;
    case "String":
      return quote(expr.value);
    case "Integer":
      if (expr.value < 0n) {
        throw CompilerError.unsupported("negative integer literal");
      }
      return String(expr.value);
    case "Float":
      return formatFloatLiteral(expr.value);
    case "Boolean":
      throw CompilerError.unsupported("boolean literal");
    case "Property":
      throw CompilerError.unsupported(`property access '.${expr.property}'`);
    case "FunctionCall":
      throw CompilerError.unsupported(`function call '${expr.name}'`);
  }
}

function formatFloatLiteral(value: number): string {
  const text = String(value);
  if (/^\d+\.\d+$/.test(text)) return text;
  if (/^\d+$/.test(text)) return `${text}.0`;
  throw CompilerError.unsupported(`float literal ${text}`);
}

export function quote(value: string): string {
  let out = "";
  for (const ch of value) {
    if (ch === "\\" || ch === "\"") out += `\\${ch}`;
    else if (ch === "\n") out += "\\n";
    else if (ch === "\t") out += "\\t";
    else if (ch === "\r") out += "\\r";
    else out += ch;
  }
  return `"${out}"`;
}
