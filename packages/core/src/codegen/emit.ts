/**
 * Target-independent statement walk. Every backend receives the same
 * sequence of requests for the same program.
 */
import type * as AST from "../ast.js";
import { actionName } from "../ast.js";
import { CompilerError } from "../errors.js";
import type { AssignedValue, Backend } from "./backend.js";
import { lookupService } from "./services.js";

function unsupported(expr: AST.PropertyExpr | AST.FunctionCallExpr): CompilerError {
  return expr.kind === "Property"
    ? CompilerError.unsupported(`property access '.${expr.property}'`)
    : CompilerError.unsupported(`function call '${expr.name}'`);
}

/** `new user` + `registers` -> `new_user_registers` */
export function triggerTag(condition: AST.EventCondition): string {
  return `${condition.subject.split(" ").join("_")}_${condition.action}`;
}

interface Bindings {
  readonly declared: Set<string>;
  /** Every value assigned to each variable, in program order. */
  readonly values: ReadonlyMap<string, readonly AssignedValue[]>;
}

export function emitProgram(program: AST.Program, backend: Backend): string[] {
  const values = new Map<string, AssignedValue[]>();
  for (const statement of program.statements) {
    if (statement.kind !== "Assignment") continue;
    const list = values.get(statement.variable) ?? [];
    list.push(assignedValue(statement.value, backend));
    values.set(statement.variable, list);
  }
  const bindings: Bindings = { declared: new Set<string>(), values };
  return program.statements.flatMap((statement) => emitStatement(statement, backend, bindings));
}

function emitStatement(statement: AST.Statement, backend: Backend, bindings: Bindings): string[] {
  switch (statement.kind) {
    case "Conditional":
      return emitConditional(statement, backend);
    case "Action":
      return emitAction(statement, backend);
    case "Assignment":
      return [emitAssignment(statement, backend, bindings)];
    case "Comment":
      return [backend.comment(statement.text)];
  }
}

function emitConditional(statement: AST.ConditionalStatement, backend: Backend): string[] {
  const condition = emitCondition(statement.condition, backend);
  const thenBody = emitBlock(statement.thenActions, backend);
  const elseBody = statement.elseActions && emitBlock(statement.elseActions, backend);
  return backend.ifElse(condition, thenBody, elseBody);
}

// Placeholder comments are not statements; a block of only those still needs the no-op
function emitBlock(actions: readonly AST.ActionStatement[], backend: Backend): string[] {
  const emitted = actions.map((action) => emitActionCode(action, backend));
  const lines = emitted.flatMap((e) => e.lines);
  if (!emitted.some((e) => e.executable) && backend.emptyBlock !== undefined) {
    lines.push(backend.emptyBlock);
  }
  return lines;
}

export function emitCondition(condition: AST.Condition, backend: Backend): string {
  switch (condition.kind) {
    case "Event":
      return backend.eventCheck(triggerTag(condition));
    case "Comparison":
      return backend.comparison(
        emitExpression(condition.left, backend),
        condition.operator,
        emitExpression(condition.right, backend)
      );
    case "Logical":
      return backend.logical(
        emitCondition(condition.left, backend),
        condition.operator,
        emitCondition(condition.right, backend)
      );
  }
}

export function emitExpression(expr: AST.Expression, backend: Backend): string {
  switch (expr.kind) {
    case "Identifier":
      return backend.reference(backend.variable(expr.name));
    case "String":
    case "Integer":
    case "Float":
    case "Boolean":
      return backend.literal(expr);
    case "Property":
    case "FunctionCall":
      throw unsupported(expr);
  }
}

interface EmittedAction {
  lines: string[];
  /** False when the lines are only comments. */
  executable: boolean;
}

function emitActionCode(statement: AST.ActionStatement, backend: Backend): EmittedAction {
  const description = describeAction(statement);
  if (statement.service) {
    const stub = lookupService(statement.service.name);
    const lines = stub
      ? backend.serviceCall(stub, description)
      : backend.unknownService(statement.service.name, description);
    return { lines, executable: true };
  }
  return { lines: [backend.comment(placeholderText(statement))], executable: false };
}

function emitAction(statement: AST.ActionStatement, backend: Backend): string[] {
  return emitActionCode(statement, backend).lines;
}

function emitAssignment(
  statement: AST.AssignmentStatement,
  backend: Backend,
  { declared, values }: Bindings
): string {
  const value = assignedValue(statement.value, backend);
  const first = !declared.has(statement.variable);
  declared.add(statement.variable);
  return backend.assignment(backend.variable(statement.variable), value, {
    first,
    values: values.get(statement.variable) ?? [value],
  });
}

// The generator does not follow references; only literals get a value
function assignedValue(expr: AST.Expression, backend: Backend): AssignedValue {
  switch (expr.kind) {
    case "String":
    case "Integer":
    case "Float":
    case "Boolean":
      return { kind: "literal", literal: expr, code: backend.literal(expr) };
    case "Identifier":
      return { kind: "unresolved", reference: expr.name };
    case "Property":
    case "FunctionCall":
      throw unsupported(expr);
  }
}

function expressionText(expr: AST.Expression): string {
  switch (expr.kind) {
    case "Identifier":
      return expr.name;
    case "String":
      return JSON.stringify(expr.value);
    case "Integer":
    case "Float":
    case "Boolean":
      return String(expr.value);
    case "Property":
    case "FunctionCall":
      throw unsupported(expr);
  }
}

/** `validate email`, `send "hi" to admin`: the action as written. */
export function describeAction(statement: AST.ActionStatement): string {
  const parts = [actionName(statement.action)];
  if (statement.target) {
    parts.push(expressionText(statement.target));
  }
  for (const [preposition, value] of Object.entries(statement.parameters)) {
    parts.push(preposition, expressionText(value));
  }
  return parts.join(" ");
}

function placeholderText(statement: AST.ActionStatement): string {
  const head = statement.action.kind === "Custom"
    ? `Custom action: ${statement.action.name}`
    : `${statement.action.kind} action`;
  const detail = describeAction(statement).slice(actionName(statement.action).length).trim();
  return detail ? `${head} (${detail})` : head;
}
