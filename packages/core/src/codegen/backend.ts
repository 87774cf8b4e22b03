/**
 * Surface syntax contract for one target language.
 *
 * The shared emitter decides what each statement means; a backend only
 * decides how it is spelled.
 */
import type * as AST from "../ast.js";
import type { CompilerConfig, TargetLanguage } from "../config.js";
import reservedWords from "./reserved-words.json" with { type: "json" };
import { SERVICE_STUBS, type ServiceStub } from "./services.js";

export const INDENT = "    ";

export type AssignedValue =
  | { kind: "literal"; literal: AST.Literal; code: string }
  | { kind: "unresolved"; reference: string };

/** What the handler does with one variable, seen from one of its assignments. */
export interface Binding {
  /** The variable's first assignment in the handler. */
  readonly first: boolean;
  /** Every value the handler assigns to the variable, in order. */
  readonly values: readonly AssignedValue[];
}

export interface HandlerContext {
  /** Handler body, not yet indented. */
  body: readonly string[];
  stubs: readonly ServiceStub[];
  config: CompilerConfig;
}

export interface Backend {
  readonly target: TargetLanguage;
  /** Statement used for a block with no actions, where the target needs one. */
  readonly emptyBlock?: string;
  comment(text: string): string;
  eventCheck(tag: string): string;
  comparison(left: string, operator: AST.ComparisonOperator, right: string): string;
  logical(left: string, operator: AST.LogicalOperator, right: string): string;
  ifElse(condition: string, thenBody: readonly string[], elseBody?: readonly string[]): string[];
  /** Spelling of a program variable that cannot collide with the target's own names. */
  variable(name: string): string;
  reference(name: string): string;
  literal(value: AST.Literal): string;
  assignment(variable: string, value: AssignedValue, binding: Binding): string;
  serviceCall(stub: ServiceStub, description: string): string[];
  unknownService(name: string, description: string): string[];
  render(context: HandlerContext): string;
}

export function indent(lines: readonly string[], depth: number = 1): string[] {
  const prefix = INDENT.repeat(depth);
  return lines.map((line) => (line === "" ? line : prefix + line));
}

/** Comments are single-line in every target. */
export function commentText(text: string): string {
  return text.replace(/\s*[\r\n\u2028\u2029]+\s*/g, " ");
}

/** Appends `_` to names the target reserves. */
export function escapeName(name: string, reserved: ReadonlySet<string>): string {
  return reserved.has(name) ? `${name}_` : name;
}

/**
 * Keywords of `language` plus the names generated code defines itself:
 * the handler, its `event` parameter and the service stubs.
 */
export function reservedNames(
  language: keyof typeof reservedWords | undefined,
  stubName: (stub: ServiceStub) => string,
  extra: readonly string[] = []
): ReadonlySet<string> {
  return new Set([
    ...(language === undefined ? [] : reservedWords[language]),
    "event",
    "handler",
    ...SERVICE_STUBS.map(stubName),
    ...extra,
  ]);
}

export function formatFloat(value: number): string {
  const text = String(value);
  return /[.eE]/.test(text) ? text : `${text}.0`;
}

export function camelCase(name: string): string {
  return name.replace(/_([a-z0-9])/g, (_m, ch: string) => ch.toUpperCase());
}

/** Joins blocks of lines with one blank line between non-empty blocks. */
export function joinSections(sections: readonly (readonly string[])[]): string {
  return sections
    .filter((section) => section.length > 0)
    .map((section) => section.join("\n"))
    .join("\n\n") + "\n";
}

export function header(target: TargetLanguage, commentPrefix: string): string {
  return `${commentPrefix} Generated by talkppc (target: ${target})`;
}
