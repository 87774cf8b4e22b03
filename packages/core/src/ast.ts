/**
 * Talk++ Syntax Tree Definitions
 *
 * The tree is built once by the parser and only read afterwards.
 */

// --- Expressions ---
export interface IdentifierExpr {
  readonly kind: "Identifier";
  readonly name: string;
}

export interface StringExpr {
  readonly kind: "String";
  readonly value: string;
}

export interface IntegerExpr {
  readonly kind: "Integer";
  readonly value: bigint;
}

export interface FloatExpr {
  readonly kind: "Float";
  readonly value: number;
}

export interface BooleanExpr {
  readonly kind: "Boolean";
  readonly value: boolean;
}

// Property and FunctionCall have no surface syntax yet
export interface PropertyExpr {
  readonly kind: "Property";
  readonly object: Expression;
  readonly property: string;
}

export interface FunctionCallExpr {
  readonly kind: "FunctionCall";
  readonly name: string;
  readonly arguments: readonly Expression[];
}

export type Literal = StringExpr | IntegerExpr | FloatExpr | BooleanExpr;

export type Expression =
  | IdentifierExpr
  | Literal
  | PropertyExpr
  | FunctionCallExpr;

// --- Conditions ---
export interface EventCondition {
  readonly kind: "Event";
  /** Every word before the last one, space-joined. */
  readonly subject: string;
  readonly action: string;
  readonly context?: string;
}

export type ComparisonOperator =
  | "Equal"
  | "NotEqual"
  | "GreaterThan"
  | "LessThan"
  | "GreaterEqual"
  | "LessEqual";

export interface ComparisonCondition {
  readonly kind: "Comparison";
  readonly left: Expression;
  readonly operator: ComparisonOperator;
  readonly right: Expression;
}

export type LogicalOperator = "And" | "Or";

export interface LogicalCondition {
  readonly kind: "Logical";
  readonly left: Condition;
  readonly operator: LogicalOperator;
  readonly right: Condition;
}

export type Condition = EventCondition | ComparisonCondition | LogicalCondition;

// --- Actions ---
export type BuiltinAction =
  | { readonly kind: "Send" }
  | { readonly kind: "Store" }
  | { readonly kind: "Validate" }
  | { readonly kind: "Process" }
  | { readonly kind: "Trigger" }
  | { readonly kind: "Call" };

export type Action = BuiltinAction | { readonly kind: "Custom"; readonly name: string };

export interface ServiceCall {
  /** Always taken from a capitalized service token. */
  readonly name: string;
  readonly method?: string;
  readonly config: Readonly<Record<string, Expression>>;
}

// --- Statements ---
export interface ActionStatement {
  readonly kind: "Action";
  readonly action: Action;
  readonly target?: Expression;
  readonly service?: ServiceCall;
  /** Preposition clauses, keyed by `to`, `in` or `from`. */
  readonly parameters: Readonly<Record<string, Expression>>;
}

export interface ConditionalStatement {
  readonly kind: "Conditional";
  readonly condition: Condition;
  readonly thenActions: readonly ActionStatement[];
  readonly elseActions?: readonly ActionStatement[];
}

export interface AssignmentStatement {
  readonly kind: "Assignment";
  readonly variable: string;
  readonly value: Expression;
}

/** Reserved: the lexer drops comments, so the parser never builds one. */
export interface CommentStatement {
  readonly kind: "Comment";
  readonly text: string;
}

export type Statement =
  | ConditionalStatement
  | ActionStatement
  | AssignmentStatement
  | CommentStatement;

// --- Program ---
export interface Program {
  readonly kind: "Program";
  readonly statements: readonly Statement[];
}

const BUILTIN_ACTIONS: ReadonlyMap<string, BuiltinAction> = new Map<string, BuiltinAction>([
  ["send", { kind: "Send" }],
  ["sends", { kind: "Send" }],
  ["store", { kind: "Store" }],
  ["stores", { kind: "Store" }],
  ["validate", { kind: "Validate" }],
  ["validates", { kind: "Validate" }],
  ["process", { kind: "Process" }],
  ["processes", { kind: "Process" }],
  ["trigger", { kind: "Trigger" }],
  ["triggers", { kind: "Trigger" }],
  ["call", { kind: "Call" }],
  ["calls", { kind: "Call" }],
]);

export function actionFromWord(word: string): Action {
  return BUILTIN_ACTIONS.get(word.toLowerCase()) ?? { kind: "Custom", name: word };
}

/** Surface word for an action: the lower-case verb, or the custom name. */
export function actionName(action: Action): string {
  return action.kind === "Custom" ? action.name : action.kind.toLowerCase();
}
