/**
 * Talk++ Parser.
 * Recursive descent over the token list; the first error aborts the parse.
 */
import type * as AST from "./ast.js";
import { actionFromWord } from "./ast.js";
import { CompilerError, capture, type Result } from "./errors.js";
import { describeToken, type Keyword, type Punct, type Token } from "./lexer.js";

const PREPOSITIONS: ReadonlySet<Keyword> = new Set<Keyword>(["to", "in", "from"]);

class TalkParser {
  private current = 0;

  constructor(private readonly tokens: readonly Token[]) {}

  parseProgram(): AST.Program {
    const statements: AST.Statement[] = [];
    while (!this.isAtEnd()) {
      // Separators between statements carry no meaning
      if (this.checkPunct(",") || this.checkPunct(".") || this.checkPunct(";")) {
        this.current++;
        continue;
      }
      statements.push(this.parseStatement());
    }
    return { kind: "Program", statements };
  }

  private parseStatement(): AST.Statement {
    const token = this.peek();
    if (token === undefined) {
      throw this.error("Expected statement");
    }
    switch (token.kind) {
      case "Keyword":
        if (token.keyword === "if" || token.keyword === "when") {
          return this.parseConditional();
        }
        break;
      case "Verb":
        return this.parseAction();
      case "Identifier":
        if (this.isAssignmentStart()) {
          return this.parseAssignment();
        }
        return this.parseAction();
      default:
        break;
    }
    throw this.error(`Unexpected ${describeToken(token)} at start of statement`);
  }

  private parseConditional(): AST.ConditionalStatement {
    // 'if' or 'when'
    this.current++;
    const condition = this.parseCondition();

    if (!this.checkKeyword("then")) {
      throw this.error("Expected 'then' after condition");
    }
    this.current++;
    const thenActions = this.parseActionList();

    if (this.checkKeyword("else")) {
      this.current++;
      const elseActions = this.parseActionList();
      return { kind: "Conditional", condition, thenActions, elseActions };
    }
    return { kind: "Conditional", condition, thenActions };
  }

  private parseActionList(): AST.ActionStatement[] {
    const actions: AST.ActionStatement[] = [];
    while (this.isActionStart(0)) {
      actions.push(this.parseAction());
      if (this.checkPunct(",") && this.isActionStart(1)) {
        this.current++;
      }
    }
    return actions;
  }

  // Left fold: 'and' and 'or' share one precedence level
  private parseCondition(): AST.Condition {
    let condition: AST.Condition = this.parsePrimaryCondition();
    while (this.checkKeyword("and") || this.checkKeyword("or")) {
      const operator: AST.LogicalOperator = this.checkKeyword("and") ? "And" : "Or";
      this.current++;
      const right = this.parsePrimaryCondition();
      condition = { kind: "Logical", left: condition, operator, right };
    }
    return condition;
  }

  private parsePrimaryCondition(): AST.EventCondition {
    const words: string[] = [];
    let token = this.peek();
    while (token !== undefined && token.kind === "Identifier") {
      words.push(token.name);
      this.current++;
      token = this.peek();
    }

    const action = words.pop();
    if (action === undefined || words.length === 0) {
      throw this.error("Expected condition");
    }
    const subject = words.join(" ");

    if (token !== undefined && token.kind === "Keyword" && PREPOSITIONS.has(token.keyword)) {
      const preposition = token.keyword;
      this.current++;
      const context = this.peek();
      if (context !== undefined && context.kind === "String") {
        this.current++;
        return { kind: "Event", subject, action, context: context.value };
      }
      if (context !== undefined && context.kind === "Identifier") {
        this.current++;
        return { kind: "Event", subject, action, context: context.name };
      }
      throw this.error(`Expected context after '${preposition}'`);
    }

    return { kind: "Event", subject, action };
  }

  private parseAction(): AST.ActionStatement {
    const token = this.peek();
    let action: AST.Action;
    if (token !== undefined && token.kind === "Verb") {
      action = actionFromWord(token.verb);
    } else if (token !== undefined && token.kind === "Identifier") {
      action = actionFromWord(token.name);
    } else {
      throw this.error("Expected action verb");
    }
    this.current++;

    const target = this.parseTarget();
    const parameters: Record<string, AST.Expression> = {};
    let service: AST.ServiceCall | undefined;

    for (;;) {
      const next = this.peek();
      if (next === undefined || next.kind !== "Keyword") break;

      if (next.keyword === "using" || next.keyword === "with") {
        if (service !== undefined) break;
        this.current++;
        service = this.parseService(next.keyword);
      } else if (PREPOSITIONS.has(next.keyword)) {
        const preposition = next.keyword;
        if (preposition in parameters) {
          throw this.error(`Duplicate '${preposition}' clause`);
        }
        this.current++;
        const value = this.parseTarget();
        if (value === undefined) {
          throw this.error(`Expected value after '${preposition}'`);
        }
        parameters[preposition] = value;
      } else {
        break;
      }
    }

    return {
      kind: "Action",
      action,
      ...(target !== undefined ? { target } : {}),
      ...(service !== undefined ? { service } : {}),
      parameters,
    };
  }

  /** A string, or a run of words joined by spaces. */
  private parseTarget(): AST.Expression | undefined {
    const token = this.peek();
    if (token !== undefined && token.kind === "String") {
      this.current++;
      return { kind: "String", value: token.value };
    }

    const words: string[] = [];
    while (this.isTargetWord()) {
      const word = this.peek();
      if (word === undefined || word.kind !== "Identifier") break;
      words.push(word.name);
      this.current++;
    }
    return words.length > 0 ? { kind: "Identifier", name: words.join(" ") } : undefined;
  }

  private parseService(keyword: "using" | "with"): AST.ServiceCall {
    const token = this.peek();
    if (token === undefined || token.kind !== "Service") {
      throw this.error(`Expected service name after '${keyword}'`);
    }
    this.current++;
    return { name: token.name, config: {} };
  }

  private parseAssignment(): AST.AssignmentStatement {
    const token = this.peek();
    if (token === undefined || token.kind !== "Identifier") {
      throw this.error("Expected variable name");
    }
    this.current++;

    if (!this.checkPunct(":")) {
      throw this.error("Expected ':' after variable name");
    }
    this.current++;

    const value = this.parseExpression();
    return { kind: "Assignment", variable: token.name, value };
  }

  private parseExpression(): AST.Expression {
    const token = this.peek();
    if (token === undefined) {
      throw this.error("Expected expression");
    }
    switch (token.kind) {
      case "Identifier":
        this.current++;
        return { kind: "Identifier", name: token.name };
      case "Service":
        this.current++;
        return { kind: "Identifier", name: token.name };
      case "String":
        this.current++;
        return { kind: "String", value: token.value };
      case "Integer":
        this.current++;
        return { kind: "Integer", value: token.value };
      case "Float":
        this.current++;
        return { kind: "Float", value: token.value };
      default:
        throw this.error(`Expected expression, found ${describeToken(token)}`);
    }
  }

  // --- Cursor helpers ---

  private peek(offset: number = 0): Token | undefined {
    return this.tokens[this.current + offset];
  }

  private isAtEnd(): boolean {
    return this.current >= this.tokens.length;
  }

  private checkKeyword(keyword: Keyword): boolean {
    const token = this.peek();
    return token !== undefined && token.kind === "Keyword" && token.keyword === keyword;
  }

  private checkPunct(punct: Punct, offset: number = 0): boolean {
    const token = this.peek(offset);
    return token !== undefined && token.kind === "Punct" && token.punct === punct;
  }

  /** `name :` starts an assignment; the colon is one token past the identifier. */
  private isAssignmentStart(offset: number = 0): boolean {
    const token = this.peek(offset);
    return token !== undefined && token.kind === "Identifier" && this.checkPunct(":", offset + 1);
  }

  private isActionStart(offset: number): boolean {
    const token = this.peek(offset);
    if (token === undefined) return false;
    if (token.kind === "Verb") return true;
    return token.kind === "Identifier" && !this.isAssignmentStart(offset);
  }

  private isTargetWord(): boolean {
    const token = this.peek();
    return token !== undefined && token.kind === "Identifier" && !this.isAssignmentStart();
  }

  private error(message: string): CompilerError {
    const token = this.peek();
    if (token !== undefined) {
      return CompilerError.parse(token.line, token.column, message);
    }
    // Past the last token: point just after it
    const last = this.tokens[this.tokens.length - 1];
    if (last === undefined) {
      return CompilerError.parse(1, 1, `${message}, found end of input`);
    }
    const width = last.span.end - last.span.start;
    return CompilerError.parse(last.line, last.column + width, `${message}, found end of input`);
  }
}

export function parse(tokens: readonly Token[]): Result<AST.Program> {
  return capture(() => new TalkParser(tokens).parseProgram());
}
