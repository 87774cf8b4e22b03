/**
 * Talk++ Lexer using Chevrotain.
 */
import { createToken, Lexer, type IToken, type TokenType } from "chevrotain";
import { CompilerError, capture, type Result } from "./errors.js";

export type Keyword =
  | "if" | "then" | "else" | "when" | "and" | "or"
  | "using" | "with" | "to" | "in" | "from";

export type Verb = "send" | "store" | "validate" | "process" | "trigger" | "call";

export type Punct = "," | "." | ":" | ";";

export type TokenValue =
  | { kind: "Keyword"; keyword: Keyword }
  | { kind: "Verb"; verb: Verb }
  | { kind: "Service"; name: string }
  | { kind: "Identifier"; name: string }
  | { kind: "String"; value: string }
  | { kind: "Integer"; value: bigint }
  | { kind: "Float"; value: number }
  | { kind: "Punct"; punct: Punct };

export interface TokenPosition {
  /** Offsets into the source, end exclusive. */
  span: { start: number; end: number };
  line: number;
  column: number;
}

export type Token = TokenValue & TokenPosition;

// Identifiers come first so keywords can name them as their longer alternative
export const Identifier = createToken({ name: "Identifier", pattern: /[a-z_][a-zA-Z0-9_]*/ });
export const Service = createToken({ name: "Service", pattern: /[A-Z][a-zA-Z0-9]*/ });

function word(name: string, pattern: RegExp): TokenType {
  return createToken({ name, pattern, longer_alt: Identifier });
}

// Keywords
export const If = word("If", /if/);
export const Then = word("Then", /then/);
export const Else = word("Else", /else/);
export const When = word("When", /when/);
export const And = word("And", /and/);
export const Or = word("Or", /or/);
export const Using = word("Using", /using/);
export const With = word("With", /with/);
export const To = word("To", /to/);
export const In = word("In", /in/);
export const From = word("From", /from/);

// Action verbs, singular and third-person forms
export const Send = word("Send", /sends?/);
export const Store = word("Store", /stores?/);
export const Validate = word("Validate", /validates?/);
export const Process = word("Process", /process(?:es)?/);
export const Trigger = word("Trigger", /triggers?/);
export const Call = word("Call", /calls?/);

// Literals
export const FloatLit = createToken({ name: "FloatLit", pattern: /\d+\.\d+/ });
export const IntLit = createToken({ name: "IntLit", pattern: /\d+/ });
export const StringLit = createToken({
  name: "StringLit",
  pattern: /"(?:[^"\\]|\\[\s\S])*"/,
  line_breaks: true,
});
export const BacktickLit = createToken({
  name: "BacktickLit",
  pattern: /`(?:[^`\\]|\\[\s\S])*`/,
  line_breaks: true,
});

// Punctuation
export const Comma = createToken({ name: "Comma", pattern: /,/ });
export const Dot = createToken({ name: "Dot", pattern: /\./ });
export const Colon = createToken({ name: "Colon", pattern: /:/ });
export const Semicolon = createToken({ name: "Semicolon", pattern: /;/ });

// Whitespace and comments
export const WhiteSpace = createToken({
  name: "WhiteSpace",
  pattern: /\s+/,
  group: Lexer.SKIPPED,
  line_breaks: true,
});
export const LineComment = createToken({
  name: "LineComment",
  pattern: /\/\/[^\n\r]*/,
  group: Lexer.SKIPPED,
});
export const BlockComment = createToken({
  name: "BlockComment",
  pattern: /\/\*(?:[^*]|\*+[^*/])*\*+\//,
  group: Lexer.SKIPPED,
  line_breaks: true,
});

// Token order matters: keywords and verbs before identifiers, floats before ints
export const allTokens = [
  WhiteSpace,
  LineComment,
  BlockComment,
  If,
  Then,
  Else,
  When,
  And,
  Or,
  Using,
  With,
  To,
  In,
  From,
  Send,
  Store,
  Validate,
  Process,
  Trigger,
  Call,
  Service,
  Identifier,
  FloatLit,
  IntLit,
  StringLit,
  BacktickLit,
  Comma,
  Dot,
  Colon,
  Semicolon,
];

const TalkLexer = new Lexer(allTokens, { positionTracking: "full" });

const KEYWORDS: ReadonlyMap<TokenType, Keyword> = new Map<TokenType, Keyword>([
  [If, "if"],
  [Then, "then"],
  [Else, "else"],
  [When, "when"],
  [And, "and"],
  [Or, "or"],
  [Using, "using"],
  [With, "with"],
  [To, "to"],
  [In, "in"],
  [From, "from"],
]);

const VERBS: ReadonlyMap<TokenType, Verb> = new Map<TokenType, Verb>([
  [Send, "send"],
  [Store, "store"],
  [Validate, "validate"],
  [Process, "process"],
  [Trigger, "trigger"],
  [Call, "call"],
]);

const PUNCTUATION: ReadonlyMap<TokenType, Punct> = new Map<TokenType, Punct>([
  [Comma, ","],
  [Dot, "."],
  [Colon, ":"],
  [Semicolon, ";"],
]);

const I64_MAX = 2n ** 63n - 1n;

const ESCAPES: Readonly<Record<string, string>> = { n: "\n", t: "\t", r: "\r" };

/** Strips the delimiters and decodes backslash escapes. */
export function unquote(image: string): string {
  return image
    .slice(1, -1)
    .replace(/\\([\s\S])/g, (_m, ch: string) => ESCAPES[ch] ?? ch);
}

function position(t: IToken): TokenPosition {
  return {
    span: { start: t.startOffset, end: t.startOffset + t.image.length },
    line: t.startLine ?? 1,
    column: t.startColumn ?? 1,
  };
}

/** UTF-8 byte offset of the UTF-16 index `offset`. */
function byteOffset(source: string, offset: number): number {
  return new TextEncoder().encode(source.slice(0, offset)).length;
}

function outOfRange(source: string, t: IToken, what: "Integer" | "Float"): CompilerError {
  return CompilerError.lexical(
    byteOffset(source, t.startOffset),
    t.startLine ?? 1,
    t.startColumn ?? 1,
    `${what} literal out of range: '${t.image}'`
  );
}

function classify(source: string, t: IToken): TokenValue {
  const keyword = KEYWORDS.get(t.tokenType);
  if (keyword) return { kind: "Keyword", keyword };
  const verb = VERBS.get(t.tokenType);
  if (verb) return { kind: "Verb", verb };
  const punct = PUNCTUATION.get(t.tokenType);
  if (punct) return { kind: "Punct", punct };

  switch (t.tokenType) {
    case Service:
      return { kind: "Service", name: t.image };
    case Identifier:
      return { kind: "Identifier", name: t.image };
    case StringLit:
    case BacktickLit:
      return { kind: "String", value: unquote(t.image) };
    case FloatLit: {
      const value = Number.parseFloat(t.image);
      if (!Number.isFinite(value)) {
        throw outOfRange(source, t, "Float");
      }
      return { kind: "Float", value };
    }
    case IntLit: {
      const value = BigInt(t.image);
      if (value > I64_MAX) {
        throw outOfRange(source, t, "Integer");
      }
      return { kind: "Integer", value };
    }
    default:
      throw CompilerError.internal(`Unclassified token '${t.image}' (${t.tokenType.name})`);
  }
}

function lex(source: string): Token[] {
  const result = TalkLexer.tokenize(source);

  // Fail fast: only the first unmatched sequence is reported
  const first = result.errors[0];
  if (first) {
    const text = source.slice(first.offset, first.offset + first.length);
    throw CompilerError.lexical(
      byteOffset(source, first.offset),
      first.line ?? 1,
      first.column ?? 1,
      `Invalid token: '${text}'`
    );
  }

  return result.tokens.map((t) => ({ ...classify(source, t), ...position(t) }));
}

export function tokenize(source: string): Result<Token[]> {
  return capture(() => lex(source));
}

/** Short human label for a token, used in parse error messages. */
export function describeToken(token: TokenValue): string {
  switch (token.kind) {
    case "Keyword":
      return `keyword '${token.keyword}'`;
    case "Verb":
      return `action verb '${token.verb}'`;
    case "Service":
      return `service '${token.name}'`;
    case "Identifier":
      return `identifier '${token.name}'`;
    case "String":
      return `string ${JSON.stringify(token.value)}`;
    case "Integer":
      return `integer ${token.value}`;
    case "Float":
      return `float ${token.value}`;
    case "Punct":
      return `'${token.punct}'`;
  }
}
