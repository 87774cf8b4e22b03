/**
 * Tests for the Talk++ lexer.
 */
import { describe, it } from "node:test";
import * as assert from "node:assert/strict";
import { describeToken, tokenize, unquote, type Token } from "./lexer.js";

function lex(source: string): Token[] {
  const result = tokenize(source);
  if (!result.ok) {
    assert.fail(result.error.message);
  }
  return result.value;
}

function kinds(source: string): string[] {
  return lex(source).map((t) => t.kind);
}

describe("Talk++ Lexer", () => {
  it("classifies keywords, verbs, services and identifiers", () => {
    const tokens = lex("if user joins then send email using SendGrid");
    assert.deepEqual(tokens.map((t) => t.kind), [
      "Keyword", "Identifier", "Identifier", "Keyword", "Verb", "Identifier", "Keyword", "Service",
    ]);
    assert.deepEqual(tokens[0], { kind: "Keyword", keyword: "if", span: { start: 0, end: 2 }, line: 1, column: 1 });
    assert.deepEqual(tokens[4], { kind: "Verb", verb: "send", span: { start: 19, end: 23 }, line: 1, column: 20 });
    assert.deepEqual(tokens[7], { kind: "Service", name: "SendGrid", span: { start: 36, end: 44 }, line: 1, column: 37 });
  });

  it("recognizes every keyword", () => {
    const tokens = lex("if then else when and or using with to in from");
    assert.deepEqual(
      tokens.map((t) => (t.kind === "Keyword" ? t.keyword : t.kind)),
      ["if", "then", "else", "when", "and", "or", "using", "with", "to", "in", "from"]
    );
  });

  it("maps verb forms onto one verb", () => {
    const tokens = lex("sends stores validates processes triggers calls");
    assert.deepEqual(
      tokens.map((t) => (t.kind === "Verb" ? t.verb : t.kind)),
      ["send", "store", "validate", "process", "trigger", "call"]
    );
  });

  it("keeps longer words that start with a keyword as identifiers", () => {
    assert.deepEqual(kinds("sender thenx into tokens processed ifs"), [
      "Identifier", "Identifier", "Identifier", "Identifier", "Identifier", "Identifier",
    ]);
  });

  it("treats capitalized words as services", () => {
    const tokens = lex("Send Twilio");
    assert.deepEqual(tokens.map((t) => (t.kind === "Service" ? t.name : t.kind)), ["Send", "Twilio"]);
  });

  it("reads integers and floats", () => {
    const tokens = lex("42 3.14");
    assert.deepEqual(tokens[0], { kind: "Integer", value: 42n, span: { start: 0, end: 2 }, line: 1, column: 1 });
    assert.deepEqual(tokens[1], { kind: "Float", value: 3.14, span: { start: 3, end: 7 }, line: 1, column: 4 });
  });

  it("reads a trailing dot after an integer as punctuation", () => {
    assert.deepEqual(kinds("7."), ["Integer", "Punct"]);
  });

  it("accepts the largest signed 64-bit integer", () => {
    const [token] = lex("9223372036854775807");
    assert.equal(token?.kind === "Integer" && token.value, 9223372036854775807n);
  });

  it("rejects integers beyond the signed 64-bit range", () => {
    const result = tokenize("x: 9223372036854775808");
    assert.equal(result.ok, false);
    if (!result.ok) {
      assert.deepEqual(result.error.detail, {
        kind: "LexicalError",
        position: 3,
        line: 1,
        column: 4,
        message: "Integer literal out of range: '9223372036854775808'",
      });
    }
  });

  it("decodes string escapes", () => {
    const tokens = lex(String.raw`"a\nb" "say \"hi\"" "\q" "tab\there"`);
    assert.deepEqual(
      tokens.map((t) => (t.kind === "String" ? t.value : t.kind)),
      ["a\nb", "say \"hi\"", "q", "tab\there"]
    );
  });

  it("reads backtick strings", () => {
    const [token] = lex("`hello world`");
    assert.deepEqual(token, { kind: "String", value: "hello world", span: { start: 0, end: 13 }, line: 1, column: 1 });
  });

  it("unquotes a raw string image", () => {
    assert.equal(unquote(String.raw`"line\r\n"`), "line\r\n");
  });

  it("reads punctuation", () => {
    const tokens = lex(", . : ;");
    assert.deepEqual(tokens.map((t) => (t.kind === "Punct" ? t.punct : t.kind)), [",", ".", ":", ";"]);
  });

  it("skips whitespace and comments", () => {
    const tokens = lex("send // note\nstore /* x */ email");
    assert.deepEqual(tokens.map((t) => t.kind), ["Verb", "Verb", "Identifier"]);
    assert.deepEqual(tokens[1], { kind: "Verb", verb: "store", span: { start: 13, end: 18 }, line: 2, column: 1 });
    assert.deepEqual(tokens[2], { kind: "Identifier", name: "email", span: { start: 27, end: 32 }, line: 2, column: 15 });
  });

  it("tracks lines and columns across newlines", () => {
    const tokens = lex("send\n  email");
    assert.deepEqual(tokens[1], { kind: "Identifier", name: "email", span: { start: 7, end: 12 }, line: 2, column: 3 });
  });

  it("returns no tokens for empty or blank input", () => {
    assert.deepEqual(lex(""), []);
    assert.deepEqual(lex("  \n\t // only a comment"), []);
  });

  it("covers the source apart from whitespace and comments", () => {
    const source = "if new user registers then send \"hi there\" to admin. // done";
    const covered = lex(source).map((t) => source.slice(t.span.start, t.span.end)).join("");
    assert.equal(covered, "ifnewuserregistersthensend\"hi there\"toadmin.");
  });

  it("fails on an invalid character", () => {
    const result = tokenize("if @ invalid");
    assert.equal(result.ok, false);
    if (!result.ok) {
      assert.equal(result.error.kind, "LexicalError");
      assert.deepEqual(result.error.detail, {
        kind: "LexicalError",
        position: 3,
        line: 1,
        column: 4,
        message: "Invalid token: '@'",
      });
      assert.equal(result.error.message, "Lexical error at position 3: Invalid token: '@'");
    }
  });

  it("reports the error position in UTF-8 bytes", () => {
    const result = tokenize("\"é\" @");
    assert.equal(result.ok, false);
    if (!result.ok) {
      assert.deepEqual(result.error.detail, {
        kind: "LexicalError",
        position: 5,
        line: 1,
        column: 5,
        message: "Invalid token: '@'",
      });
    }
  });

  it("fails on an unclosed string", () => {
    const result = tokenize("say \"hello");
    assert.equal(result.ok, false);
    if (!result.ok) {
      assert.equal(result.error.message, "Lexical error at position 4: Invalid token: '\"'");
    }
  });

  it("describes tokens for messages", () => {
    const [kw, verb, svc, ident, str, int, punct] = lex("then send Twilio email \"x\" 5 .");
    const labels = [kw, verb, svc, ident, str, int, punct].map((t) => (t ? describeToken(t) : ""));
    assert.deepEqual(labels, [
      "keyword 'then'",
      "action verb 'send'",
      "service 'Twilio'",
      "identifier 'email'",
      "string \"x\"",
      "integer 5",
      "'.'",
    ]);
  });
});
