/**
 * Tests for the Talk++ canonical formatter.
 */
import { describe, it } from "node:test";
import * as assert from "node:assert/strict";
import type * as AST from "./ast.js";
import { parseSource } from "./compiler.js";
import { format, quote } from "./formatter.js";

function parsed(source: string): AST.Program {
  const result = parseSource(source);
  if (!result.ok) {
    assert.fail(result.error.message);
  }
  return result.value;
}

function formatted(program: AST.Program): string {
  const result = format(program);
  if (!result.ok) {
    assert.fail(result.error.message);
  }
  return result.value;
}

function unsupported(program: AST.Program): string {
  const result = format(program);
  if (result.ok) {
    assert.fail("expected format to fail");
  }
  assert.equal(result.error.kind, "UnsupportedFeature");
  return result.error.message;
}

const event = (subject: string, action: string): AST.EventCondition => ({ kind: "Event", subject, action });

describe("Talk++ Formatter", () => {
  it("prints one statement per line", () => {
    const source = `when  new user registers
      then send welcome email using SendGrid ,store profile using Postgres
    else notify admin ; retries:3`;
    assert.equal(
      formatted(parsed(source)),
      "if new user registers then send welcome email using SendGrid, store profile using Postgres else notify admin.\n" +
        "retries: 3.\n"
    );
  });

  it("prints clauses after the service", () => {
    assert.equal(
      formatted(parsed("send `Hello` to team lead with Twilio")),
      "send \"Hello\" using Twilio to team lead.\n"
    );
  });

  it("prints event context as a string", () => {
    assert.equal(
      formatted(parsed("if order ships from warehouse then notify customer")),
      "if order ships in \"warehouse\" then notify customer.\n"
    );
  });

  it("prints empty action lists", () => {
    assert.equal(formatted(parsed("if user leaves then else store reason")), "if user leaves then else store reason.\n");
  });

  it("keeps floats distinct from integers", () => {
    assert.equal(formatted(parsed("ratio: 2.0. count: 2")), "ratio: 2.0.\ncount: 2.\n");
  });

  it("escapes strings", () => {
    assert.equal(quote("say \"hi\"\n\\"), "\"say \\\"hi\\\"\\n\\\\\"");
  });

  it("prints an empty program as a single newline", () => {
    assert.equal(formatted(parsed("")), "\n");
  });

  it("reparses to an equal tree", () => {
    const source =
      "if a b c and d e or f g then send \"tab\\there\" to x from y, trigger alarm using Twilio. " +
      "level: 1.5. owner: admin. validate";
    const program = parsed(source);
    assert.deepEqual(parsed(formatted(program)), program);
  });

  it("is idempotent", () => {
    const once = formatted(parsed("when stock runs low then call supplier using Postgres, store alert"));
    assert.equal(formatted(parsed(once)), once);
  });

  it("prints comments on their own line", () => {
    const program: AST.Program = { kind: "Program", statements: [{ kind: "Comment", text: "first\nsecond" }] };
    assert.equal(formatted(program), "// first second\n");
  });

  it("rejects comparison conditions", () => {
    const program: AST.Program = {
      kind: "Program",
      statements: [
        {
          kind: "Conditional",
          condition: {
            kind: "Comparison",
            left: { kind: "Identifier", name: "count" },
            operator: "GreaterThan",
            right: { kind: "Integer", value: 3n },
          },
          thenActions: [],
        },
      ],
    };
    assert.equal(unsupported(program), "Unsupported feature: comparison condition");
  });

  it("rejects right-nested logical conditions", () => {
    const program: AST.Program = {
      kind: "Program",
      statements: [
        {
          kind: "Conditional",
          condition: {
            kind: "Logical",
            left: event("a", "b"),
            operator: "And",
            right: { kind: "Logical", left: event("c", "d"), operator: "Or", right: event("e", "f") },
          },
          thenActions: [],
        },
      ],
    };
    assert.equal(unsupported(program), "Unsupported feature: nested logical condition");
  });

  it("rejects values without surface syntax", () => {
    const program: AST.Program = {
      kind: "Program",
      statements: [{ kind: "Assignment", variable: "flag", value: { kind: "Boolean", value: true } }],
    };
    assert.equal(unsupported(program), "Unsupported feature: boolean literal");
  });
});
