/**
 * Tests for per-target spelling.
 */
import { describe, it } from "node:test";
import * as assert from "node:assert/strict";
import type * as AST from "../ast.js";
import { DEFAULT_CONFIG } from "../config.js";
import {
  camelCase,
  commentText,
  escapeName,
  formatFloat,
  header,
  indent,
  joinSections,
  type AssignedValue,
  type Binding,
} from "./backend.js";
import { bashBackend, shellQuote } from "./bash.js";
import { javascriptBackend } from "./javascript.js";
import { pythonBackend } from "./python.js";
import { rustBackend, rustString } from "./rust.js";
import { lookupService } from "./services.js";
import { typescriptBackend } from "./typescript.js";

function literal(value: AST.Literal, code: string): AssignedValue {
  return { kind: "literal", literal: value, code };
}

function bind(first: boolean, ...values: AssignedValue[]): Binding {
  return { first, values };
}

describe("Backend helpers", () => {
  it("indents non-empty lines", () => {
    assert.deepEqual(indent(["a", "", "b"], 2), ["        a", "", "        b"]);
  });

  it("keeps comments on one line", () => {
    assert.equal(commentText("first\n  second\r\nthird"), "first second third");
  });

  it("treats unicode line and paragraph separators as line breaks", () => {
    assert.equal(commentText("a\u2028b \u2029 c"), "a b c");
  });

  it("suffixes reserved names", () => {
    const reserved = new Set(["class"]);
    assert.equal(escapeName("class", reserved), "class_");
    assert.equal(escapeName("klass", reserved), "klass");
  });

  it("always prints a float with a fraction or exponent", () => {
    assert.equal(formatFloat(2), "2.0");
    assert.equal(formatFloat(0.25), "0.25");
    assert.equal(formatFloat(1e21), "1e+21");
  });

  it("camel-cases stub names", () => {
    assert.equal(camelCase("execute_postgres_query"), "executePostgresQuery");
  });

  it("separates non-empty sections with one blank line", () => {
    assert.equal(joinSections([["a"], [], ["b", "c"]]), "a\n\nb\nc\n");
  });

  it("writes a generated-by header", () => {
    assert.equal(header("python", "#"), "# Generated by talkppc (target: python)");
  });
});

describe("Rust backend", () => {
  it("escapes strings", () => {
    assert.equal(rustString("a\"b\\c\n\u0001"), "\"a\\\"b\\\\c\\n\\u{1}\"");
  });

  it("types literal bindings", () => {
    assert.equal(
      rustBackend.assignment("limit", literal({ kind: "Integer", value: 5n }, "5"), bind(true)),
      "let limit: i64 = 5;"
    );
    assert.equal(
      rustBackend.assignment("label", literal({ kind: "String", value: "x" }, "\"x\""), bind(false)),
      "let label: &str = \"x\";"
    );
    assert.equal(
      rustBackend.assignment("next", { kind: "unresolved", reference: "current" }, bind(true)),
      "let next: serde_json::Value = serde_json::Value::Null; // unresolved reference: current"
    );
  });

  it("compares with native operators", () => {
    assert.equal(rustBackend.comparison("a", "NotEqual", "1"), "a != 1");
  });

  it("renames keywords and generated names", () => {
    assert.equal(rustBackend.variable("type"), "type_");
    assert.equal(rustBackend.variable("event"), "event_");
    assert.equal(rustBackend.variable("send_sms_twilio"), "send_sms_twilio_");
    assert.equal(rustBackend.variable("kind"), "kind");
  });
});

describe("Python backend", () => {
  it("spells booleans and floats", () => {
    assert.equal(pythonBackend.literal({ kind: "Boolean", value: false }), "False");
    assert.equal(pythonBackend.literal({ kind: "Float", value: 3 }), "3.0");
  });

  it("renames keywords and module-level names", () => {
    assert.equal(pythonBackend.variable("class"), "class_");
    assert.equal(pythonBackend.variable("logger"), "logger_");
    assert.equal(pythonBackend.variable("total"), "total");
  });

  it("writes an else branch", () => {
    assert.deepEqual(pythonBackend.ifElse("ok", ["pass"], ["pass"]), ["if ok:", "    pass", "else:", "    pass"]);
  });

  it("returns a failure response when a stub raises", () => {
    const stub = lookupService("Twilio");
    assert.ok(stub);
    assert.deepEqual(pythonBackend.serviceCall(stub, "send code"), [
      "# Twilio sms service call: send code",
      "logger.info(\"Sending SMS via Twilio\")",
      "try:",
      "    await send_sms_twilio(event)",
      "except Exception as e:",
      "    logger.error(\"Failed to send SMS: %s\", e)",
      "    return Response(success=False, data={}, message=\"Failed to send SMS\")",
    ]);
  });
});

describe("JavaScript backend", () => {
  it("renames reserved words and the handler parameter", () => {
    assert.equal(javascriptBackend.variable("delete"), "delete_");
    assert.equal(javascriptBackend.variable("event"), "event_");
    assert.equal(javascriptBackend.variable("sendEmailSendgrid"), "sendEmailSendgrid_");
    assert.equal(javascriptBackend.variable("message"), "message");
  });

  it("declares with let on first binding only", () => {
    const one = literal({ kind: "Integer", value: 1n }, "1");
    assert.equal(javascriptBackend.assignment("count", one, bind(true, one)), "let count = 1;");
    assert.equal(javascriptBackend.assignment("count", one, bind(false, one)), "count = 1;");
  });

  it("suffixes integers beyond the safe range", () => {
    assert.equal(javascriptBackend.literal({ kind: "Integer", value: 9007199254740991n }), "9007199254740991");
    assert.equal(javascriptBackend.literal({ kind: "Integer", value: 9007199254740993n }), "9007199254740993n");
  });

  it("renders a module with an empty handler", () => {
    const out = javascriptBackend.render({ body: [], stubs: [], config: DEFAULT_CONFIG });
    assert.equal(
      out,
      [
        "// Generated by talkppc (target: javascript)",
        "\"use strict\";",
        "",
        "/**",
        " * @typedef {{ data: Record<string, unknown>, context: Record<string, string> }} Event",
        " * @typedef {{ success: boolean, data: Record<string, unknown>, message: string }} Response",
        " */",
        "",
        "/**",
        " * @param {Event} event",
        " * @returns {Promise<Response>}",
        " */",
        "async function handler(event) {",
        "    console.log(\"Processing event:\", event);",
        "",
        "    return { success: true, data: {}, message: \"Function executed successfully\" };",
        "}",
        "",
        "if (typeof module !== \"undefined\" && module.exports) {",
        "    module.exports = { handler };",
        "}",
        "",
      ].join("\n")
    );
  });
});

describe("TypeScript backend", () => {
  it("types unresolved bindings as unknown", () => {
    const next: AssignedValue = { kind: "unresolved", reference: "current" };
    assert.equal(
      typescriptBackend.assignment("next", next, bind(true, next)),
      "let next: unknown = null; // unresolved reference: current"
    );
    assert.equal(typescriptBackend.assignment("next", next, bind(false, next)), "next = null; // unresolved reference: current");
  });

  it("leaves single-type bindings to inference", () => {
    const one = literal({ kind: "Integer", value: 1n }, "1");
    const half = literal({ kind: "Float", value: 0.5 }, "0.5");
    assert.equal(typescriptBackend.assignment("count", one, bind(true, one, half)), "let count = 1;");
  });

  it("annotates the first binding with every type the variable takes", () => {
    const one = literal({ kind: "Integer", value: 1n }, "1");
    const text = literal({ kind: "String", value: "many" }, "\"many\"");
    const huge = literal({ kind: "Integer", value: 9007199254740993n }, "9007199254740993n");
    assert.equal(
      typescriptBackend.assignment("count", one, bind(true, one, text, huge)),
      "let count: number | string | bigint = 1;"
    );
    assert.equal(typescriptBackend.assignment("count", text, bind(false, one, text, huge)), "count = \"many\";");
  });

  it("calls camel-cased stubs", () => {
    const stub = lookupService("postgres");
    assert.ok(stub);
    assert.equal(typescriptBackend.serviceCall(stub, "store order")[3], "    await executePostgresQuery(event);");
  });
});

describe("Bash backend", () => {
  it("quotes single quotes", () => {
    assert.equal(shellQuote("it's"), "'it'\\''s'");
  });

  it("renames the event local", () => {
    assert.equal(bashBackend.variable("event"), "event_");
    assert.equal(bashBackend.variable("_"), "__");
    assert.equal(bashBackend.variable("count"), "count");
  });

  it("compares with test operators", () => {
    assert.equal(bashBackend.comparison("\"${n}\"", "LessThan", "3"), "[[ \"${n}\" -lt 3 ]]");
  });

  it("declares locals on first binding", () => {
    assert.equal(
      bashBackend.assignment("greeting", literal({ kind: "String", value: "hi" }, "'hi'"), bind(true)),
      "local greeting='hi'"
    );
    assert.equal(
      bashBackend.assignment("greeting", { kind: "unresolved", reference: "other" }, bind(false)),
      "greeting=''  # unresolved reference: other"
    );
  });

  it("renders a script with an empty handler", () => {
    const out = bashBackend.render({ body: [], stubs: [], config: DEFAULT_CONFIG });
    assert.equal(
      out,
      [
        "#!/usr/bin/env bash",
        "# Generated by talkppc (target: bash)",
        "#",
        "# Event:    JSON object {\"data\": {...}, \"context\": {...}}, first argument",
        "# Response: JSON object {\"success\": bool, \"data\": {...}, \"message\": string}, stdout",
        "",
        "set -euo pipefail",
        "",
        "handler() {",
        "    local event=\"$1\"",
        "    echo \"Processing event: $event\" >&2",
        "",
        "    echo '{\"success\":true,\"data\":{},\"message\":\"Function executed successfully\"}'",
        "}",
        "",
        "if [[ \"${BASH_SOURCE[0]}\" == \"${0}\" ]]; then",
        "    handler \"${1:-\"{}\"}\"",
        "fi",
        "",
      ].join("\n")
    );
  });
});
