/**
 * Tests for syntax tree helpers.
 */
import { describe, it } from "node:test";
import * as assert from "node:assert/strict";
import { actionFromWord, actionName } from "./ast.js";

describe("Talk++ AST helpers", () => {
  it("maps verbs and their third-person forms to built-in actions", () => {
    assert.deepEqual(actionFromWord("send"), { kind: "Send" });
    assert.deepEqual(actionFromWord("processes"), { kind: "Process" });
    assert.deepEqual(actionFromWord("Calls"), { kind: "Call" });
  });

  it("keeps any other word as a custom action", () => {
    assert.deepEqual(actionFromWord("notify"), { kind: "Custom", name: "notify" });
  });

  it("names an action by its surface word", () => {
    assert.equal(actionName({ kind: "Trigger" }), "trigger");
    assert.equal(actionName({ kind: "Custom", name: "archive" }), "archive");
  });
});
