/**
 * Fixed registry of services the generator knows how to call.
 */
import type * as AST from "../ast.js";

export interface ServiceStub {
  /** Display name used in generated log lines. */
  readonly service: string;
  readonly channel: "email" | "sms" | "database";
  /** snake_case stub name; camel-cased by targets that want it. */
  readonly functionName: string;
  readonly startMessage: string;
  readonly failureMessage: string;
}

const SENDGRID: ServiceStub = {
  service: "SendGrid",
  channel: "email",
  functionName: "send_email_sendgrid",
  startMessage: "Sending email via SendGrid",
  failureMessage: "Failed to send email",
};

const TWILIO: ServiceStub = {
  service: "Twilio",
  channel: "sms",
  functionName: "send_sms_twilio",
  startMessage: "Sending SMS via Twilio",
  failureMessage: "Failed to send SMS",
};

const POSTGRES: ServiceStub = {
  service: "PostgreSQL",
  channel: "database",
  functionName: "execute_postgres_query",
  startMessage: "Executing database operation",
  failureMessage: "Database operation failed",
};

/** Stubs in the order their definitions are emitted. */
export const SERVICE_STUBS: readonly ServiceStub[] = Object.freeze([SENDGRID, TWILIO, POSTGRES]);

export const SERVICE_REGISTRY: ReadonlyMap<string, ServiceStub> = new Map([
  ["sendgrid", SENDGRID],
  ["twilio", TWILIO],
  ["postgresql", POSTGRES],
  ["postgres", POSTGRES],
]);

export function lookupService(name: string): ServiceStub | undefined {
  return SERVICE_REGISTRY.get(name.toLowerCase());
}

function actionsOf(statement: AST.Statement): readonly AST.ActionStatement[] {
  switch (statement.kind) {
    case "Action":
      return [statement];
    case "Conditional":
      return [...statement.thenActions, ...(statement.elseActions ?? [])];
    case "Assignment":
    case "Comment":
      return [];
  }
}

/** Registered services the program calls, each once, in registry order. */
export function collectServices(program: AST.Program): ServiceStub[] {
  const used = new Set<ServiceStub>();
  for (const statement of program.statements) {
    for (const action of actionsOf(statement)) {
      const stub = action.service && lookupService(action.service.name);
      if (stub) used.add(stub);
    }
  }
  return SERVICE_STUBS.filter((stub) => used.has(stub));
}
