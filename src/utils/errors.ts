import { ui } from "./ui.js";

export class UserError extends Error {
  constructor(
    message: string,
    public hint?: string
  ) {
    super(message);
    this.name = "UserError";
  }
}

export class ValidationError extends UserError {
  constructor(
    message: string,
    public issues: string[]
  ) {
    super(message, "Fix the issues above and try again.");
    this.name = "ValidationError";
  }
}

/** Host configuration fixture is missing, malformed or cannot be written. */
export class FixtureError extends UserError {
  constructor(
    message: string,
    public filePath: string,
    hint = "The host configuration fixture is broken; fix the test setup and rerun."
  ) {
    super(message, hint);
    this.name = "FixtureError";
  }
}

export class StatusUnavailableError extends UserError {
  constructor(
    message: string,
    public host: string,
    public command: string
  ) {
    super(
      message,
      "The host may still be booting. Retry once it is reachable and the status command succeeds."
    );
    this.name = "StatusUnavailableError";
  }
}

export class InvariantMismatchError extends UserError {
  constructor(
    public field: string,
    public expected: string,
    public actual: string,
    message = `${field}: expected ${expected}, got ${actual}`
  ) {
    super(message);
    this.name = "InvariantMismatchError";
  }
}

export class ScenarioSkippedError extends UserError {
  constructor(public reason: string) {
    super(`Scenario skipped: ${reason}`);
    this.name = "ScenarioSkippedError";
  }
}

export function handleError(err: unknown): never {
  if (err instanceof ValidationError) {
    ui.error(err.message);
    for (const issue of err.issues) {
      console.error("  - " + issue);
    }
    if (err.hint) ui.dim(err.hint);
  } else if (err instanceof UserError) {
    ui.error(err.message);
    if (err.hint) ui.dim(err.hint);
  } else if (err instanceof Error) {
    ui.error(err.message);
  } else {
    ui.error(String(err));
  }
  process.exit(1);
}
