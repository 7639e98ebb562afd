export type ErrorSafe = {
  code: string;
  message: string;
  details?: Record<string, unknown>;
};

export abstract class PacwardenError extends Error {
  abstract readonly code: string;

  constructor(message: string, readonly details?: Record<string, unknown>) {
    super(message);
    this.name = new.target.name;
  }

  toSafe(): ErrorSafe {
    return this.details ? { code: this.code, message: this.message, details: this.details } : { code: this.code, message: this.message };
  }
}

export class UnresolvedIntentError extends PacwardenError {
  readonly code = "unresolved_intent";

  constructor(readonly text: string) {
    super(`could not resolve an action from "${text}"`);
  }
}

export class TranslatorUnavailableError extends PacwardenError {
  readonly code = "translator_unavailable";

  constructor(message: string, details?: Record<string, unknown>) {
    super(message, details);
  }
}

export class ValidationRejectedError extends PacwardenError {
  readonly code = "validation_rejected";

  constructor(readonly reason: string, readonly command: string) {
    super(`rejected: ${reason} (${command})`, { reason, command });
  }
}

export class SubsystemFailureError extends PacwardenError {
  readonly code = "subsystem_failure";

  constructor(readonly command: string, readonly output: string, readonly exitCode: number) {
    super(`${command} exited with ${exitCode}`, { command, exitCode });
  }
}

export class ScenarioNotFoundError extends PacwardenError {
  readonly code = "scenario_not_found";

  constructor(readonly scenario: string, known: string[]) {
    super(`unknown scenario "${scenario}" (known: ${known.join(", ")})`, { scenario, known });
  }
}

export class ConfigConflictError extends PacwardenError {
  readonly code = "config_conflict";

  constructor(message: string) {
    super(message);
  }
}
