// src/errors.ts

export class PlannerError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** Bad dialogue input. The dialogue re-prompts for the same step. */
export class ValidationError extends PlannerError {
  constructor(
    message: string,
    readonly step: string
  ) {
    super(message);
  }
}

export class NotFoundError extends PlannerError {}

export class AuthorizationError extends PlannerError {}

/** Unparseable callback payload or invite token. */
export class MalformedRequestError extends PlannerError {
  constructor(
    message: string,
    readonly raw: string
  ) {
    super(message);
  }
}

/** The gateway refused to edit a message; callers fall back to sending a new one. */
export class TransportDeliveryError extends PlannerError {
  constructor(
    message: string,
    readonly detail?: unknown
  ) {
    super(message);
  }
}

export class ConfigError extends PlannerError {}
