export class OrchestratorError extends Error {
  constructor(message: string, public readonly cause?: unknown) {
    super(message);
    this.name = "OrchestratorError";
  }
}

/** Malformed phase, plan or test data. Fatal for the affected plan. */
export class ConfigError extends OrchestratorError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "ConfigError";
  }
}

export class DiscoverError extends OrchestratorError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "DiscoverError";
  }
}

export class ProvisionError extends OrchestratorError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "ProvisionError";
  }
}

/** Transport to the guest dropped. Retried a bounded number of times. */
export class ConnectionLostError extends OrchestratorError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "ConnectionLostError";
  }
}

export class GuestUnreachableError extends OrchestratorError {
  constructor(
    message: string,
    public readonly guestName: string,
    cause?: unknown,
  ) {
    super(message, cause);
    this.name = "GuestUnreachableError";
  }
}

export class GuestTimeoutError extends OrchestratorError {
  constructor(
    message: string,
    public readonly timeoutMs: number,
    cause?: unknown,
  ) {
    super(message, cause);
    this.name = "GuestTimeoutError";
  }
}

export class RebootError extends OrchestratorError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "RebootError";
  }
}

export class DockerError extends OrchestratorError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "DockerError";
  }
}

export class StepError extends OrchestratorError {
  constructor(
    message: string,
    public readonly causes: unknown[] = [],
  ) {
    super(message, causes[0]);
    this.name = "StepError";
  }
}

// =============================================================================
// USER-FACING ERRORS
// =============================================================================

export const USER_FACING_ERROR_CODES = {
  config: "CONFIG_ERROR",
  provision: "PROVISION_ERROR",
  guest: "GUEST_ERROR",
  step: "STEP_ERROR",
  docker: "DOCKER_ERROR",
  unknown: "UNKNOWN_ERROR",
} as const;

export type UserFacingErrorCode =
  (typeof USER_FACING_ERROR_CODES)[keyof typeof USER_FACING_ERROR_CODES];

export type UserFacingErrorInput = {
  code: UserFacingErrorCode;
  title: string;
  message: string;
  hint?: string;
  next?: string;
  cause?: unknown;
};

export class UserFacingError extends Error {
  readonly code: UserFacingErrorCode;
  readonly title: string;
  readonly hint?: string;
  readonly next?: string;
  readonly cause?: unknown;

  constructor(input: UserFacingErrorInput) {
    super(input.message);
    this.name = "UserFacingError";
    this.code = input.code;
    this.title = input.title;
    this.hint = input.hint;
    this.next = input.next;
    this.cause = input.cause;
  }
}
