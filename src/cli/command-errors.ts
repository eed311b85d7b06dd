/*
Purpose: wrap whatever a command threw into a UserFacingError with a title,
a code and, where one helps, a hint.
Usage: catch (error) { throw normalizeCommandError(error, { title: "Run command failed." }); }
*/

import { formatErrorMessage } from "../core/error-format.js";
import {
  ConfigError,
  ConnectionLostError,
  DiscoverError,
  DockerError,
  GuestTimeoutError,
  GuestUnreachableError,
  ProvisionError,
  RebootError,
  StepError,
  type UserFacingErrorCode,
  UserFacingError,
  USER_FACING_ERROR_CODES,
} from "../core/errors.js";

export type CommandErrorContext = {
  title: string;
  /** Used when the error carries no hint of its own. */
  hints?: Partial<Record<UserFacingErrorCode, string>>;
};

export function normalizeCommandError(error: unknown, context: CommandErrorContext): UserFacingError {
  if (error instanceof UserFacingError) {
    return new UserFacingError({
      code: error.code,
      title: context.title,
      message: error.title === context.title ? error.message : `${error.title} ${error.message}`,
      hint: error.hint ?? context.hints?.[error.code],
      next: error.next,
      cause: error.cause ?? error,
    });
  }

  const code = resolveCommandErrorCode(error);
  return new UserFacingError({
    code,
    title: context.title,
    message: formatErrorMessage(error),
    hint: context.hints?.[code],
    cause: error,
  });
}

export function resolveCommandErrorCode(error: unknown): UserFacingErrorCode {
  if (error instanceof UserFacingError) return error.code;
  if (error instanceof ConfigError || error instanceof DiscoverError) return USER_FACING_ERROR_CODES.config;
  if (error instanceof ProvisionError) return USER_FACING_ERROR_CODES.provision;
  if (
    error instanceof ConnectionLostError ||
    error instanceof GuestUnreachableError ||
    error instanceof GuestTimeoutError ||
    error instanceof RebootError
  ) {
    return USER_FACING_ERROR_CODES.guest;
  }
  if (error instanceof DockerError) return USER_FACING_ERROR_CODES.docker;
  if (error instanceof StepError) return USER_FACING_ERROR_CODES.step;
  return USER_FACING_ERROR_CODES.unknown;
}
