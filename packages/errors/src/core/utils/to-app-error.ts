import type { AppError, ErrorCode } from "../../ports/error"
import { BaseError } from "../base-error"
import { isAppError } from "./is-app-error"

/**
 * Normalizes a thrown value, such as the exception from a user-supplied
 * parser, into an {@link AppError}.
 *
 * App errors are returned as they are. Anything else becomes a
 * non-operational `BaseError` with code `fallbackCode`: an `Error` is kept as
 * `cause`, a string becomes the message and other values go in
 * `context.value`.
 */
export function toAppError(err: unknown, fallbackCode: ErrorCode = "unknown"): AppError {
  if (isAppError(err)) return err

  if (err instanceof Error) {
    return new BaseError(err.message, { code: fallbackCode, cause: err, isOperational: false })
  }

  if (typeof err === "string") {
    return new BaseError(err, { code: fallbackCode, isOperational: false })
  }

  return new BaseError("Unknown error", {
    code: fallbackCode,
    context: { value: err },
    isOperational: false,
  })
}
