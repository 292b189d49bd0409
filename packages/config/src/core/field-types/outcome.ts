import type { ParseFailure, ParseSuccess } from "../../ports/field-type"

export function ok<T>(value: T): ParseSuccess<T> {
  return { success: true, value }
}

export function fail(reason?: string, cause?: unknown): ParseFailure {
  return {
    success: false,
    ...(reason !== undefined && { reason }),
    ...(cause !== undefined && { cause }),
  }
}
