import type { FieldType, ParseOutcome } from "../../ports/field-type"
import { fail, ok } from "./outcome"

export type IntegerBounds = Readonly<{
  /** Inclusive */
  min?: number
  /** Inclusive */
  max?: number
}>

const SIGNED_INTEGER = /^[+-]?\d+$/
const UNSIGNED_INTEGER = /^\+?\d+$/
const DECIMAL = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/
const NON_FINITE = /^([+-]?)(inf|infinity|nan)$/i

export function string(): FieldType<string> {
  return { name: "string", parse: ok }
}

/**
 * Decimal integer with an optional sign, within the safe integer range.
 * Surrounding whitespace is not accepted.
 */
export function int(bounds: IntegerBounds = {}): FieldType<number> {
  return {
    name: "integer",
    parse: (raw) => parseInteger(raw, SIGNED_INTEGER, bounds),
  }
}

/**
 * Like `int`, but rejects a minus sign.
 */
export function uint(bounds: IntegerBounds = {}): FieldType<number> {
  return {
    name: "unsigned integer",
    parse: (raw) => parseInteger(raw, UNSIGNED_INTEGER, bounds),
  }
}

/**
 * Decimal or exponent notation (`1`, `-0.5`, `.5`, `1.`, `2e10`), or
 * `inf`, `infinity`, `nan` in any case with an optional sign.
 */
export function float(): FieldType<number> {
  return {
    name: "float",
    parse: (raw) => {
      const nonFinite = NON_FINITE.exec(raw)

      if (nonFinite) {
        if (nonFinite[2]?.toLowerCase() === "nan") return ok(Number.NaN)

        return ok(nonFinite[1] === "-" ? -Infinity : Infinity)
      }

      return DECIMAL.test(raw) ? ok(Number(raw)) : fail()
    },
  }
}

/**
 * Exactly `true` or `false`.
 */
export function boolean(): FieldType<boolean> {
  return {
    name: "boolean",
    parse: (raw) => {
      if (raw === "true") return ok(true)
      if (raw === "false") return ok(false)

      return fail()
    },
  }
}

/**
 * Decimal integer of any size.
 */
export function bigint(): FieldType<bigint> {
  return {
    name: "bigint",
    parse: (raw) => {
      if (!SIGNED_INTEGER.test(raw)) return fail()

      return ok(BigInt(raw.startsWith("+") ? raw.slice(1) : raw))
    },
  }
}

function parseInteger(raw: string, pattern: RegExp, bounds: IntegerBounds): ParseOutcome<number> {
  if (!pattern.test(raw)) return fail()

  const value = Number(raw)

  if (!Number.isSafeInteger(value)) return fail("outside the safe integer range")
  if (bounds.min !== undefined && value < bounds.min) return fail(`must be at least ${bounds.min}`)
  if (bounds.max !== undefined && value > bounds.max) return fail(`must be at most ${bounds.max}`)

  return ok(value)
}
