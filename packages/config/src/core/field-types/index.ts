import { custom } from "./custom"
import { oneOf } from "./one-of"
import { bigint, boolean, float, int, string, uint } from "./scalar"
import { zod } from "./zod"

export type { IntegerBounds } from "./scalar"

/**
 * Built-in field types.
 */
export const types = {
  string,
  int,
  uint,
  float,
  boolean,
  bigint,
  oneOf,
  custom,
  zod,
} as const
