/**
 * Error hierarchy for typed quantities.
 *
 * Every failure is a tagged error so callers can pattern match with
 * `Effect.catchTag`. Conversions between statically typed units never fail;
 * these errors only surface on paths where the dimension or the input is known
 * at run time alone (symbol lookups, display formatting).
 *
 * @since 0.1.0
 */

import { Data } from "effect"

/**
 * Raised when a conversion is requested between units of different
 * dimensions.
 *
 * @category Errors
 * @since 0.1.0
 * @example
 * ```ts
 * const error = new DimensionMismatchError({
 *   from: "°C",
 *   to: "m",
 *   fromDimension: "Temperature",
 *   toDimension: "Length",
 * })
 * yield* Effect.fail(error)
 * ```
 */
export class DimensionMismatchError extends Data.TaggedError("DimensionMismatchError")<{
  readonly from: string
  readonly to: string
  readonly fromDimension: string
  readonly toDimension: string
}> {
  override get message(): string {
    return `Cannot convert ${this.from} to ${this.to}: ${this.fromDimension} does not match ${this.toDimension}`
  }
}

/**
 * Raised when a unit symbol or name is not part of the catalog.
 *
 * @category Errors
 * @since 0.1.0
 */
export class UnitNotFoundError extends Data.TaggedError("UnitNotFoundError")<{
  readonly symbol: string
}> {
  override get message(): string {
    return `Unknown unit symbol "${this.symbol}"`
  }
}

/**
 * Raised when the display helper receives `NaN` or an infinity.
 *
 * @category Errors
 * @since 0.1.0
 */
export class NonFiniteValueError extends Data.TaggedError("NonFiniteValueError")<{
  readonly value: number
}> {
  override get message(): string {
    return `Cannot format non-finite value ${this.value}`
  }
}

/**
 * Raised when a display precision is not an integer between 0 and 100.
 *
 * @category Errors
 * @since 0.1.0
 */
export class InvalidPrecisionError extends Data.TaggedError("InvalidPrecisionError")<{
  readonly precision: number
}> {
  override get message(): string {
    return `Invalid precision ${this.precision}: must be an integer between 0 and 100`
  }
}

/**
 * Union of the errors the display helper can raise.
 *
 * @category Errors
 * @since 0.1.0
 */
export type DisplayError = NonFiniteValueError | InvalidPrecisionError

/**
 * Union of the errors raised by symbol-based conversions.
 *
 * @category Errors
 * @since 0.1.0
 */
export type ConversionError = UnitNotFoundError | DimensionMismatchError
