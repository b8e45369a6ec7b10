/**
 * Unit capability.
 *
 * A unit knows how to move a value into the base unit of its dimension and back
 * out again, and how to label itself. Conversions between two units always go
 * through the base unit, so each unit only needs this one pair of functions.
 *
 * Exactly one unit per dimension is the base unit, for which both functions are
 * the identity. Build it with {@link base}; this is a convention, the type
 * system does not enforce it.
 *
 * @since 0.1.0
 */

import { Effect, Predicate } from "effect"
import type * as Dimension from "./Dimension.js"
import { DimensionMismatchError } from "./Errors.js"

/**
 * @since 0.1.0
 * @category Symbols
 */
export const TypeId: unique symbol = Symbol.for("typed-quantities/Unit")

/**
 * @since 0.1.0
 * @category Symbols
 */
export type TypeId = typeof TypeId

/**
 * @since 0.1.0
 * @category Models
 */
export interface Unit<D extends Dimension.Any> {
  readonly [TypeId]: TypeId
  readonly name: string
  readonly symbol: string
  readonly dimension: D
  readonly isBase: boolean
  /** Convert a value in this unit to the base unit of the dimension. */
  readonly toBase: (value: number) => number
  /** Convert a value in the base unit of the dimension to this unit. */
  readonly fromBase: (value: number) => number
}

/**
 * A unit of any dimension. Values of this type have lost their static
 * dimension and must be checked with {@link ensureSameDimension} before use.
 *
 * @since 0.1.0
 * @category Models
 */
export type Any = Unit<Dimension.Any>

/**
 * @since 0.1.0
 * @category Constructors
 * @example
 * ```ts
 * const Minute = Unit.make({
 *   name: "Minute",
 *   symbol: "min",
 *   dimension: Time,
 *   toBase: (value) => value * 60,
 *   fromBase: (value) => value / 60,
 * })
 * ```
 */
export const make = <D extends Dimension.Any>(options: {
  readonly name: string
  readonly symbol: string
  readonly dimension: D
  readonly toBase: (value: number) => number
  readonly fromBase: (value: number) => number
}): Unit<D> => ({
  [TypeId]: TypeId,
  name: options.name,
  symbol: options.symbol,
  dimension: options.dimension,
  isBase: false,
  toBase: options.toBase,
  fromBase: options.fromBase,
})

const identity = (value: number): number => value

/**
 * Build the base unit of a dimension.
 *
 * @since 0.1.0
 * @category Constructors
 */
export const base = <D extends Dimension.Any>(options: {
  readonly name: string
  readonly symbol: string
  readonly dimension: D
}): Unit<D> => ({
  [TypeId]: TypeId,
  name: options.name,
  symbol: options.symbol,
  dimension: options.dimension,
  isBase: true,
  toBase: identity,
  fromBase: identity,
})

/**
 * @since 0.1.0
 * @category Guards
 */
export const isUnit = (u: unknown): u is Any => Predicate.hasProperty(u, TypeId)

/**
 * @since 0.1.0
 * @category Predicates
 */
export const sameDimension = (self: Any, that: Any): boolean =>
  self.dimension.name === that.dimension.name

/**
 * Fail with a {@link DimensionMismatchError} unless both units share a
 * dimension.
 *
 * @since 0.1.0
 * @category Validation
 */
export const ensureSameDimension = (
  from: Any,
  to: Any,
): Effect.Effect<void, DimensionMismatchError> =>
  sameDimension(from, to)
    ? Effect.void
    : Effect.fail(
        new DimensionMismatchError({
          from: from.symbol,
          to: to.symbol,
          fromDimension: from.dimension.name,
          toDimension: to.dimension.name,
        }),
      )
