/**
 * Dimension tags.
 *
 * A dimension identifies a family of commensurable units. The tag is carried
 * in the type of every unit and quantity so that a Temperature unit cannot be
 * used where a Length unit is expected. Tags are compared by name when a check
 * has to happen at run time.
 *
 * @since 0.1.0
 */

import { Predicate } from "effect"

/**
 * @since 0.1.0
 * @category Symbols
 */
export const TypeId: unique symbol = Symbol.for("typed-quantities/Dimension")

/**
 * @since 0.1.0
 * @category Symbols
 */
export type TypeId = typeof TypeId

/**
 * @since 0.1.0
 * @category Models
 */
export interface Dimension<Name extends string> {
  readonly [TypeId]: TypeId
  readonly name: Name
}

/**
 * Any dimension, whatever its name.
 *
 * @since 0.1.0
 * @category Models
 */
export type Any = Dimension<string>

/**
 * @since 0.1.0
 * @category Constructors
 * @example
 * ```ts
 * const Time = Dimension.make("Time")
 * type Time = typeof Time
 * ```
 */
export const make = <Name extends string>(name: Name): Dimension<Name> => ({
  [TypeId]: TypeId,
  name,
})

/**
 * @since 0.1.0
 * @category Guards
 */
export const isDimension = (u: unknown): u is Any => Predicate.hasProperty(u, TypeId)

/**
 * @since 0.1.0
 * @category Equivalence
 */
export const equals = (self: Any, that: Any): boolean => self.name === that.name
