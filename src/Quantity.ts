/**
 * Quantity container.
 *
 * A quantity stores a single magnitude in the base unit of its dimension. It
 * is created from a value in any unit of that dimension and read back in any
 * unit of that dimension; every conversion takes two hops, source unit to base
 * and base to target unit.
 *
 * The dimension lives in the type parameter, so reading a Temperature in
 * meters does not type-check:
 *
 * ```ts
 * const boiling = Temperature.fromUnit(Celsius, 100)
 * boiling.toUnit(Fahrenheit) // 212
 * boiling.toUnit(Meter)      // type error
 * ```
 *
 * Units whose dimension is only known at run time go through {@link convert},
 * which checks the dimension and fails with a `DimensionMismatchError`.
 *
 * @since 0.1.0
 */

import { Effect, Equal, Hash, Predicate } from "effect"
import { dual } from "effect/Function"
import { NodeInspectSymbol } from "effect/Inspectable"
import * as Dimension from "./Dimension.js"
import { DimensionMismatchError } from "./Errors.js"
import * as Unit from "./Unit.js"

const mismatch = (from: Unit.Any, to: Unit.Any): DimensionMismatchError =>
  new DimensionMismatchError({
    from: from.symbol,
    to: to.symbol,
    fromDimension: from.dimension.name,
    toDimension: to.dimension.name,
  })

/**
 * @since 0.1.0
 * @category Symbols
 */
export const TypeId: unique symbol = Symbol.for("typed-quantities/Quantity")

/**
 * @since 0.1.0
 * @category Symbols
 */
export type TypeId = typeof TypeId

/**
 * An immutable magnitude of dimension `D`, stored in base units.
 *
 * `unit` is the natural unit the quantity was declared with (Kelvin for
 * temperatures, Meter for lengths). It fixes the dimension; it does not change
 * how the value is stored.
 *
 * @since 0.1.0
 * @category Models
 */
export class Quantity<D extends Dimension.Any> implements Equal.Equal {
  readonly [TypeId]: TypeId = TypeId

  constructor(
    readonly unit: Unit.Unit<D>,
    private readonly base: number,
  ) {}

  get dimension(): D {
    return this.unit.dimension
  }

  /**
   * Read the quantity in `target`, which must share its dimension.
   *
   * @throws DimensionMismatchError when the static dimension was erased (a
   * `Quantity<Dimension.Any>`) and `target` belongs to another dimension.
   */
  toUnit(target: Unit.Unit<D>): number {
    if (!Unit.sameDimension(this.unit, target)) {
      throw mismatch(this.unit, target)
    }
    return target.fromBase(this.base)
  }

  /**
   * The stored value in base units. Meant for diagnostics; prefer
   * {@link Quantity.toUnit}.
   */
  rawBase(): number {
    return this.base
  }

  [Equal.symbol](that: Equal.Equal): boolean {
    return isQuantity(that) && Dimension.equals(this.dimension, that.dimension) && this.base === that.rawBase()
  }

  [Hash.symbol](): number {
    return Hash.cached(this, Hash.combine(Hash.number(this.base))(Hash.string(this.dimension.name)))
  }

  toJSON(): unknown {
    return { _id: "Quantity", dimension: this.dimension.name, base: this.base }
  }

  toString(): string {
    return `Quantity(${this.dimension.name}, base=${this.base})`
  }

  [NodeInspectSymbol](): unknown {
    return this.toJSON()
  }
}

/**
 * Constructors for the quantities of one dimension.
 *
 * @since 0.1.0
 * @category Models
 */
export interface Kind<D extends Dimension.Any> {
  readonly dimension: D
  readonly unit: Unit.Unit<D>
  /**
   * Build a quantity from `value` expressed in `source`. Throws
   * `DimensionMismatchError` when a kind of erased dimension is given a
   * foreign unit.
   */
  readonly fromUnit: (source: Unit.Unit<D>, value: number) => Quantity<D>
  /** Build a quantity from a value already in base units. */
  readonly fromBase: (base: number) => Quantity<D>
}

/**
 * Declare the quantity kind of a dimension from its natural unit.
 *
 * @since 0.1.0
 * @category Constructors
 * @example
 * ```ts
 * export const Temperature = Quantity.kind(Kelvin)
 * export type Temperature = Quantity.Quantity<TemperatureDimension>
 * ```
 */
export const kind = <D extends Dimension.Any>(unit: Unit.Unit<D>): Kind<D> => ({
  dimension: unit.dimension,
  unit,
  fromUnit: (source, value) => {
    if (!Unit.sameDimension(source, unit)) {
      throw mismatch(source, unit)
    }
    return new Quantity(unit, source.toBase(value))
  },
  fromBase: (base) => new Quantity(unit, base),
})

/**
 * @since 0.1.0
 * @category Guards
 */
export const isQuantity = (u: unknown): u is Quantity<Dimension.Any> => Predicate.hasProperty(u, TypeId)

/**
 * Data-first and pipeable form of {@link Quantity.toUnit}.
 *
 * @since 0.1.0
 * @category Conversions
 */
export const toUnit: {
  <D extends Dimension.Any>(target: Unit.Unit<D>): (self: Quantity<D>) => number
  <D extends Dimension.Any>(self: Quantity<D>, target: Unit.Unit<D>): number
} = dual(
  2,
  <D extends Dimension.Any>(self: Quantity<D>, target: Unit.Unit<D>): number => self.toUnit(target),
)

/**
 * @since 0.1.0
 * @category Getters
 */
export const rawBase = <D extends Dimension.Any>(self: Quantity<D>): number => self.rawBase()

/**
 * Read a quantity in a unit whose dimension is only known at run time.
 *
 * @since 0.1.0
 * @category Conversions
 */
export const convert: {
  (target: Unit.Any): (self: Quantity<Dimension.Any>) => Effect.Effect<number, DimensionMismatchError>
  (self: Quantity<Dimension.Any>, target: Unit.Any): Effect.Effect<number, DimensionMismatchError>
} = dual(
  2,
  (self: Quantity<Dimension.Any>, target: Unit.Any): Effect.Effect<number, DimensionMismatchError> =>
    Effect.map(Unit.ensureSameDimension(self.unit, target), () => target.fromBase(self.rawBase())),
)
