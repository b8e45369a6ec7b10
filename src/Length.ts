/**
 * Length units, stored in meters.
 *
 * The international foot is exactly 0.3048 m.
 *
 * @since 0.1.0
 */

import { Schema } from "effect"
import * as Dimension from "./Dimension.js"
import * as Quantity from "./Quantity.js"
import * as Unit from "./Unit.js"

const METERS_PER_KILOMETER = 1000
const METERS_PER_FOOT = 0.3048

/**
 * @since 0.1.0
 * @category Dimensions
 */
export const LengthDimension = Dimension.make("Length")

/**
 * @since 0.1.0
 * @category Dimensions
 */
export type LengthDimension = typeof LengthDimension

/**
 * @since 0.1.0
 * @category Units
 */
export const Meter: Unit.Unit<LengthDimension> = Unit.base({
  name: "Meter",
  symbol: "m",
  dimension: LengthDimension,
})

/**
 * @since 0.1.0
 * @category Units
 */
export const Kilometer: Unit.Unit<LengthDimension> = Unit.make({
  name: "Kilometer",
  symbol: "km",
  dimension: LengthDimension,
  toBase: (value) => value * METERS_PER_KILOMETER,
  fromBase: (value) => value / METERS_PER_KILOMETER,
})

/**
 * @since 0.1.0
 * @category Units
 */
export const Foot: Unit.Unit<LengthDimension> = Unit.make({
  name: "Foot",
  symbol: "ft",
  dimension: LengthDimension,
  toBase: (value) => value * METERS_PER_FOOT,
  fromBase: (value) => value / METERS_PER_FOOT,
})

/**
 * @since 0.1.0
 * @category Units
 */
export const LengthUnits = { Meter, Kilometer, Foot } as const

/**
 * @since 0.1.0
 * @category Schemas
 */
export const LengthUnitName = Schema.Literal("Meter", "Kilometer", "Foot")

/**
 * @since 0.1.0
 * @category Schemas
 */
export type LengthUnitName = typeof LengthUnitName.Type

/**
 * @since 0.1.0
 * @category Quantities
 * @example
 * ```ts
 * const distance = Length.fromUnit(Kilometer, 5)
 * distance.toUnit(Meter) // 5000
 * ```
 */
export const Length: Quantity.Kind<LengthDimension> = Quantity.kind(Meter)

/**
 * @since 0.1.0
 * @category Quantities
 */
export type Length = Quantity.Quantity<LengthDimension>

/**
 * @since 0.1.0
 * @category Guards
 */
export const isLengthUnit = (unit: Unit.Any): unit is Unit.Unit<LengthDimension> =>
  Dimension.equals(unit.dimension, LengthDimension)

/**
 * @since 0.1.0
 * @category Guards
 */
export const isLength = (u: unknown): u is Length =>
  Quantity.isQuantity(u) && Dimension.equals(u.dimension, LengthDimension)
