/**
 * Temperature units.
 *
 * Temperatures are stored in Kelvin, the base unit of the dimension.
 *
 * - **Kelvin (K)**: absolute scale, base unit
 * - **Celsius (°C)**: Kelvin shifted by 273.15
 * - **Fahrenheit (°F)**: water freezes at 32 °F and boils at 212 °F
 *
 * Values below absolute zero are not rejected.
 *
 * @since 0.1.0
 */

import { Schema } from "effect"
import * as Dimension from "./Dimension.js"
import * as Quantity from "./Quantity.js"
import * as Unit from "./Unit.js"

const CELSIUS_TO_KELVIN_OFFSET = 273.15
const FAHRENHEIT_FREEZING_POINT = 32
const FAHRENHEIT_DEGREE_RATIO = 9 / 5
const CELSIUS_DEGREE_RATIO = 5 / 9

/**
 * @since 0.1.0
 * @category Dimensions
 */
export const TemperatureDimension = Dimension.make("Temperature")

/**
 * @since 0.1.0
 * @category Dimensions
 */
export type TemperatureDimension = typeof TemperatureDimension

/**
 * @since 0.1.0
 * @category Units
 */
export const Kelvin: Unit.Unit<TemperatureDimension> = Unit.base({
  name: "Kelvin",
  symbol: "K",
  dimension: TemperatureDimension,
})

/**
 * @since 0.1.0
 * @category Units
 */
export const Celsius: Unit.Unit<TemperatureDimension> = Unit.make({
  name: "Celsius",
  symbol: "°C",
  dimension: TemperatureDimension,
  toBase: (value) => value + CELSIUS_TO_KELVIN_OFFSET,
  fromBase: (value) => value - CELSIUS_TO_KELVIN_OFFSET,
})

/**
 * @since 0.1.0
 * @category Units
 */
export const Fahrenheit: Unit.Unit<TemperatureDimension> = Unit.make({
  name: "Fahrenheit",
  symbol: "°F",
  dimension: TemperatureDimension,
  toBase: (value) => (value - FAHRENHEIT_FREEZING_POINT) * CELSIUS_DEGREE_RATIO + CELSIUS_TO_KELVIN_OFFSET,
  fromBase: (value) => (value - CELSIUS_TO_KELVIN_OFFSET) * FAHRENHEIT_DEGREE_RATIO + FAHRENHEIT_FREEZING_POINT,
})

/**
 * Every temperature unit, keyed by name.
 *
 * @since 0.1.0
 * @category Units
 */
export const TemperatureUnits = { Kelvin, Celsius, Fahrenheit } as const

/**
 * @since 0.1.0
 * @category Schemas
 */
export const TemperatureUnitName = Schema.Literal("Kelvin", "Celsius", "Fahrenheit")

/**
 * @since 0.1.0
 * @category Schemas
 */
export type TemperatureUnitName = typeof TemperatureUnitName.Type

/**
 * Constructors for temperatures.
 *
 * @since 0.1.0
 * @category Quantities
 * @example
 * ```ts
 * const freezing = Temperature.fromUnit(Celsius, 0)
 * freezing.toUnit(Fahrenheit) // 32
 * freezing.toUnit(Kelvin)     // 273.15
 * ```
 */
export const Temperature: Quantity.Kind<TemperatureDimension> = Quantity.kind(Kelvin)

/**
 * @since 0.1.0
 * @category Quantities
 */
export type Temperature = Quantity.Quantity<TemperatureDimension>

/**
 * @since 0.1.0
 * @category Guards
 */
export const isTemperatureUnit = (unit: Unit.Any): unit is Unit.Unit<TemperatureDimension> =>
  Dimension.equals(unit.dimension, TemperatureDimension)

/**
 * @since 0.1.0
 * @category Guards
 */
export const isTemperature = (u: unknown): u is Temperature =>
  Quantity.isQuantity(u) && Dimension.equals(u.dimension, TemperatureDimension)
