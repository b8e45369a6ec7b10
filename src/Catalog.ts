/**
 * Lookup of the known units by symbol or name.
 *
 * The catalog is closed: it holds the temperature and length units and nothing
 * can be added at run time. Units found here have lost their static dimension,
 * so conversions between them check dimensions explicitly and fail with a
 * `DimensionMismatchError` instead of producing a meaningless number.
 *
 * @since 0.1.0
 */

import { Effect, Schema } from "effect"
import type { ConversionError } from "./Errors.js"
import { UnitNotFoundError } from "./Errors.js"
import type { LengthDimension } from "./Length.js"
import { Foot, Kilometer, Length, LengthUnitName, LengthUnits, Meter } from "./Length.js"
import type { TemperatureDimension } from "./Temperature.js"
import {
  Celsius,
  Fahrenheit,
  isTemperatureUnit,
  Kelvin,
  Temperature,
  TemperatureUnitName,
  TemperatureUnits,
} from "./Temperature.js"
import * as Unit from "./Unit.js"

/**
 * A unit of one of the catalog's dimensions.
 *
 * @since 0.1.0
 * @category Units
 */
export type CatalogUnit = Unit.Unit<TemperatureDimension> | Unit.Unit<LengthDimension>

/**
 * Every unit in the catalog.
 *
 * @since 0.1.0
 * @category Units
 */
export const units: ReadonlyArray<CatalogUnit> = [Kelvin, Celsius, Fahrenheit, Meter, Kilometer, Foot]

/**
 * @since 0.1.0
 * @category Schemas
 */
export const UnitName = Schema.Union(TemperatureUnitName, LengthUnitName)

/**
 * @since 0.1.0
 * @category Schemas
 */
export type UnitName = typeof UnitName.Type

/**
 * @since 0.1.0
 * @category Schemas
 */
export const UnitSymbol = Schema.Literal("K", "°C", "°F", "m", "km", "ft")

/**
 * @since 0.1.0
 * @category Schemas
 */
export type UnitSymbol = typeof UnitSymbol.Type

const bySymbol: { readonly [S in UnitSymbol]: CatalogUnit } = {
  K: Kelvin,
  "°C": Celsius,
  "°F": Fahrenheit,
  m: Meter,
  km: Kilometer,
  ft: Foot,
}

const byName: { readonly [N in UnitName]: CatalogUnit } = { ...TemperatureUnits, ...LengthUnits }

const isUnitSymbol = Schema.is(UnitSymbol)

const isUnitName = Schema.is(UnitName)

const capitalize = (name: string): string => name.charAt(0).toUpperCase() + name.slice(1).toLowerCase()

const lookupUnit = (symbol: string): CatalogUnit | undefined => {
  const trimmed = symbol.trim()
  if (isUnitSymbol(trimmed)) {
    return bySymbol[trimmed]
  }
  const name = capitalize(trimmed)
  return isUnitName(name) ? byName[name] : undefined
}

/**
 * Find a unit by its exact symbol ("°C", "km") or by its name, ignoring case
 * ("celsius", "Kilometer").
 *
 * @since 0.1.0
 * @category Lookup
 */
export const find = (symbol: string): Effect.Effect<CatalogUnit, UnitNotFoundError> => {
  const unit = lookupUnit(symbol)
  return unit
    ? Effect.succeed(unit)
    : Effect.logDebug("Unit lookup failed").pipe(
        Effect.annotateLogs("symbol", symbol),
        Effect.zipRight(Effect.fail(new UnitNotFoundError({ symbol }))),
      )
}

/**
 * Convert a scalar between two units given by symbol or name.
 *
 * @since 0.1.0
 * @category Conversions
 * @example
 * ```ts
 * const fahrenheit = yield* Catalog.convertValue(100, "°C", "°F") // 212
 * ```
 */
export const convertValue = (
  value: number,
  fromSymbol: string,
  toSymbol: string,
): Effect.Effect<number, ConversionError> =>
  Effect.gen(function* () {
    const from = yield* find(fromSymbol)
    const to = yield* find(toSymbol)
    yield* Unit.ensureSameDimension(from, to)
    return to.fromBase(from.toBase(value))
  })

/**
 * Build a quantity from a value in the unit given by symbol or name. The
 * result is declared with the base unit of that unit's dimension, and must be
 * narrowed with `isTemperature` or `isLength` before `toUnit` accepts a unit.
 *
 * @since 0.1.0
 * @category Constructors
 * @example
 * ```ts
 * const quantity = yield* Catalog.quantityFromUnit("ft", 3)
 * if (isLength(quantity)) quantity.toUnit(Meter) // 0.9144
 * ```
 */
export const quantityFromUnit = (
  symbol: string,
  value: number,
): Effect.Effect<Temperature | Length, UnitNotFoundError> =>
  Effect.map(find(symbol), (unit) =>
    isTemperatureUnit(unit) ? Temperature.fromUnit(unit, value) : Length.fromUnit(unit, value))
