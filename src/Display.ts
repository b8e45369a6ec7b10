/**
 * Numeric display helper.
 *
 * Renders a number with at most `precision` fractional digits and strips
 * trailing zeros, then a trailing decimal point: `2.000` prints as `2` and
 * `1.50` as `1.5`. Two rounding modes are supported:
 *
 * - `round`: round to nearest, halves away from zero (`2.5` → `3`, `-2.5` → `-3`)
 * - `trunc`: drop the extra digits, toward zero (`-0.5001` → `-0.5`)
 *
 * Rounding happens before the value is turned into text, so `9.996` at
 * precision 2 carries over to `10`. Negative zero prints as `0`. Magnitudes of
 * 1e21 and above print in exponent notation. `NaN` and infinities are rejected
 * with a `NonFiniteValueError`.
 *
 * The {@link Display} service carries default options, read from
 * configuration by {@link Display.layerConfig}.
 *
 * @since 0.1.0
 */

import { Config, Context, Effect, Layer, Schema } from "effect"
import type * as Dimension from "./Dimension.js"
import { type DisplayError, InvalidPrecisionError, NonFiniteValueError } from "./Errors.js"
import type * as Quantity from "./Quantity.js"
import type * as Unit from "./Unit.js"

/**
 * @since 0.1.0
 * @category Schemas
 */
export const RoundingMode = Schema.Literal("round", "trunc")

/**
 * @since 0.1.0
 * @category Schemas
 */
export type RoundingMode = typeof RoundingMode.Type

/**
 * Largest number of fractional digits that can be requested.
 *
 * @since 0.1.0
 * @category Constants
 */
export const MAX_PRECISION = 100

/**
 * @since 0.1.0
 * @category Schemas
 */
export const Precision = Schema.Int.pipe(Schema.between(0, MAX_PRECISION))

/**
 * @since 0.1.0
 * @category Models
 */
export interface DisplayOptions {
  readonly precision: number
  readonly mode: RoundingMode
}

/**
 * @since 0.1.0
 * @category Constants
 */
export const defaultOptions: DisplayOptions = { precision: 2, mode: "round" }

const isPrecision = Schema.is(Precision)

const resolveOptions = (options: Partial<DisplayOptions>): DisplayOptions => ({
  precision: options.precision ?? defaultOptions.precision,
  mode: options.mode ?? defaultOptions.mode,
})

const roundHalfAwayFromZero = (value: number): number => Math.sign(value) * Math.round(Math.abs(value))

const applyMode = (value: number, precision: number, mode: RoundingMode): number => {
  const factor = 10 ** precision
  const scaled = value * factor
  if (!Number.isFinite(scaled)) {
    return value
  }
  const adjusted = mode === "round" ? roundHalfAwayFromZero(scaled) : Math.trunc(scaled)
  return adjusted / factor
}

const trimFraction = (text: string, precision: number): string => {
  const dot = text.indexOf(".")
  if (dot === -1 || text.includes("e")) {
    return text
  }
  let end = Math.min(text.length, dot + 1 + precision)
  while (end > dot + 1 && text[end - 1] === "0") {
    end--
  }
  return end === dot + 1 ? text.slice(0, dot) : text.slice(0, end)
}

const render = (value: number, precision: number, mode: RoundingMode): string => {
  const adjusted = applyMode(value, precision, mode)
  // shortest round-trip text, unless it would use exponent notation
  const shortest = String(adjusted)
  const text = shortest.includes("e") ? adjusted.toFixed(precision) : shortest
  return trimFraction(text, precision)
}

const validate = (value: number, precision: number): DisplayError | undefined => {
  if (!Number.isFinite(value)) {
    return new NonFiniteValueError({ value })
  }
  if (!isPrecision(precision)) {
    return new InvalidPrecisionError({ precision })
  }
  return undefined
}

/**
 * Format a number. Missing options fall back to {@link defaultOptions}.
 *
 * @since 0.1.0
 * @category Formatting
 * @example
 * ```ts
 * yield* format(1.2345, { precision: 2 })                   // "1.23"
 * yield* format(-0.5001, { precision: 2, mode: "trunc" })   // "-0.5"
 * ```
 */
export const format = (
  value: number,
  options: Partial<DisplayOptions> = {},
): Effect.Effect<string, DisplayError> => {
  const { precision, mode } = resolveOptions(options)
  const error = validate(value, precision)
  return error ? Effect.fail(error) : Effect.succeed(render(value, precision, mode))
}

/**
 * Like {@link format}, but throws the `NonFiniteValueError` or
 * `InvalidPrecisionError` instead of failing an effect.
 *
 * @since 0.1.0
 * @category Formatting
 */
export const unsafeFormat = (value: number, options: Partial<DisplayOptions> = {}): string => {
  const { precision, mode } = resolveOptions(options)
  const error = validate(value, precision)
  if (error) {
    throw error
  }
  return render(value, precision, mode)
}

/**
 * Format a quantity read in `unit`, followed by the unit symbol.
 *
 * @since 0.1.0
 * @category Formatting
 * @example
 * ```ts
 * yield* formatQuantity(Temperature.fromUnit(Fahrenheit, 85.6), Celsius) // "29.78 °C"
 * ```
 */
export const formatQuantity = <D extends Dimension.Any>(
  quantity: Quantity.Quantity<D>,
  unit: Unit.Unit<D>,
  options: Partial<DisplayOptions> = {},
): Effect.Effect<string, DisplayError> =>
  Effect.map(format(quantity.toUnit(unit), options), (text) => `${text} ${unit.symbol}`)

/**
 * Default display options read from `DISPLAY_PRECISION` and `DISPLAY_MODE`.
 *
 * @since 0.1.0
 * @category Config
 */
export const DisplayConfig: Config.Config<DisplayOptions> = Config.all({
  precision: Config.integer("PRECISION").pipe(Config.withDefault(defaultOptions.precision)),
  mode: Schema.Config("MODE", RoundingMode).pipe(Config.withDefault(defaultOptions.mode)),
}).pipe(Config.nested("DISPLAY"))

/**
 * @since 0.1.0
 * @category Services
 */
export interface DisplayService {
  readonly options: DisplayOptions
  readonly format: (value: number, overrides?: Partial<DisplayOptions>) => Effect.Effect<string, DisplayError>
  readonly formatQuantity: <D extends Dimension.Any>(
    quantity: Quantity.Quantity<D>,
    unit: Unit.Unit<D>,
    overrides?: Partial<DisplayOptions>,
  ) => Effect.Effect<string, DisplayError>
}

const withOverrides = (options: DisplayOptions, overrides: Partial<DisplayOptions>): DisplayOptions => ({
  precision: overrides.precision ?? options.precision,
  mode: overrides.mode ?? options.mode,
})

const make = (options: Partial<DisplayOptions>): Effect.Effect<DisplayService, InvalidPrecisionError> =>
  Effect.gen(function* () {
    const resolved = resolveOptions(options)
    if (!isPrecision(resolved.precision)) {
      return yield* Effect.fail(new InvalidPrecisionError({ precision: resolved.precision }))
    }
    yield* Effect.logDebug("Display options resolved").pipe(
      Effect.annotateLogs({ precision: resolved.precision, mode: resolved.mode }),
    )

    const service: DisplayService = {
      options: resolved,
      format: (value, overrides = {}) => format(value, withOverrides(resolved, overrides)),
      formatQuantity: <D extends Dimension.Any>(
        quantity: Quantity.Quantity<D>,
        unit: Unit.Unit<D>,
        overrides: Partial<DisplayOptions> = {},
      ) => formatQuantity(quantity, unit, withOverrides(resolved, overrides)),
    }

    return service
  })

/**
 * Formatting with default options fixed when the layer is built.
 *
 * @since 0.1.0
 * @category Services
 */
export class Display extends Context.Tag("typed-quantities/Display")<Display, DisplayService>() {
  static layer(options: Partial<DisplayOptions> = {}) {
    return Layer.effect(this, make(options))
  }

  static readonly layerConfig = Layer.effect(this, Effect.flatMap(DisplayConfig, make))
}
