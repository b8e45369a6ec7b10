import { describe, expect, it } from "@effect/vitest"
import { ConfigError, ConfigProvider, Effect } from "effect"
import { Display, format, formatQuantity, unsafeFormat } from "../src/Display.js"
import { InvalidPrecisionError, NonFiniteValueError } from "../src/Errors.js"
import { Foot, Kilometer, Length, Meter } from "../src/Length.js"
import { Celsius, Fahrenheit, Kelvin, Temperature } from "../src/Temperature.js"

describe("Display", () => {
  describe("unsafeFormat", () => {
    it("rounds to the requested precision", () => {
      expect(unsafeFormat(1.2345, { precision: 2, mode: "round" })).toBe("1.23")
      expect(unsafeFormat(1.23456, { precision: 3 })).toBe("1.235")
    })

    it("defaults to two digits and rounding", () => {
      expect(unsafeFormat(3.14159)).toBe("3.14")
    })

    it("trims trailing zeros and the decimal point", () => {
      expect(unsafeFormat(2.0, { precision: 3 })).toBe("2")
      expect(unsafeFormat(1.5, { precision: 4 })).toBe("1.5")
      expect(unsafeFormat(0.1 + 0.2, { precision: 10 })).toBe("0.3")
    })

    it("keeps zeros of the integer part", () => {
      expect(unsafeFormat(100, { precision: 2 })).toBe("100")
      expect(unsafeFormat(3200, { precision: 3 })).toBe("3200")
    })

    it("rounds before rendering so carries reach the integer part", () => {
      expect(unsafeFormat(9.996, { precision: 2 })).toBe("10")
    })

    it("rounds halves away from zero", () => {
      expect(unsafeFormat(12.5, { precision: 0 })).toBe("13")
      expect(unsafeFormat(-12.5, { precision: 0 })).toBe("-13")
      expect(unsafeFormat(0.125, { precision: 2 })).toBe("0.13")
      expect(unsafeFormat(-0.125, { precision: 2 })).toBe("-0.13")
    })

    it("truncates toward zero", () => {
      expect(unsafeFormat(-0.5001, { precision: 2, mode: "trunc" })).toBe("-0.5")
      expect(unsafeFormat(1234.5678, { precision: 1, mode: "trunc" })).toBe("1234.5")
      expect(unsafeFormat(2.79, { precision: 1, mode: "trunc" })).toBe("2.7")
    })

    it("renders precision zero without a decimal point", () => {
      expect(unsafeFormat(41.7, { precision: 0 })).toBe("42")
      expect(unsafeFormat(41.7, { precision: 0, mode: "trunc" })).toBe("41")
    })

    it("prints negative zero as zero", () => {
      expect(unsafeFormat(-0.001, { precision: 2 })).toBe("0")
      expect(unsafeFormat(-0.001, { precision: 2, mode: "trunc" })).toBe("0")
    })

    it("avoids exponent notation for small values", () => {
      expect(unsafeFormat(0.00000015, { precision: 8 })).toBe("0.00000015")
    })

    it("keeps exponent notation for huge values", () => {
      expect(unsafeFormat(1e25, { precision: 0 })).toBe("1e+25")
    })

    it("throws on non-finite values", () => {
      expect(() => unsafeFormat(Number.NaN)).toThrow(NonFiniteValueError)
      expect(() => unsafeFormat(Number.POSITIVE_INFINITY)).toThrow("Cannot format non-finite value Infinity")
    })

    it("throws on invalid precisions", () => {
      expect(() => unsafeFormat(1, { precision: -1 })).toThrow(InvalidPrecisionError)
      expect(() => unsafeFormat(1, { precision: 1.5 })).toThrow(
        "Invalid precision 1.5: must be an integer between 0 and 100",
      )
      expect(() => unsafeFormat(1, { precision: 101 })).toThrow(InvalidPrecisionError)
    })
  })

  describe("format", () => {
    it.effect("formats inside an effect", () =>
      Effect.gen(function* () {
        expect(yield* format(1.2345, { precision: 2 })).toBe("1.23")
      }),
    )

    it.effect("fails with NonFiniteValueError", () =>
      Effect.gen(function* () {
        const error = yield* format(Number.NEGATIVE_INFINITY).pipe(Effect.flip)
        expect(error).toBeInstanceOf(NonFiniteValueError)
        expect(error.message).toBe("Cannot format non-finite value -Infinity")
      }),
    )

    it.effect("supports catchTag on InvalidPrecisionError", () =>
      Effect.gen(function* () {
        const handled = yield* format(1, { precision: -2 }).pipe(
          Effect.catchTag("InvalidPrecisionError", (error) => Effect.succeed(`fallback ${error.precision}`)),
        )
        expect(handled).toBe("fallback -2")
      }),
    )

    it.effect("formats quantities with their unit symbol", () =>
      Effect.gen(function* () {
        const hot = Temperature.fromUnit(Fahrenheit, 85.6)
        expect(yield* formatQuantity(hot, Celsius)).toBe("29.78 °C")
        expect(yield* formatQuantity(hot, Kelvin)).toBe("302.93 K")

        const distance = Length.fromUnit(Kilometer, 3.2)
        expect(yield* formatQuantity(distance, Meter, { precision: 3 })).toBe("3200 m")
        expect(yield* formatQuantity(distance, Foot, { precision: 3 })).toBe("10498.688 ft")
      }),
    )
  })

  describe("service", () => {
    it.effect("applies the options it was built with", () =>
      Effect.gen(function* () {
        const display = yield* Display
        expect(display.options).toEqual({ precision: 3, mode: "round" })
        expect(yield* display.format(1.23456)).toBe("1.235")
        expect(yield* display.format(1.23456, { mode: "trunc" })).toBe("1.234")
        expect(yield* display.formatQuantity(Temperature.fromUnit(Celsius, 41), Fahrenheit)).toBe("105.8 °F")
      }).pipe(Effect.provide(Display.layer({ precision: 3 }))),
    )

    it.effect("keeps its own options for overrides left undefined", () =>
      Effect.gen(function* () {
        const display = yield* Display
        expect(yield* display.format(1.23456, { precision: undefined })).toBe("1.2346")
        expect(yield* display.format(1.23456, { mode: undefined })).toBe("1.2346")
        expect(yield* display.formatQuantity(Length.fromUnit(Meter, 1.23456), Meter, { precision: undefined })).toBe(
          "1.2346 m",
        )
      }).pipe(Effect.provide(Display.layer({ precision: 4 }))),
    )

    it.effect("refuses to build with an invalid precision", () =>
      Effect.gen(function* () {
        const error = yield* Effect.flip(Effect.provide(Display, Display.layer({ precision: -1 })))
        expect(error).toBeInstanceOf(InvalidPrecisionError)
      }),
    )

    it.effect("reads defaults from configuration", () =>
      Effect.gen(function* () {
        const display = yield* Display
        expect(display.options).toEqual({ precision: 1, mode: "trunc" })
        expect(yield* display.format(2.79)).toBe("2.7")
      }).pipe(
        Effect.provide(Display.layerConfig),
        Effect.withConfigProvider(ConfigProvider.fromJson({ DISPLAY: { PRECISION: 1, MODE: "trunc" } })),
      ),
    )

    it.effect("falls back to default options when nothing is configured", () =>
      Effect.gen(function* () {
        const display = yield* Display
        expect(display.options).toEqual({ precision: 2, mode: "round" })
      }).pipe(Effect.provide(Display.layerConfig), Effect.withConfigProvider(ConfigProvider.fromJson({}))),
    )

    it.effect("rejects an unknown rounding mode", () =>
      Effect.gen(function* () {
        const error = yield* Effect.flip(Effect.provide(Display, Display.layerConfig))
        expect(ConfigError.isConfigError(error)).toBe(true)
      }).pipe(Effect.withConfigProvider(ConfigProvider.fromJson({ DISPLAY: { MODE: "bankers" } }))),
    )
  })
})
