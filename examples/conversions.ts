import { Console, Effect } from "effect"
import { Display } from "../src/Display.js"
import { Foot, Kilometer, Length, Meter } from "../src/Length.js"
import { Celsius, Fahrenheit, Kelvin, Temperature } from "../src/Temperature.js"

const program = Effect.gen(function* () {
  const display = yield* Display

  const hot = Temperature.fromUnit(Fahrenheit, 85.6)
  const fahrenheit = yield* display.formatQuantity(hot, Fahrenheit)
  yield* Console.log(`Temp = ${fahrenheit} is ${yield* display.formatQuantity(hot, Celsius)}`)
  yield* Console.log(`Temp = ${fahrenheit} is ${yield* display.formatQuantity(hot, Kelvin)}`)

  const warm = Temperature.fromUnit(Celsius, 41)
  yield* Console.log(
    `Temp = ${yield* display.formatQuantity(warm, Celsius)} is ${yield* display.formatQuantity(warm, Fahrenheit)}`,
  )

  const distance = Length.fromUnit(Kilometer, 3.2)
  const kilometers = yield* display.formatQuantity(distance, Kilometer)
  yield* Console.log(`Length = ${kilometers} is ${yield* display.formatQuantity(distance, Meter, { precision: 3 })}`)
  yield* Console.log(`Length = ${kilometers} is ${yield* display.formatQuantity(distance, Foot, { precision: 3 })}`)
}).pipe(Effect.provide(Display.layerConfig))

Effect.runPromise(program).catch((error) => {
  console.error("Failed to run conversions example", error)
  process.exitCode = 1
})
