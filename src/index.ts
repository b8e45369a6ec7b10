/**
 * @since 0.1.0
 */
export * from "./Errors.js"

/**
 * @since 0.1.0
 */
export * as Dimension from "./Dimension.js"

/**
 * @since 0.1.0
 */
export * as Unit from "./Unit.js"

/**
 * @since 0.1.0
 */
export * as Quantity from "./Quantity.js"

/**
 * @since 0.1.0
 */
export * from "./Temperature.js"

/**
 * @since 0.1.0
 */
export * from "./Length.js"

/**
 * @since 0.1.0
 */
export * as Catalog from "./Catalog.js"

/**
 * @since 0.1.0
 */
export * as Display from "./Display.js"
