/**
 * Core Module
 *
 * Catalog model, reader, type mapping, emitter and generation driver.
 */

export * from './catalog-model.js'
export * from './catalog-reader.js'
export * from './errors.js'
export * from './type-mapping.js'
export * from './java-renderer.js'
export * from './model-emitter.js'
export * from './generation-driver.js'
