/**
 * jpa-model-gen Generators
 *
 * Naming and identifier utilities shared by the model emitter
 */

// Naming utilities
export { normalize, titleCase, toCamelCase, toPascalCase } from './naming.js'

// Java identifier rules
export { identifierProblem, packageNameProblem, getReservedWords } from './java-identifiers.js'
