/**
 * Model Emitter
 *
 * Turns one TableDescriptor into the complete text of a Java entity class.
 * `buildSpec` does the naming, type resolution and validation; the renderer
 * only formats the result.
 */

import type { GeneratedClassSpec, GeneratedField, TableDescriptor } from './catalog-model.js'
import { DuplicateFieldNameError, InvalidIdentifierError } from './errors.js'
import { DEFAULT_INDENT, FRAMEWORK_IMPORTS, JavaClassRenderer, javaString } from './java-renderer.js'
import { TypeMappingTable } from './type-mapping.js'
import { normalize } from '../generators/naming.js'
import { identifierProblem } from '../generators/java-identifiers.js'

export const JAVA_EXTENSION = '.java'

export interface ModelEmitterOptions {
  /** Type table to resolve column types with (default: built-in mappings) */
  typeMappings?: TypeMappingTable
  renderer?: JavaClassRenderer
}

export class ModelEmitter {
  private readonly typeMappings: TypeMappingTable
  private readonly renderer: JavaClassRenderer

  constructor(options: ModelEmitterOptions = {}) {
    this.typeMappings = options.typeMappings ?? new TypeMappingTable()
    this.renderer = options.renderer ?? new JavaClassRenderer()
  }

  /**
   * Complete file text for `table`
   *
   * @throws UnknownTypeError, DuplicateFieldNameError, InvalidIdentifierError
   */
  emit(table: TableDescriptor, packageName: string, indent: string = DEFAULT_INDENT): string {
    return this.renderer.render(this.buildSpec(table, packageName), indent)
  }

  fileName(table: TableDescriptor): string {
    return `${this.className(table)}${JAVA_EXTENSION}`
  }

  buildSpec(table: TableDescriptor, packageName: string): GeneratedClassSpec {
    const className = this.className(table)
    const imports = new Set<string>()
    const fields: GeneratedField[] = []
    const columnsByField = new Map<string, string>()

    for (const column of table.columns) {
      const { fieldType, requiredImport } = this.typeMappings.resolve(column.sqlType)
      const fieldName = normalize(column.name, true)

      const problem = identifierProblem(fieldName)
      if (problem) {
        throw new InvalidIdentifierError(column.name, fieldName, problem)
      }

      const previous = columnsByField.get(fieldName)
      if (previous !== undefined) {
        throw new DuplicateFieldNameError(table.name, fieldName, [previous, column.name])
      }
      columnsByField.set(fieldName, column.name)

      if (requiredImport && !FRAMEWORK_IMPORTS.includes(requiredImport)) {
        imports.add(requiredImport)
      }

      fields.push({
        annotationArgs: `name = ${javaString(column.name)}`,
        fieldType,
        fieldName,
      })
    }

    const valueImports = [...imports].sort()
    const clash = typeClash(className, [...FRAMEWORK_IMPORTS, ...valueImports], fields)
    if (clash) {
      throw new InvalidIdentifierError(table.name, className, clash)
    }

    return {
      className,
      packageName,
      tableName: table.name,
      imports: valueImports,
      fields,
    }
  }

  private className(table: TableDescriptor): string {
    const className = normalize(table.name, false)
    const problem = identifierProblem(className)
    if (problem) {
      throw new InvalidIdentifierError(table.name, className, problem)
    }
    return className
  }
}

/**
 * A class may not share its simple name with a type its file imports or
 * its fields use.
 */
function typeClash(className: string, imports: readonly string[], fields: readonly GeneratedField[]): string | null {
  const imported = imports.find((name) => name.slice(name.lastIndexOf('.') + 1) === className)
  if (imported) {
    return `clashes with the imported type '${imported}'`
  }

  const field = fields.find((candidate) => candidate.fieldType.replace(/\[\]$/, '') === className)
  if (field) {
    return `clashes with the field type '${field.fieldType}'`
  }

  return null
}
