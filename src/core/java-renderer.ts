/**
 * Java Class Renderer
 *
 * Serializes a GeneratedClassSpec into the text of a JPA entity class.
 * Indentation, annotation syntax and import layout are decided here only.
 *
 * Output layout:
 *   package ...;
 *   framework imports (fixed)
 *   value-type imports (GeneratedClassSpec.imports, already sorted)
 *   class annotations + @Table
 *   class body: serialVersionUID, then one @Column field per column
 */

import type { GeneratedClassSpec, GeneratedField } from './catalog-model.js'

/** Imports every generated entity needs, independent of its columns */
export const FRAMEWORK_IMPORTS: readonly string[] = [
  'jakarta.persistence.Column',
  'jakarta.persistence.Entity',
  'jakarta.persistence.Id',
  'jakarta.persistence.Table',
  'java.io.Serial',
  'java.io.Serializable',
  'lombok.AllArgsConstructor',
  'lombok.Data',
  'lombok.NoArgsConstructor',
]

export const CLASS_ANNOTATIONS: readonly string[] = [
  '@Data',
  '@NoArgsConstructor',
  '@AllArgsConstructor',
  '@Entity',
]

export const DEFAULT_INDENT = '    '

export class JavaClassRenderer {
  render(spec: GeneratedClassSpec, indent: string = DEFAULT_INDENT): string {
    const lines: string[] = []

    lines.push(`package ${spec.packageName};`)
    lines.push('')

    for (const imported of FRAMEWORK_IMPORTS) {
      lines.push(`import ${imported};`)
    }
    lines.push('')

    if (spec.imports.length > 0) {
      for (const imported of spec.imports) {
        lines.push(`import ${imported};`)
      }
      lines.push('')
    }

    lines.push(...CLASS_ANNOTATIONS)
    lines.push(`@Table(name = ${javaString(spec.tableName)})`)
    lines.push(`public class ${spec.className} implements Serializable {`)
    lines.push('')
    lines.push(`${indent}@Serial`)
    lines.push(`${indent}private static final long serialVersionUID = 1L;`)

    spec.fields.forEach((field, index) => {
      lines.push('')
      lines.push(...this.renderField(field, index === 0, indent))
    })

    lines.push('}')
    lines.push('')

    return lines.join('\n')
  }

  private renderField(field: GeneratedField, isId: boolean, indent: string): string[] {
    const lines: string[] = []
    if (isId) {
      lines.push(`${indent}@Id`)
    }
    lines.push(`${indent}@Column(${field.annotationArgs})`)
    lines.push(`${indent}private ${field.fieldType} ${field.fieldName};`)
    return lines
  }
}

/**
 * Quote a value as a Java string literal
 *
 * @example
 * javaString('order_items') // => '"order_items"'
 */
export function javaString(value: string): string {
  return `"${value.replace(/\\/g, '\\\\').replace(/"/g, '\\"')}"`
}
