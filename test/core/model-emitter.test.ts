/**
 * Model Emitter Tests
 *
 * Covers class-spec building (naming, types, imports, validation) and the rendered
 * Java text.
 */

import { describe, it, expect } from 'vitest'
import { ModelEmitter } from '../../src/core/model-emitter.js'
import { JavaClassRenderer, FRAMEWORK_IMPORTS, javaString } from '../../src/core/java-renderer.js'
import { TypeMappingTable } from '../../src/core/type-mapping.js'
import {
  DuplicateFieldNameError,
  InvalidIdentifierError,
  UnknownTypeError,
} from '../../src/core/errors.js'
import type { TableDescriptor } from '../../src/core/catalog-model.js'

const PACKAGE = 'com.example.model'

function table(name: string, columns: Array<[string, string]>): TableDescriptor {
  return { name, columns: columns.map(([columnName, sqlType]) => ({ name: columnName, sqlType })) }
}

const orderItems = table('order_items', [
  ['id', 'INT'],
  ['unit_price', 'DECIMAL'],
  ['created_at', 'DATETIME'],
])

describe('ModelEmitter', () => {
  const emitter = new ModelEmitter()

  describe('fileName', () => {
    it('uses the Pascal-cased table name', () => {
      expect(emitter.fileName(orderItems)).toBe('OrderItems.java')
      expect(emitter.fileName(table('order-line-item', []))).toBe('OrderLineItem.java')
    })
  })

  describe('buildSpec', () => {
    it('builds the class spec for order_items', () => {
      expect(emitter.buildSpec(orderItems, PACKAGE)).toEqual({
        className: 'OrderItems',
        packageName: PACKAGE,
        tableName: 'order_items',
        imports: ['java.math.BigDecimal', 'java.util.Date'],
        fields: [
          { annotationArgs: 'name = "id"', fieldType: 'Integer', fieldName: 'id' },
          { annotationArgs: 'name = "unit_price"', fieldType: 'BigDecimal', fieldName: 'unitPrice' },
          { annotationArgs: 'name = "created_at"', fieldType: 'Date', fieldName: 'createdAt' },
        ],
      })
    })

    it('collapses imports shared by several columns', () => {
      const spec = emitter.buildSpec(
        table('prices', [
          ['net', 'DECIMAL'],
          ['gross', 'NUMERIC'],
          ['tax', 'money'],
        ]),
        PACKAGE,
      )

      expect(spec.imports).toEqual(['java.math.BigDecimal'])
    })

    it('sorts imports regardless of column order', () => {
      const spec = emitter.buildSpec(
        table('events', [
          ['external_id', 'UNIQUEIDENTIFIER'],
          ['happened_at', 'DATETIME'],
          ['amount', 'DECIMAL'],
          ['starts', 'TIME'],
        ]),
        PACKAGE,
      )

      expect(spec.imports).toEqual([
        'java.math.BigDecimal',
        'java.time.LocalTime',
        'java.util.Date',
        'java.util.UUID',
      ])
    })

    it('keeps one field per column in column order', () => {
      const columns: Array<[string, string]> = [
        ['z_last', 'INT'],
        ['a_first', 'VARCHAR'],
        ['m_middle', 'BIT'],
      ]
      const spec = emitter.buildSpec(table('things', columns), PACKAGE)

      expect(spec.fields.map((field) => field.fieldName)).toEqual(['zLast', 'aFirst', 'mMiddle'])
      expect(spec.fields).toHaveLength(columns.length)
    })

    it('does not repeat framework imports as value imports', () => {
      const custom = new ModelEmitter({
        typeMappings: new TypeMappingTable({ BLOB: { fieldType: 'Serializable', requiredImport: 'java.io.Serializable' } }),
      })

      expect(custom.buildSpec(table('blobs', [['data', 'BLOB']]), PACKAGE).imports).toEqual([])
      expect(FRAMEWORK_IMPORTS).toContain('java.io.Serializable')
    })

    it('fails with UnknownTypeError for unmapped column types', () => {
      expect(() => emitter.buildSpec(table('places', [['location', 'geography']]), PACKAGE)).toThrow(
        UnknownTypeError,
      )
    })

    it('fails with DuplicateFieldNameError when two columns normalize alike', () => {
      const users = table('users', [
        ['user_id', 'INT'],
        ['user-id', 'INT'],
      ])

      expect(() => emitter.buildSpec(users, PACKAGE)).toThrow(DuplicateFieldNameError)
      expect(() => emitter.buildSpec(users, PACKAGE)).toThrow(
        "Columns 'user_id' and 'user-id' of table 'users' both map to field 'userId'",
      )
    })

    it('fails with InvalidIdentifierError for names javac would reject', () => {
      expect(() => emitter.buildSpec(table('logins', [['2fa_code', 'VARCHAR']]), PACKAGE)).toThrow(
        InvalidIdentifierError,
      )
      expect(() => emitter.buildSpec(table('classes', [['class', 'VARCHAR']]), PACKAGE)).toThrow(
        "'class' normalizes to 'class', which is a reserved Java word",
      )
      expect(() => emitter.buildSpec(table('__', [['id', 'INT']]), PACKAGE)).toThrow(InvalidIdentifierError)
    })

    it('rejects class names that clash with an imported type', () => {
      expect(() => emitter.buildSpec(table('entity', [['id', 'INT']]), PACKAGE)).toThrow(
        "'entity' normalizes to 'Entity', which clashes with the imported type 'jakarta.persistence.Entity'",
      )
      expect(() => emitter.buildSpec(table('date', [['created_at', 'DATETIME']]), PACKAGE)).toThrow(
        "'date' normalizes to 'Date', which clashes with the imported type 'java.util.Date'",
      )
      expect(() => emitter.buildSpec(table('serial', [['id', 'INT']]), PACKAGE)).toThrow(InvalidIdentifierError)
    })

    it('allows a class name that only matches a type the table does not use', () => {
      expect(emitter.buildSpec(table('date', [['id', 'INT']]), PACKAGE).className).toBe('Date')
    })

    it('rejects class names that clash with a field type', () => {
      expect(() => emitter.buildSpec(table('string', [['label', 'VARCHAR']]), PACKAGE)).toThrow(
        "'string' normalizes to 'String', which clashes with the field type 'String'",
      )
    })

    it('builds a spec with no fields for a table without columns', () => {
      const spec = emitter.buildSpec(table('empty_table', []), PACKAGE)

      expect(spec.className).toBe('EmptyTable')
      expect(spec.fields).toEqual([])
      expect(spec.imports).toEqual([])
    })

    it('rejects names whose field would not compile', () => {
      expect(() => emitter.buildSpec(table('quotes', [['say"hi', 'INT']]), PACKAGE)).toThrow(
        `'say"hi' normalizes to 'say"Hi', which is not a valid Java identifier`,
      )
    })
  })

  describe('emit', () => {
    it('renders the complete class for order_items', () => {
      const expected = [
        'package com.example.model;',
        '',
        'import jakarta.persistence.Column;',
        'import jakarta.persistence.Entity;',
        'import jakarta.persistence.Id;',
        'import jakarta.persistence.Table;',
        'import java.io.Serial;',
        'import java.io.Serializable;',
        'import lombok.AllArgsConstructor;',
        'import lombok.Data;',
        'import lombok.NoArgsConstructor;',
        '',
        'import java.math.BigDecimal;',
        'import java.util.Date;',
        '',
        '@Data',
        '@NoArgsConstructor',
        '@AllArgsConstructor',
        '@Entity',
        '@Table(name = "order_items")',
        'public class OrderItems implements Serializable {',
        '',
        '    @Serial',
        '    private static final long serialVersionUID = 1L;',
        '',
        '    @Id',
        '    @Column(name = "id")',
        '    private Integer id;',
        '',
        '    @Column(name = "unit_price")',
        '    private BigDecimal unitPrice;',
        '',
        '    @Column(name = "created_at")',
        '    private Date createdAt;',
        '}',
        '',
      ].join('\n')

      expect(emitter.emit(orderItems, PACKAGE, '    ')).toBe(expected)
    })

    it('emits one import line per distinct value type', () => {
      const text = emitter.emit(
        table('prices', [
          ['net', 'DECIMAL'],
          ['gross', 'NUMERIC'],
        ]),
        PACKAGE,
      )

      expect(text.split('\n').filter((line) => line === 'import java.math.BigDecimal;')).toHaveLength(1)
    })

    it('emits N column fields plus the identity field', () => {
      const columns: Array<[string, string]> = [
        ['a', 'INT'],
        ['b', 'VARCHAR'],
        ['c', 'BIT'],
        ['d', 'IMAGE'],
      ]
      const lines = emitter.emit(table('letters', columns), PACKAGE).split('\n')

      expect(lines.filter((line) => line.trim().startsWith('@Column('))).toHaveLength(4)
      expect(lines.filter((line) => line.includes('serialVersionUID'))).toHaveLength(1)
      expect(lines.filter((line) => line.trim() === '@Id')).toHaveLength(1)
      expect(lines).toContain('    private Byte[] d;')
    })

    it('binds the raw table and column names, not the normalized ones', () => {
      const text = emitter.emit(table('Order-Lines', [['Line_NO', 'SMALLINT']]), PACKAGE)

      expect(text).toContain('@Table(name = "Order-Lines")\npublic class OrderLines implements Serializable {')
      expect(text).toContain('    @Column(name = "Line_NO")\n    private Short lineNo;')
    })

    it('uses the given indentation', () => {
      const text = emitter.emit(table('t', [['x', 'INT']]), PACKAGE, '\t')

      expect(text).toContain('\t@Id\n\t@Column(name = "x")\n\tprivate Integer x;\n}')
    })

    it('renders a table without columns as the identity field only', () => {
      const text = emitter.emit(table('empty_table', []), PACKAGE, '  ')

      expect(text).toContain(
        [
          'public class EmptyTable implements Serializable {',
          '',
          '  @Serial',
          '  private static final long serialVersionUID = 1L;',
          '}',
          '',
        ].join('\n'),
      )
      expect(text).not.toContain('@Id')
      expect(text).toContain('import lombok.NoArgsConstructor;\n\n@Data')
    })

    it('is byte-identical across runs', () => {
      expect(emitter.emit(orderItems, PACKAGE)).toBe(new ModelEmitter().emit(orderItems, PACKAGE))
    })
  })
})

describe('javaString', () => {
  it('escapes backslashes and quotes', () => {
    expect(javaString('plain')).toBe('"plain"')
    expect(javaString('a\\b')).toBe('"a\\\\b"')
    expect(javaString('say "hi"')).toBe('"say \\"hi\\""')
  })
})

describe('JavaClassRenderer', () => {
  it('renders a spec directly', () => {
    const text = new JavaClassRenderer().render({
      className: 'Widget',
      packageName: 'app.model',
      tableName: 'widget',
      imports: [],
      fields: [{ annotationArgs: 'name = "label"', fieldType: 'String', fieldName: 'label' }],
    })

    expect(text.startsWith('package app.model;\n\nimport jakarta.persistence.Column;\n')).toBe(true)
    expect(text.endsWith('    @Id\n    @Column(name = "label")\n    private String label;\n}\n')).toBe(true)
  })
})
