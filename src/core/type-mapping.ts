/**
 * Type Mapping Table
 *
 * Converts catalog column types (INFORMATION_SCHEMA.COLUMNS.DATA_TYPE) into
 * Java field types and the import each one needs. Lookups are
 * case-insensitive and an unmapped type is an error, never a guess.
 */

import { UnknownTypeError } from './errors.js'

export interface TypeMapping {
  /** Java type written in the field declaration */
  fieldType: string
  /** Fully-qualified import, absent for java.lang types */
  requiredImport?: string
}

const BIG_DECIMAL: TypeMapping = { fieldType: 'BigDecimal', requiredImport: 'java.math.BigDecimal' }
const DATE: TypeMapping = { fieldType: 'Date', requiredImport: 'java.util.Date' }
const STRING: TypeMapping = { fieldType: 'String' }
const BYTES: TypeMapping = { fieldType: 'Byte[]' }

export const DEFAULT_TYPE_MAPPINGS: Readonly<Record<string, TypeMapping>> = Object.freeze({
  // Integers
  INT: { fieldType: 'Integer' },
  INTEGER: { fieldType: 'Integer' },
  BIGINT: { fieldType: 'Long' },
  SMALLINT: { fieldType: 'Short' },
  TINYINT: { fieldType: 'Byte' },

  // Floating point
  REAL: { fieldType: 'Float' },
  FLOAT: { fieldType: 'Float' },
  DOUBLE: { fieldType: 'Double' },

  // Exact decimal
  DECIMAL: BIG_DECIMAL,
  NUMERIC: BIG_DECIMAL,
  MONEY: BIG_DECIMAL,
  SMALLMONEY: BIG_DECIMAL,

  // Text
  CHAR: STRING,
  NCHAR: STRING,
  VARCHAR: STRING,
  NVARCHAR: STRING,
  TEXT: STRING,
  NTEXT: STRING,
  XML: STRING,

  BIT: { fieldType: 'Boolean' },

  // Temporal
  DATE: DATE,
  DATETIME: DATE,
  DATETIME2: DATE,
  SMALLDATETIME: DATE,
  DATETIMEOFFSET: { fieldType: 'OffsetDateTime', requiredImport: 'java.time.OffsetDateTime' },
  TIME: { fieldType: 'LocalTime', requiredImport: 'java.time.LocalTime' },

  UNIQUEIDENTIFIER: { fieldType: 'UUID', requiredImport: 'java.util.UUID' },

  // Binary
  BINARY: BYTES,
  VARBINARY: BYTES,
  IMAGE: BYTES,
  ROWVERSION: BYTES,
  TIMESTAMP: BYTES,
})

/**
 * Immutable lookup from source type name to Java type.
 *
 * @example
 * const table = new TypeMappingTable()
 * table.resolve('decimal') // => { fieldType: 'BigDecimal', requiredImport: 'java.math.BigDecimal' }
 */
export class TypeMappingTable {
  private readonly entries: ReadonlyMap<string, TypeMapping>

  constructor(mappings: Readonly<Record<string, TypeMapping>> = DEFAULT_TYPE_MAPPINGS) {
    const entries = new Map<string, TypeMapping>()
    for (const [sqlType, mapping] of Object.entries(mappings)) {
      entries.set(canonicalize(sqlType), Object.freeze({ ...mapping }))
    }
    this.entries = entries
  }

  /**
   * @throws UnknownTypeError when the type has no entry
   */
  resolve(sqlType: string): TypeMapping {
    const mapping = this.entries.get(canonicalize(sqlType))
    if (!mapping) {
      throw new UnknownTypeError(sqlType)
    }
    return mapping
  }

  /**
   * Return a new table with the given entries added or replaced
   */
  withOverrides(overrides: Readonly<Record<string, TypeMapping>>): TypeMappingTable {
    const merged: Record<string, TypeMapping> = Object.fromEntries(this.entries)
    for (const [sqlType, mapping] of Object.entries(overrides)) {
      merged[canonicalize(sqlType)] = mapping
    }
    return new TypeMappingTable(merged)
  }
}

function canonicalize(sqlType: string): string {
  return sqlType.trim().toUpperCase()
}
