/**
 * Catalog Model - Core Types
 *
 * The intermediate representation between the catalog reader and the model
 * emitter. Descriptors are built per table and discarded after emission.
 */

/**
 * One row of INFORMATION_SCHEMA.TABLES. The same name may exist in several
 * schemas; the pair identifies one physical table.
 */
export interface CatalogTable {
  readonly schema: string
  readonly name: string
}

/**
 * One row of INFORMATION_SCHEMA.COLUMNS
 */
export interface ColumnDescriptor {
  /** Column name exactly as the catalog reports it */
  readonly name: string
  /** DATA_TYPE as the catalog reports it (any case) */
  readonly sqlType: string
}

export interface TableDescriptor {
  /** Table name exactly as the catalog reports it */
  readonly name: string
  /** Columns in ordinal order; this becomes field declaration order */
  readonly columns: readonly ColumnDescriptor[]
}

export interface GeneratedField {
  /** Arguments of the @Column annotation, e.g. `name = "unit_price"` */
  annotationArgs: string
  fieldType: string
  fieldName: string
}

/**
 * Everything needed to render one Java entity class
 */
export interface GeneratedClassSpec {
  className: string
  packageName: string
  /** Raw catalog table name bound by @Table */
  tableName: string
  /** Value-type imports, deduplicated and sorted */
  imports: string[]
  /** One per column, in column order */
  fields: GeneratedField[]
}
