/**
 * Catalog Reader
 *
 * Enumerates tables and columns from INFORMATION_SCHEMA over a read-only
 * connection. Table names are always bound as query parameters, never
 * interpolated into the query text.
 */

import { z } from 'zod'
import type { CatalogTable, ColumnDescriptor } from './catalog-model.js'
import { CatalogQueryError } from './errors.js'

/**
 * Query-capable connection handle supplied by the caller.
 * Parameters are referenced in the query text as `@name`.
 */
export interface CatalogConnection {
  query(text: string, params?: Readonly<Record<string, string>>): Promise<unknown[]>
  close(): Promise<void>
}

export const LIST_TABLES_QUERY = 'SELECT t.TABLE_SCHEMA, t.TABLE_NAME FROM INFORMATION_SCHEMA.TABLES AS t'

export const FIND_TABLE_QUERY = `${LIST_TABLES_QUERY} WHERE t.TABLE_NAME = @table`

export const LIST_COLUMNS_QUERY =
  'SELECT c.COLUMN_NAME, c.DATA_TYPE FROM INFORMATION_SCHEMA.COLUMNS AS c ' +
  'WHERE c.TABLE_SCHEMA = @schema AND c.TABLE_NAME = @table ORDER BY c.ORDINAL_POSITION'

const tableRowSchema = z.object({
  TABLE_SCHEMA: z.string(),
  TABLE_NAME: z.string(),
})

const columnRowSchema = z.object({
  COLUMN_NAME: z.string(),
  DATA_TYPE: z.string(),
})

export class CatalogReader {
  constructor(private readonly connection: CatalogConnection) {}

  /**
   * List tables in catalog order. With a filter the result holds the tables
   * of that name (one per schema defining it); an empty result is not an
   * error.
   */
  async listTables(filter?: string): Promise<CatalogTable[]> {
    const rows = filter
      ? await this.execute(FIND_TABLE_QUERY, { table: filter }, tableRowSchema)
      : await this.execute(LIST_TABLES_QUERY, undefined, tableRowSchema)

    return rows.map((row) => Object.freeze({ schema: row.TABLE_SCHEMA, name: row.TABLE_NAME }))
  }

  /**
   * List a table's columns in ordinal order
   */
  async listColumns(table: CatalogTable): Promise<ColumnDescriptor[]> {
    const rows = await this.execute(
      LIST_COLUMNS_QUERY,
      { schema: table.schema, table: table.name },
      columnRowSchema,
    )

    return rows.map((row) => Object.freeze({ name: row.COLUMN_NAME, sqlType: row.DATA_TYPE }))
  }

  private async execute<T>(
    query: string,
    params: Record<string, string> | undefined,
    rowSchema: z.ZodType<T>,
  ): Promise<T[]> {
    let rows: unknown[]
    try {
      rows = await this.connection.query(query, params)
    } catch (error) {
      throw new CatalogQueryError(query, error)
    }

    const parsed = z.array(rowSchema).safeParse(rows)
    if (!parsed.success) {
      throw new CatalogQueryError(query, parsed.error)
    }
    return parsed.data
  }
}

export function qualifiedName(table: CatalogTable): string {
  return `${table.schema}.${table.name}`
}
