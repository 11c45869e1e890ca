/**
 * jpa-model-gen
 *
 * Generate JPA entity classes from a database's INFORMATION_SCHEMA
 */

// Re-export core pipeline
export * from './core/index.js'

// Re-export generators
export * from './generators/index.js'

// SQL Server connection
export {
  createMssqlConnection,
  buildConnectionConfig,
  MssqlCatalogConnection,
  type ConnectionDescriptor,
} from './db/mssql-connection.js'
