/**
 * Error taxonomy for model generation
 *
 * Fatal errors (configuration, catalog) abort the run. Per-table errors
 * (unknown type, duplicate or invalid names, class file collisions, file
 * writes) are caught by the generation driver and reported against the
 * table that raised them.
 */

export type ErrorCategory =
  | 'configuration'
  | 'catalog'
  | 'mapping'
  | 'emission'
  | 'filesystem'

export class ModelGenError extends Error {
  constructor(
    message: string,
    public readonly category: ErrorCategory,
    public readonly context: Record<string, unknown> = {},
    options?: { cause?: unknown },
  ) {
    super(message, options)
    this.name = 'ModelGenError'
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      category: this.category,
      context: this.context,
      cause: this.cause instanceof Error ? this.cause.message : this.cause,
    }
  }
}

/**
 * Missing or invalid run configuration. Raised before any query is issued.
 */
export class ConfigurationError extends ModelGenError {
  constructor(public readonly problems: string[]) {
    super(`Invalid configuration:\n  - ${problems.join('\n  - ')}`, 'configuration', { problems })
    this.name = 'ConfigurationError'
  }
}

/**
 * Connection or catalog query failure. Carries the failing query text.
 */
export class CatalogQueryError extends ModelGenError {
  constructor(
    public readonly query: string,
    cause: unknown,
  ) {
    super(`Catalog query failed: ${describeCause(cause)}\n  Query: ${query}`, 'catalog', { query }, { cause })
    this.name = 'CatalogQueryError'
  }
}

export class UnknownTypeError extends ModelGenError {
  constructor(public readonly sqlType: string) {
    super(`No type mapping for column type '${sqlType}'`, 'mapping', { sqlType })
    this.name = 'UnknownTypeError'
  }
}

/**
 * Two columns of one table normalize to the same field name.
 */
export class DuplicateFieldNameError extends ModelGenError {
  constructor(
    public readonly tableName: string,
    public readonly fieldName: string,
    public readonly columns: [string, string],
  ) {
    super(
      `Columns '${columns[0]}' and '${columns[1]}' of table '${tableName}' both map to field '${fieldName}'`,
      'emission',
      { tableName, fieldName, columns },
    )
    this.name = 'DuplicateFieldNameError'
  }
}

export class InvalidIdentifierError extends ModelGenError {
  constructor(
    public readonly sourceName: string,
    public readonly identifier: string,
    reason: string,
  ) {
    super(`'${sourceName}' normalizes to '${identifier}', which ${reason}`, 'emission', {
      sourceName,
      identifier,
    })
    this.name = 'InvalidIdentifierError'
  }
}

/**
 * Two tables of one run map to the same class file.
 */
export class ClassNameCollisionError extends ModelGenError {
  constructor(
    public readonly tableName: string,
    public readonly fileName: string,
    public readonly claimedBy: string,
  ) {
    super(
      `Table '${tableName}' maps to ${fileName}, which was already generated for table '${claimedBy}'`,
      'emission',
      { tableName, fileName, claimedBy },
    )
    this.name = 'ClassNameCollisionError'
  }
}

export class FileWriteError extends ModelGenError {
  constructor(
    public readonly path: string,
    cause: unknown,
  ) {
    super(`Failed to write ${path}: ${describeCause(cause)}`, 'filesystem', { path }, { cause })
    this.name = 'FileWriteError'
  }
}

export function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause)
}
