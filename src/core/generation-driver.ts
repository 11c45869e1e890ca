/**
 * Generation Driver
 *
 * Runs the catalog reader and model emitter over every table (or the one
 * named by the filter) and writes one file per table.
 *
 * Per-table failures (type mapping, naming, class file collisions, file
 * writes) are logged and recorded in the report; the run moves on to the
 * next table. Catalog failures propagate and end the run.
 *
 * Tables are reported by name, or as schema.name when the name exists in
 * more than one schema.
 */

import { promises as fs } from 'fs'
import { join } from 'path'
import { qualifiedName, type CatalogReader } from './catalog-reader.js'
import type { CatalogTable } from './catalog-model.js'
import type { ModelEmitter } from './model-emitter.js'
import { ClassNameCollisionError, FileWriteError, describeCause } from './errors.js'

export interface GenerationLogger {
  info(message: string): void
  warn(message: string): void
  error(message: string): void
  debug(message: string): void
}

/**
 * Destination for generated files
 */
export interface OutputWriter {
  ensureDir(dir: string): Promise<void>
  writeFile(path: string, content: string): Promise<void>
}

export const fileSystemWriter: OutputWriter = {
  async ensureDir(dir) {
    await fs.mkdir(dir, { recursive: true })
  },
  async writeFile(path, content) {
    await fs.writeFile(path, content, 'utf8')
  },
}

export interface GenerationOptions {
  packageName: string
  indent: string
  outputDir: string
  /** Only generate the table with this exact name */
  table?: string
}

export interface TableFailure {
  table: string
  error: Error
}

export interface TableSkip {
  table: string
  reason: string
}

export interface GenerationReport {
  /** Labels of the tables returned by the catalog, in catalog order */
  tables: string[]
  /** Paths of files written */
  written: string[]
  skipped: TableSkip[]
  failed: TableFailure[]
  /** False when any table failed */
  ok: boolean
}

export interface GenerationDriverDeps {
  reader: CatalogReader
  emitter: ModelEmitter
  logger: GenerationLogger
  writer?: OutputWriter
}

export class GenerationDriver {
  private readonly reader: CatalogReader
  private readonly emitter: ModelEmitter
  private readonly logger: GenerationLogger
  private readonly writer: OutputWriter

  constructor(deps: GenerationDriverDeps) {
    this.reader = deps.reader
    this.emitter = deps.emitter
    this.logger = deps.logger
    this.writer = deps.writer ?? fileSystemWriter
  }

  async run(options: GenerationOptions): Promise<GenerationReport> {
    const tables = await this.reader.listTables(options.table)
    const label = tableLabeler(tables)
    const report: GenerationReport = {
      tables: tables.map(label),
      written: [],
      skipped: [],
      failed: [],
      ok: true,
    }

    if (tables.length === 0) {
      if (options.table) {
        this.logger.warn(`Table '${options.table}' not found in catalog; nothing to generate`)
      } else {
        this.logger.warn('Catalog contains no tables; nothing to generate')
      }
      return report
    }

    this.logger.info(`Found ${tables.length} table(s): ${report.tables.join(', ')}`)

    let outputReady = false
    // Lower-cased file name -> label of the table that wrote it
    const claimedFiles = new Map<string, string>()

    for (const catalogTable of tables) {
      const table = label(catalogTable)
      const columns = await this.reader.listColumns(catalogTable)
      this.logger.debug(`  ${table}: ${columns.length} column(s)`)

      if (columns.length === 0) {
        const reason = 'no columns visible in catalog'
        this.logger.warn(`Skipping '${table}': ${reason}`)
        report.skipped.push({ table, reason })
        continue
      }

      try {
        const descriptor = { name: catalogTable.name, columns }
        const content = this.emitter.emit(descriptor, options.packageName, options.indent)
        const fileName = this.emitter.fileName(descriptor)
        const claimedBy = claimedFiles.get(fileName.toLowerCase())
        if (claimedBy !== undefined) {
          throw new ClassNameCollisionError(table, fileName, claimedBy)
        }
        const path = join(options.outputDir, fileName)

        if (!outputReady) {
          await this.ensureOutputDir(options.outputDir)
          outputReady = true
        }
        await this.write(path, content)
        claimedFiles.set(fileName.toLowerCase(), table)

        report.written.push(path)
        this.logger.debug(`  Written: ${path}`)
      } catch (error) {
        const failure = error instanceof Error ? error : new Error(describeCause(error))
        this.logger.error(`Failed to generate '${table}': ${failure.message}`)
        report.failed.push({ table, error: failure })
        report.ok = false
      }
    }

    return report
  }

  private async ensureOutputDir(dir: string): Promise<void> {
    try {
      await this.writer.ensureDir(dir)
    } catch (error) {
      throw new FileWriteError(dir, error)
    }
  }

  private async write(path: string, content: string): Promise<void> {
    try {
      await this.writer.writeFile(path, content)
    } catch (error) {
      throw new FileWriteError(path, error)
    }
  }
}

function tableLabeler(tables: readonly CatalogTable[]): (table: CatalogTable) => string {
  const seen = new Set<string>()
  const shared = new Set<string>()
  for (const table of tables) {
    if (seen.has(table.name)) {
      shared.add(table.name)
    }
    seen.add(table.name)
  }
  return (table) => (shared.has(table.name) ? qualifiedName(table) : table.name)
}
