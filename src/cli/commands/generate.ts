/**
 * Generate Command
 *
 * Reads the database catalog and writes one JPA entity class per table.
 *
 * Usage:
 *   jpa-model-gen generate -c "<connection string>" -j com.example.model
 *   jpa-model-gen generate -d tedious -s db.local -n shop -u app -j com.example.model -t order_items
 */

import chalk from 'chalk'
import { CatalogReader, type CatalogConnection } from '../../core/catalog-reader.js'
import { ModelEmitter } from '../../core/model-emitter.js'
import {
  GenerationDriver,
  fileSystemWriter,
  type GenerationLogger,
  type GenerationReport,
  type OutputWriter,
} from '../../core/generation-driver.js'
import { CatalogQueryError, ConfigurationError, describeCause } from '../../core/errors.js'
import { createMssqlConnection, type ConnectionDescriptor } from '../../db/mssql-connection.js'
import {
  loadTypeMappingTable,
  resolveRunConfiguration,
  type GenerateCliOptions,
  type RunConfiguration,
} from '../utils/config.js'
import { createConsoleLogger } from '../utils/logger.js'

export interface GenerateDeps {
  connect: (descriptor: ConnectionDescriptor) => CatalogConnection
  logger?: GenerationLogger
}

const defaultDeps: GenerateDeps = {
  connect: createMssqlConnection,
}

/**
 * Writer for --dry-run: prints each file instead of writing it
 */
export function createDryRunWriter(print: (text: string) => void = console.log): OutputWriter {
  return {
    async ensureDir() {},
    async writeFile(path, content) {
      print(`\n// File: ${path}\n${content}`)
    },
  }
}

/**
 * Run a generation and return the process exit code
 */
export async function runGenerate(
  options: GenerateCliOptions,
  deps: GenerateDeps = defaultDeps,
): Promise<number> {
  let config: RunConfiguration
  let emitter: ModelEmitter
  try {
    config = resolveRunConfiguration(options)
    emitter = new ModelEmitter({ typeMappings: await loadTypeMappingTable(config.typeMapFile) })
  } catch (error) {
    if (error instanceof ConfigurationError) {
      const logger = deps.logger ?? createConsoleLogger()
      logger.error(error.message)
      return 1
    }
    throw error
  }

  const logger = deps.logger ?? createConsoleLogger({ verbose: config.verbose })

  const connection = deps.connect(config.connection)
  try {
    const driver = new GenerationDriver({
      reader: new CatalogReader(connection),
      emitter,
      logger,
      writer: config.dryRun ? createDryRunWriter() : fileSystemWriter,
    })

    const report = await driver.run({
      packageName: config.packageName,
      indent: config.indent,
      outputDir: config.outputDir,
      table: config.table,
    })

    printSummary(report, config, logger)
    return report.ok ? 0 : 1
  } catch (error) {
    if (error instanceof CatalogQueryError) {
      logger.error(error.message)
      return 1
    }
    throw error
  } finally {
    try {
      await connection.close()
    } catch (error) {
      logger.warn(`Failed to close database connection: ${describeCause(error)}`)
    }
  }
}

function printSummary(report: GenerationReport, config: RunConfiguration, logger: GenerationLogger): void {
  const verb = config.dryRun ? 'Previewed' : 'Written'

  if (report.written.length > 0) {
    logger.info(chalk.green(`\n✓ ${verb} ${report.written.length} model(s) to ${config.outputDir}`))
  }
  if (report.skipped.length > 0) {
    logger.info(`Skipped ${report.skipped.length} table(s): ${report.skipped.map((s) => s.table).join(', ')}`)
  }
  if (report.failed.length > 0) {
    logger.error(`${report.failed.length} table(s) failed: ${report.failed.map((f) => f.table).join(', ')}`)
  }
}

export async function generateCommand(options: GenerateCliOptions): Promise<void> {
  try {
    process.exitCode = await runGenerate(options)
  } catch (error) {
    console.error('❌ Generation failed:')
    console.error(error instanceof Error ? error.message : error)
    process.exit(1)
  }
}
