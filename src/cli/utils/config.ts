/**
 * Run Configuration
 *
 * Validates raw CLI options into a RunConfiguration. Every problem is
 * collected and reported at once as a ConfigurationError, before any
 * connection is opened.
 */

import { promises as fs } from 'fs'
import { resolve } from 'path'
import { fileURLToPath } from 'url'
import { z } from 'zod'
import { ConfigurationError, describeCause } from '../../core/errors.js'
import { TypeMappingTable } from '../../core/type-mapping.js'
import { DEFAULT_INDENT } from '../../core/java-renderer.js'
import { packageNameProblem } from '../../generators/java-identifiers.js'
import type { ConnectionDescriptor } from '../../db/mssql-connection.js'

/** `models/` beside the tool, from both src/cli/utils and dist/cli/utils */
export const DEFAULT_OUTPUT_DIR = fileURLToPath(new URL('../../../models', import.meta.url))

/**
 * Options as commander hands them over
 */
export interface GenerateCliOptions {
  connectionString?: string
  driver?: string
  server?: string
  database?: string
  username?: string
  password?: string
  package?: string
  indentation?: string
  output?: string
  table?: string
  typeMap?: string
  encrypt?: boolean
  trustServerCertificate?: boolean
  dryRun?: boolean
  verbose?: boolean
}

export interface RunConfiguration {
  connection: ConnectionDescriptor
  packageName: string
  indent: string
  outputDir: string
  table?: string
  typeMapFile?: string
  dryRun: boolean
  verbose: boolean
}

const optionalText = z
  .string()
  .trim()
  .optional()
  .transform((value) => (value ? value : undefined))

const cliOptionsSchema = z
  .object({
    connectionString: optionalText,
    driver: optionalText,
    server: optionalText,
    database: optionalText,
    username: optionalText,
    password: z.string().optional(),
    package: optionalText,
    indentation: z
      .string()
      .default(DEFAULT_INDENT)
      .transform((value) => value.replace(/\\t/g, '\t'))
      .refine((value) => /^[ \t]*$/.test(value), 'Indentation may only contain spaces and tabs'),
    output: optionalText,
    // Matched against TABLE_NAME verbatim
    table: z.string().min(1, 'The table filter (-t, --table) must not be empty').optional(),
    typeMap: optionalText,
    encrypt: z.boolean().optional(),
    trustServerCertificate: z.boolean().optional(),
    dryRun: z.boolean().default(false),
    verbose: z.boolean().default(false),
  })
  .superRefine((options, ctx) => {
    if (!options.package) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['package'],
        message: 'A Java package name is required (-j, --package)',
      })
    } else {
      const problem = packageNameProblem(options.package)
      if (problem) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['package'],
          message: `Package '${options.package}' is not a valid Java package: ${problem}`,
        })
      }
    }

    const hasParts = Boolean(options.driver && options.server && options.database)
    if (!options.connectionString && !hasParts) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['connectionString'],
        message:
          'Provide database connection information via either -c OR -d, -s, -n flags',
      })
    }
  })

export function resolveRunConfiguration(options: GenerateCliOptions): RunConfiguration {
  const parsed = cliOptionsSchema.safeParse(options)
  if (!parsed.success) {
    throw new ConfigurationError(parsed.error.issues.map((issue) => issue.message))
  }

  const values = parsed.data
  const packageName = values.package
  if (!packageName) {
    throw new ConfigurationError(['A Java package name is required (-j, --package)'])
  }

  return {
    connection: toConnectionDescriptor(values),
    packageName,
    indent: values.indentation,
    outputDir: resolve(values.output ?? DEFAULT_OUTPUT_DIR),
    table: values.table,
    typeMapFile: values.typeMap,
    dryRun: values.dryRun,
    verbose: values.verbose,
  }
}

function toConnectionDescriptor(values: z.infer<typeof cliOptionsSchema>): ConnectionDescriptor {
  if (values.connectionString) {
    return { kind: 'connection-string', connectionString: values.connectionString }
  }

  const { driver, server, database } = values
  if (!driver || !server || !database) {
    throw new ConfigurationError([
      'Provide database connection information via either -c OR -d, -s, -n flags',
    ])
  }

  return {
    kind: 'parts',
    driver,
    server,
    database,
    username: values.username,
    password: values.password,
    encrypt: values.encrypt,
    trustServerCertificate: values.trustServerCertificate,
  }
}

const typeMapFileSchema = z.record(
  z
    .object({
      fieldType: z.string().min(1),
      requiredImport: z.string().min(1).optional(),
    })
    .strict(),
)

/**
 * Build the type table: built-in mappings, overridden by the entries of a
 * JSON type-map file when one is given.
 *
 * @example
 * // types.json
 * { "GEOGRAPHY": { "fieldType": "String" } }
 */
export async function loadTypeMappingTable(typeMapFile?: string): Promise<TypeMappingTable> {
  const defaults = new TypeMappingTable()
  if (!typeMapFile) {
    return defaults
  }

  let raw: unknown
  try {
    raw = JSON.parse(await fs.readFile(typeMapFile, 'utf8'))
  } catch (error) {
    throw new ConfigurationError([`Could not read type map ${typeMapFile}: ${describeCause(error)}`])
  }

  const parsed = typeMapFileSchema.safeParse(raw)
  if (!parsed.success) {
    throw new ConfigurationError(
      parsed.error.issues.map(
        (issue) => `Type map ${typeMapFile}: ${issue.path.join('.') || '(root)'}: ${issue.message}`,
      ),
    )
  }

  return defaults.withOverrides(parsed.data)
}
