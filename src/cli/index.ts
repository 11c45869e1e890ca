#!/usr/bin/env node
/**
 * jpa-model-gen CLI
 *
 * Generate JPA entity classes from a database's INFORMATION_SCHEMA
 */

import { Command } from 'commander'
import { generateCommand } from './commands/generate.js'

const program = new Command()

program
  .name('jpa-model-gen')
  .description("Generates entity model classes for Java/Hibernate based on a database's INFORMATION_SCHEMA")
  .version('0.1.0')

// Defaults can be set via environment variables (JPA_MODEL_GEN_*)
program
  .command('generate')
  .description('Generate one entity class per table')
  .option(
    '-c, --connection-string <string>',
    'Connection string for your database. Use instead of -d, -s, -n, -u and -p',
    process.env.JPA_MODEL_GEN_CONNECTION_STRING
  )
  .option('-d, --driver <driver>', 'Driver for the target SQL server', process.env.JPA_MODEL_GEN_DRIVER)
  .option('-s, --server <server>', 'Server to connect to (host, host,port or host\\instance)', process.env.JPA_MODEL_GEN_SERVER)
  .option('-n, --database <name>', 'Database to connect to', process.env.JPA_MODEL_GEN_DATABASE)
  .option('-u, --username <user>', 'Username for the server', process.env.JPA_MODEL_GEN_USERNAME)
  .option('-p, --password <password>', 'Password for the username', process.env.JPA_MODEL_GEN_PASSWORD)
  .option('--encrypt', 'Encrypt the connection (default when using -s)')
  .option('--no-encrypt', 'Do not encrypt the connection')
  .option('--trust-server-certificate', 'Accept self-signed server certificates')
  .option('-j, --package <name>', 'Package name to insert into new model classes', process.env.JPA_MODEL_GEN_PACKAGE)
  .option('-i, --indentation <string>', 'Indentation for class members (\\t for a tab)', '    ')
  .option('-o, --output <dir>', 'Directory to write generated .java files to', process.env.JPA_MODEL_GEN_OUTPUT)
  .option('-t, --table <name>', 'Only generate the model class for this TABLE_NAME')
  .option('--type-map <file>', 'JSON file with extra or overriding column type mappings')
  .option('--dry-run', 'Preview without writing files')
  .option('--verbose', 'Show detailed output')
  .action(generateCommand)

if (process.argv.length < 3) {
  program.help()
} else {
  await program.parseAsync()
}
