/**
 * SQL Server connection
 *
 * Adapts an `mssql` connection pool to the CatalogConnection interface.
 * The pool connects on the first query, so connection failures surface as
 * catalog query errors carrying the query that triggered them.
 */

import sql from 'mssql'
import type { ConnectionPool, config as MssqlConfig } from 'mssql'
import type { CatalogConnection } from '../core/catalog-reader.js'

export type ConnectionDescriptor =
  | { kind: 'connection-string'; connectionString: string }
  | {
      kind: 'parts'
      driver: string
      server: string
      database: string
      username?: string
      password?: string
      encrypt?: boolean
      trustServerCertificate?: boolean
    }

/**
 * Build the pool configuration for a descriptor made of parts.
 *
 * `server` may carry a port (`db.local,1433`) or a named instance
 * (`db.local\SQLEXPRESS`).
 */
export function buildConnectionConfig(
  descriptor: Extract<ConnectionDescriptor, { kind: 'parts' }>,
): MssqlConfig {
  const { server, port, instanceName } = parseServer(descriptor.server)

  return {
    driver: descriptor.driver,
    server,
    port,
    database: descriptor.database,
    user: descriptor.username || undefined,
    password: descriptor.password || undefined,
    options: {
      encrypt: descriptor.encrypt ?? true,
      trustServerCertificate: descriptor.trustServerCertificate ?? false,
      instanceName,
    },
  }
}

function parseServer(value: string): { server: string; port?: number; instanceName?: string } {
  const portMatch = /^(.+?)[,:](\d+)$/.exec(value)
  if (portMatch) {
    return { server: portMatch[1], port: Number(portMatch[2]) }
  }

  const slash = value.indexOf('\\')
  if (slash > 0) {
    return { server: value.slice(0, slash), instanceName: value.slice(slash + 1) }
  }

  return { server: value }
}

export class MssqlCatalogConnection implements CatalogConnection {
  private connecting: Promise<ConnectionPool> | null = null

  constructor(private readonly pool: ConnectionPool) {}

  async query(text: string, params: Readonly<Record<string, string>> = {}): Promise<unknown[]> {
    const pool = await this.connect()
    const request = pool.request()
    for (const [name, value] of Object.entries(params)) {
      request.input(name, sql.NVarChar, value)
    }
    const result = await request.query(text)
    return result.recordset ?? []
  }

  async close(): Promise<void> {
    if (this.connecting) {
      await this.pool.close()
      this.connecting = null
    }
  }

  private connect(): Promise<ConnectionPool> {
    if (!this.connecting) {
      this.connecting = this.pool.connect()
    }
    return this.connecting
  }
}

export function createMssqlConnection(descriptor: ConnectionDescriptor): MssqlCatalogConnection {
  const pool =
    descriptor.kind === 'connection-string'
      ? new sql.ConnectionPool(descriptor.connectionString)
      : new sql.ConnectionPool(buildConnectionConfig(descriptor))
  return new MssqlCatalogConnection(pool)
}
