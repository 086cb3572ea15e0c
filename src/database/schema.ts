import type { Client } from 'cassandra-driver'
import { log } from '../plumbing/logger.ts'
import { getDatabaseConfig } from './config.ts'

export const AUTH_SESSIONS_TABLE = 'auth_sessions'

/**
 * Create the keyspace and the auth session table when missing. Rows carry a
 * per-write TTL, so no cleanup job is needed.
 */
export const ensureSchema = async (client: Client): Promise<void> => {
  const { keyspace } = getDatabaseConfig()

  await client.execute(`
    CREATE KEYSPACE IF NOT EXISTS ${keyspace}
    WITH REPLICATION = {
      'class': 'SimpleStrategy',
      'replication_factor': 1
    }
  `)
  await client.execute(`
    CREATE TABLE IF NOT EXISTS ${keyspace}.${AUTH_SESSIONS_TABLE} (
      session_id TEXT,
      key TEXT,
      value TEXT,
      expires_at TIMESTAMP,
      PRIMARY KEY (session_id, key)
    )
  `)
  log({ message: 'Auth session schema ready', keyspace })
}
