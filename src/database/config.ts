import { parseNumber } from '../plumbing/parse-number.ts'

export interface DatabaseConfig {
  hosts: string[]
  port: number
  keyspace: string
  localDataCenter: string
  username?: string
  password?: string
  isSslEnabled: boolean
  connectTimeoutMs: number
  connectRetries: number
  connectRetryDelayMs: number
}

/**
 * Cassandra/ScyllaDB settings for the session store, read from the
 * environment on every call.
 */
export const getDatabaseConfig = (): DatabaseConfig => {
  const hosts = (process.env.SCYLLA_HOSTS ?? 'localhost')
    .split(',')
    .map((host) => host.trim())
    .filter((host) => host.length > 0)

  return {
    hosts: hosts.length > 0 ? hosts : ['localhost'],
    port: parseNumber(process.env.SCYLLA_PORT, 9042),
    keyspace: process.env.SCYLLA_KEYSPACE?.trim() || 'multiauth',
    localDataCenter:
      process.env.SCYLLA_LOCAL_DATACENTER?.trim() || 'datacenter1',
    username: process.env.SCYLLA_USERNAME || undefined,
    password: process.env.SCYLLA_PASSWORD || undefined,
    isSslEnabled: process.env.SCYLLA_SSL === 'true',
    connectTimeoutMs: parseNumber(process.env.SCYLLA_CONNECT_TIMEOUT_MS, 10_000),
    connectRetries: parseNumber(process.env.SCYLLA_CONNECT_RETRIES, 3),
    connectRetryDelayMs: parseNumber(
      process.env.SCYLLA_CONNECT_RETRY_DELAY_MS,
      1_000,
    ),
  }
}
