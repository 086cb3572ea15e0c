import { Client, type ClientOptions } from 'cassandra-driver'
import { log } from '../plumbing/logger.ts'
import { type DatabaseConfig, getDatabaseConfig } from './config.ts'

let databaseClient: Client | null = null

export const isDatabaseEnabledForEnv = (): boolean => {
  if (process.env.SCYLLA_DISABLED === 'true') {
    return false
  }
  // tests never open a real connection unless asked to
  if (
    process.env.NODE_ENV === 'test' &&
    process.env.SCYLLA_ENABLE_IN_TESTS !== 'true'
  ) {
    return false
  }
  return true
}

const contactPointsOf = (config: DatabaseConfig): string[] =>
  config.hosts.map((host) => `${host}:${config.port}`)

// Connects without a keyspace so the schema step can create it.
const createCassandraClient = (config: DatabaseConfig): Client => {
  const clientOptions: ClientOptions = {
    contactPoints: contactPointsOf(config),
    localDataCenter: config.localDataCenter,
    credentials:
      config.username && config.password
        ? { username: config.username, password: config.password }
        : undefined,
    sslOptions: config.isSslEnabled ? { rejectUnauthorized: true } : undefined,
    socketOptions: {
      connectTimeout: config.connectTimeoutMs,
    },
  }
  return new Client(clientOptions)
}

export const getDatabaseClient = (): Client => {
  if (!databaseClient) {
    throw new Error(
      'Database client not initialized. Call initializeDatabase() first.',
    )
  }
  return databaseClient
}

const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error)

/**
 * Connect to the cluster, retrying `connectRetries` times with a fixed
 * delay before giving up.
 */
export const initializeDatabase = async (): Promise<void> => {
  if (!isDatabaseEnabledForEnv()) {
    log('Database initialization skipped for current environment')
    return
  }
  if (databaseClient) {
    log('Database client already initialized')
    return
  }

  const config = getDatabaseConfig()
  let attempt = 0

  while (true) {
    attempt += 1
    const client = createCassandraClient(config)
    try {
      await client.connect()
      databaseClient = client
      log({
        message: 'Database connection established',
        hosts: contactPointsOf(config),
        keyspace: config.keyspace,
        localDataCenter: config.localDataCenter,
        attempt,
      })
      return
    } catch (error) {
      log({
        message: 'Failed to connect to database',
        error: errorMessage(error),
        attempt,
      })
      try {
        await client.shutdown()
      } catch (shutdownError) {
        log({
          message: 'Error shutting down failed client',
          error: errorMessage(shutdownError),
        })
      }

      if (attempt >= config.connectRetries) {
        throw error instanceof Error ? error : new Error(errorMessage(error))
      }
      await new Promise((resolve) => {
        setTimeout(resolve, config.connectRetryDelayMs)
      })
    }
  }
}

export const shutdownDatabase = async (): Promise<void> => {
  const client = databaseClient
  databaseClient = null
  if (!client) {
    return
  }

  try {
    await client.shutdown()
    log('Database connection closed')
  } catch (error) {
    log({
      message: 'Error while closing database connection',
      error: errorMessage(error),
    })
  }
}
