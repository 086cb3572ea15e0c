import { getDatabaseClient, isDatabaseEnabledForEnv } from './client.ts'
import { getDatabaseConfig } from './config.ts'
import { AUTH_SESSIONS_TABLE } from './schema.ts'

export interface DatabaseHealthStatus {
  isHealthy: boolean
  message: string
  details?: {
    sessionTableExists?: boolean
    hostCount?: number
  }
}

export const checkDatabaseHealth = async (): Promise<DatabaseHealthStatus> => {
  // a disabled database is healthy from the app's point of view
  if (!isDatabaseEnabledForEnv()) {
    return {
      isHealthy: true,
      message: 'Database disabled for this environment',
    }
  }

  try {
    const client = getDatabaseClient()
    const { keyspace } = getDatabaseConfig()
    const result = await client.execute(
      'SELECT table_name FROM system_schema.tables WHERE keyspace_name = ? AND table_name = ?',
      [keyspace, AUTH_SESSIONS_TABLE],
      { prepare: true },
    )
    return {
      isHealthy: true,
      message: 'Database connection is healthy',
      details: {
        sessionTableExists: result.rows.length > 0,
        hostCount: client.hosts.length,
      },
    }
  } catch (error) {
    return {
      isHealthy: false,
      message:
        error instanceof Error ? error.message : 'Database health check failed',
    }
  }
}
