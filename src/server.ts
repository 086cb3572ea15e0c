import 'dotenv/config'
import { serve } from '@hono/node-server'
import { createApp } from './app.ts'
import { getAuthConfig } from './auth/auth-config.ts'
import { createSessionStore } from './auth/cassandra-session-store.ts'
import { getDatabaseClient, initializeDatabase } from './database/client.ts'
import { ensureSchema } from './database/schema.ts'
import { log } from './plumbing/logger.ts'
import { parseNumber } from './plumbing/parse-number.ts'
import { useProvidersFromEnv } from './providers/from-env.ts'

const authConfig = getAuthConfig()
if (authConfig.store === 'cassandra') {
  await initializeDatabase()
  await ensureSchema(getDatabaseClient())
}

const registered = await useProvidersFromEnv()
if (registered.length === 0) {
  log('No providers configured - set <PROVIDER>_KEY and <PROVIDER>_SECRET')
}

const app = createApp({ authConfig, store: createSessionStore(authConfig) })
const port = parseNumber(process.env.PORT, 3000)

serve({ fetch: app.fetch, port }, () => {
  if (!process.env.PORT) {
    log('process.env.PORT is undefined - defaulting to 3000')
  }
  log({ message: 'Auth service listening', url: `http://localhost:${port}` })
})
