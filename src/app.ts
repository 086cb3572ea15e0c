import { type Context, Hono } from 'hono'
import info from '../package.json' with { type: 'json' }
import type { AuthConfig } from './auth/auth-config.ts'
import { createAuthRoutes } from './auth/routes.ts'
import type { SessionStore } from './auth/session-store.ts'
import { checkDatabaseHealth } from './database/health.ts'
import { getProviders } from './providers/registry.ts'
import type { User } from './providers/types/user.ts'

const { name, version } = info

export interface AppOptions {
  authConfig: AuthConfig
  store: SessionStore
  onSuccess?: (c: Context, user: User) => Response | Promise<Response>
}

/**
 * The example service: auth routes under `/auth` plus provider listing,
 * about and health endpoints.
 */
export const createApp = ({ authConfig, store, onSuccess }: AppOptions): Hono => {
  const app = new Hono()

  app.get('/', (c) =>
    c.json({
      providers: [...getProviders().keys()].sort(),
    }),
  )

  app.get('/about', (c) =>
    c.json({
      name,
      version,
    }),
  )

  app.get('/health', async (c) => {
    if (authConfig.store !== 'cassandra') {
      return c.json({ isHealthy: true, message: 'Sessions are kept in cookies' })
    }
    const health = await checkDatabaseHealth()
    return c.json(health, health.isHealthy ? 200 : 503)
  })

  app.route('/auth', createAuthRoutes({ store, onSuccess }))

  return app
}
