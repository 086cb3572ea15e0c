import type { Client } from 'cassandra-driver'
import type { Context } from 'hono'
import { getSignedCookie, setSignedCookie } from 'hono/cookie'
import { nanoid } from 'nanoid'
import { getDatabaseClient } from '../database/client.ts'
import { getDatabaseConfig } from '../database/config.ts'
import { AUTH_SESSIONS_TABLE } from '../database/schema.ts'
import { type AuthConfig, getAuthConfig } from './auth-config.ts'
import {
  createCookieSessionStore,
  type SessionStore,
  sessionCookieOptions,
} from './session-store.ts'

const SESSION_ID_LENGTH = 32

const getDbClient = (): Client => getDatabaseClient()
const getTable = (): string =>
  `${getDatabaseConfig().keyspace}.${AUTH_SESSIONS_TABLE}`

/**
 * Server-side store: the browser only holds a signed random session id;
 * values live in `auth_sessions` rows written with a TTL.
 */
export const createCassandraSessionStore = (
  config: AuthConfig = getAuthConfig(),
): SessionStore => {
  const idCookie = `${config.sessionName}_id`

  const readSessionId = async (c: Context): Promise<string | undefined> => {
    const issued = c.get('authSessionId')
    if (issued) {
      return issued
    }
    const value = await getSignedCookie(c, config.sessionSecret, idCookie)
    return typeof value === 'string' && value.length > 0 ? value : undefined
  }

  const ensureSessionId = async (c: Context): Promise<string> => {
    const existing = await readSessionId(c)
    if (existing) {
      return existing
    }
    const sessionId = nanoid(SESSION_ID_LENGTH)
    c.set('authSessionId', sessionId)
    await setSignedCookie(
      c,
      idCookie,
      sessionId,
      config.sessionSecret,
      sessionCookieOptions(c, config),
    )
    return sessionId
  }

  return {
    async get(c, key) {
      const sessionId = await readSessionId(c)
      if (!sessionId) {
        return undefined
      }

      const result = await getDbClient().execute(
        `SELECT value, expires_at FROM ${getTable()} WHERE session_id = ? AND key = ?`,
        [sessionId, key],
        { prepare: true },
      )
      if (result.rows.length === 0) {
        return undefined
      }

      const row = result.rows[0]
      const expiresAt = row.expires_at as Date | null
      if (expiresAt && expiresAt < new Date()) {
        return undefined
      }
      return (row.value as string | null) ?? undefined
    },

    async set(c, key, value) {
      const sessionId = await ensureSessionId(c)
      const expiresAt = new Date(Date.now() + config.maxAgeSeconds * 1000)
      await getDbClient().execute(
        `INSERT INTO ${getTable()} (session_id, key, value, expires_at)
         VALUES (?, ?, ?, ?)
         USING TTL ${Math.max(1, Math.floor(config.maxAgeSeconds))}`,
        [sessionId, key, value, expiresAt],
        { prepare: true },
      )
    },

    async delete(c, key) {
      const sessionId = await readSessionId(c)
      if (!sessionId) {
        return
      }
      await getDbClient().execute(
        `DELETE FROM ${getTable()} WHERE session_id = ? AND key = ?`,
        [sessionId, key],
        { prepare: true },
      )
    },
  }
}

/** The store named by AUTH_SESSION_STORE. */
export const createSessionStore = (
  config: AuthConfig = getAuthConfig(),
): SessionStore =>
  config.store === 'cassandra'
    ? createCassandraSessionStore(config)
    : createCookieSessionStore(config)
