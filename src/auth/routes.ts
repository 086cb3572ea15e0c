import { type Context, Hono } from 'hono'
import { log } from '../plumbing/logger.ts'
import type { User } from '../providers/types/user.ts'
import {
  NO_PROVIDER_SELECTED_MESSAGE,
  STATE_MISMATCH_MESSAGE,
} from './auth-utils.ts'
import {
  beginAuthHandler,
  completeUserAuth,
  logout,
  NO_SESSION_MESSAGE,
} from './handlers.ts'
import type { SessionStore } from './session-store.ts'

export interface AuthRoutesOptions {
  store: SessionStore
  /**
   * Respond once the user is authenticated. Without it the response is the
   * user's profile as JSON, minus the provider credentials.
   */
  onSuccess?: (c: Context, user: User) => Response | Promise<Response>
}

export type PublicProfile = Omit<
  User,
  'accessToken' | 'accessTokenSecret' | 'refreshToken' | 'idToken'
>

export const publicProfile = (user: User): PublicProfile => {
  const {
    accessToken: _accessToken,
    accessTokenSecret: _accessTokenSecret,
    refreshToken: _refreshToken,
    idToken: _idToken,
    ...profile
  } = user
  return profile
}

const REQUEST_ERRORS = [
  NO_PROVIDER_SELECTED_MESSAGE,
  NO_SESSION_MESSAGE,
  STATE_MISMATCH_MESSAGE,
]

/** 400 for a bad request on our side, 502 when the provider failed. */
const statusFor = (message: string): 400 | 502 =>
  REQUEST_ERRORS.includes(message) || message.startsWith('no provider for ')
    ? 400
    : 502

/**
 * Hono routes driving the browser flow, meant to be mounted under `/auth`:
 *
 * - GET /:provider           redirect to the provider
 * - GET|POST /:provider/callback
 * - GET /:provider/logout
 */
export const createAuthRoutes = (options: AuthRoutesOptions): Hono => {
  const { store, onSuccess } = options
  const auth = new Hono()

  auth.get('/:provider', (c) => beginAuthHandler(c, store))

  const handleCallback = async (c: Context) => {
    try {
      const user = await completeUserAuth(c, store)
      log({
        message: 'User authenticated',
        provider: user.provider,
        userId: user.userId,
      })
      return onSuccess ? await onSuccess(c, user) : c.json(publicProfile(user))
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error)
      log({
        message: 'Authentication callback failed',
        provider: c.req.param('provider') ?? '',
        error: message,
      })
      return c.json({ error: message }, statusFor(message))
    }
  }
  auth.get('/:provider/callback', handleCallback)
  auth.post('/:provider/callback', handleCallback)

  auth.get('/:provider/logout', async (c) => {
    await logout(c, store)
    return c.json({ loggedOut: true })
  })

  return auth
}
