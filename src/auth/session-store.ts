import type { Context } from 'hono'
import { deleteCookie, getSignedCookie, setSignedCookie } from 'hono/cookie'
import { type AuthConfig, getAuthConfig } from './auth-config.ts'

/**
 * Keeps marshaled provider sessions between the begin and callback
 * requests. Keys are provider names, or application keys stored through
 * `storeInSession`.
 */
export interface SessionStore {
  get(c: Context, key: string): Promise<string | undefined>
  set(c: Context, key: string, value: string): Promise<void>
  delete(c: Context, key: string): Promise<void>
}

type CookieOptions = NonNullable<Parameters<typeof setSignedCookie>[4]>

export const isSecureRequest = (c: Context): boolean =>
  new URL(c.req.url).protocol === 'https:' ||
  c.req.header('x-forwarded-proto') === 'https'

/**
 * Over https the cookie is `SameSite=None` so it comes back on cross-site
 * form_post callbacks (Apple). Plain http keeps `Lax`, since browsers drop
 * `None` cookies that are not `Secure`.
 */
export const sessionCookieOptions = (
  c: Context,
  config: AuthConfig,
): CookieOptions => {
  const secure = isSecureRequest(c)
  return {
    path: '/',
    httpOnly: true,
    secure,
    sameSite: secure ? 'None' : 'Lax',
    maxAge: config.maxAgeSeconds,
  }
}

/**
 * One HMAC-signed cookie per key, named `<sessionName>_<key>`. A cookie
 * with a bad signature reads as absent.
 */
export const createCookieSessionStore = (
  config: AuthConfig = getAuthConfig(),
): SessionStore => {
  const cookieName = (key: string) => `${config.sessionName}_${key}`

  return {
    async get(c, key) {
      const value = await getSignedCookie(c, config.sessionSecret, cookieName(key))
      return typeof value === 'string' && value.length > 0 ? value : undefined
    },
    async set(c, key, value) {
      await setSignedCookie(
        c,
        cookieName(key),
        value,
        config.sessionSecret,
        sessionCookieOptions(c, config),
      )
    },
    async delete(c, key) {
      deleteCookie(c, cookieName(key), {
        path: '/',
        secure: isSecureRequest(c),
      })
    },
  }
}
