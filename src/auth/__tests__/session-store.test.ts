import { Hono } from 'hono'
import { describe, expect, it } from 'vitest'
import type { AuthConfig } from '../auth-config.ts'
import { createCookieSessionStore, type SessionStore } from '../session-store.ts'

const config: AuthConfig = {
  sessionSecret: 'test-secret',
  sessionName: '_auth_session',
  maxAgeSeconds: 600,
  store: 'cookie',
}

const buildApp = (store: SessionStore) => {
  const app = new Hono()
  app.get('/set/:key', async (c) => {
    await store.set(c, c.req.param('key'), c.req.query('value') ?? '')
    return c.text('ok')
  })
  app.get('/get/:key', async (c) =>
    c.json({ value: (await store.get(c, c.req.param('key'))) ?? null }),
  )
  app.get('/delete/:key', async (c) => {
    await store.delete(c, c.req.param('key'))
    return c.text('ok')
  })
  return app
}

const cookiePair = (response: Response): string =>
  (response.headers.get('set-cookie') ?? '').split(';')[0]

const cookieAttributes = (response: Response): string[] =>
  (response.headers.get('set-cookie') ?? '')
    .split(';')
    .slice(1)
    .map((part) => part.trim())

describe('createCookieSessionStore', () => {
  const app = buildApp(createCookieSessionStore(config))

  it('should round-trip a value through a signed cookie', async () => {
    const value = JSON.stringify({ authUrl: 'https://provider.example.com/auth' })
    const setResponse = await app.request(
      `/set/github?value=${encodeURIComponent(value)}`,
    )
    const cookie = cookiePair(setResponse)

    expect(cookie.startsWith('_auth_session_github=')).toBe(true)
    expect(cookieAttributes(setResponse)).toEqual(
      expect.arrayContaining(['Max-Age=600', 'Path=/', 'HttpOnly', 'SameSite=Lax']),
    )
    expect(cookieAttributes(setResponse)).not.toContain('Secure')

    const getResponse = await app.request('/get/github', {
      headers: { Cookie: cookie },
    })
    expect(await getResponse.json()).toEqual({ value })
  })

  it('should mark cookies secure on https requests', async () => {
    const direct = await app.request('https://app.example.com/set/github?value=a')
    const proxied = await app.request('/set/github?value=a', {
      headers: { 'X-Forwarded-Proto': 'https' },
    })

    expect(cookieAttributes(direct)).toEqual(
      expect.arrayContaining(['Secure', 'SameSite=None']),
    )
    expect(cookieAttributes(proxied)).toEqual(
      expect.arrayContaining(['Secure', 'SameSite=None']),
    )
  })

  it('should read a tampered cookie as absent', async () => {
    const setResponse = await app.request('/set/github?value=original')
    const [name, signed] = cookiePair(setResponse).split('=')
    const tampered = `${name}=${signed.replace('original', 'forged')}`

    const response = await app.request('/get/github', {
      headers: { Cookie: tampered },
    })

    expect(await response.json()).toEqual({ value: null })
  })

  it('should read a cookie signed with another secret as absent', async () => {
    const other = buildApp(
      createCookieSessionStore({ ...config, sessionSecret: 'other-secret' }),
    )
    const setResponse = await other.request('/set/github?value=original')

    const response = await app.request('/get/github', {
      headers: { Cookie: cookiePair(setResponse) },
    })

    expect(await response.json()).toEqual({ value: null })
  })

  it('should keep keys in separate cookies', async () => {
    const response = await app.request('/get/google', {
      headers: {
        Cookie: cookiePair(await app.request('/set/github?value=a')),
      },
    })

    expect(await response.json()).toEqual({ value: null })
  })

  it('should expire the cookie on delete', async () => {
    const response = await app.request('/delete/github')

    expect(cookiePair(response)).toBe('_auth_session_github=')
    expect(cookieAttributes(response)).toContain('Max-Age=0')
  })
})
