import type { Context } from 'hono'
import { nanoid } from 'nanoid'
import { getProviders } from '../providers/registry.ts'
import type { Params, Session } from '../providers/types/provider.ts'
import type { SessionStore } from './session-store.ts'

const STATE_LENGTH = 64

export const NO_PROVIDER_SELECTED_MESSAGE = 'you must select a provider'
export const STATE_MISMATCH_MESSAGE = 'state token mismatch'

/**
 * Which provider this request is for: the `provider` route param, then the
 * `provider` query param, then the one provider holding a stored session.
 */
export const getProviderName = async (
  c: Context,
  store: SessionStore,
): Promise<string> => {
  const fromRoute = c.req.param('provider')
  if (fromRoute) {
    return fromRoute
  }
  const fromQuery = c.req.query('provider')
  if (fromQuery) {
    return fromQuery
  }

  const withSession: string[] = []
  for (const name of getProviders().keys()) {
    if (await store.get(c, name)) {
      withSession.push(name)
    }
  }
  if (withSession.length === 1) {
    return withSession[0]
  }
  throw new Error(NO_PROVIDER_SELECTED_MESSAGE)
}

/** The caller's `state` query param, or a fresh random nonce. */
export const setState = (c: Context): string =>
  c.req.query('state') || nanoid(STATE_LENGTH)

/**
 * Callback parameters: the query string for GET, the form body for POST
 * (Apple's `response_mode=form_post`).
 */
export const getCallbackParams = async (c: Context): Promise<URLSearchParams> => {
  const params = new URL(c.req.url).searchParams
  if (c.req.method !== 'POST') {
    return params
  }
  const body = await c.req.parseBody()
  for (const [key, value] of Object.entries(body)) {
    if (typeof value === 'string') {
      params.set(key, value)
    }
  }
  return params
}

/**
 * Compare the callback `state` with the one embedded in the session's auth
 * URL. Providers that never put a state in the URL (OAuth1, Steam) pass.
 */
export const validateState = (params: Params, session: Session): void => {
  const authUrl = new URL(session.getAuthUrl(), 'http://localhost')
  const originalState = authUrl.searchParams.get('state')
  if (originalState && originalState !== params.get('state')) {
    throw new Error(STATE_MISMATCH_MESSAGE)
  }
}
