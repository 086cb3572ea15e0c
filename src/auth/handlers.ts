import type { Context } from 'hono'
import { log } from '../plumbing/logger.ts'
import { getProvider } from '../providers/registry.ts'
import type { User } from '../providers/types/user.ts'
import {
  getCallbackParams,
  getProviderName,
  setState,
  validateState,
} from './auth-utils.ts'
import type { SessionStore } from './session-store.ts'

export const NO_SESSION_MESSAGE =
  'could not find a matching session for this request'

/**
 * Start authentication with the selected provider, store its session and
 * return the URL to send the user to.
 */
export const getAuthUrl = async (
  c: Context,
  store: SessionStore,
): Promise<string> => {
  const providerName = await getProviderName(c, store)
  const provider = getProvider(providerName)
  const session = await provider.beginAuth(setState(c))
  const url = session.getAuthUrl()
  await store.set(c, providerName, session.marshal())
  return url
}

export const beginAuthHandler = async (
  c: Context,
  store: SessionStore,
): Promise<Response> => {
  try {
    return c.redirect(await getAuthUrl(c, store), 307)
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error)
    log({ message: 'Failed to begin authentication', error: message })
    return c.text(message, 400)
  }
}

/**
 * Finish authentication on the callback request. The stored session is
 * cleared whether or not this succeeds.
 */
export const completeUserAuth = async (
  c: Context,
  store: SessionStore,
): Promise<User> => {
  const providerName = await getProviderName(c, store)
  const provider = getProvider(providerName)
  const value = await store.get(c, providerName)
  if (!value) {
    throw new Error(NO_SESSION_MESSAGE)
  }

  try {
    const session = provider.unmarshalSession(value)

    try {
      return await provider.fetchUser(session)
    } catch {
      // not authorized yet; exchange the callback params below
    }

    const params = await getCallbackParams(c)
    validateState(params, session)
    await session.authorize(provider, params)
    await store.set(c, providerName, session.marshal())
    return await provider.fetchUser(session)
  } finally {
    await store.delete(c, providerName)
  }
}

export const logout = async (c: Context, store: SessionStore): Promise<void> => {
  const providerName = await getProviderName(c, store)
  await store.delete(c, providerName)
}

/** Keep an application value next to the provider sessions. */
export const storeInSession = async (
  c: Context,
  store: SessionStore,
  key: string,
  value: string,
): Promise<void> => {
  await store.set(c, key, value)
}

export const getFromSession = async (
  c: Context,
  store: SessionStore,
  key: string,
): Promise<string> => {
  const value = await store.get(c, key)
  if (value === undefined) {
    throw new Error(NO_SESSION_MESSAGE)
  }
  return value
}
